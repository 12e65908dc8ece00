import type { FetchError, ParseError } from './errors.js';

export interface FetchOptions {
    timeout?: number;
    retries?: number;
    userAgent?: string;
    signal?: AbortSignal;
}

export interface FetchResult {
    html: string;
    status: number;
    headers: Record<string, string>;
    error?: string;
}

export interface DirectoryLink {
    kind: 'directory';
    name: string; // path below the ref, '' for the repository root
    href: string;
}

export interface FileLink {
    kind: 'file';
    name: string; // label without the extension
    href: string;
    parentDirectory: DirectoryLink;
}

export type TypedLink = DirectoryLink | FileLink;

/**
 * The parts of an anchor element the classifier looks at.
 */
export interface AnchorNode {
    attribs: Record<string, string | undefined>;
    label: string | null; // text of the first child, null when there is none
}

export interface ClassifyOptions {
    extension: string;
    ignorePatterns: string[];
    origin: string;
    linkClass: string;
}

export interface ExtractOptions extends ClassifyOptions {
    timeoutMs?: number;
    retries?: number;
    userAgent?: string;
    signal?: AbortSignal;
}

export interface CrawlConfig extends ClassifyOptions {
    concurrency?: number; // default: unbounded
    minDelayMs?: number;  // default: 0
    timeoutMs?: number;   // default: 30000
    retries?: number;     // default: 0
    userAgent?: string;
    onFetch?: (url: string) => void;
}

export type CrawlOutcome =
    | { ok: true; files: FileLink[]; fetches: number }
    | { ok: false; error: FetchError | ParseError; fetches: number };

export interface DirectoryGroup {
    directory: DirectoryLink;
    files: FileLink[];
}
