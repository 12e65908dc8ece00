import { crawlTree, LinkSource } from './core/CrawlEngine.js';
import { PageExtractor } from './core/PageExtractor.js';
import { groupByDirectory } from './core/ResultGrouper.js';
import { checklistFileName, renderChecklist } from './output/Checklist.js';
import { CrawlOptionsInput, parseCrawlOptions, toCrawlConfig } from './schemas.js';
import { CrawlOutcome, DirectoryGroup, FileLink } from './types.js';
import type { FetchError, ParseError } from './errors.js';

export interface CrawlHooks {
    onFetch?: (url: string) => void;
}

export type ChecklistOutcome =
    | {
        ok: true;
        fileName: string;
        markdown: string;
        groups: DirectoryGroup[];
        files: FileLink[];
        fetches: number;
    }
    | { ok: false; error: FetchError | ParseError; fetches: number };

/**
 * Entry point for crawling a repository listing and rendering the checklist.
 * Input is validated up front; crawl failures come back as `ok: false`.
 */
export class RepoChecklist {
    private static extractor: LinkSource = new PageExtractor();

    /**
     * Collect every tracked file below `input.url`.
     * Throws InputValidationError before any request is made.
     */
    static async crawl(input: CrawlOptionsInput, hooks: CrawlHooks = {}): Promise<CrawlOutcome> {
        const options = parseCrawlOptions(input);
        return crawlTree(options.url, toCrawlConfig(options, hooks.onFetch), { extractor: this.extractor });
    }

    static async checklist(input: CrawlOptionsInput, hooks: CrawlHooks = {}): Promise<ChecklistOutcome> {
        const outcome = await this.crawl(input, hooks);
        if (!outcome.ok) return outcome;

        const groups = groupByDirectory(outcome.files);
        return {
            ok: true,
            fileName: checklistFileName(input.url),
            markdown: renderChecklist(groups),
            groups,
            files: outcome.files,
            fetches: outcome.fetches,
        };
    }
}
