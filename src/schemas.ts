import { z } from 'zod';
import { DEFAULT_LINK_CLASS, DEFAULT_ORIGIN } from './core/LinkClassifier.js';
import { InputValidationError } from './errors.js';
import { CrawlConfig } from './types.js';

function escapeRegExp(input: string): string {
    return input.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export const CrawlOptionsSchema = z
    .object({
        url: z.string().describe('Root listing page, e.g. https://github.com/<owner>/<repo>/'),
        extension: z.string().regex(/^\.\S*$/, 'Extension must start with "." and contain no whitespace'),
        ignore: z.array(z.string()).default([]).describe('Directory name patterns to prune'),
        origin: z.string().url().default(DEFAULT_ORIGIN),
        linkClass: z.string().min(1).default(DEFAULT_LINK_CLASS).describe('Exact class attribute of listing rows'),
        concurrency: z.number().int().min(1).optional().describe('Maximum simultaneous fetches (default: unbounded)'),
        minDelayMs: z.number().int().min(0).default(0).describe('Minimum delay between fetch starts (ms)'),
        timeoutMs: z.number().int().min(1).default(30000),
        retries: z.number().int().min(0).default(0),
        userAgent: z.string().min(1).default('repo-checklist'),
    })
    .superRefine((opts, ctx) => {
        const origin = opts.origin.replace(/\/+$/, '');
        if (!new RegExp(`^${escapeRegExp(origin)}/.*$`).test(opts.url)) {
            ctx.addIssue({ code: 'custom', path: ['url'], message: `URL must start with ${origin}/` });
        }
        for (const [i, pattern] of opts.ignore.entries()) {
            try {
                new RegExp(pattern);
            } catch {
                ctx.addIssue({ code: 'custom', path: ['ignore', i], message: `Invalid pattern: ${pattern}` });
            }
        }
    });

export type CrawlOptionsInput = z.input<typeof CrawlOptionsSchema>;
export type CrawlOptions = z.infer<typeof CrawlOptionsSchema>;

/** Space-delimited ignore list as given on the command line. */
export function splitIgnore(raw: string | undefined): string[] {
    return (raw ?? '').split(/\s+/).filter(Boolean);
}

export function parseCrawlOptions(input: unknown): CrawlOptions {
    const parsed = CrawlOptionsSchema.safeParse(input);
    if (!parsed.success) {
        throw new InputValidationError(
            parsed.error.issues.map((issue) => {
                const where = issue.path.map(String).join('.');
                return where ? `${where}: ${issue.message}` : issue.message;
            })
        );
    }
    return parsed.data;
}

export function toCrawlConfig(opts: CrawlOptions, onFetch?: (url: string) => void): CrawlConfig {
    return {
        extension: opts.extension,
        ignorePatterns: opts.ignore,
        origin: opts.origin.replace(/\/+$/, ''),
        linkClass: opts.linkClass,
        concurrency: opts.concurrency,
        minDelayMs: opts.minDelayMs,
        timeoutMs: opts.timeoutMs,
        retries: opts.retries,
        userAgent: opts.userAgent,
        onFetch,
    };
}
