import { CrawlConfig, CrawlOutcome, ExtractOptions, FileLink, TypedLink } from '../types.js';
import { isCrawlError } from '../errors.js';
import { CompletionChannel } from './CompletionChannel.js';
import { HostScheduler } from './HostScheduler.js';
import { PageExtractor } from './PageExtractor.js';
import { safeHttpUrl } from './UrlUtils.js';

export interface LinkSource {
    extract(url: string, options: ExtractOptions): Promise<TypedLink[]>;
}

export interface CrawlDeps {
    extractor?: LinkSource;
    scheduler?: HostScheduler;
}

type Delivery =
    | { url: string; links: TypedLink[] }
    | { url: string; error: unknown };

/**
 * Fan out over a directory tree of unknown shape, one fetch per directory.
 *
 * Fetch tasks only `send` their batch; this loop is the sole reader of the
 * channel and the only writer of `pending` and `files`. The crawl is done
 * when every dispatched fetch has delivered, i.e. `pending` is back at 0.
 *
 * Directories reachable through several links are fetched once per link, and
 * their files reported once per link. The first fetch or parse failure ends
 * the crawl: in-flight fetches are aborted and queued ones never start.
 */
export async function crawlTree(rootUrl: string, config: CrawlConfig, deps: CrawlDeps = {}): Promise<CrawlOutcome> {
    const extractor = deps.extractor ?? new PageExtractor();
    const scheduler = deps.scheduler ?? new HostScheduler(config.concurrency ?? Infinity, config.minDelayMs ?? 0);
    const channel = new CompletionChannel<Delivery>();
    const controller = new AbortController();

    const extractOptions: ExtractOptions = {
        extension: config.extension,
        ignorePatterns: config.ignorePatterns,
        origin: config.origin,
        linkClass: config.linkClass,
        timeoutMs: config.timeoutMs,
        retries: config.retries,
        userAgent: config.userAgent,
        signal: controller.signal,
    };

    const files: FileLink[] = [];
    let fetches = 0;

    const dispatch = (url: string): void => {
        fetches++;
        const host = safeHttpUrl(url)?.host ?? url;
        const fetchPage = () => {
            config.onFetch?.(url);
            return extractor.extract(url, extractOptions);
        };
        void scheduler
            .run(host, fetchPage, controller.signal)
            .then(
                (links) => channel.send({ url, links }),
                (error: unknown) => channel.send({ url, error })
            );
    };

    let pending = 1;
    dispatch(rootUrl);

    while (pending > 0) {
        const delivery = await channel.receive();

        if ('error' in delivery) {
            controller.abort();
            if (isCrawlError(delivery.error)) {
                return { ok: false, error: delivery.error, fetches };
            }
            throw delivery.error;
        }

        for (const link of delivery.links) {
            switch (link.kind) {
                case 'directory':
                    pending++;
                    dispatch(link.href);
                    break;
                case 'file':
                    files.push(link);
                    break;
                default: {
                    const unreachable: never = link;
                    throw new Error(`Unknown link: ${JSON.stringify(unreachable)}`);
                }
            }
        }

        pending--;
    }

    return { ok: true, files, fetches };
}
