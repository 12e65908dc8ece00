import * as cheerio from 'cheerio';
import { AnchorNode, ClassifyOptions, ExtractOptions, TypedLink } from '../types.js';
import { FetchError, ParseError } from '../errors.js';
import { ListingFetcher } from './ListingFetcher.js';
import { classifyLink } from './LinkClassifier.js';

const MARKUP_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

/**
 * Classify every anchor of a listing page, in document order.
 */
export function extractLinksFromHtml(html: string, options: ClassifyOptions, pageUrl = 'listing page'): TypedLink[] {
    if (html.trim().length === 0) {
        throw new ParseError(pageUrl, 'empty response body');
    }

    let $: cheerio.CheerioAPI;
    try {
        $ = cheerio.load(html);
    } catch (error) {
        throw new ParseError(pageUrl, error instanceof Error ? error.message : String(error), { cause: error });
    }

    const links: TypedLink[] = [];
    $('a').each((_, el) => {
        const first = $(el).contents().first();
        const node: AnchorNode = {
            attribs: el.attribs,
            label: first.length > 0 ? first.text() : null,
        };
        const link = classifyLink(node, options);
        if (link) links.push(link);
    });

    return links;
}

export class PageExtractor {
    constructor(private readonly fetcher: ListingFetcher = new ListingFetcher()) {}

    /**
     * One GET of `url`, then anchor classification. Only a 200 counts as a
     * listing: any other status, or a transport failure, is a FetchError.
     * Never retries unless `retries` is set.
     */
    async extract(url: string, options: ExtractOptions): Promise<TypedLink[]> {
        const result = await this.fetcher.fetch(url, {
            timeout: options.timeoutMs,
            retries: options.retries,
            userAgent: options.userAgent,
            signal: options.signal,
        });

        if (result.error !== undefined || result.status !== 200) {
            throw new FetchError(url, result.status, result.error ?? `HTTP ${result.status}`);
        }

        const contentType = result.headers['content-type'];
        if (contentType && !MARKUP_CONTENT_TYPES.some((t) => contentType.includes(t))) {
            throw new ParseError(url, `non-HTML content type: ${contentType}`);
        }

        return extractLinksFromHtml(result.html, options, url);
    }
}
