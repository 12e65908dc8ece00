import { FetchOptions, FetchResult } from '../types.js';

const DEFAULT_USER_AGENT = 'repo-checklist';

/**
 * Static HTTP GET for directory listing pages.
 * Retries are off unless asked for; retryable statuses back off linearly.
 */
export class ListingFetcher {
    private getErrorMessage(error: unknown): string {
        if (error instanceof Error) {
            if (error.name === 'AbortError') {
                return 'Request timed out';
            }
            return error.message;
        }
        return 'Unknown fetch error';
    }

    protected async wait(ms: number): Promise<void> {
        await new Promise((resolve) => setTimeout(resolve, ms));
    }

    async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
        const { retries = 0, timeout = 30000 } = options;
        for (let attempt = 0; attempt <= retries; attempt++) {
            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeout);
            const onAbort = () => controller.abort();
            options.signal?.addEventListener('abort', onAbort);

            try {
                if (options.signal?.aborted) {
                    return this.failure(0, 'Crawl aborted');
                }

                const response = await fetch(url, {
                    method: 'GET',
                    headers: {
                        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
                        'Accept': 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
                    },
                    signal: controller.signal,
                });

                const headers = Object.fromEntries(response.headers.entries());

                if (!response.ok) {
                    const isRetryable = response.status >= 500 || response.status === 408 || response.status === 429;
                    if (isRetryable && attempt < retries) {
                        await this.wait(1000 * (attempt + 1));
                        continue;
                    }
                    return { ...this.failure(response.status, `HTTP ${response.status}`), headers };
                }

                return {
                    html: await response.text(),
                    status: response.status,
                    headers,
                };
            } catch (error) {
                if (options.signal?.aborted) {
                    return this.failure(0, 'Crawl aborted');
                }
                if (attempt >= retries) {
                    return this.failure(0, this.getErrorMessage(error));
                }
                await this.wait(1000 * (attempt + 1));
            } finally {
                clearTimeout(timeoutId);
                options.signal?.removeEventListener('abort', onAbort);
            }
        }

        return this.failure(0, 'Unknown fetch error');
    }

    private failure(status: number, error: string): FetchResult {
        return { html: '', status, headers: {}, error };
    }
}
