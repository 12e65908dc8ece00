/**
 * Per-host admission control: caps in-flight fetches and spaces their starts.
 * `Infinity` concurrency with no delay admits everything immediately.
 */
export class HostScheduler {
    private inflightByHost = new Map<string, number>();
    private lastStartByHost = new Map<string, number>();
    private peakByHost = new Map<string, number>();

    constructor(
        private readonly perHostConcurrency: number = Infinity,
        private readonly minDelayMs: number = 0
    ) {}

    /**
     * Run `fn` once a slot for `host` is free. Rejects with the signal's
     * reason, without calling `fn`, if `signal` aborts first.
     */
    async run<T>(host: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        const admitted = await this.acquire(host, signal);
        if (!admitted) {
            throw signal?.reason ?? new Error('Aborted');
        }
        if (signal?.aborted) {
            this.release(host);
            throw signal.reason;
        }
        try {
            return await fn();
        } finally {
            this.release(host);
        }
    }

    /** Highest number of simultaneous runs seen for `host`. */
    peak(host: string): number {
        return this.peakByHost.get(host) ?? 0;
    }

    private async acquire(host: string, signal?: AbortSignal): Promise<boolean> {
        while (!signal?.aborted) {
            const inflight = this.inflightByHost.get(host) ?? 0;
            const lastStart = this.lastStartByHost.get(host);
            const now = Date.now();
            const waitForDelay = lastStart === undefined ? 0 : Math.max(0, this.minDelayMs - (now - lastStart));

            if (inflight < this.perHostConcurrency && waitForDelay === 0) {
                this.inflightByHost.set(host, inflight + 1);
                this.lastStartByHost.set(host, now);
                this.peakByHost.set(host, Math.max(this.peak(host), inflight + 1));
                return true;
            }

            const sleepMs = waitForDelay > 0 ? waitForDelay : 25;
            await new Promise((r) => setTimeout(r, sleepMs));
        }
        return false;
    }

    private release(host: string): void {
        const inflight = this.inflightByHost.get(host) ?? 0;
        if (inflight <= 1) {
            this.inflightByHost.delete(host);
            return;
        }
        this.inflightByHost.set(host, inflight - 1);
    }
}
