/**
 * Unbounded multi-producer, single-consumer queue. Producers `send`;
 * exactly one consumer awaits `receive`.
 */
export class CompletionChannel<T extends object> {
    private buffer: T[] = [];
    private waiting: ((value: T) => void) | null = null;

    send(value: T): void {
        const resolve = this.waiting;
        if (resolve) {
            this.waiting = null;
            resolve(value);
            return;
        }
        this.buffer.push(value);
    }

    receive(): Promise<T> {
        if (this.waiting) {
            return Promise.reject(new Error('CompletionChannel already has a consumer waiting'));
        }
        const next = this.buffer.shift();
        if (next !== undefined) {
            return Promise.resolve(next);
        }
        return new Promise<T>((resolve) => {
            this.waiting = resolve;
        });
    }

    get size(): number {
        return this.buffer.length;
    }
}
