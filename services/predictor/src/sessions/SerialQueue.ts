function settle(): void {
    // the chain only orders work; callers observe failures through their own promise
}

/**
 * Per-match ordering queue. Tasks run one at a time in submission order;
 * a failing task rejects its own promise and the next task still runs.
 */
export class SerialQueue {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    get size(): number {
        return this.pending;
    }

    run<T>(task: () => T | Promise<T>): Promise<T> {
        this.pending++;
        const result = this.tail.then(task).finally(() => {
            this.pending--;
        });
        this.tail = result.then(settle, settle);
        return result;
    }

    /** Resolves once everything queued so far has finished */
    idle(): Promise<void> {
        return this.tail;
    }
}
