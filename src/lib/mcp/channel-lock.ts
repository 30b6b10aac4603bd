/**
 * Serializes async operations: each `run` starts only after every earlier one settled.
 */
export class ChannelLock {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    get size(): number {
        return this.pending;
    }

    run<T>(operation: () => Promise<T>): Promise<T> {
        this.pending += 1;
        const result = this.tail.then(operation);
        this.tail = result.then(
            () => this.release(),
            () => this.release()
        );
        return result;
    }

    private release(): void {
        this.pending -= 1;
    }
}
