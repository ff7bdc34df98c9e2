// src/services/runSerializer.ts

/**
 * Single-writer queue for runs that mutate counters or schedule rows
 *
 * Each task starts only after the previous one settled, successfully or not.
 * A failed task rejects its own caller and leaves the queue usable.
 */
export class RunSerializer {
    private tail: Promise<void>;

    constructor() {
        this.tail = Promise.resolve();
    }

    run<T>(task: () => Promise<T>): Promise<T> {
        const result = this.tail.then(task);
        this.tail = result.then(
            () => undefined,
            () => undefined
        );

        return result;
    }
}
