// Serial Queue
// Runs async jobs one at a time, in submission order, off the caller's stack

import { logError } from './errors.js';

export type SerialJob = () => void | Promise<void>;

export class SerialQueue {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    constructor(private readonly label: string) {}

    /**
     * Schedule a job. The caller never awaits it; a failing job is logged and
     * does not stop the jobs queued after it.
     */
    enqueue(job: SerialJob): void {
        this.pending++;
        this.tail = this.tail
            .then(job)
            .catch((error: unknown) => logError(error, this.label))
            .finally(() => {
                this.pending--;
            });
    }

    /**
     * Resolves once every job queued so far has run
     */
    drain(): Promise<void> {
        return this.tail;
    }

    get size(): number {
        return this.pending;
    }
}
