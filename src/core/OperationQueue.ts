/**
 * @fileoverview Operation Queue - serializes engine operations
 * @module core/OperationQueue
 *
 * Updates and resolution runs are processed one at a time, in the order they
 * were enqueued, so a run never observes a half-applied update and two runs
 * never interleave their audit logs.
 */

type Operation<T> = () => Promise<T> | T;

interface QueuedOperation {
    run: () => Promise<void>;
}

export class OperationQueue {
    private queue: QueuedOperation[] = [];
    private processing = false;

    /**
     * Enqueue an operation
     * @returns Promise settled with the operation's own result or error
     */
    enqueue<T>(operation: Operation<T>): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            this.queue.push({
                run: async () => {
                    try {
                        resolve(await operation());
                    } catch (error) {
                        reject(error instanceof Error ? error : new Error(String(error)));
                    }
                },
            });

            if (!this.processing) {
                void this.processQueue();
            }
        });
    }

    private async processQueue(): Promise<void> {
        this.processing = true;
        while (this.queue.length > 0) {
            const item = this.queue.shift();
            if (!item) break;
            await item.run();
        }
        this.processing = false;
    }

    /**
     * Number of operations waiting (the running one excluded)
     */
    getLength(): number {
        return this.queue.length;
    }

    isProcessing(): boolean {
        return this.processing;
    }
}
