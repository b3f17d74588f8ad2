import chalk from 'chalk';
import { logger } from './logger';
import { PoolProgress } from './types';

/**
 * In-memory work queue shared by the pool's workers. Claims are synchronous,
 * so on a single event loop no task is handed out twice.
 */
export class TaskQueue<T> {
    private tasks: readonly T[];
    private cursor = 0;

    constructor(tasks: readonly T[]) {
        this.tasks = [...tasks];
    }

    claimNext(): { task: T; index: number } | null {
        if (this.cursor >= this.tasks.length) {
            return null;
        }
        const index = this.cursor++;
        return { task: this.tasks[index], index };
    }

    get total(): number {
        return this.tasks.length;
    }

    get pending(): number {
        return this.tasks.length - this.cursor;
    }
}

export type TaskHandler<T, R> = (task: T, index: number, workerId: string) => Promise<R>;

export interface WorkerPoolOptions<R> {
    onProgress?: (progress: PoolProgress, result: R) => void;
    isFailure?: (result: R) => boolean;
}

/**
 * Fixed-size pool of async workers draining a TaskQueue. Results come back
 * in input order whatever the completion order was.
 */
export class WorkerPool<T, R> {
    private workerCount: number;
    private handler: TaskHandler<T, R>;
    private options: WorkerPoolOptions<R>;

    constructor(workerCount: number, handler: TaskHandler<T, R>, options: WorkerPoolOptions<R> = {}) {
        if (!Number.isInteger(workerCount) || workerCount < 1) {
            throw new RangeError(`Worker count must be a positive integer, got ${workerCount}`);
        }
        this.workerCount = workerCount;
        this.handler = handler;
        this.options = options;
    }

    async run(tasks: readonly T[]): Promise<R[]> {
        const queue = new TaskQueue(tasks);
        const results = new Map<number, R>();
        const progress: PoolProgress = { total: queue.total, processed: 0, failed: 0 };
        const state = { aborted: false };

        const size = Math.min(this.workerCount, queue.total);
        logger.debug(chalk.gray(`Starting ${size} workers for ${queue.total} tasks`));

        const workers = Array.from({ length: size }, (_, i) =>
            this.runWorker(`worker-${i + 1}`, queue, results, progress, state),
        );
        await Promise.all(workers);

        return tasks.map((_, index) => {
            const result = results.get(index);
            if (result === undefined) {
                throw new Error(`Task ${index} produced no result`);
            }
            return result;
        });
    }

    private async runWorker(
        workerId: string,
        queue: TaskQueue<T>,
        results: Map<number, R>,
        progress: PoolProgress,
        state: { aborted: boolean },
    ): Promise<void> {
        while (!state.aborted) {
            const claimed = queue.claimNext();
            if (!claimed) {
                logger.debug(chalk.gray(`[${workerId}] No more work, exiting`));
                return;
            }

            let result: R;
            try {
                result = await this.handler(claimed.task, claimed.index, workerId);
            } catch (error) {
                state.aborted = true;
                throw error;
            }

            results.set(claimed.index, result);
            progress.processed++;
            if (this.options.isFailure?.(result)) {
                progress.failed++;
            }
            this.options.onProgress?.({ ...progress }, result);
        }
    }
}
