import { describe, it, expect } from 'vitest';
import { TaskQueue, WorkerPool } from '../worker-pool';
import { PoolProgress } from '../types';

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('TaskQueue', () => {
    it('hands out each task once, in order', () => {
        const queue = new TaskQueue(['a', 'b']);

        expect(queue.total).toBe(2);
        expect(queue.claimNext()).toEqual({ task: 'a', index: 0 });
        expect(queue.pending).toBe(1);
        expect(queue.claimNext()).toEqual({ task: 'b', index: 1 });
        expect(queue.claimNext()).toBeNull();
        expect(queue.pending).toBe(0);
    });
});

describe('WorkerPool', () => {
    it('returns results in input order regardless of completion order', async () => {
        const pool = new WorkerPool<number, string>(3, async (delay, index) => {
            await wait(delay);
            return `${index}:${delay}`;
        });

        await expect(pool.run([30, 1, 15, 0])).resolves.toEqual(['0:30', '1:1', '2:15', '3:0']);
    });

    it('never runs more tasks at once than it has workers', async () => {
        let active = 0;
        let peak = 0;
        const pool = new WorkerPool<number, number>(2, async (n) => {
            active++;
            peak = Math.max(peak, active);
            await wait(5);
            active--;
            return n * 2;
        });

        const results = await pool.run([1, 2, 3, 4, 5, 6]);

        expect(results).toEqual([2, 4, 6, 8, 10, 12]);
        expect(peak).toBe(2);
    });

    it('attempts every task exactly once', async () => {
        const seen: number[] = [];
        const pool = new WorkerPool<number, number>(10, async (n) => {
            seen.push(n);
            return n;
        });

        await pool.run([1, 2, 3]);

        expect([...seen].sort()).toEqual([1, 2, 3]);
    });

    it('names workers and only starts as many as there are tasks', async () => {
        const workers = new Set<string>();
        const pool = new WorkerPool<number, number>(10, async (n, _index, workerId) => {
            workers.add(workerId);
            await wait(5);
            return n;
        });

        await pool.run([1, 2]);

        expect([...workers].sort()).toEqual(['worker-1', 'worker-2']);
    });

    it('resolves to an empty array for no tasks', async () => {
        const pool = new WorkerPool<number, number>(4, async (n) => n);

        await expect(pool.run([])).resolves.toEqual([]);
    });

    it('reports progress with failures counted', async () => {
        const updates: PoolProgress[] = [];
        const pool = new WorkerPool<number, boolean>(1, async (n) => n % 2 === 0, {
            isFailure: (ok) => !ok,
            onProgress: (progress) => updates.push(progress),
        });

        await pool.run([2, 3, 4]);

        expect(updates).toEqual([
            { total: 3, processed: 1, failed: 0 },
            { total: 3, processed: 2, failed: 1 },
            { total: 3, processed: 3, failed: 1 },
        ]);
    });

    it('stops claiming work and rejects when a handler throws', async () => {
        const started: number[] = [];
        const pool = new WorkerPool<number, number>(1, async (n) => {
            started.push(n);
            if (n === 2) {
                throw new Error('handler failed');
            }
            return n;
        });

        await expect(pool.run([1, 2, 3])).rejects.toThrow('handler failed');
        expect(started).toEqual([1, 2]);
    });

    it('rejects a non-positive worker count', () => {
        expect(() => new WorkerPool<number, number>(0, async (n) => n)).toThrow(RangeError);
    });
});
