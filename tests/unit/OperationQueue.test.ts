import { describe, it, expect } from 'vitest';
import { OperationQueue } from '../../src/core/OperationQueue';

describe('OperationQueue', () => {
    it('should resolve with each operation result', async () => {
        const queue = new OperationQueue();
        await expect(queue.enqueue(() => 42)).resolves.toBe(42);
        await expect(queue.enqueue(async () => 'done')).resolves.toBe('done');
    });

    it('should run operations one after another in enqueue order', async () => {
        const queue = new OperationQueue();
        const order: string[] = [];
        const delayed = (label: string, ms: number) => async () => {
            order.push(`${label}:start`);
            await new Promise(resolve => setTimeout(resolve, ms));
            order.push(`${label}:end`);
        };

        await Promise.all([queue.enqueue(delayed('a', 10)), queue.enqueue(delayed('b', 1))]);

        expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
        expect(queue.isProcessing()).toBe(false);
        expect(queue.getLength()).toBe(0);
    });

    it('should keep processing after a failing operation', async () => {
        const queue = new OperationQueue();
        const failing = queue.enqueue(() => {
            throw new Error('nope');
        });
        const next = queue.enqueue(() => 'after');

        await expect(failing).rejects.toThrow('nope');
        await expect(next).resolves.toBe('after');
    });

    it('should wrap non-Error rejections', async () => {
        const queue = new OperationQueue();
        await expect(queue.enqueue(() => Promise.reject('plain'))).rejects.toThrow('plain');
    });
});
