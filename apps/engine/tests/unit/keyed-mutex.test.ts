import { KeyedMutex } from '../../src/utils/keyed-mutex';
import { sleep } from '../helpers/poll';

describe('KeyedMutex', () => {
    it('runs work for one key in order', async () => {
        const mutex = new KeyedMutex();
        const order: string[] = [];

        await Promise.all([
            mutex.runExclusive('a', async () => {
                await sleep(20);
                order.push('first');
            }),
            mutex.runExclusive('a', async () => {
                order.push('second');
            }),
        ]);

        expect(order).toEqual(['first', 'second']);
    });

    it('does not hold one key up behind another', async () => {
        const mutex = new KeyedMutex();
        const order: string[] = [];

        await Promise.all([
            mutex.runExclusive('slow', async () => {
                await sleep(30);
                order.push('slow');
            }),
            mutex.runExclusive('fast', async () => {
                order.push('fast');
            }),
        ]);

        expect(order).toEqual(['fast', 'slow']);
    });

    it('reports the lock and releases it after a failure', async () => {
        const mutex = new KeyedMutex();
        const run = mutex.runExclusive('a', async () => {
            throw new Error('boom');
        });
        expect(mutex.isLocked('a')).toBe(true);

        await expect(run).rejects.toThrow('boom');
        expect(mutex.isLocked('a')).toBe(false);
        await expect(mutex.runExclusive('a', async () => 'next')).resolves.toBe('next');
    });
});
