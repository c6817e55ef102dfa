/**
 * Unit Tests: KeyedMutex
 *
 * @see libs/concurrency/keyedMutex.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { KeyedMutex } from '../../libs/concurrency/keyedMutex.js';
import { Semaphore } from '../../libs/concurrency/semaphore.js';

const tick = () => new Promise<void>(resolve => setImmediate(resolve));

describe('KeyedMutex', () => {
    it('runs callers for the same key one at a time, in arrival order', async () => {
        const mutex = new KeyedMutex();
        const order: string[] = [];
        let active = 0;
        let maxActive = 0;

        await Promise.all(['a', 'b', 'c'].map(name => mutex.runExclusive('tenant-a', async () => {
            active += 1;
            maxActive = Math.max(maxActive, active);
            order.push(`start:${name}`);
            await tick();
            order.push(`end:${name}`);
            active -= 1;
        })));

        assert.strictEqual(maxActive, 1);
        assert.deepStrictEqual(order, ['start:a', 'end:a', 'start:b', 'end:b', 'start:c', 'end:c']);
    });

    it('lets different keys run in parallel', async () => {
        const mutex = new KeyedMutex();
        let active = 0;
        let maxActive = 0;

        await Promise.all(['tenant-a', 'tenant-b'].map(key => mutex.runExclusive(key, async () => {
            active += 1;
            maxActive = Math.max(maxActive, active);
            await tick();
            active -= 1;
        })));

        assert.strictEqual(maxActive, 2);
    });

    it('releases the key when the callback throws', async () => {
        const mutex = new KeyedMutex();

        await assert.rejects(mutex.runExclusive('tenant-a', async () => {
            throw new Error('commit failed');
        }), /commit failed/);

        assert.strictEqual(await mutex.runExclusive('tenant-a', async () => 'next'), 'next');
        assert.strictEqual(mutex.isLocked('tenant-a'), false);
    });

    it('reports a held key as locked', async () => {
        const mutex = new KeyedMutex();
        let release: () => void = () => undefined;
        const held = mutex.runExclusive('tenant-a', () => new Promise<void>(resolve => {
            release = resolve;
        }));

        await tick();
        assert.strictEqual(mutex.isLocked('tenant-a'), true);
        release();
        await held;
        assert.strictEqual(mutex.isLocked('tenant-a'), false);
    });
});

describe('Semaphore', () => {
    it('bounds concurrency and queues the rest', async () => {
        const semaphore = new Semaphore(2);
        const r1 = await semaphore.acquire();
        const r2 = await semaphore.acquire();
        let thirdAcquired = false;
        const third = semaphore.acquire().then(release => {
            thirdAcquired = true;
            return release;
        });

        await tick();
        assert.strictEqual(thirdAcquired, false);
        assert.strictEqual(semaphore.pending, 1);

        r1();
        const r3 = await third;
        assert.strictEqual(thirdAcquired, true);
        assert.strictEqual(semaphore.active, 2);

        r2();
        r3();
        assert.strictEqual(semaphore.active, 0);
    });

    it('ignores a second release of the same permit', async () => {
        const semaphore = new Semaphore(1);
        const release = await semaphore.acquire();
        release();
        release();
        assert.strictEqual(semaphore.active, 0);
    });

    it('rejects a non-positive limit', () => {
        assert.throws(() => new Semaphore(0), /positive integer/);
    });
});
