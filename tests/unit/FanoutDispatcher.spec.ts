/**
 * Unit Tests: FanoutDispatcher
 *
 * @see libs/fanout/FanoutDispatcher.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { FanoutDispatcher } from '../../libs/fanout/FanoutDispatcher.js';
import type { FanoutTarget } from '../../libs/fanout/FanoutDispatcher.js';
import type { FanoutConfig } from '../../libs/config/auditConfig.js';
import type { AuditEvent } from '../../libs/audit/schema.js';
import { buildChain } from '../helpers/auditFixtures.js';

const fast: FanoutConfig = { maxAttempts: 3, backoffMs: 1, timeoutMs: 1000, concurrency: 4 };

class RecordingTarget implements FanoutTarget {
    readonly received: string[] = [];
    calls = 0;

    constructor(readonly name: string, private readonly failuresBeforeSuccess = 0) { }

    async send(event: AuditEvent): Promise<void> {
        this.calls += 1;
        if (this.calls <= this.failuresBeforeSuccess) {
            throw new Error(`${this.name} unavailable`);
        }
        this.received.push(event.eventId);
    }
}

const recordingTarget = (name: string, failuresBeforeSuccess = 0) => new RecordingTarget(name, failuresBeforeSuccess);

describe('FanoutDispatcher', () => {
    it('delivers every event to every target', async () => {
        const archive = recordingTarget('archive');
        const siem = recordingTarget('siem:splunk');
        const dispatcher = new FanoutDispatcher([archive, siem], fast);
        const events = buildChain('tenant-a', 3);

        events.forEach(e => dispatcher.enqueue(e));
        await dispatcher.drain();

        assert.deepStrictEqual(archive.received, events.map(e => e.eventId));
        assert.deepStrictEqual(siem.received, events.map(e => e.eventId));
        assert.deepStrictEqual(dispatcher.stats(), {
            targets: {
                archive: { delivered: 3, failed: 0, retried: 0 },
                'siem:splunk': { delivered: 3, failed: 0, retried: 0 }
            },
            inFlight: 0,
            dropped: 0
        });
        assert.deepStrictEqual(dispatcher.targetNames, ['archive', 'siem:splunk']);
    });

    it('returns from enqueue before any target finishes', async () => {
        let finish: () => void = () => undefined;
        const slow: FanoutTarget = {
            name: 'slow',
            send: () => new Promise<void>(resolve => {
                finish = resolve;
            })
        };
        const dispatcher = new FanoutDispatcher([slow], fast);
        const [event] = buildChain('tenant-a', 1);
        assert.ok(event);

        dispatcher.enqueue(event);
        assert.strictEqual(dispatcher.stats().inFlight, 1);

        await new Promise<void>(resolve => setImmediate(resolve));
        finish();
        await dispatcher.drain();
        assert.strictEqual(dispatcher.stats().targets.slow?.delivered, 1);
    });

    it('retries a failing target and counts the retries', async () => {
        const flaky = recordingTarget('flaky', 2);
        const dispatcher = new FanoutDispatcher([flaky], fast);
        const [event] = buildChain('tenant-a', 1);
        assert.ok(event);

        dispatcher.enqueue(event);
        await dispatcher.drain();

        assert.strictEqual(flaky.calls, 3);
        assert.deepStrictEqual(dispatcher.stats().targets.flaky, { delivered: 1, failed: 0, retried: 2 });
    });

    it('gives up after maxAttempts without affecting other targets', async () => {
        const broken = recordingTarget('broken', Number.POSITIVE_INFINITY);
        const healthy = recordingTarget('healthy');
        const dispatcher = new FanoutDispatcher([broken, healthy], fast);
        const [event] = buildChain('tenant-a', 1);
        assert.ok(event);

        dispatcher.enqueue(event);
        await dispatcher.drain();

        assert.strictEqual(broken.calls, 3);
        assert.deepStrictEqual(dispatcher.stats().targets.broken, { delivered: 0, failed: 1, retried: 2 });
        assert.deepStrictEqual(healthy.received, [event.eventId]);
    });

    it('counts a synchronous throw as a failed attempt', async () => {
        const throwing: FanoutTarget = {
            name: 'throwing',
            send: () => {
                throw new Error('not configured');
            }
        };
        const dispatcher = new FanoutDispatcher([throwing], { ...fast, maxAttempts: 1 });
        const [event] = buildChain('tenant-a', 1);
        assert.ok(event);

        dispatcher.enqueue(event);
        await dispatcher.drain();

        assert.deepStrictEqual(dispatcher.stats().targets.throwing, { delivered: 0, failed: 1, retried: 0 });
    });

    it('abandons an attempt that exceeds the timeout', async () => {
        const hung: FanoutTarget = { name: 'hung', send: () => new Promise(() => undefined) };
        const dispatcher = new FanoutDispatcher([hung], { ...fast, maxAttempts: 2, timeoutMs: 10 });
        const [event] = buildChain('tenant-a', 1);
        assert.ok(event);

        dispatcher.enqueue(event);
        await dispatcher.drain();

        assert.deepStrictEqual(dispatcher.stats().targets.hung, { delivered: 0, failed: 1, retried: 1 });
    });

    it('never runs more sends at once than the concurrency limit', async () => {
        let active = 0;
        let maxActive = 0;
        const target: FanoutTarget = {
            name: 'bounded',
            async send() {
                active += 1;
                maxActive = Math.max(maxActive, active);
                await new Promise<void>(resolve => setTimeout(resolve, 2));
                active -= 1;
            }
        };
        const dispatcher = new FanoutDispatcher([target], { ...fast, concurrency: 1 });

        buildChain('tenant-a', 5).forEach(e => dispatcher.enqueue(e));
        await dispatcher.drain();

        assert.strictEqual(maxActive, 1);
        assert.strictEqual(dispatcher.stats().targets.bounded?.delivered, 5);
    });

    it('drops events enqueued after stop', async () => {
        const target = recordingTarget('archive');
        const dispatcher = new FanoutDispatcher([target], fast);
        const [first, second] = buildChain('tenant-a', 2);
        assert.ok(first && second);

        dispatcher.enqueue(first);
        await dispatcher.stop();
        dispatcher.enqueue(second);
        await dispatcher.drain();

        assert.deepStrictEqual(target.received, [first.eventId]);
        assert.strictEqual(dispatcher.stats().dropped, 1);
    });
});
