/**
 * Fan-out Dispatcher
 *
 * Mirrors committed events to secondary targets (archive, SIEM) off the
 * submit path:
 * - enqueue() returns immediately and never throws
 * - each (event, target) job runs under a per-call timeout
 * - concurrency is bounded by a semaphore shared by all targets
 * - failures retry with exponential backoff up to maxAttempts, then are logged
 *
 * Nothing here can unwind a primary commit.
 */

import type { AuditEvent } from '../audit/schema.js';
import type { FanoutConfig } from '../config/auditConfig.js';
import { Semaphore } from '../concurrency/semaphore.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('FanoutDispatcher');

export const DEFAULT_FANOUT_CONFIG: FanoutConfig = {
    maxAttempts: 3,
    backoffMs: 250,
    timeoutMs: 10_000,
    concurrency: 8
};

export interface FanoutTarget {
    readonly name: string;
    send(event: AuditEvent): Promise<unknown>;
}

export interface TargetStats {
    delivered: number;
    failed: number;
    retried: number;
}

export interface DispatcherStats {
    readonly targets: Readonly<Record<string, Readonly<TargetStats>>>;
    readonly inFlight: number;
    readonly dropped: number;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class FanoutDispatcher {
    private readonly semaphore: Semaphore;
    private readonly inFlight = new Set<Promise<void>>();
    private readonly counters = new Map<string, TargetStats>();
    private dropped = 0;
    private stopped = false;

    constructor(
        private readonly targets: readonly FanoutTarget[],
        private readonly config: FanoutConfig = DEFAULT_FANOUT_CONFIG
    ) {
        this.semaphore = new Semaphore(config.concurrency);
        for (const target of targets) {
            this.counters.set(target.name, { delivered: 0, failed: 0, retried: 0 });
        }
    }

    get targetNames(): string[] {
        return this.targets.map(t => t.name);
    }

    /**
     * Schedule delivery of a committed event to every target.
     */
    public enqueue(event: AuditEvent): void {
        if (this.stopped) {
            this.dropped += 1;
            logger.warn({ eventId: event.eventId, tenantId: event.context.tenantId }, 'Dispatcher stopped; fan-out dropped');
            return;
        }

        for (const target of this.targets) {
            const job = this.runJob(target, event);
            this.inFlight.add(job);
            void job.finally(() => this.inFlight.delete(job));
        }
    }

    /**
     * Resolves once every job enqueued so far has settled.
     */
    public async drain(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.allSettled([...this.inFlight]);
        }
    }

    /**
     * Refuse further enqueues and wait for in-flight jobs.
     */
    public async stop(): Promise<void> {
        this.stopped = true;
        await this.drain();
        logger.info({ stats: this.stats() }, 'FanoutDispatcher stopped');
    }

    public stats(): DispatcherStats {
        const targets: Record<string, TargetStats> = {};
        for (const [name, counter] of this.counters) {
            targets[name] = { ...counter };
        }
        return { targets, inFlight: this.inFlight.size, dropped: this.dropped };
    }

    private counter(name: string): TargetStats {
        let counter = this.counters.get(name);
        if (!counter) {
            counter = { delivered: 0, failed: 0, retried: 0 };
            this.counters.set(name, counter);
        }
        return counter;
    }

    private async runJob(target: FanoutTarget, event: AuditEvent): Promise<void> {
        const counter = this.counter(target.name);
        const logContext = { target: target.name, eventId: event.eventId, tenantId: event.context.tenantId };

        for (let attempt = 1; attempt <= this.config.maxAttempts; attempt += 1) {
            const release = await this.semaphore.acquire();
            try {
                await this.sendWithTimeout(target, event);
                counter.delivered += 1;
                logger.debug({ ...logContext, attempt }, 'Fan-out delivered');
                return;
            } catch (error: unknown) {
                const errorMessage = error instanceof Error ? error.message : 'Unknown error';
                if (attempt >= this.config.maxAttempts) {
                    counter.failed += 1;
                    logger.error({ ...logContext, attempts: attempt, error: errorMessage }, 'Fan-out failed; giving up');
                    return;
                }
                counter.retried += 1;
                logger.warn({ ...logContext, attempt, error: errorMessage }, 'Fan-out attempt failed; retrying');
            } finally {
                release();
            }

            await sleep(this.calculateBackoffMs(attempt));
        }
    }

    private sendWithTimeout(target: FanoutTarget, event: AuditEvent): Promise<unknown> {
        return new Promise((resolve, reject) => {
            const timeout = setTimeout(() => reject(new Error('FANOUT_TIMEOUT')), this.config.timeoutMs);
            Promise.resolve().then(() => target.send(event)).then(result => {
                clearTimeout(timeout);
                resolve(result);
            }).catch((error: unknown) => {
                clearTimeout(timeout);
                reject(error);
            });
        });
    }

    private calculateBackoffMs(attempt: number): number {
        return this.config.backoffMs * 2 ** (attempt - 1);
    }
}
