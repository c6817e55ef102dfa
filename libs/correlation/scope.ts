import { AsyncLocalStorage } from 'node:async_hooks';
import type { CorrelationContext } from './context.js';
import { createChildSpan } from './context.js';

/**
 * Correlation Scope Container
 * AsyncLocalStorage-backed so concurrent requests never see each other's ids.
 *
 * Only the ingress boundary of a collaborator should call run(); everything
 * downstream reads with current() or get().
 */

const storage = new AsyncLocalStorage<CorrelationContext>();

export class CorrelationScope {
    /**
     * Establish the correlation scope for a request or job lifecycle.
     */
    public static run<T>(context: CorrelationContext, fn: () => T): T {
        return storage.run(Object.freeze({ ...context }), fn);
    }

    /**
     * Run fn inside a child span of the current scope.
     * FAIL-CLOSED: throws when no scope is active.
     */
    public static runChild<T>(operation: string, fn: () => T): T {
        const child = createChildSpan(CorrelationScope.get(), operation);
        return storage.run(child, fn);
    }

    /**
     * Current context, or undefined outside run().
     */
    public static current(): CorrelationContext | undefined {
        return storage.getStore();
    }

    /**
     * FAIL-CLOSED: throws if called outside run() scope.
     */
    public static get(): CorrelationContext {
        const ctx = storage.getStore();
        if (!ctx) {
            throw new Error('MISSING_CORRELATION_CONTEXT: No correlation scope established');
        }
        return ctx;
    }
}
