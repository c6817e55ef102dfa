import type { AuditEvent } from '../audit/schema.js';
import { DeliveryError } from '../errors/errors.js';

export interface DeliveryReceipt {
    readonly platform: string;
    readonly statusCode: number;
}

/**
 * Best-effort stream of committed events to a security platform.
 * A thrown DeliveryError never affects the chain.
 */
export interface SiemSink {
    readonly platform: string;
    deliver(event: AuditEvent): Promise<DeliveryReceipt>;
}

export type HttpFetch = (url: string, init: RequestInit) => Promise<Response>;

export const defaultFetch: HttpFetch = (url, init) => fetch(url, init);

/**
 * Send one request and turn transport failures and non-2xx answers into
 * DeliveryError. The response body is drained and discarded.
 */
export async function sendJson(
    fetchImpl: HttpFetch,
    platform: string,
    url: string,
    init: { method: 'POST' | 'PUT'; headers: Record<string, string>; body: unknown }
): Promise<DeliveryReceipt> {
    let response: Response;
    try {
        response = await fetchImpl(url, {
            method: init.method,
            headers: { 'Content-Type': 'application/json', ...init.headers },
            body: JSON.stringify(init.body)
        });
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new DeliveryError(`${platform} request failed: ${message}`, platform, undefined, error);
    }

    // Drain so the connection can be reused
    await response.text();

    if (!response.ok) {
        throw new DeliveryError(`${platform} rejected event with HTTP ${response.status}`, platform, response.status);
    }
    return { platform, statusCode: response.status };
}
