import type { AuditEvent } from '../audit/schema.js';
import { toWireRecord } from '../audit/event.js';
import { defaultFetch, sendJson } from './siemSink.js';
import type { DeliveryReceipt, HttpFetch, SiemSink } from './siemSink.js';

export interface SplunkOptions {
    hecUrl: string;
    hecToken: string;
    index?: string;
    sourcetype?: string;
}

/**
 * Splunk HTTP Event Collector.
 */
export class SplunkHecSink implements SiemSink {
    readonly platform = 'splunk';

    constructor(
        private readonly options: SplunkOptions,
        private readonly fetchImpl: HttpFetch = defaultFetch
    ) { }

    deliver(event: AuditEvent): Promise<DeliveryReceipt> {
        return sendJson(this.fetchImpl, this.platform, this.options.hecUrl, {
            method: 'POST',
            headers: { Authorization: `Splunk ${this.options.hecToken}` },
            body: {
                time: Date.parse(event.timestamp) / 1000,
                event: toWireRecord(event),
                sourcetype: this.options.sourcetype ?? 'audit_log',
                index: this.options.index ?? 'audit_logs'
            }
        });
    }
}
