import type { AuditEvent } from '../audit/schema.js';
import { toWireRecord } from '../audit/event.js';
import { defaultFetch, sendJson } from './siemSink.js';
import type { DeliveryReceipt, HttpFetch, SiemSink } from './siemSink.js';

export interface DatadogOptions {
    apiKey: string;
    site: string;
    service?: string;
}

// Logs intake v2
export class DatadogLogsSink implements SiemSink {
    readonly platform = 'datadog';

    constructor(
        private readonly options: DatadogOptions,
        private readonly fetchImpl: HttpFetch = defaultFetch
    ) { }

    deliver(event: AuditEvent): Promise<DeliveryReceipt> {
        return sendJson(this.fetchImpl, this.platform, `https://http-intake.logs.${this.options.site}/api/v2/logs`, {
            method: 'POST',
            headers: { 'DD-API-KEY': this.options.apiKey },
            body: [{
                ddsource: 'audit_logger',
                ddtags: `tenant:${event.context.tenantId},classification:${event.classification.toLowerCase()}`,
                service: this.options.service ?? 'audit-chain',
                message: JSON.stringify(toWireRecord(event))
            }]
        });
    }
}
