import type { AuditEvent } from '../audit/schema.js';
import { toWireRecord } from '../audit/event.js';
import { defaultFetch, sendJson } from './siemSink.js';
import type { DeliveryReceipt, HttpFetch, SiemSink } from './siemSink.js';

export interface ElasticsearchOptions {
    url: string;
    index: string;
    apiKey: string;
}

/**
 * Indexes each event under its eventId, so a redelivery replaces the same
 * document instead of adding a second one.
 */
export class ElasticsearchSink implements SiemSink {
    readonly platform = 'elasticsearch';

    constructor(
        private readonly options: ElasticsearchOptions,
        private readonly fetchImpl: HttpFetch = defaultFetch
    ) { }

    deliver(event: AuditEvent): Promise<DeliveryReceipt> {
        const base = this.options.url.replace(/\/+$/, '');
        const url = `${base}/${encodeURIComponent(this.options.index)}/_doc/${encodeURIComponent(event.eventId)}`;
        return sendJson(this.fetchImpl, this.platform, url, {
            method: 'PUT',
            headers: { Authorization: `ApiKey ${this.options.apiKey}` },
            body: { '@timestamp': event.timestamp, ...toWireRecord(event) }
        });
    }
}
