import type { AuditEvent } from '../audit/schema.js';
import type { DeliveryReceipt, SiemSink } from './siemSink.js';

export class MemorySiemSink implements SiemSink {
    readonly platform = 'memory';
    readonly delivered: AuditEvent[] = [];

    async deliver(event: AuditEvent): Promise<DeliveryReceipt> {
        this.delivered.push(event);
        return { platform: this.platform, statusCode: 200 };
    }
}
