/**
 * Compliance Report Service
 *
 * Read-only evidence export over one tenant's audit trail:
 * - integrity status from a full chain verification
 * - the events matching the requested filters, in chain order
 * - per event-type and per classification counts
 * - SHA-256 of the report body, written alongside exports as <file>.sha256
 */

import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import type { AuditEventType, CommittedAuditEvent, DataClassification } from '../audit/schema.js';
import { toWireRecord } from '../audit/event.js';
import type { ChainVerifier, VerificationResult } from '../audit/verifier.js';
import { MAX_PAGE_SIZE } from '../store/primaryStore.js';
import type { EventFilters, PrimaryStore } from '../store/primaryStore.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('ComplianceReportService');

export const REPORT_SCHEMA_VERSION = '1.0.0';

export type ExportFormat = 'json' | 'csv';

export interface ComplianceReport {
    readonly reportId: string;
    readonly schemaVersion: string;
    readonly tenantId: string;
    readonly generatedAt: string;
    readonly filters: EventFilters;
    readonly integrity: VerificationResult;
    readonly totalEvents: number;
    readonly eventTypeSummary: Partial<Record<AuditEventType, number>>;
    readonly classificationSummary: Partial<Record<DataClassification, number>>;
    readonly events: readonly CommittedAuditEvent[];
    readonly reportHash: string;
}

export const CSV_COLUMNS = [
    'sequence',
    'event_id',
    'timestamp',
    'event_type',
    'tenant_id',
    'correlation_id',
    'span_id',
    'user_id',
    'user_role',
    'user_department',
    'resource_type',
    'resource_id',
    'data_classification',
    'compliance_flags',
    'previous_hash',
    'current_hash'
] as const;

function csvField(value: string): string {
    return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function countBy<K extends string>(events: readonly CommittedAuditEvent[], key: (e: CommittedAuditEvent) => K): Partial<Record<K, number>> {
    const counts: Partial<Record<K, number>> = {};
    for (const event of events) {
        const k = key(event);
        counts[k] = (counts[k] ?? 0) + 1;
    }
    return counts;
}

export class ComplianceReportService {
    constructor(
        private readonly store: PrimaryStore,
        private readonly verifier: ChainVerifier,
        private readonly clock: () => Date = () => new Date(),
        private readonly newId: () => string = () => `report_${Date.now().toString(36)}_${crypto.randomBytes(4).toString('hex')}`
    ) { }

    async generate(tenantId: string, filters: EventFilters = {}): Promise<ComplianceReport> {
        const integrity = await this.verifier.verify(tenantId);
        const events = await this.collect(tenantId, filters);

        const body = {
            reportId: this.newId(),
            schemaVersion: REPORT_SCHEMA_VERSION,
            tenantId,
            generatedAt: this.clock().toISOString(),
            filters,
            integrity,
            totalEvents: events.length,
            eventTypeSummary: countBy(events, e => e.eventType),
            classificationSummary: countBy(events, e => e.classification),
            events
        };

        const reportHash = crypto.createHash('sha256').update(JSON.stringify(body)).digest('hex');

        logger.info({
            tenantId,
            reportId: body.reportId,
            totalEvents: events.length,
            integrityValid: integrity.valid
        }, 'Compliance report generated');

        return { ...body, reportHash };
    }

    async exportEvents(tenantId: string, filters: EventFilters = {}, format: ExportFormat = 'json'): Promise<string> {
        const events = await this.collect(tenantId, filters);

        if (format === 'json') {
            return JSON.stringify(events.map(toWireRecord), null, 2);
        }

        const rows = events.map(event => {
            const record = toWireRecord(event);
            return [
                String(event.sequence),
                record.event_id,
                record.timestamp,
                record.event_type,
                record.tenant_id,
                record.correlation_id,
                record.span_id,
                record.user_id,
                record.user_role,
                record.user_department,
                record.resource_type ?? '',
                record.resource_id ?? '',
                record.data_classification,
                record.compliance_flags.join(';'),
                record.previous_hash,
                record.current_hash
            ].map(csvField).join(',');
        });

        return [CSV_COLUMNS.join(','), ...rows].join('\n');
    }

    /**
     * Write <reportId>.json and <reportId>.json.sha256 to outputDir.
     */
    async writeReport(report: ComplianceReport, outputDir: string): Promise<string> {
        const filepath = path.join(outputDir, `${report.reportId}.json`);

        await fs.mkdir(outputDir, { recursive: true });
        await fs.writeFile(filepath, JSON.stringify(report, null, 2), 'utf-8');
        await fs.writeFile(`${filepath}.sha256`, report.reportHash, 'utf-8');

        logger.info({ filepath }, 'Compliance report written');
        return filepath;
    }

    private async collect(tenantId: string, filters: EventFilters): Promise<CommittedAuditEvent[]> {
        const events: CommittedAuditEvent[] = [];
        let afterSequence: number | undefined;

        for (;;) {
            const page = await this.store.listEvents(tenantId, filters, {
                limit: MAX_PAGE_SIZE,
                ...(afterSequence !== undefined && { afterSequence })
            });
            events.push(...page.events);
            if (page.nextCursor === null) break;
            afterSequence = page.nextCursor;
        }

        return events;
    }
}
