import type { S3Client } from '@aws-sdk/client-s3';
import type pg from 'pg';
import type { AuditConfig } from '../config/auditConfig.js';
import type { ArchivalStore } from '../archive/archivalStore.js';
import { S3ArchivalStore } from '../archive/s3ArchivalStore.js';
import { createDatabase, createPool } from '../db/index.js';
import type { AuditDatabase } from '../db/index.js';
import { ComplianceReportService } from '../export/ComplianceReportService.js';
import { FanoutDispatcher } from '../fanout/FanoutDispatcher.js';
import type { FanoutTarget } from '../fanout/FanoutDispatcher.js';
import { logger } from '../logging/logger.js';
import { createSiemSink } from '../siem/index.js';
import type { HttpFetch, SiemSink } from '../siem/index.js';
import { MemoryAuditStore } from '../store/memoryStore.js';
import { PostgresAuditStore } from '../store/postgresStore.js';
import type { EventFilters, EventPage, Pagination, PrimaryStore } from '../store/primaryStore.js';
import { EventFiltersSchema, PaginationSchema } from '../validation/schema.js';
import { validate } from '../validation/zod-middleware.js';
import { enforceAuditImmutability } from './immutability.js';
import { AuditLogger } from './logger.js';
import type { AuditEvent, SubmitRequest } from './schema.js';
import { ChainVerifier } from './verifier.js';
import type { VerificationResult, VerifyRange } from './verifier.js';

export interface AuditTrailOverrides {
    store?: PrimaryStore;
    pool?: pg.Pool;
    archive?: ArchivalStore;
    s3Client?: S3Client;
    siem?: SiemSink;
    fetchImpl?: HttpFetch;
    clock?: () => Date;
}

export interface AuditTrail {
    readonly config: AuditConfig;
    readonly store: PrimaryStore;
    readonly logger: AuditLogger;
    readonly verifier: ChainVerifier;
    readonly reports: ComplianceReportService;
    readonly dispatcher: FanoutDispatcher;
    /** Present when the trail owns a PostgreSQL pool */
    readonly database?: AuditDatabase;

    submit(request: SubmitRequest): Promise<AuditEvent>;
    listEvents(tenantId: string, filters?: EventFilters, pagination?: Pagination): Promise<EventPage>;
    verify(tenantId: string, range?: VerifyRange): Promise<VerificationResult>;
    /** Drain fan-out, then release the database pool */
    close(): Promise<void>;
}

function archiveTarget(archive: ArchivalStore): FanoutTarget {
    return { name: 'archive', send: event => archive.archive(event) };
}

function siemTarget(sink: SiemSink): FanoutTarget {
    return { name: `siem:${sink.platform}`, send: event => sink.deliver(event) };
}

/**
 * Wire store, fan-out targets, logger, verifier and reports from config.
 * Overrides replace the component built from config.
 */
export function createAuditTrail(config: AuditConfig, overrides: AuditTrailOverrides = {}): AuditTrail {
    enforceAuditImmutability(config);

    let database: AuditDatabase | undefined;
    let store = overrides.store;
    if (!store) {
        if (config.storage === 'memory') {
            store = new MemoryAuditStore();
        } else {
            database = createDatabase(overrides.pool ?? createPool(config.database));
            store = new PostgresAuditStore(database);
        }
    }

    const targets: FanoutTarget[] = [];
    if (overrides.archive) {
        targets.push(archiveTarget(overrides.archive));
    } else if (config.archive.enabled) {
        targets.push(archiveTarget(S3ArchivalStore.fromConfig(config.archive, overrides.s3Client)));
    }
    if (overrides.siem) {
        targets.push(siemTarget(overrides.siem));
    } else if (config.siem.enabled) {
        targets.push(siemTarget(createSiemSink(config.siem, overrides.fetchImpl)));
    }

    const dispatcher = new FanoutDispatcher(targets, config.fanout);
    const auditLogger = new AuditLogger({
        store,
        dispatcher,
        maxRetries: config.chainMaxRetries,
        ...(overrides.clock !== undefined && { clock: overrides.clock })
    });
    const verifier = new ChainVerifier(store);
    const reports = new ComplianceReportService(store, verifier);
    const primary = store;

    logger.info({
        storage: overrides.store ? 'custom' : config.storage,
        fanoutTargets: dispatcher.targetNames
    }, 'Audit trail assembled');

    return {
        config,
        store: primary,
        logger: auditLogger,
        verifier,
        reports,
        dispatcher,
        ...(database !== undefined && { database }),

        submit: request => auditLogger.submit(request),

        listEvents: (tenantId, filters = {}, pagination = {}) => primary.listEvents(
            tenantId,
            validate(EventFiltersSchema, filters, 'AuditTrail.listEvents.filters'),
            validate(PaginationSchema, pagination, 'AuditTrail.listEvents.pagination')
        ),

        verify: (tenantId, range) => verifier.verify(tenantId, range),

        close: async () => {
            await dispatcher.stop();
            await database?.close();
        }
    };
}
