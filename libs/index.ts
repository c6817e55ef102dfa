export * from './audit/schema.js';
export { canonicalize, canonicalizePayload, compareCodePoints } from './audit/canonical.js';
export { computeHash, sealEvent, verifyHash, isDigest, HASH_ALGORITHM } from './audit/hashChain.js';
export { draftContent, normalizeFlags, toWireRecord } from './audit/event.js';
export type { AuditWireRecord, EventDraft } from './audit/event.js';
export { AuditLogger, toReceipt, DEFAULT_CHAIN_MAX_RETRIES } from './audit/logger.js';
export type { AuditLoggerOptions } from './audit/logger.js';
export { ChainVerifier } from './audit/verifier.js';
export type { BreakReason, ChainBreak, VerificationResult, VerifyRange } from './audit/verifier.js';
export { enforceAuditImmutability } from './audit/immutability.js';
export { createAuditTrail } from './audit/trail.js';
export type { AuditTrail, AuditTrailOverrides } from './audit/trail.js';

export * from './correlation/context.js';
export { CorrelationScope } from './correlation/scope.js';

export * from './errors/errors.js';

export { loadAuditConfig } from './config/auditConfig.js';
export type { AuditConfig, ArchiveConfig, DatabaseConfig, FanoutConfig, SiemConfig } from './config/auditConfig.js';
export { bootstrap } from './bootstrap/startup.js';

export * from './store/primaryStore.js';
export { MemoryAuditStore } from './store/memoryStore.js';
export { PostgresAuditStore } from './store/postgresStore.js';

export * from './archive/archivalStore.js';
export { S3ArchivalStore, createS3Client } from './archive/s3ArchivalStore.js';
export { MemoryArchivalStore } from './archive/memoryArchivalStore.js';

export * from './siem/index.js';

export { FanoutDispatcher } from './fanout/FanoutDispatcher.js';
export type { FanoutTarget, DispatcherStats } from './fanout/FanoutDispatcher.js';

export { ComplianceReportService } from './export/ComplianceReportService.js';
export type { ComplianceReport, ExportFormat } from './export/ComplianceReportService.js';
