import { PutObjectCommand, S3Client, S3ServiceException } from '@aws-sdk/client-s3';
import type { AuditEvent } from '../audit/schema.js';
import type { ArchiveConfig } from '../config/auditConfig.js';
import { ArchivalError } from '../errors/errors.js';
import { getComponentLogger } from '../logging/logger.js';
import { archiveBody, archiveKey, retainUntil } from './archivalStore.js';
import type { ArchivalStore, ArchiveReceipt, RetentionPolicy } from './archivalStore.js';

const logger = getComponentLogger('S3ArchivalStore');

export function createS3Client(config: ArchiveConfig): S3Client {
    return new S3Client({
        region: config.region,
        ...(config.endpoint !== undefined ? { endpoint: config.endpoint, forcePathStyle: true } : {})
    });
}

function isPreconditionFailed(error: unknown): boolean {
    return error instanceof S3ServiceException
        && (error.$metadata.httpStatusCode === 412 || error.name === 'PreconditionFailed');
}

/**
 * S3 Object Lock archive. The bucket must have Object Lock enabled; every put
 * carries its own retain-until date and is conditional on the key being
 * absent, so an existing object is never overwritten.
 */
export class S3ArchivalStore implements ArchivalStore {
    constructor(
        private readonly client: S3Client,
        private readonly bucket: string,
        private readonly policy: RetentionPolicy
    ) { }

    static fromConfig(config: ArchiveConfig, client: S3Client = createS3Client(config)): S3ArchivalStore {
        return new S3ArchivalStore(client, config.bucket, {
            retentionDays: config.retentionDays,
            lockMode: config.lockMode
        });
    }

    async archive(event: AuditEvent): Promise<ArchiveReceipt> {
        const key = archiveKey(event);
        const until = retainUntil(event, this.policy.retentionDays);

        const command = new PutObjectCommand({
            Bucket: this.bucket,
            Key: key,
            Body: archiveBody(event),
            ContentType: 'application/json',
            IfNoneMatch: '*',
            ChecksumAlgorithm: 'SHA256',
            ObjectLockMode: this.policy.lockMode,
            ObjectLockRetainUntilDate: until,
            Metadata: {
                'tenant-id': event.context.tenantId,
                'event-id': event.eventId,
                'current-hash': event.currentHash
            }
        });

        try {
            await this.client.send(command);
        } catch (error) {
            if (isPreconditionFailed(error)) {
                logger.info({ key }, 'Archive object already present');
                return { status: 'duplicate', key, retainUntil: until.toISOString() };
            }
            const message = error instanceof Error ? error.message : String(error);
            logger.error({ key, error: message }, 'Archive write failed');
            throw new ArchivalError(`Archive write failed for ${key}: ${message}`, error);
        }

        logger.debug({ key, retainUntil: until.toISOString() }, 'Event archived');
        return { status: 'archived', key, retainUntil: until.toISOString() };
    }
}
