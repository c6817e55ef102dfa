/**
 * Unit Tests: S3 Object Lock archive
 *
 * The client's send is replaced per test; no request leaves the process.
 *
 * @see libs/archive/s3ArchivalStore.ts
 */

import { describe, it, mock } from 'node:test';
import assert from 'node:assert';
import { PutObjectCommand, S3Client, S3ServiceException } from '@aws-sdk/client-s3';
import { S3ArchivalStore } from '../../libs/archive/s3ArchivalStore.js';
import { archiveKey, retainUntil } from '../../libs/archive/archivalStore.js';
import { ArchivalError } from '../../libs/errors/errors.js';
import { GENESIS_HASH } from '../../libs/audit/schema.js';
import { sealEvent } from '../../libs/audit/hashChain.js';
import { buildChain, contextFor, sampleContent } from '../helpers/auditFixtures.js';

function testClient(): S3Client {
    return new S3Client({
        region: 'us-east-1',
        credentials: { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' }
    });
}

function recordingStore(outcome: () => Promise<object> = async () => ({})) {
    const client = testClient();
    const sent: PutObjectCommand[] = [];
    mock.method(client, 'send', async (command: PutObjectCommand) => {
        sent.push(command);
        return outcome();
    });
    const store = new S3ArchivalStore(client, 'audit-archive', { retentionDays: 10, lockMode: 'COMPLIANCE' });
    return { store, sent };
}

describe('archive layout', () => {
    it('keys objects by tenant and UTC date of the event', () => {
        const [event] = buildChain('tenant-a', 1);
        assert.ok(event);
        assert.strictEqual(archiveKey(event), `tenant-a/2026/03/01/${event.eventId}.json`);
    });

    it('escapes tenant ids that are not path safe', () => {
        const event = sealEvent(sampleContent('acme corp/eu', 1, { context: contextFor('acme corp/eu') }), GENESIS_HASH);
        assert.strictEqual(archiveKey(event).split('/')[0], 'acme%20corp%2Feu');
    });

    it('counts retention from the event timestamp', () => {
        const [event] = buildChain('tenant-a', 1);
        assert.ok(event);
        assert.strictEqual(retainUntil(event, 10).toISOString(), '2026-03-11T12:00:00.000Z');
    });
});

describe('S3ArchivalStore', () => {
    it('puts a conditional, retention-locked object', async () => {
        const { store, sent } = recordingStore();
        const [event] = buildChain('tenant-a', 1);
        assert.ok(event);

        const receipt = await store.archive(event);

        assert.deepStrictEqual(receipt, {
            status: 'archived',
            key: `tenant-a/2026/03/01/${event.eventId}.json`,
            retainUntil: '2026-03-11T12:00:00.000Z'
        });

        const input = sent[0]?.input;
        assert.ok(input);
        assert.strictEqual(input.Bucket, 'audit-archive');
        assert.strictEqual(input.Key, receipt.key);
        assert.strictEqual(input.IfNoneMatch, '*');
        assert.strictEqual(input.ObjectLockMode, 'COMPLIANCE');
        assert.strictEqual(input.ChecksumAlgorithm, 'SHA256');
        assert.strictEqual(input.ContentType, 'application/json');
        assert.deepStrictEqual(input.ObjectLockRetainUntilDate, new Date('2026-03-11T12:00:00.000Z'));
        assert.deepStrictEqual(input.Metadata, {
            'tenant-id': 'tenant-a',
            'event-id': event.eventId,
            'current-hash': event.currentHash
        });
        assert.strictEqual(typeof input.Body, 'string');
        assert.strictEqual(JSON.parse(String(input.Body)).current_hash, event.currentHash);
    });

    it('treats a failed precondition as an already archived object', async () => {
        const { store } = recordingStore(async () => {
            throw new S3ServiceException({
                name: 'PreconditionFailed',
                $fault: 'client',
                $metadata: { httpStatusCode: 412 },
                message: 'At least one of the pre-conditions you specified did not hold'
            });
        });
        const [event] = buildChain('tenant-a', 1);
        assert.ok(event);

        const receipt = await store.archive(event);
        assert.strictEqual(receipt.status, 'duplicate');
        assert.strictEqual(receipt.retainUntil, '2026-03-11T12:00:00.000Z');
    });

    it('raises ArchivalError for any other failure', async () => {
        const { store } = recordingStore(async () => {
            throw new Error('socket hang up');
        });
        const [event] = buildChain('tenant-a', 1);
        assert.ok(event);

        await assert.rejects(store.archive(event), (error: unknown) => {
            assert.ok(error instanceof ArchivalError);
            assert.strictEqual(error.message, `Archive write failed for ${archiveKey(event)}: socket hang up`);
            assert.strictEqual(error.retryable, true);
            return true;
        });
    });

    it('builds from archive configuration', async () => {
        const client = testClient();
        const sent: PutObjectCommand[] = [];
        mock.method(client, 'send', async (command: PutObjectCommand) => {
            sent.push(command);
            return {};
        });
        const store = S3ArchivalStore.fromConfig({
            enabled: true,
            bucket: 'worm-bucket',
            region: 'eu-west-1',
            retentionDays: 30,
            lockMode: 'GOVERNANCE'
        }, client);
        const [event] = buildChain('tenant-a', 1);
        assert.ok(event);

        const receipt = await store.archive(event);
        assert.strictEqual(receipt.retainUntil, '2026-03-31T12:00:00.000Z');
        assert.strictEqual(sent[0]?.input.Bucket, 'worm-bucket');
        assert.strictEqual(sent[0]?.input.ObjectLockMode, 'GOVERNANCE');
    });
});
