import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { QueueService } from './queue.service';
import { SyncManager } from './sync-manager.service';
import { NetworkError, ServiceFault, TimeoutError } from '../utils/errors';
import { FakeGateway, makeRecord, makeTempDir, removeTempDir } from '../testing/fakes';

const T1 = '2024-01-01T08:00:00.000Z';
const T2 = '2024-01-01T12:00:00.000Z';
const T3 = '2024-01-01T16:00:00.000Z';

describe('SyncManager', () => {
    let dir: string;
    let queue: QueueService;
    let gateway: FakeGateway;
    let now: Date;
    let syncManager: SyncManager;

    beforeEach(() => {
        dir = makeTempDir();
        queue = new QueueService({ dir, maxRetryAttempts: 10, backoffBaseSeconds: 5, backoffCapSeconds: 300 });
        gateway = new FakeGateway();
        now = new Date('2024-01-01T17:00:00.000Z');
        syncManager = new SyncManager(queue, gateway, { batchSize: 50 }, () => now);
    });

    afterEach(() => {
        removeTempDir(dir);
    });

    const submittedTimestamps = () => gateway.submitCalls.map((call) => call.punchTimestamp);

    it('submits queued punches oldest first and removes them', async () => {
        await queue.enqueue(makeRecord({ punchTimestamp: T3 }), null);
        await queue.enqueue(makeRecord({ punchTimestamp: T1 }), null);
        await queue.enqueue(makeRecord({ punchTimestamp: T2 }), null);

        const summary = await syncManager.sync();

        expect(submittedTimestamps()).toEqual([T1, T2, T3]);
        expect(summary).toMatchObject({ total: 3, synced: 3, failed: 0, rejected: 0, skipped: 0, stoppedEarly: false });
        expect(await queue.size()).toBe(0);
        expect(syncManager.getLastSummary()).toEqual(summary);
    });

    it('retries a failed punch before any later punch of the same employee', async () => {
        await queue.enqueue(makeRecord({ punchTimestamp: T1 }), null);
        await queue.enqueue(makeRecord({ punchTimestamp: T2 }), null);
        await queue.enqueue(makeRecord({ punchTimestamp: T3 }), null);
        let timedOut = false;
        gateway.failSubmit = (call) => {
            if (call.punchTimestamp === T2 && !timedOut) {
                timedOut = true;
                return new TimeoutError('RecordSwipeSummary timed out after 10000ms');
            }
            return undefined;
        };

        const first = await syncManager.sync();
        expect(first).toMatchObject({ total: 3, synced: 1, failed: 1, skipped: 1, stoppedEarly: false });
        expect(submittedTimestamps()).toEqual([T1, T2]);

        // still backing off: T2 not due, T3 held behind it
        const waiting = await syncManager.sync();
        expect(waiting).toMatchObject({ synced: 0, skipped: 2 });
        expect(submittedTimestamps()).toEqual([T1, T2]);

        now = new Date(now.getTime() + 6000);
        const second = await syncManager.sync();
        expect(second).toMatchObject({ synced: 2, failed: 0 });
        expect(submittedTimestamps()).toEqual([T1, T2, T2, T3]);
        expect(await queue.size()).toBe(0);
    });

    it('stops the pass on a network error', async () => {
        await queue.enqueue(makeRecord({ punchTimestamp: T1, rawEmployeeId: '111' }), null);
        await queue.enqueue(makeRecord({ punchTimestamp: T2, rawEmployeeId: '222' }), null);
        gateway.submitFailures.push(new NetworkError('RecordSwipeSummary failed: ECONNREFUSED'));

        const summary = await syncManager.sync();

        expect(summary).toMatchObject({ total: 1, synced: 0, failed: 1, stoppedEarly: true });
        expect(gateway.submitCalls).toHaveLength(1);

        const failed = await queue.get(`punch-20240101080000000`);
        expect(failed).toMatchObject({
            status: 'OfflineQueued',
            syncAttempts: 1,
            lastError: 'RecordSwipeSummary failed: ECONNREFUSED',
            nextRetryAt: '2024-01-01T17:00:05.000Z',
        });
    });

    it('lets other employees through while one waits on backoff', async () => {
        await queue.enqueue(
            makeRecord({ punchTimestamp: T1, rawEmployeeId: '111', nextRetryAt: '2024-01-01T17:01:00.000Z' }),
            null
        );
        await queue.enqueue(makeRecord({ punchTimestamp: T2, rawEmployeeId: '111' }), null);
        await queue.enqueue(makeRecord({ punchTimestamp: T3, rawEmployeeId: '222' }), null);

        const summary = await syncManager.sync();

        expect(summary).toMatchObject({ synced: 1, skipped: 2 });
        expect(gateway.submitCalls).toEqual([{ rawEmployeeId: '222', punchTimestamp: T3, departmentOverride: undefined }]);
    });

    it('fills the batch with due punches past those waiting on backoff', async () => {
        const waitUntil = '2024-01-01T17:05:00.000Z';
        await queue.enqueue(makeRecord({ punchTimestamp: T1, rawEmployeeId: 'a1', nextRetryAt: waitUntil }), null);
        await queue.enqueue(makeRecord({ punchTimestamp: T2, rawEmployeeId: 'b2', nextRetryAt: waitUntil }), null);
        await queue.enqueue(makeRecord({ punchTimestamp: T3, rawEmployeeId: 'c3' }), null);
        const batched = new SyncManager(queue, gateway, { batchSize: 2 }, () => now);

        const summary = await batched.sync();

        expect(summary).toMatchObject({ total: 3, synced: 1, skipped: 2 });
        expect(gateway.submitCalls.map((call) => call.rawEmployeeId)).toEqual(['c3']);
    });

    it('sends at most one batch of punches per pass', async () => {
        await queue.enqueue(makeRecord({ punchTimestamp: T1, rawEmployeeId: 'a1' }), null);
        await queue.enqueue(makeRecord({ punchTimestamp: T2, rawEmployeeId: 'b2' }), null);
        await queue.enqueue(makeRecord({ punchTimestamp: T3, rawEmployeeId: 'c3' }), null);
        const batched = new SyncManager(queue, gateway, { batchSize: 2 }, () => now);

        const summary = await batched.sync();

        expect(summary).toMatchObject({ total: 2, synced: 2 });
        expect(submittedTimestamps()).toEqual([T1, T2]);
        expect(await queue.size()).toBe(1);
    });

    it('rejects a punch on a business fault without retrying it', async () => {
        await queue.enqueue(makeRecord({ punchTimestamp: T1 }), null);
        await queue.enqueue(makeRecord({ punchTimestamp: T2 }), null);
        gateway.submitFailures.push(new ServiceFault('Not Authorized. No punch recorded.', { exceptionCode: 2 }));

        const summary = await syncManager.sync();
        expect(summary).toMatchObject({ synced: 1, rejected: 1 });
        expect(await queue.get('punch-20240101080000000')).toMatchObject({
            status: 'Rejected',
            lastError: 'Not Authorized. No punch recorded.',
        });

        await syncManager.sync();
        expect(submittedTimestamps()).toEqual([T1, T2]);
    });

    it('uploads the photo after the swipe and only then removes the punch', async () => {
        const record = makeRecord({ rawEmployeeId: 'TE00700', imageEmployeeId: '00700', punchTimestamp: T1 });
        await queue.enqueue(record, Buffer.from('jpeg-bytes'));

        await syncManager.sync();

        expect(gateway.submitCalls).toEqual([{ rawEmployeeId: 'TE00700', punchTimestamp: T1, departmentOverride: undefined }]);
        expect(gateway.uploadCalls).toEqual([{ imageEmployeeId: '00700', photo: 'jpeg-bytes', punchTimestamp: T1 }]);
        expect(await queue.size()).toBe(0);
        expect(fs.readdirSync(path.join(dir, 'photos'))).toEqual([]);
    });

    it('does not resend an accepted swipe when only the photo failed', async () => {
        await queue.enqueue(makeRecord({ punchTimestamp: T1 }), Buffer.from('jpeg-bytes'));
        gateway.uploadFailures.push(new TimeoutError('SaveImage timed out after 10000ms'));

        const first = await syncManager.sync();
        expect(first).toMatchObject({ synced: 0, failed: 1 });
        expect((await queue.get('punch-20240101080000000'))?.submittedAt).toBe(now.toISOString());

        now = new Date(now.getTime() + 6000);
        const second = await syncManager.sync();

        expect(second).toMatchObject({ synced: 1 });
        expect(gateway.submitCalls).toHaveLength(1);
        expect(gateway.uploadCalls).toHaveLength(2);
    });

    it('syncs a punch whose photo blob is gone as having no photo available', async () => {
        const record = makeRecord({ punchTimestamp: T1 });
        await queue.enqueue(record, Buffer.from('jpeg-bytes'));
        fs.rmSync(path.join(dir, 'photos', `${record.id}.jpg`));

        const summary = await syncManager.sync();

        expect(summary).toMatchObject({ synced: 1 });
        expect(gateway.uploadCalls).toEqual([]);
    });

    it('sends a punch queued before a crash exactly once after restart', async () => {
        await queue.enqueue(makeRecord({ punchTimestamp: T1 }), null);

        const restartedQueue = new QueueService({ dir, maxRetryAttempts: 10, backoffBaseSeconds: 5, backoffCapSeconds: 300 });
        await restartedQueue.recover();
        const restarted = new SyncManager(restartedQueue, gateway, { batchSize: 50 }, () => now);

        expect(await restartedQueue.size()).toBe(1);
        await restarted.sync();
        await restarted.sync();

        expect(submittedTimestamps()).toEqual([T1]);
        expect(await restartedQueue.size()).toBe(0);
    });

    it('coalesces overlapping triggers into one drain', async () => {
        await queue.enqueue(makeRecord({ punchTimestamp: T1 }), null);
        await queue.enqueue(makeRecord({ punchTimestamp: T2 }), null);

        const [first, second] = await Promise.all([syncManager.sync(), syncManager.sync()]);

        expect(submittedTimestamps()).toEqual([T1, T2]);
        expect(second).toBe(first);
        expect(syncManager.isRunning()).toBe(false);
    });
});
