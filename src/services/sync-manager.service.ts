import logger from '../utils/logger';
import { NetworkError, ServiceFault, StorageError, errorMessage } from '../utils/errors';
import type { QueueService } from './queue.service';
import type { PunchRecord, RemotePunchGateway, SyncSummary } from '../types/punch';

export interface SyncManagerOptions {
    batchSize: number;
}

export interface SyncTrigger {
    trigger(reason: string): void;
}

type RecordOutcome = 'synced' | 'rejected' | 'retry' | 'offline' | 'storage';

/**
 * Drains the offline queue into the attendance service.
 *
 * Punches go out one at a time, oldest first. A punch waiting on backoff holds
 * back every later punch of the same employee, since the remote weekly-hours
 * tally is computed in arrival order.
 */
export class SyncManager implements SyncTrigger {
    private running: Promise<SyncSummary> | null = null;
    private rerunRequested = false;
    private lastSummary: SyncSummary | null = null;

    constructor(
        private readonly queue: QueueService,
        private readonly gateway: RemotePunchGateway,
        private readonly options: SyncManagerOptions,
        private readonly clock: () => Date = () => new Date()
    ) {}

    /**
     * Run one drain. A call made while a drain is in progress joins it and
     * schedules one more pass after it.
     */
    async sync(): Promise<SyncSummary> {
        if (this.running) {
            this.rerunRequested = true;
            return this.running;
        }

        this.running = this.drainUntilSettled();
        try {
            return await this.running;
        } finally {
            this.running = null;
        }
    }

    trigger(reason: string): void {
        logger.info('Queue sync requested', { reason });
        this.sync().catch((error: unknown) => {
            logger.error('Queue sync failed', { reason, error: errorMessage(error) });
        });
    }

    notifyConnectivityRestored(): void {
        this.trigger('connectivity-restored');
    }

    getLastSummary(): SyncSummary | null {
        return this.lastSummary;
    }

    isRunning(): boolean {
        return this.running !== null;
    }

    /**
     * Resolve once any in-flight drain has finished.
     */
    async idle(): Promise<void> {
        while (this.running) {
            await this.running.catch((error: unknown) => {
                logger.error('Queue sync failed during shutdown', { error: errorMessage(error) });
            });
        }
    }

    private async drainUntilSettled(): Promise<SyncSummary> {
        let summary = await this.drain();
        while (this.rerunRequested) {
            this.rerunRequested = false;
            summary = await this.drain();
        }
        return summary;
    }

    private async drain(): Promise<SyncSummary> {
        const startedAt = this.clock().toISOString();
        const summary: SyncSummary = {
            total: 0,
            synced: 0,
            failed: 0,
            rejected: 0,
            skipped: 0,
            stoppedEarly: false,
            startedAt,
            finishedAt: startedAt,
        };

        // batch limit counts attempts, so punches in backoff never crowd out due ones
        const records = await this.queue.peekOldestUnsynced(Number.POSITIVE_INFINITY);
        if (records.length === 0) {
            return this.finish(summary);
        }

        logger.info(`[SYNC] Processing ${records.length} queued punches...`);

        // employees whose earlier punch is still outstanding in this pass
        const blocked = new Set<string>();
        let attempted = 0;

        for (const record of records) {
            if (blocked.has(record.rawEmployeeId)) {
                summary.total++;
                summary.skipped++;
                continue;
            }
            if (record.nextRetryAt && Date.parse(record.nextRetryAt) > this.clock().getTime()) {
                blocked.add(record.rawEmployeeId);
                summary.total++;
                summary.skipped++;
                continue;
            }
            if (attempted >= this.options.batchSize) {
                break;
            }

            attempted++;
            summary.total++;
            const outcome = await this.syncRecord(record);
            if (outcome === 'synced') {
                summary.synced++;
            } else if (outcome === 'rejected') {
                summary.rejected++;
            } else if (outcome === 'retry') {
                summary.failed++;
                blocked.add(record.rawEmployeeId);
            } else {
                if (outcome === 'offline') summary.failed++;
                summary.stoppedEarly = true;
                break;
            }
        }

        logger.info('[SYNC] Queue sync completed', summary);
        return this.finish(summary);
    }

    private async syncRecord(record: PunchRecord): Promise<RecordOutcome> {
        try {
            let current = await this.queue.markSyncing(record.id);
            const punchTimestamp = new Date(current.punchTimestamp);

            if (!current.submittedAt) {
                await this.gateway.submitPunch(current.rawEmployeeId, punchTimestamp, current.departmentOverride);
                current = await this.queue.markSubmitted(current.id, this.clock());
            }

            if (current.photo?.state === 'pending') {
                const photoBytes = await this.queue.readPhoto(current);
                if (photoBytes) {
                    await this.gateway.uploadPhoto(current.imageEmployeeId, photoBytes, punchTimestamp);
                    await this.queue.markPhotoUploaded(current.id);
                } else {
                    await this.queue.markPhotoUnavailable(current.id);
                }
            }

            await this.queue.markSynced(current.id);
            return 'synced';
        } catch (error: unknown) {
            return this.handleFailure(record, error);
        }
    }

    private async handleFailure(record: PunchRecord, error: unknown): Promise<RecordOutcome> {
        try {
            if (error instanceof ServiceFault) {
                await this.queue.markRejected(record.id, error.message);
                logger.warn('[SYNC] Queued punch rejected by attendance service', {
                    id: record.id,
                    employeeId: record.rawEmployeeId,
                    error: error.message,
                });
                return 'rejected';
            }

            // unclassified errors are retried like timeouts
            if (!(error instanceof StorageError)) {
                const updated = await this.queue.markFailed(record.id, errorMessage(error), this.clock());
                logger.warn('[SYNC] Queued punch failed, will retry', {
                    id: record.id,
                    syncAttempts: updated.syncAttempts,
                    nextRetryAt: updated.nextRetryAt,
                    error: errorMessage(error),
                });
                return error instanceof NetworkError ? 'offline' : 'retry';
            }
        } catch (storageError: unknown) {
            logger.error('[SYNC] Could not record sync failure', {
                id: record.id,
                error: errorMessage(storageError),
                cause: errorMessage(error),
            });
            return 'storage';
        }

        logger.error('[SYNC] Queue sync stopped', { id: record.id, error: errorMessage(error) });
        return 'storage';
    }

    private finish(summary: SyncSummary): SyncSummary {
        summary.finishedAt = this.clock().toISOString();
        this.lastSummary = summary;
        return summary;
    }
}
