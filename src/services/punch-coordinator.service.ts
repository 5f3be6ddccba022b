import { randomUUID } from 'crypto';
import logger from '../utils/logger';
import { ServiceFault, ValidationError, errorMessage, isTransientError } from '../utils/errors';
import { normalizeEmployeeId, validateEmployeeId } from '../utils/identifier';
import { transition } from '../utils/punch-state';
import type { QueueService } from './queue.service';
import type { SyncTrigger } from './sync-manager.service';
import type {
    Camera,
    PunchOutcome,
    PunchRecord,
    PunchResult,
    PunchResultListener,
    RemotePunchGateway,
} from '../types/punch';

export interface RecordPunchOptions {
    departmentOverride?: number;
    /** Photo supplied by the kiosk itself; skips the camera when set */
    photo?: Buffer | null;
}

export interface CoordinatorOptions {
    /** How long a "not authorized" answer is replayed without calling the service again */
    rejectionCacheSeconds: number;
}

// PunchException code for an unknown or unauthorized employee
const NOT_AUTHORIZED = 2;

const STORAGE_FAILURE_MESSAGE = 'Punch could not be saved. Please notify a supervisor.';

/**
 * Takes one punch from scan to either the attendance service or the offline queue.
 */
export class PunchCoordinator {
    private readonly listeners: PunchResultListener[] = [];
    private readonly recentRejections = new Map<string, { expiresAt: number; outcome: PunchOutcome }>();

    constructor(
        private readonly queue: QueueService,
        private readonly gateway: RemotePunchGateway,
        private readonly camera: Camera,
        private readonly syncTrigger: SyncTrigger,
        private readonly options: CoordinatorOptions = { rejectionCacheSeconds: 5 },
        private readonly clock: () => Date = () => new Date()
    ) {}

    onPunchResult(listener: PunchResultListener): void {
        this.listeners.push(listener);
    }

    async recordPunch(rawInput: string, options: RecordPunchOptions = {}): Promise<PunchOutcome> {
        let rawEmployeeId: string;
        try {
            rawEmployeeId = validateEmployeeId(rawInput);
        } catch (error: unknown) {
            if (!(error instanceof ValidationError)) throw error;
            logger.info('Punch input rejected', { error: error.message });
            return this.deliver({ status: 'invalid', message: error.message, punchId: null, punchTimestamp: null });
        }

        const cached = this.recentRejection(rawEmployeeId);
        if (cached) {
            logger.warn('Throttling repeated punch after rejection', { employeeId: rawEmployeeId });
            // nothing was recorded for this scan
            return this.deliver({ ...cached, punchId: null, punchTimestamp: null });
        }

        const punchTimestamp = this.clock();
        let record: PunchRecord = {
            id: randomUUID(),
            rawEmployeeId,
            imageEmployeeId: normalizeEmployeeId(rawEmployeeId),
            punchTimestamp: punchTimestamp.toISOString(),
            departmentOverride: options.departmentOverride,
            photo: null,
            status: 'Received',
            submittedAt: null,
            syncAttempts: 0,
            lastError: null,
            nextRetryAt: null,
            createdAt: punchTimestamp.toISOString(),
        };

        const photo = options.photo !== undefined ? options.photo : await this.capturePhoto(record, punchTimestamp);

        if (await this.hasEarlierPunches(rawEmployeeId)) {
            logger.info('Earlier punches still queued for employee, queueing behind them', {
                id: record.id,
                employeeId: rawEmployeeId,
            });
            const outcome = await this.queueOffline(record, photo, 'queued behind earlier punches');
            this.syncTrigger.trigger('punch queued behind earlier punches');
            return outcome;
        }

        record = transition(record, 'Submitting');
        let result: PunchResult;
        try {
            result = await this.gateway.submitPunch(rawEmployeeId, punchTimestamp, options.departmentOverride);
        } catch (error: unknown) {
            if (error instanceof ServiceFault) {
                return this.reject(transition(record, 'Rejected'), error);
            }
            if (!isTransientError(error)) {
                logger.error('Unexpected punch submission failure, queueing punch', {
                    id: record.id,
                    error: errorMessage(error),
                });
            }
            return this.queueOffline(record, photo, errorMessage(error));
        }

        record = { ...record, submittedAt: this.clock().toISOString() };
        const employeeName = `${result.firstName} ${result.lastName}`.trim();
        const outcome: PunchOutcome = {
            status: 'online',
            message: 'Punch recorded successfully',
            punchId: record.id,
            punchTimestamp: record.punchTimestamp,
            employeeName,
            punchType: result.punchType,
            weeklyHours: result.weeklyHours,
        };

        if (photo) {
            await this.uploadPhoto(record, photo, punchTimestamp);
        } else {
            record = transition(record, 'Synced');
            logger.info('Punch synced', { id: record.id, employeeId: rawEmployeeId });
        }

        return this.deliver(outcome);
    }

    private async uploadPhoto(record: PunchRecord, photo: Buffer, punchTimestamp: Date): Promise<void> {
        let refusal: ServiceFault | null = null;
        try {
            await this.gateway.uploadPhoto(record.imageEmployeeId, photo, punchTimestamp);
            const synced = transition(record, 'Synced');
            logger.info('Punch synced', { id: synced.id, employeeId: synced.rawEmployeeId });
            return;
        } catch (error: unknown) {
            if (error instanceof ServiceFault) {
                refusal = error;
                logger.error('Photo rejected by attendance service, keeping punch for inspection', {
                    id: record.id,
                    imageEmployeeId: record.imageEmployeeId,
                    error: error.message,
                });
            } else {
                logger.warn('Photo upload failed, queueing photo for retry', { id: record.id, error: errorMessage(error) });
            }
        }

        // swipe already accepted: only the photo is retried or kept
        const queued = transition(record, 'OfflineQueued');
        try {
            await this.queue.enqueue(queued, photo);
            if (refusal) {
                await this.queue.markRejected(queued.id, refusal.message);
            }
        } catch (error: unknown) {
            logger.error('Failed to queue photo of accepted punch', {
                alert: true,
                id: record.id,
                imageEmployeeId: record.imageEmployeeId,
                punchTimestamp: record.punchTimestamp,
                error: errorMessage(error),
            });
        }
    }

    private async queueOffline(record: PunchRecord, photo: Buffer | null, reason: string): Promise<PunchOutcome> {
        const queued = transition(record, 'OfflineQueued');
        try {
            await this.queue.enqueue(queued, photo);
        } catch (error: unknown) {
            logger.error('PUNCH NOT STORED: offline queue write failed', {
                alert: true,
                record: queued,
                reason,
                error: errorMessage(error),
            });
            return this.deliver({
                status: 'error',
                message: STORAGE_FAILURE_MESSAGE,
                punchId: queued.id,
                punchTimestamp: queued.punchTimestamp,
            });
        }

        logger.warn('Punch stored offline', { id: queued.id, employeeId: queued.rawEmployeeId, reason });
        return this.deliver({
            status: 'offline',
            message: 'Punch stored offline',
            punchId: queued.id,
            punchTimestamp: queued.punchTimestamp,
        });
    }

    private reject(record: PunchRecord, fault: ServiceFault): PunchOutcome {
        logger.info('Punch rejected', {
            id: record.id,
            employeeId: record.rawEmployeeId,
            exceptionCode: fault.exceptionCode,
            error: fault.message,
        });

        const outcome: PunchOutcome = {
            status: 'rejected',
            message: fault.message,
            punchId: record.id,
            punchTimestamp: record.punchTimestamp,
            exceptionCode: fault.exceptionCode,
        };
        if (fault.exceptionCode === NOT_AUTHORIZED) {
            this.recentRejections.set(record.rawEmployeeId, {
                expiresAt: this.clock().getTime() + this.options.rejectionCacheSeconds * 1000,
                outcome,
            });
        }
        return this.deliver(outcome);
    }

    /**
     * Cached not-authorized answer for this employee, dropping expired entries.
     */
    private recentRejection(rawEmployeeId: string): PunchOutcome | null {
        const now = this.clock().getTime();
        for (const [employeeId, entry] of this.recentRejections) {
            if (entry.expiresAt <= now) {
                this.recentRejections.delete(employeeId);
            }
        }
        return this.recentRejections.get(rawEmployeeId)?.outcome ?? null;
    }

    private async capturePhoto(record: PunchRecord, punchTimestamp: Date): Promise<Buffer | null> {
        try {
            return await this.camera.capturePhoto(record.imageEmployeeId, punchTimestamp);
        } catch (error: unknown) {
            logger.warn('Photo capture failed, continuing without photo', {
                id: record.id,
                error: errorMessage(error),
            });
            return null;
        }
    }

    private async hasEarlierPunches(rawEmployeeId: string): Promise<boolean> {
        try {
            return await this.queue.hasPendingFor(rawEmployeeId);
        } catch (error: unknown) {
            logger.error('Could not read offline queue before punch', { employeeId: rawEmployeeId, error: errorMessage(error) });
            return false;
        }
    }

    private deliver(outcome: PunchOutcome): PunchOutcome {
        for (const listener of this.listeners) {
            try {
                listener(outcome.status, outcome.message, outcome.weeklyHours);
            } catch (error: unknown) {
                logger.error('Punch result listener failed', { error: errorMessage(error) });
            }
        }
        return outcome;
    }
}
