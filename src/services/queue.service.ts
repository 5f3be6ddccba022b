import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import logger from '../utils/logger';
import { StorageError, errorMessage } from '../utils/errors';
import { transition } from '../utils/punch-state';
import { punchRecordSchema } from '../utils/schemas';
import type { PunchRecord, QueueStats } from '../types/punch';

export interface QueueOptions {
    dir: string;
    maxRetryAttempts: number;
    backoffBaseSeconds: number;
    backoffCapSeconds: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

/**
 * Delay before the next attempt: base, doubling per attempt, capped.
 */
export function computeBackoffSeconds(attempts: number, baseSeconds: number, capSeconds: number): number {
    return Math.min(baseSeconds * 2 ** Math.max(attempts - 1, 0), capSeconds);
}

export function comparePunches(a: PunchRecord, b: PunchRecord): number {
    const byTime = Date.parse(a.punchTimestamp) - Date.parse(b.punchTimestamp);
    if (byTime !== 0) return byTime;
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Durable store of punches awaiting delivery.
 *
 * Layout: `records/<id>.json` and `photos/<id>.jpg` under the queue dir.
 * Every file is written to a temp name, fsynced and renamed; the record rename is
 * the commit point, so a crash leaves either a complete record or nothing but an
 * orphan photo that `recover()` removes. Mutations run one at a time.
 */
export class QueueService {
    private readonly recordsDir: string;
    private readonly photosDir: string;
    private lock: Promise<void> = Promise.resolve();

    constructor(private readonly options: QueueOptions) {
        this.recordsDir = path.join(options.dir, 'records');
        this.photosDir = path.join(options.dir, 'photos');
        this.ensureQueueDirs();
    }

    /**
     * Ensure queue directories exist
     */
    private ensureQueueDirs(): void {
        for (const dir of [this.recordsDir, this.photosDir]) {
            if (!fs.existsSync(dir)) {
                fs.mkdirSync(dir, { recursive: true });
                logger.info('Queue directory created', { dir });
            }
        }
    }

    /**
     * Persist a punch and its photo. Both are stored or neither is.
     */
    async enqueue(record: PunchRecord, photoBytes: Buffer | null): Promise<PunchRecord> {
        return this.exclusive(async () => {
            const existing = await this.readRecord(this.recordPath(record.id));
            if (existing) {
                logger.warn('Punch already queued, not writing it again', { id: record.id });
                return existing;
            }

            const stored: PunchRecord = {
                ...record,
                photo: photoBytes ? { ref: `${record.id}.jpg`, state: 'pending' } : null,
            };

            let photoPath: string | null = null;
            try {
                if (stored.photo && photoBytes) {
                    photoPath = path.join(this.photosDir, stored.photo.ref);
                    await this.writeDurable(photoPath, photoBytes);
                }
                await this.writeRecord(stored);
            } catch (error: unknown) {
                if (photoPath) {
                    await this.removeFile(photoPath);
                }
                throw new StorageError(`Failed to queue punch ${record.id}: ${errorMessage(error)}`, { cause: error });
            }

            logger.info('Punch added to queue', {
                id: stored.id,
                employeeId: stored.rawEmployeeId,
                punchTimestamp: stored.punchTimestamp,
                hasPhoto: stored.photo !== null,
            });
            return stored;
        });
    }

    /**
     * Oldest punches still awaiting delivery, by punch time then id. Read only.
     */
    async peekOldestUnsynced(maxCount: number): Promise<PunchRecord[]> {
        const records = await this.getAll();
        return records.filter((record) => record.status !== 'Rejected' && record.status !== 'Synced').slice(0, maxCount);
    }

    async get(id: string): Promise<PunchRecord | null> {
        return this.readRecord(this.recordPath(id));
    }

    /**
     * Get all queued records, oldest first
     */
    async getAll(): Promise<PunchRecord[]> {
        const files = await this.listFiles(this.recordsDir, '.json');
        const records: PunchRecord[] = [];

        for (const file of files) {
            const record = await this.readRecord(path.join(this.recordsDir, file));
            if (record) {
                records.push(record);
            }
        }

        return records.sort(comparePunches);
    }

    async hasPendingFor(rawEmployeeId: string): Promise<boolean> {
        const pending = await this.peekOldestUnsynced(Number.POSITIVE_INFINITY);
        return pending.some((record) => record.rawEmployeeId === rawEmployeeId);
    }

    async markSyncing(id: string): Promise<PunchRecord> {
        return this.update(id, (record) => transition(record, 'Syncing'));
    }

    async markSubmitted(id: string, at: Date = new Date()): Promise<PunchRecord> {
        return this.update(id, (record) => ({ ...record, submittedAt: at.toISOString() }));
    }

    async markPhotoUploaded(id: string): Promise<PunchRecord> {
        return this.update(id, (record) => (record.photo ? { ...record, photo: { ...record.photo, state: 'uploaded' } } : record));
    }

    async markPhotoUnavailable(id: string): Promise<PunchRecord> {
        return this.update(id, (record) => {
            if (!record.photo) return record;
            logger.warn('Photo blob missing, punch will sync without photo', { id, ref: record.photo.ref });
            return { ...record, photo: { ...record.photo, state: 'unavailable' } };
        });
    }

    /**
     * Remove a delivered punch and release its photo.
     */
    async markSynced(id: string): Promise<void> {
        await this.exclusive(async () => {
            const record = await this.requireRecord(id);
            if (record.photo?.state === 'pending') {
                throw new StorageError(`Punch ${id} still has a pending photo`);
            }
            transition(record, 'Synced');

            await this.deleteRecordFiles(record);
            logger.info('Punch synced and removed from queue', { id, employeeId: record.rawEmployeeId });
        });
    }

    /**
     * Record a transient failure and schedule the next attempt. At the attempt
     * limit the punch becomes Rejected and stays for manual inspection.
     */
    async markFailed(id: string, error: string, now: Date = new Date()): Promise<PunchRecord> {
        return this.update(id, (record) => {
            const syncAttempts = record.syncAttempts + 1;

            if (syncAttempts >= this.options.maxRetryAttempts) {
                logger.error('Punch rejected after reaching retry limit', {
                    id,
                    employeeId: record.rawEmployeeId,
                    syncAttempts,
                    error,
                });
                return { ...transition(record, 'Rejected'), syncAttempts, lastError: error, nextRetryAt: null };
            }

            const delaySeconds = computeBackoffSeconds(
                syncAttempts,
                this.options.backoffBaseSeconds,
                this.options.backoffCapSeconds
            );
            const nextRetryAt = new Date(now.getTime() + delaySeconds * 1000).toISOString();
            return { ...transition(record, 'OfflineQueued'), syncAttempts, lastError: error, nextRetryAt };
        });
    }

    async markRejected(id: string, reason: string): Promise<PunchRecord> {
        return this.update(id, (record) => ({
            ...transition(record, 'Rejected'),
            lastError: reason,
            nextRetryAt: null,
        }));
    }

    async readPhoto(record: PunchRecord): Promise<Buffer | null> {
        if (!record.photo) return null;
        try {
            return await fs.promises.readFile(path.join(this.photosDir, record.photo.ref));
        } catch (error: unknown) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return null;
            }
            throw new StorageError(`Failed to read photo for ${record.id}: ${errorMessage(error)}`, { cause: error });
        }
    }

    /**
     * Remove punches older than the retention window, whatever their status.
     */
    async purgeExpired(maxAgeDays: number, now: Date = new Date()): Promise<number> {
        return this.exclusive(async () => {
            const cutoff = now.getTime() - maxAgeDays * DAY_MS;
            const records = await this.getAll();
            let purged = 0;

            for (const record of records) {
                if (Date.parse(record.punchTimestamp) >= cutoff) continue;

                await this.deleteRecordFiles(record);
                purged++;
                logger.error('Purged unsynced punch past retention window (data loss)', {
                    id: record.id,
                    employeeId: record.rawEmployeeId,
                    punchTimestamp: record.punchTimestamp,
                    status: record.status,
                    lastError: record.lastError,
                });
            }

            if (purged > 0) {
                logger.warn('Retention sweep completed', { purged, maxAgeDays });
            }
            return purged;
        });
    }

    /**
     * Startup pass: drop partial writes and orphan photos, and return punches
     * that were mid-sync to the queue.
     */
    async recover(): Promise<{ requeued: number; orphansRemoved: number }> {
        return this.exclusive(async () => {
            let orphansRemoved = 0;

            for (const dir of [this.recordsDir, this.photosDir]) {
                for (const file of await this.listFiles(dir, '.tmp', true)) {
                    await this.removeFile(path.join(dir, file));
                    orphansRemoved++;
                }
            }

            const records = await this.getAll();
            const referenced = new Set(records.flatMap((record) => (record.photo ? [record.photo.ref] : [])));
            for (const file of await this.listFiles(this.photosDir, '.jpg')) {
                if (!referenced.has(file)) {
                    await this.removeFile(path.join(this.photosDir, file));
                    orphansRemoved++;
                }
            }

            let requeued = 0;
            for (const record of records) {
                if (record.status === 'Syncing') {
                    await this.writeRecord(transition(record, 'OfflineQueued'));
                    requeued++;
                }
            }

            logger.info('Queue recovered', { records: records.length, requeued, orphansRemoved });
            return { requeued, orphansRemoved };
        });
    }

    async stats(now: Date = new Date()): Promise<QueueStats> {
        const records = await this.getAll();
        const stats: QueueStats = {
            total: records.length,
            pending: 0,
            syncing: 0,
            rejected: 0,
            inBackoff: 0,
            oldestPunchTimestamp: null,
        };

        for (const record of records) {
            if (record.status === 'Rejected') {
                stats.rejected++;
                continue;
            }
            if (record.status === 'Syncing') {
                stats.syncing++;
            } else {
                stats.pending++;
            }
            if (record.nextRetryAt && Date.parse(record.nextRetryAt) > now.getTime()) {
                stats.inBackoff++;
            }
            stats.oldestPunchTimestamp ??= record.punchTimestamp;
        }

        return stats;
    }

    /**
     * Get queue size
     */
    async size(): Promise<number> {
        const files = await this.listFiles(this.recordsDir, '.json');
        return files.length;
    }

    private async update(id: string, mutate: (record: PunchRecord) => PunchRecord): Promise<PunchRecord> {
        return this.exclusive(async () => {
            const record = await this.requireRecord(id);
            const updated = mutate(record);
            await this.writeRecord(updated);
            return updated;
        });
    }

    private exclusive<T>(task: () => Promise<T>): Promise<T> {
        const run = this.lock.then(task);
        this.lock = run.then(
            () => undefined,
            () => undefined
        );
        return run;
    }

    private async requireRecord(id: string): Promise<PunchRecord> {
        const record = await this.readRecord(this.recordPath(id));
        if (!record) {
            throw new StorageError(`Punch ${id} is not in the queue`);
        }
        return record;
    }

    private async readRecord(filePath: string): Promise<PunchRecord | null> {
        let content: string;
        try {
            content = await fs.promises.readFile(filePath, 'utf-8');
        } catch (error: unknown) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return null;
            }
            throw new StorageError(`Failed to read ${filePath}: ${errorMessage(error)}`, { cause: error });
        }

        try {
            const parsed = punchRecordSchema.safeParse(JSON.parse(content));
            if (parsed.success) {
                return parsed.data;
            }
            logger.error('Invalid queue record skipped', { file: filePath, issues: parsed.error.issues });
        } catch (error: unknown) {
            logger.error('Failed to read queue item', { file: filePath, error: errorMessage(error) });
        }
        return null;
    }

    private async writeRecord(record: PunchRecord): Promise<void> {
        await this.writeDurable(this.recordPath(record.id), JSON.stringify(record, null, 2));
    }

    private async writeDurable(filePath: string, data: string | Buffer): Promise<void> {
        const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${randomUUID()}.tmp`);
        try {
            const handle = await fs.promises.open(tempPath, 'wx');
            try {
                await handle.writeFile(data);
                await handle.sync();
            } finally {
                await handle.close();
            }
            await fs.promises.rename(tempPath, filePath);
        } catch (error: unknown) {
            await this.removeFile(tempPath);
            throw error;
        }
    }

    private async deleteRecordFiles(record: PunchRecord): Promise<void> {
        // record first: a leftover photo is an orphan, a leftover record would resend
        await fs.promises.rm(this.recordPath(record.id), { force: true });
        if (record.photo) {
            await this.removeFile(path.join(this.photosDir, record.photo.ref));
        }
    }

    private async removeFile(filePath: string): Promise<void> {
        try {
            await fs.promises.rm(filePath, { force: true });
        } catch (error: unknown) {
            logger.error('Failed to remove queue file', { file: filePath, error: errorMessage(error) });
        }
    }

    private async listFiles(dir: string, extension: string, includeHidden = false): Promise<string[]> {
        try {
            const files = await fs.promises.readdir(dir);
            return files.filter((file) => file.endsWith(extension) && (includeHidden || !file.startsWith('.')));
        } catch (error: unknown) {
            throw new StorageError(`Queue directory ${dir} is unavailable: ${errorMessage(error)}`, { cause: error });
        }
    }

    private recordPath(id: string): string {
        return path.join(this.recordsDir, `${id}.json`);
    }
}
