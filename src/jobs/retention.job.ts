import cron, { ScheduledTask } from 'node-cron';
import type { QueueService } from '../services/queue.service';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';

/**
 * Purge queued punches older than the retention window
 */
async function purgeExpired(queue: QueueService, retentionDays: number): Promise<void> {
    try {
        const purged = await queue.purgeExpired(retentionDays);
        logger.info('[CRON] Retention sweep job completed', { purged, retentionDays });
    } catch (error: unknown) {
        logger.error('[CRON] Retention sweep job failed', { error: errorMessage(error) });
    }
}

/**
 * Start retention sweep cron job
 */
export function startRetentionJob(queue: QueueService, schedule: string, retentionDays: number): ScheduledTask {
    if (!cron.validate(schedule)) {
        throw new Error(`Invalid RETENTION_SCHEDULE cron expression: ${schedule}`);
    }

    const task = cron.schedule(schedule, () => purgeExpired(queue, retentionDays));
    logger.info(`Retention sweep job scheduled (${schedule}, ${retentionDays} days)`);
    return task;
}
