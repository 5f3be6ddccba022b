import cron, { ScheduledTask } from 'node-cron';
import type { SyncManager } from '../services/sync-manager.service';
import logger from '../utils/logger';

/**
 * Cron expression firing exactly every `seconds`. Cron steps restart at each
 * minute and hour, so only divisors of 60 seconds or of 60 minutes fire evenly.
 */
export function toCronExpression(seconds: number): string {
    if (Number.isInteger(seconds) && seconds > 0) {
        if (seconds < 60 && 60 % seconds === 0) {
            return `*/${seconds} * * * * *`;
        }
        const minutes = seconds / 60;
        if (minutes === 60) {
            return '0 0 * * * *';
        }
        if (Number.isInteger(minutes) && minutes < 60 && 60 % minutes === 0) {
            return `0 */${minutes} * * * *`;
        }
    }
    throw new Error(
        `SYNC_POLL_INTERVAL_SECONDS must divide a minute or an hour evenly (e.g. 15, 30, 60, 300, 3600), got ${seconds}`
    );
}

/**
 * Start queue sync cron job
 */
export function startQueueSyncJob(syncManager: SyncManager, intervalSeconds: number): ScheduledTask {
    const schedule = toCronExpression(intervalSeconds);

    const task = cron.schedule(schedule, () => {
        if (syncManager.isRunning()) {
            return;
        }
        syncManager.trigger('poll');
    });
    logger.info(`Queue sync job scheduled (every ${intervalSeconds} seconds)`, { schedule });
    return task;
}
