import { Request, Response } from 'express';
import type { SyncManager } from '../services/sync-manager.service';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';

export interface SyncController {
    runSync(req: Request, res: Response): Promise<void>;
    connectivityRestored(req: Request, res: Response): Promise<void>;
    getSyncStatus(req: Request, res: Response): Promise<void>;
}

export function createSyncController(syncManager: SyncManager): SyncController {
    return {
        /**
         * Drain the offline queue now and report the result
         */
        async runSync(req: Request, res: Response): Promise<void> {
            try {
                const summary = await syncManager.sync();
                res.json({
                    success: true,
                    message: `Synced ${summary.synced} out of ${summary.total} queued punches`,
                    summary,
                });
            } catch (error: unknown) {
                logger.error('Manual queue sync failed', { error: errorMessage(error) });
                res.status(500).json({
                    success: false,
                    error: errorMessage(error),
                });
            }
        },

        /**
         * Signal from the network monitor that the link is back
         */
        async connectivityRestored(req: Request, res: Response): Promise<void> {
            syncManager.notifyConnectivityRestored();
            res.status(202).json({ success: true });
        },

        /**
         * Get last sync status
         */
        async getSyncStatus(req: Request, res: Response): Promise<void> {
            res.json({
                success: true,
                running: syncManager.isRunning(),
                status: syncManager.getLastSummary(),
            });
        },
    };
}
