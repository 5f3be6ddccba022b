import { Request, Response } from 'express';
import type { PunchGateway } from '../services/punch-gateway.service';
import type { QueueService } from '../services/queue.service';
import type { SyncManager } from '../services/sync-manager.service';
import logger from '../utils/logger';
import config from '../utils/config';
import { errorMessage } from '../utils/errors';

export interface HealthController {
    getHealth(req: Request, res: Response): Promise<void>;
}

export function createHealthController(gateway: PunchGateway, queue: QueueService, syncManager: SyncManager): HealthController {
    return {
        /**
         * Overall health check
         */
        async getHealth(req: Request, res: Response): Promise<void> {
            try {
                const attendanceService = gateway.getStatus();
                const queueStats = await queue.stats();

                res.json({
                    status: attendanceService.online === false || queueStats.rejected > 0 ? 'degraded' : 'healthy',
                    timestamp: new Date().toISOString(),
                    uptime: process.uptime(),
                    config: {
                        endpoint: config.punch.endpoint,
                        clientId: config.soap.clientId,
                    },
                    services: {
                        attendance: attendanceService,
                    },
                    queue: queueStats,
                    sync: syncManager.getLastSummary(),
                });
            } catch (error: unknown) {
                logger.error('Health check failed', { error: errorMessage(error) });
                res.status(500).json({
                    status: 'unhealthy',
                    error: errorMessage(error),
                });
            }
        },
    };
}
