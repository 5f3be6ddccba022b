import express, { Request, Response, NextFunction } from 'express';
import config from './utils/config';
import logger from './utils/logger';
import { errorMessage } from './utils/errors';
import { PunchGateway } from './services/punch-gateway.service';
import { QueueService } from './services/queue.service';
import { SyncManager } from './services/sync-manager.service';
import { PunchCoordinator } from './services/punch-coordinator.service';
import { createCamera } from './services/camera.service';
import { createPunchController } from './controllers/punch.controller';
import { createSyncController } from './controllers/sync.controller';
import { createHealthController } from './controllers/health.controller';
import punchRoutes from './routes/punch.routes';
import syncRoutes from './routes/sync.routes';
import healthRoutes from './routes/health.routes';
import { startQueueSyncJob } from './jobs/queue-sync.job';
import { startRetentionJob } from './jobs/retention.job';

async function main(): Promise<void> {
    // Services
    const gateway = new PunchGateway(config.punch, config.soap);
    const queue = new QueueService({
        dir: config.storage.queueDir,
        maxRetryAttempts: config.punch.maxRetryAttempts,
        backoffBaseSeconds: config.punch.backoffBaseSeconds,
        backoffCapSeconds: config.punch.backoffCapSeconds,
    });
    const syncManager = new SyncManager(queue, gateway, { batchSize: config.sync.batchSize });
    const coordinator = new PunchCoordinator(queue, gateway, createCamera(config.camera), syncManager);

    gateway.onConnectivityRestored(() => syncManager.notifyConnectivityRestored());
    coordinator.onPunchResult((status, message, weeklyHours) => {
        logger.info('Punch result delivered', { status, message, weeklyHours });
    });

    await queue.recover();

    const app = express();

    // Middleware
    app.use(express.json({ limit: '5mb' }));
    app.use(express.urlencoded({ extended: true }));

    // Request logging
    app.use((req: Request, res: Response, next: NextFunction) => {
        logger.info(`${req.method} ${req.path}`, {
            ip: req.ip,
            userAgent: req.get('user-agent'),
        });
        next();
    });

    // Routes
    app.use('/health', healthRoutes(createHealthController(gateway, queue, syncManager)));
    app.use('/punch', punchRoutes(createPunchController(coordinator, queue)));
    app.use('/sync', syncRoutes(createSyncController(syncManager)));

    // Root endpoint
    app.get('/', (req: Request, res: Response) => {
        res.json({
            name: 'Punch Bridge',
            version: '1.0.0',
            status: 'running',
            endpoints: {
                health: '/health',
                punch: '/punch',
                sync: '/sync',
            },
        });
    });

    // Error handling middleware
    app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
        logger.error('Unhandled error', {
            error: err.message,
            stack: err.stack,
            path: req.path,
        });

        res.status(500).json({
            success: false,
            error: 'Internal server error',
            message: config.nodeEnv === 'development' ? err.message : undefined,
        });
    });

    // 404 handler
    app.use((req: Request, res: Response) => {
        res.status(404).json({
            success: false,
            error: 'Not found',
        });
    });

    // Start server
    const PORT = config.port;

    const server = app.listen(PORT, '127.0.0.1', () => {
        logger.info(`Punch Bridge started on port ${PORT}`, {
            nodeEnv: config.nodeEnv,
            endpoint: config.punch.endpoint,
            queueDir: config.storage.queueDir,
        });
    });

    // Start cron jobs
    const jobs = [
        startQueueSyncJob(syncManager, config.sync.pollIntervalSeconds),
        startRetentionJob(queue, config.storage.retentionSchedule, config.punch.retentionDays),
    ];
    logger.info('All cron jobs started');

    // first drain picks up whatever was queued before the last shutdown
    syncManager.trigger('startup');

    // Graceful shutdown
    const shutdown = (signal: string) => {
        logger.info(`${signal} received, shutting down gracefully...`);
        for (const job of jobs) {
            job.stop();
        }
        server.close();
        // queued records stay on disk; an in-flight record resumes at next start
        syncManager
            .idle()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error('Shutdown failed', { error: errorMessage(error) });
                process.exit(1);
            });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
}

// Unhandled rejection handler
process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection', { reason: errorMessage(reason) });
});

main().catch((error: unknown) => {
    logger.error('Punch Bridge failed to start', { error: errorMessage(error) });
    process.exit(1);
});
