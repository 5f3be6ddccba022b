import { Router } from 'express';
import type { SyncController } from '../controllers/sync.controller';

export default function syncRoutes(controller: SyncController): Router {
    const router = Router();

    // Drain the queue now
    router.post('/run', controller.runSync);

    // Network monitor signal
    router.post('/connectivity-restored', controller.connectivityRestored);

    // Get sync status
    router.get('/status', controller.getSyncStatus);

    return router;
}
