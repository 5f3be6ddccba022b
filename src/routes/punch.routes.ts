import { Router } from 'express';
import type { PunchController } from '../controllers/punch.controller';

export default function punchRoutes(controller: PunchController): Router {
    const router = Router();

    // Punch from the kiosk UI
    router.post('/', controller.recordPunch);

    // Queued punches and queue stats
    router.get('/queue', controller.getQueuedPunches);

    return router;
}
