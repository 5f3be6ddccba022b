import { Router } from 'express';
import type { HealthController } from '../controllers/health.controller';

export default function healthRoutes(controller: HealthController): Router {
    const router = Router();

    // Overall health check
    router.get('/', controller.getHealth);

    return router;
}
