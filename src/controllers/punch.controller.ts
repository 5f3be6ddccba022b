import { Request, Response } from 'express';
import type { PunchCoordinator } from '../services/punch-coordinator.service';
import type { QueueService } from '../services/queue.service';
import type { PunchOutcomeStatus } from '../types/punch';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { punchRequestSchema } from '../utils/schemas';

const HTTP_STATUS: Record<PunchOutcomeStatus, number> = {
    online: 200,
    offline: 200,
    rejected: 422,
    invalid: 400,
    error: 500,
};

export interface PunchController {
    recordPunch(req: Request, res: Response): Promise<void>;
    getQueuedPunches(req: Request, res: Response): Promise<void>;
}

export function createPunchController(coordinator: PunchCoordinator, queue: QueueService): PunchController {
    return {
        /**
         * Record a punch from the kiosk
         */
        async recordPunch(req: Request, res: Response): Promise<void> {
            const parsed = punchRequestSchema.safeParse(req.body);
            if (!parsed.success) {
                res.status(400).json({
                    success: false,
                    error: 'Invalid punch request',
                    issues: parsed.error.issues,
                });
                return;
            }

            const { employeeId, departmentOverride, photo } = parsed.data;
            try {
                const outcome = await coordinator.recordPunch(employeeId, {
                    departmentOverride,
                    photo: photo === undefined ? undefined : Buffer.from(photo, 'base64'),
                });

                res.status(HTTP_STATUS[outcome.status]).json({
                    success: outcome.status === 'online' || outcome.status === 'offline',
                    offline: outcome.status === 'offline',
                    ...outcome,
                });
            } catch (error: unknown) {
                logger.error('Failed to record punch', { employeeId, error: errorMessage(error) });
                res.status(500).json({
                    success: false,
                    error: errorMessage(error),
                });
            }
        },

        /**
         * Get queued punches (admin status)
         */
        async getQueuedPunches(req: Request, res: Response): Promise<void> {
            try {
                const [items, stats] = await Promise.all([queue.getAll(), queue.stats()]);
                res.json({
                    success: true,
                    stats,
                    items,
                });
            } catch (error: unknown) {
                logger.error('Failed to get queued punches', { error: errorMessage(error) });
                res.status(500).json({
                    success: false,
                    error: errorMessage(error),
                });
            }
        },
    };
}
