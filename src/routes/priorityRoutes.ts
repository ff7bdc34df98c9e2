// src/routes/priorityRoutes.ts

import { Router, Request, Response } from 'express';
import { SchedulingService } from '../services/schedulingService';
import { asyncRoute, ConfirmationBody, parseBody } from './requestSchemas';

export function createPriorityRoutes(service: SchedulingService): Router {
    const router = Router();

    /**
     * Reset every staff counter to 0
     * POST /reset-priority
     * Body: { confirmation: "CONFIRM" }
     */
    router.post('/reset-priority', asyncRoute(async (req: Request, res: Response) => {
        const { confirmation } = parseBody(ConfirmationBody, req.body);
        await service.resetPriorities(confirmation);

        res.json({ message: 'All staff priorities reset' });
    }));

    return router;
}
