// src/routes/staffRoutes.ts

import { Router, Request, Response } from 'express';
import { SchedulingService } from '../services/schedulingService';
import { asyncRoute, parseBody, StaffBody } from './requestSchemas';

/**
 * Staff routes - HTTP mapping only
 * Business logic delegated to the scheduling service
 */
export function createStaffRoutes(service: SchedulingService): Router {
    const router = Router();

    /**
     * Add or update a staff member
     * POST /staff
     * Body: { staff_id, staff_name, department, busy_9_10 }
     */
    router.post('/staff', asyncRoute(async (req: Request, res: Response) => {
        const body = parseBody(StaffBody, req.body);

        const outcome = await service.saveStaff({
            staffId: body.staff_id,
            staffName: body.staff_name,
            department: body.department,
            busy9to10: body.busy_9_10
        });

        if (outcome === 'created') {
            res.status(201).json({ message: 'Staff added' });
            return;
        }
        res.json({ message: 'Staff updated' });
    }));

    /**
     * List staff with their counters, ordered by staff_id
     * GET /staffs
     */
    router.get('/staffs', asyncRoute(async (_req: Request, res: Response) => {
        const staff = await service.listStaff();

        res.json(staff.map(member => ({
            staff_id: member.staffId,
            staff_name: member.staffName,
            priority_count: member.priorityCount,
            priority_updated_month: member.priorityUpdatedMonth
        })));
    }));

    return router;
}
