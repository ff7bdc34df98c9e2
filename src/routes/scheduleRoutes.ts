// src/routes/scheduleRoutes.ts

import { Router, Request, Response } from 'express';
import { MonthlySchedule } from '../models/Schedule';
import { SchedulingService } from '../services/schedulingService';
import { asyncRoute, DeleteMonthBody, parseBody, ScheduleBody } from './requestSchemas';

interface ScheduledStaffView {
    staff_id: string;
    name: string;
    gate: string;
}

/**
 * Wire shape of a generated month: assignments grouped by weekday
 */
function toScheduleResponse(schedule: MonthlySchedule) {
    const scheduledDays: Record<string, ScheduledStaffView[]> = {};
    for (const day of schedule.days) {
        scheduledDays[day.weekday] = day.assignments.map(a => ({
            staff_id: a.staffId,
            name: a.staffName,
            gate: a.gate
        }));
    }

    return {
        month: schedule.month,
        scheduled_days: scheduledDays,
        shortage_days: schedule.shortageDays,
        unfilled_slots: schedule.unfilledSlots
    };
}

/**
 * Schedule routes - HTTP mapping only
 */
export function createScheduleRoutes(service: SchedulingService): Router {
    const router = Router();

    /**
     * Generate a month's schedule
     * POST /schedule
     * Body: { month: "YYYY-MM" }
     */
    router.post('/schedule', asyncRoute(async (req: Request, res: Response) => {
        const { month } = parseBody(ScheduleBody, req.body);
        const schedule = await service.generateMonthlySchedule(month);

        res.json(toScheduleResponse(schedule));
    }));

    /**
     * View a month's persisted rows
     * GET /schedule/:month
     */
    router.get('/schedule/:month', asyncRoute(async (req: Request, res: Response) => {
        const rows = await service.viewMonth(req.params.month);

        res.json(rows.map(row => ({
            staff_id: row.staffId,
            weekday: row.weekday,
            gate: row.gate
        })));
    }));

    /**
     * Delete a month's schedule
     * POST /delete-month
     * Body: { month, confirmation: "CONFIRM" }
     */
    router.post('/delete-month', asyncRoute(async (req: Request, res: Response) => {
        const { month, confirmation } = parseBody(DeleteMonthBody, req.body);
        const result = await service.deleteMonth(month, confirmation);

        res.json({ message: `${result.month} deleted`, deleted: result.deleted });
    }));

    return router;
}
