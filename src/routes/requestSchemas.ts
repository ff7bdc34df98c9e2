// src/routes/requestSchemas.ts

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import { MissingParameterError } from '../errors';

const requiredText = z
    .string()
    .trim()
    .min(1);

export const StaffBody = z.object({
    staff_id: requiredText,
    staff_name: requiredText,
    department: requiredText,
    // Truthiness, not strict booleans: "yes", 1 and true all mean busy
    busy_9_10: z.unknown().transform(value => Boolean(value))
});

export const ScheduleBody = z.object({
    month: z.unknown()
});

export const ConfirmationBody = z.object({
    confirmation: z.unknown()
});

export const DeleteMonthBody = ConfirmationBody.extend({
    month: z.unknown()
});

/**
 * Parse a request body, turning every failing field into one MissingParameterError
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
    const result = schema.safeParse(body ?? {});
    if (result.success) {
        return result.data;
    }

    const fields = [...new Set(result.error.issues.map(issue => String(issue.path[0] ?? 'body')))];
    throw new MissingParameterError(fields);
}

/**
 * Forward rejections from async handlers to the error middleware
 */
export function asyncRoute(
    handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        handler(req, res).catch(next);
    };
}
