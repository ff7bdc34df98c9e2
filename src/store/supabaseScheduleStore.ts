// src/store/supabaseScheduleStore.ts

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { PersistenceError } from '../errors';
import { ScheduleRow } from '../models/Schedule';
import { GATES, WEEKDAYS } from '../models/Slot';
import { StaffInput, StaffMember, StaffSaveOutcome, StaffSummary } from '../models/StaffMember';
import { ScheduleStore } from './scheduleStore';

const STAFF_TABLE = 'staffs';
const SCHEDULE_TABLE = 'monthly_schedule';

const StaffRow = z.object({
    staff_id: z.string(),
    staff_name: z.string(),
    department: z.string().nullable().default(''),
    busy_9_10: z.boolean().nullable().default(false),
    priority_count: z.number().int().nonnegative().nullable().default(0),
    priority_updated_month: z.string().nullable().default(null),
    updated_at: z.string().nullable().default(null)
});

const StaffSummaryRow = StaffRow.pick({
    staff_id: true,
    staff_name: true,
    priority_count: true,
    priority_updated_month: true
});

const ScheduleRowSchema = z.object({
    staff_id: z.string(),
    month: z.string(),
    weekday: z.enum(WEEKDAYS),
    gate: z.enum(GATES)
});

type StaffRecord = z.infer<typeof StaffRow>;

function toStaffMember(row: StaffRecord): StaffMember {
    return {
        staffId: row.staff_id,
        staffName: row.staff_name,
        department: row.department ?? '',
        busy9to10: row.busy_9_10 ?? false,
        priorityCount: row.priority_count ?? 0,
        priorityUpdatedMonth: row.priority_updated_month,
        updatedAt: row.updated_at
    };
}

/**
 * Create a Supabase client for server-side use (no session persistence)
 *
 * @param fetchImpl Replacement fetch, used by tests to stand in for the API
 */
export function createSupabaseStoreClient(
    url: string,
    key: string,
    fetchImpl?: typeof fetch
): SupabaseClient {
    return createClient(url, key, {
        auth: { persistSession: false, autoRefreshToken: false },
        ...(fetchImpl ? { global: { fetch: fetchImpl } } : {})
    });
}

/**
 * Schedule store backed by Supabase tables `staffs` and `monthly_schedule`
 *
 * Rows are validated on the way in; any API error or malformed row
 * becomes a PersistenceError.
 */
export class SupabaseScheduleStore implements ScheduleStore {
    private client: SupabaseClient;
    private now: () => Date;

    constructor(client: SupabaseClient, now: () => Date = () => new Date()) {
        this.client = client;
        this.now = now;
    }

    async fetchEligibleStaff(): Promise<StaffMember[]> {
        const { data, error } = await this.client
            .from(STAFF_TABLE)
            .select('*')
            .eq('busy_9_10', false)
            .order('priority_count', { ascending: true })
            .order('staff_id', { ascending: true });

        if (error) {
            throw new PersistenceError('fetchEligibleStaff', error.message);
        }

        return this.parse('fetchEligibleStaff', StaffRow.array(), data).map(toStaffMember);
    }

    async persistAssignment(row: ScheduleRow): Promise<void> {
        const { error } = await this.client.from(SCHEDULE_TABLE).insert({
            staff_id: row.staffId,
            month: row.month,
            weekday: row.weekday,
            gate: row.gate
        });

        if (error) {
            throw new PersistenceError('persistAssignment', error.message);
        }
    }

    /**
     * Only the counter columns are written, and only onto rows that still exist.
     * Members sharing a final counter go out in one PATCH (at most one per counter value).
     */
    async persistStaffCounters(staff: StaffMember[]): Promise<void> {
        const updatedAt = this.now().toISOString();
        const groups = new Map<string, { priorityCount: number; priorityUpdatedMonth: string | null; ids: string[] }>();

        for (const member of staff) {
            const key = `${member.priorityCount}|${member.priorityUpdatedMonth ?? ''}`;
            const group = groups.get(key);
            if (group) {
                group.ids.push(member.staffId);
            } else {
                groups.set(key, {
                    priorityCount: member.priorityCount,
                    priorityUpdatedMonth: member.priorityUpdatedMonth,
                    ids: [member.staffId]
                });
            }
        }

        for (const group of groups.values()) {
            const { error } = await this.client
                .from(STAFF_TABLE)
                .update({
                    priority_count: group.priorityCount,
                    priority_updated_month: group.priorityUpdatedMonth,
                    updated_at: updatedAt
                })
                .in('staff_id', group.ids);

            if (error) {
                throw new PersistenceError('persistStaffCounters', error.message);
            }
        }
    }

    async resetAllPriorities(): Promise<void> {
        const { error } = await this.client
            .from(STAFF_TABLE)
            .update({
                priority_count: 0,
                priority_updated_month: null,
                updated_at: this.now().toISOString()
            })
            .not('staff_id', 'is', null);

        if (error) {
            throw new PersistenceError('resetAllPriorities', error.message);
        }
    }

    async deleteScheduleForMonth(monthDate: string): Promise<number> {
        const { error, count } = await this.client
            .from(SCHEDULE_TABLE)
            .delete({ count: 'exact' })
            .eq('month', monthDate);

        if (error) {
            throw new PersistenceError('deleteScheduleForMonth', error.message);
        }

        return count ?? 0;
    }

    async fetchScheduleForMonth(monthDate: string): Promise<ScheduleRow[]> {
        const { data, error } = await this.client
            .from(SCHEDULE_TABLE)
            .select('staff_id, month, weekday, gate')
            .eq('month', monthDate);

        if (error) {
            throw new PersistenceError('fetchScheduleForMonth', error.message);
        }

        return this.parse('fetchScheduleForMonth', ScheduleRowSchema.array(), data).map(row => ({
            staffId: row.staff_id,
            month: row.month,
            weekday: row.weekday,
            gate: row.gate
        }));
    }

    async fetchAllStaffSummaries(): Promise<StaffSummary[]> {
        const { data, error } = await this.client
            .from(STAFF_TABLE)
            .select('staff_id, staff_name, priority_count, priority_updated_month')
            .order('staff_id', { ascending: true });

        if (error) {
            throw new PersistenceError('fetchAllStaffSummaries', error.message);
        }

        return this.parse('fetchAllStaffSummaries', StaffSummaryRow.array(), data).map(row => ({
            staffId: row.staff_id,
            staffName: row.staff_name,
            priorityCount: row.priority_count ?? 0,
            priorityUpdatedMonth: row.priority_updated_month
        }));
    }

    async upsertStaff(input: StaffInput): Promise<StaffSaveOutcome> {
        const existing = await this.client
            .from(STAFF_TABLE)
            .select('staff_id')
            .eq('staff_id', input.staffId);

        if (existing.error) {
            throw new PersistenceError('upsertStaff', existing.error.message);
        }

        const updatedAt = this.now().toISOString();

        if (Array.isArray(existing.data) && existing.data.length > 0) {
            const { error } = await this.client
                .from(STAFF_TABLE)
                .update({
                    staff_name: input.staffName,
                    department: input.department,
                    busy_9_10: input.busy9to10,
                    updated_at: updatedAt
                })
                .eq('staff_id', input.staffId);

            if (error) {
                throw new PersistenceError('upsertStaff', error.message);
            }
            return 'updated';
        }

        const { error } = await this.client.from(STAFF_TABLE).insert({
            staff_id: input.staffId,
            staff_name: input.staffName,
            department: input.department,
            busy_9_10: input.busy9to10,
            priority_count: 0,
            updated_at: updatedAt
        });

        if (error) {
            throw new PersistenceError('upsertStaff', error.message);
        }
        return 'created';
    }

    private parse<S extends z.ZodTypeAny>(operation: string, schema: S, data: unknown): z.infer<S> {
        const result = schema.safeParse(data ?? []);
        if (!result.success) {
            const issue = result.error.issues[0];
            throw new PersistenceError(operation, `unexpected row shape at ${issue.path.join('.')}: ${issue.message}`);
        }
        return result.data;
    }
}
