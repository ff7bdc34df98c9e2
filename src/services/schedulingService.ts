// src/services/schedulingService.ts

import { ConfirmationMismatchError, MissingParameterError } from '../errors';
import { scheduleMonth } from '../engine/assignmentScheduler';
import { parseMonthLabel } from '../engine/monthLabel';
import { DEFAULT_LAYOUT } from '../engine/slotLayout';
import { MonthlySchedule, ScheduleRow } from '../models/Schedule';
import { SlotLayout } from '../models/Slot';
import { StaffInput, StaffSaveOutcome, StaffSummary } from '../models/StaffMember';
import { ScheduleStore } from '../store/scheduleStore';
import { createLogger, Logger } from '../utils/logger';
import { RunSerializer } from './runSerializer';

export const CONFIRMATION_TOKEN = 'CONFIRM';

// Names callers know these fields by
const STAFF_FIELD_NAMES = {
    staffId: 'staff_id',
    staffName: 'staff_name',
    department: 'department'
} as const;

export interface MonthDeletion {
    month: string;
    deleted: number;   // Schedule rows removed
}

export interface SchedulingServiceOptions {
    layout?: SlotLayout;
    logger?: Logger;
    serializer?: RunSerializer;
}

/**
 * Reject a destructive call unless it carries the exact confirmation token
 */
function requireConfirmation(confirmation: unknown, operation: string): void {
    if (confirmation === undefined || confirmation === null || confirmation === '') {
        throw new MissingParameterError(['confirmation']);
    }
    if (confirmation !== CONFIRMATION_TOKEN) {
        throw new ConfirmationMismatchError(operation);
    }
}

/**
 * Scheduling service - runs the scheduler against a store
 *
 * Every mutating operation goes through one RunSerializer, so a run always
 * owns its staff snapshot from fetch to write-back. Validation happens
 * before anything is queued or read.
 * Store failures propagate unchanged; nothing is retried or rolled back.
 */
export class SchedulingService {
    private store: ScheduleStore;
    private layout: SlotLayout;
    private logger: Logger;
    private serializer: RunSerializer;

    constructor(store: ScheduleStore, options: SchedulingServiceOptions = {}) {
        this.store = store;
        this.layout = options.layout ?? DEFAULT_LAYOUT;
        this.logger = options.logger ?? createLogger('scheduler');
        this.serializer = options.serializer ?? new RunSerializer();
    }

    /**
     * Generate and persist one month's duty plan
     *
     * Steps:
     * 1. Fetch eligible staff (fresh snapshot)
     * 2. Run the progressive-priority scheduler
     * 3. Persist one schedule row per assignment, in layout order
     * 4. Persist every run member's counter in one batch
     */
    async generateMonthlySchedule(month: unknown): Promise<MonthlySchedule> {
        const { label } = parseMonthLabel(month);

        return this.serializer.run(async () => {
            const staff = await this.store.fetchEligibleStaff();
            const schedule = scheduleMonth(label, staff, this.layout);

            for (const assignment of schedule.assignments) {
                await this.store.persistAssignment({
                    staffId: assignment.staffId,
                    month: schedule.monthDate,
                    weekday: assignment.weekday,
                    gate: assignment.gate
                });
            }

            await this.store.persistStaffCounters(schedule.updatedStaff);

            this.logger.info(
                `${schedule.month}: ${schedule.assignments.length} assigned from ${staff.length} eligible staff, ` +
                `${schedule.unfilledSlots} unfilled`
            );
            if (schedule.shortageDays.length > 0) {
                this.logger.warn(`${schedule.month}: shortage on ${schedule.shortageDays.join(', ')}`);
            }

            return schedule;
        });
    }

    /**
     * Set every staff counter back to 0. Irreversible.
     */
    async resetPriorities(confirmation: unknown): Promise<void> {
        requireConfirmation(confirmation, 'reset-priority');

        await this.serializer.run(() => this.store.resetAllPriorities());
        this.logger.info('all staff priorities reset');
    }

    /**
     * Remove a month's schedule rows. Counters are left as they are.
     */
    async deleteMonth(month: unknown, confirmation: unknown): Promise<MonthDeletion> {
        requireConfirmation(confirmation, 'delete-month');
        const { label, monthDate } = parseMonthLabel(month);

        const deleted = await this.serializer.run(() => this.store.deleteScheduleForMonth(monthDate));
        this.logger.info(`${label}: deleted ${deleted} schedule rows`);

        return { month: label, deleted };
    }

    async viewMonth(month: unknown): Promise<ScheduleRow[]> {
        const { monthDate } = parseMonthLabel(month);
        return this.store.fetchScheduleForMonth(monthDate);
    }

    async listStaff(): Promise<StaffSummary[]> {
        return this.store.fetchAllStaffSummaries();
    }

    async saveStaff(input: StaffInput): Promise<StaffSaveOutcome> {
        const missing = (['staffId', 'staffName', 'department'] as const)
            .filter(field => input[field].trim() === '');
        if (missing.length > 0) {
            throw new MissingParameterError(missing.map(field => STAFF_FIELD_NAMES[field]));
        }

        const outcome = await this.serializer.run(() => this.store.upsertStaff(input));
        this.logger.debug(`staff ${input.staffId} ${outcome}`);
        return outcome;
    }
}
