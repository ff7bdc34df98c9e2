// src/store/scheduleStore.ts

import { ScheduleRow } from '../models/Schedule';
import { StaffInput, StaffMember, StaffSaveOutcome, StaffSummary } from '../models/StaffMember';

/**
 * Storage collaborator for the scheduler
 *
 * Implementations throw PersistenceError when the backing store fails.
 * None of these calls retry.
 */
export interface ScheduleStore {
    /**
     * Staff with busy9to10 = false, ordered by priorityCount then staffId.
     * This order is the tie-break order of a scheduling run.
     */
    fetchEligibleStaff(): Promise<StaffMember[]>;

    /** Record one schedule row */
    persistAssignment(row: ScheduleRow): Promise<void>;

    /** Write back priorityCount and priorityUpdatedMonth for every member, in one batch */
    persistStaffCounters(staff: StaffMember[]): Promise<void>;

    /** Set every counter to 0 and clear the month stamp */
    resetAllPriorities(): Promise<void>;

    /** @returns Number of rows removed */
    deleteScheduleForMonth(monthDate: string): Promise<number>;

    fetchScheduleForMonth(monthDate: string): Promise<ScheduleRow[]>;

    /** Every staff member, ordered by staffId */
    fetchAllStaffSummaries(): Promise<StaffSummary[]>;

    upsertStaff(input: StaffInput): Promise<StaffSaveOutcome>;
}
