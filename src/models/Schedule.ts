// src/models/Schedule.ts

import type { Gate, Slot, Weekday } from './Slot';
import type { StaffMember } from './StaffMember';

/**
 * A slot filled by one staff member
 */
export interface SlotAssignment extends Slot {
    staffId: string;
    staffName: string;
}

/**
 * Assignments for one weekday, in gate/seat order
 */
export interface DayPlan {
    weekday: Weekday;
    assignments: SlotAssignment[];
}

/**
 * Result of one scheduling run
 *
 * Invariant: assignments.length + unfilledSlots === total slots of the layout
 * Invariant: shortageDays has no duplicates and follows weekday order
 */
export interface MonthlySchedule {
    month: string;         // YYYY-MM as supplied
    monthDate: string;     // YYYY-MM-01 storage key
    assignments: SlotAssignment[];
    days: DayPlan[];       // Only weekdays with at least one assignment
    shortageDays: Weekday[];
    unfilledSlots: number;
    updatedStaff: StaffMember[];  // Snapshot with final counters, ready to persist
}

/**
 * Persisted schedule row, keyed by (month, weekday, gate)
 */
export interface ScheduleRow {
    staffId: string;
    month: string;         // YYYY-MM-01
    weekday: Weekday;
    gate: Gate;
}
