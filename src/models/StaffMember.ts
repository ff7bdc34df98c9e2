// src/models/StaffMember.ts

/**
 * Staff member model - one person available for gate duty
 *
 * Data only, no methods. Counter updates handled by the scheduler,
 * persistence handled by the schedule store.
 *
 * Invariant: priorityCount >= 0
 * Invariant: busy9to10 staff never receive an assignment
 */
export interface StaffMember {
    staffId: string;
    staffName: string;
    department: string;
    busy9to10: boolean;       // Busy during the 9-10 duty window, excluded from runs

    // Fairness tracking
    priorityCount: number;    // Assignments since last reset (lower = more deserving)
    priorityUpdatedMonth: string | null;  // YYYY-MM-01 of the last run that wrote the counter
    updatedAt: string | null;
}

/**
 * Fields accepted when creating or updating a staff record.
 * Counters are never written through this path.
 */
export interface StaffInput {
    staffId: string;
    staffName: string;
    department: string;
    busy9to10: boolean;
}

/**
 * Read-only projection returned by the staff listing
 */
export interface StaffSummary {
    staffId: string;
    staffName: string;
    priorityCount: number;
    priorityUpdatedMonth: string | null;
}

export type StaffSaveOutcome = 'created' | 'updated';
