// src/store/memoryScheduleStore.ts

import { ScheduleRow } from '../models/Schedule';
import { StaffInput, StaffMember, StaffSaveOutcome, StaffSummary } from '../models/StaffMember';
import { ScheduleStore } from './scheduleStore';

function byStaffId(a: { staffId: string }, b: { staffId: string }): number {
    return a.staffId < b.staffId ? -1 : a.staffId > b.staffId ? 1 : 0;
}

/**
 * In-memory schedule store
 *
 * Backs the simulation and the tests. Reads hand out copies so callers
 * cannot alias stored records.
 */
export class MemoryScheduleStore implements ScheduleStore {
    private staffs: Map<string, StaffMember>;
    private rows: ScheduleRow[];
    private now: () => Date;

    /**
     * @param seed Initial staff records
     * @param now Clock used for updatedAt stamps
     */
    constructor(seed: StaffMember[] = [], now: () => Date = () => new Date()) {
        this.staffs = new Map(seed.map(member => [member.staffId, { ...member }]));
        this.rows = [];
        this.now = now;
    }

    async fetchEligibleStaff(): Promise<StaffMember[]> {
        return [...this.staffs.values()]
            .filter(member => !member.busy9to10)
            .sort((a, b) => a.priorityCount - b.priorityCount || byStaffId(a, b))
            .map(member => ({ ...member }));
    }

    async persistAssignment(row: ScheduleRow): Promise<void> {
        this.rows.push({ ...row });
    }

    async persistStaffCounters(staff: StaffMember[]): Promise<void> {
        const updatedAt = this.now().toISOString();

        for (const member of staff) {
            const stored = this.staffs.get(member.staffId);
            if (!stored) {
                continue; // Runs never create staff
            }
            stored.priorityCount = member.priorityCount;
            stored.priorityUpdatedMonth = member.priorityUpdatedMonth;
            stored.updatedAt = updatedAt;
        }
    }

    async resetAllPriorities(): Promise<void> {
        const updatedAt = this.now().toISOString();

        for (const member of this.staffs.values()) {
            member.priorityCount = 0;
            member.priorityUpdatedMonth = null;
            member.updatedAt = updatedAt;
        }
    }

    async deleteScheduleForMonth(monthDate: string): Promise<number> {
        const before = this.rows.length;
        this.rows = this.rows.filter(row => row.month !== monthDate);
        return before - this.rows.length;
    }

    async fetchScheduleForMonth(monthDate: string): Promise<ScheduleRow[]> {
        return this.rows.filter(row => row.month === monthDate).map(row => ({ ...row }));
    }

    async fetchAllStaffSummaries(): Promise<StaffSummary[]> {
        return [...this.staffs.values()]
            .sort(byStaffId)
            .map(({ staffId, staffName, priorityCount, priorityUpdatedMonth }) => ({
                staffId,
                staffName,
                priorityCount,
                priorityUpdatedMonth
            }));
    }

    async upsertStaff(input: StaffInput): Promise<StaffSaveOutcome> {
        const updatedAt = this.now().toISOString();
        const existing = this.staffs.get(input.staffId);

        if (existing) {
            existing.staffName = input.staffName;
            existing.department = input.department;
            existing.busy9to10 = input.busy9to10;
            existing.updatedAt = updatedAt;
            return 'updated';
        }

        this.staffs.set(input.staffId, {
            ...input,
            priorityCount: 0,
            priorityUpdatedMonth: null,
            updatedAt
        });
        return 'created';
    }
}
