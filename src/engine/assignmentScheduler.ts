// src/engine/assignmentScheduler.ts

import { DayPlan, MonthlySchedule, SlotAssignment } from '../models/Schedule';
import { SlotLayout, Weekday } from '../models/Slot';
import { StaffMember } from '../models/StaffMember';
import { parseMonthLabel } from './monthLabel';
import { DEFAULT_LAYOUT, generateSlots, totalSlots } from './slotLayout';
import { StaffPriorityQueue } from './staffPriorityQueue';

/**
 * Highest priorityCount a member can reach through assignments in one run
 */
export const PRIORITY_CEILING = 3;

/**
 * Pick staff for up to `target` slots, one at a time
 *
 * Progressive consumption: each pick takes the member with the lowest counter
 * (earliest fetched on ties) and bumps that counter before the next pick, so
 * everyone gets one more duty before anyone gets two more.
 * Stops early once every remaining member has reached the ceiling.
 *
 * Mutates the counters of the members passed in.
 *
 * @param roster Members in fetch order
 * @returns Picked members in pick order (a member appears once per pick)
 */
export function pickAssignees(
    roster: readonly StaffMember[],
    target: number,
    ceiling: number = PRIORITY_CEILING
): StaffMember[] {
    const queue = new StaffPriorityQueue();
    roster.forEach((member, order) => queue.push(member, order));

    const picks: StaffMember[] = [];

    while (picks.length < target) {
        const next = queue.pop();
        if (!next || next.member.priorityCount >= ceiling) {
            break; // Everyone left is exhausted
        }

        picks.push(next.member);
        next.member.priorityCount += 1;
        queue.push(next.member, next.order);
    }

    return picks;
}

/**
 * Working copy of the run's staff, keyed by staffId in fetch order
 *
 * Busy staff are dropped; a repeated staffId keeps its first occurrence.
 */
function buildRoster(staff: readonly StaffMember[]): Map<string, StaffMember> {
    const roster = new Map<string, StaffMember>();

    for (const member of staff) {
        if (member.busy9to10 || roster.has(member.staffId)) {
            continue;
        }
        roster.set(member.staffId, { ...member });
    }

    return roster;
}

/**
 * Build one month's duty plan
 *
 * Picks are laid onto the slots in layout order (weekday, gate, seat).
 * When picks run out inside a weekday, that weekday and every later one is
 * reported as a shortage day; their empty slots are not filled from later days.
 *
 * Pure with respect to its inputs: the caller's staff objects are copied.
 * Throws MissingParameterError for a bad month label.
 */
export function scheduleMonth(
    month: string,
    eligibleStaff: readonly StaffMember[],
    layout: SlotLayout = DEFAULT_LAYOUT
): MonthlySchedule {
    const { label, monthDate } = parseMonthLabel(month);

    const roster = buildRoster(eligibleStaff);
    const slots = generateSlots(layout);
    const picks = pickAssignees([...roster.values()], totalSlots(layout));

    const assignments: SlotAssignment[] = [];
    const shortageDays = new Set<Weekday>();

    slots.forEach((slot, index) => {
        const member = picks[index];
        if (member === undefined) {
            shortageDays.add(slot.weekday);
            return;
        }
        assignments.push({ ...slot, staffId: member.staffId, staffName: member.staffName });
    });

    const days: DayPlan[] = [];
    for (const weekday of layout.weekdays) {
        const dayAssignments = assignments.filter(a => a.weekday === weekday);
        if (dayAssignments.length > 0) {
            days.push({ weekday, assignments: dayAssignments });
        }
    }

    const updatedStaff = [...roster.values()].map(member => ({
        ...member,
        priorityUpdatedMonth: monthDate
    }));

    return {
        month: label,
        monthDate,
        assignments,
        days,
        shortageDays: layout.weekdays.filter(day => shortageDays.has(day)),
        unfilledSlots: slots.length - assignments.length,
        updatedStaff
    };
}
