// src/models/Slot.ts

/**
 * Duty weekdays in schedule order (no Sunday duty)
 */
export const WEEKDAYS = [
    'Monday',
    'Tuesday',
    'Wednesday',
    'Thursday',
    'Friday',
    'Saturday'
] as const;

export type Weekday = typeof WEEKDAYS[number];

/**
 * Gates in schedule order
 */
export const GATES = ['Gate A', 'Gate B', 'Gate C'] as const;

export type Gate = typeof GATES[number];

export const SEATS_PER_GATE = 2;

/**
 * Slot layout - the fixed shape of one month's duty roster
 *
 * Not persisted. Slots are ordered weekday, then gate, then seat.
 * Total slots = weekdays x gates x seatsPerGate
 */
export interface SlotLayout {
    weekdays: readonly Weekday[];
    gates: readonly Gate[];
    seatsPerGate: number;
}

/**
 * Slot model - one fillable (weekday, gate, seat) position
 *
 * Seat numbers start at 1.
 */
export interface Slot {
    weekday: Weekday;
    gate: Gate;
    seat: number;
}
