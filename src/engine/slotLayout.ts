// src/engine/slotLayout.ts

import { GATES, SEATS_PER_GATE, Slot, SlotLayout, WEEKDAYS } from '../models/Slot';

/**
 * Monday-Saturday x Gate A/B/C x 2 seats = 36 slots
 */
export const DEFAULT_LAYOUT: SlotLayout = {
    weekdays: WEEKDAYS,
    gates: GATES,
    seatsPerGate: SEATS_PER_GATE
};

export function totalSlots(layout: SlotLayout): number {
    return layout.weekdays.length * layout.gates.length * layout.seatsPerGate;
}

/**
 * Expand a layout into its ordered slots
 *
 * Pure function - order is weekday, then gate, then seat
 */
export function generateSlots(layout: SlotLayout): Slot[] {
    const slots: Slot[] = [];

    for (const weekday of layout.weekdays) {
        for (const gate of layout.gates) {
            for (let seat = 1; seat <= layout.seatsPerGate; seat++) {
                slots.push({ weekday, gate, seat });
            }
        }
    }

    return slots;
}
