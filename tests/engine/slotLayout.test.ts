import { describe, expect, it } from 'vitest';
import { DEFAULT_LAYOUT, generateSlots, totalSlots } from '../../src/engine/slotLayout';

describe('slot layout', () => {
    it('has 36 slots by default', () => {
        expect(totalSlots(DEFAULT_LAYOUT)).toBe(36);
        expect(generateSlots(DEFAULT_LAYOUT)).toHaveLength(36);
    });

    it('orders slots by weekday, then gate, then seat', () => {
        const slots = generateSlots(DEFAULT_LAYOUT);

        expect(slots.slice(0, 7)).toEqual([
            { weekday: 'Monday', gate: 'Gate A', seat: 1 },
            { weekday: 'Monday', gate: 'Gate A', seat: 2 },
            { weekday: 'Monday', gate: 'Gate B', seat: 1 },
            { weekday: 'Monday', gate: 'Gate B', seat: 2 },
            { weekday: 'Monday', gate: 'Gate C', seat: 1 },
            { weekday: 'Monday', gate: 'Gate C', seat: 2 },
            { weekday: 'Tuesday', gate: 'Gate A', seat: 1 }
        ]);
        expect(slots[35]).toEqual({ weekday: 'Saturday', gate: 'Gate C', seat: 2 });
    });

    it('expands a custom layout', () => {
        const layout = { weekdays: ['Friday'] as const, gates: ['Gate B'] as const, seatsPerGate: 3 };

        expect(totalSlots(layout)).toBe(3);
        expect(generateSlots(layout).map(s => s.seat)).toEqual([1, 2, 3]);
    });
});
