import { describe, expect, it } from 'vitest';
import { MemoryScheduleStore } from '../../src/store/memoryScheduleStore';
import { staffMember } from '../fixtures';

const clock = () => new Date('2026-03-04T05:06:07.000Z');

describe('MemoryScheduleStore', () => {
    it('fetches non-busy staff by counter, then id', async () => {
        const store = new MemoryScheduleStore([
            staffMember('C', 1),
            staffMember('B', 0, { busy9to10: true }),
            staffMember('A', 1),
            staffMember('D', 0)
        ]);

        const eligible = await store.fetchEligibleStaff();

        expect(eligible.map(m => m.staffId)).toEqual(['D', 'A', 'C']);
    });

    it('hands out copies', async () => {
        const store = new MemoryScheduleStore([staffMember('A')]);

        const [first] = await store.fetchEligibleStaff();
        first.priorityCount = 9;

        expect((await store.fetchEligibleStaff())[0].priorityCount).toBe(0);
    });

    it('writes counters for known staff only', async () => {
        const store = new MemoryScheduleStore([staffMember('A')], clock);

        await store.persistStaffCounters([
            staffMember('A', 2, { priorityUpdatedMonth: '2026-03-01' }),
            staffMember('GHOST', 1)
        ]);

        expect(await store.fetchAllStaffSummaries()).toEqual([
            { staffId: 'A', staffName: 'Staff A', priorityCount: 2, priorityUpdatedMonth: '2026-03-01' }
        ]);
        expect((await store.fetchEligibleStaff())[0].updatedAt).toBe('2026-03-04T05:06:07.000Z');
    });

    it('resets every counter, busy staff included', async () => {
        const store = new MemoryScheduleStore([
            staffMember('A', 3, { priorityUpdatedMonth: '2026-02-01' }),
            staffMember('B', 2, { busy9to10: true })
        ], clock);

        await store.resetAllPriorities();

        expect(await store.fetchAllStaffSummaries()).toEqual([
            { staffId: 'A', staffName: 'Staff A', priorityCount: 0, priorityUpdatedMonth: null },
            { staffId: 'B', staffName: 'Staff B', priorityCount: 0, priorityUpdatedMonth: null }
        ]);
    });

    it('deletes and fetches schedule rows by month', async () => {
        const store = new MemoryScheduleStore();
        await store.persistAssignment({ staffId: 'A', month: '2026-03-01', weekday: 'Monday', gate: 'Gate A' });
        await store.persistAssignment({ staffId: 'B', month: '2026-03-01', weekday: 'Monday', gate: 'Gate A' });
        await store.persistAssignment({ staffId: 'A', month: '2026-04-01', weekday: 'Friday', gate: 'Gate C' });

        expect(await store.deleteScheduleForMonth('2026-03-01')).toBe(2);
        expect(await store.deleteScheduleForMonth('2026-03-01')).toBe(0);
        expect(await store.fetchScheduleForMonth('2026-04-01')).toEqual([
            { staffId: 'A', month: '2026-04-01', weekday: 'Friday', gate: 'Gate C' }
        ]);
    });

    it('upserts staff without touching counters', async () => {
        const store = new MemoryScheduleStore([staffMember('A', 2)], clock);

        expect(await store.upsertStaff({ staffId: 'A', staffName: 'Ada', department: 'Maths', busy9to10: true }))
            .toBe('updated');
        expect(await store.upsertStaff({ staffId: 'B', staffName: 'Ben', department: 'Maths', busy9to10: false }))
            .toBe('created');

        expect(await store.fetchEligibleStaff()).toEqual([
            {
                staffId: 'B',
                staffName: 'Ben',
                department: 'Maths',
                busy9to10: false,
                priorityCount: 0,
                priorityUpdatedMonth: null,
                updatedAt: '2026-03-04T05:06:07.000Z'
            }
        ]);
        expect((await store.fetchAllStaffSummaries())[0]).toEqual({
            staffId: 'A', staffName: 'Ada', priorityCount: 2, priorityUpdatedMonth: null
        });
    });
});
