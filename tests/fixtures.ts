import { StaffMember } from '../src/models/StaffMember';

export function staffMember(
    staffId: string,
    priorityCount = 0,
    overrides: Partial<StaffMember> = {}
): StaffMember {
    return {
        staffId,
        staffName: `Staff ${staffId}`,
        department: 'Science',
        busy9to10: false,
        priorityCount,
        priorityUpdatedMonth: null,
        updatedAt: null,
        ...overrides
    };
}

/**
 * Deterministic pseudo-random integers in [0, max); seed must be positive
 */
export function seededRandom(seed: number): (max: number) => number {
    let state = seed;
    return (max: number) => {
        state = (state * 48271) % 2147483647;
        return state % max;
    };
}
