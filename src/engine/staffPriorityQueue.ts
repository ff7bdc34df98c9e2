// src/engine/staffPriorityQueue.ts

import { StaffMember } from '../models/StaffMember';

export interface QueueEntry {
    member: StaffMember;
    order: number;   // Position in the original fetch order, breaks ties
}

/**
 * Min-heap of staff keyed by (priorityCount, fetch order)
 *
 * The member with the lowest counter comes out first; among equal counters
 * the one fetched earliest wins. Counters are read at push time, so a member
 * whose counter changed must be popped and pushed again.
 *
 * Performance:
 * - push: O(log n)
 * - pop: O(log n)
 */
export class StaffPriorityQueue {
    private heap: QueueEntry[];

    constructor() {
        this.heap = [];
    }

    push(member: StaffMember, order: number): void {
        this.heap.push({ member, order });
        this.siftUp(this.heap.length - 1);
    }

    /**
     * Remove and return the most deserving member
     *
     * @returns Entry with its fetch order, or null if the queue is empty
     */
    pop(): QueueEntry | null {
        const top = this.heap[0];
        if (top === undefined) {
            return null;
        }

        const last = this.heap.pop();
        if (last !== undefined && this.heap.length > 0) {
            this.heap[0] = last;
            this.siftDown(0);
        }

        return top;
    }

    private precedes(a: QueueEntry, b: QueueEntry): boolean {
        if (a.member.priorityCount !== b.member.priorityCount) {
            return a.member.priorityCount < b.member.priorityCount;
        }
        return a.order < b.order;
    }

    private siftUp(index: number): void {
        let child = index;
        while (child > 0) {
            const parent = (child - 1) >> 1;
            if (!this.precedes(this.heap[child], this.heap[parent])) {
                break;
            }
            this.swap(child, parent);
            child = parent;
        }
    }

    private siftDown(index: number): void {
        let parent = index;
        const length = this.heap.length;

        while (true) {
            const left = parent * 2 + 1;
            const right = left + 1;
            let smallest = parent;

            if (left < length && this.precedes(this.heap[left], this.heap[smallest])) {
                smallest = left;
            }
            if (right < length && this.precedes(this.heap[right], this.heap[smallest])) {
                smallest = right;
            }
            if (smallest === parent) {
                break;
            }

            this.swap(parent, smallest);
            parent = smallest;
        }
    }

    private swap(i: number, j: number): void {
        const tmp = this.heap[i];
        this.heap[i] = this.heap[j];
        this.heap[j] = tmp;
    }
}
