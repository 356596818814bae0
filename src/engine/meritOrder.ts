// src/engine/meritOrder.ts

import { Student } from '../models/Student';

/**
 * Comparator for allocation order
 *
 * Pure function - higher qualifying marks first, ties broken by student id
 * ascending so that re-runs on the same input process students identically.
 */
export function compareByMerit(a: Student, b: Student): number {
    if (a.qualifyingMarks !== b.qualifyingMarks) {
        return b.qualifyingMarks - a.qualifyingMarks;
    }

    if (a.id < b.id) {
        return -1;
    }
    return a.id > b.id ? 1 : 0;
}

/**
 * Students in the order the engine processes them. Does not mutate the input.
 */
export function sortByMerit(students: readonly Student[]): Student[] {
    return [...students].sort(compareByMerit);
}
