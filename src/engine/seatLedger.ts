// src/engine/seatLedger.ts

import { Course } from '../models/Course';
import { SeatBucket, SeatState, UNRESERVED } from '../models/SeatState';
import { ReservationCategory, mapCategories } from '../models/Student';
import { calculateCourseQuota } from './quotaCalculator';

/**
 * Fresh seat state for a course, built from its quota configuration
 *
 * @throws ConfigurationError when the course quota is malformed
 */
export function createSeatState(course: Course): SeatState {
    const quota = calculateCourseQuota(course);

    return {
        courseId: course.id,
        quota,
        remaining: mapCategories(c => quota.byCategory[c]),
        unreservedRemaining: quota.unreserved
    };
}

/**
 * Take one seat for a student of the given category
 *
 * Tries the category's own bucket first, then the unreserved pool.
 * Seats are never handed back within a run.
 *
 * @returns The bucket the seat came from, or null if the course is full for this category
 */
export function claimSeat(state: SeatState, category: ReservationCategory): SeatBucket | null {
    if (state.remaining[category] > 0) {
        state.remaining[category]--;
        return category;
    }

    if (state.unreservedRemaining > 0) {
        state.unreservedRemaining--;
        return UNRESERVED;
    }

    return null;
}

/**
 * Seats still open to a student of the given category
 */
export function availableFor(state: SeatState, category: ReservationCategory): number {
    return state.remaining[category] + state.unreservedRemaining;
}

/**
 * Total seats still open in the course, across all buckets
 */
export function totalRemaining(state: SeatState): number {
    return Object.values(state.remaining).reduce((sum, n) => sum + n, 0) + state.unreservedRemaining;
}
