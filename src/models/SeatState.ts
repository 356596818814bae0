// src/models/SeatState.ts

import { ReservationCategory } from './Student';

export const UNRESERVED = 'UNRESERVED';

/**
 * Bucket a seat is drawn from: the student's own category or the shared pool
 */
export type SeatBucket = ReservationCategory | typeof UNRESERVED;

/**
 * Seats per category for one course, as derived from its quota configuration
 *
 * Invariant: sum(byCategory) + unreserved === totalSeats
 */
export interface QuotaBreakdown {
    totalSeats: number;
    byCategory: Record<ReservationCategory, number>;
    unreserved: number;
}

/**
 * Seat state of one course during a single allocation run
 *
 * Rebuilt from the course quota at the start of every run and never persisted.
 * Counts only ever go down within a run.
 *
 * Invariant: 0 <= remaining[c] <= quota.byCategory[c]
 * Invariant: 0 <= unreservedRemaining <= quota.unreserved
 */
export interface SeatState {
    courseId: string;
    quota: QuotaBreakdown;
    remaining: Record<ReservationCategory, number>;
    unreservedRemaining: number;
}
