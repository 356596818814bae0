// src/models/Allocation.ts

import { ReservationCategory } from './Student';
import { SeatBucket } from './SeatState';

/**
 * Outcome of one student in one allocation run
 *
 * - ALLOCATED: seat granted in a preferred course
 * - WAITLISTED: preferences submitted, but none of them had a seat
 * - NOT_ALLOCATED: no preferences submitted
 */
export enum AllocationOutcome {
    ALLOCATED = 'ALLOCATED',
    WAITLISTED = 'WAITLISTED',
    NOT_ALLOCATED = 'NOT_ALLOCATED'
}

/**
 * Allocation record - created only by the allocation engine
 *
 * Records are frozen once a run produces them. A new run for the same batch
 * replaces the whole set.
 */
export interface Allocation {
    id: string;
    runId: string;
    batchId: string;
    studentId: string;
    category: ReservationCategory;
    outcome: AllocationOutcome;

    // Only set when ALLOCATED
    courseId: string | null;
    preferenceRank: number | null;
    seatBucket: SeatBucket | null;

    // Most-preferred course of a WAITLISTED student, for waitlist views
    waitlistCourseId: string | null;

    createdAt: Date;
}

export type OutcomeCounts = Record<AllocationOutcome, number>;
