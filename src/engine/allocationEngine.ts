// src/engine/allocationEngine.ts

import { Allocation, AllocationOutcome, OutcomeCounts } from '../models/Allocation';
import { Course } from '../models/Course';
import { ConfigurationError, NotFoundError } from '../models/errors';
import { Preference } from '../models/Preference';
import { SeatState } from '../models/SeatState';
import { Student } from '../models/Student';
import { Repositories } from '../store/repositories';
import { BatchLock } from './batchLock';
import { sortByMerit } from './meritOrder';
import { claimSeat, createSeatState } from './seatLedger';

/**
 * Result of one allocation run for a batch
 */
export interface AllocationRun {
    runId: string;
    batchId: string;
    allocations: Allocation[];
    counts: OutcomeCounts;
    seatStates: Map<string, SeatState>;
}

/**
 * Identity of the run that records are stamped with
 */
export interface RunContext {
    runId: string;
    batchId: string;
    createdAt: Date;
}

/**
 * Build seat state for every course in a batch's pool
 *
 * Every quota is checked before any state is handed out, so a bad course
 * aborts the run without touching anything.
 *
 * @throws ConfigurationError naming the batch and offending course
 */
export function initializeSeatStates(batchId: string, pool: readonly Course[]): Map<string, SeatState> {
    const seatStates = new Map<string, SeatState>();

    for (const course of pool) {
        try {
            seatStates.set(course.id, createSeatState(course));
        } catch (err) {
            if (err instanceof ConfigurationError) {
                throw err.withContext({ batchId, courseId: course.id });
            }
            throw err;
        }
    }

    return seatStates;
}

/**
 * Greedy merit-ordered allocation over in-memory inputs
 *
 * Deterministic, single pass, no backtracking:
 * 1. Students without preferences → NOT_ALLOCATED
 * 2. Remaining students processed by merit (marks desc, id asc)
 * 3. Preferences walked by ascending rank; first course with a seat in the
 *    student's category (or the unreserved pool) wins
 * 4. No seat in any preferred course → WAITLISTED
 *
 * Mutates seatStates. Preferences for courses missing from seatStates
 * (outside the pool or inactive) are skipped.
 *
 * @returns One record per student, in processing order
 */
export function allocateStudents(
    students: readonly Student[],
    preferencesByStudent: ReadonlyMap<string, readonly Preference[]>,
    seatStates: Map<string, SeatState>,
    context: RunContext
): Allocation[] {
    const allocations: Allocation[] = [];

    const record = (
        student: Student,
        outcome: AllocationOutcome,
        fields: Partial<Pick<Allocation, 'courseId' | 'preferenceRank' | 'seatBucket' | 'waitlistCourseId'>> = {}
    ): Allocation => Object.freeze({
        id: `${context.batchId}:${student.id}`,
        runId: context.runId,
        batchId: context.batchId,
        studentId: student.id,
        category: student.category,
        outcome,
        courseId: fields.courseId ?? null,
        preferenceRank: fields.preferenceRank ?? null,
        seatBucket: fields.seatBucket ?? null,
        waitlistCourseId: fields.waitlistCourseId ?? null,
        createdAt: context.createdAt
    });

    for (const student of sortByMerit(students)) {
        const preferences = [...(preferencesByStudent.get(student.id) ?? [])]
            .sort((a, b) => a.rank - b.rank);

        if (preferences.length === 0) {
            allocations.push(record(student, AllocationOutcome.NOT_ALLOCATED));
            continue;
        }

        let granted: Allocation | null = null;

        for (const preference of preferences) {
            const state = seatStates.get(preference.courseId);
            if (!state) {
                continue;
            }

            const bucket = claimSeat(state, student.category);
            if (bucket !== null) {
                granted = record(student, AllocationOutcome.ALLOCATED, {
                    courseId: preference.courseId,
                    preferenceRank: preference.rank,
                    seatBucket: bucket
                });
                break;
            }
        }

        if (granted) {
            allocations.push(granted);
            continue;
        }

        const firstInPool = preferences.find(p => seatStates.has(p.courseId));
        allocations.push(record(student, AllocationOutcome.WAITLISTED, {
            waitlistCourseId: firstInPool?.courseId ?? null
        }));
    }

    return allocations;
}

export function countOutcomes(allocations: readonly Allocation[]): OutcomeCounts {
    const counts: OutcomeCounts = {
        [AllocationOutcome.ALLOCATED]: 0,
        [AllocationOutcome.WAITLISTED]: 0,
        [AllocationOutcome.NOT_ALLOCATED]: 0
    };

    for (const allocation of allocations) {
        counts[allocation.outcome]++;
    }

    return counts;
}

/**
 * Core allocation engine - assigns a batch's students to course seats
 *
 * All operations scoped to ONE batch at a time. Runs for the same batch are
 * serialized; the result replaces the batch's previous records in one commit.
 */
export class AllocationEngine {
    private repositories: Repositories;
    private lock: BatchLock;

    constructor(repositories: Repositories, lock: BatchLock = new BatchLock()) {
        this.repositories = repositories;
        this.lock = lock;
    }

    /**
     * Run allocation for a batch and persist the outcome set
     *
     * @throws NotFoundError if the batch does not exist
     * @throws ConfigurationError if any pool course has a malformed quota
     */
    run(batchId: string): Promise<AllocationRun> {
        return this.lock.runExclusive(batchId, () => this.execute(batchId));
    }

    isRunning(batchId: string): boolean {
        return this.lock.isLocked(batchId);
    }

    private async execute(batchId: string): Promise<AllocationRun> {
        const batch = await this.repositories.getBatch(batchId);
        if (!batch) {
            throw new NotFoundError('Batch', batchId);
        }

        // Step 1: Seat state per pool course (validates every quota first)
        const pool = await this.repositories.getCoursePool(batchId);
        const seatStates = initializeSeatStates(batchId, pool);

        // Step 2: Students and their preferences
        const students = await this.repositories.getStudentsByBatch(batchId);
        const preferences = await this.repositories.getPreferencesForStudents(students.map(s => s.id));

        // Step 3: Allocate in merit order
        const context: RunContext = {
            runId: generateRunId(),
            batchId,
            createdAt: new Date()
        };
        const allocations = allocateStudents(students, preferences, seatStates, context);

        // Step 4: Commit all-or-nothing
        await this.repositories.replaceBatchAllocations(batchId, allocations);

        return {
            runId: context.runId,
            batchId,
            allocations,
            counts: countOutcomes(allocations),
            seatStates
        };
    }
}

function generateRunId(): string {
    return `RUN-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}
