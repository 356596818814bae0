// src/store/seedLoader.ts

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { calculateCourseQuota } from '../engine/quotaCalculator';
import { AllocationOutcome } from '../models/Allocation';
import { ReservationCategory } from '../models/Student';
import { UNRESERVED } from '../models/SeatState';
import { InMemoryStore } from './inMemoryStore';

const category = z.nativeEnum(ReservationCategory);

const seedSchema = z.object({
    departments: z.array(z.object({
        id: z.string(),
        code: z.string(),
        name: z.string()
    })),
    programmes: z.array(z.object({
        id: z.string(),
        name: z.string(),
        departmentId: z.string()
    })),
    batches: z.array(z.object({
        id: z.string(),
        programmeId: z.string(),
        startYear: z.number().int(),
        endYear: z.number().int(),
        currentSemester: z.number().int().positive().default(1),
        coursePool: z.array(z.string()).default([])
    })),
    courses: z.array(z.object({
        id: z.string(),
        code: z.string(),
        name: z.string(),
        departmentId: z.string(),
        credits: z.number().int().positive().default(3),
        totalSeats: z.number().int().nonnegative(),
        quotaPercentages: z.record(category, z.number()).default({}),
        difficultyLevel: z.number().min(1).max(10).default(5),
        tags: z.array(z.string()).default([]),
        isActive: z.boolean().default(true)
    })),
    students: z.array(z.object({
        id: z.string(),
        name: z.string(),
        departmentId: z.string(),
        programmeId: z.string(),
        batchId: z.string(),
        qualifyingMarks: z.number(),
        category: category.default(ReservationCategory.GENERAL),
        academicHistory: z.array(z.object({
            semester: z.number().int().positive(),
            cgpa: z.number().nullable(),
            sgpa: z.number().nullable().default(null)
        })).default([]),
        subjectMarks: z.array(z.object({
            subject: z.string(),
            marksObtained: z.number().nullable(),
            maxMarks: z.number().positive().default(100)
        })).default([]),
        interests: z.array(z.string()).default([]),
        preferences: z.array(z.string()).default([])
    })),
    // Outcomes of earlier runs, kept as training history
    history: z.array(z.object({
        batchId: z.string(),
        studentId: z.string(),
        outcome: z.nativeEnum(AllocationOutcome),
        courseId: z.string(),
        preferenceRank: z.number().int().positive().nullable().default(null)
    })).default([])
});

export type SeedData = z.infer<typeof seedSchema>;

export interface SeedSummary {
    departments: number;
    batches: number;
    courses: number;
    students: number;
    historicalAllocations: number;
}

/**
 * Populate a store from seed data
 *
 * Every course quota is checked up front, so a bad seed fails before the
 * store is touched.
 *
 * @throws ZodError when the data does not match the seed format
 * @throws ConfigurationError for a malformed course quota
 */
export async function applySeed(store: InMemoryStore, data: unknown): Promise<SeedSummary> {
    const seed = seedSchema.parse(data);

    for (const course of seed.courses) {
        calculateCourseQuota(course);
    }

    seed.departments.forEach(d => store.addDepartment(d));
    seed.programmes.forEach(p => store.addProgramme(p));
    seed.courses.forEach(c => store.addCourse(c));

    for (const { coursePool, ...batch } of seed.batches) {
        store.addBatch(batch);
        store.setCoursePool(batch.id, coursePool);
    }

    for (const { preferences, ...student } of seed.students) {
        store.addStudent(student);
        if (preferences.length > 0) {
            const submittedAt = new Date();
            await store.replacePreferences(student.id, preferences.map((courseId, i) => ({
                studentId: student.id,
                courseId,
                rank: i + 1,
                submittedAt
            })));
        }
    }

    // History records are grouped per batch and committed like a run
    const historyByBatch = new Map<string, SeedData['history']>();
    for (const entry of seed.history) {
        const list = historyByBatch.get(entry.batchId) ?? [];
        list.push(entry);
        historyByBatch.set(entry.batchId, list);
    }

    const createdAt = new Date();
    for (const [batchId, entries] of historyByBatch) {
        await store.replaceBatchAllocations(batchId, entries.map(entry => {
            const student = store.students.get(entry.studentId);
            const allocated = entry.outcome === AllocationOutcome.ALLOCATED;
            return {
                id: `${batchId}:${entry.studentId}`,
                runId: `SEED-${batchId}`,
                batchId,
                studentId: entry.studentId,
                category: student?.category ?? ReservationCategory.GENERAL,
                outcome: entry.outcome,
                courseId: allocated ? entry.courseId : null,
                preferenceRank: allocated ? entry.preferenceRank : null,
                seatBucket: allocated ? UNRESERVED : null,
                waitlistCourseId: allocated ? null : entry.courseId,
                createdAt
            };
        }));
    }

    return {
        departments: seed.departments.length,
        batches: seed.batches.length,
        courses: seed.courses.length,
        students: seed.students.length,
        historicalAllocations: seed.history.length
    };
}

export async function loadSeedFile(store: InMemoryStore, path: string): Promise<SeedSummary> {
    const raw = await readFile(path, 'utf-8');
    return applySeed(store, JSON.parse(raw));
}
