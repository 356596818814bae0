// src/testing/builders.ts

import { Course } from '../models/Course';
import { Preference } from '../models/Preference';
import { ReservationCategory, Student } from '../models/Student';
import { FEATURE_NAMES } from '../scoring/features';
import { MODEL_ARTIFACT_VERSION, TrainedModel } from '../scoring/modelStore';
import { InMemoryStore } from '../store/inMemoryStore';

export const BATCH_ID = 'B1';
export const HOME_DEPARTMENT = 'D-CS';
export const OTHER_DEPARTMENT = 'D-MAT';

export function makeStudent(overrides: Partial<Student> & { id: string }): Student {
    return {
        name: `Student ${overrides.id}`,
        departmentId: HOME_DEPARTMENT,
        programmeId: 'P1',
        batchId: BATCH_ID,
        qualifyingMarks: 70,
        category: ReservationCategory.GENERAL,
        academicHistory: [],
        subjectMarks: [],
        interests: [],
        ...overrides
    };
}

export function makeCourse(overrides: Partial<Course> & { id: string }): Course {
    return {
        code: overrides.id,
        name: `Course ${overrides.id}`,
        departmentId: OTHER_DEPARTMENT,
        credits: 3,
        totalSeats: 10,
        quotaPercentages: {},
        difficultyLevel: 5,
        tags: [],
        isActive: true,
        ...overrides
    };
}

export function preferencesFor(studentId: string, courseIds: string[], ranks?: number[]): Preference[] {
    return courseIds.map((courseId, i) => ({
        studentId,
        courseId,
        rank: ranks ? ranks[i] : i + 1,
        submittedAt: new Date(0)
    }));
}

/**
 * Store with one batch whose pool holds the given courses
 */
export function makeStore(courses: Course[] = []): InMemoryStore {
    const store = new InMemoryStore();
    store.addDepartment({ id: HOME_DEPARTMENT, code: 'CS', name: 'Computer Science' });
    store.addDepartment({ id: OTHER_DEPARTMENT, code: 'MAT', name: 'Mathematics' });
    store.addProgramme({ id: 'P1', name: 'BSc Computer Science', departmentId: HOME_DEPARTMENT });
    store.addBatch({ id: BATCH_ID, programmeId: 'P1', startYear: 2024, endYear: 2027, currentSemester: 1 });

    courses.forEach(c => store.addCourse(c));
    store.setCoursePool(BATCH_ID, courses.map(c => c.id));
    return store;
}

/**
 * Add students along with their ranked course choices
 */
export async function enroll(store: InMemoryStore, entries: Array<[Student, string[]]>): Promise<void> {
    for (const [student, courseIds] of entries) {
        store.addStudent(student);
        if (courseIds.length > 0) {
            await store.replacePreferences(student.id, preferencesFor(student.id, courseIds));
        }
    }
}

/**
 * Model that predicts the same score for every pair
 */
export function makeFlatModel(score: number, overrides: Partial<TrainedModel> = {}): TrainedModel {
    const width = FEATURE_NAMES.length;
    return {
        version: MODEL_ARTIFACT_VERSION,
        trainedAt: new Date(0).toISOString(),
        featureNames: [...FEATURE_NAMES],
        means: new Array<number>(width).fill(0),
        scales: new Array<number>(width).fill(1),
        coefficients: new Array<number>(width).fill(0),
        intercept: score,
        lambda: 1,
        samples: 12,
        cvR2: 0.5,
        featureImportances: {},
        ...overrides
    };
}
