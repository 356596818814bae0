// src/scoring/features.ts

import { Course } from '../models/Course';
import { Student } from '../models/Student';

/**
 * What scoring knows about a student. Absent data stays null.
 */
export interface StudentProfile {
    studentId: string;
    departmentId: string;
    cgpa: number | null;
    averageMarks: number | null;
    qualifyingMarks: number;
    interestTags: string[];

    // Best CGPA in the student's department, the academic reference point
    departmentTopCgpa: number | null;
}

export interface CourseProfile {
    courseId: string;
    departmentId: string;
    difficultyLevel: number;
    credits: number;
    tags: string[];
}

export const FEATURE_NAMES = [
    'cgpa',
    'avg_marks',
    'qualifying_marks',
    'same_department',
    'tag_overlap',
    'difficulty_level',
    'credits'
] as const;

export type FeatureName = typeof FEATURE_NAMES[number];

export function normalizeTag(tag: string): string {
    return tag.trim().toLowerCase();
}

function normalizeTags(tags: readonly string[]): string[] {
    return Array.from(new Set(tags.map(normalizeTag).filter(t => t.length > 0)));
}

/**
 * CGPA of the most recent semester that has one
 */
export function latestCgpa(student: Student): number | null {
    const graded = student.academicHistory
        .filter(h => h.cgpa !== null)
        .sort((a, b) => b.semester - a.semester);

    return graded.length > 0 ? graded[0].cgpa : null;
}

/**
 * Mean percentage over subjects with marks and a positive maximum
 */
export function averageSubjectPercentage(student: Student): number | null {
    const percentages: number[] = [];
    for (const mark of student.subjectMarks) {
        if (mark.marksObtained !== null && mark.maxMarks > 0) {
            percentages.push((mark.marksObtained / mark.maxMarks) * 100);
        }
    }

    if (percentages.length === 0) {
        return null;
    }
    return percentages.reduce((sum, p) => sum + p, 0) / percentages.length;
}

export function buildStudentProfile(student: Student, departmentPeers: readonly Student[]): StudentProfile {
    const cgpa = latestCgpa(student);

    let departmentTopCgpa: number | null = cgpa;
    for (const peer of departmentPeers) {
        const peerCgpa = latestCgpa(peer);
        if (peerCgpa !== null && (departmentTopCgpa === null || peerCgpa > departmentTopCgpa)) {
            departmentTopCgpa = peerCgpa;
        }
    }

    return {
        studentId: student.id,
        departmentId: student.departmentId,
        cgpa,
        averageMarks: averageSubjectPercentage(student),
        qualifyingMarks: student.qualifyingMarks,
        interestTags: normalizeTags(student.interests),
        departmentTopCgpa
    };
}

export function buildCourseProfile(course: Course): CourseProfile {
    return {
        courseId: course.id,
        departmentId: course.departmentId,
        difficultyLevel: course.difficultyLevel,
        credits: course.credits,
        tags: normalizeTags(course.tags)
    };
}

/**
 * Jaccard similarity of two tag sets, 0 when both are empty
 */
export function tagOverlap(a: readonly string[], b: readonly string[]): number {
    const left = new Set(a.map(normalizeTag));
    const right = new Set(b.map(normalizeTag));

    let intersection = 0;
    for (const tag of left) {
        if (right.has(tag)) {
            intersection++;
        }
    }

    const union = left.size + right.size - intersection;
    return union === 0 ? 0 : intersection / union;
}

/**
 * Numeric features in FEATURE_NAMES order. Missing values become 0.
 */
export function buildFeatureVector(student: StudentProfile, course: CourseProfile): number[] {
    return [
        student.cgpa ?? 0,
        student.averageMarks ?? 0,
        student.qualifyingMarks,
        student.departmentId === course.departmentId ? 1 : 0,
        tagOverlap(student.interestTags, course.tags),
        course.difficultyLevel,
        course.credits
    ];
}
