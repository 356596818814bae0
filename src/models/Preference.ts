// src/models/Preference.ts

/**
 * A student's wish for one course.
 *
 * rank is a positive integer, unique per student. Lower rank = more preferred.
 * Gaps between ranks carry no meaning; only relative order does.
 */
export interface Preference {
    studentId: string;
    courseId: string;
    rank: number;
    submittedAt: Date;
}
