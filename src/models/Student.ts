// src/models/Student.ts

/**
 * Reservation categories a student can be admitted under
 */
export enum ReservationCategory {
    GENERAL = 'GENERAL',
    EWS = 'EWS',
    OBC = 'OBC',
    SC = 'SC',
    ST = 'ST'
}

export const RESERVATION_CATEGORIES: readonly ReservationCategory[] = Object.values(ReservationCategory);

export interface SemesterRecord {
    semester: number;
    cgpa: number | null;
    sgpa: number | null;
}

export interface SubjectMark {
    subject: string;
    marksObtained: number | null;
    maxMarks: number;
}

/**
 * Student model
 *
 * Data only, no methods. qualifyingMarks is the merit metric used to order
 * the allocation run and is treated as immutable for the duration of a run.
 */
export interface Student {
    id: string;
    name: string;
    departmentId: string;
    programmeId: string;
    batchId: string;

    // Merit & reservation
    qualifyingMarks: number;
    category: ReservationCategory;

    // Academic profile (read by scoring only)
    academicHistory: SemesterRecord[];
    subjectMarks: SubjectMark[];
    interests: string[];
}

export interface Department {
    id: string;
    code: string;
    name: string;
}

export interface Programme {
    id: string;
    name: string;
    departmentId: string;
}

export interface Batch {
    id: string;
    programmeId: string;
    startYear: number;
    endYear: number;
    currentSemester: number;
}

/**
 * Build a record with one entry per reservation category
 */
export function mapCategories<T>(fn: (category: ReservationCategory) => T): Record<ReservationCategory, T> {
    return {
        [ReservationCategory.GENERAL]: fn(ReservationCategory.GENERAL),
        [ReservationCategory.EWS]: fn(ReservationCategory.EWS),
        [ReservationCategory.OBC]: fn(ReservationCategory.OBC),
        [ReservationCategory.SC]: fn(ReservationCategory.SC),
        [ReservationCategory.ST]: fn(ReservationCategory.ST)
    };
}
