// src/models/Course.ts

import { ReservationCategory } from './Student';

/**
 * Category → percentage of total seats. Omitted categories mean 0%.
 * Whatever the percentages leave over is the unreserved pool.
 */
export type QuotaPercentages = Partial<Record<ReservationCategory, number>>;

/**
 * Course model - an elective offered by a department
 *
 * difficultyLevel (1-10) and tags are only read by scoring.
 */
export interface Course {
    id: string;
    code: string;
    name: string;
    departmentId: string;
    credits: number;
    totalSeats: number;
    quotaPercentages: QuotaPercentages;
    difficultyLevel: number;
    tags: string[];
    isActive: boolean;
}
