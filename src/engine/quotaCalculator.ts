// src/engine/quotaCalculator.ts

import { Course, QuotaPercentages } from '../models/Course';
import { ConfigurationError } from '../models/errors';
import { QuotaBreakdown } from '../models/SeatState';
import { RESERVATION_CATEGORIES, mapCategories } from '../models/Student';

/**
 * Convert total seats and category percentages into integer seat counts
 *
 * Pure function - same input always produces same output
 *
 * Rules:
 * - Each category gets floor(total * pct / 100)
 * - Seats lost to flooring and any percentage not assigned to a category
 *   go to the unreserved bucket
 *
 * @param totalSeats Non-negative integer seat capacity
 * @param percentages Category → percentage, omitted categories mean 0
 * @param courseId Included in error context when given
 * @throws ConfigurationError on malformed seats or percentages, or a sum over 100
 */
export function calculateQuota(
    totalSeats: number,
    percentages: QuotaPercentages,
    courseId?: string
): QuotaBreakdown {
    if (!Number.isInteger(totalSeats) || totalSeats < 0) {
        throw new ConfigurationError(
            `Total seats must be a non-negative integer, got ${totalSeats}`,
            { courseId }
        );
    }

    const known = new Set<string>(RESERVATION_CATEGORIES);
    for (const key of Object.keys(percentages)) {
        if (!known.has(key)) {
            throw new ConfigurationError(`Unknown reservation category '${key}'`, { courseId, category: key });
        }
    }

    let percentTotal = 0;

    for (const category of RESERVATION_CATEGORIES) {
        const pct = percentages[category] ?? 0;

        if (!Number.isFinite(pct) || pct < 0 || pct > 100) {
            throw new ConfigurationError(
                `Quota percentage for ${category} must be between 0 and 100, got ${pct}`,
                { courseId, category }
            );
        }

        percentTotal += pct;
    }

    // Floating point slack on the sum
    if (percentTotal > 100 + 1e-9) {
        throw new ConfigurationError(
            `Quota percentages sum to ${percentTotal}, which exceeds 100`,
            { courseId, percentTotal }
        );
    }

    // Scaled to integers first so 375 * 18.4 floors to 69, not 68
    const byCategory = mapCategories(c =>
        Math.floor(Math.round(totalSeats * (percentages[c] ?? 0) * 1e6) / 1e8)
    );
    const reserved = RESERVATION_CATEGORIES.reduce((sum, c) => sum + byCategory[c], 0);

    return {
        totalSeats,
        byCategory,
        unreserved: totalSeats - reserved
    };
}

/**
 * Quota breakdown for a course's own configuration
 */
export function calculateCourseQuota(course: Course): QuotaBreakdown {
    return calculateQuota(course.totalSeats, course.quotaPercentages, course.id);
}
