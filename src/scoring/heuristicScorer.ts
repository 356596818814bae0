// src/scoring/heuristicScorer.ts

import { CourseProfile, StudentProfile, tagOverlap } from './features';
import { clampScore } from './labels';
import { ScoringStrategy, SuitabilityScorer } from './scorer';

/**
 * Component weights, summing to 1
 */
export const HEURISTIC_WEIGHTS = {
    academic: 0.40,
    departmentAffinity: 0.20,
    interestOverlap: 0.25,
    difficultyMatch: 0.15
} as const;

type Component = keyof typeof HEURISTIC_WEIGHTS;

const COMPONENTS: readonly Component[] = ['academic', 'departmentAffinity', 'interestOverlap', 'difficultyMatch'];

const SAME_DEPARTMENT_AFFINITY = 100;
const OTHER_DEPARTMENT_AFFINITY = 40;

/**
 * Per-component scores (0-100), null where the student lacks the data
 */
export function heuristicComponents(
    student: StudentProfile,
    course: CourseProfile
): Record<Component, number | null> {
    let academic: number | null = null;
    if (student.cgpa !== null && student.departmentTopCgpa !== null && student.departmentTopCgpa > 0) {
        academic = clampScore((student.cgpa / student.departmentTopCgpa) * 100);
    }

    const interestOverlap = student.interestTags.length > 0
        ? tagOverlap(student.interestTags, course.tags) * 100
        : null;

    // Ability on the same 0-10 scale as course difficulty
    const difficultyMatch = academic !== null
        ? clampScore((1 - Math.abs(academic / 10 - course.difficultyLevel) / 10) * 100)
        : null;

    return {
        academic,
        departmentAffinity: student.departmentId === course.departmentId
            ? SAME_DEPARTMENT_AFFINITY
            : OTHER_DEPARTMENT_AFFINITY,
        interestOverlap,
        difficultyMatch
    };
}

/**
 * Weighted-sum scorer used until a model has been trained
 *
 * Components with no data drop out and the remaining weights are rescaled.
 */
export class HeuristicScorer implements SuitabilityScorer {
    readonly strategy: ScoringStrategy = 'heuristic';

    score(student: StudentProfile, course: CourseProfile): number {
        const components = heuristicComponents(student, course);

        let weighted = 0;
        let weightUsed = 0;
        for (const key of COMPONENTS) {
            const value = components[key];
            if (value !== null) {
                weighted += HEURISTIC_WEIGHTS[key] * value;
                weightUsed += HEURISTIC_WEIGHTS[key];
            }
        }

        // Department affinity is always present, so weightUsed > 0
        return clampScore(weighted / weightUsed);
    }
}
