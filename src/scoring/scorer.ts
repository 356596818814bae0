// src/scoring/scorer.ts

import { CourseProfile, StudentProfile } from './features';

export type ScoringStrategy = 'heuristic' | 'model';

/**
 * A way of scoring how well a course suits a student, 0-100
 *
 * Implementations are pure: no state is read or written beyond the profiles.
 */
export interface SuitabilityScorer {
    readonly strategy: ScoringStrategy;
    score(student: StudentProfile, course: CourseProfile): number;
}
