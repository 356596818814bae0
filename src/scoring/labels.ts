// src/scoring/labels.ts

export type SuitabilityLabel = 'Highly Recommended' | 'Good Fit' | 'Challenging';

/**
 * Label shared by every scoring strategy
 */
export function labelForScore(score: number): SuitabilityLabel {
    if (score >= 75) {
        return 'Highly Recommended';
    }
    if (score >= 50) {
        return 'Good Fit';
    }
    return 'Challenging';
}

export function clampScore(score: number): number {
    return Math.max(0, Math.min(100, score));
}
