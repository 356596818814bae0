// src/scoring/modelScorer.ts

import { buildFeatureVector, CourseProfile, StudentProfile } from './features';
import { clampScore } from './labels';
import { TrainedModel } from './modelStore';
import { predictRidge } from './regression';
import { ScoringStrategy, SuitabilityScorer } from './scorer';

/**
 * Scorer backed by a trained regression model
 */
export class ModelScorer implements SuitabilityScorer {
    readonly strategy: ScoringStrategy = 'model';
    readonly model: TrainedModel;

    constructor(model: TrainedModel) {
        this.model = model;
    }

    score(student: StudentProfile, course: CourseProfile): number {
        const row = buildFeatureVector(student, course);
        return clampScore(predictRidge(this.model, row));
    }
}
