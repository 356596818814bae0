// src/scoring/modelTrainer.ts

import { DEFAULT_TRAINING_CONFIG, TrainingConfig } from '../config';
import { log } from '../logger';
import { Allocation, AllocationOutcome } from '../models/Allocation';
import { InsufficientDataError } from '../models/errors';
import { Student } from '../models/Student';
import { AcademicRepository, AllocationRepository } from '../store/repositories';
import { buildCourseProfile, buildFeatureVector, buildStudentProfile, FEATURE_NAMES } from './features';
import { MODEL_ARTIFACT_VERSION, ModelStore, TrainedModel } from './modelStore';
import { crossValidateR2, featureImportances, fitRidge } from './regression';

export interface TrainingSet {
    features: number[][];
    targets: number[];
}

export interface TrainingReport {
    samples: number;
    cvR2: number | null;
    featureImportances: Record<string, number>;
    trainedAt: string;
}

/**
 * Target score a historical outcome stands for
 *
 * ALLOCATED at rank 1 → 100, 2 → 85, 3 → 70, then max(40, 100 - 15r).
 * WAITLISTED → 40, NOT_ALLOCATED → 20.
 */
export function targetScore(allocation: Pick<Allocation, 'outcome' | 'preferenceRank'>): number {
    switch (allocation.outcome) {
        case AllocationOutcome.ALLOCATED: {
            const rank = allocation.preferenceRank ?? 1;
            if (rank <= 1) {
                return 100;
            }
            if (rank === 2) {
                return 85;
            }
            if (rank === 3) {
                return 70;
            }
            return Math.max(40, 100 - rank * 15);
        }
        case AllocationOutcome.WAITLISTED:
            return 40;
        case AllocationOutcome.NOT_ALLOCATED:
            return 20;
    }
}

function round(value: number, digits: number): number {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
}

/**
 * Trains the suitability model from historical allocation records
 */
export class ModelTrainer {
    private repositories: AcademicRepository & AllocationRepository;
    private modelStore: ModelStore;
    private config: TrainingConfig;

    constructor(
        repositories: AcademicRepository & AllocationRepository,
        modelStore: ModelStore,
        config: TrainingConfig = DEFAULT_TRAINING_CONFIG
    ) {
        this.repositories = repositories;
        this.modelStore = modelStore;
        this.config = config;
    }

    /**
     * One row per record whose student and course can still be resolved.
     * A waitlisted record is paired with the course it waits for.
     */
    async prepareTrainingSet(): Promise<TrainingSet> {
        const allocations = await this.repositories.getAllAllocations();
        const features: number[][] = [];
        const targets: number[] = [];
        const peersByDepartment = new Map<string, Student[]>();

        for (const allocation of allocations) {
            const courseId = allocation.courseId ?? allocation.waitlistCourseId;
            if (courseId === null) {
                continue;
            }

            const student = await this.repositories.getStudent(allocation.studentId);
            const course = await this.repositories.getCourse(courseId);
            if (!student || !course) {
                continue;
            }

            let peers = peersByDepartment.get(student.departmentId);
            if (!peers) {
                peers = await this.repositories.getStudentsByDepartment(student.departmentId);
                peersByDepartment.set(student.departmentId, peers);
            }

            features.push(buildFeatureVector(buildStudentProfile(student, peers), buildCourseProfile(course)));
            targets.push(targetScore(allocation));
        }

        return { features, targets };
    }

    /**
     * Fit, cross-validate and persist a new model
     *
     * @throws InsufficientDataError below the minimum sample count; the stored model is left as it was
     */
    async train(): Promise<TrainingReport> {
        const { features, targets } = await this.prepareTrainingSet();

        if (features.length < this.config.minSamples) {
            throw new InsufficientDataError(this.config.minSamples, features.length);
        }

        const cvR2 = crossValidateR2(features, targets, this.config.folds, this.config.lambda);
        const params = fitRidge(features, targets, this.config.lambda);

        const importances: Record<string, number> = {};
        featureImportances(params).forEach((value, i) => {
            importances[FEATURE_NAMES[i]] = round(value, 4);
        });

        const model: TrainedModel = {
            version: MODEL_ARTIFACT_VERSION,
            trainedAt: new Date().toISOString(),
            featureNames: [...FEATURE_NAMES],
            means: params.means,
            scales: params.scales,
            coefficients: params.coefficients,
            intercept: params.intercept,
            lambda: this.config.lambda,
            samples: features.length,
            cvR2: cvR2 === null ? null : round(cvR2, 4),
            featureImportances: importances
        };

        await this.modelStore.save(model);
        log(`Trained suitability model on ${model.samples} samples (cv r2: ${model.cvR2 ?? 'n/a'})`);

        return {
            samples: model.samples,
            cvR2: model.cvR2,
            featureImportances: importances,
            trainedAt: model.trainedAt
        };
    }
}
