// src/scoring/scoringService.ts

import { Course } from '../models/Course';
import { NotFoundError } from '../models/errors';
import { Student } from '../models/Student';
import { AcademicRepository } from '../store/repositories';
import { buildCourseProfile, buildStudentProfile, StudentProfile } from './features';
import { HeuristicScorer } from './heuristicScorer';
import { labelForScore, SuitabilityLabel } from './labels';
import { ModelScorer } from './modelScorer';
import { ModelStore } from './modelStore';
import { ScoringStrategy, SuitabilityScorer } from './scorer';

export interface Suitability {
    score: number;
    label: SuitabilityLabel;
}

export interface Recommendation extends Suitability {
    courseId: string;
    courseCode: string;
    courseName: string;
    strategy: ScoringStrategy;
}

export interface ModelStatus {
    modelTrained: boolean;
    activeStrategy: ScoringStrategy;
    trainedAt: string | null;
    samples: number | null;
    cvR2: number | null;
}

/**
 * Score and label one pair with the given scorer
 *
 * The label comes from the exact score; only the reported score is rounded
 * to one decimal, so 74.96 reads 75 but stays a "Good Fit".
 */
export function scoreSuitability(
    scorer: SuitabilityScorer,
    student: StudentProfile,
    course: Course
): Suitability {
    const raw = scorer.score(student, buildCourseProfile(course));
    return { score: Math.round(raw * 10) / 10, label: labelForScore(raw) };
}

/**
 * Read-side suitability scoring for dashboards
 *
 * The strategy is picked on every call: the persisted model when one exists,
 * the heuristic otherwise. Nothing here writes to the repositories.
 */
export class ScoringService {
    private repositories: AcademicRepository;
    private modelStore: ModelStore;
    private heuristic: SuitabilityScorer;

    constructor(
        repositories: AcademicRepository,
        modelStore: ModelStore,
        heuristic: SuitabilityScorer = new HeuristicScorer()
    ) {
        this.repositories = repositories;
        this.modelStore = modelStore;
        this.heuristic = heuristic;
    }

    async resolveScorer(): Promise<SuitabilityScorer> {
        const model = await this.modelStore.load();
        return model ? new ModelScorer(model) : this.heuristic;
    }

    /**
     * @throws NotFoundError for an unknown student or course
     */
    async score(studentId: string, courseId: string): Promise<Recommendation> {
        const profile = await this.loadProfile(studentId);
        const course = await this.repositories.getCourse(courseId);
        if (!course) {
            throw new NotFoundError('Course', courseId);
        }

        const scorer = await this.resolveScorer();
        return toRecommendation(scorer, profile, course);
    }

    /**
     * Score a student against a set of courses, best first (ties by course id).
     * Unknown course ids are left out.
     *
     * @throws NotFoundError for an unknown student
     */
    async recommend(studentId: string, courseIds: readonly string[]): Promise<Recommendation[]> {
        const profile = await this.loadProfile(studentId);
        const scorer = await this.resolveScorer();

        const recommendations: Recommendation[] = [];
        for (const courseId of new Set(courseIds)) {
            const course = await this.repositories.getCourse(courseId);
            if (course) {
                recommendations.push(toRecommendation(scorer, profile, course));
            }
        }

        return recommendations.sort((a, b) => {
            if (a.score !== b.score) {
                return b.score - a.score;
            }
            return a.courseId < b.courseId ? -1 : a.courseId > b.courseId ? 1 : 0;
        });
    }

    async status(): Promise<ModelStatus> {
        const model = await this.modelStore.load();
        return {
            modelTrained: model !== null,
            activeStrategy: model ? 'model' : 'heuristic',
            trainedAt: model?.trainedAt ?? null,
            samples: model?.samples ?? null,
            cvR2: model?.cvR2 ?? null
        };
    }

    private async loadProfile(studentId: string): Promise<StudentProfile> {
        const student: Student | null = await this.repositories.getStudent(studentId);
        if (!student) {
            throw new NotFoundError('Student', studentId);
        }

        const peers = await this.repositories.getStudentsByDepartment(student.departmentId);
        return buildStudentProfile(student, peers);
    }
}

function toRecommendation(scorer: SuitabilityScorer, profile: StudentProfile, course: Course): Recommendation {
    return {
        courseId: course.id,
        courseCode: course.code,
        courseName: course.name,
        strategy: scorer.strategy,
        ...scoreSuitability(scorer, profile, course)
    };
}
