// src/services/preferenceService.ts

import { Course } from '../models/Course';
import { NotFoundError, ValidationError } from '../models/errors';
import { Preference } from '../models/Preference';
import { Student } from '../models/Student';
import { AcademicRepository, PreferenceRepository } from '../store/repositories';

/**
 * Student preference management
 *
 * The allocation engine only reads what this service writes.
 */
export class PreferenceService {
    private repositories: AcademicRepository & PreferenceRepository;

    constructor(repositories: AcademicRepository & PreferenceRepository) {
        this.repositories = repositories;
    }

    /**
     * Courses a student may choose: active pool courses of their batch,
     * excluding those offered by their own department
     */
    async getAvailableCourses(studentId: string): Promise<Course[]> {
        const student = await this.requireStudent(studentId);
        const pool = await this.repositories.getCoursePool(student.batchId);
        return pool.filter(c => c.departmentId !== student.departmentId);
    }

    /**
     * Replace a student's preferences. courseIds are in priority order,
     * first = rank 1.
     *
     * @throws NotFoundError for an unknown student
     * @throws ValidationError for an empty list, duplicates or unavailable courses
     */
    async submitPreferences(studentId: string, courseIds: readonly string[]): Promise<Preference[]> {
        const student = await this.requireStudent(studentId);

        if (courseIds.length === 0) {
            throw new ValidationError('At least one course must be chosen', { studentId });
        }

        const seen = new Set<string>();
        for (const courseId of courseIds) {
            if (seen.has(courseId)) {
                throw new ValidationError(`Course ${courseId} is listed more than once`, { studentId, courseId });
            }
            seen.add(courseId);
        }

        const available = new Set((await this.getAvailableCourses(student.id)).map(c => c.id));
        for (const courseId of courseIds) {
            if (!available.has(courseId)) {
                throw new ValidationError(`Course ${courseId} is not available for this batch`, {
                    studentId,
                    batchId: student.batchId,
                    courseId
                });
            }
        }

        const submittedAt = new Date();
        const preferences: Preference[] = courseIds.map((courseId, i) => ({
            studentId,
            courseId,
            rank: i + 1,
            submittedAt
        }));

        await this.repositories.replacePreferences(studentId, preferences);
        return preferences;
    }

    async getPreferences(studentId: string): Promise<Preference[]> {
        await this.requireStudent(studentId);
        return this.repositories.getPreferences(studentId);
    }

    /**
     * @returns Number of preferences removed
     */
    async clearPreferences(studentId: string): Promise<number> {
        await this.requireStudent(studentId);
        return this.repositories.clearPreferences(studentId);
    }

    async hasSubmitted(studentId: string): Promise<boolean> {
        return (await this.getPreferences(studentId)).length > 0;
    }

    private async requireStudent(studentId: string): Promise<Student> {
        const student = await this.repositories.getStudent(studentId);
        if (!student) {
            throw new NotFoundError('Student', studentId);
        }
        return student;
    }
}
