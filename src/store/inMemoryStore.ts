// src/store/inMemoryStore.ts

import { Allocation } from '../models/Allocation';
import { Course } from '../models/Course';
import { Preference } from '../models/Preference';
import { Batch, Department, Programme, Student } from '../models/Student';
import { Repositories } from './repositories';

/**
 * In-process implementation of the repositories
 *
 * Plain Maps keyed by id. Reads hand out copies of arrays so callers cannot
 * reorder or grow the stored lists.
 */
export class InMemoryStore implements Repositories {
    readonly departments = new Map<string, Department>();
    readonly programmes = new Map<string, Programme>();
    readonly batches = new Map<string, Batch>();
    readonly students = new Map<string, Student>();
    readonly courses = new Map<string, Course>();

    private coursePools = new Map<string, string[]>();
    private preferences = new Map<string, Preference[]>();
    private allocationsByBatch = new Map<string, readonly Allocation[]>();

    // ========== Seeding ==========

    addDepartment(department: Department): void {
        this.departments.set(department.id, department);
    }

    addProgramme(programme: Programme): void {
        this.programmes.set(programme.id, programme);
    }

    addBatch(batch: Batch): void {
        this.batches.set(batch.id, batch);
    }

    addStudent(student: Student): void {
        this.students.set(student.id, student);
    }

    addCourse(course: Course): void {
        this.courses.set(course.id, course);
    }

    setCoursePool(batchId: string, courseIds: string[]): void {
        this.coursePools.set(batchId, [...courseIds]);
    }

    // ========== AcademicRepository ==========

    async getBatch(batchId: string): Promise<Batch | null> {
        return this.batches.get(batchId) ?? null;
    }

    async getDepartment(departmentId: string): Promise<Department | null> {
        return this.departments.get(departmentId) ?? null;
    }

    async getStudent(studentId: string): Promise<Student | null> {
        return this.students.get(studentId) ?? null;
    }

    async getStudentsByBatch(batchId: string): Promise<Student[]> {
        return Array.from(this.students.values()).filter(s => s.batchId === batchId);
    }

    async getStudentsByDepartment(departmentId: string): Promise<Student[]> {
        return Array.from(this.students.values()).filter(s => s.departmentId === departmentId);
    }

    async getCourse(courseId: string): Promise<Course | null> {
        return this.courses.get(courseId) ?? null;
    }

    async getCoursePool(batchId: string): Promise<Course[]> {
        const pool: Course[] = [];
        for (const courseId of this.coursePools.get(batchId) ?? []) {
            const course = this.courses.get(courseId);
            if (course && course.isActive) {
                pool.push(course);
            }
        }
        return pool;
    }

    // ========== PreferenceRepository ==========

    async getPreferences(studentId: string): Promise<Preference[]> {
        return [...(this.preferences.get(studentId) ?? [])];
    }

    async getPreferencesForStudents(studentIds: readonly string[]): Promise<Map<string, Preference[]>> {
        const result = new Map<string, Preference[]>();
        for (const studentId of studentIds) {
            result.set(studentId, [...(this.preferences.get(studentId) ?? [])]);
        }
        return result;
    }

    async replacePreferences(studentId: string, preferences: Preference[]): Promise<void> {
        const sorted = [...preferences].sort((a, b) => a.rank - b.rank);
        this.preferences.set(studentId, sorted);
    }

    async clearPreferences(studentId: string): Promise<number> {
        const removed = this.preferences.get(studentId)?.length ?? 0;
        this.preferences.delete(studentId);
        return removed;
    }

    // ========== AllocationRepository ==========

    async replaceBatchAllocations(batchId: string, allocations: readonly Allocation[]): Promise<void> {
        for (const allocation of allocations) {
            if (allocation.batchId !== batchId) {
                throw new Error(`Allocation ${allocation.id} belongs to batch ${allocation.batchId}, not ${batchId}`);
            }
        }

        // Single assignment: readers see either the old set or the new one
        this.allocationsByBatch.set(batchId, Object.freeze([...allocations]));
    }

    async getBatchAllocations(batchId: string): Promise<Allocation[]> {
        return [...(this.allocationsByBatch.get(batchId) ?? [])];
    }

    /**
     * The record from the student's own batch, else the newest one filed
     * under any other batch (seeded history)
     */
    async getStudentAllocation(studentId: string): Promise<Allocation | null> {
        const ownBatchId = this.students.get(studentId)?.batchId;
        if (ownBatchId !== undefined) {
            const own = this.allocationsByBatch.get(ownBatchId)?.find(a => a.studentId === studentId);
            if (own) {
                return own;
            }
        }

        let newest: Allocation | null = null;
        for (const records of this.allocationsByBatch.values()) {
            for (const allocation of records) {
                if (allocation.studentId === studentId && (!newest || allocation.createdAt > newest.createdAt)) {
                    newest = allocation;
                }
            }
        }
        return newest;
    }

    async getCourseAllocations(courseId: string): Promise<Allocation[]> {
        const result: Allocation[] = [];
        for (const records of this.allocationsByBatch.values()) {
            for (const allocation of records) {
                if (allocation.courseId === courseId || allocation.waitlistCourseId === courseId) {
                    result.push(allocation);
                }
            }
        }
        return result;
    }

    async getAllAllocations(): Promise<Allocation[]> {
        return Array.from(this.allocationsByBatch.values()).flat();
    }

    countAllocations(): number {
        let total = 0;
        for (const records of this.allocationsByBatch.values()) {
            total += records.length;
        }
        return total;
    }
}
