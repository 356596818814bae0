// src/store/repositories.ts

import { Allocation } from '../models/Allocation';
import { Course } from '../models/Course';
import { Preference } from '../models/Preference';
import { Batch, Department, Student } from '../models/Student';

/**
 * Read access to the academic records the engine and scoring depend on
 */
export interface AcademicRepository {
    getBatch(batchId: string): Promise<Batch | null>;
    getDepartment(departmentId: string): Promise<Department | null>;
    getStudent(studentId: string): Promise<Student | null>;
    getStudentsByBatch(batchId: string): Promise<Student[]>;
    getStudentsByDepartment(departmentId: string): Promise<Student[]>;
    getCourse(courseId: string): Promise<Course | null>;

    /**
     * Active courses offered to a batch, in pool order
     */
    getCoursePool(batchId: string): Promise<Course[]>;
}

export interface PreferenceRepository {
    /**
     * Preferences of one student, ascending by rank
     */
    getPreferences(studentId: string): Promise<Preference[]>;
    getPreferencesForStudents(studentIds: readonly string[]): Promise<Map<string, Preference[]>>;
    replacePreferences(studentId: string, preferences: Preference[]): Promise<void>;
    clearPreferences(studentId: string): Promise<number>;
}

export interface AllocationRepository {
    /**
     * Swap the batch's allocation records for a new set.
     * Either every record is committed or the previous set stays as it was.
     */
    replaceBatchAllocations(batchId: string, allocations: readonly Allocation[]): Promise<void>;
    getBatchAllocations(batchId: string): Promise<Allocation[]>;
    getStudentAllocation(studentId: string): Promise<Allocation | null>;
    getCourseAllocations(courseId: string): Promise<Allocation[]>;

    /**
     * Every persisted record across batches, used as training history
     */
    getAllAllocations(): Promise<Allocation[]>;
}

export type Repositories = AcademicRepository & PreferenceRepository & AllocationRepository;
