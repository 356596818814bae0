// src/services/allocationQueries.ts

import { calculateCourseQuota } from '../engine/quotaCalculator';
import { Allocation, AllocationOutcome } from '../models/Allocation';
import { Course } from '../models/Course';
import { NotFoundError } from '../models/errors';
import { UNRESERVED } from '../models/SeatState';
import { mapCategories, ReservationCategory, Student } from '../models/Student';
import { AcademicRepository, AllocationRepository } from '../store/repositories';

export interface AllocatedStudent {
    studentId: string;
    name: string;
    category: ReservationCategory;
    preferenceRank: number | null;
    seatBucket: Allocation['seatBucket'];
}

export interface BucketStatistics {
    quota: number;
    allocated: number;
    remaining: number;
}

export interface SeatStatistics {
    courseId: string;
    batchId: string | null;
    totalSeats: number;
    categories: Record<ReservationCategory, BucketStatistics>;
    unreserved: BucketStatistics;
    totalAllocated: number;
    totalRemaining: number;
}

export interface CategoryBreakdown {
    allocated: number;
    waitlisted: number;
    notAllocated: number;
}

export interface AllocationReport {
    batchId: string;
    runId: string | null;
    totalStudents: number;
    summary: CategoryBreakdown;
    byCategory: Record<ReservationCategory, CategoryBreakdown>;
    byCourse: Record<string, { code: string; name: string; count: number }>;
    byPreference: { '1': number; '2': number; '3': number; '4+': number };
}

function emptyBreakdown(): CategoryBreakdown {
    return { allocated: 0, waitlisted: 0, notAllocated: 0 };
}

function tally(breakdown: CategoryBreakdown, outcome: AllocationOutcome): void {
    switch (outcome) {
        case AllocationOutcome.ALLOCATED:
            breakdown.allocated++;
            break;
        case AllocationOutcome.WAITLISTED:
            breakdown.waitlisted++;
            break;
        case AllocationOutcome.NOT_ALLOCATED:
            breakdown.notAllocated++;
            break;
    }
}

/**
 * Read-only views over committed allocation records, for dashboards
 */
export class AllocationQueryService {
    private repositories: AcademicRepository & AllocationRepository;

    constructor(repositories: AcademicRepository & AllocationRepository) {
        this.repositories = repositories;
    }

    /**
     * @returns The student's outcome in the latest committed run, null if none
     */
    async getStudentAllocation(studentId: string): Promise<Allocation | null> {
        if (!(await this.repositories.getStudent(studentId))) {
            throw new NotFoundError('Student', studentId);
        }
        return this.repositories.getStudentAllocation(studentId);
    }

    async getBatchAllocations(batchId: string): Promise<Allocation[]> {
        await this.requireBatch(batchId);
        return this.repositories.getBatchAllocations(batchId);
    }

    /**
     * Students holding a seat in the course, most preferred rank first
     */
    async getCourseAllocatedStudents(courseId: string): Promise<AllocatedStudent[]> {
        await this.requireCourse(courseId);
        const records = (await this.repositories.getCourseAllocations(courseId))
            .filter(a => a.outcome === AllocationOutcome.ALLOCATED && a.courseId === courseId);

        const result: AllocatedStudent[] = [];
        for (const record of records) {
            const student = await this.repositories.getStudent(record.studentId);
            result.push({
                studentId: record.studentId,
                name: student?.name ?? 'Unknown',
                category: record.category,
                preferenceRank: record.preferenceRank,
                seatBucket: record.seatBucket
            });
        }

        return result.sort((a, b) => (a.preferenceRank ?? 0) - (b.preferenceRank ?? 0)
            || (a.studentId < b.studentId ? -1 : a.studentId > b.studentId ? 1 : 0));
    }

    /**
     * Waitlisted records whose most-preferred course is this one
     */
    async getCourseWaitlist(courseId: string): Promise<Allocation[]> {
        await this.requireCourse(courseId);
        return (await this.repositories.getCourseAllocations(courseId))
            .filter(a => a.outcome === AllocationOutcome.WAITLISTED && a.waitlistCourseId === courseId);
    }

    /**
     * Batch students without a seat in the latest run, including those never allocated
     */
    async getUnallocatedStudents(batchId: string): Promise<Student[]> {
        await this.requireBatch(batchId);
        const students = await this.repositories.getStudentsByBatch(batchId);
        const allocated = new Set(
            (await this.repositories.getBatchAllocations(batchId))
                .filter(a => a.outcome === AllocationOutcome.ALLOCATED)
                .map(a => a.studentId)
        );
        return students.filter(s => !allocated.has(s.id));
    }

    /**
     * Quota, taken and remaining seats per bucket for a course
     *
     * Seat state is rebuilt per run, so figures are per batch. Without a
     * batchId the batch of the most recent run that touched the course is used.
     */
    async getCourseSeatStatistics(courseId: string, batchId?: string): Promise<SeatStatistics> {
        const course = await this.requireCourse(courseId);
        const quota = calculateCourseQuota(course);

        const touching = await this.repositories.getCourseAllocations(courseId);
        let scopeBatchId: string | null = batchId ?? null;
        if (scopeBatchId === null && touching.length > 0) {
            const latest = touching.reduce((a, b) => (b.createdAt > a.createdAt ? b : a));
            scopeBatchId = latest.batchId;
        }

        const taken = touching.filter(a =>
            a.batchId === scopeBatchId &&
            a.outcome === AllocationOutcome.ALLOCATED &&
            a.courseId === courseId
        );

        const countBucket = (bucket: Allocation['seatBucket']): number =>
            taken.filter(a => a.seatBucket === bucket).length;

        const categories = mapCategories(c => {
            const allocated = countBucket(c);
            return { quota: quota.byCategory[c], allocated, remaining: quota.byCategory[c] - allocated };
        });

        const unreservedAllocated = countBucket(UNRESERVED);

        return {
            courseId,
            batchId: scopeBatchId,
            totalSeats: quota.totalSeats,
            categories,
            unreserved: {
                quota: quota.unreserved,
                allocated: unreservedAllocated,
                remaining: quota.unreserved - unreservedAllocated
            },
            totalAllocated: taken.length,
            totalRemaining: quota.totalSeats - taken.length
        };
    }

    async generateAllocationReport(batchId: string): Promise<AllocationReport> {
        await this.requireBatch(batchId);
        const students = await this.repositories.getStudentsByBatch(batchId);
        const records = await this.repositories.getBatchAllocations(batchId);
        const byStudent = new Map(records.map(a => [a.studentId, a]));

        const report: AllocationReport = {
            batchId,
            runId: records.length > 0 ? records[0].runId : null,
            totalStudents: students.length,
            summary: emptyBreakdown(),
            byCategory: mapCategories(() => emptyBreakdown()),
            byCourse: {},
            byPreference: { '1': 0, '2': 0, '3': 0, '4+': 0 }
        };

        const courses = new Map<string, Course | null>();

        for (const student of students) {
            // Students added after the last run count as not allocated
            const outcome = byStudent.get(student.id)?.outcome ?? AllocationOutcome.NOT_ALLOCATED;
            tally(report.summary, outcome);
            tally(report.byCategory[student.category], outcome);

            const record = byStudent.get(student.id);
            if (!record || record.outcome !== AllocationOutcome.ALLOCATED || record.courseId === null) {
                continue;
            }

            if (!courses.has(record.courseId)) {
                courses.set(record.courseId, await this.repositories.getCourse(record.courseId));
            }
            const course = courses.get(record.courseId);
            const entry = report.byCourse[record.courseId] ?? {
                code: course?.code ?? 'N/A',
                name: course?.name ?? 'Unknown',
                count: 0
            };
            entry.count++;
            report.byCourse[record.courseId] = entry;

            const rank = record.preferenceRank ?? 0;
            if (rank === 1) {
                report.byPreference['1']++;
            } else if (rank === 2) {
                report.byPreference['2']++;
            } else if (rank === 3) {
                report.byPreference['3']++;
            } else {
                report.byPreference['4+']++;
            }
        }

        return report;
    }

    private async requireBatch(batchId: string): Promise<void> {
        if (!(await this.repositories.getBatch(batchId))) {
            throw new NotFoundError('Batch', batchId);
        }
    }

    private async requireCourse(courseId: string): Promise<Course> {
        const course = await this.repositories.getCourse(courseId);
        if (!course) {
            throw new NotFoundError('Course', courseId);
        }
        return course;
    }
}
