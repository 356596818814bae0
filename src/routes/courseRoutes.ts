// src/routes/courseRoutes.ts

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { AllocationQueryService } from '../services/allocationQueries';
import { asyncRoute } from './asyncRoute';

const seatQuerySchema = z.object({
    batchId: z.string().min(1).optional()
});

export function createCourseRoutes(queries: AllocationQueryService): Router {
    const router = Router();

    /**
     * Students allocated to the course
     * GET /courses/:courseId/students
     */
    router.get('/:courseId/students', asyncRoute(async (req: Request, res: Response) => {
        const students = await queries.getCourseAllocatedStudents(req.params.courseId);
        res.json({ count: students.length, students });
    }));

    /**
     * GET /courses/:courseId/waitlist
     */
    router.get('/:courseId/waitlist', asyncRoute(async (req: Request, res: Response) => {
        const waitlist = await queries.getCourseWaitlist(req.params.courseId);
        res.json({ count: waitlist.length, waitlist });
    }));

    /**
     * Per-category seat statistics
     * GET /courses/:courseId/seats?batchId=
     */
    router.get('/:courseId/seats', asyncRoute(async (req: Request, res: Response) => {
        const { batchId } = seatQuerySchema.parse(req.query);
        res.json({ seats: await queries.getCourseSeatStatistics(req.params.courseId, batchId) });
    }));

    return router;
}
