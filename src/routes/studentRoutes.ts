// src/routes/studentRoutes.ts

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { ScoringService } from '../scoring/scoringService';
import { AllocationQueryService } from '../services/allocationQueries';
import { PreferenceService } from '../services/preferenceService';
import { asyncRoute } from './asyncRoute';

const preferencesBodySchema = z.object({
    courseIds: z.array(z.string().min(1)).min(1)
});

const recommendationsQuerySchema = z.object({
    courseIds: z
        .string()
        .transform(v => v.split(',').map(id => id.trim()).filter(id => id.length > 0))
        .optional()
});

/**
 * Student routes - HTTP mapping only
 */
export function createStudentRoutes(
    preferences: PreferenceService,
    queries: AllocationQueryService,
    scoring: ScoringService
): Router {
    const router = Router();

    /**
     * Allocation outcome of a student
     * GET /students/:studentId/allocation
     */
    router.get('/:studentId/allocation', asyncRoute(async (req: Request, res: Response) => {
        const allocation = await queries.getStudentAllocation(req.params.studentId);
        if (!allocation) {
            res.status(404).json({ error: 'No allocation recorded for this student', code: 'NOT_FOUND' });
            return;
        }
        res.json({ allocation });
    }));

    /**
     * GET /students/:studentId/preferences
     */
    router.get('/:studentId/preferences', asyncRoute(async (req: Request, res: Response) => {
        res.json({ preferences: await preferences.getPreferences(req.params.studentId) });
    }));

    /**
     * Submit preferences, replacing any earlier list
     * PUT /students/:studentId/preferences
     * Body: { courseIds: string[] } in priority order
     */
    router.put('/:studentId/preferences', asyncRoute(async (req: Request, res: Response) => {
        const { courseIds } = preferencesBodySchema.parse(req.body);
        const saved = await preferences.submitPreferences(req.params.studentId, courseIds);
        res.json({ preferences: saved });
    }));

    /**
     * DELETE /students/:studentId/preferences
     */
    router.delete('/:studentId/preferences', asyncRoute(async (req: Request, res: Response) => {
        const removed = await preferences.clearPreferences(req.params.studentId);
        res.json({ removed });
    }));

    /**
     * GET /students/:studentId/available-courses
     */
    router.get('/:studentId/available-courses', asyncRoute(async (req: Request, res: Response) => {
        res.json({ courses: await preferences.getAvailableCourses(req.params.studentId) });
    }));

    /**
     * Ranked, labeled recommendations
     * GET /students/:studentId/recommendations?courseIds=a,b
     * Without courseIds the student's available courses are scored.
     */
    router.get('/:studentId/recommendations', asyncRoute(async (req: Request, res: Response) => {
        const { studentId } = req.params;
        const query = recommendationsQuerySchema.parse(req.query);

        const courseIds = query.courseIds
            ?? (await preferences.getAvailableCourses(studentId)).map(c => c.id);

        res.json({ recommendations: await scoring.recommend(studentId, courseIds) });
    }));

    return router;
}
