// src/routes/scoringRoutes.ts

import { Router, Request, Response } from 'express';
import { ModelTrainer } from '../scoring/modelTrainer';
import { ScoringService } from '../scoring/scoringService';
import { asyncRoute } from './asyncRoute';

export function createScoringRoutes(trainer: ModelTrainer, scoring: ScoringService): Router {
    const router = Router();

    /**
     * Train the suitability model on allocation history
     * POST /scoring/train
     */
    router.post('/train', asyncRoute(async (_req: Request, res: Response) => {
        const report = await trainer.train();
        res.status(201).json({ success: true, ...report });
    }));

    /**
     * GET /scoring/status
     */
    router.get('/status', asyncRoute(async (_req: Request, res: Response) => {
        res.json(await scoring.status());
    }));

    /**
     * Score one student/course pair
     * GET /scoring/:studentId/:courseId
     */
    router.get('/:studentId/:courseId', asyncRoute(async (req: Request, res: Response) => {
        res.json(await scoring.score(req.params.studentId, req.params.courseId));
    }));

    return router;
}
