// src/routes/batchRoutes.ts

import { Router, Request, Response } from 'express';
import { AllocationEngine } from '../engine/allocationEngine';
import { log } from '../logger';
import { AllocationQueryService } from '../services/allocationQueries';
import { asyncRoute } from './asyncRoute';

/**
 * Batch routes - HTTP mapping only
 * Allocation logic lives in the engine, reads in the query service
 */
export function createBatchRoutes(
    allocationEngine: AllocationEngine,
    queries: AllocationQueryService
): Router {
    const router = Router();

    /**
     * Run allocation for a batch
     * POST /batches/:batchId/allocation
     */
    router.post('/:batchId/allocation', asyncRoute(async (req: Request, res: Response) => {
        const { batchId } = req.params;
        const run = await allocationEngine.run(batchId);

        log(
            `Allocation ${run.runId} for batch ${batchId}: ` +
            `${run.counts.ALLOCATED} allocated, ${run.counts.WAITLISTED} waitlisted, ` +
            `${run.counts.NOT_ALLOCATED} not allocated`
        );

        res.json({
            batchId,
            runId: run.runId,
            totalStudents: run.allocations.length,
            counts: run.counts
        });
    }));

    /**
     * Committed allocation records of a batch
     * GET /batches/:batchId/allocation
     */
    router.get('/:batchId/allocation', asyncRoute(async (req: Request, res: Response) => {
        const allocations = await queries.getBatchAllocations(req.params.batchId);
        res.json({ allocations });
    }));

    /**
     * GET /batches/:batchId/allocation/report
     */
    router.get('/:batchId/allocation/report', asyncRoute(async (req: Request, res: Response) => {
        res.json({ report: await queries.generateAllocationReport(req.params.batchId) });
    }));

    /**
     * GET /batches/:batchId/unallocated
     */
    router.get('/:batchId/unallocated', asyncRoute(async (req: Request, res: Response) => {
        const students = await queries.getUnallocatedStudents(req.params.batchId);
        res.json({
            count: students.length,
            students: students.map(s => ({ id: s.id, name: s.name, category: s.category }))
        });
    }));

    return router;
}
