// src/simulation/runAllocationSimulation.ts

import { resolve } from 'path';
import { AllocationEngine } from '../engine/allocationEngine';
import { log, logError, logSection } from '../logger';
import { AllocationOutcome } from '../models/Allocation';
import { RESERVATION_CATEGORIES } from '../models/Student';
import { UNRESERVED } from '../models/SeatState';
import { InMemoryModelStore } from '../scoring/modelStore';
import { ModelTrainer } from '../scoring/modelTrainer';
import { ScoringService } from '../scoring/scoringService';
import { AllocationQueryService } from '../services/allocationQueries';
import { PreferenceService } from '../services/preferenceService';
import { InMemoryStore } from '../store/inMemoryStore';
import { loadSeedFile } from '../store/seedLoader';

/**
 * Full allocation cycle over a seed file
 *
 * Demonstrates:
 * - Quota-based seat states per course
 * - Merit-ordered allocation with unreserved fallback
 * - Idempotent re-run
 * - Heuristic scoring, then training and model scoring
 * - Invariant checks on the committed result
 *
 * Usage: npm run simulate -- [seed-file]
 */
async function runSimulation(seedPath: string): Promise<boolean> {
    logSection('ALLOCATION SIMULATION - START');

    const store = new InMemoryStore();
    const summary = await loadSeedFile(store, seedPath);
    log(`Loaded ${summary.students} students, ${summary.courses} courses, ${summary.batches} batches`);
    log(`  Historical allocation records: ${summary.historicalAllocations}`);

    const engine = new AllocationEngine(store);
    const queries = new AllocationQueryService(store);
    const preferences = new PreferenceService(store);
    const modelStore = new InMemoryModelStore();
    const scoring = new ScoringService(store, modelStore);
    const trainer = new ModelTrainer(store, modelStore);

    const batchId = 'B-2024';

    // ========== STEP 1: Allocation ==========
    logSection(`STEP 1: Allocation run for ${batchId}`);

    const run = await engine.run(batchId);
    log(`Run ${run.runId}`);
    log(`  ALLOCATED: ${run.counts.ALLOCATED}`);
    log(`  WAITLISTED: ${run.counts.WAITLISTED}`);
    log(`  NOT_ALLOCATED: ${run.counts.NOT_ALLOCATED}`);

    for (const allocation of run.allocations) {
        const detail = allocation.outcome === AllocationOutcome.ALLOCATED
            ? `${allocation.courseId} (rank ${allocation.preferenceRank}, ${allocation.seatBucket} seat)`
            : allocation.outcome;
        log(`  ${allocation.studentId} [${allocation.category}] → ${detail}`);
    }

    // ========== STEP 2: Seat statistics ==========
    logSection('STEP 2: Seat statistics');

    for (const courseId of run.seatStates.keys()) {
        const stats = await queries.getCourseSeatStatistics(courseId, batchId);
        const parts = RESERVATION_CATEGORIES
            .filter(c => stats.categories[c].quota > 0)
            .map(c => `${c} ${stats.categories[c].allocated}/${stats.categories[c].quota}`);
        parts.push(`${UNRESERVED} ${stats.unreserved.allocated}/${stats.unreserved.quota}`);
        log(`  ${courseId}: ${parts.join(', ')}`);
    }

    // ========== STEP 3: Re-run ==========
    logSection('STEP 3: Re-run on unchanged input');

    const rerun = await engine.run(batchId);
    const fingerprint = (records: typeof run.allocations) => JSON.stringify(
        records.map(a => [a.studentId, a.outcome, a.courseId, a.preferenceRank, a.seatBucket])
    );
    const identical = fingerprint(run.allocations) === fingerprint(rerun.allocations);
    log(`  Outcome set identical: ${identical}`);

    // ========== STEP 4: Scoring ==========
    logSection('STEP 4: Recommendations');

    const studentId = 'S-101';
    const available = (await preferences.getAvailableCourses(studentId)).map(c => c.id);

    const before = await scoring.recommend(studentId, available);
    log(`Heuristic recommendations for ${studentId}:`);
    before.forEach(r => log(`  ${r.courseCode} ${r.score} - ${r.label}`));

    const report = await trainer.train();
    log(`Trained on ${report.samples} samples, cv r2 ${report.cvR2 ?? 'n/a'}`);

    const after = await scoring.recommend(studentId, available);
    log(`Model recommendations for ${studentId}:`);
    after.forEach(r => log(`  ${r.courseCode} ${r.score} - ${r.label} (${r.strategy})`));

    // ========== STEP 5: Invariants ==========
    logSection('STEP 5: Invariant Verification');

    let allInvariantsHold = identical;

    const students = await store.getStudentsByBatch(batchId);
    const committed = await store.getBatchAllocations(batchId);

    log('Checking Invariant 1: One outcome per student');
    if (committed.length !== students.length || new Set(committed.map(a => a.studentId)).size !== students.length) {
        log('  ✗ VIOLATED: outcome count does not match student count');
        allInvariantsHold = false;
    }

    log('Checking Invariant 2: No bucket over quota');
    for (const courseId of run.seatStates.keys()) {
        const stats = await queries.getCourseSeatStatistics(courseId, batchId);
        for (const c of RESERVATION_CATEGORIES) {
            if (stats.categories[c].remaining < 0) {
                log(`  ✗ VIOLATED: ${courseId} ${c} over quota`);
                allInvariantsHold = false;
            }
        }
        if (stats.unreserved.remaining < 0) {
            log(`  ✗ VIOLATED: ${courseId} unreserved pool over quota`);
            allInvariantsHold = false;
        }
    }

    logSection('SIMULATION SUMMARY');
    log(allInvariantsHold ? 'All invariants hold' : 'Invariant violations found');

    return allInvariantsHold;
}

if (require.main === module) {
    const seedPath = resolve(process.argv[2] ?? 'data/demo-seed.json');
    runSimulation(seedPath)
        .then(ok => {
            process.exitCode = ok ? 0 : 1;
        })
        .catch(err => {
            logError('Simulation failed', err);
            process.exitCode = 1;
        });
}

export { runSimulation };
