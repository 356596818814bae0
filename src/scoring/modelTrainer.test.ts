import { describe, expect, it } from 'vitest';
import { AllocationEngine } from '../engine/allocationEngine';
import { AllocationOutcome } from '../models/Allocation';
import { InsufficientDataError } from '../models/errors';
import { BATCH_ID, enroll, makeCourse, makeFlatModel, makeStore, makeStudent } from '../testing/builders';
import { FEATURE_NAMES } from './features';
import { InMemoryModelStore } from './modelStore';
import { ModelTrainer, targetScore } from './modelTrainer';
import { ScoringService } from './scoringService';

const TRAINING = { minSamples: 3, folds: 2, lambda: 1 };

describe('targetScore', () => {
    it('maps allocated ranks to decreasing scores', () => {
        const allocated = (rank: number) => targetScore({ outcome: AllocationOutcome.ALLOCATED, preferenceRank: rank });

        expect(allocated(1)).toBe(100);
        expect(allocated(2)).toBe(85);
        expect(allocated(3)).toBe(70);
        expect(allocated(4)).toBe(40);
        expect(allocated(9)).toBe(40);
    });

    it('scores unsuccessful outcomes low', () => {
        expect(targetScore({ outcome: AllocationOutcome.WAITLISTED, preferenceRank: null })).toBe(40);
        expect(targetScore({ outcome: AllocationOutcome.NOT_ALLOCATED, preferenceRank: null })).toBe(20);
    });
});

async function storeWithHistory() {
    const store = makeStore([
        makeCourse({ id: 'C1', totalSeats: 1, tags: ['ml'] }),
        makeCourse({ id: 'C2', totalSeats: 1, tags: ['stats'] })
    ]);
    await enroll(store, [
        [makeStudent({ id: 'S1', qualifyingMarks: 95, interests: ['ml'] }), ['C1', 'C2']],
        [makeStudent({ id: 'S2', qualifyingMarks: 85 }), ['C1', 'C2']],
        [makeStudent({ id: 'S3', qualifyingMarks: 75 }), ['C1']],
        [makeStudent({ id: 'S4', qualifyingMarks: 65 }), ['C2']],
        [makeStudent({ id: 'S5', qualifyingMarks: 55 }), []]
    ]);
    await new AllocationEngine(store).run(BATCH_ID);
    return store;
}

describe('ModelTrainer', () => {
    it('builds one row per record with a course, pairing waitlisted records with their first choice', async () => {
        const trainer = new ModelTrainer(await storeWithHistory(), new InMemoryModelStore(), TRAINING);

        const { features, targets } = await trainer.prepareTrainingSet();

        // S5 has no course to pair with
        expect(features).toHaveLength(4);
        expect(features.every(row => row.length === FEATURE_NAMES.length)).toBe(true);
        expect([...targets].sort((a, b) => a - b)).toEqual([40, 40, 85, 100]);
    });

    it('trains, persists and reports a model', async () => {
        const modelStore = new InMemoryModelStore();
        const trainer = new ModelTrainer(await storeWithHistory(), modelStore, TRAINING);

        const report = await trainer.train();
        const saved = await modelStore.load();

        expect(report.samples).toBe(4);
        expect(Object.keys(report.featureImportances)).toEqual([...FEATURE_NAMES]);
        expect(saved?.samples).toBe(4);
        expect(saved?.trainedAt).toBe(report.trainedAt);
        expect(saved?.featureNames).toEqual([...FEATURE_NAMES]);
    });

    it('keeps the existing model when there is too little history', async () => {
        const existing = makeFlatModel(55);
        const modelStore = new InMemoryModelStore(existing);
        const trainer = new ModelTrainer(await storeWithHistory(), modelStore, { ...TRAINING, minSamples: 10 });

        const failure = await trainer.train().then(() => null, (err: unknown) => err);

        expect(failure).toBeInstanceOf(InsufficientDataError);
        if (failure instanceof InsufficientDataError) {
            expect(failure.required).toBe(10);
            expect(failure.available).toBe(4);
            expect(failure.message).toBe('Not enough training data. Need at least 10 samples, got 4.');
        }
        expect(await modelStore.load()).toEqual(existing);
    });

    it('switches scoring to the model once trained', async () => {
        const store = await storeWithHistory();
        const modelStore = new InMemoryModelStore();
        const scoring = new ScoringService(store, modelStore);

        expect((await scoring.status()).activeStrategy).toBe('heuristic');
        expect((await scoring.score('S1', 'C1')).strategy).toBe('heuristic');

        await new ModelTrainer(store, modelStore, TRAINING).train();

        const status = await scoring.status();
        expect(status.modelTrained).toBe(true);
        expect(status.activeStrategy).toBe('model');
        expect(status.samples).toBe(4);
        expect((await scoring.score('S1', 'C1')).strategy).toBe('model');
    });
});
