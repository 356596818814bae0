// src/app.ts

import express, { Express, NextFunction, Request, Response } from 'express';
import { AppConfig, DEFAULT_TRAINING_CONFIG, loadConfig, TrainingConfig } from './config';
import { AllocationEngine } from './engine/allocationEngine';
import { log, logError } from './logger';
import { createBatchRoutes } from './routes/batchRoutes';
import { createCourseRoutes } from './routes/courseRoutes';
import { errorHandler } from './routes/errorHandler';
import { createScoringRoutes } from './routes/scoringRoutes';
import { createStudentRoutes } from './routes/studentRoutes';
import { FileModelStore, ModelStore } from './scoring/modelStore';
import { ModelTrainer } from './scoring/modelTrainer';
import { ScoringService } from './scoring/scoringService';
import { AllocationQueryService } from './services/allocationQueries';
import { PreferenceService } from './services/preferenceService';
import { InMemoryStore } from './store/inMemoryStore';
import { loadSeedFile } from './store/seedLoader';

/**
 * Express application setup
 *
 * Services wired around one store:
 * - allocationEngine: batch allocation runs (serialized per batch)
 * - queries: read views over committed allocations
 * - preferences: preference submission
 * - scoring / trainer: suitability scoring and model training
 */

export interface AppServices {
    store: InMemoryStore;
    allocationEngine: AllocationEngine;
    queries: AllocationQueryService;
    preferences: PreferenceService;
    scoring: ScoringService;
    trainer: ModelTrainer;
}

export function createServices(
    store: InMemoryStore,
    modelStore: ModelStore,
    training: TrainingConfig = DEFAULT_TRAINING_CONFIG
): AppServices {
    return {
        store,
        allocationEngine: new AllocationEngine(store),
        queries: new AllocationQueryService(store),
        preferences: new PreferenceService(store),
        scoring: new ScoringService(store, modelStore),
        trainer: new ModelTrainer(store, modelStore, training)
    };
}

export function createApp(services: AppServices, options: { logRequests?: boolean } = {}): Express {
    const app = express();

    // Middleware
    app.use(express.json());

    if (options.logRequests) {
        app.use((req: Request, _res: Response, next: NextFunction) => {
            log(`${req.method} ${req.path}`);
            next();
        });
    }

    // Routes
    app.use('/batches', createBatchRoutes(services.allocationEngine, services.queries));
    app.use('/students', createStudentRoutes(services.preferences, services.queries, services.scoring));
    app.use('/courses', createCourseRoutes(services.queries));
    app.use('/scoring', createScoringRoutes(services.trainer, services.scoring));

    // Health check
    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'healthy',
            batches: services.store.batches.size,
            students: services.store.students.size,
            courses: services.store.courses.size,
            allocations: services.store.countAllocations()
        });
    });

    app.use((req: Request, res: Response) => {
        res.status(404).json({ error: `Route ${req.method} ${req.path} not found`, code: 'NOT_FOUND' });
    });

    // Error handling
    app.use(errorHandler);

    return app;
}

async function start(config: AppConfig): Promise<void> {
    const store = new InMemoryStore();

    if (config.seedFile) {
        const summary = await loadSeedFile(store, config.seedFile);
        log(`Seeded ${summary.students} students, ${summary.courses} courses, ${summary.batches} batches from ${config.seedFile}`);
    }

    const services = createServices(store, new FileModelStore(config.modelPath), config.training);
    const app = createApp(services, { logRequests: config.logRequests });

    app.listen(config.port, () => {
        log(`Course allocation service running on port ${config.port}`);
    });
}

// Start server
if (require.main === module) {
    start(loadConfig()).catch(err => {
        logError('Failed to start', err);
        process.exit(1);
    });
}
