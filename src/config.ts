// src/config.ts

import { z } from 'zod';

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform(v => v === 'true' || v === '1');

const envSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    MODEL_PATH: z.string().min(1).default('model/suitability-model.json'),
    SEED_FILE: z.string().min(1).optional(),
    MIN_TRAINING_SAMPLES: z.coerce.number().int().min(1).default(5),
    CV_FOLDS: z.coerce.number().int().min(2).default(5),
    RIDGE_LAMBDA: z.coerce.number().nonnegative().default(1),
    LOG_REQUESTS: booleanFlag.default('false')
});

export interface AppConfig {
    port: number;
    modelPath: string;
    seedFile: string | null;
    training: TrainingConfig;
    logRequests: boolean;
}

export interface TrainingConfig {
    minSamples: number;
    folds: number;
    lambda: number;
}

export const DEFAULT_TRAINING_CONFIG: TrainingConfig = {
    minSamples: 5,
    folds: 5,
    lambda: 1
};

/**
 * Read configuration from environment variables
 *
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const result = envSchema.safeParse(env);

    if (!result.success) {
        const problems = result.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${problems}`);
    }

    const parsed = result.data;
    return {
        port: parsed.PORT,
        modelPath: parsed.MODEL_PATH,
        seedFile: parsed.SEED_FILE ?? null,
        training: {
            minSamples: parsed.MIN_TRAINING_SAMPLES,
            folds: parsed.CV_FOLDS,
            lambda: parsed.RIDGE_LAMBDA
        },
        logRequests: parsed.LOG_REQUESTS
    };
}
