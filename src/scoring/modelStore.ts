// src/scoring/modelStore.ts

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { logWarning } from '../logger';
import { FEATURE_NAMES } from './features';

export const MODEL_ARTIFACT_VERSION = 1;

const trainedModelSchema = z.object({
    version: z.literal(MODEL_ARTIFACT_VERSION),
    trainedAt: z.string().datetime(),
    featureNames: z.array(z.string()),
    means: z.array(z.number()),
    scales: z.array(z.number()),
    coefficients: z.array(z.number()),
    intercept: z.number(),
    lambda: z.number().nonnegative(),
    samples: z.number().int().nonnegative(),
    cvR2: z.number().nullable(),
    featureImportances: z.record(z.number())
}).superRefine((model, ctx) => {
    // Parameters must line up with the feature vector the scorer builds
    const width = FEATURE_NAMES.length;

    if (model.featureNames.length !== width || model.featureNames.some((name, i) => name !== FEATURE_NAMES[i])) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['featureNames'],
            message: `Expected features ${FEATURE_NAMES.join(', ')}`
        });
    }

    for (const key of ['means', 'scales', 'coefficients'] as const) {
        if (model[key].length !== width) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: [key],
                message: `Expected ${width} values, got ${model[key].length}`
            });
        }
    }

    model.scales.forEach((scale, i) => {
        if (scale <= 0) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['scales', i],
                message: 'Scale must be positive'
            });
        }
    });
});

/**
 * Persisted suitability model, tagged with its format version and training time
 */
export type TrainedModel = z.infer<typeof trainedModelSchema>;

/**
 * Where the trained model lives between training and scoring
 */
export interface ModelStore {
    /**
     * The current model, or null if none has been trained
     */
    load(): Promise<TrainedModel | null>;
    save(model: TrainedModel): Promise<void>;
}

/**
 * Model kept as a JSON file on disk
 *
 * Writes go to a sibling temp file first and are renamed into place, so a
 * reader never sees half an artifact; of concurrent saves the last rename
 * wins. An unreadable or mis-shaped artifact counts as no model.
 */
export class FileModelStore implements ModelStore {
    readonly path: string;

    constructor(path: string) {
        this.path = path;
    }

    async load(): Promise<TrainedModel | null> {
        let raw: string;
        try {
            raw = await readFile(this.path, 'utf-8');
        } catch (err) {
            if (isMissingFile(err)) {
                return null;
            }
            throw err;
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (err) {
            logWarning(`Ignoring model artifact ${this.path}: ${err instanceof Error ? err.message : String(err)}`);
            return null;
        }

        const parsed = trainedModelSchema.safeParse(json);
        if (!parsed.success) {
            logWarning(`Ignoring model artifact ${this.path}: ${parsed.error.issues.length} schema issue(s)`);
            return null;
        }
        return parsed.data;
    }

    async save(model: TrainedModel): Promise<void> {
        const validated = trainedModelSchema.parse(model);
        // One temp file per save; concurrent saves must not rename each other's file
        const tempPath = `${this.path}.${Date.now()}-${Math.random().toString(36).slice(2, 11)}.tmp`;

        await mkdir(dirname(this.path), { recursive: true });
        await writeFile(tempPath, JSON.stringify(validated, null, 2), 'utf-8');
        await rename(tempPath, this.path);
    }
}

export class InMemoryModelStore implements ModelStore {
    private model: TrainedModel | null;

    constructor(model: TrainedModel | null = null) {
        this.model = model;
    }

    async load(): Promise<TrainedModel | null> {
        return this.model;
    }

    async save(model: TrainedModel): Promise<void> {
        this.model = trainedModelSchema.parse(model);
    }
}

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
