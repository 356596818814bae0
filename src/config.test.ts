import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';

describe('loadConfig', () => {
    it('falls back to defaults', () => {
        expect(loadConfig({})).toEqual({
            port: 3000,
            modelPath: 'model/suitability-model.json',
            seedFile: null,
            training: { minSamples: 5, folds: 5, lambda: 1 },
            logRequests: false
        });
    });

    it('reads values from the environment', () => {
        const config = loadConfig({
            PORT: '8080',
            MODEL_PATH: '/var/lib/seats/model.json',
            SEED_FILE: 'data/demo-seed.json',
            MIN_TRAINING_SAMPLES: '20',
            CV_FOLDS: '3',
            RIDGE_LAMBDA: '0.5',
            LOG_REQUESTS: '1'
        });

        expect(config).toEqual({
            port: 8080,
            modelPath: '/var/lib/seats/model.json',
            seedFile: 'data/demo-seed.json',
            training: { minSamples: 20, folds: 3, lambda: 0.5 },
            logRequests: true
        });
    });

    it('lists every invalid variable', () => {
        expect(() => loadConfig({ PORT: 'abc', CV_FOLDS: '1' })).toThrow(/PORT: .*; CV_FOLDS: /);
    });
});
