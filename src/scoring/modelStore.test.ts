import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { makeFlatModel } from '../testing/builders';
import { FileModelStore, InMemoryModelStore } from './modelStore';

describe('FileModelStore', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'seat-model-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('has no model before anything is saved', async () => {
        const store = new FileModelStore(join(dir, 'model.json'));
        expect(await store.load()).toBeNull();
    });

    it('reads back what it saved, creating missing directories', async () => {
        const path = join(dir, 'nested', 'model.json');
        const store = new FileModelStore(path);
        const model = makeFlatModel(64, { cvR2: null });

        await store.save(model);

        expect(await store.load()).toEqual(model);
        const onDisk: unknown = JSON.parse(await readFile(path, 'utf-8'));
        expect(onDisk).toMatchObject({ version: 1, intercept: 64 });
    });

    it('treats a corrupt artifact as no model', async () => {
        const path = join(dir, 'model.json');
        await writeFile(path, '{ not json', 'utf-8');

        expect(await new FileModelStore(path).load()).toBeNull();
    });

    it('treats an artifact of another format version as no model', async () => {
        const path = join(dir, 'model.json');
        await writeFile(path, JSON.stringify({ ...makeFlatModel(50), version: 99 }), 'utf-8');

        expect(await new FileModelStore(path).load()).toBeNull();
    });

    it('treats an artifact whose parameters do not fit the feature vector as no model', async () => {
        const path = join(dir, 'model.json');
        const misShaped = { ...makeFlatModel(50), means: [0], scales: [1] };
        await writeFile(path, JSON.stringify(misShaped), 'utf-8');

        expect(await new FileModelStore(path).load()).toBeNull();
    });

    it('keeps every concurrent save intact and leaves no temp files', async () => {
        const path = join(dir, 'model.json');
        const store = new FileModelStore(path);
        const models = Array.from({ length: 8 }, (_, i) => makeFlatModel(50 + i));

        const results = await Promise.allSettled(models.map(m => store.save(m)));

        expect(results.every(r => r.status === 'fulfilled')).toBe(true);
        const loaded = await store.load();
        expect(models.map(m => m.intercept)).toContain(loaded?.intercept);
        expect(await readdir(dir)).toEqual(['model.json']);
    });

    it('refuses to save a malformed model', async () => {
        const store = new FileModelStore(join(dir, 'model.json'));
        await expect(store.save(makeFlatModel(50, { samples: -1 }))).rejects.toThrow();
        expect(await store.load()).toBeNull();
    });
});

describe('InMemoryModelStore', () => {
    it('rejects parameters that do not match the feature list', async () => {
        const store = new InMemoryModelStore();
        const base = makeFlatModel(50);

        await expect(store.save({ ...base, means: [0], scales: [1] })).rejects.toThrow();
        await expect(store.save({ ...base, featureNames: [...base.featureNames].reverse() })).rejects.toThrow();
        await expect(store.save({ ...base, scales: base.scales.map(() => 0) })).rejects.toThrow();
        expect(await store.load()).toBeNull();
    });

    it('holds the last saved model', async () => {
        const store = new InMemoryModelStore();
        expect(await store.load()).toBeNull();

        await store.save(makeFlatModel(70));
        expect((await store.load())?.intercept).toBe(70);
    });
});
