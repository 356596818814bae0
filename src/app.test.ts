import { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp, createServices } from './app';
import { InMemoryModelStore } from './scoring/modelStore';
import { InMemoryStore } from './store/inMemoryStore';
import { HOME_DEPARTMENT, makeCourse, makeStore, makeStudent } from './testing/builders';

function listen(store: InMemoryStore): Promise<Server> {
    const services = createServices(store, new InMemoryModelStore(), { minSamples: 3, folds: 2, lambda: 1 });
    const app = createApp(services);
    return new Promise(resolve => {
        const server = app.listen(0, () => resolve(server));
    });
}

function close(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close(err => (err ? reject(err) : resolve()));
    });
}

describe('HTTP API', () => {
    let store: InMemoryStore;
    let server: Server;
    let baseUrl: string;

    beforeEach(async () => {
        store = makeStore([
            makeCourse({ id: 'C1', totalSeats: 1 }),
            makeCourse({ id: 'C2', totalSeats: 1 }),
            makeCourse({ id: 'C-OWN', departmentId: HOME_DEPARTMENT })
        ]);
        store.addStudent(makeStudent({ id: 'S1', qualifyingMarks: 90 }));
        store.addStudent(makeStudent({ id: 'S2', qualifyingMarks: 80 }));
        store.addStudent(makeStudent({ id: 'S3', qualifyingMarks: 70 }));

        server = await listen(store);
        const address = server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('Server is not listening on a TCP port');
        }
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterEach(async () => {
        await close(server);
    });

    function request(method: string, path: string, body?: unknown): Promise<Response> {
        return fetch(`${baseUrl}${path}`, {
            method,
            headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
            body: body === undefined ? undefined : JSON.stringify(body)
        });
    }

    it('reports health', async () => {
        const res = await request('GET', '/health');

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({
            status: 'healthy',
            batches: 1,
            students: 3,
            courses: 3,
            allocations: 0
        });
    });

    it('runs an allocation and serves its results', async () => {
        expect((await request('PUT', '/students/S1/preferences', { courseIds: ['C1', 'C2'] })).status).toBe(200);
        expect((await request('PUT', '/students/S2/preferences', { courseIds: ['C1', 'C2'] })).status).toBe(200);

        const run = await request('POST', '/batches/B1/allocation');
        expect(run.status).toBe(200);
        expect(await run.json()).toMatchObject({
            batchId: 'B1',
            totalStudents: 3,
            counts: { ALLOCATED: 2, WAITLISTED: 0, NOT_ALLOCATED: 1 }
        });

        const s2 = await request('GET', '/students/S2/allocation');
        expect(await s2.json()).toMatchObject({
            allocation: { outcome: 'ALLOCATED', courseId: 'C2', preferenceRank: 2, seatBucket: 'UNRESERVED' }
        });

        const c1 = await request('GET', '/courses/C1/students');
        expect(await c1.json()).toMatchObject({ count: 1, students: [{ studentId: 'S1', preferenceRank: 1 }] });

        const unallocated = await request('GET', '/batches/B1/unallocated');
        expect(await unallocated.json()).toEqual({
            count: 1,
            students: [{ id: 'S3', name: 'Student S3', category: 'GENERAL' }]
        });

        const seats = await request('GET', '/courses/C2/seats');
        expect(await seats.json()).toMatchObject({
            seats: { batchId: 'B1', totalAllocated: 1, totalRemaining: 0 }
        });

        const report = await request('GET', '/batches/B1/allocation/report');
        expect(await report.json()).toMatchObject({
            report: { summary: { allocated: 2, waitlisted: 0, notAllocated: 1 } }
        });
    });

    it('answers 404 for a student without a recorded outcome', async () => {
        const res = await request('GET', '/students/S1/allocation');

        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({ error: 'No allocation recorded for this student', code: 'NOT_FOUND' });
    });

    it('answers 404 for an unknown batch', async () => {
        const res = await request('POST', '/batches/NOPE/allocation');

        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({
            error: 'Batch not found',
            code: 'NOT_FOUND',
            context: { resource: 'Batch', id: 'NOPE' }
        });
    });

    it('names the batch and course behind a bad quota', async () => {
        store.addCourse(makeCourse({ id: 'C2', totalSeats: 1, quotaPercentages: { GENERAL: 90, ST: 20 } }));

        const res = await request('POST', '/batches/B1/allocation');

        expect(res.status).toBe(400);
        expect(await res.json()).toMatchObject({
            code: 'CONFIGURATION_ERROR',
            context: { batchId: 'B1', courseId: 'C2' }
        });
    });

    it('validates submitted preferences', async () => {
        const empty = await request('PUT', '/students/S1/preferences', { courseIds: [] });
        expect(empty.status).toBe(400);
        expect(await empty.json()).toMatchObject({ error: 'Invalid input', code: 'VALIDATION_ERROR' });

        const own = await request('PUT', '/students/S1/preferences', { courseIds: ['C-OWN'] });
        expect(own.status).toBe(400);
        expect(await own.json()).toMatchObject({
            error: 'Course C-OWN is not available for this batch',
            code: 'VALIDATION_ERROR'
        });
    });

    it('recommends available courses with the heuristic until a model is trained', async () => {
        const status = await request('GET', '/scoring/status');
        expect(await status.json()).toMatchObject({ modelTrained: false, activeStrategy: 'heuristic' });

        const res = await request('GET', '/students/S1/recommendations');
        expect(await res.json()).toEqual({
            recommendations: [
                { courseId: 'C1', courseCode: 'C1', courseName: 'Course C1', strategy: 'heuristic', score: 40, label: 'Challenging' },
                { courseId: 'C2', courseCode: 'C2', courseName: 'Course C2', strategy: 'heuristic', score: 40, label: 'Challenging' }
            ]
        });
    });

    it('refuses to train without enough history', async () => {
        const res = await request('POST', '/scoring/train');

        expect(res.status).toBe(422);
        expect(await res.json()).toMatchObject({
            code: 'INSUFFICIENT_DATA',
            context: { required: 3, available: 0 }
        });
    });

    it('answers 404 for unknown routes', async () => {
        const res = await request('GET', '/nowhere');
        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({ error: 'Route GET /nowhere not found', code: 'NOT_FOUND' });
    });
});
