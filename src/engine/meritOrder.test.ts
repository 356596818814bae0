import { describe, expect, it } from 'vitest';
import { makeStudent } from '../testing/builders';
import { sortByMerit } from './meritOrder';

describe('merit order', () => {
    it('orders by marks descending and breaks ties by id ascending', () => {
        const students = [
            makeStudent({ id: 'S3', qualifyingMarks: 80 }),
            makeStudent({ id: 'S1', qualifyingMarks: 75 }),
            makeStudent({ id: 'S2', qualifyingMarks: 80 }),
            makeStudent({ id: 'S0', qualifyingMarks: 91.5 })
        ];

        expect(sortByMerit(students).map(s => s.id)).toEqual(['S0', 'S2', 'S3', 'S1']);
    });

    it('leaves the input untouched', () => {
        const students = [makeStudent({ id: 'B', qualifyingMarks: 1 }), makeStudent({ id: 'A', qualifyingMarks: 2 })];
        sortByMerit(students);
        expect(students.map(s => s.id)).toEqual(['B', 'A']);
    });
});
