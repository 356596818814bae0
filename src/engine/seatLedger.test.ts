import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../models/errors';
import { UNRESERVED } from '../models/SeatState';
import { ReservationCategory } from '../models/Student';
import { makeCourse } from '../testing/builders';
import { availableFor, claimSeat, createSeatState, totalRemaining } from './seatLedger';

describe('seat ledger', () => {
    it('builds seat state from the course quota', () => {
        const state = createSeatState(makeCourse({ id: 'C1', totalSeats: 10, quotaPercentages: { GENERAL: 50, OBC: 25 } }));

        expect(state.courseId).toBe('C1');
        expect(state.remaining.GENERAL).toBe(5);
        expect(state.remaining.OBC).toBe(2);
        expect(state.unreservedRemaining).toBe(3);
        expect(totalRemaining(state)).toBe(10);
    });

    it('takes the category seat first, then the unreserved pool, then nothing', () => {
        const state = createSeatState(makeCourse({ id: 'C1', totalSeats: 2, quotaPercentages: { SC: 50 } }));

        expect(claimSeat(state, ReservationCategory.SC)).toBe(ReservationCategory.SC);
        expect(claimSeat(state, ReservationCategory.SC)).toBe(UNRESERVED);
        expect(claimSeat(state, ReservationCategory.SC)).toBeNull();
        expect(state.remaining.SC).toBe(0);
        expect(state.unreservedRemaining).toBe(0);
    });

    it('does not let a category draw on another category quota', () => {
        const state = createSeatState(makeCourse({ id: 'C1', totalSeats: 2, quotaPercentages: { ST: 100 } }));

        expect(availableFor(state, ReservationCategory.GENERAL)).toBe(0);
        expect(claimSeat(state, ReservationCategory.GENERAL)).toBeNull();
        expect(availableFor(state, ReservationCategory.ST)).toBe(2);
    });

    it('surfaces malformed quotas', () => {
        expect(() => createSeatState(makeCourse({ id: 'C1', quotaPercentages: { GENERAL: 80, SC: 30 } })))
            .toThrow(ConfigurationError);
    });
});
