import { addMinutes, areIntervalsOverlapping } from 'date-fns';
import type { TimeSlot } from '../types';

/** Idle time kept free before and after every booking on the same resource. */
export const BUFFER_MINUTES = 15;

/** Granularity used when scanning for alternative start times. */
export const SLOT_MINUTES = 15;

/**
 * Interval occupied by a booking: [start, start + duration]
 */
export const bookingWindow = (start: Date, durationMinutes: number): TimeSlot => ({
    start,
    end: addMinutes(start, durationMinutes)
});

/**
 * Widen a window by the inter-booking buffer on both ends
 */
export const expandWindow = (window: TimeSlot, bufferMinutes: number = BUFFER_MINUTES): TimeSlot => ({
    start: addMinutes(window.start, -bufferMinutes),
    end: addMinutes(window.end, bufferMinutes)
});

/**
 * Closed-interval overlap test
 *
 * Windows that merely touch (a.end equal to b.start) DO overlap.
 */
export const windowsOverlap = (a: TimeSlot, b: TimeSlot): boolean =>
    areIntervalsOverlapping(a, b, { inclusive: true });

/**
 * Whether a new booking window clashes with an existing one once the buffer is applied
 */
export const conflictsWith = (requested: TimeSlot, existing: TimeSlot): boolean =>
    windowsOverlap(expandWindow(requested), existing);

/**
 * UTC calendar day of an instant, used for daily capacity counting
 *
 * @returns Date in YYYY-MM-DD format
 */
export const utcDay = (instant: Date): string => instant.toISOString().slice(0, 10);

/**
 * Candidate start times around a requested instant
 *
 * Alternates forward and backward in `stepMinutes` steps until `horizonMinutes`
 * is covered, nearest first; at equal distance the earlier instant comes first.
 *
 * Example: requested 10:00, step 15 → 09:45, 10:15, 09:30, 10:30, ...
 */
export function scanAround(requested: Date, horizonMinutes: number, stepMinutes: number = SLOT_MINUTES): Date[] {
    const starts: Date[] = [];

    for (let offset = stepMinutes; offset <= horizonMinutes; offset += stepMinutes) {
        starts.push(addMinutes(requested, -offset));
        starts.push(addMinutes(requested, offset));
    }

    return starts;
}
