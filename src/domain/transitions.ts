import type { BookingStatus } from '../types';
import { InvalidTransitionError } from './errors';

/**
 * Legal booking status transitions
 *
 * - PENDING → CONFIRMED | CANCELLED
 * - CONFIRMED → IN_PROGRESS | CANCELLED | NO_SHOW
 * - IN_PROGRESS → COMPLETED
 * - COMPLETED, CANCELLED, NO_SHOW → (terminal)
 */
export const TRANSITIONS: Readonly<Record<BookingStatus, readonly BookingStatus[]>> = {
    PENDING: ['CONFIRMED', 'CANCELLED'],
    CONFIRMED: ['IN_PROGRESS', 'CANCELLED', 'NO_SHOW'],
    IN_PROGRESS: ['COMPLETED'],
    COMPLETED: [],
    CANCELLED: [],
    NO_SHOW: [],
};

/** Statuses that hold a resource. */
export const ACTIVE_STATUSES: readonly BookingStatus[] = ['PENDING', 'CONFIRMED', 'IN_PROGRESS'];

export const isTerminal = (status: BookingStatus): boolean => TRANSITIONS[status].length === 0;

export const canTransition = (from: BookingStatus, to: BookingStatus): boolean =>
    TRANSITIONS[from].includes(to);

export function assertTransition(from: BookingStatus, to: BookingStatus): void {
    if (!canTransition(from, to)) {
        throw new InvalidTransitionError(`Cannot transition booking from ${from} to ${to}`);
    }
}
