import { addMinutes, differenceInMilliseconds, isBefore } from 'date-fns';
import type { BookingStatus } from '../types';

/** Minutes after the scheduled start before a booking may be marked NO_SHOW. */
export const NO_SHOW_GRACE_MINUTES = 30;

/** Overtime rate in cents per minute (1.00 currency unit). */
export const OVERTIME_RATE_PER_MINUTE = 100;

const MS_PER_HOUR = 60 * 60 * 1000;

/**
 * Hours between the cancellation instant and the scheduled start
 *
 * Negative once the scheduled start has passed.
 */
export const noticeHours = (scheduledAt: Date, now: Date): number =>
    differenceInMilliseconds(scheduledAt, now) / MS_PER_HOUR;

/**
 * Cancellation fee percentage for a given notice
 *
 * Tiers are inclusive on their lower bound:
 *   - 24h or more: 0%
 *   - 6h up to 24h: 25%
 *   - 2h up to 6h: 50%
 *   - under 2h (or already started): 100%
 *
 * @param hours - Notice in hours, see {@link noticeHours}
 * @returns Percentage of the total price owed
 */
export const cancellationFeePercent = (hours: number): number => {
    if (hours >= 24) return 0;
    if (hours >= 6) return 25;
    if (hours >= 2) return 50;
    return 100;
};

/**
 * Share of an amount in cents, rounded to the nearest cent
 */
export const percentOf = (amount: number, percent: number): number =>
    Math.round((amount * percent) / 100);

export const cancellationFee = (totalPrice: number, hours: number): number =>
    percentOf(totalPrice, cancellationFeePercent(hours));

/**
 * Whether a booking may be marked NO_SHOW
 *
 * Only CONFIRMED bookings qualify, and only once `now` has reached the
 * scheduled start plus the grace period.
 */
export const isNoShowEligible = (
    scheduledAt: Date,
    now: Date,
    status: BookingStatus,
    gracePeriodMinutes: number = NO_SHOW_GRACE_MINUTES
): boolean => {
    if (status !== 'CONFIRMED') return false;
    return !isBefore(now, addMinutes(scheduledAt, gracePeriodMinutes));
};

/** No-shows owe the full price. */
export const noShowFee = (totalPrice: number): number => totalPrice;

/**
 * Overtime charge in cents
 *
 * @param minutesOverPlanned - Actual minus planned duration; zero or negative means no charge
 */
export const overtimeCharge = (minutesOverPlanned: number): number =>
    Math.round(Math.max(0, minutesOverPlanned) * OVERTIME_RATE_PER_MINUTE);

/**
 * Render cents as a fixed-point amount with two fraction digits
 *
 * @example formatMoney(2500) // "25.00"
 */
export const formatMoney = (cents: number): string => (cents / 100).toFixed(2);
