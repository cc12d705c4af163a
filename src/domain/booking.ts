import { addDays, differenceInMilliseconds, isAfter, isValid, parseISO } from 'date-fns';
import type {
    BookingKind,
    BookingServiceLine,
    BookingSnapshot,
    BookingStatus,
    GeoPoint,
    TimeSlot,
    VehicleSizeClass
} from '../types';
import { InvalidInputError, InvalidTransitionError } from './errors';
import { isValidLocation } from './geo';
import {
    cancellationFee,
    isNoShowEligible,
    noShowFee,
    noticeHours,
    overtimeCharge
} from './policy';
import { assertTransition, isTerminal, ACTIVE_STATUSES } from './transitions';
import { bookingWindow } from './windows';

export const MIN_SERVICES = 1;
export const MAX_SERVICES = 10;
export const MIN_TOTAL_DURATION = 30;
export const MAX_TOTAL_DURATION = 240;
/** 10000.00 in cents */
export const MAX_TOTAL_PRICE = 1_000_000;
export const MAX_ADVANCE_DAYS = 90;
export const MIN_RESCHEDULE_NOTICE_HOURS = 2;
export const MAX_FEEDBACK_LENGTH = 1000;
export const MAX_NOTES_LENGTH = 1000;

/** Length in characters, not UTF-16 code units */
const charCount = (text: string): number => [...text].length;

export interface CreateBookingProps {
    id: string;
    customerId: string;
    vehicleId: string;
    vehicleSizeClass: VehicleSizeClass;
    services: BookingServiceLine[];
    scheduledAt: Date;
    kind: BookingKind;
    location?: GeoPoint;
    notes?: string;
}

interface Totals {
    price: number;
    duration: number;
}

const sumTotals = (services: BookingServiceLine[]): Totals => ({
    price: services.reduce((sum, s) => sum + s.price, 0),
    duration: services.reduce((sum, s) => sum + s.durationMinutes, 0)
});

function validateServices(services: BookingServiceLine[]): Totals {
    if (services.length < MIN_SERVICES) {
        throw new InvalidInputError(`At least ${MIN_SERVICES} service is required`, 'services');
    }
    if (services.length > MAX_SERVICES) {
        throw new InvalidInputError(`At most ${MAX_SERVICES} services are allowed`, 'services');
    }
    const ids = new Set(services.map(s => s.serviceId));
    if (ids.size !== services.length) {
        throw new InvalidInputError('Duplicate services are not allowed', 'services');
    }
    for (const s of services) {
        if (!Number.isInteger(s.price) || s.price < 0) {
            throw new InvalidInputError(`Service ${s.serviceId} has an invalid price`, 'services');
        }
        if (!Number.isInteger(s.durationMinutes) || s.durationMinutes <= 0) {
            throw new InvalidInputError(`Service ${s.serviceId} has an invalid duration`, 'services');
        }
    }

    const totals = sumTotals(services);
    if (totals.duration < MIN_TOTAL_DURATION || totals.duration > MAX_TOTAL_DURATION) {
        throw new InvalidInputError(
            `Total duration must be between ${MIN_TOTAL_DURATION} and ${MAX_TOTAL_DURATION} minutes, got ${totals.duration}`,
            'services'
        );
    }
    if (totals.price > MAX_TOTAL_PRICE) {
        throw new InvalidInputError('Total price cannot exceed 10000.00', 'services');
    }
    return totals;
}

function validateSchedule(scheduledAt: Date, now: Date): void {
    if (!isValid(scheduledAt)) {
        throw new InvalidInputError('Scheduled time is not a valid instant', 'scheduledAt');
    }
    if (!isAfter(scheduledAt, now)) {
        throw new InvalidInputError('Scheduled time must be in the future', 'scheduledAt');
    }
    if (isAfter(scheduledAt, addDays(now, MAX_ADVANCE_DAYS))) {
        throw new InvalidInputError(`Cannot schedule more than ${MAX_ADVANCE_DAYS} days in advance`, 'scheduledAt');
    }
}

/**
 * Location rule shared by bookings and availability queries
 *
 * MOBILE needs a coordinate in range; STATIONARY takes none.
 */
export function validateLocation(kind: BookingKind, location: GeoPoint | undefined): void {
    if (kind === 'MOBILE') {
        if (!location) {
            throw new InvalidInputError('Customer location is required for mobile bookings', 'location');
        }
        if (!isValidLocation(location)) {
            throw new InvalidInputError('Latitude must be within [-90, 90] and longitude within [-180, 180]', 'location');
        }
    } else if (location) {
        throw new InvalidInputError('Customer location is only accepted for mobile bookings', 'location');
    }
}

function validateNotes(notes: string): void {
    if (charCount(notes) > MAX_NOTES_LENGTH) {
        throw new InvalidInputError(`Notes cannot exceed ${MAX_NOTES_LENGTH} characters`, 'notes');
    }
}

const toIso = (d: Date | undefined): string | undefined => d?.toISOString();
const fromIso = (s: string | undefined): Date | undefined => (s === undefined ? undefined : parseISO(s));

/**
 * Booking aggregate
 *
 * Owns the status machine and every invariant on services, schedule and totals.
 * It never reads the clock or touches storage: callers pass `now` and persist
 * the result through the repository.
 */
export class Booking {
    private constructor(
        readonly id: string,
        readonly customerId: string,
        readonly vehicleId: string,
        readonly vehicleSizeClass: VehicleSizeClass,
        readonly kind: BookingKind,
        readonly location: GeoPoint | undefined,
        readonly createdAt: Date,
        private _services: BookingServiceLine[],
        private _scheduledAt: Date,
        private _totalPrice: number,
        private _totalDurationMinutes: number,
        private _status: BookingStatus,
        private _notes: string,
        private _updatedAt: Date,
        readonly version: number
    ) { }

    private _resourceId?: string;
    private _actualStartAt?: Date;
    private _actualEndAt?: Date;
    private _cancellationFee?: number;
    private _overtimeCharge?: number;
    private _cancelledAt?: Date;
    private _cancelledBy?: string;
    private _cancellationReason?: string;
    private _rating?: number;
    private _feedback?: string;

    /**
     * Create a PENDING booking
     *
     * Totals are the sums of the service lines. No resource is assigned yet;
     * the orchestrator allocates one before the booking is persisted.
     *
     * @throws {InvalidInputError} Any invariant on services, totals, schedule or location is violated
     */
    static create(props: CreateBookingProps, now: Date): Booking {
        const totals = validateServices(props.services);
        validateSchedule(props.scheduledAt, now);
        validateLocation(props.kind, props.location);
        validateNotes(props.notes ?? '');

        return new Booking(
            props.id,
            props.customerId,
            props.vehicleId,
            props.vehicleSizeClass,
            props.kind,
            props.location ? { lat: props.location.lat, lng: props.location.lng } : undefined,
            now,
            props.services.map(s => ({ ...s })),
            props.scheduledAt,
            totals.price,
            totals.duration,
            'PENDING',
            props.notes ?? '',
            now,
            0
        );
    }

    static fromSnapshot(s: BookingSnapshot): Booking {
        const booking = new Booking(
            s.id,
            s.customerId,
            s.vehicleId,
            s.vehicleSizeClass,
            s.kind,
            s.location ? { ...s.location } : undefined,
            parseISO(s.createdAt),
            s.services.map(line => ({ ...line })),
            parseISO(s.scheduledAt),
            s.totalPrice,
            s.totalDurationMinutes,
            s.status,
            s.notes,
            parseISO(s.updatedAt),
            s.version
        );
        booking._resourceId = s.resourceId;
        booking._actualStartAt = fromIso(s.actualStartAt);
        booking._actualEndAt = fromIso(s.actualEndAt);
        booking._cancellationFee = s.cancellationFee;
        booking._overtimeCharge = s.overtimeCharge;
        booking._cancelledAt = fromIso(s.cancelledAt);
        booking._cancelledBy = s.cancelledBy;
        booking._cancellationReason = s.cancellationReason;
        booking._rating = s.rating;
        booking._feedback = s.feedback;
        return booking;
    }

    get status(): BookingStatus { return this._status; }
    get scheduledAt(): Date { return this._scheduledAt; }
    get services(): readonly BookingServiceLine[] { return this._services; }
    get totalPrice(): number { return this._totalPrice; }
    get totalDurationMinutes(): number { return this._totalDurationMinutes; }
    get resourceId(): string | undefined { return this._resourceId; }
    get actualStartAt(): Date | undefined { return this._actualStartAt; }
    get actualEndAt(): Date | undefined { return this._actualEndAt; }
    get cancellationFee(): number | undefined { return this._cancellationFee; }
    get overtimeCharge(): number | undefined { return this._overtimeCharge; }
    get rating(): number | undefined { return this._rating; }
    get feedback(): string | undefined { return this._feedback; }
    get updatedAt(): Date { return this._updatedAt; }

    /** Scheduled interval used for commitments */
    get window(): TimeSlot {
        return bookingWindow(this._scheduledAt, this._totalDurationMinutes);
    }

    get isActive(): boolean {
        return ACTIVE_STATUSES.includes(this._status);
    }

    get isTerminal(): boolean {
        return isTerminal(this._status);
    }

    assignResource(resourceId: string): void {
        if (!this.isActive) {
            throw new InvalidTransitionError(`Cannot assign a resource to a ${this._status} booking`);
        }
        this._resourceId = resourceId;
    }

    confirm(now: Date): void {
        assertTransition(this._status, 'CONFIRMED');
        this.moveTo('CONFIRMED', now);
    }

    start(now: Date): void {
        assertTransition(this._status, 'IN_PROGRESS');
        this._actualStartAt = now;
        this.moveTo('IN_PROGRESS', now);
    }

    /**
     * Finish the service and charge overtime when it ran past the planned duration
     */
    complete(now: Date): void {
        assertTransition(this._status, 'COMPLETED');
        const startedAt = this._actualStartAt ?? this._scheduledAt;
        const actualMinutes = differenceInMilliseconds(now, startedAt) / 60000;
        this._actualEndAt = now;
        this._overtimeCharge = overtimeCharge(actualMinutes - this._totalDurationMinutes);
        this.moveTo('COMPLETED', now);
    }

    /**
     * Cancel with a fee based on the notice left before the scheduled start
     *
     * @param actor - Free-form identifier of who cancelled (customer id, staff id, "system")
     */
    cancel(now: Date, actor: string, reason?: string): void {
        assertTransition(this._status, 'CANCELLED');
        if (!actor.trim()) {
            throw new InvalidInputError('Cancelling actor is required', 'actor');
        }
        this._cancellationFee = cancellationFee(this._totalPrice, noticeHours(this._scheduledAt, now));
        this._cancelledAt = now;
        this._cancelledBy = actor;
        this._cancellationReason = reason;
        this.moveTo('CANCELLED', now);
    }

    markNoShow(now: Date): void {
        assertTransition(this._status, 'NO_SHOW');
        if (!isNoShowEligible(this._scheduledAt, now, this._status)) {
            throw new InvalidTransitionError('Grace period has not elapsed yet');
        }
        this._cancellationFee = noShowFee(this._totalPrice);
        this.moveTo('NO_SHOW', now);
    }

    /**
     * Move the booking to a new start time
     *
     * Status is unchanged. The resource assignment is dropped: the caller must
     * allocate again for the new window before persisting.
     */
    reschedule(newTime: Date, now: Date): void {
        if (this._status !== 'PENDING' && this._status !== 'CONFIRMED') {
            throw new InvalidTransitionError(`Cannot reschedule a ${this._status} booking`);
        }
        validateSchedule(newTime, now);
        if (noticeHours(newTime, now) < MIN_RESCHEDULE_NOTICE_HOURS) {
            throw new InvalidInputError(
                `Rescheduling requires at least ${MIN_RESCHEDULE_NOTICE_HOURS} hours notice`,
                'scheduledAt'
            );
        }
        const previous = this._scheduledAt;
        this._scheduledAt = newTime;
        this._resourceId = undefined;
        this.appendNote(`Rescheduled from ${previous.toISOString()} to ${newTime.toISOString()}`);
        this._updatedAt = now;
    }

    addService(service: BookingServiceLine, now: Date): void {
        this.assertEditable();
        if (this._services.some(s => s.serviceId === service.serviceId)) {
            throw new InvalidInputError(`Service ${service.serviceId} is already part of the booking`, 'serviceId');
        }
        this.replaceServices([...this._services, { ...service }], now);
    }

    removeService(serviceId: string, now: Date): void {
        this.assertEditable();
        const remaining = this._services.filter(s => s.serviceId !== serviceId);
        if (remaining.length === this._services.length) {
            throw new InvalidInputError(`Service ${serviceId} is not part of the booking`, 'serviceId');
        }
        this.replaceServices(remaining, now);
    }

    rate(score: number, feedback: string | undefined, now: Date): void {
        if (this._status !== 'COMPLETED') {
            throw new InvalidTransitionError('Only completed bookings can be rated');
        }
        if (this._rating !== undefined) {
            throw new InvalidTransitionError('Booking has already been rated');
        }
        if (!Number.isInteger(score) || score < 1 || score > 5) {
            throw new InvalidInputError('Rating must be an integer between 1 and 5', 'score');
        }
        if (feedback !== undefined && charCount(feedback) > MAX_FEEDBACK_LENGTH) {
            throw new InvalidInputError(`Feedback cannot exceed ${MAX_FEEDBACK_LENGTH} characters`, 'feedback');
        }
        this._rating = score;
        this._feedback = feedback;
        this._updatedAt = now;
    }

    /**
     * Replace the free-form notes while the booking is still active
     */
    updateNotes(notes: string, now: Date): void {
        if (!this.isActive) {
            throw new InvalidTransitionError(`Cannot edit notes of a ${this._status} booking`);
        }
        validateNotes(notes);
        this._notes = notes;
        this._updatedAt = now;
    }

    toSnapshot(): BookingSnapshot {
        return {
            id: this.id,
            customerId: this.customerId,
            vehicleId: this.vehicleId,
            vehicleSizeClass: this.vehicleSizeClass,
            services: this._services.map(s => ({ ...s })),
            scheduledAt: this._scheduledAt.toISOString(),
            totalPrice: this._totalPrice,
            totalDurationMinutes: this._totalDurationMinutes,
            status: this._status,
            kind: this.kind,
            location: this.location ? { ...this.location } : undefined,
            resourceId: this._resourceId,
            actualStartAt: toIso(this._actualStartAt),
            actualEndAt: toIso(this._actualEndAt),
            cancellationFee: this._cancellationFee,
            overtimeCharge: this._overtimeCharge,
            cancelledAt: toIso(this._cancelledAt),
            cancelledBy: this._cancelledBy,
            cancellationReason: this._cancellationReason,
            rating: this._rating,
            feedback: this._feedback,
            notes: this._notes,
            version: this.version,
            createdAt: this.createdAt.toISOString(),
            updatedAt: this._updatedAt.toISOString()
        };
    }

    private assertEditable(): void {
        if (this._status !== 'PENDING') {
            throw new InvalidTransitionError(`Services can only be changed while PENDING, booking is ${this._status}`);
        }
    }

    private replaceServices(services: BookingServiceLine[], now: Date): void {
        // validate before touching state so a rejected change leaves the booking intact
        const totals = validateServices(services);
        this._services = services;
        this._totalPrice = totals.price;
        this._totalDurationMinutes = totals.duration;
        this._updatedAt = now;
    }

    private appendNote(line: string): void {
        this._notes = this._notes ? `${this._notes}\n${line}` : line;
    }

    private moveTo(status: BookingStatus, now: Date): void {
        this._status = status;
        this._updatedAt = now;
    }
}
