import { randomUUID } from 'node:crypto';
import { isAfter } from 'date-fns';
import pRetry, { AbortError } from 'p-retry';
import type { BaseLogger } from 'pino';
import type {
    BookingEventType,
    BookingKind,
    BookingServiceLine,
    GeoPoint,
    Resource,
    VehicleSizeClass
} from '../types';
import { CapacityAllocator } from './allocator';
import { Booking, validateLocation } from './booking';
import { abortable } from './deadline';
import {
    BookingError,
    ConcurrencyConflictError,
    DeadlineExceededError,
    InternalError,
    InvalidInputError,
    NoCapacityAvailableError,
    NotFoundError
} from './errors';
import type {
    BookingEventPublisher,
    BookingFilter,
    BookingRepository,
    CommitmentStore,
    ResourceDirectory,
    ServiceCatalog,
    VehicleRegistry
} from './ports';

export interface OrchestratorDeps {
    catalog: ServiceCatalog;
    vehicles: VehicleRegistry;
    directory: ResourceDirectory;
    commitments: CommitmentStore;
    bookings: BookingRepository;
    events: BookingEventPublisher;
    logger: BaseLogger;
    /** Deadline for operations that allocate a resource (default: 2000ms) */
    allocationTimeoutMs?: number;
    clock?: () => Date;
    generateId?: () => string;
    allocator?: CapacityAllocator;
}

export interface CreateBookingCommand {
    customerId: string;
    vehicleId: string;
    serviceIds: string[];
    scheduledAt: Date;
    kind: BookingKind;
    location?: GeoPoint;
    notes?: string;
}

export interface AvailabilityQuery {
    kind: BookingKind;
    scheduledAt: Date;
    durationMinutes: number;
    vehicleSizeClass: VehicleSizeClass;
    location?: GeoPoint;
}

export interface ListBookingsQuery extends BookingFilter {
    /** 1-based (default: 1) */
    page?: number;
    /** Page size, 1 to 100 (default: 20) */
    limit?: number;
}

export interface BookingListPage {
    items: Booking[];
    totalCount: number;
    page: number;
    limit: number;
    hasNext: boolean;
}

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export interface OperationOptions {
    /** Overrides the configured allocation deadline */
    timeoutMs?: number;
}

const toLine = (s: { id: string; name: string; durationMinutes: number; price: number }): BookingServiceLine => ({
    serviceId: s.id,
    name: s.name,
    durationMinutes: s.durationMinutes,
    price: s.price
});

/**
 * Coordinates booking use cases
 *
 * Sequence for operations that change a booking's time window:
 * 1. Validate external references (vehicle ownership, services) read-only
 * 2. Build or mutate the aggregate
 * 3. Allocate a resource through the capacity allocator
 * 4. Commit booking and reservation atomically; a lost race is retried once
 * 5. Publish a post-commit event, fire-and-forget
 *
 * Pure status transitions skip allocation and rely on the repository's
 * version check.
 */
export class BookingOrchestrator {
    private readonly allocator: CapacityAllocator;
    private readonly log: BaseLogger;
    private readonly clock: () => Date;
    private readonly generateId: () => string;
    private readonly allocationTimeoutMs: number;

    constructor(private readonly deps: OrchestratorDeps) {
        this.allocator = deps.allocator ?? new CapacityAllocator(deps.directory, deps.commitments);
        this.log = deps.logger;
        this.clock = deps.clock ?? (() => new Date());
        this.generateId = deps.generateId ?? (() => `BK_${randomUUID()}`);
        this.allocationTimeoutMs = deps.allocationTimeoutMs ?? 2000;
    }

    async createBooking(command: CreateBookingCommand, options: OperationOptions = {}): Promise<Booking> {
        return this.guard('create', undefined, async () => {
            const signal = this.deadline(options);
            const vehicleSizeClass = await this.validateVehicle(command.vehicleId, command.customerId, signal);
            const services = await abortable(this.deps.catalog.getServices(command.serviceIds), signal);

            const now = this.clock();
            const booking = Booking.create({
                id: this.generateId(),
                customerId: command.customerId,
                vehicleId: command.vehicleId,
                vehicleSizeClass,
                services: services.map(toLine),
                scheduledAt: command.scheduledAt,
                kind: command.kind,
                location: command.location,
                notes: command.notes
            }, now);

            const saved = await this.withConflictRetry(booking.id, () => this.allocateAndCommit(booking, now, signal));
            this.log.info({ bookingId: saved.id, resourceId: saved.resourceId, kind: saved.kind }, 'booking created');
            this.emit('booking.created', saved);
            return saved;
        });
    }

    async getBooking(id: string): Promise<Booking> {
        return this.guard('get', id, () => this.load(id));
    }

    /**
     * Filtered, paginated booking list, earliest first
     *
     * @throws {InvalidInputError} Page below 1, limit outside 1..100, or `from` after `to`
     */
    async listBookings(query: ListBookingsQuery = {}): Promise<BookingListPage> {
        return this.guard('list', undefined, async () => {
            const { page = 1, limit = DEFAULT_PAGE_SIZE, ...filter } = query;
            if (!Number.isInteger(page) || page < 1) {
                throw new InvalidInputError('Page must be a positive integer', 'page');
            }
            if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_SIZE) {
                throw new InvalidInputError(`Limit must be between 1 and ${MAX_PAGE_SIZE}`, 'limit');
            }
            if (filter.from && filter.to && isAfter(filter.from, filter.to)) {
                throw new InvalidInputError('Range start must not be after its end', 'from');
            }

            const offset = (page - 1) * limit;
            const { items, totalCount } = await this.deps.bookings.list(filter, offset, limit);
            return { items, totalCount, page, limit, hasNext: offset + items.length < totalCount };
        });
    }

    async listBookingsOnDay(day: string): Promise<Booking[]> {
        return this.guard('list-day', undefined, () => this.deps.bookings.listByDay(day));
    }

    /**
     * Free compatible resources for a slot
     *
     * @throws {InvalidInputError} Missing or out-of-range location for MOBILE, or a location for STATIONARY
     * @throws {NoCompatibleResourceError} No resource could ever serve the request
     */
    async checkAvailability(query: AvailabilityQuery, options: OperationOptions = {}): Promise<Resource[]> {
        return this.guard('availability', undefined, async () => {
            validateLocation(query.kind, query.location);
            return this.allocator.availableResources({
                ...query,
                now: this.clock(),
                signal: this.deadline(options)
            });
        });
    }

    async confirm(id: string): Promise<Booking> {
        return this.transition(id, 'booking.confirmed', (booking, now) => booking.confirm(now));
    }

    async start(id: string): Promise<Booking> {
        return this.transition(id, 'booking.started', (booking, now) => booking.start(now));
    }

    async complete(id: string): Promise<Booking> {
        return this.transition(id, 'booking.completed', (booking, now) => booking.complete(now));
    }

    async cancel(id: string, actor: string, reason?: string): Promise<Booking> {
        return this.transition(id, 'booking.cancelled', (booking, now) => booking.cancel(now, actor, reason));
    }

    async markNoShow(id: string): Promise<Booking> {
        return this.transition(id, 'booking.no_show', (booking, now) => booking.markNoShow(now));
    }

    async rate(id: string, score: number, feedback?: string): Promise<Booking> {
        return this.transition(id, 'booking.rated', (booking, now) => booking.rate(score, feedback, now));
    }

    async updateNotes(id: string, notes: string): Promise<Booking> {
        return this.transition(id, 'booking.notes_updated', (booking, now) => booking.updateNotes(notes, now));
    }

    async reschedule(id: string, newTime: Date, options: OperationOptions = {}): Promise<Booking> {
        return this.guard('reschedule', id, async () => {
            const signal = this.deadline(options);
            const saved = await this.withConflictRetry(id, async () => {
                const booking = await this.load(id);
                const now = this.clock();
                booking.reschedule(newTime, now);
                return this.allocateAndCommit(booking, now, signal);
            });
            this.log.info({ bookingId: id, scheduledAt: saved.scheduledAt.toISOString(), resourceId: saved.resourceId }, 'booking rescheduled');
            this.emit('booking.rescheduled', saved);
            return saved;
        });
    }

    async addService(id: string, serviceId: string, options: OperationOptions = {}): Promise<Booking> {
        return this.guard('add-service', id, async () => {
            const signal = this.deadline(options);
            const [service] = await abortable(this.deps.catalog.getServices([serviceId]), signal);
            if (!service) {
                throw new NotFoundError(`Service ${serviceId} not found`);
            }
            return this.changeServices(id, signal, (booking, now) => booking.addService(toLine(service), now));
        });
    }

    async removeService(id: string, serviceId: string, options: OperationOptions = {}): Promise<Booking> {
        return this.guard('remove-service', id, () =>
            this.changeServices(id, this.deadline(options), (booking, now) => booking.removeService(serviceId, now)));
    }

    private async changeServices(id: string, signal: AbortSignal, mutate: (booking: Booking, now: Date) => void): Promise<Booking> {
        const saved = await this.withConflictRetry(id, async () => {
            const booking = await this.load(id);
            const now = this.clock();
            mutate(booking, now);
            return this.allocateAndCommit(booking, now, signal);
        });
        this.emit('booking.services_changed', saved);
        return saved;
    }

    private async transition(id: string, type: BookingEventType, mutate: (booking: Booking, now: Date) => void): Promise<Booking> {
        return this.guard(type, id, async () => {
            const booking = await this.load(id);
            mutate(booking, this.clock());
            const saved = await this.deps.bookings.commit(booking);
            this.log.info({ bookingId: id, status: saved.status }, 'booking status changed');
            this.emit(type, saved);
            return saved;
        });
    }

    private async allocateAndCommit(booking: Booking, now: Date, signal: AbortSignal): Promise<Booking> {
        const { resource } = await this.allocator.allocate({
            kind: booking.kind,
            scheduledAt: booking.scheduledAt,
            durationMinutes: booking.totalDurationMinutes,
            vehicleSizeClass: booking.vehicleSizeClass,
            location: booking.location,
            excludeBookingId: booking.id,
            now,
            signal
        });
        booking.assignResource(resource.id);
        return this.deps.bookings.commit(booking, {
            signal,
            dailyCapacity: resource.kind === 'MOBILE' ? resource.dailyCapacity : undefined
        });
    }

    /**
     * Run an allocate-and-commit attempt, retrying once on a lost race
     *
     * A second conflict surfaces as NoCapacityAvailable; every other error
     * stops immediately.
     */
    private async withConflictRetry(bookingId: string, attempt: () => Promise<Booking>): Promise<Booking> {
        try {
            return await pRetry(async () => {
                try {
                    return await attempt();
                } catch (error) {
                    if (error instanceof ConcurrencyConflictError) throw error;
                    throw new AbortError(error instanceof Error ? error : String(error));
                }
            }, {
                retries: 1,
                minTimeout: 0,
                maxTimeout: 0,
                onFailedAttempt: (error) => {
                    this.log.warn({ bookingId, attempt: error.attemptNumber, retriesLeft: error.retriesLeft, err: error }, 'allocation conflict');
                }
            });
        } catch (error) {
            if (error instanceof ConcurrencyConflictError) {
                throw new NoCapacityAvailableError('The requested slot was taken by a concurrent booking');
            }
            throw error;
        }
    }

    private async validateVehicle(vehicleId: string, customerId: string, signal: AbortSignal): Promise<VehicleSizeClass> {
        const sizeClass = await abortable(this.deps.vehicles.getSizeClass(vehicleId), signal);
        if (!sizeClass) {
            throw new NotFoundError(`Vehicle ${vehicleId} not found`);
        }
        const owned = await abortable(this.deps.vehicles.belongsToCustomer(vehicleId, customerId), signal);
        if (!owned) {
            throw new InvalidInputError(`Vehicle ${vehicleId} does not belong to customer ${customerId}`, 'vehicleId');
        }
        return sizeClass;
    }

    private async load(id: string): Promise<Booking> {
        const booking = await this.deps.bookings.findById(id);
        if (!booking) {
            throw new NotFoundError(`Booking ${id} not found`);
        }
        return booking;
    }

    private deadline(options: OperationOptions): AbortSignal {
        return AbortSignal.timeout(options.timeoutMs ?? this.allocationTimeoutMs);
    }

    /**
     * Publish after commit without waiting; a failed delivery is logged and never undoes the write
     */
    private emit(type: BookingEventType, booking: Booking): void {
        const event = {
            type,
            bookingId: booking.id,
            customerId: booking.customerId,
            status: booking.status,
            occurredAt: this.clock().toISOString()
        };
        void Promise.resolve()
            .then(() => this.deps.events.publish(event))
            .catch((err: unknown) => {
                this.log.warn({ err, bookingId: booking.id, type }, 'booking event delivery failed');
            });
    }

    /**
     * Pass domain errors through untouched and turn anything else into an opaque InternalError
     */
    private async guard<T>(operation: string, bookingId: string | undefined, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (error) {
            if (error instanceof DeadlineExceededError) {
                this.log.warn({ operation, bookingId }, 'booking operation deadline exceeded');
                throw error;
            }
            if (error instanceof BookingError) throw error;
            this.log.error({ err: error, operation, bookingId }, 'unexpected booking failure');
            throw new InternalError('Unexpected failure', { cause: error });
        }
    }
}
