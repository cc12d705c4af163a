import { isAfter, isBefore, parseISO } from 'date-fns';
import type * as types from '../types';
import { isCompatible } from '../domain/allocator';
import { Booking } from '../domain/booking';
import { throwIfAborted } from '../domain/deadline';
import { ConcurrencyConflictError, NotFoundError } from '../domain/errors';
import type {
    BookingFilter,
    BookingPage,
    BookingRepository,
    CommitmentStore,
    CommitOptions,
    CompatibilityQuery,
    ResourceDirectory,
    ServiceCatalog,
    VehicleRegistry
} from '../domain/ports';
import { ACTIVE_STATUSES } from '../domain/transitions';
import { bookingWindow, conflictsWith, utcDay } from '../domain/windows';

type VehicleRecord = types.SeedData['vehicles'][number];

const commitmentOf = (b: types.BookingSnapshot, resourceId: string): types.Commitment => ({
    bookingId: b.id,
    resourceId,
    window: bookingWindow(parseISO(b.scheduledAt), b.totalDurationMinutes),
    status: b.status
});

const byCodeUnit = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

const bySchedule = (a: types.BookingSnapshot, b: types.BookingSnapshot): number =>
    byCodeUnit(a.scheduledAt, b.scheduledAt) || byCodeUnit(a.id, b.id);

const matches = (b: types.BookingSnapshot, filter: BookingFilter): boolean => {
    if (filter.customerId !== undefined && b.customerId !== filter.customerId) return false;
    if (filter.status !== undefined && b.status !== filter.status) return false;
    const scheduledAt = parseISO(b.scheduledAt);
    if (filter.from && isBefore(scheduledAt, filter.from)) return false;
    if (filter.to && isAfter(scheduledAt, filter.to)) return false;
    return true;
};

/**
 * In-memory data store for the booking engine
 *
 * Features:
 * - Catalog, vehicle, resource and booking storage behind the domain ports
 * - Commitments derived from active bookings that hold a resource
 * - Optimistic concurrency: commit re-checks version, overlap and daily cap in one synchronous step
 * - Idempotency key support with automatic expiration (24hr TTL)
 *
 * Bookings are kept as snapshots; callers always get a fresh aggregate and
 * never share mutable state with the store.
 *
 * Note: This is a development/demo store. Production should use a real database.
 */
export class MemoryStore implements ServiceCatalog, VehicleRegistry, ResourceDirectory, CommitmentStore, BookingRepository {
    services: Map<string, types.CatalogService> = new Map();
    vehicles: Map<string, VehicleRecord> = new Map();
    resources: Map<string, types.Resource> = new Map();
    bookings: Map<string, types.BookingSnapshot> = new Map();

    private _idempotency: Map<string, { bookingId: string; expiresAt: number }> = new Map();
    private readonly _cleanup: NodeJS.Timeout;

    /**
     * Initialize memory store with optional seed data
     *
     * Sets up automatic cleanup interval for expired idempotency keys (runs every minute).
     */
    constructor(seed?: types.SeedData) {
        if (seed) {
            this.loadSeed(seed);
        }

        this._cleanup = setInterval(() => {
            const now = Date.now();
            for (const [key, value] of this._idempotency.entries()) {
                if (value.expiresAt <= now) {
                    this._idempotency.delete(key);
                }
            }
        }, 60000).unref(); // Run every minute, don't hold process open
    }

    /**
     * Load seed data into the store
     */
    loadSeed(seed: types.SeedData) {
        seed.services.forEach(s => this.services.set(s.id, { ...s }));
        seed.vehicles.forEach(v => this.vehicles.set(v.id, { ...v }));
        seed.resources.forEach(r => this.resources.set(r.id, r));
        seed.bookings.forEach(b => this.bookings.set(b.id, b));
    }

    dispose() {
        clearInterval(this._cleanup);
    }

    async getServices(ids: string[]): Promise<types.CatalogService[]> {
        return ids.map(id => {
            const service = this.services.get(id);
            if (!service || !service.isActive) {
                throw new NotFoundError(`Service ${id} not found or inactive`);
            }
            return { ...service };
        });
    }

    async belongsToCustomer(vehicleId: string, customerId: string): Promise<boolean> {
        return this.vehicles.get(vehicleId)?.customerId === customerId;
    }

    async getSizeClass(vehicleId: string): Promise<types.VehicleSizeClass | undefined> {
        return this.vehicles.get(vehicleId)?.sizeClass;
    }

    async listCompatible(query: CompatibilityQuery): Promise<types.Resource[]> {
        return Array.from(this.resources.values()).filter(r => isCompatible(r, query));
    }

    async findOverlapping(resourceId: string, window: types.TimeSlot, excludeBookingId?: string): Promise<types.Commitment[]> {
        return this.overlapping(resourceId, window, excludeBookingId);
    }

    async countForDay(resourceId: string, day: string, excludeBookingId?: string): Promise<number> {
        return this.jobsOnDay(resourceId, day, excludeBookingId);
    }

    async findById(id: string): Promise<Booking | undefined> {
        const snapshot = this.bookings.get(id);
        return snapshot ? Booking.fromSnapshot(snapshot) : undefined;
    }

    /**
     * Get all non-cancelled bookings scheduled on a UTC day
     *
     * @param day - Date in YYYY-MM-DD format
     */
    async listByDay(day: string): Promise<Booking[]> {
        return Array.from(this.bookings.values())
            .filter(b => b.scheduledAt.startsWith(day) && b.status !== 'CANCELLED')
            .sort(bySchedule)
            .map(b => Booking.fromSnapshot(b));
    }

    async list(filter: BookingFilter, offset: number, limit: number): Promise<BookingPage> {
        const found = Array.from(this.bookings.values())
            .filter(b => matches(b, filter))
            .sort(bySchedule);

        return {
            items: found.slice(offset, offset + limit).map(b => Booking.fromSnapshot(b)),
            totalCount: found.length
        };
    }

    /**
     * Write a booking together with its reservation
     *
     * Every check and the write happen without yielding, so two commits can
     * never interleave. The stored version is bumped on success.
     */
    async commit(booking: Booking, options: CommitOptions = {}): Promise<Booking> {
        throwIfAborted(options.signal);

        const snapshot = booking.toSnapshot();
        const stored = this.bookings.get(snapshot.id);
        const expectedVersion = stored ? stored.version : 0;
        if (snapshot.version !== expectedVersion) {
            throw new ConcurrencyConflictError(`Booking ${snapshot.id} was modified concurrently`);
        }

        if (snapshot.resourceId && ACTIVE_STATUSES.includes(snapshot.status)) {
            const window = bookingWindow(parseISO(snapshot.scheduledAt), snapshot.totalDurationMinutes);
            if (this.overlapping(snapshot.resourceId, window, snapshot.id).length > 0) {
                throw new ConcurrencyConflictError(`Resource ${snapshot.resourceId} was taken for this window`);
            }
            if (options.dailyCapacity !== undefined
                && this.jobsOnDay(snapshot.resourceId, utcDay(window.start), snapshot.id) >= options.dailyCapacity) {
                throw new ConcurrencyConflictError(`Resource ${snapshot.resourceId} reached its daily capacity`);
            }
        }

        const next = { ...snapshot, version: snapshot.version + 1 };
        this.bookings.set(snapshot.id, next);
        return Booking.fromSnapshot(next);
    }

    /**
     * Retrieve the booking id associated with an idempotency key
     *
     * Automatically cleans up expired entries.
     */
    getIdempotency(key: string): string | undefined {
        const entry = this._idempotency.get(key);
        if (!entry) return undefined;

        if (entry.expiresAt <= Date.now()) {
            this._idempotency.delete(key);
            return undefined;
        }

        return entry.bookingId;
    }

    /**
     * Store a booking id under an idempotency key
     *
     * @param ttlMs - Time-to-live in milliseconds (default: 24 hours)
     */
    setIdempotency(key: string, bookingId: string, ttlMs: number = 24 * 60 * 60 * 1000) {
        this._idempotency.set(key, {
            bookingId,
            expiresAt: Date.now() + ttlMs
        });
    }

    private overlapping(resourceId: string, window: types.TimeSlot, excludeBookingId?: string): types.Commitment[] {
        const result: types.Commitment[] = [];
        for (const b of this.bookings.values()) {
            if (b.resourceId !== resourceId || b.id === excludeBookingId) continue;
            if (!ACTIVE_STATUSES.includes(b.status)) continue;
            const commitment = commitmentOf(b, resourceId);
            if (conflictsWith(window, commitment.window)) {
                result.push(commitment);
            }
        }
        return result;
    }

    private jobsOnDay(resourceId: string, day: string, excludeBookingId?: string): number {
        let count = 0;
        for (const b of this.bookings.values()) {
            if (b.resourceId !== resourceId || b.id === excludeBookingId) continue;
            if (!ACTIVE_STATUSES.includes(b.status) && b.status !== 'COMPLETED') continue;
            if (utcDay(parseISO(b.scheduledAt)) === day) count++;
        }
        return count;
    }
}

const store = new MemoryStore();

export default store;
