import type {
    BookingEvent,
    BookingKind,
    BookingStatus,
    CatalogService,
    Commitment,
    GeoPoint,
    Resource,
    TimeSlot,
    VehicleSizeClass
} from '../types';
import type { Booking } from './booking';

/**
 * Service catalog collaborator
 */
export interface ServiceCatalog {
    /**
     * @throws {NotFoundError} Any id is unknown or inactive
     */
    getServices(ids: string[]): Promise<CatalogService[]>;
}

export interface VehicleRegistry {
    belongsToCustomer(vehicleId: string, customerId: string): Promise<boolean>;
    /** @returns undefined for unknown vehicles */
    getSizeClass(vehicleId: string): Promise<VehicleSizeClass | undefined>;
}

export interface CompatibilityQuery {
    kind: BookingKind;
    vehicleSizeClass: VehicleSizeClass;
    location?: GeoPoint;
}

export interface ResourceDirectory {
    /** Active resources of the requested kind able to serve the vehicle size or location */
    listCompatible(query: CompatibilityQuery): Promise<Resource[]>;
}

export interface CommitmentStore {
    /**
     * Active commitments of a resource conflicting with `window` once the buffer is applied
     */
    findOverlapping(resourceId: string, window: TimeSlot, excludeBookingId?: string): Promise<Commitment[]>;
    /**
     * Jobs assigned to or completed by a resource on a UTC day (YYYY-MM-DD)
     */
    countForDay(resourceId: string, day: string, excludeBookingId?: string): Promise<number>;
}

export interface CommitOptions {
    signal?: AbortSignal;
    /** Daily job cap to re-check for the assigned resource */
    dailyCapacity?: number;
}

export interface BookingFilter {
    customerId?: string;
    status?: BookingStatus;
    /** Inclusive lower bound on scheduledAt */
    from?: Date;
    /** Inclusive upper bound on scheduledAt */
    to?: Date;
}

export interface BookingPage {
    items: Booking[];
    /** Matches across all pages */
    totalCount: number;
}

export interface BookingRepository {
    findById(id: string): Promise<Booking | undefined>;
    /** Non-cancelled bookings scheduled on a UTC day (YYYY-MM-DD), earliest first */
    listByDay(day: string): Promise<Booking[]>;
    /** Bookings matching every given filter, ordered by scheduledAt then id */
    list(filter: BookingFilter, offset: number, limit: number): Promise<BookingPage>;
    /**
     * Persist a booking and its resource reservation in one atomic step
     *
     * @throws {ConcurrencyConflictError} The stored version moved on, or the reserved
     *   window is no longer free
     * @throws {DeadlineExceededError} The signal aborted before the write
     * @returns The booking as stored, with its new version
     */
    commit(booking: Booking, options?: CommitOptions): Promise<Booking>;
}

export interface BookingEventPublisher {
    publish(event: BookingEvent): void | Promise<void>;
}
