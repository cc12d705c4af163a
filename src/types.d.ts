/**
 * Booking status enumeration
 *
 * COMPLETED, CANCELLED and NO_SHOW are terminal.
 */
export type BookingStatus = 'PENDING' | 'CONFIRMED' | 'IN_PROGRESS' | 'COMPLETED' | 'CANCELLED' | 'NO_SHOW';

/** STATIONARY bookings use a bay, MOBILE bookings a travelling team. */
export type BookingKind = 'STATIONARY' | 'MOBILE';

/** Ordered smallest to largest. */
export type VehicleSizeClass = 'COMPACT' | 'STANDARD' | 'LARGE' | 'OVERSIZED';

export interface GeoPoint {
    lat: number;
    lng: number;
}

/**
 * Continuous time interval
 *
 * Both ends are inclusive for conflict detection.
 */
export interface TimeSlot {
    start: Date;
    end: Date;
}

/**
 * Service as reported by the catalog collaborator
 */
export interface CatalogService {
    id: string;
    name: string;
    durationMinutes: number;
    /** Price in cents */
    price: number;
    isActive: boolean;
}

/**
 * Service line frozen on a booking at the time it was added
 */
export interface BookingServiceLine {
    serviceId: string;
    name: string;
    durationMinutes: number;
    /** Price in cents */
    price: number;
}

/**
 * Fixed-location wash bay
 */
export interface Bay {
    kind: 'STATIONARY';
    id: string;
    bayNumber: number;
    maxVehicleSizeClass: VehicleSizeClass;
    isActive: boolean;
}

/**
 * Mobile crew serving customers within a radius of its base
 */
export interface MobileTeam {
    kind: 'MOBILE';
    id: string;
    name: string;
    base: GeoPoint;
    serviceRadiusKm: number;
    /** Maximum assigned or completed jobs per UTC calendar day */
    dailyCapacity: number;
    isActive: boolean;
}

export type Resource = Bay | MobileTeam;

/**
 * Reserved time window of a resource, derived from a booking holding an assignment
 */
export interface Commitment {
    bookingId: string;
    resourceId: string;
    window: TimeSlot;
    status: BookingStatus;
}

/**
 * Serializable booking state
 *
 * Money fields are integer cents, instants are ISO strings.
 */
export interface BookingSnapshot {
    id: string;
    customerId: string;
    vehicleId: string;
    vehicleSizeClass: VehicleSizeClass;
    services: BookingServiceLine[];
    scheduledAt: string;
    totalPrice: number;
    totalDurationMinutes: number;
    status: BookingStatus;
    kind: BookingKind;
    location?: GeoPoint;
    resourceId?: string;
    actualStartAt?: string;
    actualEndAt?: string;
    cancellationFee?: number;
    overtimeCharge?: number;
    cancelledAt?: string;
    cancelledBy?: string;
    cancellationReason?: string;
    rating?: number;
    feedback?: string;
    notes: string;
    version: number;
    createdAt: string;
    updatedAt: string;
}

/**
 * Alternative start time offered when the requested slot is full
 */
export interface Alternative {
    /** ISO datetime string */
    start: string;
    /** ISO datetime string */
    end: string;
    resourceId: string;
}

export type BookingEventType =
    | 'booking.created'
    | 'booking.confirmed'
    | 'booking.started'
    | 'booking.completed'
    | 'booking.cancelled'
    | 'booking.no_show'
    | 'booking.rescheduled'
    | 'booking.services_changed'
    | 'booking.rated'
    | 'booking.notes_updated';

/**
 * Post-commit notification handed to external subscribers
 */
export interface BookingEvent {
    type: BookingEventType;
    bookingId: string;
    customerId: string;
    status: BookingStatus;
    /** ISO datetime string */
    occurredAt: string;
}

/**
 * Seed data structure for initializing the system
 */
export interface SeedData {
    services: CatalogService[];
    vehicles: Array<{ id: string; customerId: string; sizeClass: VehicleSizeClass }>;
    resources: Resource[];
    bookings: BookingSnapshot[];
}
