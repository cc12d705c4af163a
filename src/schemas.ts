import { z } from 'zod';
import { VEHICLE_SIZE_CLASSES } from './domain/allocator';

const Instant = z.string().datetime({ offset: true }).transform(value => new Date(value));

const Location = z.object({
    lat: z.number(),
    lng: z.number(),
});

/**
 * Validation schema for GET /api/availability query parameters
 *
 * Lists the resources free for a slot. MOBILE queries need both coordinates.
 */
export const AvailabilityQuerySchema = z.object({
    kind: z.enum(['STATIONARY', 'MOBILE']),
    /** ISO datetime with offset */
    scheduledAt: Instant,
    durationMinutes: z.coerce.number().int().positive(),
    vehicleSizeClass: z.enum(VEHICLE_SIZE_CLASSES).default('STANDARD'),
    /** Customer latitude (mobile only, coerced from string) */
    lat: z.coerce.number().min(-90).max(90).optional(),
    /** Customer longitude (mobile only, coerced from string) */
    lng: z.coerce.number().min(-180).max(180).optional(),
})
    .refine(q => (q.lat === undefined) === (q.lng === undefined), {
        message: 'lat and lng must be given together',
        path: ['lat'],
    })
    .refine(q => q.kind !== 'MOBILE' || q.lat !== undefined, {
        message: 'lat and lng are required for MOBILE',
        path: ['lat'],
    });

/**
 * Validation schema for POST /api/bookings request body
 *
 * Ranges on services, schedule and location are enforced by the booking itself.
 */
export const CreateBookingSchema = z.object({
    customerId: z.string().min(1),
    vehicleId: z.string().min(1),
    serviceIds: z.array(z.string().min(1)),
    /** ISO datetime with offset */
    scheduledAt: Instant,
    kind: z.enum(['STATIONARY', 'MOBILE']),
    /** Required for MOBILE bookings */
    location: Location.optional(),
    /** Length is checked by the booking, in characters */
    notes: z.string().optional(),
});

export const BookingParamsSchema = z.object({
    id: z.string().min(1),
});

export const ServiceParamsSchema = z.object({
    id: z.string().min(1),
    serviceId: z.string().min(1),
});

export const UpdateNotesSchema = z.object({
    notes: z.string(),
});

const BookingStatusSchema = z.enum(['PENDING', 'CONFIRMED', 'IN_PROGRESS', 'COMPLETED', 'CANCELLED', 'NO_SHOW']);

/**
 * Validation schema for GET /api/bookings query parameters
 */
export const ListBookingsQuerySchema = z.object({
    customerId: z.string().min(1).optional(),
    status: BookingStatusSchema.optional(),
    /** ISO datetime with offset, inclusive */
    from: Instant.optional(),
    /** ISO datetime with offset, inclusive */
    to: Instant.optional(),
    page: z.coerce.number().int().min(1).default(1),
    limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const CancelBookingSchema = z.object({
    /** Who cancelled: customer id, staff id or "system" */
    actor: z.string().min(1),
    reason: z.string().max(500).optional(),
});

export const RescheduleBookingSchema = z.object({
    scheduledAt: Instant,
});

export const AddServiceSchema = z.object({
    serviceId: z.string().min(1),
});

export const RateBookingSchema = z.object({
    score: z.number(),
    feedback: z.string().optional(),
});

/**
 * Validation schema for GET /api/bookings/day query parameters
 */
export const BookingDayQuerySchema = z.object({
    /** Date in YYYY-MM-DD format */
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
});
