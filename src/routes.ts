import type { FastifyReply, FastifyRequest } from 'fastify';
import type { Booking } from './domain/booking';
import type { BookingOrchestrator } from './domain/orchestrator';
import { formatMoney } from './domain/policy';
import {
    AddServiceSchema,
    AvailabilityQuerySchema,
    BookingDayQuerySchema,
    BookingParamsSchema,
    CancelBookingSchema,
    CreateBookingSchema,
    ListBookingsQuerySchema,
    RateBookingSchema,
    RescheduleBookingSchema,
    ServiceParamsSchema,
    UpdateNotesSchema
} from './schemas';

export interface IdempotencyStore {
    getIdempotency(key: string): string | undefined;
    setIdempotency(key: string, bookingId: string): void;
}

export interface RouteDeps {
    orchestrator: BookingOrchestrator;
    idempotency: IdempotencyStore;
}

type Handler = (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>;

const money = (cents: number | undefined): string | undefined =>
    cents === undefined ? undefined : formatMoney(cents);

/**
 * Public representation of a booking: money as fixed-point strings, instants as ISO strings
 */
export const presentBooking = (booking: Booking) => {
    const snapshot = booking.toSnapshot();
    return {
        ...snapshot,
        services: snapshot.services.map(s => ({ ...s, price: formatMoney(s.price) })),
        totalPrice: formatMoney(snapshot.totalPrice),
        cancellationFee: money(snapshot.cancellationFee),
        overtimeCharge: money(snapshot.overtimeCharge)
    };
};

const invalidInput = (reply: FastifyReply, detail: unknown) =>
    reply.status(400).send({ error: 'invalid_input', detail });

/**
 * Build the HTTP handlers around an orchestrator
 *
 * Domain errors are thrown through to the app's error handler, which maps
 * their `code` to a status; only request validation is answered here.
 */
export function createHandlers({ orchestrator, idempotency }: RouteDeps) {
    /**
     * Resources free for a slot
     *
     * @throws {400} Invalid input (malformed query parameters)
     * @throws {422} No resource can serve this vehicle size or location
     */
    const availability: Handler = async (request, reply) => {
        const query = AvailabilityQuerySchema.safeParse(request.query);
        if (!query.success) {
            return invalidInput(reply, query.error.format());
        }
        const { lat, lng, ...rest } = query.data;
        const location = lat !== undefined && lng !== undefined ? { lat, lng } : undefined;

        const resources = await orchestrator.checkAvailability({ ...rest, location });
        return {
            scheduledAt: rest.scheduledAt.toISOString(),
            durationMinutes: rest.durationMinutes,
            resources
        };
    };

    /**
     * Create a booking and allocate a bay or mobile team for it
     *
     * Supports the Idempotency-Key header: a repeated key returns the booking
     * created the first time with status 200.
     *
     * @throws {400} Invalid input
     * @throws {404} Vehicle or service not found
     * @throws {409} No capacity (body carries alternatives)
     * @throws {422} No compatible resource
     */
    const createBooking: Handler = async (request, reply) => {
        const header = request.headers['idempotency-key'];
        const idempotencyKey = typeof header === 'string' && header.length > 0 ? header : undefined;
        if (idempotencyKey) {
            const existingId = idempotency.getIdempotency(idempotencyKey);
            if (existingId) {
                const existing = await orchestrator.getBooking(existingId);
                return reply.status(200).send(presentBooking(existing));
            }
        }

        const body = CreateBookingSchema.safeParse(request.body);
        if (!body.success) {
            return invalidInput(reply, body.error.format());
        }

        const booking = await orchestrator.createBooking(body.data);
        if (idempotencyKey) {
            idempotency.setIdempotency(idempotencyKey, booking.id);
        }
        return reply.status(201).send(presentBooking(booking));
    };

    const getBooking: Handler = async (request, reply) => {
        const params = BookingParamsSchema.safeParse(request.params);
        if (!params.success) return invalidInput(reply, params.error.format());
        return presentBooking(await orchestrator.getBooking(params.data.id));
    };

    /**
     * Bookings filtered by customer, status and scheduled range, one page at a time
     *
     * @throws {400} Invalid filter or pagination
     */
    const listBookings: Handler = async (request, reply) => {
        const query = ListBookingsQuerySchema.safeParse(request.query);
        if (!query.success) return invalidInput(reply, query.error.format());
        const result = await orchestrator.listBookings(query.data);
        return { ...result, items: result.items.map(presentBooking) };
    };

    /**
     * Non-cancelled bookings scheduled on a UTC day
     */
    const bookingDay: Handler = async (request, reply) => {
        const query = BookingDayQuerySchema.safeParse(request.query);
        if (!query.success) return invalidInput(reply, query.error.format());
        const items = await orchestrator.listBookingsOnDay(query.data.date);
        return { date: query.data.date, items: items.map(presentBooking) };
    };

    const updateNotes: Handler = async (request, reply) => {
        const params = BookingParamsSchema.safeParse(request.params);
        const body = UpdateNotesSchema.safeParse(request.body);
        if (!params.success) return invalidInput(reply, params.error.format());
        if (!body.success) return invalidInput(reply, body.error.format());
        return presentBooking(await orchestrator.updateNotes(params.data.id, body.data.notes));
    };

    const statusChange = (apply: (id: string) => Promise<Booking>): Handler => async (request, reply) => {
        const params = BookingParamsSchema.safeParse(request.params);
        if (!params.success) return invalidInput(reply, params.error.format());
        return presentBooking(await apply(params.data.id));
    };

    const cancel: Handler = async (request, reply) => {
        const params = BookingParamsSchema.safeParse(request.params);
        const body = CancelBookingSchema.safeParse(request.body);
        if (!params.success) return invalidInput(reply, params.error.format());
        if (!body.success) return invalidInput(reply, body.error.format());
        return presentBooking(await orchestrator.cancel(params.data.id, body.data.actor, body.data.reason));
    };

    const reschedule: Handler = async (request, reply) => {
        const params = BookingParamsSchema.safeParse(request.params);
        const body = RescheduleBookingSchema.safeParse(request.body);
        if (!params.success) return invalidInput(reply, params.error.format());
        if (!body.success) return invalidInput(reply, body.error.format());
        return presentBooking(await orchestrator.reschedule(params.data.id, body.data.scheduledAt));
    };

    const addService: Handler = async (request, reply) => {
        const params = BookingParamsSchema.safeParse(request.params);
        const body = AddServiceSchema.safeParse(request.body);
        if (!params.success) return invalidInput(reply, params.error.format());
        if (!body.success) return invalidInput(reply, body.error.format());
        return presentBooking(await orchestrator.addService(params.data.id, body.data.serviceId));
    };

    const removeService: Handler = async (request, reply) => {
        const params = ServiceParamsSchema.safeParse(request.params);
        if (!params.success) return invalidInput(reply, params.error.format());
        return presentBooking(await orchestrator.removeService(params.data.id, params.data.serviceId));
    };

    const rate: Handler = async (request, reply) => {
        const params = BookingParamsSchema.safeParse(request.params);
        const body = RateBookingSchema.safeParse(request.body);
        if (!params.success) return invalidInput(reply, params.error.format());
        if (!body.success) return invalidInput(reply, body.error.format());
        return presentBooking(await orchestrator.rate(params.data.id, body.data.score, body.data.feedback));
    };

    return {
        availability,
        createBooking,
        getBooking,
        listBookings,
        bookingDay,
        updateNotes,
        confirm: statusChange(id => orchestrator.confirm(id)),
        start: statusChange(id => orchestrator.start(id)),
        complete: statusChange(id => orchestrator.complete(id)),
        noShow: statusChange(id => orchestrator.markNoShow(id)),
        cancel,
        reschedule,
        addService,
        removeService,
        rate
    };
}

export type Handlers = ReturnType<typeof createHandlers>;
