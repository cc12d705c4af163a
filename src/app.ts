import fastify, { type FastifyBaseLogger } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import type { Config } from './config';
import { BookingError, type BookingErrorCode, NoCapacityAvailableError } from './domain/errors';
import { createHandlers, type RouteDeps } from './routes';

const STATUS_BY_CODE: Record<BookingErrorCode, number> = {
    invalid_input: 400,
    not_found: 404,
    invalid_transition: 409,
    no_capacity: 409,
    conflict: 409,
    no_compatible_resource: 422,
    internal: 500,
    deadline_exceeded: 503,
};

export interface AppOptions extends RouteDeps {
    config: Pick<Config, 'RATE_LIMIT_MAX' | 'RATE_LIMIT_WINDOW'>;
    logger: FastifyBaseLogger;
}

/**
 * Booking engine HTTP server
 *
 * Features:
 * - Fastify web server with pino logging
 * - Rate limiting (configurable, 100 requests per minute by default)
 * - RESTful API endpoints under /api
 * - Domain errors mapped to `{ error, detail }` payloads
 */
export function buildApp(options: AppOptions) {
    const app = fastify({
        logger: options.logger
    });

    void app.register(rateLimit, {
        max: options.config.RATE_LIMIT_MAX,
        timeWindow: options.config.RATE_LIMIT_WINDOW
    });

    app.setErrorHandler((error, request, reply) => {
        if (error instanceof BookingError) {
            const status = STATUS_BY_CODE[error.code];
            if (status >= 500) {
                request.log.error({ err: error.cause ?? error }, 'booking request failed');
                return reply.status(status).send({ error: error.code, detail: status === 500 ? 'Internal error' : error.message });
            }
            if (error instanceof NoCapacityAvailableError) {
                return reply.status(status).send({ error: error.code, detail: error.message, alternatives: error.alternatives });
            }
            return reply.status(status).send({ error: error.code, detail: error.message });
        }

        const status = error.statusCode ?? 500;
        if (status >= 500) {
            request.log.error({ err: error }, 'unhandled request error');
            return reply.status(500).send({ error: 'internal', detail: 'Internal error' });
        }
        return reply.status(status).send({ error: status === 429 ? 'rate_limited' : 'invalid_input', detail: error.message });
    });

    const handlers = createHandlers(options);

    void app.register(function (app, _, done) {
        app.get('/availability', handlers.availability);
        app.post('/bookings', handlers.createBooking);
        app.get('/bookings', handlers.listBookings);
        app.get('/bookings/day', handlers.bookingDay);
        app.get('/bookings/:id', handlers.getBooking);
        app.patch('/bookings/:id', handlers.updateNotes);
        app.post('/bookings/:id/confirm', handlers.confirm);
        app.post('/bookings/:id/start', handlers.start);
        app.post('/bookings/:id/complete', handlers.complete);
        app.post('/bookings/:id/cancel', handlers.cancel);
        app.post('/bookings/:id/no-show', handlers.noShow);
        app.post('/bookings/:id/reschedule', handlers.reschedule);
        app.post('/bookings/:id/services', handlers.addService);
        app.delete('/bookings/:id/services/:serviceId', handlers.removeService);
        app.post('/bookings/:id/rating', handlers.rate);

        done();
    }, { prefix: '/api' });

    return app;
}
