import type { Alternative } from '../types';

export type BookingErrorCode =
    | 'invalid_input'
    | 'invalid_transition'
    | 'not_found'
    | 'no_capacity'
    | 'no_compatible_resource'
    | 'conflict'
    | 'deadline_exceeded'
    | 'internal';

/**
 * Base class for every failure the booking core reports to its callers.
 *
 * `code` is stable and is what the HTTP layer sends back as `error`.
 */
export abstract class BookingError extends Error {
    abstract readonly code: BookingErrorCode;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Malformed or out-of-range request data. */
export class InvalidInputError extends BookingError {
    readonly code = 'invalid_input';

    constructor(message: string, readonly field?: string) {
        super(message);
    }
}

/** Status change not allowed from the current state. */
export class InvalidTransitionError extends BookingError {
    readonly code = 'invalid_transition';
}

export class NotFoundError extends BookingError {
    readonly code = 'not_found';
}

/** Every compatible resource is busy. Transient. */
export class NoCapacityAvailableError extends BookingError {
    readonly code = 'no_capacity';

    constructor(message: string, readonly alternatives: Alternative[] = []) {
        super(message);
    }
}

/** No resource can ever serve this vehicle size or location. */
export class NoCompatibleResourceError extends BookingError {
    readonly code = 'no_compatible_resource';
}

/** Another writer committed first. Retryable once. */
export class ConcurrencyConflictError extends BookingError {
    readonly code = 'conflict';
}

export class DeadlineExceededError extends BookingError {
    readonly code = 'deadline_exceeded';
}

export class InternalError extends BookingError {
    readonly code = 'internal';
}
