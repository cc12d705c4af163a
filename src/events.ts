import type { BookingEventPublisher } from './domain/ports';
import type { BookingEvent } from './types';

export type BookingEventListener = (event: BookingEvent) => void | Promise<void>;

/**
 * In-process outbound queue for post-commit booking events
 *
 * Notification, email and analytics adapters subscribe here. Delivery is a
 * single attempt; a failing listener rejects `publish` and the caller logs it.
 */
export class BookingEventBus implements BookingEventPublisher {
    private readonly listeners = new Set<BookingEventListener>();

    /**
     * @returns Function removing the listener
     */
    subscribe(listener: BookingEventListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    async publish(event: BookingEvent): Promise<void> {
        await Promise.all(Array.from(this.listeners, listener => listener(event)));
    }
}
