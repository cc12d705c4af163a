/**
 * Booking Engine Server
 *
 * Main entry point: loads configuration, wires the in-memory store into the
 * booking orchestrator and starts the Fastify server.
 */

import { buildApp } from './app';
import { loadConfig } from './config';
import { BookingOrchestrator } from './domain/orchestrator';
import { BookingEventBus } from './events';
import { createLogger } from './logger';
import store from './store/db';
import { seedData } from './tests/seed-data';

const config = loadConfig();
const logger = createLogger(config);

// Load seed data for dev/test
// In a real deployment resources and catalog come from their own services
if (config.SEED_DATA) {
    store.loadSeed(seedData);
}

const events = new BookingEventBus();
events.subscribe(event => {
    logger.info({ event }, 'booking event');
});

const orchestrator = new BookingOrchestrator({
    catalog: store,
    vehicles: store,
    directory: store,
    commitments: store,
    bookings: store,
    events,
    logger: logger.child({ module: 'bookings' }),
    allocationTimeoutMs: config.ALLOCATION_TIMEOUT_MS
});

const app = buildApp({ orchestrator, idempotency: store, config, logger });

app.addHook('onClose', async () => {
    store.dispose();
});

app.listen({ port: config.PORT, host: config.HOST }).catch((err: unknown) => {
    logger.fatal({ err }, 'failed to start server');
    process.exit(1);
});

export default app;
