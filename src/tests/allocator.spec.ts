import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { parseISO } from 'date-fns';
import { CapacityAllocator, isCompatible, orderCandidates, type AllocationRequest } from '../domain/allocator';
import { Booking } from '../domain/booking';
import { DeadlineExceededError, NoCapacityAvailableError, NoCompatibleResourceError } from '../domain/errors';
import { scanAround, utcDay, windowsOverlap } from '../domain/windows';
import { MemoryStore } from '../store/db';
import type { BookingKind, GeoPoint, Resource, VehicleSizeClass } from '../types';
import { seedData } from './seed-data';

const NOW = parseISO('2030-05-01T12:00:00Z');
const CUSTOMER_LOCATION: GeoPoint = { lat: 40.0, lng: -75.0 };

interface Placement {
    id: string;
    resourceId: string;
    at: string;
    minutes?: number;
    kind?: BookingKind;
    location?: GeoPoint;
}

/** Store an active booking holding `resourceId` */
const place = async (store: MemoryStore, p: Placement): Promise<Booking> => {
    const booking = Booking.create({
        id: p.id,
        customerId: 'C1',
        vehicleId: 'V_STANDARD',
        vehicleSizeClass: 'STANDARD',
        services: [{ serviceId: 'SV', name: 'Wash', durationMinutes: p.minutes ?? 60, price: 1000 }],
        scheduledAt: parseISO(p.at),
        kind: p.kind ?? 'STATIONARY',
        location: p.location
    }, NOW);
    booking.assignResource(p.resourceId);
    return store.commit(booking);
};

const request = (overrides: Partial<AllocationRequest> = {}): AllocationRequest => ({
    kind: 'STATIONARY',
    scheduledAt: parseISO('2030-05-03T10:00:00Z'),
    durationMinutes: 60,
    vehicleSizeClass: 'STANDARD',
    now: NOW,
    ...overrides
});

const bay = (id: string, bayNumber: number, maxVehicleSizeClass: VehicleSizeClass = 'LARGE', isActive = true): Resource => ({
    kind: 'STATIONARY',
    id,
    bayNumber,
    maxVehicleSizeClass,
    isActive
});

describe('Time windows', () => {
    it('treats touching windows as overlapping', () => {
        const a = { start: parseISO('2030-05-03T10:00:00Z'), end: parseISO('2030-05-03T11:00:00Z') };
        const b = { start: parseISO('2030-05-03T11:00:00Z'), end: parseISO('2030-05-03T12:00:00Z') };
        const c = { start: parseISO('2030-05-03T11:01:00Z'), end: parseISO('2030-05-03T12:00:00Z') };
        expect(windowsOverlap(a, b)).toBe(true);
        expect(windowsOverlap(a, c)).toBe(false);
    });

    it('scans nearest start times first, earlier first on ties', () => {
        const starts = scanAround(parseISO('2030-05-03T10:00:00Z'), 30).map(d => d.toISOString());
        expect(starts).toEqual([
            '2030-05-03T09:45:00.000Z',
            '2030-05-03T10:15:00.000Z',
            '2030-05-03T09:30:00.000Z',
            '2030-05-03T10:30:00.000Z'
        ]);
    });

    it('buckets instants by UTC day', () => {
        expect(utcDay(parseISO('2030-05-03T23:59:00-02:00'))).toBe('2030-05-04');
    });
});

describe('Resource compatibility', () => {
    it('fits vehicles up to the bay size limit', () => {
        const query = { kind: 'STATIONARY' as const, vehicleSizeClass: 'STANDARD' as const };
        expect(isCompatible(bay('B', 1, 'STANDARD'), query)).toBe(true);
        expect(isCompatible(bay('B', 1, 'COMPACT'), query)).toBe(false);
        expect(isCompatible(bay('B', 1, 'OVERSIZED', false), query)).toBe(false);
    });

    it('never mixes kinds', () => {
        expect(isCompatible(bay('B', 1), { kind: 'MOBILE', vehicleSizeClass: 'COMPACT', location: CUSTOMER_LOCATION })).toBe(false);
    });

    it('orders bays by number, then id', () => {
        const ordered = orderCandidates([bay('BAY_X', 2), bay('BAY_C', 3), bay('BAY_B', 2), bay('BAY_Z', 1)]);
        expect(ordered.map(r => r.id)).toEqual(['BAY_Z', 'BAY_B', 'BAY_X', 'BAY_C']);
    });

    it('breaks ties by code unit regardless of case or locale', () => {
        const ordered = orderCandidates([bay('bay_a', 1), bay('BAY_B', 1), bay('Bay_c', 1)]);
        expect(ordered.map(r => r.id)).toEqual(['BAY_B', 'Bay_c', 'bay_a']);
    });
});

describe('CapacityAllocator', () => {
    let store: MemoryStore;
    let allocator: CapacityAllocator;

    beforeEach(() => {
        store = new MemoryStore(seedData);
        allocator = new CapacityAllocator(store, store);
    });

    afterEach(() => {
        store.dispose();
    });

    describe('stationary', () => {
        it('takes the lowest numbered bay that fits the vehicle', async () => {
            expect((await allocator.allocate(request())).resource.id).toBe('BAY_1');
            expect((await allocator.allocate(request({ vehicleSizeClass: 'LARGE' }))).resource.id).toBe('BAY_2');
        });

        it('returns the booking window', async () => {
            const { window } = await allocator.allocate(request({ durationMinutes: 75 }));
            expect(window.start.toISOString()).toBe('2030-05-03T10:00:00.000Z');
            expect(window.end.toISOString()).toBe('2030-05-03T11:15:00.000Z');
        });

        it('fails when no active bay accepts the vehicle', async () => {
            await expect(allocator.allocate(request({ vehicleSizeClass: 'OVERSIZED' })))
                .rejects.toThrow(new NoCompatibleResourceError('No active bay accepts OVERSIZED vehicles'));
        });

        it('keeps a 15 minute buffer after an existing booking', async () => {
            await place(store, { id: 'BK_A', resourceId: 'BAY_1', at: '2030-05-03T10:00:00Z' });

            const touching = await allocator.allocate(request({ scheduledAt: parseISO('2030-05-03T11:15:00Z') }));
            expect(touching.resource.id).toBe('BAY_2');

            const clear = await allocator.allocate(request({ scheduledAt: parseISO('2030-05-03T11:16:00Z') }));
            expect(clear.resource.id).toBe('BAY_1');
        });

        it('keeps a 15 minute buffer before an existing booking', async () => {
            await place(store, { id: 'BK_A', resourceId: 'BAY_1', at: '2030-05-03T10:00:00Z' });

            const touching = await allocator.allocate(request({ scheduledAt: parseISO('2030-05-03T08:45:00Z') }));
            expect(touching.resource.id).toBe('BAY_2');

            const clear = await allocator.allocate(request({ scheduledAt: parseISO('2030-05-03T08:44:00Z') }));
            expect(clear.resource.id).toBe('BAY_1');
        });

        it('ignores cancelled bookings', async () => {
            const booking = await place(store, { id: 'BK_A', resourceId: 'BAY_1', at: '2030-05-03T10:00:00Z' });
            booking.cancel(NOW, 'C1');
            await store.commit(booking);

            expect((await allocator.allocate(request())).resource.id).toBe('BAY_1');
        });

        it('ignores the commitment of the booking being moved', async () => {
            await place(store, { id: 'BK_A', resourceId: 'BAY_1', at: '2030-05-03T10:00:00Z' });
            const result = await allocator.allocate(request({ excludeBookingId: 'BK_A' }));
            expect(result.resource.id).toBe('BAY_1');
        });

        it('suggests the nearest free start times', async () => {
            await place(store, { id: 'BK_A', resourceId: 'BAY_2', at: '2030-05-03T10:00:00Z' });

            const error = await allocator.allocate(request({ vehicleSizeClass: 'LARGE' })).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(NoCapacityAvailableError);
            if (!(error instanceof NoCapacityAvailableError)) return;
            expect(error.message).toBe('No stationary capacity at 2030-05-03T10:00:00.000Z');
            expect(error.alternatives).toEqual([
                { start: '2030-05-03T08:30:00.000Z', end: '2030-05-03T09:30:00.000Z', resourceId: 'BAY_2' },
                { start: '2030-05-03T11:30:00.000Z', end: '2030-05-03T12:30:00.000Z', resourceId: 'BAY_2' },
                { start: '2030-05-03T08:15:00.000Z', end: '2030-05-03T09:15:00.000Z', resourceId: 'BAY_2' }
            ]);
        });

        it('never suggests start times in the past', async () => {
            await place(store, { id: 'BK_A', resourceId: 'BAY_2', at: '2030-05-03T10:00:00Z' });

            const error = await allocator
                .allocate(request({ vehicleSizeClass: 'LARGE', now: parseISO('2030-05-03T09:10:00Z') }))
                .catch((e: unknown) => e);

            expect(error).toBeInstanceOf(NoCapacityAvailableError);
            if (!(error instanceof NoCapacityAvailableError)) return;
            expect(error.alternatives.map(a => a.start)).toEqual([
                '2030-05-03T11:30:00.000Z',
                '2030-05-03T11:45:00.000Z',
                '2030-05-03T12:00:00.000Z'
            ]);
        });

        it('limits the number of alternatives', async () => {
            await place(store, { id: 'BK_A', resourceId: 'BAY_2', at: '2030-05-03T10:00:00Z' });
            const single = new CapacityAllocator(store, store, { maxAlternatives: 1 });

            const error = await single.allocate(request({ vehicleSizeClass: 'LARGE' })).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(NoCapacityAvailableError);
            if (!(error instanceof NoCapacityAvailableError)) return;
            expect(error.alternatives).toHaveLength(1);
        });

        it('lists every free compatible bay', async () => {
            await place(store, { id: 'BK_A', resourceId: 'BAY_1', at: '2030-05-03T10:00:00Z' });
            const free = await allocator.availableResources(request());
            expect(free.map(r => r.id)).toEqual(['BAY_2']);
        });
    });

    describe('mobile', () => {
        const mobile = (overrides: Partial<AllocationRequest> = {}) =>
            request({ kind: 'MOBILE', location: CUSTOMER_LOCATION, ...overrides });

        it('picks a team whose radius covers the customer', async () => {
            expect((await allocator.allocate(mobile())).resource.id).toBe('TEAM_A');
            expect((await allocator.allocate(mobile({ location: { lat: 41.6, lng: -75.0 } }))).resource.id).toBe('TEAM_B');
        });

        it('fails when no team covers the location', async () => {
            await expect(allocator.allocate(mobile({ location: { lat: 0, lng: 0 } })))
                .rejects.toThrow(new NoCompatibleResourceError('No active mobile team covers the customer location'));
        });

        it('stops at the daily job cap, counting completed jobs', async () => {
            const done = await place(store, {
                id: 'BK_DONE',
                resourceId: 'TEAM_A',
                at: '2030-05-03T08:00:00Z',
                kind: 'MOBILE',
                location: CUSTOMER_LOCATION
            });
            done.confirm(NOW);
            done.start(parseISO('2030-05-03T08:00:00Z'));
            done.complete(parseISO('2030-05-03T09:00:00Z'));
            await store.commit(done);
            await place(store, {
                id: 'BK_LATER',
                resourceId: 'TEAM_A',
                at: '2030-05-03T14:00:00Z',
                kind: 'MOBILE',
                location: CUSTOMER_LOCATION
            });

            const error = await allocator
                .allocate(mobile({ scheduledAt: parseISO('2030-05-03T18:00:00Z') }))
                .catch((e: unknown) => e);

            expect(error).toBeInstanceOf(NoCapacityAvailableError);
            if (!(error instanceof NoCapacityAvailableError)) return;
            expect(error.alternatives).toEqual([
                { start: '2030-05-04T00:00:00.000Z', end: '2030-05-04T01:00:00.000Z', resourceId: 'TEAM_A' },
                { start: '2030-05-04T00:15:00.000Z', end: '2030-05-04T01:15:00.000Z', resourceId: 'TEAM_A' },
                { start: '2030-05-04T00:30:00.000Z', end: '2030-05-04T01:30:00.000Z', resourceId: 'TEAM_A' }
            ]);
        });
    });

    it('fails with DeadlineExceeded when a lookup outlives the signal', async () => {
        const slow = new CapacityAllocator({ listCompatible: () => new Promise<Resource[]>(() => {}) }, store);
        const controller = new AbortController();
        setTimeout(() => controller.abort(), 10);

        await expect(slow.allocate(request({ signal: controller.signal }))).rejects.toBeInstanceOf(DeadlineExceededError);
    });
});
