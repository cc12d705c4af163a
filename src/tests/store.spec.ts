import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { parseISO } from 'date-fns';
import { Booking } from '../domain/booking';
import { ConcurrencyConflictError } from '../domain/errors';
import { MemoryStore } from '../store/db';
import { seedData } from './seed-data';

const NOW = parseISO('2030-05-01T12:00:00Z');

describe('MemoryStore', () => {
    let store: MemoryStore;

    const save = (id: string, customerId: string, at: string): Promise<Booking> => store.commit(Booking.create({
        id,
        customerId,
        vehicleId: 'V_STANDARD',
        vehicleSizeClass: 'STANDARD',
        services: [{ serviceId: 'SV_BASIC', name: 'Basic exterior wash', durationMinutes: 30, price: 2500 }],
        scheduledAt: parseISO(at),
        kind: 'STATIONARY'
    }, NOW));

    const load = async (id: string): Promise<Booking> => {
        const booking = await store.findById(id);
        if (!booking) throw new Error(`Booking ${id} missing from store`);
        return booking;
    };

    beforeEach(() => {
        store = new MemoryStore(seedData);
    });

    afterEach(() => {
        store.dispose();
    });

    describe('commit', () => {
        it('bumps the version on every write', async () => {
            expect((await save('BK_1', 'C1', '2030-05-03T09:00:00Z')).version).toBe(1);

            const booking = await load('BK_1');
            booking.confirm(NOW);
            expect((await store.commit(booking)).version).toBe(2);
        });

        it('rejects a write based on a stale read and keeps the stored state', async () => {
            await save('BK_1', 'C1', '2030-05-03T09:00:00Z');
            const first = await load('BK_1');
            const second = await load('BK_1');

            first.confirm(NOW);
            await store.commit(first);

            second.cancel(NOW, 'C1');
            await expect(store.commit(second)).rejects.toBeInstanceOf(ConcurrencyConflictError);

            expect(store.bookings.get('BK_1')?.status).toBe('CONFIRMED');
            expect(store.bookings.get('BK_1')?.version).toBe(2);
        });

        it('rejects a reservation overlapping another booking', async () => {
            const held = await load((await save('BK_1', 'C1', '2030-05-03T09:00:00Z')).id);
            held.assignResource('BAY_1');
            await store.commit(held);

            const clash = Booking.create({
                id: 'BK_2',
                customerId: 'C1',
                vehicleId: 'V_STANDARD',
                vehicleSizeClass: 'STANDARD',
                services: [{ serviceId: 'SV_BASIC', name: 'Basic exterior wash', durationMinutes: 30, price: 2500 }],
                scheduledAt: parseISO('2030-05-03T09:40:00Z'),
                kind: 'STATIONARY'
            }, NOW);
            clash.assignResource('BAY_1');

            await expect(store.commit(clash)).rejects.toBeInstanceOf(ConcurrencyConflictError);
            expect(store.bookings.has('BK_2')).toBe(false);
        });
    });

    describe('list', () => {
        beforeEach(async () => {
            await save('BK_1', 'C1', '2030-05-02T09:00:00Z');
            const confirmed = await load((await save('BK_2', 'C1', '2030-05-03T09:00:00Z')).id);
            confirmed.confirm(NOW);
            await store.commit(confirmed);
            const cancelled = await load((await save('BK_3', 'C2', '2030-05-03T11:00:00Z')).id);
            cancelled.cancel(NOW, 'C2');
            await store.commit(cancelled);
            await save('BK_4', 'C1', '2030-05-05T09:00:00Z');
        });

        it('returns everything earliest first', async () => {
            const page = await store.list({}, 0, 10);
            expect(page.items.map(b => b.id)).toEqual(['BK_1', 'BK_2', 'BK_3', 'BK_4']);
            expect(page.totalCount).toBe(4);
        });

        it('slices pages while counting every match', async () => {
            const first = await store.list({ customerId: 'C1' }, 0, 2);
            expect(first.items.map(b => b.id)).toEqual(['BK_1', 'BK_2']);
            expect(first.totalCount).toBe(3);

            const second = await store.list({ customerId: 'C1' }, 2, 2);
            expect(second.items.map(b => b.id)).toEqual(['BK_4']);
            expect(second.totalCount).toBe(3);
        });

        it('filters by status', async () => {
            const page = await store.list({ status: 'CANCELLED' }, 0, 10);
            expect(page.items.map(b => b.id)).toEqual(['BK_3']);
        });

        it('treats the scheduled range as inclusive', async () => {
            const page = await store.list({
                from: parseISO('2030-05-03T09:00:00Z'),
                to: parseISO('2030-05-03T11:00:00Z')
            }, 0, 10);
            expect(page.items.map(b => b.id)).toEqual(['BK_2', 'BK_3']);
        });

        it('leaves cancelled bookings out of the day view', async () => {
            const day = await store.listByDay('2030-05-03');
            expect(day.map(b => b.id)).toEqual(['BK_2']);
        });
    });
});
