import { addDays, isAfter } from 'date-fns';
import type {
    Alternative,
    BookingKind,
    GeoPoint,
    Resource,
    TimeSlot,
    VehicleSizeClass
} from '../types';
import { abortable } from './deadline';
import { NoCapacityAvailableError, NoCompatibleResourceError } from './errors';
import { distanceKm } from './geo';
import type { CommitmentStore, CompatibilityQuery, ResourceDirectory } from './ports';
import { bookingWindow, scanAround, utcDay } from './windows';

export const VEHICLE_SIZE_CLASSES = ['COMPACT', 'STANDARD', 'LARGE', 'OVERSIZED'] as const satisfies readonly VehicleSizeClass[];

const sizeRank = (size: VehicleSizeClass): number => VEHICLE_SIZE_CLASSES.indexOf(size);

/**
 * Whether a resource can ever serve a request, independent of time
 *
 * - Bay: active and `maxVehicleSizeClass >= vehicleSizeClass`
 * - Mobile team: active and the customer lies within `serviceRadiusKm` of its base
 */
export const isCompatible = (resource: Resource, query: CompatibilityQuery): boolean => {
    if (!resource.isActive || resource.kind !== query.kind) return false;
    if (resource.kind === 'STATIONARY') {
        return sizeRank(resource.maxVehicleSizeClass) >= sizeRank(query.vehicleSizeClass);
    }
    if (!query.location) return false;
    return distanceKm(resource.base, query.location) <= resource.serviceRadiusKm;
};

/**
 * Deterministic candidate order: bays by bay number, teams by id
 *
 * Ties on bay number fall back to id so the first free resource is stable.
 * Ids compare by code unit, independent of the host locale.
 */
export const orderCandidates = (resources: Resource[]): Resource[] =>
    [...resources].sort((a, b) => {
        if (a.kind === 'STATIONARY' && b.kind === 'STATIONARY' && a.bayNumber !== b.bayNumber) {
            return a.bayNumber - b.bayNumber;
        }
        return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
    });

export interface AllocationRequest {
    kind: BookingKind;
    scheduledAt: Date;
    durationMinutes: number;
    vehicleSizeClass: VehicleSizeClass;
    location?: GeoPoint;
    /** Booking whose own commitment is ignored (reschedule, service changes) */
    excludeBookingId?: string;
    /** Used to keep suggested alternatives in the bookable range */
    now: Date;
    signal?: AbortSignal;
}

export interface Allocation {
    resource: Resource;
    window: TimeSlot;
}

export interface AllocatorOptions {
    /** Maximum alternatives returned with NoCapacityAvailable (default: 3) */
    maxAlternatives?: number;
    /** How far before and after the request alternatives are searched (default: 24h) */
    searchHorizonMinutes?: number;
    /** Latest bookable day counted from `now` (default: 90) */
    maxAdvanceDays?: number;
}

/**
 * Finds a free, compatible bay or mobile team for a booking window
 *
 * Algorithm:
 * 1. Ask the directory for active, compatible resources of the requested kind
 * 2. Order them deterministically (bay number / id)
 * 3. Reject any with a commitment overlapping the window widened by the buffer
 * 4. For mobile teams, reject teams at their daily job cap
 * 5. First survivor wins; with none, scan nearby start times for alternatives
 *
 * Lookups go through the request's abort signal so a slow store fails the
 * request instead of stalling it.
 */
export class CapacityAllocator {
    private readonly maxAlternatives: number;
    private readonly searchHorizonMinutes: number;
    private readonly maxAdvanceDays: number;

    constructor(
        private readonly directory: ResourceDirectory,
        private readonly commitments: CommitmentStore,
        options: AllocatorOptions = {}
    ) {
        this.maxAlternatives = options.maxAlternatives ?? 3;
        this.searchHorizonMinutes = options.searchHorizonMinutes ?? 24 * 60;
        this.maxAdvanceDays = options.maxAdvanceDays ?? 90;
    }

    /**
     * @throws {NoCompatibleResourceError} No resource could ever serve the request
     * @throws {NoCapacityAvailableError} Every compatible resource is busy; carries alternatives
     * @throws {DeadlineExceededError} The request signal aborted during a lookup
     */
    async allocate(request: AllocationRequest): Promise<Allocation> {
        const candidates = await this.candidates(request);
        const window = bookingWindow(request.scheduledAt, request.durationMinutes);

        const resource = await this.firstFree(candidates, window, request);
        if (resource) {
            return { resource, window };
        }

        const alternatives = await this.findAlternatives(candidates, request);
        throw new NoCapacityAvailableError(
            `No ${request.kind.toLowerCase()} capacity at ${request.scheduledAt.toISOString()}`,
            alternatives
        );
    }

    /**
     * Every compatible resource free for the requested window
     *
     * @throws {NoCompatibleResourceError} No resource could ever serve the request
     */
    async availableResources(request: AllocationRequest): Promise<Resource[]> {
        const candidates = await this.candidates(request);
        const window = bookingWindow(request.scheduledAt, request.durationMinutes);
        const free: Resource[] = [];
        for (const resource of candidates) {
            if (await this.isFree(resource, window, request)) {
                free.push(resource);
            }
        }
        return free;
    }

    private async candidates(request: AllocationRequest): Promise<Resource[]> {
        const query: CompatibilityQuery = {
            kind: request.kind,
            vehicleSizeClass: request.vehicleSizeClass,
            location: request.location
        };
        const listed = await abortable(this.directory.listCompatible(query), request.signal);
        const compatible = orderCandidates(listed.filter(r => isCompatible(r, query)));

        if (compatible.length === 0) {
            throw new NoCompatibleResourceError(request.kind === 'STATIONARY'
                ? `No active bay accepts ${request.vehicleSizeClass} vehicles`
                : 'No active mobile team covers the customer location');
        }
        return compatible;
    }

    private async firstFree(candidates: Resource[], window: TimeSlot, request: AllocationRequest): Promise<Resource | undefined> {
        for (const resource of candidates) {
            if (await this.isFree(resource, window, request)) {
                return resource;
            }
        }
        return undefined;
    }

    private async isFree(resource: Resource, window: TimeSlot, request: AllocationRequest): Promise<boolean> {
        const overlapping = await abortable(
            this.commitments.findOverlapping(resource.id, window, request.excludeBookingId),
            request.signal
        );
        if (overlapping.length > 0) return false;

        if (resource.kind === 'MOBILE') {
            const jobs = await abortable(
                this.commitments.countForDay(resource.id, utcDay(window.start), request.excludeBookingId),
                request.signal
            );
            if (jobs >= resource.dailyCapacity) return false;
        }
        return true;
    }

    /**
     * Nearest start times, before or after the request, where some candidate is free
     *
     * Instants not in the future or beyond the advance limit are skipped.
     */
    private async findAlternatives(candidates: Resource[], request: AllocationRequest): Promise<Alternative[]> {
        const latest = addDays(request.now, this.maxAdvanceDays);
        const alternatives: Alternative[] = [];

        for (const start of scanAround(request.scheduledAt, this.searchHorizonMinutes)) {
            if (alternatives.length >= this.maxAlternatives) break;
            if (!isAfter(start, request.now) || isAfter(start, latest)) continue;

            const window = bookingWindow(start, request.durationMinutes);
            const resource = await this.firstFree(candidates, window, request);
            if (resource) {
                alternatives.push({
                    start: window.start.toISOString(),
                    end: window.end.toISOString(),
                    resourceId: resource.id
                });
            }
        }

        return alternatives;
    }
}
