/**
 * @module loading-policy
 * @description
 * Decides, for one docked truck, whether this minute is a good time to load and which ready
 * packages go on board.
 *
 * Timing is an ordered decision table evaluated against a look-ahead window of 1h15m; the first
 * rule that returns a decision wins, and the truck loads when none does. Package selection keeps delivery groups whole, puts pinned
 * packages and same-address drops next to each other, and serves deadlines first.
 */

import { PackageStatus, TruckStatus, locationKey, needsDelivery } from '../types/types';
import type { Package } from '../types/types';
import { Clock, compareOptionalClock } from '../utils/clock';
import type { SimulationContext } from './context';
import { loadPackage } from './package-lifecycle';
import { planRoute } from './route-planner';
import type { Truck } from './truck';

export const LOOK_AHEAD_MINUTES = 75;

export type LoadingDecision = 'load' | 'hold';

/** Facts about the outstanding packages the timing rules are evaluated against */
export interface LoadingWindow {
    readonly now: Clock;
    readonly threshold: Clock;
    readonly truckId: number;
    readonly truckCapacity: number;
    /** Packages that are PENDING or READY_FOR_PICKUP */
    readonly outstanding: ReadonlyArray<Package>;
    readonly earliestDeadline: Clock | null;
    /** Earliest arrival time still in the future */
    readonly earliestUpcomingArrival: Clock | null;
    readonly pinnedTruckIds: ReadonlySet<number>;
}

export interface LoadingRule {
    readonly name: string;
    decide(window: LoadingWindow): LoadingDecision | undefined;
}

export const LOADING_RULES: ReadonlyArray<LoadingRule> = [
    {
        name: 'deadline-within-window',
        decide: ({ earliestDeadline, threshold }) =>
            earliestDeadline !== null && earliestDeadline.isBefore(threshold) ? 'load' : undefined,
    },
    {
        name: 'arrivals-within-window',
        decide: ({ earliestUpcomingArrival, threshold }) =>
            earliestUpcomingArrival !== null && earliestUpcomingArrival.isBefore(threshold) ? 'hold' : undefined,
    },
    {
        name: 'rest-belongs-to-another-truck',
        decide: ({ outstanding, truckCapacity, pinnedTruckIds, truckId }) =>
            outstanding.length <= truckCapacity && pinnedTruckIds.size > 0 && !pinnedTruckIds.has(truckId)
                ? 'hold'
                : undefined,
    },
];

export const buildLoadingWindow = (truck: Truck, ctx: SimulationContext): LoadingWindow => {
    const outstanding = ctx.packages.values().filter(pkg => needsDelivery(pkg.status));

    let earliestDeadline: Clock | null = null;
    let earliestUpcomingArrival: Clock | null = null;
    const pinnedTruckIds = new Set<number>();

    for (const { deliveryDeadline, arrivalTime, requiredTruckId } of outstanding) {
        if (deliveryDeadline !== null && (earliestDeadline === null || deliveryDeadline.isBefore(earliestDeadline))) {
            earliestDeadline = deliveryDeadline;
        }
        if (
            arrivalTime !== null &&
            arrivalTime.isAfter(ctx.now) &&
            (earliestUpcomingArrival === null || arrivalTime.isBefore(earliestUpcomingArrival))
        ) {
            earliestUpcomingArrival = arrivalTime;
        }
        if (requiredTruckId !== null) {
            pinnedTruckIds.add(requiredTruckId);
        }
    }

    return {
        now: ctx.now,
        threshold: ctx.now.addMinutes(LOOK_AHEAD_MINUTES),
        truckId: truck.id,
        truckCapacity: truck.packageCapacity,
        outstanding,
        earliestDeadline,
        earliestUpcomingArrival,
        pinnedTruckIds,
    };
};

export const decideLoading = (
    window: LoadingWindow,
    rules: ReadonlyArray<LoadingRule> = LOADING_RULES,
): { decision: LoadingDecision; rule: string } => {
    for (const rule of rules) {
        const decision = rule.decide(window);
        if (decision !== undefined) {
            return { decision, rule: rule.name };
        }
    }
    return { decision: 'load', rule: 'default' };
};

/**
 * Ready packages this truck may take. A package that is excluded (not ready, or pinned to another
 * truck) takes every other member of its group out of this pass with it.
 */
export const selectLoadableCandidates = (truckId: number, packages: ReadonlyArray<Package>): Package[] => {
    const blockedGroups = new Set<number>();

    const loadable = packages.filter(pkg => {
        const isReady = pkg.status === PackageStatus.READY_FOR_PICKUP;
        const fitsTruck = pkg.requiredTruckId === null || pkg.requiredTruckId === truckId;

        if ((!isReady || !fitsTruck) && pkg.groupId !== null) {
            blockedGroups.add(pkg.groupId);
        }

        return isReady && fitsTruck;
    });

    return loadable.filter(pkg => pkg.groupId === null || !blockedGroups.has(pkg.groupId));
};

const compareByDestinationThenPin = (a: Package, b: Package): number => {
    const keyA = locationKey(a.location);
    const keyB = locationKey(b.location);
    if (keyA !== keyB) {
        return keyA < keyB ? -1 : 1;
    }

    // Pinned packages first, then by pinned truck id
    if (a.requiredTruckId === null || b.requiredTruckId === null) {
        return Number(a.requiredTruckId === null) - Number(b.requiredTruckId === null);
    }
    return a.requiredTruckId - b.requiredTruckId;
};

/** Loading order: deadline-bearing packages by deadline, then the rest, each clustered by destination */
export const prioritizeCandidates = (candidates: ReadonlyArray<Package>): Package[] => {
    const clustered = [...candidates].sort(compareByDestinationThenPin);

    const withDeadline = clustered
        .filter(pkg => pkg.deliveryDeadline !== null)
        .sort((a, b) => compareOptionalClock(a.deliveryDeadline, b.deliveryDeadline));
    const withoutDeadline = clustered.filter(pkg => pkg.deliveryDeadline === null);

    return [...withDeadline, ...withoutDeadline];
};

/** Takes packages off the front of the queue until the truck is full; groups board whole or not at all */
export const pickPackagesToLoad = (queue: ReadonlyArray<Package>, capacity: number): Package[] => {
    const remaining = [...queue];
    const picked: Package[] = [];
    let capacityLeft = capacity;

    while (capacityLeft > 0 && remaining.length > 0) {
        const next = remaining[0];
        const batch = next.groupId === null ? [next] : remaining.filter(pkg => pkg.groupId === next.groupId);

        if (batch.length <= capacityLeft) {
            picked.push(...batch);
            capacityLeft -= batch.length;
        }

        for (const pkg of batch) {
            remaining.splice(remaining.indexOf(pkg), 1);
        }
    }

    return picked;
};

/**
 * Runs the full loading decision for one truck. Returns the ids loaded this minute (already in
 * planned delivery order); when non-empty the truck has departed.
 */
export const loadTruck = (truck: Truck, ctx: SimulationContext): number[] => {
    if (truck.status !== TruckStatus.AT_HUB || truck.remainingCapacity <= 0) {
        return [];
    }

    const { decision, rule } = decideLoading(buildLoadingWindow(truck, ctx));
    if (decision === 'hold') {
        ctx.logger.debug(`Truck ${truck.id} holding at ${ctx.now} (${rule})`);
        return [];
    }

    const queue = prioritizeCandidates(selectLoadableCandidates(truck.id, ctx.packages.values()));
    const picked = pickPackagesToLoad(queue, truck.remainingCapacity);

    if (picked.length === 0) {
        return [];
    }

    // One shared minute for the whole batch so group members leave together
    const loadedAt = picked
        .map(pkg => ctx.packageLog.nextStartTime(pkg.id, ctx.now))
        .reduce((latest, time) => (time.isAfter(latest) ? time : latest));

    for (const pkg of picked) {
        loadPackage(pkg, truck.id, ctx, loadedAt);
        truck.packageIds.push(pkg.id);
    }

    planRoute(truck.packageIds, ctx.hub, ctx);
    truck.depart(ctx);

    return [...truck.packageIds];
};
