/**
 * @module package-lifecycle
 * @description
 * Every package status change goes through here so the live entity and its log never disagree.
 *
 * PENDING -> READY_FOR_PICKUP -> OUT_FOR_DELIVERY -> DELIVERED | DELIVERED_LATE
 */

import { invariant } from '../errors';
import { PackageStatus } from '../types/types';
import type { Package } from '../types/types';
import type { Clock } from '../utils/clock';
import type { SimulationContext } from './context';

const ALLOWED_TRANSITIONS: Record<PackageStatus, ReadonlyArray<PackageStatus>> = {
    [PackageStatus.PENDING]: [PackageStatus.READY_FOR_PICKUP],
    [PackageStatus.READY_FOR_PICKUP]: [PackageStatus.OUT_FOR_DELIVERY],
    [PackageStatus.OUT_FOR_DELIVERY]: [PackageStatus.DELIVERED, PackageStatus.DELIVERED_LATE],
    [PackageStatus.DELIVERED]: [],
    [PackageStatus.DELIVERED_LATE]: [],
};

const transition = (pkg: Package, next: PackageStatus, ctx: SimulationContext, time: Clock = ctx.now): void => {
    invariant(
        ALLOWED_TRANSITIONS[pkg.status].includes(next),
        `Package ${pkg.id} cannot move from ${pkg.status} to ${next}`,
    );

    pkg.status = next;
    ctx.packageLog.record(pkg.id, { status: next }, time);
};

export const isArrived = (pkg: Package, ctx: SimulationContext): boolean =>
    pkg.arrivalTime === null || !pkg.arrivalTime.isAfter(ctx.now);

/**
 * Called once per tick for a PENDING package. The package is logged every tick it stays pending;
 * on the tick its arrival time is reached it is promoted and logged READY_FOR_PICKUP as well.
 */
export const updatePendingPackage = (pkg: Package, ctx: SimulationContext): void => {
    invariant(pkg.status === PackageStatus.PENDING, `Package ${pkg.id} is not pending`);

    ctx.packageLog.record(pkg.id, { status: PackageStatus.PENDING }, ctx.now);

    if (isArrived(pkg, ctx)) {
        transition(pkg, PackageStatus.READY_FOR_PICKUP, ctx);
    }
};

export const loadPackage = (pkg: Package, truckId: number, ctx: SimulationContext, time: Clock = ctx.now): void => {
    invariant(
        pkg.requiredTruckId === null || pkg.requiredTruckId === truckId,
        `Package ${pkg.id} is pinned to truck ${pkg.requiredTruckId}, not ${truckId}`,
    );

    transition(pkg, PackageStatus.OUT_FOR_DELIVERY, ctx, time);
    pkg.assignedTruckId = truckId;
};

/** Late iff a deadline is set and the logged delivery minute is strictly after it */
export const deliverPackage = (pkg: Package, ctx: SimulationContext): PackageStatus => {
    const deliveredAt = ctx.packageLog.nextStartTime(pkg.id, ctx.now);
    const isLate = pkg.deliveryDeadline !== null && deliveredAt.isAfter(pkg.deliveryDeadline);

    transition(pkg, isLate ? PackageStatus.DELIVERED_LATE : PackageStatus.DELIVERED, ctx, deliveredAt);

    return pkg.status;
};
