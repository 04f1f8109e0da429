import { invariant } from '../errors';
import { TruckStatus, isSameLocation } from '../types/types';
import type { Location, TruckSnapshot, TruckSpec } from '../types/types';
import { type Clock, MINUTES_PER_HOUR } from '../utils/clock';
import type { SimulationContext } from './context';
import { deliverPackage } from './package-lifecycle';

/** Whole minutes to drive `miles` at `avgSpeedMph`, rounded down */
export const travelMinutes = (miles: number, avgSpeedMph: number): number =>
    Math.floor((miles * MINUTES_PER_HOUR) / avgSpeedMph);

export class Truck implements TruckSpec {
    readonly id: number;
    readonly packageCapacity: number;
    readonly avgSpeedMph: number;
    readonly deliveryDelayMin: number;

    status: TruckStatus = TruckStatus.AT_HUB;
    /** Loaded packages, next delivery first once the route is planned */
    packageIds: number[] = [];
    milesTraveled = 0;
    routeTraveled: Location[] = [];
    nextDestination: Location | null = null;
    arrivalTime: Clock | null = null;

    constructor({ id, packageCapacity, avgSpeedMph, deliveryDelayMin }: TruckSpec) {
        this.id = id;
        this.packageCapacity = packageCapacity;
        this.avgSpeedMph = avgSpeedMph;
        this.deliveryDelayMin = deliveryDelayMin;
    }

    get remainingCapacity(): number {
        return this.packageCapacity - this.packageIds.length;
    }

    snapshot(): TruckSnapshot {
        return {
            status: this.status,
            milesTraveled: this.milesTraveled,
            routeTraveled: this.routeTraveled,
            nextDestination: this.nextDestination,
            arrivalTime: this.arrivalTime,
        };
    }

    /** First log entry, made while the truck sits at the hub before the day starts */
    register(ctx: SimulationContext): void {
        this.log(ctx);
    }

    depart(ctx: SimulationContext): void {
        invariant(this.status === TruckStatus.AT_HUB, `Truck ${this.id} cannot depart, it is not at the hub`);
        invariant(this.packageIds.length > 0, `Truck ${this.id} cannot depart without packages`);

        this.status = TruckStatus.OUT_FOR_DELIVERIES;
        this.headTo(ctx.hub, ctx.packages.get(this.packageIds[0]).location, ctx);

        ctx.logger.debug(`Truck ${this.id} departing hub at ${ctx.now} with packages ${this.packageIds.join(', ')}`);
    }

    /** Move the truck forward to the current minute: deliver, head on, or dock */
    advance(ctx: SimulationContext): void {
        if (this.status === TruckStatus.AT_HUB) {
            return;
        }

        const { nextDestination, arrivalTime } = this;
        invariant(
            nextDestination !== null && arrivalTime !== null,
            `Truck ${this.id} is out for deliveries without a destination`,
        );

        if (arrivalTime.isAfter(ctx.now)) {
            return;
        }

        if (this.packageIds.length === 0) {
            this.dock(nextDestination, ctx);
        } else {
            this.deliverNext(nextDestination, ctx);
        }
    }

    private deliverNext(currentLocation: Location, ctx: SimulationContext): void {
        const packageId = this.packageIds.shift();
        invariant(packageId !== undefined, `Truck ${this.id} has no package to deliver`);

        const pkg = ctx.packages.get(packageId);
        invariant(
            isSameLocation(pkg.location, currentLocation),
            `Truck ${this.id} is at the wrong stop for package ${packageId}`,
        );

        const status = deliverPackage(pkg, ctx);
        ctx.logger.debug(`Truck ${this.id} delivered package ${packageId} at ${ctx.now} (${status})`);

        const nextStop = this.packageIds.length > 0 ? ctx.packages.get(this.packageIds[0]).location : ctx.hub;
        this.headTo(currentLocation, nextStop, ctx);
    }

    private dock(hub: Location, ctx: SimulationContext): void {
        invariant(isSameLocation(hub, ctx.hub), `Truck ${this.id} ran out of packages away from the hub`);

        this.updateMilesTraveled(hub, ctx);
        this.status = TruckStatus.AT_HUB;
        this.nextDestination = null;
        this.arrivalTime = null;
        this.log(ctx);

        ctx.logger.debug(`Truck ${this.id} docked at ${ctx.now}, ${this.milesTraveled.toFixed(1)} miles so far`);
    }

    private headTo(from: Location, to: Location, ctx: SimulationContext): void {
        const miles = ctx.locations.distance(from, to);

        this.updateMilesTraveled(from, ctx);
        this.nextDestination = to;
        this.arrivalTime = ctx.now.addMinutes(travelMinutes(miles, this.avgSpeedMph));
        this.log(ctx);
    }

    /** Miles only grow when the truck actually moved since the last visited location */
    private updateMilesTraveled(location: Location, ctx: SimulationContext): void {
        const last = this.routeTraveled[this.routeTraveled.length - 1];

        if (last === undefined) {
            this.routeTraveled.push(location);
        } else if (!isSameLocation(last, location)) {
            this.milesTraveled += ctx.locations.distance(last, location);
            this.routeTraveled.push(location);
        }
    }

    private log(ctx: SimulationContext): void {
        ctx.truckLog.record(this.id, this.snapshot(), ctx.now);
    }
}
