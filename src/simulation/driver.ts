import { SimulationInvariantError } from '../errors';
import { PackageStatus, TruckStatus, isDelivered } from '../types/types';
import type { Location, Package, PackageSnapshot, TruckSnapshot, TruckSpec } from '../types/types';
import { type Clock, MINUTES_PER_DAY } from '../utils/clock';
import type { DistanceGraph } from '../utils/distance-graph';
import { EntityStore } from '../utils/entity-store';
import { type Logger, silentLogger } from '../utils/logger';
import type { SimulationContext } from './context';
import { loadTruck } from './loading-policy';
import { updatePendingPackage } from './package-lifecycle';
import { StatusLog } from './status-log';
import { Truck } from './truck';

const isOut = (truck: Truck): boolean => truck.status === TruckStatus.OUT_FOR_DELIVERIES;

export interface SimulationInput {
    readonly hub: Location;
    readonly startTime: Clock;
    readonly locations: DistanceGraph;
    readonly trucks: ReadonlyArray<TruckSpec>;
    /** Static package data; status and assignment are reset to PENDING / unassigned */
    readonly packages: ReadonlyArray<Omit<Package, 'status' | 'assignedTruckId'>>;
    readonly logger?: Logger;
}

export interface SimulationResult {
    readonly startTime: Clock;
    readonly endTime: Clock;
    readonly ticks: number;
}

/**
 * Minute-stepped delivery day. Each tick promotes arrived packages, lets docked trucks load and
 * depart, then moves trucks that are out; the clock advances after all of that.
 */
export class DeliverySimulation {
    readonly ctx: SimulationContext;
    readonly startTime: Clock;
    private ticks = 0;
    private started = false;

    constructor({ hub, startTime, locations, trucks, packages, logger = silentLogger }: SimulationInput) {
        this.startTime = startTime;
        this.ctx = {
            now: startTime,
            hub,
            locations,
            packages: new EntityStore<Package>('package'),
            trucks: new EntityStore<Truck>('truck'),
            packageLog: new StatusLog<PackageSnapshot>(),
            truckLog: new StatusLog<TruckSnapshot>(),
            logger,
        };

        for (const spec of trucks) {
            this.ctx.trucks.insert(spec.id, new Truck(spec));
        }
        for (const pkg of packages) {
            this.ctx.packages.insert(pkg.id, { ...pkg, status: PackageStatus.PENDING, assignedTruckId: null });
        }
    }

    get now(): Clock {
        return this.ctx.now;
    }

    run(): SimulationResult {
        this.start();

        while (!this.isFinished()) {
            if (this.ticks >= MINUTES_PER_DAY) {
                throw new SimulationInvariantError(
                    `Deliveries not finished after ${MINUTES_PER_DAY} minutes, ${this.undeliveredCount()} packages left`,
                );
            }
            this.tick();
        }

        this.ctx.logger.debug(`Simulation finished at ${this.ctx.now} after ${this.ticks} ticks`);

        return { startTime: this.startTime, endTime: this.ctx.now, ticks: this.ticks };
    }

    /** One simulated minute */
    tick(): void {
        this.start();

        for (const pkg of this.ctx.packages.values()) {
            if (pkg.status === PackageStatus.PENDING) {
                updatePendingPackage(pkg, this.ctx);
            }
        }

        for (const truck of this.ctx.trucks.values()) {
            if (truck.status === TruckStatus.AT_HUB) {
                loadTruck(truck, this.ctx);
            }
        }

        for (const truck of this.ctx.trucks.values()) {
            if (truck.status === TruckStatus.OUT_FOR_DELIVERIES) {
                truck.advance(this.ctx);
            }
        }

        this.ctx.now = this.ctx.now.addMinutes(1);
        ++this.ticks;
    }

    isFinished(): boolean {
        return this.undeliveredCount() === 0 && !this.ctx.trucks.values().some(isOut);
    }

    private undeliveredCount(): number {
        return this.ctx.packages.values().filter(pkg => !isDelivered(pkg.status)).length;
    }

    private start(): void {
        if (this.started) {
            return;
        }
        this.started = true;

        for (const truck of this.ctx.trucks.values()) {
            truck.register(this.ctx);
        }
    }
}
