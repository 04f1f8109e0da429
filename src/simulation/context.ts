import type { Location, Package, PackageSnapshot, TruckSnapshot } from '../types/types';
import type { Clock } from '../utils/clock';
import type { DistanceGraph } from '../utils/distance-graph';
import type { EntityStore } from '../utils/entity-store';
import type { Logger } from '../utils/logger';
import type { StatusLog } from './status-log';
import type { Truck } from './truck';

/** Everything one simulation run reads and mutates, passed explicitly to each component */
export interface SimulationContext {
    /** Minute currently being simulated */
    now: Clock;
    readonly hub: Location;
    readonly packages: EntityStore<Package>;
    readonly trucks: EntityStore<Truck>;
    readonly locations: DistanceGraph;
    readonly packageLog: StatusLog<PackageSnapshot>;
    readonly truckLog: StatusLog<TruckSnapshot>;
    readonly logger: Logger;
}
