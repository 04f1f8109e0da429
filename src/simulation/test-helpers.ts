import type { Location, TruckSpec } from '../types/types';
import { Clock } from '../utils/clock';
import { DistanceGraph } from '../utils/distance-graph';
import { DeliverySimulation } from './driver';
import type { SimulationInput } from './driver';

export type PackageInput = SimulationInput['packages'][number];

export const place = (address: string): Location => ({ address, city: 'Springvale', state: 'OR', zipCode: '97000' });

export const HUB = place('0 Depot Rd');

/** Every location sits on one road; distance is the difference in mile markers */
export const buildLineGraph = (stops: ReadonlyArray<[Location, number]>): DistanceGraph => {
    const graph = new DistanceGraph();
    const all: Array<[Location, number]> = [[HUB, 0], ...stops];

    for (const [location] of all) {
        graph.addVertex(location);
    }
    for (const [from, fromMile] of all) {
        for (const [to, toMile] of all) {
            graph.addEdge(from, to, Math.abs(fromMile - toMile));
        }
    }

    return graph;
};

export const makeTruck = (id: number, packageCapacity = 16, avgSpeedMph = 18, deliveryDelayMin = 0): TruckSpec => ({
    id,
    packageCapacity,
    avgSpeedMph,
    deliveryDelayMin,
});

export const makePackage = (id: number, location: Location, overrides: Partial<PackageInput> = {}): PackageInput => ({
    id,
    location,
    arrivalTime: null,
    deliveryDeadline: null,
    massKg: 1,
    requiredTruckId: null,
    groupId: null,
    note: '',
    ...overrides,
});

export const makeSimulation = (
    stops: ReadonlyArray<[Location, number]>,
    trucks: ReadonlyArray<TruckSpec>,
    packages: ReadonlyArray<PackageInput>,
    startTime: Clock = Clock.of(8),
): DeliverySimulation =>
    new DeliverySimulation({ hub: HUB, startTime, locations: buildLineGraph(stops), trucks, packages });
