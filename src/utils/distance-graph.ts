import { NotFoundError } from '../errors';
import { type Location, locationKey } from '../types/types';

/** Weighted directed graph of locations, edge weights in miles */
export class DistanceGraph {
    private readonly locations = new Map<string, Location>();
    private readonly edges = new Map<string, Map<string, number>>();

    addVertex(location: Location): void {
        const key = locationKey(location);
        if (!this.locations.has(key)) {
            this.locations.set(key, location);
            this.edges.set(key, new Map());
        }
    }

    addEdge(from: Location, to: Location, miles: number): void {
        this.adjacent(from).set(locationKey(to), miles);
    }

    distance(from: Location, to: Location): number {
        const miles = this.adjacent(from).get(locationKey(to));
        if (miles === undefined) {
            throw new NotFoundError('route', `${locationKey(from)} -> ${locationKey(to)}`);
        }
        return miles;
    }

    has(location: Location): boolean {
        return this.locations.has(locationKey(location));
    }

    vertices(): Location[] {
        return Array.from(this.locations.values());
    }

    private adjacent(location: Location): Map<string, number> {
        const adjacent = this.edges.get(locationKey(location));
        if (!adjacent) {
            throw new NotFoundError('location', locationKey(location));
        }
        return adjacent;
    }
}

if (import.meta.vitest) {
    const { test, expect } = import.meta.vitest;

    const makeLoc = (address: string): Location => ({ address, city: 'Springvale', state: 'OR', zipCode: '97000' });

    test('should look up distances by full location identity', () => {
        const graph = new DistanceGraph();
        const hub = makeLoc('1 Depot Rd');
        const stop = makeLoc('5 Elm St');

        graph.addVertex(hub);
        graph.addVertex(stop);
        graph.addEdge(hub, stop, 3.2);

        expect(graph.distance({ ...hub }, { ...stop })).toBe(3.2);
        expect(() => graph.distance(stop, hub)).toThrowError(NotFoundError);
        expect(() => graph.distance(makeLoc('9 Nowhere Ln'), hub)).toThrowError('No location found');
    });
}
