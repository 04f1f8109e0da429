import csv from 'csv-parser';
import fs from 'fs';
import path from 'path';
import z from 'zod';

import { DataLoadError } from '../errors';
import type { SimulationInput } from '../simulation/driver';
import { distanceRowSchema, locationRowSchema, packageRowSchema, truckRowSchema } from '../types/hub-csv';
import { type Location, type TruckSpec, locationKey } from '../types/types';
import { DistanceGraph } from './distance-graph';

export const HUB_DATA_FILES = {
    locations: 'locations.csv',
    distances: 'distances.csv',
    trucks: 'trucks.csv',
    packages: 'packages.csv',
} as const;

export type HubData = Pick<SimulationInput, 'hub' | 'locations' | 'trucks' | 'packages'>;

const readCsv = (filePath: string): Promise<unknown[]> =>
    new Promise((resolve, reject) => {
        const rows: unknown[] = [];

        fs.createReadStream(filePath)
            .on('error', reject)
            .pipe(csv({ mapHeaders: ({ header }) => header.trim(), mapValues: ({ value }) => value.trim() }))
            .on('data', (row: unknown) => rows.push(row))
            .on('end', () => resolve(rows))
            .on('error', reject);
    });

const parseRows = async <T extends z.ZodTypeAny>(
    dataDir: string,
    file: string,
    schema: T,
): Promise<Array<z.output<T>>> => {
    const filePath = path.join(dataDir, file);
    const raw = await readCsv(filePath);
    const result = schema.array().safeParse(raw);

    if (!result.success) {
        throw new DataLoadError(`Invalid rows in ${filePath}: ${result.error.message}`, result.error.issues);
    }

    return result.data;
};

/**
 * Reads a hub data set from `dataDir`. The first row of locations.csv is the hub. Distances are an
 * undirected edge list; every pair of locations must be present and a location is 0 miles from itself.
 */
export const loadHubData = async (dataDir: string): Promise<HubData> => {
    const [locationRows, distanceRows, truckRows, packageRows] = await Promise.all([
        parseRows(dataDir, HUB_DATA_FILES.locations, locationRowSchema),
        parseRows(dataDir, HUB_DATA_FILES.distances, distanceRowSchema),
        parseRows(dataDir, HUB_DATA_FILES.trucks, truckRowSchema),
        parseRows(dataDir, HUB_DATA_FILES.packages, packageRowSchema),
    ]);

    if (locationRows.length === 0) {
        throw new DataLoadError(`${HUB_DATA_FILES.locations} has no rows, the first row must be the hub`);
    }

    const locationsById = new Map<number, Location>();
    const graph = new DistanceGraph();

    for (const { id, address, city, state, zip } of locationRows) {
        const location: Location = { address, city, state, zipCode: zip };
        locationsById.set(id, location);
        graph.addVertex(location);
        graph.addEdge(location, location, 0);
    }

    const getLocation = (id: number): Location => {
        const location = locationsById.get(id);
        if (!location) {
            throw new DataLoadError(`${HUB_DATA_FILES.distances} references unknown location ${id}`);
        }
        return location;
    };

    for (const { from_id, to_id, miles } of distanceRows) {
        const from = getLocation(from_id);
        const to = getLocation(to_id);
        graph.addEdge(from, to, miles);
        graph.addEdge(to, from, miles);
    }

    const vertices = graph.vertices();
    for (const from of vertices) {
        for (const to of vertices) {
            try {
                graph.distance(from, to);
            } catch (error) {
                throw new DataLoadError(`Missing distance between ${locationKey(from)} and ${locationKey(to)}`, error);
            }
        }
    }

    const trucks: TruckSpec[] = truckRows.map(({ id, capacity, avg_speed_mph, delivery_time_min }) => ({
        id,
        packageCapacity: capacity,
        avgSpeedMph: avg_speed_mph,
        deliveryDelayMin: delivery_time_min,
    }));
    const truckIds = new Set(trucks.map(({ id }) => id));

    const packages: HubData['packages'] = packageRows.map(row => {
        const location: Location = { address: row.address, city: row.city, state: row.state, zipCode: row.zip };

        if (!graph.has(location)) {
            throw new DataLoadError(`Package ${row.id} is addressed to unknown location ${locationKey(location)}`);
        }
        if (row.truck_id !== null && !truckIds.has(row.truck_id)) {
            throw new DataLoadError(`Package ${row.id} requires unknown truck ${row.truck_id}`);
        }

        return {
            id: row.id,
            location,
            arrivalTime: row.arrival_time,
            deliveryDeadline: row.deadline,
            massKg: row.mass_kg,
            requiredTruckId: row.truck_id,
            groupId: row.group_id,
            note: row.note,
        };
    });

    return { hub: getLocation(locationRows[0].id), locations: graph, trucks, packages };
};
