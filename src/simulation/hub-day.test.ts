import { fileURLToPath } from 'url';
import { beforeAll, describe, expect, it } from 'vitest';

import { PackageStatus, TruckStatus, isDelivered } from '../types/types';
import { Clock, MINUTES_PER_DAY } from '../utils/clock';
import { loadHubData } from '../utils/hub-loader';
import { DeliverySimulation, type SimulationResult } from './driver';

const DATA_DIR = fileURLToPath(new URL('../../data', import.meta.url));

let simulation: DeliverySimulation;
let result: SimulationResult;

beforeAll(async () => {
    simulation = new DeliverySimulation({ ...(await loadHubData(DATA_DIR)), startTime: Clock.of(8) });
    result = simulation.run();
});

const outForDeliveryAt = (packageId: number) =>
    simulation.ctx.packageLog
        .history(packageId)
        .find(({ status }) => status === PackageStatus.OUT_FOR_DELIVERY)?.startTime.totalMinutes;

describe('A delivery day on the bundled hub data', () => {
    it('should deliver every package before the day runs out', () => {
        expect(result.ticks).toBeLessThan(MINUTES_PER_DAY);
        expect(simulation.ctx.packages.size).toBe(30);
        expect(simulation.ctx.packages.values().every(pkg => isDelivered(pkg.status))).toBe(true);
        expect(simulation.ctx.trucks.values().every(truck => truck.status === TruckStatus.AT_HUB)).toBe(true);
    });

    it('should keep every package history contiguous and in lifecycle order', () => {
        for (const id of simulation.ctx.packages.keys()) {
            const history = simulation.ctx.packageLog.history(id);

            for (let i = 1; i < history.length; ++i) {
                expect(history[i - 1].endTime?.totalMinutes).toBe(history[i].startTime.totalMinutes);
            }
            expect(history[history.length - 1].endTime).toBeNull();

            const statuses = history.map(({ status }) => status);
            const distinct = statuses.filter((status, i) => i === 0 || statuses[i - 1] !== status);
            expect(distinct.slice(0, 3)).toEqual([
                PackageStatus.PENDING,
                PackageStatus.READY_FOR_PICKUP,
                PackageStatus.OUT_FOR_DELIVERY,
            ]);
            expect(distinct).toHaveLength(4);
            expect(isDelivered(distinct[3])).toBe(true);
        }
    });

    it('should never load a package before it arrives at the hub', () => {
        for (const pkg of simulation.ctx.packages.values()) {
            const loadedAt = outForDeliveryAt(pkg.id);

            expect(loadedAt).toBeDefined();
            if (pkg.arrivalTime !== null && loadedAt !== undefined) {
                expect(loadedAt).toBeGreaterThanOrEqual(pkg.arrivalTime.totalMinutes);
            }
        }
    });

    it('should keep delivery group 1 on one truck', () => {
        const [first, ...rest] = [13, 14, 15].map(id => simulation.ctx.packages.get(id));

        for (const pkg of rest) {
            expect(pkg.assignedTruckId).toBe(first.assignedTruckId);
            expect(outForDeliveryAt(pkg.id)).toBe(outForDeliveryAt(first.id));
        }
    });

    it('should honor required trucks', () => {
        expect(simulation.ctx.packages.get(3).assignedTruckId).toBe(2);
        expect(simulation.ctx.packages.get(18).assignedTruckId).toBe(2);
        expect(simulation.ctx.packages.get(30).assignedTruckId).toBe(3);
    });
});
