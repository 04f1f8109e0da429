import { describe, it, expect } from 'vitest';

import { SimulationInvariantError } from '../errors';
import { PackageStatus, TruckStatus } from '../types/types';
import { Clock } from '../utils/clock';
import { travelMinutes } from './truck';
import { HUB, makePackage, makeSimulation, makeTruck, place } from './test-helpers';

const THREE_MILES = place('3 Main St');
const SIX_MILES = place('6 Main St');

describe('DeliverySimulation', () => {
    it('should deliver a single package after a 10 minute drive', () => {
        const sim = makeSimulation(
            [[THREE_MILES, 3]],
            [makeTruck(1, 16, 18)],
            [makePackage(1, THREE_MILES, { arrivalTime: Clock.of(8), deliveryDeadline: Clock.of(10, 30) })],
        );

        const result = sim.run();

        expect(travelMinutes(3, 18)).toBe(10);
        expect(result.ticks).toBe(21);
        expect(result.endTime.totalMinutes).toBe(Clock.of(8, 21).totalMinutes);

        const pkg = sim.ctx.packages.get(1);
        expect(pkg.status).toBe(PackageStatus.DELIVERED);
        expect(pkg.assignedTruckId).toBe(1);

        const delivered = sim.ctx.packageLog.current(1);
        expect(delivered.status).toBe(PackageStatus.DELIVERED);
        expect(delivered.startTime.totalMinutes).toBe(Clock.of(8, 10).totalMinutes);

        const truck = sim.ctx.trucks.get(1);
        expect(truck.status).toBe(TruckStatus.AT_HUB);
        expect(truck.milesTraveled).toBe(6);
        expect(truck.routeTraveled).toEqual([HUB, THREE_MILES, HUB]);
    });

    it('should record the truck position at any past minute', () => {
        const sim = makeSimulation(
            [[THREE_MILES, 3]],
            [makeTruck(1, 16, 18)],
            [makePackage(1, THREE_MILES, { deliveryDeadline: Clock.of(10, 30) })],
        );
        sim.run();

        const outbound = sim.ctx.truckLog.query(1, Clock.of(8, 5));
        expect(outbound.status).toBe(TruckStatus.OUT_FOR_DELIVERIES);
        expect(outbound.nextDestination).toEqual(THREE_MILES);
        expect(outbound.arrivalTime?.totalMinutes).toBe(Clock.of(8, 10).totalMinutes);
        expect(outbound.milesTraveled).toBe(0);

        const inbound = sim.ctx.truckLog.query(1, Clock.of(8, 15));
        expect(inbound.nextDestination).toEqual(HUB);
        expect(inbound.arrivalTime?.totalMinutes).toBe(Clock.of(8, 20).totalMinutes);
        expect(inbound.milesTraveled).toBe(3);

        const docked = sim.ctx.truckLog.query(1, Clock.of(8, 20));
        expect(docked.status).toBe(TruckStatus.AT_HUB);
        expect(docked.milesTraveled).toBe(6);
    });

    it('should mark a delivery late only when it is strictly after the deadline', () => {
        const late = makeSimulation(
            [[THREE_MILES, 3]],
            [makeTruck(1)],
            [makePackage(1, THREE_MILES, { deliveryDeadline: Clock.of(8, 9) })],
        );
        late.run();
        expect(late.ctx.packages.get(1).status).toBe(PackageStatus.DELIVERED_LATE);

        const onTime = makeSimulation(
            [[THREE_MILES, 3]],
            [makeTruck(1)],
            [makePackage(1, THREE_MILES, { deliveryDeadline: Clock.of(8, 10) })],
        );
        onTime.run();
        expect(onTime.ctx.packages.get(1).status).toBe(PackageStatus.DELIVERED);
    });

    it('should log every package through the full lifecycle in order', () => {
        const sim = makeSimulation(
            [[THREE_MILES, 3]],
            [makeTruck(1)],
            [makePackage(1, THREE_MILES, { arrivalTime: Clock.of(8, 30) })],
        );
        sim.run();

        const statuses = sim.ctx.packageLog.history(1).map(({ status }) => status);
        const distinct = statuses.filter((status, i) => i === 0 || statuses[i - 1] !== status);

        expect(statuses.filter(status => status === PackageStatus.PENDING)).toHaveLength(31);
        expect(distinct).toEqual([
            PackageStatus.PENDING,
            PackageStatus.READY_FOR_PICKUP,
            PackageStatus.OUT_FOR_DELIVERY,
            PackageStatus.DELIVERED,
        ]);
        expect(sim.ctx.packageLog.query(1, Clock.of(8, 29)).status).toBe(PackageStatus.PENDING);
    });

    it('should time every leg by driving distance alone', () => {
        const sim = makeSimulation(
            [
                [THREE_MILES, 3],
                [SIX_MILES, 6],
            ],
            [makeTruck(1, 16, 18, 5)],
            [makePackage(1, THREE_MILES), makePackage(2, SIX_MILES)],
        );

        const result = sim.run();

        expect(sim.ctx.packageLog.current(1).startTime.toString()).toBe('08:10 AM');
        expect(sim.ctx.packageLog.current(2).startTime.toString()).toBe('08:20 AM');
        expect(result.endTime.toString()).toBe('08:41 AM');
        expect(sim.ctx.trucks.get(1).milesTraveled).toBe(12);
    });

    it('should judge lateness by the minute the delivery is logged at', () => {
        const nearby = place('0.2 Main St');
        const deliverWithDeadline = (deadline: Clock) => {
            const sim = makeSimulation(
                [[nearby, 0.2]],
                [makeTruck(1)],
                [makePackage(1, nearby, { deliveryDeadline: deadline })],
            );
            sim.run();
            return sim;
        };

        const late = deliverWithDeadline(Clock.of(8, 1));
        const delivered = late.ctx.packageLog.current(1);
        expect(late.ctx.packages.get(1).status).toBe(PackageStatus.DELIVERED_LATE);
        expect(delivered.status).toBe(PackageStatus.DELIVERED_LATE);
        expect(delivered.startTime.toString()).toBe('08:03 AM');

        const onTime = deliverWithDeadline(Clock.of(8, 3));
        expect(onTime.ctx.packages.get(1).status).toBe(PackageStatus.DELIVERED);
    });

    it('should never put a package pinned to truck 2 on truck 1', () => {
        const sim = makeSimulation(
            [[THREE_MILES, 3]],
            [makeTruck(1), makeTruck(2)],
            [makePackage(1, THREE_MILES, { requiredTruckId: 2, deliveryDeadline: Clock.of(9) })],
        );
        sim.run();

        expect(sim.ctx.packages.get(1).assignedTruckId).toBe(2);
        expect(sim.ctx.truckLog.history(1)).toHaveLength(1);
        expect(sim.ctx.trucks.get(1).milesTraveled).toBe(0);
        expect(sim.ctx.trucks.get(2).milesTraveled).toBe(6);
    });

    it('should load a whole group on one truck in one pass', () => {
        const sim = makeSimulation(
            [
                [THREE_MILES, 3],
                [SIX_MILES, 6],
            ],
            [makeTruck(1, 2), makeTruck(2, 2)],
            [
                makePackage(2, THREE_MILES, { groupId: 1, deliveryDeadline: Clock.of(9) }),
                makePackage(4, SIX_MILES, { deliveryDeadline: Clock.of(9, 30) }),
                makePackage(3, SIX_MILES, { groupId: 1 }),
            ],
        );
        sim.run();

        const [grouped, other] = [sim.ctx.packages.get(2), sim.ctx.packages.get(4)];
        expect(grouped.assignedTruckId).toBe(1);
        expect(sim.ctx.packages.get(3).assignedTruckId).toBe(1);
        expect(other.assignedTruckId).toBe(2);

        const loadedAt = (id: number) =>
            sim.ctx.packageLog.history(id).find(({ status }) => status === PackageStatus.OUT_FOR_DELIVERY)?.startTime;
        expect(loadedAt(2)?.totalMinutes).toBe(loadedAt(3)?.totalMinutes);
    });

    it('should load group members that arrived at different times in the same minute', () => {
        const sim = makeSimulation(
            [[THREE_MILES, 3]],
            [makeTruck(1, 4)],
            [
                makePackage(1, THREE_MILES, { groupId: 1 }),
                makePackage(2, THREE_MILES, { groupId: 1, arrivalTime: Clock.of(8, 30) }),
            ],
        );
        sim.run();

        const loadedAt = (id: number) =>
            sim.ctx.packageLog.history(id).find(({ status }) => status === PackageStatus.OUT_FOR_DELIVERY)?.startTime;

        expect(loadedAt(1)?.toString()).toBe('08:32 AM');
        expect(loadedAt(2)?.toString()).toBe('08:32 AM');
        expect(sim.ctx.packages.get(1).assignedTruckId).toBe(1);
        expect(sim.ctx.packages.get(2).assignedTruckId).toBe(1);
    });

    it('should finish immediately without packages', () => {
        const sim = makeSimulation([[THREE_MILES, 3]], [makeTruck(1), makeTruck(2)], []);

        const result = sim.run();

        expect(result.ticks).toBe(0);
        expect(result.endTime.totalMinutes).toBe(Clock.of(8).totalMinutes);
        expect(sim.ctx.packageLog.entityIds()).toEqual([]);
        expect(sim.ctx.truckLog.history(1).map(({ status }) => status)).toEqual([TruckStatus.AT_HUB]);
        expect(sim.ctx.truckLog.history(2).map(({ status }) => status)).toEqual([TruckStatus.AT_HUB]);
    });

    it('should abort when deliveries cannot finish within the day', () => {
        const sim = makeSimulation(
            [[THREE_MILES, 3]],
            [makeTruck(1, 1)],
            [makePackage(1, THREE_MILES, { groupId: 1 }), makePackage(2, THREE_MILES, { groupId: 1 })],
        );

        expect(() => sim.run()).toThrowError(SimulationInvariantError);
    });

    it('should treat a truck out without a destination as a fatal error', () => {
        const sim = makeSimulation([[THREE_MILES, 3]], [makeTruck(1)], []);
        const truck = sim.ctx.trucks.get(1);
        truck.status = TruckStatus.OUT_FOR_DELIVERIES;

        expect(() => truck.advance(sim.ctx)).toThrowError('Truck 1 is out for deliveries without a destination');
    });
});
