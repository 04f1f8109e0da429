import { describe, it, expect } from 'vitest';

import type { Location } from '../types/types';
import { Clock } from '../utils/clock';
import { planRoute, routeDistance } from './route-planner';
import { HUB, makePackage, makeSimulation, makeTruck, place } from './test-helpers';

const FIVE = place('5 Main St');
const ONE = place('1 Main St');
const THREE = place('3 Main St');
const HALF = place('0.5 Main St');

const stops: Array<[Location, number]> = [
    [FIVE, 5],
    [ONE, 1],
    [THREE, 3],
    [HALF, 0.5],
];

describe('planRoute', () => {
    it('should order stops by nearest neighbour when no deadlines are set', () => {
        const { ctx } = makeSimulation(
            stops,
            [makeTruck(1)],
            [makePackage(1, FIVE), makePackage(2, ONE), makePackage(3, THREE)],
        );

        const order = [1, 2, 3];
        expect(planRoute(order, HUB, ctx)).toBe(order);
        expect(order).toEqual([2, 3, 1]);
    });

    it('should give the same order when run on an already planned route', () => {
        const { ctx } = makeSimulation(
            stops,
            [makeTruck(1)],
            [makePackage(1, FIVE), makePackage(2, ONE), makePackage(3, THREE)],
        );

        const once = planRoute([1, 2, 3], HUB, ctx);
        const twice = planRoute([...once], HUB, ctx);

        expect(twice).toEqual(once);
    });

    it('should not let a closer stop jump ahead of an earlier deadline', () => {
        const { ctx } = makeSimulation(
            stops,
            [makeTruck(1)],
            [
                makePackage(1, FIVE, { deliveryDeadline: Clock.of(10) }),
                makePackage(2, ONE, { deliveryDeadline: Clock.of(9) }),
                makePackage(3, HALF),
            ],
        );

        expect(planRoute([1, 2, 3], HUB, ctx)).toEqual([2, 1, 3]);
    });

    it('should not replace a deadline stop with a closer stop that has a later deadline', () => {
        const { ctx } = makeSimulation(
            stops,
            [makeTruck(1)],
            [
                makePackage(1, FIVE, { deliveryDeadline: Clock.of(9) }),
                makePackage(2, ONE, { deliveryDeadline: Clock.of(10) }),
            ],
        );

        expect(planRoute([1, 2], HUB, ctx)).toEqual([1, 2]);
    });
});

describe('routeDistance', () => {
    it('should sum the round trip from and back to the hub', () => {
        const { ctx } = makeSimulation(
            stops,
            [makeTruck(1)],
            [makePackage(1, FIVE), makePackage(2, ONE), makePackage(3, HALF)],
        );

        expect(routeDistance([2, 1, 3], ctx)).toBe(10);
        expect(routeDistance([], ctx)).toBe(0);
    });
});
