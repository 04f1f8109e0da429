/**
 * @module hub-report
 * @description
 * Plain-text views of the simulation at any minute of the day. Everything here reads the status
 * logs and entity data; nothing mutates simulation state.
 */

import { InvalidTimeError } from '../errors';
import type { SimulationContext } from '../simulation/context';
import { PackageStatus, TruckStatus } from '../types/types';
import type { Location, PackageStatusLogEntry } from '../types/types';
import { Clock } from '../utils/clock';

const RULE_WIDTH = 85;
const rule = (char = '-') => char.repeat(RULE_WIDTH);

export const formatLocation = ({ address, city, state, zipCode }: Location): string =>
    `${address}, ${city}, ${state} ${zipCode}`;

const formatIds = (ids: ReadonlyArray<number>): string => `[${ids.join(', ')}]`;

/** Parses a user supplied time and checks it falls within the hours of operation */
export const parseReportTime = (input: string, openedAt: Clock, closedAt: Clock): Clock => {
    const time = Clock.parse(input);

    if (time.isBefore(openedAt) || time.isAfter(closedAt)) {
        throw new InvalidTimeError(input, `not within today's hours of operation ${openedAt} - ${closedAt}`);
    }

    return time;
};

export const formatPackageReport = (ctx: SimulationContext, packageId: number, time: Clock): string => {
    const pkg = ctx.packages.get(packageId);
    const entry = ctx.packageLog.query(packageId, time);
    const isOnTruck = entry.status !== PackageStatus.PENDING && entry.status !== PackageStatus.READY_FOR_PICKUP;

    const lines = [
        rule(),
        `Package status last updated: ${entry.startTime}`,
        `Package ID: ${pkg.id}\t\tStatus: ${entry.status}`,
        pkg.arrivalTime && `Pick-up at: ${pkg.arrivalTime}`,
        pkg.deliveryDeadline && `Deliver by: ${pkg.deliveryDeadline}`,
        `Delivery Address: ${formatLocation(pkg.location)}`,
        pkg.note && `Note: ${pkg.note}`,
        `Weight: ${pkg.massKg} kilograms`,
        pkg.groupId !== null && `Delivery Group ID: ${pkg.groupId}`,
        pkg.requiredTruckId !== null && `Required Truck ID: ${pkg.requiredTruckId}`,
        isOnTruck && pkg.assignedTruckId !== null && `Assigned Truck ID: ${pkg.assignedTruckId}`,
        rule(),
    ];

    return lines.filter((line): line is string => typeof line === 'string' && line.length > 0).join('\n');
};

export const formatAllPackages = (ctx: SimulationContext, time: Clock): string =>
    [
        rule('='),
        ...ctx.packages.keys().map(id => formatPackageReport(ctx, id, time)),
        `Total Packages: ${ctx.packages.size}`,
        rule('='),
    ].join('\n');

/** Packages that were on `truckId` at `time`, most recently changed first */
const packageLogsForTruck = (
    ctx: SimulationContext,
    truckId: number,
    time: Clock,
): Array<[number, PackageStatusLogEntry]> =>
    ctx.packages
        .values()
        .filter(pkg => pkg.assignedTruckId === truckId)
        .map((pkg): [number, PackageStatusLogEntry] => [pkg.id, ctx.packageLog.query(pkg.id, time)])
        .filter(
            ([, entry]) =>
                entry.status !== PackageStatus.PENDING && entry.status !== PackageStatus.READY_FOR_PICKUP,
        )
        .sort(([, a], [, b]) => b.startTime.compare(a.startTime));

const idsWithStatus = (logs: ReadonlyArray<[number, PackageStatusLogEntry]>, status: PackageStatus) =>
    logs.filter(([, entry]) => entry.status === status).map(([id]) => id);

export const formatTruckReport = (
    ctx: SimulationContext,
    truckId: number,
    time: Clock,
    includeRoute = false,
): string => {
    const entry = ctx.truckLog.query(truckId, time);
    const packageLogs = packageLogsForTruck(ctx, truckId, time);

    const lines = [
        rule(),
        `Truck status last updated: ${entry.startTime}`,
        `Truck ID: ${truckId}\t\tStatus: ${entry.status}`,
        '',
        `Packages loaded: ${formatIds(idsWithStatus(packageLogs, PackageStatus.OUT_FOR_DELIVERY))}`,
        `Packages delivered: ${formatIds(idsWithStatus(packageLogs, PackageStatus.DELIVERED))}`,
        `Packages delivered late: ${formatIds(idsWithStatus(packageLogs, PackageStatus.DELIVERED_LATE))}`,
        '',
        `Next destination: ${entry.nextDestination ? formatLocation(entry.nextDestination) : 'N/A'}`,
        `Arrival time: ${entry.arrivalTime ?? 'N/A'}`,
        `Total miles traveled: ${entry.milesTraveled.toFixed(1)}`,
    ];

    if (includeRoute) {
        lines.push('Route traveled:', ...entry.routeTraveled.map(location => `\t${formatLocation(location)}`));
    }

    lines.push(rule());

    return lines.join('\n');
};

export const formatAllTrucks = (ctx: SimulationContext, time: Clock, includeRoute = false): string =>
    ctx.trucks
        .keys()
        .map(id => formatTruckReport(ctx, id, time, includeRoute))
        .join('\n');

export const formatHubSummary = (ctx: SimulationContext, openedAt: Clock, time: Clock): string => {
    const packageLogs = ctx.packages.keys().map((id): [number, PackageStatusLogEntry] => [
        id,
        ctx.packageLog.query(id, time),
    ]);
    const truckLogs = ctx.trucks.keys().map(id => ({ id, entry: ctx.truckLog.query(id, time) }));

    const totalMiles = truckLogs.reduce((sum, { entry }) => sum + entry.milesTraveled, 0);
    const trucksUsed = truckLogs.filter(
        ({ entry }) => entry.milesTraveled > 0 || entry.status === TruckStatus.OUT_FOR_DELIVERIES,
    );
    const minutesOperated = time.minutesSince(openedAt);

    const onTruck = (truckId: number, status: PackageStatus) =>
        formatIds(
            idsWithStatus(packageLogs, status).filter(id => ctx.packages.get(id).assignedTruckId === truckId),
        );

    return [
        `${'-'.repeat(32)} Today at the Hub ${'-'.repeat(RULE_WIDTH - 50)}`,
        `Hours of operation: ${openedAt} to ${time}\t(${Math.floor(minutesOperated / 60)} Hrs and ${minutesOperated % 60} Min)`,
        `Total number of packages handled: ${ctx.packages.size}`,
        `Number of trucks used: ${trucksUsed.length}`,
        `Packages pending: ${formatIds(idsWithStatus(packageLogs, PackageStatus.PENDING))}`,
        `Packages ready for pickup: ${formatIds(idsWithStatus(packageLogs, PackageStatus.READY_FOR_PICKUP))}`,
        ...trucksUsed.flatMap(({ id }) => [
            `Truck ${id}:`,
            `\tPackages out for delivery: ${onTruck(id, PackageStatus.OUT_FOR_DELIVERY)}`,
            `\tPackages delivered: ${onTruck(id, PackageStatus.DELIVERED)}`,
            `\tPackages delivered late: ${onTruck(id, PackageStatus.DELIVERED_LATE)}`,
        ]),
        `Total miles traveled for deliveries: ${totalMiles.toFixed(2)} Miles`,
        rule(),
    ].join('\n');
};
