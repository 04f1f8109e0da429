import type { Clock } from '../utils/clock';

/** Delivery address; two locations are the same iff every field matches */
export interface Location {
    readonly address: string;
    readonly city: string;
    readonly state: string;
    readonly zipCode: string;
}

export const locationKey = ({ address, city, state, zipCode }: Location): string =>
    [address, city, state, zipCode].join('|');

export const isSameLocation = (a: Location, b: Location): boolean => locationKey(a) === locationKey(b);

export enum PackageStatus {
    PENDING = 'PENDING',
    READY_FOR_PICKUP = 'READY_FOR_PICKUP',
    OUT_FOR_DELIVERY = 'OUT_FOR_DELIVERY',
    DELIVERED = 'DELIVERED',
    DELIVERED_LATE = 'DELIVERED_LATE',
}

export enum TruckStatus {
    AT_HUB = 'AT_HUB',
    OUT_FOR_DELIVERIES = 'OUT_FOR_DELIVERIES',
}

export interface Package {
    readonly id: number;
    readonly location: Location;
    /** Earliest minute the package is at the hub, null when it is there from the start */
    readonly arrivalTime: Clock | null;
    readonly deliveryDeadline: Clock | null;
    readonly massKg: number;
    /** Pins the package to one truck */
    readonly requiredTruckId: number | null;
    /** Packages sharing a group go out together on one truck */
    readonly groupId: number | null;
    readonly note: string;
    status: PackageStatus;
    assignedTruckId: number | null;
}

export interface TruckSpec {
    readonly id: number;
    readonly packageCapacity: number;
    readonly avgSpeedMph: number;
    /** Service minutes per stop, as listed in trucks.csv; arrival times count driving only */
    readonly deliveryDelayMin: number;
}

/** A history record: the entity's snapshot plus the interval it was current for */
export type LogEntry<T> = T & {
    readonly startTime: Clock;
    /** null while the entry is still the current one */
    readonly endTime: Clock | null;
};

export interface PackageSnapshot {
    readonly status: PackageStatus;
}

export interface TruckSnapshot {
    readonly status: TruckStatus;
    readonly milesTraveled: number;
    readonly routeTraveled: ReadonlyArray<Location>;
    readonly nextDestination: Location | null;
    readonly arrivalTime: Clock | null;
}

export type PackageStatusLogEntry = LogEntry<PackageSnapshot>;

export const isDelivered = (status: PackageStatus): boolean =>
    status === PackageStatus.DELIVERED || status === PackageStatus.DELIVERED_LATE;

export const needsDelivery = (status: PackageStatus): boolean =>
    status === PackageStatus.PENDING || status === PackageStatus.READY_FOR_PICKUP;
