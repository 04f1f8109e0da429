/**
 * Point-in-time query for an entity that has no log entry covering the requested minute.
 */
export class EntityNotLoggedError extends Error {
    constructor(
        readonly entityId: number,
        readonly time: string,
    ) {
        super(`Entity ${entityId} has no status history at ${time}`);
        Object.setPrototypeOf(this, EntityNotLoggedError.prototype);
        this.name = 'EntityNotLoggedError';
    }
}

/**
 * Lookup of a package, truck or location that does not exist
 */
export class NotFoundError extends Error {
    constructor(
        readonly kind: 'package' | 'truck' | 'entity' | 'location' | 'route',
        readonly key: string | number,
    ) {
        super(`No ${kind} found for ${key}`);
        Object.setPrototypeOf(this, NotFoundError.prototype);
        this.name = 'NotFoundError';
    }
}

/**
 * Malformed or out-of-range time input at the boundary
 */
export class InvalidTimeError extends Error {
    constructor(
        readonly input: string,
        reason = 'expected format HH:MM AM/PM (e.g., 12:24 PM)',
    ) {
        super(`Invalid time "${input}": ${reason}`);
        Object.setPrototypeOf(this, InvalidTimeError.prototype);
        this.name = 'InvalidTimeError';
    }
}

/**
 * Input data that cannot be turned into a consistent hub (bad CSV rows, dangling references)
 */
export class DataLoadError extends Error {
    constructor(
        message: string,
        readonly details?: unknown,
    ) {
        super(message);
        Object.setPrototypeOf(this, DataLoadError.prototype);
        this.name = 'DataLoadError';
    }
}

/**
 * The simulation reached a state the loading policy or route planner should never produce.
 * The run must abort.
 */
export class SimulationInvariantError extends Error {
    constructor(message: string) {
        super(message);
        Object.setPrototypeOf(this, SimulationInvariantError.prototype);
        this.name = 'SimulationInvariantError';
    }
}

export const invariant: (condition: unknown, message: string) => asserts condition = (condition, message) => {
    if (!condition) {
        throw new SimulationInvariantError(message);
    }
};
