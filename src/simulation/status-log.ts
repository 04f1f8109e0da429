import cloneDeep from 'lodash/cloneDeep';

import { EntityNotLoggedError } from '../errors';
import type { LogEntry } from '../types/types';
import type { Clock } from '../utils/clock';

interface StoredEntry<T> {
    readonly snapshot: T;
    startTime: Clock;
    endTime: Clock | null;
}

const toLogEntry = <T>({ snapshot, startTime, endTime }: StoredEntry<T>): LogEntry<T> => ({
    ...snapshot,
    startTime,
    endTime,
});

/**
 * Append-only, per-entity history of status records.
 *
 * Entries of one entity are contiguous: each closed entry ends exactly where the next starts and
 * only the last entry is open. Two records cannot share a start minute, so a record made at or
 * before the open entry's start begins one minute after it and the open entry is closed there.
 */
export class StatusLog<T extends { readonly status: unknown }> {
    private readonly entries = new Map<number, StoredEntry<T>[]>();

    record(entityId: number, snapshot: T, time: Clock): LogEntry<T> {
        // Copied so later changes to the live entity leave history untouched
        const entry: StoredEntry<T> = { snapshot: cloneDeep(snapshot), startTime: time, endTime: null };
        const history = this.entries.get(entityId);

        if (!history) {
            this.entries.set(entityId, [entry]);
            return toLogEntry(entry);
        }

        entry.startTime = this.nextStartTime(entityId, time);
        history[history.length - 1].endTime = entry.startTime;
        history.push(entry);

        return toLogEntry(entry);
    }

    /** Minute a record made at `time` would start at */
    nextStartTime(entityId: number, time: Clock): Clock {
        const open = (this.entries.get(entityId) ?? []).at(-1);

        return open !== undefined && !time.isAfter(open.startTime) ? open.startTime.addMinutes(1) : time;
    }

    /** The entry whose [start, end) contains `time`; an open entry extends to now */
    query(entityId: number, time: Clock): LogEntry<T> {
        const entry = (this.entries.get(entityId) ?? []).find(
            ({ startTime, endTime }) => !time.isBefore(startTime) && (endTime === null || time.isBefore(endTime)),
        );

        if (!entry) {
            throw new EntityNotLoggedError(entityId, time.toString());
        }

        return toLogEntry(entry);
    }

    current(entityId: number): LogEntry<T> {
        const history = this.entries.get(entityId);
        if (!history || history.length === 0) {
            throw new EntityNotLoggedError(entityId, 'any time');
        }
        return toLogEntry(history[history.length - 1]);
    }

    history(entityId: number): LogEntry<T>[] {
        return (this.entries.get(entityId) ?? []).map(toLogEntry);
    }

    has(entityId: number): boolean {
        return this.entries.has(entityId);
    }

    entityIds(): number[] {
        return Array.from(this.entries.keys());
    }
}
