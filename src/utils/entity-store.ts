import { NotFoundError } from '../errors';

/** Keyed store of live entities. Values are shared by reference, never copied. */
export class EntityStore<T> {
    private readonly entries = new Map<number, T>();

    constructor(private readonly kind: 'package' | 'truck' | 'entity' = 'entity') {}

    /** Returns the value previously stored under `id`, if any */
    insert(id: number, value: T): T | undefined {
        const previous = this.entries.get(id);
        this.entries.set(id, value);
        return previous;
    }

    get(id: number): T {
        const value = this.entries.get(id);
        if (value === undefined) {
            throw new NotFoundError(this.kind, id);
        }
        return value;
    }

    keys(): number[] {
        return Array.from(this.entries.keys());
    }

    values(): T[] {
        return Array.from(this.entries.values());
    }

    get size(): number {
        return this.entries.size;
    }
}

if (import.meta.vitest) {
    const { test, expect } = import.meta.vitest;

    test('should return the previous value on insert and throw for unknown ids', () => {
        const store = new EntityStore<{ name: string }>('truck');
        const first = { name: 'first' };

        expect(store.insert(1, first)).toBeUndefined();
        expect(store.insert(1, { name: 'second' })).toBe(first);
        expect(store.get(1).name).toBe('second');
        expect(store.keys()).toEqual([1]);
        expect(() => store.get(2)).toThrowError('No truck found for 2');
    });
}
