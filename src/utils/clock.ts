import { InvalidTimeError } from '../errors';

export const MINUTES_PER_HOUR = 60;
export const MINUTES_PER_DAY = 24 * MINUTES_PER_HOUR;

const TIME_PATTERN = /^(\d{1,2}):(\d{1,2})\s(AM|PM)$/i;

/** Minute of a single operating day, wrapped to [0, 1440) */
export class Clock {
    readonly totalMinutes: number;

    private constructor(totalMinutes: number) {
        this.totalMinutes = ((totalMinutes % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
    }

    static of(hours: number, minutes: number = 0): Clock {
        return new Clock(hours * MINUTES_PER_HOUR + minutes);
    }

    static isValid(input: string): boolean {
        const match = TIME_PATTERN.exec(input.trim());
        if (!match) {
            return false;
        }
        const hours = Number.parseInt(match[1]);
        const minutes = Number.parseInt(match[2]);
        return hours >= 1 && hours <= 12 && minutes < MINUTES_PER_HOUR;
    }

    /** Parse `HH:MM AM/PM`. 12:xx AM is just after midnight, 12:xx PM just after noon. */
    static parse(input: string): Clock {
        const match = TIME_PATTERN.exec(input.trim());
        if (!match || !Clock.isValid(input)) {
            throw new InvalidTimeError(input);
        }

        const hours = Number.parseInt(match[1]) % 12;
        const minutes = Number.parseInt(match[2]);
        const isPastMidday = match[3].toUpperCase() === 'PM';

        return Clock.of(isPastMidday ? hours + 12 : hours, minutes);
    }

    get hours(): number {
        return Math.floor(this.totalMinutes / MINUTES_PER_HOUR);
    }

    get minutes(): number {
        return this.totalMinutes % MINUTES_PER_HOUR;
    }

    addMinutes(minutes: number): Clock {
        return new Clock(this.totalMinutes + minutes);
    }

    /** Minutes elapsed from `other` to this clock */
    minutesSince(other: Clock): number {
        return this.totalMinutes - other.totalMinutes;
    }

    compare(other: Clock): number {
        return this.totalMinutes - other.totalMinutes;
    }

    isBefore(other: Clock): boolean {
        return this.totalMinutes < other.totalMinutes;
    }

    isAfter(other: Clock): boolean {
        return this.totalMinutes > other.totalMinutes;
    }

    toString(): string {
        const suffix = this.hours >= 12 ? 'PM' : 'AM';
        const hours = this.hours % 12 === 0 ? 12 : this.hours % 12;

        return `${String(hours).padStart(2, '0')}:${String(this.minutes).padStart(2, '0')} ${suffix}`;
    }
}

/** Ordering for optional times, unset values last */
export const compareOptionalClock = (a: Clock | null, b: Clock | null): number => {
    if (a === null && b === null) {
        return 0;
    }
    if (a === null) {
        return 1;
    }
    if (b === null) {
        return -1;
    }
    return a.compare(b);
};

if (import.meta.vitest) {
    const { describe, test, expect } = import.meta.vitest;

    describe('Clock', () => {
        test('should wrap around the end of the day', () => {
            expect(Clock.of(23, 50).addMinutes(20).totalMinutes).toBe(10);
            expect(Clock.of(0, 5).addMinutes(-10).totalMinutes).toBe(MINUTES_PER_DAY - 5);
        });

        test('should parse AM/PM strings', () => {
            expect(Clock.parse('08:00 AM').totalMinutes).toBe(480);
            expect(Clock.parse('10:30 am').totalMinutes).toBe(630);
            expect(Clock.parse('12:15 PM').totalMinutes).toBe(735);
            expect(Clock.parse('12:15 AM').totalMinutes).toBe(15);
            expect(Clock.parse('5:07 PM').totalMinutes).toBe(1027);
        });

        test('should reject malformed strings', () => {
            expect(() => Clock.parse('25:00 PM')).toThrowError(InvalidTimeError);
            expect(() => Clock.parse('10:30')).toThrowError(InvalidTimeError);
            expect(() => Clock.parse('10:75 AM')).toThrowError(InvalidTimeError);
            expect(Clock.isValid('EOD')).toBe(false);
        });

        test('should format as HH:MM AM/PM', () => {
            expect(Clock.of(8).toString()).toBe('08:00 AM');
            expect(Clock.of(12, 5).toString()).toBe('12:05 PM');
            expect(Clock.of(0, 0).toString()).toBe('12:00 AM');
            expect(Clock.of(17, 30).toString()).toBe('05:30 PM');
        });

        test('should order optional clocks with unset last', () => {
            const sorted = [null, Clock.of(10), Clock.of(9)].sort(compareOptionalClock);
            expect(sorted.map(c => c?.totalMinutes ?? null)).toEqual([540, 600, null]);
        });
    });
}
