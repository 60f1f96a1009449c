/**
 * CORE: Schedule Evaluator
 * Pure time-of-day window checks. Wall-clock conversion happens before evaluation.
 */

import { ScheduleFormatError } from './errors';

/** Minutes since local midnight, 0..1439 */
export type TimeOfDay = number;

export interface ScheduleWindow {
    start: TimeOfDay;
    end: TimeOfDay;
}

export type Schedule = ScheduleWindow[];

/** Raw form as written in configuration: [["23:00", "05:00"], ...] */
export type RawSchedule = ReadonlyArray<readonly [string, string]>;

const HHMM_REGEX = /^(\d{2}):(\d{2})$/;

export function parseTimeOfDay(value: string): TimeOfDay {
    const match = HHMM_REGEX.exec(value);
    if (!match) {
        throw new ScheduleFormatError(`Invalid time "${value}": expected HH:MM`);
    }
    const hours = parseInt(match[1], 10);
    const minutes = parseInt(match[2], 10);
    if (hours > 23 || minutes > 59) {
        throw new ScheduleFormatError(`Invalid time "${value}": out of range`);
    }
    return hours * 60 + minutes;
}

export function formatTimeOfDay(time: TimeOfDay): string {
    const hours = Math.floor(time / 60);
    const minutes = time % 60;
    return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

export function parseSchedule(raw: RawSchedule): Schedule {
    return raw.map(([start, end]) => ({
        start: parseTimeOfDay(start),
        end: parseTimeOfDay(end),
    }));
}

export function formatSchedule(schedule: Schedule): string {
    if (schedule.length === 0) return '(empty)';
    return schedule.map((w) => `${formatTimeOfDay(w.start)}-${formatTimeOfDay(w.end)}`).join(', ');
}

/**
 * True if `now` falls inside any window. Both ends are inclusive.
 * A window with start >= end wraps past midnight, so start == end covers the whole day.
 */
export function inSchedule(schedule: Schedule, now: TimeOfDay): boolean {
    return schedule.some(({ start, end }) => {
        if (start < end) {
            return start <= now && now <= end;
        }
        return now >= start || now <= end;
    });
}

/**
 * Wall-clock time of `instant` in an IANA zone. DST is resolved by Intl, not here.
 */
export function localTimeOfDay(instant: Date, timeZone: string): TimeOfDay {
    const formatter = new Intl.DateTimeFormat('en-GB', {
        timeZone,
        hour: '2-digit',
        minute: '2-digit',
        hourCycle: 'h23',
    });

    const parts = formatter.formatToParts(instant);
    const hour = parseInt(parts.find((p) => p.type === 'hour')?.value ?? '0', 10);
    const minute = parseInt(parts.find((p) => p.type === 'minute')?.value ?? '0', 10);

    return hour * 60 + minute;
}

export function assertTimeZone(timeZone: string): void {
    try {
        new Intl.DateTimeFormat('en-GB', { timeZone });
    } catch {
        throw new ScheduleFormatError(`Unknown time zone "${timeZone}"`);
    }
}

export interface Clock {
    now(): Date;
}

export const systemClock: Clock = {
    now: () => new Date(),
};

/**
 * Answers "is the schedule active right now" in the configured zone.
 */
export class ScheduleClock {
    constructor(
        private timeZone: string,
        private clock: Clock = systemClock
    ) {
        assertTimeZone(timeZone);
    }

    localTime(): TimeOfDay {
        return localTimeOfDay(this.clock.now(), this.timeZone);
    }

    isActive(schedule: Schedule): boolean {
        return inSchedule(schedule, this.localTime());
    }

    getTimeZone(): string {
        return this.timeZone;
    }
}
