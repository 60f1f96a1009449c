import { z } from 'zod';
import { formatTimeOfDay, parseTimeOfDay } from './schedule';
import { DelayRecordSchema } from './schema';

export type DelayRecord = z.infer<typeof DelayRecordSchema>;

/**
 * Synchronous snapshot read of the latest delay list for a route.
 * Implementations return an empty list when they have nothing (never throw).
 */
export interface DelaySource {
    getDelays(fromStation: string, toStation: string): DelayRecord[];
}

/** Prompt validator for a delay given in whole minutes. */
export function validateDelayMinutes(input: string): true | string {
    const minutes = Number(input.trim());
    if (input.trim() === '' || !Number.isInteger(minutes) || minutes < 0) {
        return 'Enter a whole number of minutes (0 or more)';
    }
    return true;
}

/**
 * A hand-made service running `minutes` late, for the simulate menu.
 */
export function manualDelay(minutes: number, std = '07:00'): DelayRecord {
    if (!Number.isInteger(minutes) || minutes < 0) {
        throw new RangeError(`Delay must be a whole number of minutes, got ${minutes}`);
    }
    const scheduled = parseTimeOfDay(std);
    return {
        std: formatTimeOfDay(scheduled),
        etd: formatTimeOfDay((scheduled + minutes) % (24 * 60)),
        isCancelled: false,
        cancelReason: null,
        delayReason: null,
    };
}
