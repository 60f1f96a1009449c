import type { DelayRecord } from './delays';
import { parseTimeOfDay } from './schedule';

const DAY_MINUTES = 24 * 60;

/**
 * Minutes between scheduled and expected departure, or null when etd is not a time
 * ("Delayed", "Cancelled") or falls before std on the same day.
 */
export function delayMinutes(record: DelayRecord): number | null {
    try {
        const std = parseTimeOfDay(record.std);
        const etd = parseTimeOfDay(record.etd);
        if (etd >= std) return etd - std;
        // Past midnight (23:50 -> 00:05) only when etd is more than half a day behind std
        return std - etd > DAY_MINUTES / 2 ? etd + DAY_MINUTES - std : null;
    } catch {
        return null;
    }
}

export function describeDelay(record: DelayRecord, fromStation: string, toStation: string): string {
    let line = `The ${record.std} from ${fromStation} to ${toStation}, is `;

    if (record.isCancelled) {
        return record.cancelReason ? `${line}cancelled. ${record.cancelReason}.` : `${line}cancelled.`;
    }

    line += 'delayed';
    const minutes = delayMinutes(record);
    line += minutes ? ` by ${minutes} minutes.` : '.';
    if (record.delayReason) {
        line += ` ${record.delayReason}.`;
    }
    return line;
}

export function freezerTemperatureLine(temperatureC: number): string {
    return `Freezer temperature is ${temperatureC}°C`;
}

export function buildAnnouncement(delays: DelayRecord[], fromStation: string, toStation: string): string[] {
    if (delays.length === 0) {
        return [`No delays listed for trains from ${fromStation} to ${toStation}.`];
    }
    return delays.map((d) => describeDelay(d, fromStation, toStation));
}
