/**
 * System events: POJOs pushed onto the event queue.
 * Each event carries the name of the component that produced it.
 */

import type { DelayRecord } from './delays';

export type FreezerEventKind =
    | 'FREEZER_ALARM_TEMP_NORMAL'
    | 'FREEZER_ALARM_TEMP_HIGH'
    | 'FREEZER_ALARM_DISABLED'
    | 'FREEZER_ALARM_SENSOR_OFFLINE_DAY'
    | 'FREEZER_ALARM_SENSOR_OFFLINE_NIGHT';

export type SecurityEventKind =
    | 'ALARM_ARMED'
    | 'ALARM_DISARMED'
    | 'ALARM_TRIGGERED'
    | 'ALARM_DEACTIVATED'
    | 'ALARM_ACTIVATED';

export type DelayEventKind = 'TRAIN_DELAYS' | 'TRAIN_NO_DELAYS';

export type DeviceEventKind =
    | 'ALARM_SENSOR_OPEN'
    | 'ALARM_SENSOR_CLOSED'
    | 'BUTTON_SHORT_PRESS'
    | 'BUTTON_DOUBLE_PRESS'
    | 'BUTTON_LONG_PRESS';

export type SystemEventKind = FreezerEventKind | SecurityEventKind | DelayEventKind | DeviceEventKind;

export type EventPayload =
    | { delays: DelayRecord[] }
    | { device: string }
    | { device: string; temperatureC: number | null };

export interface SystemEvent {
    kind: SystemEventKind;
    source: string;
    payload?: EventPayload;
    at: number;
}

/** Event without its producer stamp: what a state's entry action describes. */
export type EventDraft = Pick<SystemEvent, 'kind' | 'payload'>;

export interface EventSink {
    put(event: SystemEvent): void;
}

export function draft(kind: SystemEventKind, payload?: EventPayload): EventDraft {
    return payload ? { kind, payload } : { kind };
}

export function stamp(d: EventDraft, source: string, at: number): SystemEvent {
    return { ...d, source, at };
}
