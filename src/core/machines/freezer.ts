/**
 * Freezer alarm.
 *
 * TempNormal   -> OfflineDay | OfflineNight (sensor silent, by schedule) | TempHigh
 * TempHigh     -> Disabled (long press)
 * Disabled     -> TempNormal once the sensor reports a normal temperature
 * OfflineDay   -> TempNormal | Disabled | OfflineNight
 * OfflineNight -> TempNormal | OfflineDay | Disabled
 */

import type { ContextStore, FreezerContext } from '../context';
import { draft } from '../events';
import type { EventDraft, FreezerEventKind } from '../events';
import type { MachineDefinition } from '../machine';
import type { ScheduleClock } from '../schedule';

export const FREEZER_STATES = ['TempNormal', 'TempHigh', 'Disabled', 'OfflineDay', 'OfflineNight'] as const;

export type FreezerState = (typeof FREEZER_STATES)[number];

export interface FreezerInput {
    sensorOnline: boolean;
    tempHigh: boolean;
    disabled: boolean;
    /** Offline indication schedule is active now. */
    daytime: boolean;
}

const ENTRY_EVENTS: Record<FreezerState, FreezerEventKind> = {
    TempNormal: 'FREEZER_ALARM_TEMP_NORMAL',
    TempHigh: 'FREEZER_ALARM_TEMP_HIGH',
    Disabled: 'FREEZER_ALARM_DISABLED',
    OfflineDay: 'FREEZER_ALARM_SENSOR_OFFLINE_DAY',
    OfflineNight: 'FREEZER_ALARM_SENSOR_OFFLINE_NIGHT',
};

export function freezerTransition(state: FreezerState, input: FreezerInput): FreezerState {
    const { sensorOnline, tempHigh, disabled, daytime } = input;

    switch (state) {
        case 'TempNormal':
            if (!sensorOnline) return daytime ? 'OfflineDay' : 'OfflineNight';
            if (tempHigh) return 'TempHigh';
            return state;

        case 'TempHigh':
            if (disabled) return 'Disabled';
            return state;

        case 'Disabled':
            if (sensorOnline && !tempHigh) return 'TempNormal';
            return state;

        case 'OfflineDay':
            if (sensorOnline) return 'TempNormal';
            if (disabled) return 'Disabled';
            if (!daytime) return 'OfflineNight';
            return state;

        case 'OfflineNight':
            if (sensorOnline) return 'TempNormal';
            if (daytime) return 'OfflineDay';
            if (disabled) return 'Disabled';
            return state;

        default: {
            const unreachable: never = state;
            return unreachable;
        }
    }
}

export function freezerEntry(state: FreezerState): EventDraft {
    return draft(ENTRY_EVENTS[state]);
}

export function createFreezerMachine(
    store: ContextStore<FreezerContext>,
    schedule: ScheduleClock,
    name = 'FreezerAlarm'
): MachineDefinition<FreezerState, FreezerInput> {
    return {
        name,
        initial: 'TempNormal',
        states: FREEZER_STATES,
        readInput() {
            const ctx = store.snapshot();
            return {
                sensorOnline: ctx.sensorOnline,
                tempHigh: ctx.tempHigh,
                disabled: ctx.disabled,
                daytime: schedule.isActive(ctx.schedule),
            };
        },
        transition: freezerTransition,
        entry: freezerEntry,
        consume(input) {
            // The long press gets one evaluation, whatever the outcome
            if (input.disabled) {
                store.set({ disabled: false });
            }
        },
    };
}
