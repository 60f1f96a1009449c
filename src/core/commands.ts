/**
 * Actuator commands: POJOs describing what the dispatcher should do for an event.
 * All use type + dashed-lower-case naming.
 * Factories are pure functions.
 */

import type { SystemEvent, SystemEventKind } from './events';

export type BulbColour = 'blue' | 'green' | 'red' | 'white-off';

export type ActuatorCommand =
    | { type: 'set-bulb'; colour: BulbColour }
    | { type: 'start-siren' }
    | { type: 'stop-siren' }
    | { type: 'announce'; lines: string[] }
    | { type: 'announce-delays' }
    | { type: 'announce-freezer-temp' }
    | { type: 'toggle-lights' }
    | { type: 'none' };

// ─── Command factories ────────────────────────────────────────────────────────

export function setBulb(colour: BulbColour): ActuatorCommand {
    return { type: 'set-bulb', colour };
}

export function startSiren(): ActuatorCommand {
    return { type: 'start-siren' };
}

export function stopSiren(): ActuatorCommand {
    return { type: 'stop-siren' };
}

export function announce(lines: string[]): ActuatorCommand {
    return { type: 'announce', lines };
}

export function announceDelays(): ActuatorCommand {
    return { type: 'announce-delays' };
}

export function announceFreezerTemp(): ActuatorCommand {
    return { type: 'announce-freezer-temp' };
}

export function toggleLights(): ActuatorCommand {
    return { type: 'toggle-lights' };
}

export function none(): ActuatorCommand {
    return { type: 'none' };
}

export type ActionTable = Record<SystemEventKind, ActuatorCommand>;

/**
 * One command per event kind.
 */
export const DEFAULT_ACTIONS: ActionTable = {
    FREEZER_ALARM_TEMP_NORMAL: setBulb('white-off'),
    FREEZER_ALARM_TEMP_HIGH: setBulb('blue'),
    FREEZER_ALARM_DISABLED: setBulb('white-off'),
    FREEZER_ALARM_SENSOR_OFFLINE_DAY: setBulb('green'),
    FREEZER_ALARM_SENSOR_OFFLINE_NIGHT: setBulb('white-off'),

    ALARM_ARMED: none(),
    ALARM_DISARMED: stopSiren(),
    ALARM_TRIGGERED: startSiren(),
    ALARM_DEACTIVATED: stopSiren(),
    ALARM_ACTIVATED: none(),

    TRAIN_DELAYS: setBulb('red'),
    TRAIN_NO_DELAYS: setBulb('white-off'),

    ALARM_SENSOR_OPEN: none(),
    ALARM_SENSOR_CLOSED: none(),
    BUTTON_SHORT_PRESS: toggleLights(),
    BUTTON_DOUBLE_PRESS: announceDelays(),
    BUTTON_LONG_PRESS: announceFreezerTemp(),
};

export function commandFor(event: SystemEvent, table: ActionTable = DEFAULT_ACTIONS): ActuatorCommand {
    return table[event.kind];
}
