/**
 * CORE: Device collaborators
 * Turn decoded device reports into context writes and device events.
 * Each context field has one writer here; the engine only clears one-shot flags.
 */

import type { ContextStore, FreezerContext, SecurityContext } from './context';
import type { DeviceEventKind, EventSink } from './events';
import type { MonitorLogger } from './logger';
import type { Clock } from './schedule';
import { systemClock } from './schedule';

export interface FreezerSensorOptions {
    name: string;
    store: ContextStore<FreezerContext>;
    logger: MonitorLogger;
    thresholdC: number;
    hysteresisC: number;
    offlineTimeoutMs: number;
    clock?: Clock;
}

/**
 * Freezer temperature sensor. Owns `tempHigh` and `sensorOnline`.
 */
export class FreezerSensorMonitor {
    private lastReportAt: number;
    private temperature: number | null = null;
    private clock: Clock;

    constructor(private options: FreezerSensorOptions) {
        this.clock = options.clock ?? systemClock;
        // A fresh controller gives the sensor a full timeout before calling it offline
        this.lastReportAt = this.clock.now().getTime();
    }

    report(temperatureC: number): void {
        const { store, logger, thresholdC, hysteresisC, name } = this.options;
        this.lastReportAt = this.clock.now().getTime();
        this.temperature = temperatureC;
        logger.debug(`[${name}] Temperature ${temperatureC.toFixed(2)}°C`);

        store.update((ctx) => {
            let tempHigh = ctx.tempHigh;
            if (!tempHigh && temperatureC > thresholdC) {
                logger.warn(`[${name}] Freezer temperature is above threshold: ${temperatureC.toFixed(2)}°C`);
                tempHigh = true;
            } else if (tempHigh && temperatureC < thresholdC - hysteresisC) {
                logger.info(`[${name}] Freezer temperature is back below threshold: ${temperatureC.toFixed(2)}°C`);
                tempHigh = false;
            }
            if (!ctx.sensorOnline) {
                logger.info(`[${name}] Online`);
            }
            return { tempHigh, sensorOnline: true };
        });
    }

    /**
     * Marks the sensor offline after `offlineTimeoutMs` of silence.
     */
    checkOnline(): boolean {
        const { store, logger, offlineTimeoutMs, name } = this.options;
        const silentFor = this.clock.now().getTime() - this.lastReportAt;
        const online = silentFor < offlineTimeoutMs;

        if (store.snapshot().sensorOnline !== online) {
            if (online) {
                logger.info(`[${name}] Online`);
            } else {
                logger.warn(`[${name}] Offline (no report for ${Math.round(silentFor / 60000)} min)`);
            }
            store.set({ sensorOnline: online });
        }
        return online;
    }

    getTemperature(): number | null {
        return this.temperature;
    }
}

export type ContactState = 'open' | 'closed';

export interface ContactSensorOptions {
    name: string;
    sink: EventSink;
    logger: MonitorLogger;
    /** Present for sensors that arm the intrusion alarm. */
    security?: ContextStore<SecurityContext>;
    clock?: Clock;
}

/**
 * Window/door sensor. Zone status bit 0 is the open flag.
 */
export class ContactSensor {
    private state: ContactState = 'closed';
    private clock: Clock;

    constructor(private options: ContactSensorOptions) {
        this.clock = options.clock ?? systemClock;
    }

    zoneStatus(status: number): ContactState {
        const next: ContactState = (status & 0x01) === 1 ? 'open' : 'closed';
        if (next === this.state) return next;

        const { name, logger, security } = this.options;
        this.state = next;
        logger.info(`[${name}] ${next}`);

        if (security) {
            if (next === 'open') {
                security.set({ trigger: true });
            }
            this.push(next === 'open' ? 'ALARM_SENSOR_OPEN' : 'ALARM_SENSOR_CLOSED');
        }
        return next;
    }

    getState(): ContactState {
        return this.state;
    }

    private push(kind: DeviceEventKind): void {
        this.options.sink.put({
            kind,
            source: this.options.name,
            payload: { device: this.options.name },
            at: this.clock.now().getTime(),
        });
    }
}

export type ButtonPress = 'short' | 'double' | 'long';

/** Click codes reported by the button's lastClickType attribute. */
export const CLICK_CODES: Record<string, ButtonPress> = {
    '04': 'short',
    '08': 'double',
    '10': 'long',
};

const PRESS_EVENTS: Record<ButtonPress, DeviceEventKind> = {
    short: 'BUTTON_SHORT_PRESS',
    double: 'BUTTON_DOUBLE_PRESS',
    long: 'BUTTON_LONG_PRESS',
};

export function classifyClick(code: string): ButtonPress | null {
    return CLICK_CODES[code.toUpperCase()] ?? null;
}

export interface ButtonHandlerOptions {
    name: string;
    sink: EventSink;
    logger: MonitorLogger;
    freezer: ContextStore<FreezerContext>;
    security: ContextStore<SecurityContext>;
    /** Latest freezer reading, carried on the long press event. */
    temperature?: () => number | null;
    clock?: Clock;
}

/**
 * Long press acknowledges the freezer alarm, toggles the security override
 * and asks for the freezer temperature to be spoken.
 */
export class ButtonHandler {
    private clock: Clock;

    constructor(private options: ButtonHandlerOptions) {
        this.clock = options.clock ?? systemClock;
    }

    click(code: string): ButtonPress | null {
        const { name, logger, freezer, security, sink } = this.options;
        const press = classifyClick(code);
        if (!press) {
            logger.warn(`[${name}] Unknown click code "${code}" ignored`);
            return null;
        }

        logger.info(`[${name}] Button ${press} press`);

        if (press === 'long') {
            freezer.set({ disabled: true });
            const deactivated = security.update((ctx) => ({ deactivated: !ctx.deactivated })).deactivated;
            logger.info(`[${name}] Security alarm ${deactivated ? 'deactivated' : 'reactivated'}`);
        }

        sink.put({
            kind: PRESS_EVENTS[press],
            source: name,
            payload: press === 'long'
                ? { device: name, temperatureC: this.options.temperature?.() ?? null }
                : { device: name },
            at: this.clock.now().getTime(),
        });
        return press;
    }
}
