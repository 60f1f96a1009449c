/**
 * SHELL: Actuators
 * Bulb, siren and voice are reached through Zigbee and audio tooling outside this package.
 * This adapter records and logs the commands it is given.
 */

import type { BulbColour } from '../core/commands';
import type { Actuators } from '../core/dispatcher';
import type { MonitorLogger } from '../core/logger';

export interface ActuatorState {
    bulb: BulbColour;
    siren: boolean;
    lightsOn: boolean;
    spoken: string[][];
}

export class LoggingActuators implements Actuators {
    private state: ActuatorState = { bulb: 'white-off', siren: false, lightsOn: false, spoken: [] };

    constructor(private logger: MonitorLogger) {}

    async setBulb(colour: BulbColour): Promise<void> {
        if (this.state.bulb !== colour) {
            this.logger.info(`[Bulb] ${this.state.bulb} -> ${colour}`);
        }
        this.state.bulb = colour;
    }

    async startSiren(): Promise<void> {
        if (!this.state.siren) {
            this.logger.warn('[Siren] Activated');
        }
        this.state.siren = true;
    }

    async stopSiren(): Promise<void> {
        if (this.state.siren) {
            this.logger.warn('[Siren] Deactivated');
        }
        this.state.siren = false;
    }

    async speak(lines: string[]): Promise<void> {
        lines.forEach((line) => this.logger.info(`[Voice] ${line}`));
        this.state.spoken.push([...lines]);
    }

    async toggleLights(): Promise<void> {
        this.state.lightsOn = !this.state.lightsOn;
        this.logger.info(`[Lights] ${this.state.lightsOn ? 'on' : 'off'}`);
    }

    getState(): Readonly<ActuatorState> {
        return this.state;
    }
}
