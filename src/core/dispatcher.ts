/**
 * CORE: Event Dispatcher
 * Drains the event queue in arrival order and runs one actuator command per event.
 * Fire-and-forget: an actuator failure is logged, nothing flows back into the machines.
 */

import { buildAnnouncement, freezerTemperatureLine } from './announcements';
import type { ActionTable, ActuatorCommand, BulbColour } from './commands';
import { DEFAULT_ACTIONS, commandFor } from './commands';
import type { SystemEvent } from './events';
import type { MonitorLogger } from './logger';
import type { EventQueue } from './queue';

export interface Actuators {
    setBulb(colour: BulbColour): Promise<void>;
    startSiren(): Promise<void>;
    stopSiren(): Promise<void>;
    speak(lines: string[]): Promise<void>;
    toggleLights(): Promise<void>;
}

export interface DispatcherOptions {
    queue: EventQueue;
    actuators: Actuators;
    logger: MonitorLogger;
    route: { fromStation: string; toStation: string };
    pollMs?: number;
    actions?: ActionTable;
}

export class EventDispatcher {
    private running = false;
    private handled = 0;
    private failures = 0;
    private announcement: string[];
    private loop?: Promise<void>;

    constructor(private options: DispatcherOptions) {
        const { fromStation, toStation } = options.route;
        this.announcement = buildAnnouncement([], fromStation, toStation);
    }

    /**
     * Starts the consume loop. Resolves once stop() has been called and the loop has exited.
     */
    start(): Promise<void> {
        if (this.loop) return this.loop;
        this.running = true;
        this.loop = this.run().finally(() => {
            this.loop = undefined;
        });
        return this.loop;
    }

    async stop(): Promise<void> {
        this.running = false;
        this.options.queue.release();
        await this.loop;
    }

    /** Handles every queued event without waiting for new ones. */
    async drain(): Promise<number> {
        let count = 0;
        for (let event = this.options.queue.poll(); event; event = this.options.queue.poll()) {
            await this.handle(event);
            count++;
        }
        return count;
    }

    async handle(event: SystemEvent): Promise<ActuatorCommand> {
        this.remember(event);
        const command = commandFor(event, this.options.actions ?? DEFAULT_ACTIONS);
        this.options.logger.debug(`[Dispatcher] ${event.kind} from ${event.source} -> ${command.type}`);

        try {
            await this.execute(command, event);
        } catch (err) {
            this.failures++;
            const message = err instanceof Error ? err.message : String(err);
            this.options.logger.error(`[Dispatcher] ${command.type} for ${event.kind} failed: ${message}`);
        }
        this.handled++;
        return command;
    }

    getStats(): { handled: number; failures: number } {
        return { handled: this.handled, failures: this.failures };
    }

    getAnnouncement(): string[] {
        return [...this.announcement];
    }

    private async run(): Promise<void> {
        const pollMs = this.options.pollMs ?? 500;
        while (this.running) {
            const event = await this.options.queue.take(pollMs);
            if (event) {
                await this.handle(event);
            }
        }
    }

    private async announceFreezerTemp(event: SystemEvent): Promise<void> {
        const reading = event.payload && 'temperatureC' in event.payload ? event.payload.temperatureC : null;
        if (reading === null) {
            this.options.logger.warn('[Dispatcher] Freezer temperature not available');
            return;
        }
        await this.options.actuators.speak([freezerTemperatureLine(reading)]);
    }

    private remember(event: SystemEvent): void {
        const { fromStation, toStation } = this.options.route;
        if (event.kind === 'TRAIN_DELAYS' && event.payload && 'delays' in event.payload) {
            this.announcement = buildAnnouncement(event.payload.delays, fromStation, toStation);
        } else if (event.kind === 'TRAIN_NO_DELAYS') {
            this.announcement = buildAnnouncement([], fromStation, toStation);
        }
    }

    private async execute(command: ActuatorCommand, event: SystemEvent): Promise<void> {
        const { actuators } = this.options;
        switch (command.type) {
            case 'set-bulb':
                return actuators.setBulb(command.colour);
            case 'start-siren':
                return actuators.startSiren();
            case 'stop-siren':
                return actuators.stopSiren();
            case 'announce':
                return actuators.speak(command.lines);
            case 'announce-delays':
                return actuators.speak(this.getAnnouncement());
            case 'announce-freezer-temp':
                return this.announceFreezerTemp(event);
            case 'toggle-lights':
                return actuators.toggleLights();
            case 'none':
                return;
        }
    }
}
