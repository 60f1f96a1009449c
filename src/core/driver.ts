/**
 * CORE: Machine Driver
 * Runs one machine's tick on a fixed period. Not reentrant: ticks are synchronous and short.
 * Stopping means "do not schedule the next tick"; there is no mid-tick cancellation.
 */

import { TransitionError } from './errors';
import type { MonitorLogger } from './logger';
import type { StateMachine } from './machine';

export type Cancel = () => void;

export interface Scheduler {
    every(periodMs: number, task: () => void): Cancel;
    after(delayMs: number, task: () => void): Cancel;
}

export const timerScheduler: Scheduler = {
    every(periodMs, task) {
        const handle = setInterval(task, periodMs);
        return () => clearInterval(handle);
    },
    after(delayMs, task) {
        const handle = setTimeout(task, delayMs);
        return () => clearTimeout(handle);
    },
};

export interface DriverOptions {
    periodMs: number;
    scheduler: Scheduler;
    logger: MonitorLogger;
    /** Called once when a tick throws; the driver has already stopped. */
    onFatal?: (error: TransitionError) => void;
}

export class MachineDriver<S extends string, I> {
    private cancel?: Cancel;
    private ticks = 0;

    constructor(
        private machine: StateMachine<S, I>,
        private options: DriverOptions
    ) {}

    start(): void {
        if (this.cancel) {
            this.options.logger.debug(`[${this.machine.name}] Driver already running`);
            return;
        }

        this.options.logger.info(`[${this.machine.name}] Driver started (${this.options.periodMs}ms)`);
        this.cancel = this.options.scheduler.every(this.options.periodMs, () => this.runTick());
        // First evaluation straight away, not one period late
        this.runTick();
    }

    stop(): void {
        if (!this.cancel) return;
        this.cancel();
        this.cancel = undefined;
        this.options.logger.info(`[${this.machine.name}] Driver stopped after ${this.ticks} ticks`);
    }

    isRunning(): boolean {
        return this.cancel !== undefined;
    }

    getTickCount(): number {
        return this.ticks;
    }

    private runTick(): void {
        if (!this.cancel) return;
        try {
            this.machine.tick();
            this.ticks++;
        } catch (err) {
            const error = new TransitionError(this.machine.name, this.machine.state, err);
            this.options.logger.error(`[${this.machine.name}] CRITICAL: ${error.message}`);
            this.stop();
            this.options.onFatal?.(error);
        }
    }
}

export interface Runnable {
    start(): void;
    stop(): void;
}

/**
 * Restarts a driver that stopped on a fatal tick, after `restartDelayMs`.
 */
export class DriverSupervisor {
    private drivers: Runnable[] = [];
    private pending: Cancel[] = [];
    private restarts = 0;
    private stopped = false;

    constructor(
        private scheduler: Scheduler,
        private logger: MonitorLogger,
        private restartDelayMs: number
    ) {}

    /**
     * Returns the onFatal hook to hand to the driver being supervised.
     */
    watch(name: string, restart: () => void): (error: TransitionError) => void {
        return (error) => {
            if (this.stopped) return;
            this.logger.warn(`[Supervisor] ${name} failed (${error.message}). Restarting in ${this.restartDelayMs}ms`);
            const cancel = this.scheduler.after(this.restartDelayMs, () => {
                this.pending = this.pending.filter((c) => c !== cancel);
                if (this.stopped) return;
                this.restarts++;
                restart();
            });
            this.pending.push(cancel);
        };
    }

    add(driver: Runnable): void {
        this.drivers.push(driver);
    }

    startAll(): void {
        this.stopped = false;
        this.drivers.forEach((d) => d.start());
    }

    stopAll(): void {
        this.stopped = true;
        this.pending.forEach((c) => c());
        this.pending = [];
        this.drivers.forEach((d) => d.stop());
    }

    getRestartCount(): number {
        return this.restarts;
    }
}
