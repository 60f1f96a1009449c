/**
 * Controller wiring
 *
 * Builds the three machines over their context stores, one driver each under a supervisor,
 * the device collaborators, the delay board poller and the dispatch loop, all sharing one queue.
 *
 * Flow:
 * 1. Device reports -> context stores (and device events on the queue)
 * 2. Drivers tick -> machines read snapshots -> entry events on the queue
 * 3. Dispatcher drains the queue -> actuator commands
 */

import type { MonitorConfig } from './core/config';
import { createDelayContext, createFreezerContext, createSecurityContext } from './core/context';
import type { ContextStore, DelayContext, FreezerContext, SecurityContext } from './core/context';
import { ButtonHandler, ContactSensor, FreezerSensorMonitor } from './core/devices';
import { DriverSupervisor, MachineDriver, timerScheduler } from './core/driver';
import type { Cancel, Scheduler } from './core/driver';
import { EventDispatcher } from './core/dispatcher';
import type { Actuators } from './core/dispatcher';
import type { MonitorLogger } from './core/logger';
import { StateMachine } from './core/machine';
import { createDelayMachine } from './core/machines/delays';
import type { DelayInput, DelayState } from './core/machines/delays';
import { createFreezerMachine } from './core/machines/freezer';
import type { FreezerInput, FreezerState } from './core/machines/freezer';
import { createSecurityMachine } from './core/machines/security';
import type { SecurityInput, SecurityState } from './core/machines/security';
import { EventQueue } from './core/queue';
import { ScheduleClock, systemClock } from './core/schedule';
import type { Clock } from './core/schedule';
import { LoggingActuators } from './shell/actuators';
import { DelayBoard } from './shell/delay-board';
import type { DelayLookup } from './shell/delay-board';

export interface ControllerDeps {
    config: MonitorConfig;
    logger: MonitorLogger;
    delayLookup: DelayLookup;
    scheduler?: Scheduler;
    clock?: Clock;
    actuators?: Actuators;
}

export class Controller {
    readonly queue: EventQueue;
    readonly freezerContext: ContextStore<FreezerContext>;
    readonly securityContext: ContextStore<SecurityContext>;
    readonly delayContext: ContextStore<DelayContext>;

    readonly freezer: StateMachine<FreezerState, FreezerInput>;
    readonly security: StateMachine<SecurityState, SecurityInput>;
    readonly delays: StateMachine<DelayState, DelayInput>;

    readonly freezerSensor: FreezerSensorMonitor;
    readonly button: ButtonHandler;
    readonly contacts: Map<string, ContactSensor>;
    readonly board: DelayBoard;
    readonly dispatcher: EventDispatcher;
    readonly supervisor: DriverSupervisor;

    private scheduler: Scheduler;
    private timers: Cancel[] = [];
    private refreshing: Promise<unknown> = Promise.resolve();
    private dispatching?: Promise<void>;

    constructor(private deps: ControllerDeps) {
        const { config, logger } = deps;
        const clock = deps.clock ?? systemClock;
        this.scheduler = deps.scheduler ?? timerScheduler;
        const scheduleClock = new ScheduleClock(config.timezone, clock);

        this.queue = new EventQueue(logger, config.queue.capacity);
        this.freezerContext = createFreezerContext(config.schedules.freezerOffline);
        this.securityContext = createSecurityContext(config.schedules.securityArmed);
        this.delayContext = createDelayContext(config.stations.from, config.stations.to, config.schedules.trainDelays);
        this.board = new DelayBoard(deps.delayLookup, logger);

        const machineOptions = { sink: this.queue, logger, clock };
        this.freezer = new StateMachine(createFreezerMachine(this.freezerContext, scheduleClock), machineOptions);
        this.security = new StateMachine(createSecurityMachine(this.securityContext, scheduleClock), machineOptions);
        this.delays = new StateMachine(createDelayMachine(this.delayContext, this.board, scheduleClock), machineOptions);

        this.supervisor = new DriverSupervisor(this.scheduler, logger, config.intervals.restartDelayMs);
        this.supervise(this.freezer, config.intervals.freezerMs);
        this.supervise(this.security, config.intervals.securityMs);
        this.supervise(this.delays, config.intervals.delaysMs);

        this.freezerSensor = new FreezerSensorMonitor({
            name: config.devices.freezerSensor,
            store: this.freezerContext,
            logger,
            clock,
            thresholdC: config.freezer.thresholdC,
            hysteresisC: config.freezer.hysteresisC,
            offlineTimeoutMs: config.freezer.offlineTimeoutMinutes * 60 * 1000,
        });
        this.button = new ButtonHandler({
            name: config.devices.button,
            sink: this.queue,
            logger,
            clock,
            freezer: this.freezerContext,
            security: this.securityContext,
            temperature: () => this.freezerSensor.getTemperature(),
        });
        this.contacts = new Map(
            config.devices.intrusionSensors.map((name) => [
                name,
                new ContactSensor({ name, sink: this.queue, logger, clock, security: this.securityContext }),
            ])
        );

        this.dispatcher = new EventDispatcher({
            queue: this.queue,
            actuators: deps.actuators ?? new LoggingActuators(logger),
            logger,
            route: { fromStation: config.stations.from, toStation: config.stations.to },
            pollMs: config.intervals.dispatchPollMs,
        });
    }

    start(): void {
        const { config, logger } = this.deps;
        logger.info(`Starting controller (${config.timezone})`);

        this.refreshDelays();
        this.timers.push(
            this.scheduler.every(config.intervals.delayRefreshMs, () => this.refreshDelays()),
            this.scheduler.every(config.intervals.deviceCheckMs, () => this.freezerSensor.checkOnline())
        );
        this.supervisor.startAll();

        this.dispatching = this.dispatcher.start().catch((err: unknown) => {
            logger.error(`[Dispatcher] Loop stopped: ${err instanceof Error ? err.message : String(err)}`);
        });
    }

    async stop(): Promise<void> {
        this.timers.forEach((cancel) => cancel());
        this.timers = [];
        this.supervisor.stopAll();
        await this.refreshing;
        await this.dispatcher.stop();
        await this.dispatching;
        this.deps.logger.info('Controller stopped');
    }

    contact(name: string): ContactSensor | undefined {
        return this.contacts.get(name);
    }

    private refreshDelays(): void {
        const { fromStation, toStation } = this.delayContext.snapshot();
        this.refreshing = this.refreshing.then(() => this.board.refresh(fromStation, toStation));
    }

    private supervise<S extends string, I>(machine: StateMachine<S, I>, periodMs: number): void {
        const driver: MachineDriver<S, I> = new MachineDriver(machine, {
            periodMs,
            scheduler: this.scheduler,
            logger: this.deps.logger,
            onFatal: this.supervisor.watch(machine.name, () => driver.start()),
        });
        this.supervisor.add(driver);
    }
}

