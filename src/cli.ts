#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs-extra';
import path from 'path';
import inquirer from 'inquirer';
import { z } from 'zod';
import { Controller } from './bootstrap';
import { CONFIG_FILES, ConfigLoader, SCHEDULE_NAMES } from './core/config';
import type { MonitorConfig, ScheduleName } from './core/config';
import { manualDelay, validateDelayMinutes } from './core/delays';
import type { DelayRecord } from './core/delays';
import { MonitorError, logError } from './core/errors';
import { ConsoleLogger } from './core/logger';
import type { MonitorLogger } from './core/logger';
import { ScheduleClock, formatSchedule, formatTimeOfDay } from './core/schedule';
import { HuxleyClient } from './shell/delay-board';
import type { DelayLookup } from './shell/delay-board';
import { InstanceLock } from './shell/lock';

const PackageSchema = z.object({ version: z.string() });

function getPackageRoot(): string {
    // From dist/cli.js (or src/cli.ts under tsx), go up to package root
    return path.join(__dirname, '..');
}

const pkg = PackageSchema.parse(fs.readJsonSync(path.join(getPackageRoot(), 'package.json')));

const program = new Command();

program
    .name('home-sentinel')
    .description('Schedule-aware freezer, security and train delay monitor')
    .version(pkg.version);

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

async function loadConfig(configPath?: string): Promise<MonitorConfig> {
    return new ConfigLoader(process.cwd(), configPath).load();
}

function isScheduleName(name: string): name is ScheduleName {
    return SCHEDULE_NAMES.some((n) => n === name);
}

/** Lookup used when no access token is configured. */
const noDelays: DelayLookup = {
    async getDelays() {
        return [];
    },
};

function createDelayLookup(config: MonitorConfig, logger: MonitorLogger): DelayLookup {
    const accessToken = process.env[config.huxley.tokenEnv];
    if (!accessToken) {
        logger.warn(`${config.huxley.tokenEnv} is not set. Train delays will not be indicated.`);
        return noDelays;
    }
    return new HuxleyClient({ baseUrl: config.huxley.baseUrl, accessToken });
}

function stateDir(config: MonitorConfig): string {
    const base = config.configPath ? path.dirname(config.configPath) : process.cwd();
    return path.resolve(base, config.stateDir);
}

/**
 * Runs `body` with the instance lock held and a started controller; stops both afterwards.
 */
async function withController(
    config: MonitorConfig,
    logger: MonitorLogger,
    delayLookup: DelayLookup,
    body: (controller: Controller) => Promise<void>
): Promise<void> {
    const release = await new InstanceLock(stateDir(config)).acquire();
    const controller = new Controller({ config, logger, delayLookup });
    try {
        controller.start();
        await body(controller);
    } finally {
        await controller.stop();
        await release();
    }
}

function waitForSignal(logger: MonitorLogger): Promise<void> {
    return new Promise((resolve) => {
        const onSignal = (signal: NodeJS.Signals) => {
            logger.info(`\nReceived ${signal}, shutting down...`);
            process.off('SIGINT', onSignal);
            process.off('SIGTERM', onSignal);
            resolve();
        };
        process.on('SIGINT', onSignal);
        process.on('SIGTERM', onSignal);
    });
}

function fail(logger: MonitorLogger, err: unknown): never {
    logError(logger, err instanceof Error ? err : new Error(String(err)));
    process.exit(1);
}

// ═══════════════════════════════════════════════════════════════════════════
// INIT COMMAND
// ═══════════════════════════════════════════════════════════════════════════

program
    .command('init')
    .description('Write a default monitor.config.jsonc in the current directory')
    .action(async () => {
        const logger = new ConsoleLogger();
        const target = path.join(process.cwd(), CONFIG_FILES[0]);
        if (await fs.pathExists(target)) {
            logger.info(`Already initialized: ${target}`);
            return;
        }

        try {
            await fs.copy(path.join(getPackageRoot(), 'templates', 'monitor.config.jsonc'), target);
        } catch (err) {
            fail(logger, err);
        }

        logger.success(`✓ Created: ${target}`);
        logger.info(`\nNext: export NATIONAL_RAIL_TOKEN=... and run: home-sentinel run`);
    });

// ═══════════════════════════════════════════════════════════════════════════
// RUN COMMAND
// ═══════════════════════════════════════════════════════════════════════════

program
    .command('run')
    .description('Start the three machines and the dispatcher until interrupted')
    .option('-c, --config <path>', 'Config file')
    .option('-v, --verbose', 'Log every queued event')
    .action(async (options: { config?: string; verbose?: boolean }) => {
        const logger = new ConsoleLogger(options.verbose);
        try {
            const config = await loadConfig(options.config);
            await withController(config, logger, createDelayLookup(config, logger), () => waitForSignal(logger));
        } catch (err) {
            fail(logger, err);
        }
    });

// ═══════════════════════════════════════════════════════════════════════════
// SCHEDULE COMMAND
// ═══════════════════════════════════════════════════════════════════════════

program
    .command('schedule <name>')
    .description(`Show whether a schedule is active (${SCHEDULE_NAMES.join(', ')})`)
    .option('--at <iso>', 'Instant to evaluate instead of now')
    .option('-c, --config <path>', 'Config file')
    .action(async (name: string, options: { at?: string; config?: string }) => {
        const logger = new ConsoleLogger();
        try {
            if (!isScheduleName(name)) {
                throw new MonitorError(`Unknown schedule: ${name}`, `Use one of: ${SCHEDULE_NAMES.join(', ')}`);
            }
            const instant = options.at ? new Date(options.at) : new Date();
            if (Number.isNaN(instant.getTime())) {
                throw new MonitorError(`Invalid instant: ${options.at}`, 'Use an ISO 8601 timestamp, e.g. 2024-01-01T06:00:00Z');
            }

            const config = await loadConfig(options.config);
            const clock = new ScheduleClock(config.timezone, { now: () => instant });
            const schedule = config.schedules[name];

            logger.info(`Schedule:   ${name} = ${formatSchedule(schedule)}`);
            logger.info(`Local time: ${formatTimeOfDay(clock.localTime())} (${config.timezone})`);
            logger.info(`Active:     ${clock.isActive(schedule) ? 'yes' : 'no'}`);
        } catch (err) {
            fail(logger, err);
        }
    });

// ═══════════════════════════════════════════════════════════════════════════
// SIMULATE COMMAND
// ═══════════════════════════════════════════════════════════════════════════

type SimulateAction = 'temperature' | 'contact' | 'button' | 'delays' | 'status' | 'quit';

/** Delay list the user edits from the menu. */
class ManualDelays implements DelayLookup {
    records: DelayRecord[] = [];

    async getDelays(): Promise<DelayRecord[]> {
        return [...this.records];
    }
}

async function promptNumber(
    message: string,
    validate: (input: string) => true | string = (input) => Number.isFinite(Number(input)) || 'Enter a number'
): Promise<number> {
    const { value } = await inquirer.prompt<{ value: string }>({
        type: 'input',
        name: 'value',
        message,
        validate,
    });
    return Number(value);
}

async function simulateStep(controller: Controller, delays: ManualDelays, logger: MonitorLogger): Promise<boolean> {
    const { action } = await inquirer.prompt<{ action: SimulateAction }>({
        type: 'list',
        name: 'action',
        message: 'Device report:',
        choices: [
            { name: 'Freezer temperature', value: 'temperature' },
            { name: 'Contact sensor', value: 'contact' },
            { name: 'Button click', value: 'button' },
            { name: 'Train delays', value: 'delays' },
            { name: 'Show states', value: 'status' },
            { name: 'Quit', value: 'quit' },
        ],
    });

    switch (action) {
        case 'temperature':
            controller.freezerSensor.report(await promptNumber('Temperature (°C):'));
            return true;

        case 'contact': {
            const { name, status } = await inquirer.prompt<{ name: string; status: number }>([
                { type: 'list', name: 'name', message: 'Sensor:', choices: [...controller.contacts.keys()] },
                { type: 'list', name: 'status', message: 'Zone status:', choices: [{ name: 'open (1)', value: 1 }, { name: 'closed (0)', value: 0 }] },
            ]);
            controller.contact(name)?.zoneStatus(status);
            return true;
        }

        case 'button': {
            const { code } = await inquirer.prompt<{ code: string }>({
                type: 'list',
                name: 'code',
                message: 'Click:',
                choices: [
                    { name: 'short (04)', value: '04' },
                    { name: 'double (08)', value: '08' },
                    { name: 'long (10)', value: '10' },
                ],
            });
            controller.button.click(code);
            return true;
        }

        case 'delays': {
            const minutes = await promptNumber('Delay in minutes for the next service (0 clears):', validateDelayMinutes);
            delays.records = minutes > 0 ? [manualDelay(minutes)] : [];
            const { fromStation, toStation } = controller.delayContext.snapshot();
            await controller.board.refresh(fromStation, toStation);
            return true;
        }

        case 'status':
            logger.info(`Freezer:  ${controller.freezer.state}`);
            logger.info(`Security: ${controller.security.state}`);
            logger.info(`Delays:   ${controller.delays.state}`);
            logger.info(`Queue:    ${controller.queue.size} pending, ${controller.queue.dropped} dropped`);
            return true;

        case 'quit':
            return false;
    }
}

program
    .command('simulate')
    .description('Run the controller and feed it device reports from a menu')
    .option('-c, --config <path>', 'Config file')
    .option('-v, --verbose', 'Log every queued event')
    .action(async (options: { config?: string; verbose?: boolean }) => {
        const logger = new ConsoleLogger(options.verbose);
        const delays = new ManualDelays();
        try {
            const config = await loadConfig(options.config);
            await withController(config, logger, delays, async (controller) => {
                while (await simulateStep(controller, delays, logger)) {
                    // next report
                }
            });
        } catch (err) {
            fail(logger, err);
        }
    });

program.parseAsync(process.argv).catch((err: unknown) => fail(new ConsoleLogger(), err));
