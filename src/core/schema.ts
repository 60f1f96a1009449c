import { z } from 'zod';

const HHMM = z.string().regex(/^\d{2}:\d{2}$/, 'expected HH:MM');

export const ScheduleWindowSchema = z.tuple([HHMM, HHMM]).describe('A [start, end] local-time window. start > end wraps past midnight.');

export const RawScheduleSchema = z.array(ScheduleWindowSchema);

export const MonitorConfigSchema = z.object({
    timezone: z.string().default('Europe/London').describe('IANA zone the schedules are written in.'),
    schedules: z.object({
        freezerOffline: RawScheduleSchema.default([['08:00', '22:00']]).describe('Hours in which an offline freezer sensor is shown on the bulb.'),
        securityArmed: RawScheduleSchema.default([['23:00', '05:00']]).describe('Hours in which the security alarm is armed.'),
        trainDelays: RawScheduleSchema.default([['05:30', '07:00']]).describe('Hours in which train delays are indicated.'),
    }).default({}),
    stations: z.object({
        from: z.string().min(3).default('EDB'),
        to: z.string().min(3).default('GLQ'),
    }).default({}),
    freezer: z.object({
        thresholdC: z.number().default(-10).describe('Temperature alert threshold.'),
        hysteresisC: z.number().nonnegative().default(1).describe('Drop below threshold needed to clear a high reading.'),
        offlineTimeoutMinutes: z.number().positive().default(21).describe('Silence after which the sensor is offline.'),
    }).default({}),
    intervals: z.object({
        freezerMs: z.number().int().positive().default(1000),
        securityMs: z.number().int().positive().default(100),
        delaysMs: z.number().int().positive().default(10 * 1000),
        delayRefreshMs: z.number().int().positive().default(10 * 60 * 1000),
        deviceCheckMs: z.number().int().positive().default(60 * 1000),
        dispatchPollMs: z.number().int().positive().default(500),
        restartDelayMs: z.number().int().nonnegative().default(5000),
    }).default({}),
    queue: z.object({
        capacity: z.number().int().positive().default(256),
    }).default({}),
    huxley: z.object({
        baseUrl: z.string().url().default('https://huxley2.azurewebsites.net'),
        tokenEnv: z.string().default('NATIONAL_RAIL_TOKEN'),
    }).default({}),
    devices: z.object({
        freezerSensor: z.string().default('Freezer Sensor'),
        button: z.string().default('Button'),
        intrusionSensors: z.array(z.string()).default(['Back Door']).describe('Contact sensors that trigger the security alarm.'),
    }).default({}),
    stateDir: z.string().default('.home-sentinel').describe('Directory for the instance lock.'),
});

export const DelayRecordSchema = z.object({
    std: z.string().describe('Scheduled departure, HH:MM'),
    etd: z.string().describe('Expected departure: HH:MM, "Delayed", "Cancelled" or "On time"'),
    isCancelled: z.boolean().default(false),
    cancelReason: z.string().nullable().default(null),
    delayReason: z.string().nullable().default(null),
    platform: z.string().nullable().optional(),
});

export const DelaysBoardResponseSchema = z.object({
    trainServices: z.array(DelayRecordSchema).nullable().default([]),
});
