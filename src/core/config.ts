import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';
import { MonitorConfigSchema } from './schema';
import { assertTimeZone, parseSchedule } from './schedule';
import type { Schedule } from './schedule';

export type RawMonitorConfig = z.infer<typeof MonitorConfigSchema>;

export type ScheduleName = keyof RawMonitorConfig['schedules'];

export const SCHEDULE_NAMES: readonly ScheduleName[] = ['freezerOffline', 'securityArmed', 'trainDelays'];

/** Validated configuration with schedules already parsed. */
export interface MonitorConfig extends Omit<RawMonitorConfig, 'schedules'> {
    schedules: Record<ScheduleName, Schedule>;
    configPath: string | null;
}

export const CONFIG_FILES = ['monitor.config.jsonc', 'monitor.config.json'];

export class ConfigLoader {
    private configPath: string;

    constructor(private workDir: string, explicitPath?: string) {
        if (explicitPath) {
            this.configPath = path.resolve(workDir, explicitPath);
            return;
        }
        const found = CONFIG_FILES
            .map((f) => path.join(workDir, f))
            .find((p) => fs.existsSync(p));
        this.configPath = found ?? path.join(workDir, CONFIG_FILES[0]);
    }

    getConfigPath(): string {
        return this.configPath;
    }

    async load(): Promise<MonitorConfig> {
        if (!await fs.pathExists(this.configPath)) {
            throw new ConfigError(
                `Config file not found: ${this.configPath}\n` +
                `Create one with: home-sentinel init`
            );
        }

        // Load and parse (strip comments for jsonc)
        let content = await fs.readFile(this.configPath, 'utf-8');
        content = stripJsonComments(content);

        let userConfig: unknown;
        try {
            userConfig = JSON.parse(content);
        } catch (e) {
            throw new ConfigError(`Invalid config JSON in ${this.configPath}: ${e instanceof Error ? e.message : String(e)}`);
        }

        return resolveConfig(userConfig, this.configPath);
    }
}

/**
 * Validate and normalise a raw config object. Any error is thrown before a machine exists.
 */
export function resolveConfig(userConfig: unknown, configPath: string | null = null): MonitorConfig {
    const parsed = MonitorConfigSchema.safeParse(userConfig ?? {});
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((i) => `  ${i.path.join('.') || '(root)'}: ${i.message}`)
            .join('\n');
        throw new ConfigError(`Invalid configuration:\n${issues}`);
    }

    const raw = parsed.data;
    try {
        assertTimeZone(raw.timezone);
        return {
            ...raw,
            configPath,
            schedules: {
                freezerOffline: parseSchedule(raw.schedules.freezerOffline),
                securityArmed: parseSchedule(raw.schedules.securityArmed),
                trainDelays: parseSchedule(raw.schedules.trainDelays),
            },
        };
    } catch (err) {
        throw new ConfigError(`Invalid configuration: ${err instanceof Error ? err.message : String(err)}`);
    }
}

/**
 * Removes `//` and `/* *\/` comments that sit outside string literals.
 */
export function stripJsonComments(content: string): string {
    let out = '';
    let inString = false;
    for (let i = 0; i < content.length; i++) {
        const ch = content[i];
        if (inString) {
            out += ch;
            if (ch === '\\') {
                out += content[++i] ?? '';
            } else if (ch === '"') {
                inString = false;
            }
        } else if (ch === '"') {
            inString = true;
            out += ch;
        } else if (content.startsWith('//', i)) {
            const end = content.indexOf('\n', i);
            i = (end === -1 ? content.length : end) - 1;
        } else if (content.startsWith('/*', i)) {
            const end = content.indexOf('*/', i + 2);
            i = end === -1 ? content.length : end + 1;
        } else {
            out += ch;
        }
    }
    return out;
}
