import type { MonitorLogger } from './logger';

/**
 * Base error class for the controller with recovery hints
 */
export class MonitorError extends Error {
    constructor(message: string, public recoveryHint?: string) {
        super(message);
        this.name = 'MonitorError';
    }

    toString(): string {
        if (this.recoveryHint) {
            return `${this.message}\n💡 Hint: ${this.recoveryHint}`;
        }
        return this.message;
    }
}

/**
 * Configuration error: raised at load time, before any machine starts
 */
export class ConfigError extends MonitorError {
    constructor(message: string) {
        super(message, 'Check monitor.config.jsonc or run: home-sentinel init');
        this.name = 'ConfigError';
    }
}

/**
 * Malformed "HH:MM" value or schedule window
 */
export class ScheduleFormatError extends MonitorError {
    constructor(message: string) {
        super(message, 'Schedule windows are ["HH:MM", "HH:MM"] pairs in 24h local time.');
        this.name = 'ScheduleFormatError';
    }
}

/**
 * A transition function threw. Transition functions are total, so this is a defect.
 */
export class TransitionError extends MonitorError {
    constructor(public machine: string, public state: string, cause: unknown) {
        super(
            `Machine ${machine} failed while in ${state}: ${cause instanceof Error ? cause.message : String(cause)}`,
            'The driver was stopped and will be restarted by the supervisor.'
        );
        this.name = 'TransitionError';
    }
}

/**
 * Lock error when another controller is running
 */
export class LockError extends MonitorError {
    constructor(message: string, public lockPath?: string) {
        super(
            message,
            lockPath
                ? `Another controller holds ${lockPath}. Stop it first.`
                : 'Another controller is running. Stop it first.'
        );
        this.name = 'LockError';
    }
}

/**
 * Log error with recovery hint
 */
export function logError(logger: MonitorLogger, error: Error): void {
    logger.error(`[ERROR] ${error.message}`);
    if (error instanceof MonitorError && error.recoveryHint) {
        logger.info(`💡 Hint: ${error.recoveryHint}`);
    }
}
