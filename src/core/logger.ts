export interface MonitorLogger {
    debug(msg: string, ...args: unknown[]): void;
    info(msg: string, ...args: unknown[]): void;
    error(msg: string, ...args: unknown[]): void;
    success(msg: string, ...args: unknown[]): void;
    warn(msg: string, ...args: unknown[]): void;
}

export class ConsoleLogger implements MonitorLogger {
    constructor(private verbose = false) {}

    debug(msg: string, ...args: unknown[]): void {
        if (this.verbose) {
            console.debug(msg, ...args);
        }
    }

    info(msg: string, ...args: unknown[]): void {
        console.log(msg, ...args);
    }

    error(msg: string, ...args: unknown[]): void {
        console.error(msg, ...args);
    }

    success(msg: string, ...args: unknown[]): void {
        console.log(msg, ...args);
    }

    warn(msg: string, ...args: unknown[]): void {
        console.warn(msg, ...args);
    }
}

/**
 * Logger that keeps every line in memory (tests).
 */
export class MemoryLogger implements MonitorLogger {
    lines: { level: 'debug' | 'info' | 'error' | 'success' | 'warn'; msg: string }[] = [];

    debug(msg: string): void {
        this.lines.push({ level: 'debug', msg });
    }

    info(msg: string): void {
        this.lines.push({ level: 'info', msg });
    }

    error(msg: string): void {
        this.lines.push({ level: 'error', msg });
    }

    success(msg: string): void {
        this.lines.push({ level: 'success', msg });
    }

    warn(msg: string): void {
        this.lines.push({ level: 'warn', msg });
    }

    messages(level: MemoryLogger['lines'][number]['level']): string[] {
        return this.lines.filter((l) => l.level === level).map((l) => l.msg);
    }
}
