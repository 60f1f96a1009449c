/**
 * Deterministic stand-ins for timers, wall clock and the queue (tests).
 */

import type { Cancel, Scheduler } from './driver';
import type { EventSink, SystemEvent } from './events';
import type { Clock } from './schedule';

interface Timer {
    due: number;
    periodMs: number | null;
    task: () => void;
}

/**
 * Scheduler whose time only moves on advance().
 */
export class ManualScheduler implements Scheduler {
    private now = 0;
    private timers: Timer[] = [];

    every(periodMs: number, task: () => void): Cancel {
        return this.add({ due: this.now + periodMs, periodMs, task });
    }

    after(delayMs: number, task: () => void): Cancel {
        return this.add({ due: this.now + delayMs, periodMs: null, task });
    }

    advance(ms: number): void {
        const target = this.now + ms;
        for (let next = this.nextDue(target); next; next = this.nextDue(target)) {
            this.now = next.due;
            if (next.periodMs === null) {
                this.timers = this.timers.filter((t) => t !== next);
            } else {
                next.due += next.periodMs;
            }
            next.task();
        }
        this.now = target;
    }

    pending(): number {
        return this.timers.length;
    }

    private add(timer: Timer): Cancel {
        this.timers.push(timer);
        return () => {
            this.timers = this.timers.filter((t) => t !== timer);
        };
    }

    private nextDue(limit: number): Timer | undefined {
        return this.timers
            .filter((t) => t.due <= limit)
            .sort((a, b) => a.due - b.due)[0];
    }
}

export class FixedClock implements Clock {
    constructor(private instant: Date) {}

    now(): Date {
        return this.instant;
    }

    set(iso: string): void {
        this.instant = new Date(iso);
    }

    advance(ms: number): void {
        this.instant = new Date(this.instant.getTime() + ms);
    }
}

export class CollectingSink implements EventSink {
    events: SystemEvent[] = [];

    put(event: SystemEvent): void {
        this.events.push(event);
    }

    kinds(): string[] {
        return this.events.map((e) => e.kind);
    }

    clear(): void {
        this.events = [];
    }
}
