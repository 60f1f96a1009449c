/**
 * CORE: Event Queue
 * Shared FIFO between the machines, the device handlers and the dispatcher.
 * Bounded: a full queue evicts its oldest event, never the newest, and counts the loss.
 */

import type { EventSink, SystemEvent } from './events';
import type { MonitorLogger } from './logger';

export const DEFAULT_QUEUE_CAPACITY = 256;

type Waiter = (event: SystemEvent | null) => void;

export class EventQueue implements EventSink {
    private items: SystemEvent[] = [];
    private waiters: Waiter[] = [];
    private droppedCount = 0;

    constructor(
        private logger: MonitorLogger,
        private capacity: number = DEFAULT_QUEUE_CAPACITY
    ) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new Error(`Queue capacity must be a positive integer, got ${capacity}`);
        }
    }

    /**
     * Non-blocking. Hands the event straight to a waiting consumer if there is one.
     */
    put(event: SystemEvent): void {
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter(event);
            return;
        }

        if (this.items.length >= this.capacity) {
            const evicted = this.items.shift();
            this.droppedCount++;
            this.logger.warn(
                `[Queue] Full (${this.capacity}). Dropped oldest ${evicted?.kind} from ${evicted?.source} ` +
                `(${this.droppedCount} dropped so far)`
            );
        }
        this.items.push(event);
    }

    poll(): SystemEvent | undefined {
        return this.items.shift();
    }

    /**
     * Resolves with the next event, or null once `timeoutMs` passes without one.
     */
    take(timeoutMs: number): Promise<SystemEvent | null> {
        const head = this.items.shift();
        if (head) {
            return Promise.resolve(head);
        }

        return new Promise((resolve) => {
            const waiter: Waiter = (event) => {
                clearTimeout(timer);
                resolve(event);
            };
            const timer = setTimeout(() => {
                this.waiters = this.waiters.filter((w) => w !== waiter);
                resolve(null);
            }, timeoutMs);
            this.waiters.push(waiter);
        });
    }

    /** Wakes every pending `take` with null. */
    release(): void {
        const waiters = this.waiters;
        this.waiters = [];
        waiters.forEach((w) => w(null));
    }

    isEmpty(): boolean {
        return this.items.length === 0;
    }

    get size(): number {
        return this.items.length;
    }

    get dropped(): number {
        return this.droppedCount;
    }
}
