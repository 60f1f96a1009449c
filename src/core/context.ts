/**
 * CORE: Context Store
 * Single owner of a machine's mutable context.
 * Atomic update: Read -> Update -> Write, the updater runs to completion before anyone else reads.
 */

import type { Schedule } from './schedule';

export type ContextUpdater<C> = (current: Readonly<C>) => Partial<C>;

export type ContextListener<C> = (next: Readonly<C>, previous: Readonly<C>) => void;

export class ContextStore<C extends object> {
    private current: Readonly<C>;
    private listeners: ContextListener<C>[] = [];

    constructor(initial: C) {
        this.current = Object.freeze({ ...initial });
    }

    snapshot(): Readonly<C> {
        return this.current;
    }

    /**
     * Atomic read-modify-write. The updater computes a patch from the current value.
     */
    update(updater: ContextUpdater<C>): Readonly<C> {
        const previous = this.current;
        this.current = Object.freeze({ ...previous, ...updater(previous) });
        this.listeners.forEach((l) => l(this.current, previous));
        return this.current;
    }

    set(patch: Partial<C>): Readonly<C> {
        return this.update(() => patch);
    }

    subscribe(listener: ContextListener<C>): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter((l) => l !== listener);
        };
    }
}

export interface FreezerContext {
    sensorOnline: boolean;
    tempHigh: boolean;
    /** One-shot disable request (long press). Cleared by the engine once evaluated. */
    disabled: boolean;
    /** Hours in which an offline sensor is indicated. */
    schedule: Schedule;
}

export interface SecurityContext {
    /** One-shot intrusion (sensor opened). Cleared by the engine once evaluated. */
    trigger: boolean;
    /** Level override, toggled by the long press. */
    deactivated: boolean;
    /** Armed hours. */
    schedule: Schedule;
}

export interface DelayContext {
    fromStation: string;
    toStation: string;
    schedule: Schedule;
}

export function createFreezerContext(schedule: Schedule): ContextStore<FreezerContext> {
    return new ContextStore<FreezerContext>({
        sensorOnline: true,
        tempHigh: false,
        disabled: false,
        schedule,
    });
}

export function createSecurityContext(schedule: Schedule): ContextStore<SecurityContext> {
    return new ContextStore<SecurityContext>({
        trigger: false,
        deactivated: false,
        schedule,
    });
}

export function createDelayContext(fromStation: string, toStation: string, schedule: Schedule): ContextStore<DelayContext> {
    return new ContextStore<DelayContext>({ fromStation, toStation, schedule });
}
