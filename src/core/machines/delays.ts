/**
 * Train delay indicator.
 *
 * NoDelays re-emits its entry event on every tick it stays in, so the dispatcher keeps
 * retrying to clear a bulb that is stuck red. This overrides the engine's silent stay.
 */

import type { ContextStore, DelayContext } from '../context';
import type { DelayRecord, DelaySource } from '../delays';
import { draft } from '../events';
import type { EventDraft } from '../events';
import type { MachineDefinition } from '../machine';
import type { ScheduleClock } from '../schedule';

export const DELAY_STATES = ['NoDelays', 'Delays'] as const;

export type DelayState = (typeof DELAY_STATES)[number];

export interface DelayInput {
    delays: DelayRecord[];
    /** Delay indication schedule is active now. */
    scheduleOn: boolean;
}

export function delayTransition(state: DelayState, input: DelayInput): DelayState {
    const hasDelays = input.delays.length > 0;

    switch (state) {
        case 'NoDelays':
            return hasDelays && input.scheduleOn ? 'Delays' : state;

        case 'Delays':
            return !hasDelays || !input.scheduleOn ? 'NoDelays' : state;

        default: {
            const unreachable: never = state;
            return unreachable;
        }
    }
}

export function delayEntry(state: DelayState, input: DelayInput): EventDraft {
    return state === 'Delays'
        ? draft('TRAIN_DELAYS', { delays: input.delays })
        : draft('TRAIN_NO_DELAYS');
}

export function createDelayMachine(
    store: ContextStore<DelayContext>,
    source: DelaySource,
    schedule: ScheduleClock,
    name = 'DelayIndicator'
): MachineDefinition<DelayState, DelayInput> {
    return {
        name,
        initial: 'NoDelays',
        states: DELAY_STATES,
        readInput() {
            const ctx = store.snapshot();
            return {
                delays: source.getDelays(ctx.fromStation, ctx.toStation),
                scheduleOn: schedule.isActive(ctx.schedule),
            };
        },
        transition: delayTransition,
        entry: delayEntry,
        repeatEntryWhile: (state) => state === 'NoDelays',
    };
}
