/**
 * Security alarm, armed by schedule.
 *
 * The long press toggles `deactivated`; while it is set the siren stays silent.
 * Leaving Deactivated announces ALARM_ACTIVATED before Disarmed's own entry event.
 */

import type { ContextStore, SecurityContext } from '../context';
import { draft } from '../events';
import type { EventDraft, SecurityEventKind } from '../events';
import type { MachineDefinition } from '../machine';
import type { ScheduleClock } from '../schedule';

export const SECURITY_STATES = ['Disarmed', 'Armed', 'Triggered', 'Deactivated'] as const;

export type SecurityState = (typeof SECURITY_STATES)[number];

export interface SecurityInput {
    trigger: boolean;
    deactivated: boolean;
    /** Armed schedule is active now. */
    armedHours: boolean;
}

const ENTRY_EVENTS: Record<SecurityState, SecurityEventKind> = {
    Disarmed: 'ALARM_DISARMED',
    Armed: 'ALARM_ARMED',
    Triggered: 'ALARM_TRIGGERED',
    Deactivated: 'ALARM_DEACTIVATED',
};

export function securityTransition(state: SecurityState, input: SecurityInput): SecurityState {
    const { trigger, deactivated, armedHours } = input;

    switch (state) {
        case 'Disarmed':
            if (deactivated) return 'Deactivated';
            if (armedHours) return 'Armed';
            return state;

        case 'Armed':
            if (deactivated) return 'Deactivated';
            if (!armedHours) return 'Disarmed';
            if (trigger) return 'Triggered';
            return state;

        case 'Triggered':
            if (!armedHours) return 'Disarmed';
            if (deactivated) return 'Deactivated';
            return state;

        case 'Deactivated':
            if (!deactivated) return 'Disarmed';
            return state;

        default: {
            const unreachable: never = state;
            return unreachable;
        }
    }
}

export function securityEntry(state: SecurityState): EventDraft {
    return draft(ENTRY_EVENTS[state]);
}

export function securityExit(from: SecurityState): EventDraft[] {
    return from === 'Deactivated' ? [draft('ALARM_ACTIVATED')] : [];
}

export function createSecurityMachine(
    store: ContextStore<SecurityContext>,
    schedule: ScheduleClock,
    name = 'SecurityAlarm'
): MachineDefinition<SecurityState, SecurityInput> {
    return {
        name,
        initial: 'Disarmed',
        states: SECURITY_STATES,
        readInput() {
            const ctx = store.snapshot();
            return {
                trigger: ctx.trigger,
                deactivated: ctx.deactivated,
                armedHours: schedule.isActive(ctx.schedule),
            };
        },
        transition: securityTransition,
        entry: securityEntry,
        exit: securityExit,
        consume(input) {
            // An intrusion only counts on the tick that sees it; Armed -> Triggered clears it
            if (input.trigger) {
                store.set({ trigger: false });
            }
        },
    };
}
