/**
 * CORE: State Machine Engine
 * Generic driver-agnostic engine: (state, input) -> state, entry action fired once per transition.
 *
 * Tick order:
 *   1. input = readInput()          snapshot of context, schedules and collaborator reads
 *   2. next = transition(state, input)   pure, total; returns `state` when nothing applies;
 *      a state outside `states` throws before anything is consumed
 *   3. consume(input)               one-shot flags seen in the snapshot are cleared
 *   4. if next !== state: exit events, entry event of next, current = next
 *      else: silent, unless repeatEntryWhile(state)
 */

import type { EventDraft, EventSink, SystemEvent } from './events';
import { stamp } from './events';
import type { MonitorLogger } from './logger';
import type { Clock } from './schedule';
import { systemClock } from './schedule';

export interface MachineDefinition<S extends string, I> {
    name: string;
    initial: S;
    /** Every state; `initial` and each transition result must be one of them. */
    states: readonly S[];
    readInput(): I;
    transition(state: S, input: I): S;
    entry(state: S, input: I): EventDraft;
    exit?(from: S, to: S, input: I): EventDraft[];
    repeatEntryWhile?(state: S): boolean;
    consume?(input: I): void;
}

export interface TickResult<S extends string> {
    from: S;
    to: S;
    changed: boolean;
    emitted: SystemEvent[];
}

export interface StateMachineOptions {
    sink: EventSink;
    logger: MonitorLogger;
    clock?: Clock;
}

export class StateMachine<S extends string, I> {
    private current: S;
    private sink: EventSink;
    private logger: MonitorLogger;
    private clock: Clock;

    constructor(private definition: MachineDefinition<S, I>, options: StateMachineOptions) {
        this.sink = options.sink;
        this.logger = options.logger;
        this.clock = options.clock ?? systemClock;
        this.current = this.known(definition.initial);

        this.logger.info(`[${definition.name}] Entering state: ${this.current}`);
        this.emit([definition.entry(this.current, definition.readInput())]);
    }

    get name(): string {
        return this.definition.name;
    }

    get state(): S {
        return this.current;
    }

    tick(): TickResult<S> {
        const { definition } = this;
        const from = this.current;
        const input = definition.readInput();
        const to = this.known(definition.transition(from, input));

        definition.consume?.(input);

        if (to === from) {
            const emitted = definition.repeatEntryWhile?.(from)
                ? this.emit([definition.entry(from, input)])
                : [];
            return { from, to, changed: false, emitted };
        }

        const drafts = [...(definition.exit?.(from, to, input) ?? []), definition.entry(to, input)];
        this.logger.info(`[${definition.name}] ${from} -> ${to}`);
        const emitted = this.emit(drafts);
        this.current = to;

        return { from, to, changed: true, emitted };
    }

    private known(state: S): S {
        if (!this.definition.states.includes(state)) {
            throw new Error(`[${this.definition.name}] Unknown state "${state}"`);
        }
        return state;
    }

    private emit(drafts: EventDraft[]): SystemEvent[] {
        const at = this.clock.now().getTime();
        const events = drafts.map((d) => stamp(d, this.definition.name, at));
        for (const event of events) {
            this.logger.debug(`[${this.definition.name}] Putting event ${event.kind} on queue`);
            this.sink.put(event);
        }
        return events;
    }
}
