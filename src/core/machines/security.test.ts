import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createSecurityContext } from '../context';
import { MemoryLogger } from '../logger';
import { StateMachine } from '../machine';
import { ScheduleClock, parseSchedule } from '../schedule';
import { CollectingSink, FixedClock } from '../testing';
import { SECURITY_STATES, createSecurityMachine, securityTransition } from './security';
import type { SecurityInput } from './security';

function setup() {
    // The armed window opens at 23:00 UTC, 60 seconds after the start
    const clock = new FixedClock(new Date('2021-01-01T22:59:00Z'));
    const store = createSecurityContext(parseSchedule([['23:00', '05:00']]));
    const sink = new CollectingSink();
    const machine = new StateMachine(
        createSecurityMachine(store, new ScheduleClock('UTC', clock)),
        { sink, logger: new MemoryLogger(), clock }
    );
    return { clock, store, sink, machine };
}

describe('Security alarm', () => {
    it('should arm, trigger, deactivate and reactivate', () => {
        const { clock, store, sink, machine } = setup();
        assert.strictEqual(machine.state, 'Disarmed');
        assert.deepStrictEqual(sink.kinds(), ['ALARM_DISARMED']);
        sink.clear();

        machine.tick();
        assert.strictEqual(machine.state, 'Disarmed');

        clock.advance(60 * 1000);
        machine.tick();
        assert.strictEqual(machine.state, 'Armed');
        assert.deepStrictEqual(sink.kinds(), ['ALARM_ARMED']);

        store.set({ trigger: true });
        machine.tick();
        assert.strictEqual(machine.state, 'Triggered');

        store.set({ deactivated: true });
        machine.tick();
        assert.strictEqual(machine.state, 'Deactivated');

        store.set({ deactivated: false });
        machine.tick();
        assert.strictEqual(machine.state, 'Disarmed');

        assert.deepStrictEqual(sink.kinds(), [
            'ALARM_ARMED',
            'ALARM_TRIGGERED',
            'ALARM_DEACTIVATED',
            'ALARM_ACTIVATED',
            'ALARM_DISARMED',
        ]);
    });

    it('should clear the trigger on the tick that sees it', () => {
        const { clock, store, machine } = setup();
        clock.advance(60 * 1000);
        machine.tick();

        store.set({ trigger: true });
        machine.tick();
        assert.strictEqual(store.snapshot().trigger, false);
    });

    it('should not let a trigger raised while disarmed fire once armed', () => {
        const { clock, store, machine } = setup();
        store.set({ trigger: true });
        machine.tick();
        assert.strictEqual(store.snapshot().trigger, false);

        clock.advance(60 * 1000);
        machine.tick();
        machine.tick();
        assert.strictEqual(machine.state, 'Armed');
    });

    it('should disarm a triggered alarm when the armed window closes', () => {
        const { clock, store, sink, machine } = setup();
        clock.advance(60 * 1000);
        machine.tick();
        store.set({ trigger: true });
        machine.tick();
        sink.clear();

        clock.set('2021-01-02T05:01:00Z');
        machine.tick();
        assert.strictEqual(machine.state, 'Disarmed');
        assert.deepStrictEqual(sink.kinds(), ['ALARM_DISARMED']);
    });

    it('should keep the siren silent while deactivated', () => {
        const { clock, store, sink, machine } = setup();
        store.set({ deactivated: true });
        machine.tick();
        assert.strictEqual(machine.state, 'Deactivated');
        sink.clear();

        clock.advance(60 * 1000);
        store.set({ trigger: true });
        machine.tick();
        assert.strictEqual(machine.state, 'Deactivated');
        assert.deepStrictEqual(sink.kinds(), []);
    });

    it('should define a known next state for every state and input', () => {
        for (const state of SECURITY_STATES) {
            for (let bits = 0; bits < 8; bits++) {
                const input: SecurityInput = {
                    trigger: (bits & 1) !== 0,
                    deactivated: (bits & 2) !== 0,
                    armedHours: (bits & 4) !== 0,
                };
                const next = securityTransition(state, input);
                assert.ok(SECURITY_STATES.includes(next));
                assert.strictEqual(securityTransition(state, { ...input }), next);
            }
        }
    });
});
