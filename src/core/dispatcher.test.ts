import { describe, it } from 'node:test';
import assert from 'node:assert';
import type { BulbColour } from './commands';
import { DEFAULT_ACTIONS, announce } from './commands';
import type { DelayRecord } from './delays';
import { EventDispatcher } from './dispatcher';
import type { Actuators } from './dispatcher';
import type { SystemEvent, SystemEventKind } from './events';
import { MemoryLogger } from './logger';
import { EventQueue } from './queue';

class FakeActuators implements Actuators {
    calls: string[] = [];
    failSiren = false;

    async setBulb(colour: BulbColour): Promise<void> {
        this.calls.push(`bulb:${colour}`);
    }

    async startSiren(): Promise<void> {
        if (this.failSiren) throw new Error('siren unreachable');
        this.calls.push('siren:on');
    }

    async stopSiren(): Promise<void> {
        this.calls.push('siren:off');
    }

    async speak(lines: string[]): Promise<void> {
        this.calls.push(...lines.map((l) => `say:${l}`));
    }

    async toggleLights(): Promise<void> {
        this.calls.push('lights');
    }
}

const LATE: DelayRecord = {
    std: '06:15',
    etd: '06:20',
    isCancelled: false,
    cancelReason: null,
    delayReason: null,
};

function event(kind: SystemEventKind, payload?: SystemEvent['payload']): SystemEvent {
    return payload ? { kind, source: 'Test', payload, at: 0 } : { kind, source: 'Test', at: 0 };
}

function setup(actions = DEFAULT_ACTIONS) {
    const logger = new MemoryLogger();
    const queue = new EventQueue(logger);
    const actuators = new FakeActuators();
    const dispatcher = new EventDispatcher({
        queue,
        actuators,
        logger,
        route: { fromStation: 'EDB', toStation: 'GLQ' },
        pollMs: 5,
        actions,
    });
    return { logger, queue, actuators, dispatcher };
}

describe('EventDispatcher', () => {
    it('should run one command per event in queue order', async () => {
        const { queue, actuators, dispatcher } = setup();
        queue.put(event('FREEZER_ALARM_TEMP_HIGH'));
        queue.put(event('ALARM_TRIGGERED'));
        queue.put(event('ALARM_ARMED'));
        queue.put(event('BUTTON_SHORT_PRESS'));

        assert.strictEqual(await dispatcher.drain(), 4);
        assert.deepStrictEqual(actuators.calls, ['bulb:blue', 'siren:on', 'lights']);
        assert.deepStrictEqual(dispatcher.getStats(), { handled: 4, failures: 0 });
    });

    it('should announce the last delay list on a double press', async () => {
        const { queue, actuators, dispatcher } = setup();
        queue.put(event('BUTTON_DOUBLE_PRESS'));
        queue.put(event('TRAIN_DELAYS', { delays: [LATE] }));
        queue.put(event('BUTTON_DOUBLE_PRESS'));
        queue.put(event('TRAIN_NO_DELAYS'));
        queue.put(event('BUTTON_DOUBLE_PRESS'));

        await dispatcher.drain();
        assert.deepStrictEqual(actuators.calls, [
            'say:No delays listed for trains from EDB to GLQ.',
            'bulb:red',
            'say:The 06:15 from EDB to GLQ, is delayed by 5 minutes.',
            'bulb:white-off',
            'say:No delays listed for trains from EDB to GLQ.',
        ]);
    });

    it('should speak the freezer reading carried by a long press', async () => {
        const { logger, queue, actuators, dispatcher } = setup();
        queue.put(event('BUTTON_LONG_PRESS', { device: 'Button', temperatureC: -18.5 }));
        queue.put(event('BUTTON_LONG_PRESS', { device: 'Button', temperatureC: null }));

        await dispatcher.drain();
        assert.deepStrictEqual(actuators.calls, ['say:Freezer temperature is -18.5°C']);
        assert.deepStrictEqual(logger.messages('warn'), ['[Dispatcher] Freezer temperature not available']);
        assert.deepStrictEqual(dispatcher.getStats(), { handled: 2, failures: 0 });
    });

    it('should log an actuator failure and carry on', async () => {
        const { logger, queue, actuators, dispatcher } = setup();
        actuators.failSiren = true;
        queue.put(event('ALARM_TRIGGERED'));
        queue.put(event('ALARM_DISARMED'));

        await dispatcher.drain();
        assert.deepStrictEqual(actuators.calls, ['siren:off']);
        assert.deepStrictEqual(dispatcher.getStats(), { handled: 2, failures: 1 });
        assert.deepStrictEqual(logger.messages('error'), [
            '[Dispatcher] start-siren for ALARM_TRIGGERED failed: siren unreachable',
        ]);
    });

    it('should speak fixed lines from a custom table', async () => {
        const { queue, actuators, dispatcher } = setup({ ...DEFAULT_ACTIONS, ALARM_ARMED: announce(['Alarm armed']) });
        queue.put(event('ALARM_ARMED'));

        await dispatcher.drain();
        assert.deepStrictEqual(actuators.calls, ['say:Alarm armed']);
    });

    it('should consume events while running and exit on stop()', async () => {
        const { queue, actuators, dispatcher } = setup();
        const loop = dispatcher.start();
        queue.put(event('TRAIN_DELAYS', { delays: [LATE] }));
        queue.put(event('BUTTON_SHORT_PRESS'));

        await new Promise((resolve) => setTimeout(resolve, 20));
        await dispatcher.stop();
        await loop;

        assert.deepStrictEqual(actuators.calls, ['bulb:red', 'lights']);
    });
});
