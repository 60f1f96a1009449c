import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createFreezerContext, createSecurityContext } from './context';
import { ButtonHandler, ContactSensor, FreezerSensorMonitor, classifyClick } from './devices';
import { MemoryLogger } from './logger';
import { CollectingSink, FixedClock } from './testing';

const MINUTE = 60 * 1000;

function freezerSetup() {
    const clock = new FixedClock(new Date('2021-01-01T12:00:00Z'));
    const store = createFreezerContext([]);
    const logger = new MemoryLogger();
    const sensor = new FreezerSensorMonitor({
        name: 'Freezer Sensor',
        store,
        logger,
        clock,
        thresholdC: -10,
        hysteresisC: 1,
        offlineTimeoutMs: 21 * MINUTE,
    });
    return { clock, store, logger, sensor };
}

describe('FreezerSensorMonitor', () => {
    it('should set tempHigh above the threshold and clear it below the hysteresis band', () => {
        const { store, sensor } = freezerSetup();

        sensor.report(-18);
        assert.strictEqual(store.snapshot().tempHigh, false);

        sensor.report(-9.5);
        assert.strictEqual(store.snapshot().tempHigh, true);

        // Inside the band: stays high
        sensor.report(-10.5);
        assert.strictEqual(store.snapshot().tempHigh, true);

        sensor.report(-11.5);
        assert.strictEqual(store.snapshot().tempHigh, false);
        assert.strictEqual(sensor.getTemperature(), -11.5);
    });

    it('should go offline after the timeout and back online on a report', () => {
        const { clock, store, logger, sensor } = freezerSetup();

        clock.advance(20 * MINUTE);
        assert.strictEqual(sensor.checkOnline(), true);

        clock.advance(1 * MINUTE);
        assert.strictEqual(sensor.checkOnline(), false);
        assert.strictEqual(store.snapshot().sensorOnline, false);
        assert.deepStrictEqual(logger.messages('warn'), ['[Freezer Sensor] Offline (no report for 21 min)']);

        sensor.report(-18);
        assert.strictEqual(store.snapshot().sensorOnline, true);
        assert.strictEqual(sensor.checkOnline(), true);
    });
});

describe('ContactSensor', () => {
    it('should trigger the alarm and push events on change only', () => {
        const sink = new CollectingSink();
        const security = createSecurityContext([]);
        const clock = new FixedClock(new Date('2021-01-01T23:30:00Z'));
        const sensor = new ContactSensor({ name: 'Back Door', sink, logger: new MemoryLogger(), security, clock });

        assert.strictEqual(sensor.zoneStatus(0x21), 'open');
        assert.strictEqual(sensor.zoneStatus(0x01), 'open');
        assert.strictEqual(security.snapshot().trigger, true);

        assert.strictEqual(sensor.zoneStatus(0x20), 'closed');
        assert.deepStrictEqual(sink.events, [
            { kind: 'ALARM_SENSOR_OPEN', source: 'Back Door', payload: { device: 'Back Door' }, at: Date.parse('2021-01-01T23:30:00Z') },
            { kind: 'ALARM_SENSOR_CLOSED', source: 'Back Door', payload: { device: 'Back Door' }, at: Date.parse('2021-01-01T23:30:00Z') },
        ]);
    });

    it('should only track state for sensors outside the alarm', () => {
        const sink = new CollectingSink();
        const sensor = new ContactSensor({ name: 'Kitchen Window', sink, logger: new MemoryLogger() });

        sensor.zoneStatus(1);
        assert.strictEqual(sensor.getState(), 'open');
        assert.deepStrictEqual(sink.events, []);
    });
});

describe('ButtonHandler', () => {
    function setup() {
        const sink = new CollectingSink();
        const logger = new MemoryLogger();
        const freezer = createFreezerContext([]);
        const security = createSecurityContext([]);
        const button = new ButtonHandler({ name: 'Button', sink, logger, freezer, security });
        return { sink, logger, freezer, security, button };
    }

    it('should classify click codes', () => {
        assert.strictEqual(classifyClick('04'), 'short');
        assert.strictEqual(classifyClick('08'), 'double');
        assert.strictEqual(classifyClick('10'), 'long');
        assert.strictEqual(classifyClick('02'), null);
    });

    it('should disable the freezer alarm and toggle the security override on a long press', () => {
        const { sink, freezer, security, button } = setup();

        button.click('10');
        assert.strictEqual(freezer.snapshot().disabled, true);
        assert.strictEqual(security.snapshot().deactivated, true);

        button.click('10');
        assert.strictEqual(security.snapshot().deactivated, false);
        assert.deepStrictEqual(sink.kinds(), ['BUTTON_LONG_PRESS', 'BUTTON_LONG_PRESS']);
    });

    it('should carry the latest freezer reading on a long press', () => {
        const sink = new CollectingSink();
        const logger = new MemoryLogger();
        let reading: number | null = null;
        const button = new ButtonHandler({
            name: 'Button',
            sink,
            logger,
            freezer: createFreezerContext([]),
            security: createSecurityContext([]),
            temperature: () => reading,
        });

        button.click('10');
        reading = -17;
        button.click('10');
        button.click('04');

        assert.deepStrictEqual(sink.events.map((e) => e.payload), [
            { device: 'Button', temperatureC: null },
            { device: 'Button', temperatureC: -17 },
            { device: 'Button' },
        ]);
    });

    it('should only push an event for short and double presses', () => {
        const { sink, freezer, security, button } = setup();
        button.click('04');
        button.click('08');

        assert.deepStrictEqual(sink.kinds(), ['BUTTON_SHORT_PRESS', 'BUTTON_DOUBLE_PRESS']);
        assert.strictEqual(freezer.snapshot().disabled, false);
        assert.strictEqual(security.snapshot().deactivated, false);
    });

    it('should ignore unknown codes with a warning', () => {
        const { sink, logger, button } = setup();
        assert.strictEqual(button.click('ff'), null);
        assert.deepStrictEqual(sink.events, []);
        assert.deepStrictEqual(logger.messages('warn'), ['[Button] Unknown click code "ff" ignored']);
    });
});
