import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { ConfigLoader, resolveConfig, stripJsonComments } from './config';
import { ConfigError } from './errors';

describe('ConfigLoader', () => {
    let tmpDir: string;

    beforeEach(async () => {
        tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'home-sentinel-config-'));
    });

    afterEach(async () => {
        await fs.remove(tmpDir);
    });

    it('should load the shipped template', async () => {
        await fs.copy(
            path.join(__dirname, '..', '..', 'templates', 'monitor.config.jsonc'),
            path.join(tmpDir, 'monitor.config.jsonc')
        );

        const config = await new ConfigLoader(tmpDir).load();
        assert.strictEqual(config.timezone, 'Europe/London');
        assert.deepStrictEqual(config.schedules.securityArmed, [{ start: 23 * 60, end: 5 * 60 }]);
        assert.deepStrictEqual(config.devices.intrusionSensors, ['Back Door']);
        assert.strictEqual(config.configPath, path.join(tmpDir, 'monitor.config.jsonc'));
    });

    it('should merge a partial file over the defaults', async () => {
        await fs.writeFile(
            path.join(tmpDir, 'monitor.config.json'),
            JSON.stringify({ stations: { from: 'GLQ' }, queue: { capacity: 8 } })
        );

        const config = await new ConfigLoader(tmpDir).load();
        assert.deepStrictEqual(config.stations, { from: 'GLQ', to: 'GLQ' });
        assert.strictEqual(config.queue.capacity, 8);
        assert.strictEqual(config.freezer.offlineTimeoutMinutes, 21);
        assert.strictEqual(config.intervals.securityMs, 100);
    });

    it('should load an explicit path', async () => {
        await fs.writeFile(path.join(tmpDir, 'other.json'), JSON.stringify({ timezone: 'UTC' }));
        const loader = new ConfigLoader(tmpDir, 'other.json');

        assert.strictEqual(loader.getConfigPath(), path.join(tmpDir, 'other.json'));
        assert.strictEqual((await loader.load()).timezone, 'UTC');
    });

    it('should fail with a hint when no file exists', async () => {
        await assert.rejects(
            () => new ConfigLoader(tmpDir).load(),
            (err: unknown) => err instanceof ConfigError && err.message.startsWith('Config file not found:')
        );
    });

    it('should reject malformed JSON', async () => {
        await fs.writeFile(path.join(tmpDir, 'monitor.config.json'), '{ "timezone": ');
        await assert.rejects(() => new ConfigLoader(tmpDir).load(), /Invalid config JSON/);
    });
});

describe('resolveConfig', () => {
    it('should report every schema issue with its path', () => {
        assert.throws(
            () => resolveConfig({ schedules: { securityArmed: [['2300', '05:00']] }, queue: { capacity: 0 } }),
            (err: unknown) =>
                err instanceof ConfigError &&
                err.message === 'Invalid configuration:\n  schedules.securityArmed.0.0: expected HH:MM\n  queue.capacity: Number must be greater than 0'
        );
    });

    it('should reject out-of-range times', () => {
        assert.throws(
            () => resolveConfig({ schedules: { trainDelays: [['05:30', '24:00']] } }),
            { name: 'ConfigError', message: 'Invalid configuration: Invalid time "24:00": out of range' }
        );
    });

    it('should reject an unknown time zone', () => {
        assert.throws(() => resolveConfig({ timezone: 'Nowhere/Special' }), /Unknown time zone "Nowhere\/Special"/);
    });

    it('should use defaults for an empty object', () => {
        const config = resolveConfig({});
        assert.strictEqual(config.configPath, null);
        assert.strictEqual(config.stateDir, '.home-sentinel');
        assert.deepStrictEqual(config.schedules.trainDelays, [{ start: 330, end: 420 }]);
    });
});

describe('stripJsonComments', () => {
    it('should drop whole-line comments and keep URLs', () => {
        const text = '{\n    // zone\n    "baseUrl": "https://example.test"\n}';
        assert.deepStrictEqual(JSON.parse(stripJsonComments(text)), { baseUrl: 'https://example.test' });
    });

    it('should drop trailing and block comments outside strings', () => {
        const text = '{\n    "timezone": "UTC", // zone\n    /* route */ "from": "a\\"//b"\n}';
        assert.strictEqual(stripJsonComments(text), '{\n    "timezone": "UTC", \n     "from": "a\\"//b"\n}');
        assert.deepStrictEqual(JSON.parse(stripJsonComments(text)), { timezone: 'UTC', from: 'a"//b' });
    });
});
