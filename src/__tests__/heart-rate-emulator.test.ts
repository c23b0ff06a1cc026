import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { AbortError, ConnectError } from '../errors';
import { HeartRateEmulator, defaultBpm } from '../emulators/heart-rate-emulator';
import { createNormalizer } from '../heart-rate/normalizer';
import { ConnectionSession } from '../session/connection-session';
import { RecordingPublisher, silentLogger } from './helpers/fake-adapter';

const scanOptions = { serviceUuid: '180d', timeoutMs: 20 };

describe('HeartRateEmulator', () => {

  describe('scan', () => {
    it('should find the emulated device by name', async () => {
      const emulator = new HeartRateEmulator({ logger: silentLogger });
      const device = await emulator.scan({ ...scanOptions, namePattern: 'hrm-emu' });
      assert.equal(device?.name, 'HRM-Emulator');
      assert.equal(device?.id, 'emulated-hrm-0001');
    });

    it('should time out for a pattern that does not match', async () => {
      const emulator = new HeartRateEmulator({ logger: silentLogger });
      assert.equal(await emulator.scan({ ...scanOptions, namePattern: '^Polar' }), null);
    });

    it('should time out for a different service', async () => {
      const emulator = new HeartRateEmulator({ logger: silentLogger });
      assert.equal(await emulator.scan({ ...scanOptions, serviceUuid: '180f' }), null);
    });

    it('should reject when aborted', async () => {
      const emulator = new HeartRateEmulator({ logger: silentLogger });
      const controller = new AbortController();
      const scanning = emulator.scan({ serviceUuid: '180d', timeoutMs: 5000, namePattern: '^Polar', signal: controller.signal });
      controller.abort();
      await assert.rejects(scanning, AbortError);
    });
  });

  it('should refuse an unknown characteristic', async () => {
    const emulator = new HeartRateEmulator({ logger: silentLogger });
    const link = await emulator.connect(emulator.device, { timeoutMs: 100 });
    await assert.rejects(emulator.subscribe(link, '180d', '2a38', { timeoutMs: 100 }), ConnectError);
    await emulator.disconnect(link);
    assert.equal(emulator.openLinks, 0);
  });

  it('should stream readings into a session until the simulated link loss', async () => {
    const emulator = new HeartRateEmulator({
      intervalMs: 5,
      bpm: () => 72,
      disconnectAfterFrames: 3,
      logger: silentLogger,
    });
    const publisher = new RecordingPublisher();
    const session = new ConnectionSession({
      device: { serviceUuid: '180d', characteristicUuid: '2a37' },
      connection: { scanTimeoutMs: 100, connectTimeoutMs: 100, maxConsecutiveMalformed: 3 },
    }, {
      adapter: emulator,
      emitter: publisher,
      normalizer: createNormalizer(),
      logger: silentLogger,
    });

    const outcome = await session.run();

    assert.deepEqual(outcome.state, {
      kind: 'disconnected',
      reason: { cause: 'adapter-disconnect', detail: 'emulated link loss' },
    });
    assert.equal(outcome.stats.readings, 3);
    assert.equal(publisher.published.length, 6);
    assert.deepEqual(publisher.published.slice(0, 2), [['heartRate', 72], ['normalized', 32 / 140]]);
    assert.equal(emulator.framesSent, 3);
    assert.equal(emulator.connectCount, 1);
    assert.equal(emulator.openLinks, 0);
  });

  it('should oscillate between 60 and 120 bpm by default', () => {
    assert.equal(defaultBpm(0), 90);
    assert.equal(defaultBpm(15), 120);
    assert.equal(defaultBpm(45), 60);
  });
});
