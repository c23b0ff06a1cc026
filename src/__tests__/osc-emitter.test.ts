import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import * as dgram from 'dgram';
import { once } from 'events';
import * as osc from 'osc';
import pino from 'pino';
import { TransportUnavailableError } from '../errors';
import { OscEmitter, OscOutputConfig, OscTransport, resolveAddress } from '../osc/emitter';
import { UdpOscTransport } from '../osc/udp-transport';

interface SentMessage {
  host: string;
  port: number;
  address: string;
  args: osc.OSCArgument[];
}

class RecordingTransport implements OscTransport {
  sent: SentMessage[] = [];

  async send(host: string, port: number, address: string, args: osc.OSCArgument[]): Promise<void> {
    this.sent.push({ host, port, address, args });
  }
}

class FailingTransport implements OscTransport {
  async send(): Promise<void> {
    throw new Error('ECONNREFUSED');
  }
}

const defaultConfig: OscOutputConfig = {
  host: '127.0.0.1',
  port: 9000,
  addressTemplate: '/avatar/parameters/{name}',
  parameters: {
    heartRate: { name: 'heartbeat_value' },
    normalized: { name: 'heartbeat_waittime' },
  },
};

describe('OscEmitter', () => {

  // --- Address templating ---

  describe('addresses', () => {
    it('should fill the template with the parameter name', () => {
      assert.equal(resolveAddress('/avatar/parameters/{name}', { name: 'heartbeat_value' }), '/avatar/parameters/heartbeat_value');
    });

    it('should prefer an explicit address over the template', () => {
      assert.equal(resolveAddress('/avatar/parameters/{name}', { name: 'hr', address: '/custom/hr' }), '/custom/hr');
    });

    it('should resolve both parameters at construction', () => {
      const emitter = new OscEmitter({ ...defaultConfig, addressTemplate: '/hr/{name}/value' }, new RecordingTransport());
      assert.equal(emitter.addressOf('heartRate'), '/hr/heartbeat_value/value');
      assert.equal(emitter.addressOf('normalized'), '/hr/heartbeat_waittime/value');
    });
  });

  // --- Typed arguments ---

  describe('publish', () => {
    it('should send the raw bpm as an int', async () => {
      const transport = new RecordingTransport();
      const emitter = new OscEmitter(defaultConfig, transport);

      await emitter.publish('heartRate', 75);

      assert.deepEqual(transport.sent, [{
        host: '127.0.0.1',
        port: 9000,
        address: '/avatar/parameters/heartbeat_value',
        args: [{ type: 'i', value: 75 }],
      }]);
    });

    it('should round a fractional bpm', async () => {
      const transport = new RecordingTransport();
      await new OscEmitter(defaultConfig, transport).publish('heartRate', 74.6);
      assert.deepEqual(transport.sent[0].args, [{ type: 'i', value: 75 }]);
    });

    it('should send the normalized value as a float', async () => {
      const transport = new RecordingTransport();
      await new OscEmitter(defaultConfig, transport).publish('normalized', 0.25);
      assert.equal(transport.sent[0].address, '/avatar/parameters/heartbeat_waittime');
      assert.deepEqual(transport.sent[0].args, [{ type: 'f', value: 0.25 }]);
    });

    it('should report transport failures as TransportUnavailableError', async () => {
      const emitter = new OscEmitter(defaultConfig, new FailingTransport());
      await assert.rejects(
        emitter.publish('heartRate', 75),
        (err: unknown) => err instanceof TransportUnavailableError
          && err.message === 'OSC send to 127.0.0.1:9000/avatar/parameters/heartbeat_value failed: ECONNREFUSED',
      );
    });
  });
});

describe('UdpOscTransport', () => {
  const silent = pino({ level: 'silent' });
  const receiver = dgram.createSocket('udp4');
  let receiverPort = 0;

  before(async () => {
    receiver.bind(0, '127.0.0.1');
    await once(receiver, 'listening');
    receiverPort = receiver.address().port;
  });

  after(() => {
    receiver.close();
  });

  it('should reject sends before open', async () => {
    const transport = new UdpOscTransport(silent);
    await assert.rejects(
      transport.send('127.0.0.1', 9000, '/avatar/parameters/heartbeat_value', []),
      TransportUnavailableError,
    );
  });

  it('should deliver int and float parameters over UDP', async () => {
    const port = receiverPort;
    const transport = new UdpOscTransport(silent);
    await transport.open();
    const emitter = new OscEmitter({ ...defaultConfig, port }, transport);

    try {
      const first = once(receiver, 'message');
      await emitter.publish('heartRate', 75);
      const [bpmPacket] = await first;
      const bpm = osc.readMessage(bpmPacket, { metadata: true });
      assert.equal(bpm.address, '/avatar/parameters/heartbeat_value');
      assert.deepEqual(bpm.args, [{ type: 'i', value: 75 }]);

      const second = once(receiver, 'message');
      await emitter.publish('normalized', 0.25);
      const [valuePacket] = await second;
      const value = osc.readMessage(valuePacket, { metadata: true });
      assert.equal(value.address, '/avatar/parameters/heartbeat_waittime');
      assert.deepEqual(value.args, [{ type: 'f', value: 0.25 }]);
    } finally {
      transport.close();
    }
  });

  it('should reject sends after close', async () => {
    const transport = new UdpOscTransport(silent);
    await transport.open();
    assert.equal(transport.isOpen(), true);
    transport.close();
    assert.equal(transport.isOpen(), false);
    await assert.rejects(transport.send('127.0.0.1', 9000, '/x', []), TransportUnavailableError);
  });
});
