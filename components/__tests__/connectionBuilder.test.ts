import { EventEmitter } from 'events';
import WebSocket from 'ws';
import { ConnectionBuilder } from '../builders/connectionBuilder';
import { InvalidArgumentError, NetworkError } from '../../utils/errors';
import type { AppConfig } from '../../utils/config';
import type { VoiceEventSink, VoiceGateway } from '../../types/services';
import type { VoiceCoordinator } from '../../utils/voice/voiceCoordinator';

class FakeSocket extends EventEmitter {
  readyState: number = WebSocket.CONNECTING;

  constructor(
    readonly url: string,
    failWith?: Error
  ) {
    super();
    setImmediate(() => {
      if (failWith) {
        this.emit('error', failWith);
        return;
      }
      this.readyState = WebSocket.OPEN;
      this.emit('open');
    });
  }

  send(_data: string, cb?: (error?: Error) => void): void {
    cb?.();
  }

  close(): void {
    this.readyState = WebSocket.CLOSED;
  }
}

const config: AppConfig = {
  token: 'test-secret',
  botId: '42',
  lavalinkHost: 'node.example.test',
  lavalinkPort: 2444,
  lavalinkPassword: 'test-password',
  lavalinkSsl: true,
  shardCount: 2,
  gatewayStartDelayMs: 0,
  connectionEventLimit: 5,
};

const createGateway = (): jest.Mocked<VoiceGateway> => ({
  start: jest.fn<Promise<void>, [VoiceEventSink]>().mockResolvedValue(undefined),
  updateVoiceState: jest.fn().mockResolvedValue(undefined),
  stop: jest.fn(),
});

describe('ConnectionBuilder', () => {
  it('starts from the local node defaults', () => {
    expect(ConnectionBuilder.create('42', 'test-secret').current).toEqual({
      host: '127.0.0.1',
      port: 2333,
      password: 'youshallnotpass',
      isSsl: false,
      shardCount: 1,
      botId: '42',
      botToken: 'test-secret',
      startGateway: true,
      gatewayStartDelayMs: 0,
      connectionEventLimit: 10,
    });
  });

  describe('setAddr', () => {
    it.each([
      ['node.example.test:2444', 'node.example.test', 2444],
      ['10.0.0.5:80', '10.0.0.5', 80],
      ['[::1]:2333', '::1', 2333],
    ])('parses %s', (addr, host, port) => {
      const settings = ConnectionBuilder.create('42', 'test-secret').setAddr(addr).current;

      expect(settings.host).toBe(host);
      expect(settings.port).toBe(port);
    });

    it.each(['node.example.test', ':2333', 'node:0', 'node:99999', 'ws://node:2333'])(
      'rejects %s',
      (addr) => {
        expect(() => ConnectionBuilder.create('42', 'test-secret').setAddr(addr)).toThrow(
          `Invalid address: ${addr}`
        );
      }
    );
  });

  it('validates numeric settings', () => {
    const builder = ConnectionBuilder.create('42', 'test-secret');

    expect(() => builder.setPort(0)).toThrow('Port must be between 1 and 65535, got 0');
    expect(() => builder.setShardCount(0)).toThrow(InvalidArgumentError);
    expect(() => builder.setGatewayStartDelay(-1)).toThrow(InvalidArgumentError);
    expect(() => builder.setConnectionEventLimit(1.5)).toThrow(InvalidArgumentError);
    expect(builder.current.port).toBe(2333);
  });

  describe('fromConfig', () => {
    it('copies the configuration', () => {
      expect(ConnectionBuilder.fromConfig(config).current).toEqual({
        host: 'node.example.test',
        port: 2444,
        password: 'test-password',
        isSsl: true,
        shardCount: 2,
        botId: '42',
        botToken: 'test-secret',
        startGateway: true,
        gatewayStartDelayMs: 0,
        connectionEventLimit: 5,
      });
    });

    it('requires the bot credentials', () => {
      expect(() => ConnectionBuilder.fromConfig({ ...config, token: undefined })).toThrow(
        'DISCORD_CLIENT_ID and DISCORD_BOT_TOKEN are required'
      );
    });
  });

  it('keeps settings when switching the node data type', () => {
    const builder = ConnectionBuilder.create('42', 'test-secret')
      .setHost('node.example.test')
      .setIsSsl(true)
      .withNodeData(() => ({ plays: 0 }));

    expect(builder.current.host).toBe('node.example.test');
    expect(builder.current.isSsl).toBe(true);
  });

  it('maps settings to backend options', () => {
    const options = ConnectionBuilder.fromConfig(config).backendOptions();

    expect(options).toEqual({
      host: 'node.example.test',
      port: 2444,
      password: 'test-password',
      ssl: true,
      userId: '42',
      shardCount: 2,
    });
  });

  describe('build', () => {
    let coordinator: VoiceCoordinator<{ plays: number }> | undefined;

    afterEach(async () => {
      await coordinator?.close();
      coordinator = undefined;
    });

    it('connects and starts the gateway', async () => {
      const urls: string[] = [];
      const gateway = createGateway();

      coordinator = await ConnectionBuilder.fromConfig(config)
        .withNodeData(() => ({ plays: 0 }))
        .build({
          gateway,
          socketFactory: (url) => {
            urls.push(url);
            return new FakeSocket(url) as unknown as WebSocket;
          },
        });

      expect(urls).toEqual(['wss://node.example.test:2444']);
      expect(gateway.start).toHaveBeenCalledWith(coordinator);
    });

    it('leaves the gateway alone when disabled', async () => {
      const gateway = createGateway();

      coordinator = await ConnectionBuilder.create('42', 'test-secret')
        .setStartGateway(false)
        .withNodeData(() => ({ plays: 0 }))
        .build({
          gateway,
          socketFactory: (url) => new FakeSocket(url) as unknown as WebSocket,
        });

      expect(gateway.start).not.toHaveBeenCalled();
    });

    it('rejects when the node cannot be reached', async () => {
      const building = ConnectionBuilder.create('42', 'test-secret').build({
        socketFactory: (url) =>
          new FakeSocket(url, new Error('connect ECONNREFUSED')) as unknown as WebSocket,
      });

      await expect(building).rejects.toBeInstanceOf(NetworkError);
    });
  });
});
