import { EventEmitter } from 'events';
import WebSocket from 'ws';
import type { AxiosInstance } from 'axios';
import { DEFAULT_CLIENT_NAME, LavalinkBackend, parseFrame } from '../lavalinkBackend';
import { NetworkError } from '../../errors';
import type { BackendEvent } from '../../../types/events';

class FakeSocket extends EventEmitter {
  readyState: number = WebSocket.CONNECTING;
  readonly sent: unknown[] = [];
  sendError: Error | undefined;

  constructor(
    readonly url: string,
    readonly options: WebSocket.ClientOptions
  ) {
    super();
  }

  send(data: string, cb?: (error?: Error) => void): void {
    this.sent.push(JSON.parse(data));
    cb?.(this.sendError);
  }

  close(): void {
    this.readyState = WebSocket.CLOSED;
  }

  open(): void {
    this.readyState = WebSocket.OPEN;
    this.emit('open');
  }

  receive(frame: unknown): void {
    this.emit('message', Buffer.from(JSON.stringify(frame)));
  }

  drop(): void {
    this.readyState = WebSocket.CLOSED;
    this.emit('close', 1006, Buffer.from(''));
  }
}

describe('LavalinkBackend', () => {
  let sockets: FakeSocket[];
  let get: jest.Mock;
  let backend: LavalinkBackend;
  let events: BackendEvent[];

  const lastSocket = (): FakeSocket => {
    const socket = sockets[sockets.length - 1];
    if (!socket) throw new Error('no socket opened');
    return socket;
  };

  const connect = async (): Promise<FakeSocket> => {
    const connecting = backend.connect();
    const socket = lastSocket();
    socket.open();
    await connecting;
    return socket;
  };

  beforeEach(() => {
    sockets = [];
    get = jest.fn();
    backend = new LavalinkBackend({
      host: '127.0.0.1',
      port: 2333,
      password: 'test-secret',
      userId: '42',
      reconnectDelayMs: 10,
      reconnectMaxTries: 2,
      socketFactory: (url, options) => {
        const socket = new FakeSocket(url, options);
        sockets.push(socket);
        return socket as unknown as WebSocket;
      },
      http: { get } as unknown as AxiosInstance,
    });
    events = [];
    backend.subscribe((event) => events.push(event));
  });

  afterEach(async () => {
    await backend.close();
    jest.useRealTimers();
  });

  describe('socket', () => {
    it('connects with the node headers', async () => {
      const socket = await connect();

      expect(socket.url).toBe('ws://127.0.0.1:2333');
      expect(socket.options.headers).toEqual({
        Authorization: 'test-secret',
        'User-Id': '42',
        'Num-Shards': '1',
        'Client-Name': DEFAULT_CLIENT_NAME,
      });
      expect(backend.connected).toBe(true);
    });

    it('rejects connect when the first attempt fails', async () => {
      const connecting = backend.connect();
      lastSocket().emit('error', new Error('connect ECONNREFUSED 127.0.0.1:2333'));

      await expect(connecting).rejects.toThrow('Could not connect to ws://127.0.0.1:2333');
      await expect(connecting).rejects.toHaveProperty('code', 'NETWORK_ERROR');
    });

    it('reconnects after an unexpected close, up to the retry limit', async () => {
      jest.useFakeTimers();
      const first = await connect();

      first.drop();
      jest.advanceTimersByTime(10);
      expect(sockets).toHaveLength(2);

      lastSocket().drop();
      jest.advanceTimersByTime(10);
      expect(sockets).toHaveLength(3);

      lastSocket().drop();
      jest.advanceTimersByTime(10);
      expect(sockets).toHaveLength(3);
    });

    it('does not reconnect after close', async () => {
      jest.useFakeTimers();
      const socket = await connect();

      await backend.close();
      socket.drop();
      jest.advanceTimersByTime(10);

      expect(sockets).toHaveLength(1);
    });
  });

  describe('commands', () => {
    it('sends play with string offsets', async () => {
      const socket = await connect();

      await backend.play('1', { track: 'abc' }, { startTime: 1000, endTime: 5000, noReplace: true });

      expect(socket.sent).toEqual([
        {
          op: 'play',
          guildId: '1',
          track: 'abc',
          startTime: '1000',
          endTime: '5000',
          noReplace: true,
        },
      ]);
    });

    it('omits the end time when absent', async () => {
      const socket = await connect();

      await backend.play('1', { track: 'abc' }, { startTime: 0, noReplace: false });

      expect(socket.sent).toEqual([
        { op: 'play', guildId: '1', track: 'abc', startTime: '0', noReplace: false },
      ]);
    });

    it('sends the voice update for a session', async () => {
      const socket = await connect();

      await backend.createSession({
        guildId: '1',
        channelId: '5',
        endpoint: 'voice.example.test',
        token: 'voice-token',
        sessionId: 'sess-1',
      });

      expect(socket.sent).toEqual([
        {
          op: 'voiceUpdate',
          guildId: '1',
          sessionId: 'sess-1',
          event: { token: 'voice-token', guild_id: '1', endpoint: 'voice.example.test' },
        },
      ]);
    });

    it('sends player controls', async () => {
      const socket = await connect();

      await backend.stop('1');
      await backend.setPause('1', true);
      await backend.seek('1', 4000);
      await backend.setVolume('1', 150);
      await backend.equalize('1', [{ band: 0, gain: 0.25 }]);

      expect(socket.sent).toEqual([
        { op: 'stop', guildId: '1' },
        { op: 'pause', guildId: '1', pause: true },
        { op: 'seek', guildId: '1', position: 4000 },
        { op: 'volume', guildId: '1', volume: 150 },
        { op: 'equalizer', guildId: '1', bands: [{ band: 0, gain: 0.25 }] },
      ]);
    });

    it('emits playerDestroyed after destroy', async () => {
      const socket = await connect();

      await backend.destroy('1');

      expect(socket.sent).toEqual([{ op: 'destroy', guildId: '1' }]);
      expect(events).toEqual([{ type: 'playerDestroyed', guildId: '1', cleanup: true }]);
    });

    it('rejects when the socket is not open', async () => {
      await expect(backend.stop('1')).rejects.toBeInstanceOf(NetworkError);
    });

    it('rejects when the send fails', async () => {
      const socket = await connect();
      socket.sendError = new Error('write EPIPE');

      const stopping = backend.stop('1');

      await expect(stopping).rejects.toThrow('Failed to send stop');
      await expect(stopping).rejects.toHaveProperty('cause', socket.sendError);
    });
  });

  describe('incoming frames', () => {
    it('turns node events into backend events', async () => {
      const socket = await connect();

      socket.receive({
        op: 'event',
        type: 'TrackEndEvent',
        guildId: '1',
        track: 'abc',
        reason: 'FINISHED',
      });

      expect(events).toEqual([
        { type: 'trackFinish', guildId: '1', track: 'abc', reason: 'FINISHED' },
      ]);
    });

    it('drops malformed frames', async () => {
      const socket = await connect();

      socket.emit('message', Buffer.from('not json'));
      socket.receive({ op: 'event', type: 'TrackEndEvent', guildId: '1' });
      socket.receive({ op: 'ready' });

      expect(events).toEqual([]);
    });

    it('stops delivering after unsubscribe', async () => {
      const socket = await connect();
      const listener = jest.fn();
      const unsubscribe = backend.subscribe(listener);
      unsubscribe();

      socket.receive({ op: 'event', type: 'TrackStartEvent', guildId: '1', track: 'abc' });

      expect(listener).not.toHaveBeenCalled();
      expect(events).toHaveLength(1);
    });
  });

  describe('REST', () => {
    it('loads tracks by identifier', async () => {
      get.mockResolvedValueOnce({
        data: {
          loadType: 'SEARCH_RESULT',
          playlistInfo: {},
          tracks: [{ track: 'abc' }],
        },
      });

      const result = await backend.loadTracks('ytsearch:rain sounds');

      expect(get).toHaveBeenCalledWith('/loadtracks', {
        params: { identifier: 'ytsearch:rain sounds' },
      });
      expect(result).toEqual({ loadType: 'SEARCH_RESULT', playlistInfo: {}, tracks: [{ track: 'abc' }] });
    });

    it('wraps transport failures', async () => {
      get.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

      const loading = backend.loadTracks('abc');

      await expect(loading).rejects.toBeInstanceOf(NetworkError);
      await expect(loading).rejects.toThrow('Request to /loadtracks failed: connect ECONNREFUSED');
    });

    it('decodes a track', async () => {
      const info = {
        identifier: 'id-1',
        isSeekable: true,
        author: 'Someone',
        length: 180000,
        isStream: false,
        position: 0,
        title: 'Some Title',
        uri: 'https://media.example.test/id-1',
      };
      get.mockResolvedValueOnce({ data: info });

      await expect(backend.decodeTrack('abc')).resolves.toEqual(info);
      expect(get).toHaveBeenCalledWith('/decodetrack', { params: { track: 'abc' } });
    });

    it('rejects a malformed decode result', async () => {
      get.mockResolvedValueOnce({ data: { title: 'only a title' } });

      await expect(backend.decodeTrack('abc')).rejects.toThrow('Malformed decoded track');
    });
  });
});

describe('parseFrame', () => {
  it('maps stats and drops a null frameStats', () => {
    expect(
      parseFrame({
        op: 'stats',
        players: 2,
        playingPlayers: 1,
        uptime: 5000,
        memory: { free: 1, used: 2, allocated: 3, reservable: 4 },
        cpu: { cores: 4, systemLoad: 0.5, lavalinkLoad: 0.1 },
        frameStats: null,
      })
    ).toEqual({
      type: 'stats',
      players: 2,
      playingPlayers: 1,
      uptime: 5000,
      memory: { free: 1, used: 2, allocated: 3, reservable: 4 },
      cpu: { cores: 4, systemLoad: 0.5, lavalinkLoad: 0.1 },
    });
  });

  it('defaults the position of an idle player', () => {
    expect(parseFrame({ op: 'playerUpdate', guildId: '1', state: { time: 99 } })).toEqual({
      type: 'playerUpdate',
      guildId: '1',
      state: { time: 99, position: 0 },
    });
  });

  it('fills an exception from the error string', () => {
    expect(
      parseFrame({
        op: 'event',
        type: 'TrackExceptionEvent',
        guildId: '1',
        track: 'abc',
        error: 'Video unavailable',
      })
    ).toEqual({
      type: 'trackException',
      guildId: '1',
      track: 'abc',
      error: 'Video unavailable',
      exception: { message: 'Video unavailable', severity: 'UNKNOWN', cause: '' },
    });
  });

  it('maps stuck and closed events', () => {
    expect(
      parseFrame({ op: 'event', type: 'TrackStuckEvent', guildId: '1', track: 'abc', thresholdMs: 10000 })
    ).toEqual({ type: 'trackStuck', guildId: '1', track: 'abc', thresholdMs: 10000 });
    expect(
      parseFrame({
        op: 'event',
        type: 'WebSocketClosedEvent',
        guildId: '1',
        code: 4014,
        reason: 'Disconnected',
        byRemote: true,
      })
    ).toEqual({ type: 'websocketClosed', guildId: '1', code: 4014, reason: 'Disconnected', byRemote: true });
  });

  it('ignores ops without events', () => {
    expect(parseFrame({ op: 'ready', resumed: false })).toBeNull();
  });
});
