/**
 * Lavalink Backend - AudioBackend over a Lavalink v3 node.
 *
 * Player commands go over the node's websocket as JSON ops, track lookups go
 * over its REST API. Incoming frames are validated and turned into
 * BackendEvents for subscribers.
 */
import WebSocket from 'ws';
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { createLogger } from '../logger';
import { NetworkError, formatError, logErrorWithStack } from '../errors';
import type { AudioBackend } from '../../types/services';
import type { BackendEvent, BackendEventListener } from '../../types/events';
import type {
  Band,
  ConnectionInfo,
  PlayOptions,
  Snowflake,
  Track,
  TrackInfo,
  Tracks,
} from '../../types/voice';
import { NODE_RECONNECT_DELAY_MS, NODE_RECONNECT_MAX_TRIES } from './constants';

const log = createLogger('LAVALINK');

export const DEFAULT_CLIENT_NAME = 'guild-voice-coordinator';

export type SocketFactory = (url: string, options: WebSocket.ClientOptions) => WebSocket;

export interface LavalinkBackendOptions {
  host: string;
  port: number;
  password: string;
  ssl?: boolean;
  /** Bot user id, sent as User-Id */
  userId: Snowflake;
  shardCount?: number;
  clientName?: string;
  reconnectDelayMs?: number;
  reconnectMaxTries?: number;
  socketFactory?: SocketFactory;
  /** REST client, built from host/port/password when omitted */
  http?: AxiosInstance;
}

const trackInfoSchema = z.object({
  identifier: z.string(),
  isSeekable: z.boolean(),
  author: z.string(),
  length: z.number(),
  isStream: z.boolean(),
  position: z.number(),
  title: z.string(),
  uri: z.string(),
});

const tracksSchema = z.object({
  loadType: z.string(),
  playlistInfo: z
    .object({
      name: z.string().optional(),
      selectedTrack: z.number().optional(),
    })
    .optional(),
  tracks: z.array(
    z.object({
      track: z.string(),
      info: trackInfoSchema.optional(),
    })
  ),
});

const statsFrameSchema = z.object({
  op: z.literal('stats'),
  players: z.number(),
  playingPlayers: z.number(),
  uptime: z.number(),
  memory: z.object({
    free: z.number(),
    used: z.number(),
    allocated: z.number(),
    reservable: z.number(),
  }),
  cpu: z.object({
    cores: z.number(),
    systemLoad: z.number(),
    lavalinkLoad: z.number(),
  }),
  frameStats: z
    .object({
      sent: z.number(),
      nulled: z.number(),
      deficit: z.number(),
    })
    .nullish(),
});

const playerUpdateFrameSchema = z.object({
  op: z.literal('playerUpdate'),
  guildId: z.string(),
  state: z.object({
    time: z.number(),
    // Absent while nothing is playing
    position: z.number().default(0),
  }),
});

const nodeEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('TrackStartEvent'),
    guildId: z.string(),
    track: z.string(),
  }),
  z.object({
    type: z.literal('TrackEndEvent'),
    guildId: z.string(),
    track: z.string(),
    reason: z.string(),
  }),
  z.object({
    type: z.literal('TrackExceptionEvent'),
    guildId: z.string(),
    track: z.string(),
    error: z.string().optional(),
    exception: z
      .object({
        message: z.string().nullish(),
        severity: z.string(),
        cause: z.string().nullish(),
      })
      .optional(),
  }),
  z.object({
    type: z.literal('TrackStuckEvent'),
    guildId: z.string(),
    track: z.string(),
    thresholdMs: z.number(),
  }),
  z.object({
    type: z.literal('WebSocketClosedEvent'),
    guildId: z.string(),
    code: z.number(),
    reason: z.string(),
    byRemote: z.boolean(),
  }),
]);

const eventFrameSchema = z.object({ op: z.literal('event') }).and(nodeEventSchema);

const opSchema = z.object({ op: z.string() });

/**
 * Map a raw node frame onto a BackendEvent. Returns null for frames that
 * carry no event, throws a ZodError for malformed ones.
 */
export function parseFrame(raw: unknown): BackendEvent | null {
  const { op } = opSchema.parse(raw);

  if (op === 'stats') {
    const { op: _op, frameStats, ...stats } = statsFrameSchema.parse(raw);
    return { type: 'stats', ...stats, ...(frameStats && { frameStats }) };
  }

  if (op === 'playerUpdate') {
    const frame = playerUpdateFrameSchema.parse(raw);
    return { type: 'playerUpdate', guildId: frame.guildId, state: frame.state };
  }

  if (op !== 'event') {
    return null;
  }

  const event = eventFrameSchema.parse(raw);
  switch (event.type) {
    case 'TrackStartEvent':
      return { type: 'trackStart', guildId: event.guildId, track: event.track };
    case 'TrackEndEvent':
      return {
        type: 'trackFinish',
        guildId: event.guildId,
        track: event.track,
        reason: event.reason,
      };
    case 'TrackExceptionEvent': {
      const message = event.exception?.message ?? event.error ?? 'Unknown error';
      return {
        type: 'trackException',
        guildId: event.guildId,
        track: event.track,
        error: event.error ?? message,
        exception: {
          message,
          severity: event.exception?.severity ?? 'UNKNOWN',
          cause: event.exception?.cause ?? '',
        },
      };
    }
    case 'TrackStuckEvent':
      return {
        type: 'trackStuck',
        guildId: event.guildId,
        track: event.track,
        thresholdMs: event.thresholdMs,
      };
    case 'WebSocketClosedEvent':
      return {
        type: 'websocketClosed',
        guildId: event.guildId,
        code: event.code,
        reason: event.reason,
        byRemote: event.byRemote,
      };
  }
}

const defaultSocketFactory: SocketFactory = (url, options) => new WebSocket(url, options);

export class LavalinkBackend implements AudioBackend {
  private socket: WebSocket | null = null;
  private readonly listeners = new Set<BackendEventListener>();
  private readonly http: AxiosInstance;
  private readonly socketFactory: SocketFactory;
  private readonly reconnectDelayMs: number;
  private readonly reconnectMaxTries: number;
  private reconnectTries = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private closing = false;

  constructor(private readonly options: LavalinkBackendOptions) {
    this.socketFactory = options.socketFactory ?? defaultSocketFactory;
    this.reconnectDelayMs = options.reconnectDelayMs ?? NODE_RECONNECT_DELAY_MS;
    this.reconnectMaxTries = options.reconnectMaxTries ?? NODE_RECONNECT_MAX_TRIES;
    this.http =
      options.http ??
      axios.create({
        baseURL: `${options.ssl ? 'https' : 'http'}://${options.host}:${options.port}`,
        headers: {
          Authorization: options.password,
        },
      });
  }

  get socketUrl(): string {
    return `${this.options.ssl ? 'wss' : 'ws'}://${this.options.host}:${this.options.port}`;
  }

  get connected(): boolean {
    return this.socket !== null && this.socket.readyState === WebSocket.OPEN;
  }

  /**
   * Open the websocket. Resolves once it is open, rejects with a NetworkError
   * when the first attempt fails.
   */
  connect(): Promise<void> {
    this.closing = false;
    return new Promise<void>((resolve, reject) => {
      let opened = false;
      const socket = this.openSocket({
        onOpen: () => {
          opened = true;
          resolve();
        },
        onError: (error) => {
          if (!opened) {
            reject(new NetworkError(`Could not connect to ${this.socketUrl}`, error));
          }
        },
      });
      this.socket = socket;
    });
  }

  subscribe(listener: BackendEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async createSession(info: ConnectionInfo): Promise<void> {
    await this.send({
      op: 'voiceUpdate',
      guildId: info.guildId,
      sessionId: info.sessionId,
      event: {
        token: info.token,
        guild_id: info.guildId,
        endpoint: info.endpoint,
      },
    });
  }

  async destroy(guildId: Snowflake): Promise<void> {
    await this.send({ op: 'destroy', guildId });
    this.emit({ type: 'playerDestroyed', guildId, cleanup: true });
  }

  async play(guildId: Snowflake, track: Track, options: PlayOptions): Promise<void> {
    await this.send({
      op: 'play',
      guildId,
      track: track.track,
      startTime: String(options.startTime),
      ...(options.endTime !== undefined && { endTime: String(options.endTime) }),
      noReplace: options.noReplace,
    });
  }

  async stop(guildId: Snowflake): Promise<void> {
    await this.send({ op: 'stop', guildId });
  }

  async setPause(guildId: Snowflake, pause: boolean): Promise<void> {
    await this.send({ op: 'pause', guildId, pause });
  }

  async seek(guildId: Snowflake, positionMs: number): Promise<void> {
    await this.send({ op: 'seek', guildId, position: positionMs });
  }

  async setVolume(guildId: Snowflake, volume: number): Promise<void> {
    await this.send({ op: 'volume', guildId, volume });
  }

  async equalize(guildId: Snowflake, bands: Band[]): Promise<void> {
    await this.send({ op: 'equalizer', guildId, bands });
  }

  async loadTracks(identifier: string): Promise<Tracks> {
    const data = await this.get('/loadtracks', { identifier });
    const parsed = tracksSchema.safeParse(data);
    if (!parsed.success) {
      throw new NetworkError(`Malformed load result for ${identifier}`, parsed.error, {
        identifier,
      });
    }
    return parsed.data;
  }

  async decodeTrack(track: string): Promise<TrackInfo> {
    const data = await this.get('/decodetrack', { track });
    const parsed = trackInfoSchema.safeParse(data);
    if (!parsed.success) {
      throw new NetworkError('Malformed decoded track', parsed.error);
    }
    return parsed.data;
  }

  async close(): Promise<void> {
    this.closing = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.listeners.clear();

    const socket = this.socket;
    this.socket = null;
    if (!socket) return;

    if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
      socket.close();
    }
    log.info(`Closed connection to ${this.socketUrl}`);
  }

  private openSocket(hooks: {
    onOpen?: () => void;
    onError?: (error: Error) => void;
  }): WebSocket {
    const socket = this.socketFactory(this.socketUrl, {
      headers: {
        Authorization: this.options.password,
        'User-Id': this.options.userId,
        'Num-Shards': String(this.options.shardCount ?? 1),
        'Client-Name': this.options.clientName ?? DEFAULT_CLIENT_NAME,
      },
    });

    socket.on('open', () => {
      this.reconnectTries = 0;
      log.info(`Connected to ${this.socketUrl}`);
      hooks.onOpen?.();
    });

    socket.on('message', (data: WebSocket.RawData) => {
      this.handleMessage(data.toString());
    });

    socket.on('error', (error: Error) => {
      log.warn(`Socket error: ${error.message}`);
      hooks.onError?.(error);
    });

    socket.on('close', (code: number, reason: Buffer) => {
      if (this.socket !== socket) return;
      log.warn(`Socket closed (${code}${reason.length > 0 ? `: ${reason.toString()}` : ''})`);
      this.scheduleReconnect();
    });

    return socket;
  }

  private scheduleReconnect(): void {
    if (this.closing) return;
    if (this.reconnectTries >= this.reconnectMaxTries) {
      log.error(`Giving up on ${this.socketUrl} after ${this.reconnectTries} reconnect attempts`);
      return;
    }

    this.reconnectTries += 1;
    log.info(
      `Reconnecting in ${this.reconnectDelayMs}ms (attempt ${this.reconnectTries}/${this.reconnectMaxTries})`
    );
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.closing) return;
      this.socket = this.openSocket({});
    }, this.reconnectDelayMs);
  }

  private handleMessage(text: string): void {
    let event: BackendEvent | null;
    try {
      event = parseFrame(JSON.parse(text));
    } catch (error) {
      log.warn(`Dropping malformed frame: ${formatError(error).message}`);
      return;
    }

    if (event) {
      this.emit(event);
    }
  }

  private emit(event: BackendEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        logErrorWithStack(log, `Listener failed on ${event.type}`, error);
      }
    }
  }

  private send(payload: { op: string; guildId: Snowflake } & Record<string, unknown>): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(
        new NetworkError(`Socket to ${this.socketUrl} is not open`, undefined, {
          op: payload.op,
          guildId: payload.guildId,
        })
      );
    }

    return new Promise<void>((resolve, reject) => {
      socket.send(JSON.stringify(payload), (error?: Error) => {
        if (error) {
          reject(
            new NetworkError(`Failed to send ${payload.op}`, error, {
              op: payload.op,
              guildId: payload.guildId,
            })
          );
          return;
        }
        log.debug(`Sent ${payload.op} for guild ${payload.guildId}`);
        resolve();
      });
    });
  }

  private async get(path: string, params: Record<string, string>): Promise<unknown> {
    try {
      const response = await this.http.get<unknown>(path, { params });
      return response.data;
    } catch (error) {
      throw new NetworkError(`Request to ${path} failed: ${formatError(error).message}`, error, {
        path,
      });
    }
  }
}
