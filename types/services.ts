import type { BackendEventListener } from './events';
import type {
  Band,
  ConnectionInfo,
  PlayOptions,
  Snowflake,
  Track,
  TrackInfo,
  Tracks,
  VoiceStateOptions,
} from './voice';

/**
 * Service interface definitions for the coordinator's collaborators
 */

export interface Logger {
  error: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  http: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
}

/**
 * The audio node: accepts play commands per guild and pushes a typed event
 * stream back. Every command rejects with a NetworkError when the node
 * cannot be reached.
 */
export interface AudioBackend {
  createSession(info: ConnectionInfo): Promise<void>;
  destroy(guildId: Snowflake): Promise<void>;
  play(guildId: Snowflake, track: Track, options: PlayOptions): Promise<void>;
  stop(guildId: Snowflake): Promise<void>;
  setPause(guildId: Snowflake, pause: boolean): Promise<void>;
  seek(guildId: Snowflake, positionMs: number): Promise<void>;
  setVolume(guildId: Snowflake, volume: number): Promise<void>;
  equalize(guildId: Snowflake, bands: Band[]): Promise<void>;
  loadTracks(identifier: string): Promise<Tracks>;
  decodeTrack(track: string): Promise<TrackInfo>;
  /** Returns the unsubscribe function */
  subscribe(listener: BackendEventListener): () => void;
  close(): Promise<void>;
}

/** Receiver of raw voice gateway notifications */
export interface VoiceEventSink {
  handleVoiceStateUpdate(
    guildId: Snowflake,
    userId: Snowflake,
    sessionId: string,
    channelId: Snowflake | null
  ): void;
  handleVoiceServerUpdate(guildId: Snowflake, endpoint: string, token: string): void;
}

/** The chat platform's voice gateway */
export interface VoiceGateway {
  start(sink: VoiceEventSink): Promise<void>;
  updateVoiceState(
    guildId: Snowflake,
    channelId: Snowflake | null,
    options?: VoiceStateOptions
  ): Promise<void>;
  stop(): void;
}

/** Runs a unit of work later, on the embedding application's loop */
export type Scheduler = (task: () => void) => void;
