/**
 * Voice session type definitions
 */
import type { NodeData } from '../utils/voice/nodeData';

/** Discord snowflake, carried as a string like discord.js does */
export type Snowflake = string;

/**
 * Everything the audio node needs to attach to a guild's voice connection.
 * Assembled from one VOICE_STATE_UPDATE and one VOICE_SERVER_UPDATE.
 */
export interface ConnectionInfo {
  guildId: Snowflake;
  channelId: Snowflake;
  endpoint: string;
  token: string;
  sessionId: string;
}

/** In-progress descriptor; only the guild is known for sure */
export type PartialConnectionInfo = Pick<ConnectionInfo, 'guildId'> &
  Partial<Omit<ConnectionInfo, 'guildId'>>;

export interface TrackInfo {
  identifier: string;
  isSeekable: boolean;
  author: string;
  length: number;
  isStream: boolean;
  position: number;
  title: string;
  uri: string;
}

export interface Track {
  /** Opaque handle minted by the audio node */
  track: string;
  info?: TrackInfo;
}

export interface PlaylistInfo {
  name?: string;
  selectedTrack?: number;
}

export interface Tracks {
  loadType: string;
  playlistInfo?: PlaylistInfo;
  tracks: Track[];
}

export interface TrackQueue {
  readonly track: Track;
  /** Milliseconds */
  readonly startTime: number;
  /** Milliseconds, absent means play to the natural end */
  readonly endTime?: number;
  readonly requester?: Snowflake;
}

export interface Band {
  /** 0 to 14 */
  band: number;
  /** -0.25 to 1.0 */
  gain: number;
}

export interface Node<TData = Record<string, unknown>> {
  guildId: Snowflake;
  /** 0 to 1000 */
  volume: number;
  isPaused: boolean;
  isOnLoops: boolean;
  nowPlaying: TrackQueue | null;
  queue: TrackQueue[];
  /** Gain of each of the 15 bands */
  equalizer: number[];
  /** Shared between snapshots, guarded by its own lock */
  data: NodeData<TData>;
}

export interface PlayOptions {
  startTime: number;
  endTime?: number;
  /** When true the node ignores the command if something is already playing */
  noReplace: boolean;
}

export type LoopState = 'absent' | 'running';

export interface VoiceStateOptions {
  selfDeaf?: boolean;
  selfMute?: boolean;
}
