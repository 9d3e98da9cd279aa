/**
 * Events pushed by the audio node and the handler shape that receives them
 */
import type { Snowflake } from './voice';
import type { VoiceCoordinator } from '../utils/voice/voiceCoordinator';

export interface StatsEvent {
  type: 'stats';
  players: number;
  playingPlayers: number;
  uptime: number;
  memory: {
    free: number;
    used: number;
    allocated: number;
    reservable: number;
  };
  cpu: {
    cores: number;
    systemLoad: number;
    lavalinkLoad: number;
  };
  frameStats?: {
    sent: number;
    nulled: number;
    deficit: number;
  };
}

export interface PlayerUpdateEvent {
  type: 'playerUpdate';
  guildId: Snowflake;
  state: {
    time: number;
    position: number;
  };
}

export interface TrackStartEvent {
  type: 'trackStart';
  guildId: Snowflake;
  track: string;
}

/** FINISHED, LOAD_FAILED, STOPPED, REPLACED or CLEANUP */
export type TrackFinishReason = string;

export interface TrackFinishEvent {
  type: 'trackFinish';
  guildId: Snowflake;
  track: string;
  reason: TrackFinishReason;
}

export interface TrackExceptionEvent {
  type: 'trackException';
  guildId: Snowflake;
  track: string;
  error: string;
  exception: {
    message: string;
    severity: string;
    cause: string;
  };
}

export interface TrackStuckEvent {
  type: 'trackStuck';
  guildId: Snowflake;
  track: string;
  thresholdMs: number;
}

export interface WebSocketClosedEvent {
  type: 'websocketClosed';
  guildId: Snowflake;
  code: number;
  reason: string;
  byRemote: boolean;
}

export interface PlayerDestroyedEvent {
  type: 'playerDestroyed';
  guildId: Snowflake;
  cleanup: boolean;
}

export type BackendEvent =
  | StatsEvent
  | PlayerUpdateEvent
  | TrackStartEvent
  | TrackFinishEvent
  | TrackExceptionEvent
  | TrackStuckEvent
  | WebSocketClosedEvent
  | PlayerDestroyedEvent;

export type BackendEventType = BackendEvent['type'];

export type BackendEventOf<K extends BackendEventType> = Extract<BackendEvent, { type: K }>;

export type EventCallback<TData, E> = (
  coordinator: VoiceCoordinator<TData>,
  event: E
) => unknown;

/**
 * Application callbacks. Every method is optional; an empty object is a
 * valid handler.
 */
export type VoiceEventHandler<TData = Record<string, unknown>> = {
  [K in BackendEventType]?: EventCallback<TData, BackendEventOf<K>>;
};

export type BackendEventListener = (event: BackendEvent) => void;
