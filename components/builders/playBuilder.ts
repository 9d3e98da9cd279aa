/**
 * Play builder - stages one track's play parameters, then plays it now or
 * queues it
 */
import { InvalidArgumentError } from '../../utils/errors';
import type { Snowflake, Track, TrackQueue } from '../../types/voice';

/** Where a staged track ends up: played right away or appended to the queue */
export interface PlaybackTarget {
  startNow(guildId: Snowflake, entry: TrackQueue, replace: boolean): Promise<void>;
  enqueue(guildId: Snowflake, entry: TrackQueue): Promise<void>;
}

function toMillis(value: number, unit: 'secs' | 'millis', field: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${field} must be a non-negative integer, got ${value}`, {
      [field]: value,
    });
  }
  return unit === 'secs' ? value * 1000 : value;
}

export class PlayBuilder {
  private requesterId: Snowflake | undefined;
  private shouldReplace = false;
  private startMs = 0;
  /** 0 plays to the natural end */
  private finishMs = 0;

  constructor(
    private readonly target: PlaybackTarget,
    readonly guildId: Snowflake,
    readonly track: Track
  ) {}

  requester(userId: Snowflake): this {
    this.requesterId = userId;
    return this;
  }

  /** Replace the running track instead of leaving it alone */
  replace(replace: boolean): this {
    this.shouldReplace = replace;
    return this;
  }

  startTimeSecs(start: number): this {
    this.startMs = toMillis(start, 'secs', 'startTime');
    return this;
  }

  finishTimeSecs(finish: number): this {
    this.finishMs = toMillis(finish, 'secs', 'finishTime');
    return this;
  }

  startTimeMillis(start: number): this {
    this.startMs = toMillis(start, 'millis', 'startTime');
    return this;
  }

  finishTimeMillis(finish: number): this {
    this.finishMs = toMillis(finish, 'millis', 'finishTime');
    return this;
  }

  toTrackQueue(): TrackQueue {
    return Object.freeze({
      track: this.track,
      startTime: this.startMs,
      ...(this.finishMs !== 0 && { endTime: this.finishMs }),
      ...(this.requesterId !== undefined && { requester: this.requesterId }),
    });
  }

  /**
   * Play the track now. Rejects with NoSessionError before createSession.
   */
  start(): Promise<void> {
    return this.target.startNow(this.guildId, this.toTrackQueue(), this.shouldReplace);
  }

  /**
   * Append the track to the guild's queue, starting its queue loop when
   * none runs. Rejects with NoSessionError before createSession.
   */
  queue(): Promise<void> {
    return this.target.enqueue(this.guildId, this.toTrackQueue());
  }
}
