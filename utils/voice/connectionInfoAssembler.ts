/**
 * Connection Info Assembler - Merges VOICE_STATE_UPDATE and VOICE_SERVER_UPDATE
 * notifications per guild into a complete ConnectionInfo.
 *
 * The two events come from independent sources, in any order, possibly more
 * than once, and possibly never (missing permissions, deleted channel). Waits
 * are therefore bounded by the number of events seen for the guild rather
 * than by wall-clock time.
 */
import { createLogger } from '../logger';
import { InvalidArgumentError, TimeoutError } from '../errors';
import type { ConnectionInfo, PartialConnectionInfo, Snowflake } from '../../types/voice';
import { DEFAULT_CONNECTION_EVENT_LIMIT } from './constants';

const log = createLogger('CONNECTION_INFO');

export type VoiceStateIngestResult = 'updated' | 'disconnected' | 'ignored';

interface Waiter {
  remaining: number;
  /** Settles the waiter when its condition holds, returns whether it did */
  poll: () => boolean;
  expire: () => void;
}

export interface ConnectionInfoAssemblerOptions {
  /** Voice states of other users are ignored when set */
  botUserId?: Snowflake;
  defaultEventLimit?: number;
}

export function isCompleteConnectionInfo(
  info: PartialConnectionInfo | undefined
): info is ConnectionInfo {
  return (
    info !== undefined &&
    info.channelId !== undefined &&
    info.endpoint !== undefined &&
    info.token !== undefined &&
    info.sessionId !== undefined
  );
}

export class ConnectionInfoAssembler {
  private readonly connections = new Map<Snowflake, PartialConnectionInfo>();
  private readonly waiters = new Map<Snowflake, Set<Waiter>>();
  private botUserId: Snowflake | undefined;
  private readonly defaultEventLimit: number;

  constructor(options: ConnectionInfoAssemblerOptions = {}) {
    this.botUserId = options.botUserId;
    this.defaultEventLimit = options.defaultEventLimit ?? DEFAULT_CONNECTION_EVENT_LIMIT;
    assertEventLimit(this.defaultEventLimit);
  }

  setBotUserId(botUserId: Snowflake): void {
    this.botUserId = botUserId;
  }

  /**
   * Record a voice state. A state without a channel is a voluntary
   * disconnect and drops the guild's descriptor.
   */
  ingestVoiceState(
    guildId: Snowflake,
    userId: Snowflake,
    sessionId: string,
    channelId: Snowflake | null
  ): VoiceStateIngestResult {
    if (this.botUserId !== undefined && userId !== this.botUserId) {
      return 'ignored';
    }

    if (channelId === null) {
      log.debug(`Voice state without channel in guild ${guildId}, dropping connection info`);
      this.connections.delete(guildId);
      this.notify(guildId);
      return 'disconnected';
    }

    const current = this.connections.get(guildId) ?? { guildId };
    this.connections.set(guildId, { ...current, sessionId, channelId });
    log.debug(`Voice state for guild ${guildId}: channel ${channelId}`);
    this.notify(guildId);
    return 'updated';
  }

  ingestVoiceServer(guildId: Snowflake, endpoint: string, token: string): void {
    const current = this.connections.get(guildId) ?? { guildId };
    this.connections.set(guildId, { ...current, endpoint, token });
    log.debug(`Voice server for guild ${guildId}: ${endpoint}`);
    this.notify(guildId);
  }

  get(guildId: Snowflake): PartialConnectionInfo | undefined {
    const info = this.connections.get(guildId);
    return info ? { ...info } : undefined;
  }

  isComplete(guildId: Snowflake): boolean {
    return isCompleteConnectionInfo(this.connections.get(guildId));
  }

  /**
   * Delete the guild's descriptor. Idempotent.
   */
  remove(guildId: Snowflake): void {
    this.connections.delete(guildId);
    this.notify(guildId);
  }

  /**
   * Resolve once the guild's descriptor has every field. Rejects with a
   * TimeoutError after `maxEvents` events for the guild did not complete it.
   */
  async waitForComplete(
    guildId: Snowflake,
    maxEvents = this.defaultEventLimit
  ): Promise<ConnectionInfo> {
    assertEventLimit(maxEvents);
    const current = this.connections.get(guildId);
    if (isCompleteConnectionInfo(current)) {
      return { ...current };
    }

    return new Promise<ConnectionInfo>((resolve, reject) => {
      this.addWaiter(guildId, {
        remaining: maxEvents,
        poll: () => {
          const info = this.connections.get(guildId);
          if (!isCompleteConnectionInfo(info)) return false;
          resolve({ ...info });
          return true;
        },
        expire: () =>
          reject(
            new TimeoutError(
              `Connection info for guild ${guildId} was not complete after ${maxEvents} events`,
              { guildId, maxEvents }
            )
          ),
      });
    });
  }

  /**
   * Resolve once the guild's descriptor is gone, with the same event-count
   * bound as waitForComplete.
   */
  async waitForRemoval(guildId: Snowflake, maxEvents = this.defaultEventLimit): Promise<void> {
    assertEventLimit(maxEvents);
    if (!this.connections.has(guildId)) {
      return;
    }

    return new Promise<void>((resolve, reject) => {
      this.addWaiter(guildId, {
        remaining: maxEvents,
        poll: () => {
          if (this.connections.has(guildId)) return false;
          resolve();
          return true;
        },
        expire: () =>
          reject(
            new TimeoutError(
              `Connection info for guild ${guildId} was not removed after ${maxEvents} events`,
              { guildId, maxEvents }
            )
          ),
      });
    });
  }

  /** Number of pending waits for a guild */
  pendingWaits(guildId: Snowflake): number {
    return this.waiters.get(guildId)?.size ?? 0;
  }

  private addWaiter(guildId: Snowflake, waiter: Waiter): void {
    let set = this.waiters.get(guildId);
    if (!set) {
      set = new Set();
      this.waiters.set(guildId, set);
    }
    set.add(waiter);
  }

  private notify(guildId: Snowflake): void {
    const set = this.waiters.get(guildId);
    if (!set) return;

    for (const waiter of [...set]) {
      if (waiter.poll()) {
        set.delete(waiter);
        continue;
      }
      waiter.remaining -= 1;
      if (waiter.remaining <= 0) {
        set.delete(waiter);
        waiter.expire();
      }
    }

    if (set.size === 0) {
      this.waiters.delete(guildId);
    }
  }
}

function assertEventLimit(maxEvents: number): void {
  if (!Number.isInteger(maxEvents) || maxEvents < 1) {
    throw new InvalidArgumentError(`Event limit must be a positive integer, got ${maxEvents}`, {
      maxEvents,
    });
  }
}
