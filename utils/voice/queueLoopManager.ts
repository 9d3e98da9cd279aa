/**
 * Queue Loop Manager - advances each guild's queue when its track finishes.
 *
 * Per guild the loop is either absent or running. queue() starts it, a
 * finish on an empty queue or removeFromLoops() stops it. The loop keeps its
 * own copy of the last node state it saw, so removing the node from the
 * registry does not stop auto-advance.
 */
import { EventEmitter } from 'events';
import { Mutex } from 'async-mutex';
import { createLogger } from '../logger';
import { NoSessionError } from '../errors';
import type { AudioBackend } from '../../types/services';
import type { LoopState, Node, PlayOptions, Snowflake, TrackQueue } from '../../types/voice';
import { cloneNode, type NodeRegistry } from './nodeRegistry';
import { ADVANCING_FINISH_REASONS, REPLACED_FINISH_REASON } from './constants';

const log = createLogger('QUEUE_LOOP');

const STATE_CHANGE = 'stateChange';

export type LoopStateListener = (guildId: Snowflake, state: LoopState) => void;

interface LoopEntry<TData> {
  lastKnown: Node<TData>;
}

export function toPlayOptions(entry: TrackQueue, replace: boolean): PlayOptions {
  return {
    startTime: entry.startTime,
    ...(entry.endTime !== undefined && { endTime: entry.endTime }),
    noReplace: !replace,
  };
}

export class QueueLoopManager<TData> {
  private readonly loops = new Map<Snowflake, LoopEntry<TData>>();
  /** Map of guildId -> queue mutex */
  private readonly mutexes = new Map<Snowflake, Mutex>();
  private readonly emitter = new EventEmitter();

  constructor(
    private readonly registry: NodeRegistry<TData>,
    private readonly backend: Pick<AudioBackend, 'play'>
  ) {}

  state(guildId: Snowflake): LoopState {
    return this.loops.has(guildId) ? 'running' : 'absent';
  }

  isRunning(guildId: Snowflake): boolean {
    return this.loops.has(guildId);
  }

  guildIds(): Snowflake[] {
    return [...this.loops.keys()];
  }

  onStateChange(listener: LoopStateListener): () => void {
    this.emitter.on(STATE_CHANGE, listener);
    return () => {
      this.emitter.off(STATE_CHANGE, listener);
    };
  }

  /**
   * Execute a function with the guild's exclusive queue lock. The mutex is
   * dropped again once nobody holds or waits for it.
   */
  async withQueueLock<T>(guildId: Snowflake, fn: () => T | Promise<T>): Promise<T> {
    let mutex = this.mutexes.get(guildId);
    if (!mutex) {
      mutex = new Mutex();
      this.mutexes.set(guildId, mutex);
    }
    try {
      return await mutex.runExclusive(fn);
    } finally {
      if (!mutex.isLocked() && this.mutexes.get(guildId) === mutex) {
        this.mutexes.delete(guildId);
      }
    }
  }

  /** Guilds with a queue operation running or waiting */
  lockedGuilds(): Snowflake[] {
    return [...this.mutexes.keys()];
  }

  /**
   * Append a track to the guild's queue, starting the loop if it is absent.
   * Plays the head right away when nothing is playing.
   */
  enqueue(guildId: Snowflake, entry: TrackQueue): Promise<void> {
    return this.withQueueLock(guildId, async () => {
      const node = this.registry.get(guildId);
      if (!node) {
        throw new NoSessionError(guildId);
      }

      node.queue.push(entry);
      const started = !this.loops.has(guildId);
      if (started) {
        node.isOnLoops = true;
        this.loops.set(guildId, { lastKnown: cloneNode(node) });
      }
      this.commit(guildId, node);
      log.debug(`Queued track in guild ${guildId} (${node.queue.length} waiting)`);

      if (started) {
        this.transition(guildId, 'running');
      }

      if (node.nowPlaying === null) {
        await this.playNext(guildId, false);
      }
    });
  }

  /**
   * Play a track immediately, outside the queue.
   */
  startNow(guildId: Snowflake, entry: TrackQueue, replace: boolean): Promise<void> {
    return this.withQueueLock(guildId, async () => {
      if (!this.registry.has(guildId)) {
        throw new NoSessionError(guildId);
      }

      await this.backend.play(guildId, entry.track, toPlayOptions(entry, replace));
      this.patch(guildId, (node) => {
        if (replace || node.nowPlaying === null) {
          node.nowPlaying = entry;
        }
      });
    });
  }

  /**
   * Play the next queued track now. Returns it, or null when the queue is
   * empty; the current track then keeps playing.
   */
  skip(guildId: Snowflake): Promise<TrackQueue | null> {
    return this.withQueueLock(guildId, async () => {
      const node = this.current(guildId);
      if (!node || node.queue.length === 0) {
        return null;
      }
      return this.playNext(guildId, true);
    });
  }

  /**
   * React to a finished track: clear now playing and, when the loop runs and
   * the track ended on its own, play the next entry or stop the loop on an
   * empty queue. A stopped track leaves the loop running with nothing
   * playing; the next skip() or enqueue() continues.
   */
  onTrackFinish(guildId: Snowflake, reason: string): Promise<void> {
    return this.withQueueLock(guildId, async () => {
      // A replace-play already set the new now playing
      if (reason === REPLACED_FINISH_REASON) return;

      this.patch(guildId, (node) => {
        node.nowPlaying = null;
      });

      if (!this.loops.has(guildId) || !ADVANCING_FINISH_REASONS.has(reason)) return;

      const node = this.current(guildId);
      if (!node || node.queue.length === 0) {
        this.stopLoop(guildId);
        return;
      }

      await this.playNext(guildId, false);
    });
  }

  /**
   * Stop auto-advance without touching the running track.
   */
  remove(guildId: Snowflake): boolean {
    if (!this.loops.has(guildId)) return false;
    this.stopLoop(guildId);
    return true;
  }

  private stopLoop(guildId: Snowflake): void {
    this.patch(guildId, (node) => {
      node.isOnLoops = false;
    });
    this.loops.delete(guildId);
    this.transition(guildId, 'absent');
  }

  /**
   * Pop the head and send it to the backend. The entry is consumed even when
   * the play command fails; the error goes to the caller.
   */
  private async playNext(guildId: Snowflake, replace: boolean): Promise<TrackQueue | null> {
    const node = this.current(guildId);
    const next = node?.queue.shift();
    if (!node || !next) return null;

    this.commit(guildId, node);
    await this.backend.play(guildId, next.track, toPlayOptions(next, replace));
    this.patch(guildId, (latest) => {
      latest.nowPlaying = next;
    });
    log.debug(`Advanced queue in guild ${guildId} (${node.queue.length} left)`);
    return next;
  }

  /** Registry snapshot, or the loop's copy once the node was removed */
  private current(guildId: Snowflake): Node<TData> | undefined {
    const node = this.registry.get(guildId);
    if (node) return node;
    const entry = this.loops.get(guildId);
    return entry ? cloneNode(entry.lastKnown) : undefined;
  }

  private patch(guildId: Snowflake, mutator: (node: Node<TData>) => void): void {
    const node = this.current(guildId);
    if (!node) return;
    mutator(node);
    this.commit(guildId, node);
  }

  /** Write back to the registry (never re-creating a removed node) and the loop's copy */
  private commit(guildId: Snowflake, node: Node<TData>): void {
    if (this.registry.has(guildId)) {
      this.registry.insert(guildId, node);
    }
    const entry = this.loops.get(guildId);
    if (entry) {
      entry.lastKnown = cloneNode(node);
    }
  }

  private transition(guildId: Snowflake, state: LoopState): void {
    log.debug(`Queue loop for guild ${guildId} is now ${state}`);
    this.emitter.emit(STATE_CHANGE, guildId, state);
  }
}
