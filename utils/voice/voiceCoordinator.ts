/**
 * Voice Coordinator - the public surface for per-guild voice sessions.
 *
 * Wires the connection info assembler, the node registry, the queue loops
 * and the event dispatcher around one audio backend and an optional voice
 * gateway.
 */
import { createLogger } from '../logger';
import {
  GatewayError,
  InvalidArgumentError,
  MissingFieldError,
  logErrorWithStack,
} from '../errors';
import type { AudioBackend, Scheduler, VoiceEventSink, VoiceGateway } from '../../types/services';
import type { BackendEvent, VoiceEventHandler } from '../../types/events';
import type {
  Band,
  ConnectionInfo,
  Node,
  PartialConnectionInfo,
  Snowflake,
  Track,
  TrackInfo,
  TrackQueue,
  Tracks,
  VoiceStateOptions,
} from '../../types/voice';
import { PlayBuilder } from '../../components/builders/playBuilder';
import { ConnectionInfoAssembler } from './connectionInfoAssembler';
import { EventDispatcher, type ErrorReporter } from './eventDispatcher';
import { NodeRegistry } from './nodeRegistry';
import { QueueLoopManager, type LoopStateListener } from './queueLoopManager';
import {
  EQUALIZER_BAND_COUNT,
  MAX_BAND_GAIN,
  MAX_VOLUME,
  MIN_BAND_GAIN,
} from './constants';

const log = createLogger('VOICE');

export const SEARCH_PREFIX = 'ytsearch:';

export interface VoiceCoordinatorOptions<TData> {
  backend: AudioBackend;
  /** Default value of each node's data slot */
  createNodeData: () => TData;
  handler?: VoiceEventHandler<TData>;
  gateway?: VoiceGateway;
  scheduler?: Scheduler;
  reportError?: ErrorReporter;
  /** Voice states of other users are ignored when set */
  botUserId?: Snowflake;
  connectionEventLimit?: number;
  gatewayStartDelayMs?: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isUrl(query: string): boolean {
  try {
    const url = new URL(query);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

function assertBand(band: Band): void {
  if (!Number.isInteger(band.band) || band.band < 0 || band.band >= EQUALIZER_BAND_COUNT) {
    throw new InvalidArgumentError(
      `Band index must be between 0 and ${EQUALIZER_BAND_COUNT - 1}, got ${band.band}`,
      { band: band.band }
    );
  }
  assertGain(band.gain);
}

function assertGain(gain: number): void {
  if (!Number.isFinite(gain) || gain < MIN_BAND_GAIN || gain > MAX_BAND_GAIN) {
    throw new InvalidArgumentError(
      `Band gain must be between ${MIN_BAND_GAIN} and ${MAX_BAND_GAIN}, got ${gain}`,
      { gain }
    );
  }
}

function assertPosition(positionMs: number): void {
  if (!Number.isInteger(positionMs) || positionMs < 0) {
    throw new InvalidArgumentError(
      `Seek position must be a non-negative integer of milliseconds, got ${positionMs}`,
      { positionMs }
    );
  }
}

export class VoiceCoordinator<TData = Record<string, unknown>> implements VoiceEventSink {
  readonly backend: AudioBackend;
  private readonly gateway: VoiceGateway | undefined;
  private readonly assembler: ConnectionInfoAssembler;
  private readonly registry: NodeRegistry<TData>;
  private readonly queueLoops: QueueLoopManager<TData>;
  private readonly dispatcher: EventDispatcher<TData>;
  private readonly gatewayStartDelayMs: number;
  private unsubscribe: (() => void) | null;

  constructor(options: VoiceCoordinatorOptions<TData>) {
    this.backend = options.backend;
    this.gateway = options.gateway;
    this.gatewayStartDelayMs = options.gatewayStartDelayMs ?? 0;
    this.assembler = new ConnectionInfoAssembler({
      ...(options.botUserId !== undefined && { botUserId: options.botUserId }),
      ...(options.connectionEventLimit !== undefined && {
        defaultEventLimit: options.connectionEventLimit,
      }),
    });
    this.registry = new NodeRegistry(options.createNodeData);
    this.queueLoops = new QueueLoopManager(this.registry, this.backend);
    this.dispatcher = new EventDispatcher(options.handler ?? {}, {
      ...(options.scheduler && { scheduler: options.scheduler }),
      ...(options.reportError && { reportError: options.reportError }),
    });
    this.unsubscribe = this.backend.subscribe((event) => this.handleBackendEvent(event));
  }

  // ---- Gateway ----

  /**
   * Start forwarding voice packets from the gateway, after `delayMs`
   * (defaults to the configured start delay).
   */
  async startDiscordGateway(delayMs = this.gatewayStartDelayMs): Promise<void> {
    const gateway = this.requireGateway();
    if (delayMs > 0) {
      await sleep(delayMs);
    }
    await gateway.start(this);
    log.info('Voice gateway started');
  }

  /**
   * Ask the gateway to join a voice channel and wait for the connection info
   * to be complete. Pass the result to createSession().
   */
  async join(
    guildId: Snowflake,
    channelId: Snowflake,
    options?: VoiceStateOptions,
    maxEvents?: number
  ): Promise<ConnectionInfo> {
    const gateway = this.requireGateway();
    await gateway.updateVoiceState(guildId, channelId, options);
    return this.assembler.waitForComplete(guildId, maxEvents);
  }

  /**
   * Ask the gateway to leave the guild's voice channel and wait for the
   * connection info to be removed. Call destroy() first to end the session.
   */
  async leave(guildId: Snowflake, maxEvents?: number): Promise<void> {
    const gateway = this.requireGateway();
    await gateway.updateVoiceState(guildId, null);
    await this.assembler.waitForRemoval(guildId, maxEvents);
  }

  handleVoiceStateUpdate(
    guildId: Snowflake,
    userId: Snowflake,
    sessionId: string,
    channelId: Snowflake | null
  ): void {
    this.assembler.ingestVoiceState(guildId, userId, sessionId, channelId);
  }

  handleVoiceServerUpdate(guildId: Snowflake, endpoint: string, token: string): void {
    this.assembler.ingestVoiceServer(guildId, endpoint, token);
  }

  // ---- Connection info ----

  getConnectionInfo(guildId: Snowflake): PartialConnectionInfo | undefined {
    return this.assembler.get(guildId);
  }

  waitForConnectionInfo(guildId: Snowflake, maxEvents?: number): Promise<ConnectionInfo> {
    return this.assembler.waitForComplete(guildId, maxEvents);
  }

  waitForConnectionInfoRemoval(guildId: Snowflake, maxEvents?: number): Promise<void> {
    return this.assembler.waitForRemoval(guildId, maxEvents);
  }

  // ---- Sessions ----

  /**
   * Attach the audio node to the guild's voice connection and create the
   * guild's node if it has none. The node is not queued until a track is.
   */
  async createSession(info: PartialConnectionInfo): Promise<void> {
    const { guildId, channelId, endpoint, token, sessionId } = info;
    if (!guildId) throw new MissingFieldError('guildId');
    if (!channelId) throw new MissingFieldError('channelId');
    if (!endpoint) throw new MissingFieldError('endpoint');
    if (!token) throw new MissingFieldError('token');
    if (!sessionId) throw new MissingFieldError('sessionId');

    await this.backend.createSession({ guildId, channelId, endpoint, token, sessionId });
    if (this.registry.ensure(guildId)) {
      log.debug(`Created node for guild ${guildId}`);
    }
    log.info(`Session created for guild ${guildId} in channel ${channelId}`);
  }

  /**
   * End the guild's session on the audio node. The node and the queue loop
   * are kept so a reconnect resumes where it left off; use removeNode() and
   * removeFromLoops() to reset them.
   */
  async destroy(guildId: Snowflake): Promise<void> {
    await this.backend.destroy(guildId);
    log.info(`Session destroyed for guild ${guildId}`);
  }

  // ---- Playback ----

  play(guildId: Snowflake, track: Track): PlayBuilder {
    return new PlayBuilder(this.queueLoops, guildId, track);
  }

  /**
   * Play the next queued track. Returns it, or null when the queue is empty,
   * in which case the current track keeps playing.
   */
  skip(guildId: Snowflake): Promise<TrackQueue | null> {
    return this.queueLoops.skip(guildId);
  }

  async stop(guildId: Snowflake): Promise<void> {
    await this.backend.stop(guildId);
  }

  async setPause(guildId: Snowflake, pause: boolean): Promise<void> {
    await this.backend.setPause(guildId, pause);
    this.registry.update(guildId, (node) => {
      node.isPaused = pause;
    });
  }

  pause(guildId: Snowflake): Promise<void> {
    return this.setPause(guildId, true);
  }

  resume(guildId: Snowflake): Promise<void> {
    return this.setPause(guildId, false);
  }

  /** Seek to `seconds`, rounded to the nearest millisecond */
  seekSecs(guildId: Snowflake, seconds: number): Promise<void> {
    return this.seekMillis(guildId, Math.round(seconds * 1000));
  }

  async seekMillis(guildId: Snowflake, positionMs: number): Promise<void> {
    assertPosition(positionMs);
    await this.backend.seek(guildId, positionMs);
  }

  jumpToTimeSecs(guildId: Snowflake, seconds: number): Promise<void> {
    return this.seekSecs(guildId, seconds);
  }

  jumpToTimeMillis(guildId: Snowflake, positionMs: number): Promise<void> {
    return this.seekMillis(guildId, positionMs);
  }

  scrubSecs(guildId: Snowflake, seconds: number): Promise<void> {
    return this.seekSecs(guildId, seconds);
  }

  scrubMillis(guildId: Snowflake, positionMs: number): Promise<void> {
    return this.seekMillis(guildId, positionMs);
  }

  /**
   * Set the player volume, 0 to 1000 (100 is unchanged).
   */
  async volume(guildId: Snowflake, volume: number): Promise<void> {
    if (!Number.isInteger(volume) || volume < 0 || volume > MAX_VOLUME) {
      throw new InvalidArgumentError(`Volume must be an integer between 0 and ${MAX_VOLUME}`, {
        volume,
      });
    }
    await this.backend.setVolume(guildId, volume);
    this.registry.update(guildId, (node) => {
      node.volume = volume;
    });
  }

  /**
   * Set the gain of all 15 bands at once.
   */
  async equalizeAll(guildId: Snowflake, gains: number[]): Promise<void> {
    if (gains.length !== EQUALIZER_BAND_COUNT) {
      throw new InvalidArgumentError(
        `Expected ${EQUALIZER_BAND_COUNT} band gains, got ${gains.length}`,
        { count: gains.length }
      );
    }
    gains.forEach(assertGain);

    await this.backend.equalize(
      guildId,
      gains.map((gain, band) => ({ band, gain }))
    );
    this.registry.update(guildId, (node) => {
      node.equalizer = [...gains];
    });
  }

  /**
   * Set the gain of the given bands; the others keep theirs.
   */
  async equalizeDynamic(guildId: Snowflake, bands: Band[]): Promise<void> {
    if (bands.length > EQUALIZER_BAND_COUNT) {
      throw new InvalidArgumentError(
        `At most ${EQUALIZER_BAND_COUNT} bands can be set, got ${bands.length}`,
        { count: bands.length }
      );
    }
    bands.forEach(assertBand);

    await this.backend.equalize(
      guildId,
      bands.map(({ band, gain }) => ({ band, gain }))
    );
    this.registry.update(guildId, (node) => {
      for (const { band, gain } of bands) {
        node.equalizer[band] = gain;
      }
    });
  }

  equalizeBand(guildId: Snowflake, band: Band): Promise<void> {
    return this.equalizeDynamic(guildId, [band]);
  }

  equalizeReset(guildId: Snowflake): Promise<void> {
    return this.equalizeAll(guildId, new Array<number>(EQUALIZER_BAND_COUNT).fill(0));
  }

  // ---- Tracks ----

  getTracks(identifier: string): Promise<Tracks> {
    return this.backend.loadTracks(identifier);
  }

  searchTracks(query: string): Promise<Tracks> {
    return this.backend.loadTracks(`${SEARCH_PREFIX}${query}`);
  }

  /**
   * Load a URL directly, search for anything else.
   */
  autoSearchTracks(query: string): Promise<Tracks> {
    return isUrl(query) ? this.getTracks(query) : this.searchTracks(query);
  }

  decodeTrack(track: string): Promise<TrackInfo> {
    return this.backend.decodeTrack(track);
  }

  // ---- State ----

  /** Snapshot of the guild's node; change it through setNode() */
  getNode(guildId: Snowflake): Node<TData> | undefined {
    return this.registry.get(guildId);
  }

  setNode(guildId: Snowflake, node: Node<TData>): void {
    this.registry.insert(guildId, node);
  }

  /**
   * Read, change and store the guild's node in one step.
   */
  updateNode(guildId: Snowflake, mutator: (node: Node<TData>) => void): Node<TData> | undefined {
    return this.registry.update(guildId, mutator);
  }

  removeNode(guildId: Snowflake): boolean {
    return this.registry.remove(guildId);
  }

  nodes(): Snowflake[] {
    return this.registry.guildIds();
  }

  /**
   * Stop advancing the guild's queue. The current track keeps playing.
   */
  removeFromLoops(guildId: Snowflake): boolean {
    return this.queueLoops.remove(guildId);
  }

  /** Guilds whose queue loop is running */
  loops(): Snowflake[] {
    return this.queueLoops.guildIds();
  }

  onLoopStateChange(listener: LoopStateListener): () => void {
    return this.queueLoops.onStateChange(listener);
  }

  /** Resolves once every dispatched handler call has settled */
  idle(): Promise<void> {
    return this.dispatcher.idle();
  }

  /**
   * Stop listening, close the backend, then wait for running handlers to
   * settle, for at most `idleTimeoutMs` when given.
   */
  async close(idleTimeoutMs?: number): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.gateway?.stop();
    await this.backend.close();

    if (idleTimeoutMs === undefined) {
      await this.dispatcher.idle();
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), idleTimeoutMs);
    });
    try {
      const expired = await Promise.race([this.dispatcher.idle().then(() => false), timedOut]);
      if (expired) {
        log.warn(`Closed with ${this.dispatcher.pending} event handlers still running`);
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private requireGateway(): VoiceGateway {
    if (!this.gateway) {
      throw new GatewayError('No voice gateway configured');
    }
    return this.gateway;
  }

  private handleBackendEvent(event: BackendEvent): void {
    this.dispatcher.dispatch(this, event);

    if (event.type === 'trackFinish') {
      const { guildId, reason } = event;
      void this.queueLoops.onTrackFinish(guildId, reason).catch((error: unknown) => {
        logErrorWithStack(log, `Failed to advance queue in guild ${guildId}`, error);
      });
    }
  }
}
