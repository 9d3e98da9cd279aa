/**
 * Connection builder - collects the audio node and bot settings, then
 * connects and returns a VoiceCoordinator
 */
import type { Client } from 'discord.js';
import { InvalidArgumentError, logErrorWithStack } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import type { AppConfig } from '../../utils/config';
import type { Scheduler, VoiceGateway } from '../../types/services';
import type { VoiceEventHandler } from '../../types/events';
import type { Snowflake } from '../../types/voice';
import type { ErrorReporter } from '../../utils/voice/eventDispatcher';
import {
  LavalinkBackend,
  type LavalinkBackendOptions,
  type SocketFactory,
} from '../../utils/voice/lavalinkBackend';
import { DiscordVoiceGateway } from '../../utils/voice/discordGateway';
import { VoiceCoordinator } from '../../utils/voice/voiceCoordinator';
import { DEFAULT_CONNECTION_EVENT_LIMIT } from '../../utils/voice/constants';

const log = createLogger('CONNECTION');

export interface ConnectionSettings {
  host: string;
  port: number;
  password: string;
  isSsl: boolean;
  shardCount: number;
  botId: Snowflake;
  botToken: string;
  startGateway: boolean;
  gatewayStartDelayMs: number;
  connectionEventLimit: number;
}

export interface BuildOptions<TData> {
  handler?: VoiceEventHandler<TData>;
  gateway?: VoiceGateway;
  scheduler?: Scheduler;
  reportError?: ErrorReporter;
  socketFactory?: SocketFactory;
  /** Builds a discord.js voice gateway logged in with the bot token, unless `gateway` is given */
  discordClient?: Client;
}

const DEFAULT_SETTINGS: Omit<ConnectionSettings, 'botId' | 'botToken'> = {
  host: '127.0.0.1',
  port: 2333,
  password: 'youshallnotpass',
  isSsl: false,
  shardCount: 1,
  startGateway: true,
  gatewayStartDelayMs: 0,
  connectionEventLimit: DEFAULT_CONNECTION_EVENT_LIMIT,
};

// host:port or [ipv6]:port
const ADDR_PATTERN = /^(?:\[([0-9a-fA-F:.]+)\]|([^\s:/[\]]+)):(\d{1,5})$/;

function assertPort(port: number): void {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError(`Port must be between 1 and 65535, got ${port}`, { port });
  }
}

export class ConnectionBuilder<TData> {
  private settings: ConnectionSettings;

  private constructor(
    botId: Snowflake,
    botToken: string,
    private readonly createNodeData: () => TData
  ) {
    this.settings = { ...DEFAULT_SETTINGS, botId, botToken };
  }

  static create(botId: Snowflake, botToken: string): ConnectionBuilder<Record<string, unknown>> {
    return new ConnectionBuilder(botId, botToken, (): Record<string, unknown> => ({}));
  }

  /**
   * Builder preset from the loaded environment configuration.
   */
  static fromConfig(config: AppConfig): ConnectionBuilder<Record<string, unknown>> {
    if (!config.botId || !config.token) {
      throw new InvalidArgumentError('DISCORD_CLIENT_ID and DISCORD_BOT_TOKEN are required');
    }
    return ConnectionBuilder.create(config.botId, config.token)
      .setHost(config.lavalinkHost)
      .setPort(config.lavalinkPort)
      .setPassword(config.lavalinkPassword)
      .setIsSsl(config.lavalinkSsl)
      .setShardCount(config.shardCount)
      .setGatewayStartDelay(config.gatewayStartDelayMs)
      .setConnectionEventLimit(config.connectionEventLimit);
  }

  get current(): Readonly<ConnectionSettings> {
    return { ...this.settings };
  }

  setHost(host: string): this {
    this.settings.host = host;
    return this;
  }

  setPort(port: number): this {
    assertPort(port);
    this.settings.port = port;
    return this;
  }

  /**
   * Set host and port from `host:port` (IPv6 hosts in brackets).
   */
  setAddr(addr: string): this {
    const match = ADDR_PATTERN.exec(addr.trim());
    const host = match?.[1] ?? match?.[2];
    const port = Number(match?.[3]);
    if (!host || !Number.isInteger(port) || port < 1 || port > 65535) {
      throw new InvalidArgumentError(`Invalid address: ${addr}`, { addr });
    }
    this.settings.host = host;
    this.settings.port = port;
    return this;
  }

  setShardCount(shardCount: number): this {
    if (!Number.isInteger(shardCount) || shardCount < 1) {
      throw new InvalidArgumentError(`Shard count must be a positive integer, got ${shardCount}`);
    }
    this.settings.shardCount = shardCount;
    return this;
  }

  setBotId(botId: Snowflake): this {
    this.settings.botId = botId;
    return this;
  }

  setBotToken(botToken: string): this {
    this.settings.botToken = botToken;
    return this;
  }

  setIsSsl(isSsl: boolean): this {
    this.settings.isSsl = isSsl;
    return this;
  }

  setPassword(password: string): this {
    this.settings.password = password;
    return this;
  }

  /** Start the voice gateway right after connecting */
  setStartGateway(startGateway: boolean): this {
    this.settings.startGateway = startGateway;
    return this;
  }

  setGatewayStartDelay(delayMs: number): this {
    if (!Number.isFinite(delayMs) || delayMs < 0) {
      throw new InvalidArgumentError(`Gateway start delay must be non-negative, got ${delayMs}`);
    }
    this.settings.gatewayStartDelayMs = delayMs;
    return this;
  }

  setConnectionEventLimit(limit: number): this {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidArgumentError(`Event limit must be a positive integer, got ${limit}`);
    }
    this.settings.connectionEventLimit = limit;
    return this;
  }

  /**
   * Use a typed data slot on every node, initialized by `factory`.
   */
  withNodeData<T>(factory: () => T): ConnectionBuilder<T> {
    const next = new ConnectionBuilder(this.settings.botId, this.settings.botToken, factory);
    next.settings = { ...this.settings };
    return next;
  }

  backendOptions(socketFactory?: SocketFactory): LavalinkBackendOptions {
    const { host, port, password, isSsl, botId, shardCount } = this.settings;
    return {
      host,
      port,
      password,
      ssl: isSsl,
      userId: botId,
      shardCount,
      ...(socketFactory && { socketFactory }),
    };
  }

  /**
   * Connect to the audio node and return the coordinator. The gateway is
   * started in the background, after the configured delay, when enabled.
   */
  async build(options: BuildOptions<TData> = {}): Promise<VoiceCoordinator<TData>> {
    const backend = new LavalinkBackend(this.backendOptions(options.socketFactory));
    try {
      await backend.connect();
    } catch (error) {
      await backend.close();
      throw error;
    }

    const gateway =
      options.gateway ??
      (options.discordClient
        ? new DiscordVoiceGateway({ client: options.discordClient, token: this.settings.botToken })
        : undefined);

    const coordinator = new VoiceCoordinator<TData>({
      backend,
      createNodeData: this.createNodeData,
      botUserId: this.settings.botId,
      connectionEventLimit: this.settings.connectionEventLimit,
      gatewayStartDelayMs: this.settings.gatewayStartDelayMs,
      ...(options.handler && { handler: options.handler }),
      ...(gateway && { gateway }),
      ...(options.scheduler && { scheduler: options.scheduler }),
      ...(options.reportError && { reportError: options.reportError }),
    });

    if (this.settings.startGateway && gateway) {
      void coordinator.startDiscordGateway().catch((error: unknown) => {
        logErrorWithStack(log, 'Voice gateway failed to start', error);
      });
    }

    return coordinator;
  }
}
