import {
  Client,
  GatewayDispatchEvents,
  GatewayIntentBits,
  GatewayOpcodes,
  type ClientOptions,
} from 'discord.js';
import { z } from 'zod';
import { createLogger } from '../logger';
import { GatewayError, formatError } from '../errors';
import type { VoiceEventSink, VoiceGateway } from '../../types/services';
import type { Snowflake, VoiceStateOptions } from '../../types/voice';

const log = createLogger('DISCORD_GATEWAY');

const voiceStatePacketSchema = z.object({
  t: z.literal(GatewayDispatchEvents.VoiceStateUpdate),
  d: z.object({
    guild_id: z.string(),
    channel_id: z.string().nullable(),
    user_id: z.string(),
    session_id: z.string(),
  }),
});

const voiceServerPacketSchema = z.object({
  t: z.literal(GatewayDispatchEvents.VoiceServerUpdate),
  d: z.object({
    guild_id: z.string(),
    token: z.string(),
    // Null while the voice server is being reallocated
    endpoint: z.string().nullable(),
  }),
});

const packetTypeSchema = z.object({ t: z.string().nullable() });

export interface DiscordVoiceGatewayOptions {
  /** Existing client; one with the voice intents is created when omitted */
  client?: Client;
  clientOptions?: ClientOptions;
  /** Used by start() when the client is not logged in yet */
  token?: string;
}

/**
 * VoiceGateway over a discord.js client: forwards the bot's raw voice packets
 * and sends voice state updates on the guild's shard.
 */
export class DiscordVoiceGateway implements VoiceGateway {
  readonly client: Client;
  private readonly token: string | undefined;
  private sink: VoiceEventSink | null = null;
  private readonly onRaw = (packet: unknown): void => {
    this.handlePacket(packet);
  };

  constructor(options: DiscordVoiceGatewayOptions = {}) {
    this.client =
      options.client ??
      new Client(
        options.clientOptions ?? {
          intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildVoiceStates],
        }
      );
    this.token = options.token;
  }

  async start(sink: VoiceEventSink): Promise<void> {
    if (this.sink) {
      this.sink = sink;
      return;
    }

    this.sink = sink;
    this.client.on('raw', this.onRaw);

    if (this.client.isReady()) {
      log.info(`Listening for voice packets as ${this.client.user.tag}`);
      return;
    }

    if (!this.token) {
      log.warn('Discord login skipped (no token)');
      return;
    }

    try {
      await this.client.login(this.token);
    } catch (error) {
      this.stop();
      throw new GatewayError(`Discord login failed: ${formatError(error).message}`);
    }
    log.info('Discord client logged in');
  }

  async updateVoiceState(
    guildId: Snowflake,
    channelId: Snowflake | null,
    options: VoiceStateOptions = {}
  ): Promise<void> {
    const guild = this.client.guilds.cache.get(guildId);
    if (!guild) {
      throw new GatewayError(`Guild ${guildId} is not available to the client`, { guildId });
    }

    guild.shard.send({
      op: GatewayOpcodes.VoiceStateUpdate,
      d: {
        guild_id: guildId,
        channel_id: channelId,
        self_mute: options.selfMute ?? false,
        self_deaf: options.selfDeaf ?? false,
      },
    });
    log.debug(
      channelId
        ? `Requested voice channel ${channelId} in guild ${guildId}`
        : `Requested voice disconnect in guild ${guildId}`
    );
  }

  stop(): void {
    this.client.off('raw', this.onRaw);
    this.sink = null;
  }

  private handlePacket(packet: unknown): void {
    const sink = this.sink;
    if (!sink) return;

    const type = packetTypeSchema.safeParse(packet);
    if (!type.success) return;

    if (type.data.t === GatewayDispatchEvents.VoiceStateUpdate) {
      const parsed = voiceStatePacketSchema.safeParse(packet);
      if (!parsed.success) {
        log.warn(`Dropping malformed voice state packet: ${parsed.error.message}`);
        return;
      }
      const { guild_id, user_id, session_id, channel_id } = parsed.data.d;
      sink.handleVoiceStateUpdate(guild_id, user_id, session_id, channel_id);
      return;
    }

    if (type.data.t === GatewayDispatchEvents.VoiceServerUpdate) {
      const parsed = voiceServerPacketSchema.safeParse(packet);
      if (!parsed.success) {
        log.warn(`Dropping malformed voice server packet: ${parsed.error.message}`);
        return;
      }
      const { guild_id, token, endpoint } = parsed.data.d;
      if (endpoint === null) {
        log.debug(`Voice server for guild ${guild_id} has no endpoint yet`);
        return;
      }
      sink.handleVoiceServerUpdate(guild_id, endpoint, token);
    }
  }
}
