import { z } from 'zod';
import { createLogger } from './logger';

const log = createLogger('CONFIG');

// Cache the config so we only load/log once
let cachedConfig: AppConfig | null = null;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  DISCORD_BOT_TOKEN: z.string().min(1).optional(),
  DISCORD_CLIENT_ID: z.string().regex(/^\d+$/, 'must be a snowflake').optional(),
  LAVALINK_HOST: z.string().min(1).default('127.0.0.1'),
  LAVALINK_PORT: z.coerce.number().int().min(1).max(65535).default(2333),
  LAVALINK_PASSWORD: z.string().default('youshallnotpass'),
  LAVALINK_SSL: booleanFlag.default('false'),
  SHARD_COUNT: z.coerce.number().int().min(1).default(1),
  GATEWAY_START_DELAY_MS: z.coerce.number().int().min(0).default(0),
  CONNECTION_EVENT_LIMIT: z.coerce.number().int().min(1).default(10),
});

export interface AppConfig {
  // Bot configuration
  token: string | undefined;
  botId: string | undefined;

  // Audio node configuration
  lavalinkHost: string;
  lavalinkPort: number;
  lavalinkPassword: string;
  lavalinkSsl: boolean;

  // Gateway configuration
  shardCount: number;
  gatewayStartDelayMs: number;
  connectionEventLimit: number;
}

const SECRET_KEYS = new Set(['DISCORD_BOT_TOKEN', 'LAVALINK_PASSWORD']);

function mask(value: string): string {
  if (value.length <= 8) return '****';
  return `${value.substring(0, 4)}...${value.substring(value.length - 4)}`;
}

/**
 * Load configuration from environment variables.
 * Results are cached to avoid duplicate logging.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const knownKeys = Object.keys(envSchema.shape);
  const present = knownKeys.filter((key) => env[key] !== undefined && env[key] !== '');
  if (present.length > 0) {
    log.info(`Found ${present.length} relevant environment variables: ${present.join(', ')}`);
    for (const key of present) {
      const value = env[key] ?? '';
      log.debug(`  ${key}=${SECRET_KEYS.has(key) ? mask(value) : value}`);
    }
  } else {
    log.warn('No relevant environment variables found, using defaults');
  }

  const raw = Object.fromEntries(present.map((key) => [key, env[key]]));
  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    log.error(`Invalid configuration: ${problems.join('; ')}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }

  const values = parsed.data;
  const config: AppConfig = {
    token: values.DISCORD_BOT_TOKEN,
    botId: values.DISCORD_CLIENT_ID,
    lavalinkHost: values.LAVALINK_HOST,
    lavalinkPort: values.LAVALINK_PORT,
    lavalinkPassword: values.LAVALINK_PASSWORD,
    lavalinkSsl: values.LAVALINK_SSL,
    shardCount: values.SHARD_COUNT,
    gatewayStartDelayMs: values.GATEWAY_START_DELAY_MS,
    connectionEventLimit: values.CONNECTION_EVENT_LIMIT,
  };

  const missing: string[] = [];
  if (!config.token) missing.push('DISCORD_BOT_TOKEN');
  if (!config.botId) missing.push('DISCORD_CLIENT_ID');
  if (missing.length > 0) {
    log.warn(`Missing required configuration: ${missing.join(', ')}`);
  }

  cachedConfig = config;
  return config;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
