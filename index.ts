/**
 * guild-voice-coordinator
 *
 * Per-guild voice sessions for a Discord music bot over a Lavalink node.
 */
export * from './utils/voice';
export * from './components';
export * from './utils/errors';
export { createLogger, sanitizeLogMessage } from './utils/logger';
export { loadConfig, resetConfigCache, type AppConfig } from './utils/config';
export type * from './types/voice';
export type * from './types/events';
export type * from './types/services';
