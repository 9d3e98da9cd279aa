/**
 * Voice coordinator constants
 */

/** Events a guild may receive before a connection info wait times out */
export const DEFAULT_CONNECTION_EVENT_LIMIT = 10;

/** Number of equalizer bands on the audio node */
export const EQUALIZER_BAND_COUNT = 15;

export const MIN_BAND_GAIN = -0.25;
export const MAX_BAND_GAIN = 1.0;

export const DEFAULT_VOLUME = 100;
export const MAX_VOLUME = 1000;

/** Finish reason sent when a play command replaced the running track */
export const REPLACED_FINISH_REASON = 'REPLACED';

/** Finish reasons that move the queue on; STOPPED and CLEANUP leave it waiting */
export const ADVANCING_FINISH_REASONS: ReadonlySet<string> = new Set(['FINISHED', 'LOAD_FAILED']);

/** Readers allowed to hold a node data slot at the same time */
export const NODE_DATA_MAX_READERS = 64;

/** Delay between audio node reconnect attempts */
export const NODE_RECONNECT_DELAY_MS = 5_000;

/** Reconnect attempts before the audio node socket gives up */
export const NODE_RECONNECT_MAX_TRIES = 5;

export default {
  DEFAULT_CONNECTION_EVENT_LIMIT,
  EQUALIZER_BAND_COUNT,
  MIN_BAND_GAIN,
  MAX_BAND_GAIN,
  DEFAULT_VOLUME,
  MAX_VOLUME,
  REPLACED_FINISH_REASON,
  ADVANCING_FINISH_REASONS,
  NODE_DATA_MAX_READERS,
  NODE_RECONNECT_DELAY_MS,
  NODE_RECONNECT_MAX_TRIES,
};
