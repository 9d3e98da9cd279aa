import type { Logger } from '../../types/services';

export type CoordinatorErrorCode =
  | 'TIMEOUT'
  | 'MISSING_FIELD'
  | 'NO_SESSION'
  | 'NETWORK_ERROR'
  | 'UNDEFINED_EVENT'
  | 'INVALID_ARGUMENT'
  | 'GATEWAY_ERROR';

/**
 * Shared error base for everything the coordinator rejects with.
 */
export class CoordinatorError extends Error {
  constructor(
    message: string,
    public readonly code: CoordinatorErrorCode,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CoordinatorError';
    Object.setPrototypeOf(this, CoordinatorError.prototype);
  }

  toJSON(): { error: string; code: CoordinatorErrorCode; details?: Record<string, unknown> } {
    return {
      error: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
    };
  }
}

/** Connection info assembly or removal exceeded its event-count bound */
export class TimeoutError extends CoordinatorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TIMEOUT', details);
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/** Session creation attempted with an incomplete ConnectionInfo */
export class MissingFieldError extends CoordinatorError {
  constructor(public readonly field: string) {
    super(`Missing field '${field}'`, 'MISSING_FIELD', { field });
    this.name = 'MissingFieldError';
    Object.setPrototypeOf(this, MissingFieldError.prototype);
  }
}

/** Play or queue attempted before a session was created for the guild */
export class NoSessionError extends CoordinatorError {
  constructor(guildId: string) {
    super(`No session present for guild ${guildId}`, 'NO_SESSION', { guildId });
    this.name = 'NoSessionError';
    Object.setPrototypeOf(this, NoSessionError.prototype);
  }
}

/** A request to the audio node failed */
export class NetworkError extends CoordinatorError {
  constructor(message: string, cause?: unknown, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details, { cause });
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/** The handler has no method for an incoming event. Logged, never thrown to callers */
export class UndefinedEventError extends CoordinatorError {
  constructor(public readonly eventName: string) {
    super(`Undefined event: ${eventName}`, 'UNDEFINED_EVENT', { eventName });
    this.name = 'UndefinedEventError';
    Object.setPrototypeOf(this, UndefinedEventError.prototype);
  }
}

export class InvalidArgumentError extends CoordinatorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_ARGUMENT', details);
    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

/** The voice gateway is missing or cannot reach the guild */
export class GatewayError extends CoordinatorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'GATEWAY_ERROR', details);
    this.name = 'GatewayError';
    Object.setPrototypeOf(this, GatewayError.prototype);
  }
}

/** Causes followed before formatError stops walking the chain */
const MAX_CAUSE_DEPTH = 5;

export interface FormattedError {
  /** Message of the error and of each distinct cause, joined with ': ' */
  message: string;
  stack?: string;
  code?: CoordinatorErrorCode;
  details?: Record<string, unknown>;
}

function causeMessages(err: Error): string[] {
  const messages: string[] = [];
  let previous = err.message;
  let cause: unknown = err.cause;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH && cause !== undefined; depth++) {
    if (typeof cause === 'string') {
      messages.push(cause);
      break;
    }
    if (!(cause instanceof Error)) break;
    if (cause.message && cause.message !== previous) {
      messages.push(cause.message);
      previous = cause.message;
    }
    cause = cause.cause;
  }
  return messages;
}

/**
 * Format an error for logs. Coordinator errors are prefixed with their code
 * and keep their details; the cause chain is appended to the message
 * (e.g. "[NETWORK_ERROR] Request to /loadtracks failed: socket hang up").
 */
export function formatError(err: unknown): FormattedError {
  if (!(err instanceof Error)) {
    return { message: String(err) };
  }

  const text = [err.message, ...causeMessages(err)].join(': ');
  if (err instanceof CoordinatorError) {
    return {
      message: `[${err.code}] ${text}`,
      stack: err.stack,
      code: err.code,
      ...(err.details && { details: err.details }),
    };
  }
  return { message: text, stack: err.stack };
}

/**
 * Log an error at error level, with its code and details as metadata, and
 * its stack trace at debug level
 */
export function logErrorWithStack(logger: Logger, message: string, err: unknown): void {
  const info = formatError(err);
  const line = `${message}: ${info.message}`;
  if (info.code) {
    logger.error(line, { code: info.code, ...(info.details && { details: info.details }) });
  } else {
    logger.error(line);
  }
  if (info.stack) {
    logger.debug(info.stack);
  }
}
