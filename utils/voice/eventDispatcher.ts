/**
 * Event Dispatcher - hands backend events to the application's handler.
 *
 * Every dispatch is its own unit of work on the scheduler, started in the
 * order events arrived. Nothing waits on a handler, and a handler that
 * throws only affects its own event.
 */
import { createLogger } from '../logger';
import { UndefinedEventError, logErrorWithStack } from '../errors';
import type { Scheduler } from '../../types/services';
import type {
  BackendEvent,
  BackendEventType,
  EventCallback,
  VoiceEventHandler,
} from '../../types/events';
import type { VoiceCoordinator } from './voiceCoordinator';

const log = createLogger('EVENTS');

export type ErrorReporter = (eventType: BackendEventType, error: unknown) => void;

export interface EventDispatcherOptions {
  scheduler?: Scheduler;
  reportError?: ErrorReporter;
}

type Invocation<TData> = (coordinator: VoiceCoordinator<TData>) => unknown;

function bind<TData, E>(
  handler: VoiceEventHandler<TData>,
  method: EventCallback<TData, E> | undefined,
  event: E
): Invocation<TData> | undefined {
  if (typeof method !== 'function') return undefined;
  return (coordinator) => method.call(handler, coordinator, event);
}

export const defaultScheduler: Scheduler = (task) => {
  setImmediate(task);
};

const defaultReportError: ErrorReporter = (eventType, error) => {
  logErrorWithStack(log, `Handler for ${eventType} failed`, error);
};

export class EventDispatcher<TData> {
  private readonly scheduler: Scheduler;
  private readonly reportError: ErrorReporter;
  private inFlight = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly handler: VoiceEventHandler<TData>,
    options: EventDispatcherOptions = {}
  ) {
    this.scheduler = options.scheduler ?? defaultScheduler;
    this.reportError = options.reportError ?? defaultReportError;
  }

  /** Dispatches submitted and not yet settled */
  get pending(): number {
    return this.inFlight;
  }

  /**
   * Submit the event to the scheduler and return at once.
   */
  dispatch(coordinator: VoiceCoordinator<TData>, event: BackendEvent): void {
    const invocation = this.lookup(event);
    if (!invocation) {
      const error = new UndefinedEventError(event.type);
      log.debug(error.message);
      return;
    }

    this.inFlight += 1;
    try {
      this.scheduler(() => {
        void this.run(invocation, coordinator).then((outcome) => {
          this.settle();
          if (!outcome.ok) {
            this.report(event.type, outcome.error);
          }
        });
      });
    } catch (error) {
      // The task never ran
      this.settle();
      this.report(event.type, error);
    }
  }

  /**
   * Resolves once every submitted dispatch has settled.
   */
  idle(): Promise<void> {
    if (this.inFlight === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private lookup(event: BackendEvent): Invocation<TData> | undefined {
    const handler = this.handler;
    switch (event.type) {
      case 'stats':
        return bind(handler, handler.stats, event);
      case 'playerUpdate':
        return bind(handler, handler.playerUpdate, event);
      case 'trackStart':
        return bind(handler, handler.trackStart, event);
      case 'trackFinish':
        return bind(handler, handler.trackFinish, event);
      case 'trackException':
        return bind(handler, handler.trackException, event);
      case 'trackStuck':
        return bind(handler, handler.trackStuck, event);
      case 'websocketClosed':
        return bind(handler, handler.websocketClosed, event);
      case 'playerDestroyed':
        return bind(handler, handler.playerDestroyed, event);
    }
  }

  /** Failures become values */
  private async run(
    invocation: Invocation<TData>,
    coordinator: VoiceCoordinator<TData>
  ): Promise<{ ok: true } | { ok: false; error: unknown }> {
    try {
      await invocation(coordinator);
      return { ok: true };
    } catch (error) {
      return { ok: false, error };
    }
  }

  /** Hand a failure to the reporter; a failing reporter falls back to the log */
  private report(eventType: BackendEventType, error: unknown): void {
    try {
      this.reportError(eventType, error);
    } catch (reporterError) {
      logErrorWithStack(log, `Error reporter failed for ${eventType}`, reporterError);
      defaultReportError(eventType, error);
    }
  }

  private settle(): void {
    this.inFlight -= 1;
    if (this.inFlight > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
