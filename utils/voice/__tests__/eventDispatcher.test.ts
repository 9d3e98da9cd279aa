import { EventDispatcher, type EventDispatcherOptions } from '../eventDispatcher';
import type { VoiceCoordinator } from '../voiceCoordinator';
import type {
  BackendEvent,
  TrackFinishEvent,
  TrackStartEvent,
  VoiceEventHandler,
} from '../../../types/events';

const coordinator = {} as unknown as VoiceCoordinator;

const createDispatcher = (handler: VoiceEventHandler, options?: EventDispatcherOptions) =>
  new EventDispatcher(handler, options);

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

const start = (track: string): TrackStartEvent => ({ type: 'trackStart', guildId: '1', track });
const finish = (track: string): TrackFinishEvent => ({
  type: 'trackFinish',
  guildId: '1',
  track,
  reason: 'FINISHED',
});

describe('EventDispatcher', () => {
  it('calls handlers in emission order', async () => {
    const seen: string[] = [];
    const dispatcher = createDispatcher({
      trackStart: (_coordinator, event) => {
        seen.push(`start:${event.track}`);
      },
      trackFinish: (_coordinator, event) => {
        seen.push(`finish:${event.track}`);
      },
    });

    dispatcher.dispatch(coordinator, start('a'));
    dispatcher.dispatch(coordinator, finish('a'));
    dispatcher.dispatch(coordinator, start('b'));
    await dispatcher.idle();

    expect(seen).toEqual(['start:a', 'finish:a', 'start:b']);
    expect(dispatcher.pending).toBe(0);
  });

  it('does not run handlers inside dispatch', () => {
    const trackStart = jest.fn();
    const tasks: Array<() => void> = [];
    const dispatcher = createDispatcher({ trackStart }, { scheduler: (task) => tasks.push(task) });

    dispatcher.dispatch(coordinator, start('a'));

    expect(trackStart).not.toHaveBeenCalled();
    expect(tasks).toHaveLength(1);
    expect(dispatcher.pending).toBe(1);
  });

  it('does not let a slow handler hold back later events', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const seen: string[] = [];
    const tasks: Array<() => void> = [];
    const dispatcher = createDispatcher(
      {
        trackStart: async (_coordinator, event) => {
          await gate;
          seen.push(`start:${event.track}`);
        },
        trackFinish: (_coordinator, event) => {
          seen.push(`finish:${event.track}`);
        },
      },
      { scheduler: (task) => tasks.push(task) }
    );

    dispatcher.dispatch(coordinator, start('a'));
    dispatcher.dispatch(coordinator, finish('a'));
    tasks.forEach((task) => task());
    await flush();

    expect(seen).toEqual(['finish:a']);
    expect(dispatcher.pending).toBe(1);

    release();
    await dispatcher.idle();

    expect(seen).toEqual(['finish:a', 'start:a']);
  });

  it('skips events without a handler method', async () => {
    const reportError = jest.fn();
    const tasks: Array<() => void> = [];
    const dispatcher = createDispatcher({}, { reportError, scheduler: (task) => tasks.push(task) });
    const stats: BackendEvent = {
      type: 'stats',
      players: 1,
      playingPlayers: 0,
      uptime: 1000,
      memory: { free: 1, used: 1, allocated: 2, reservable: 4 },
      cpu: { cores: 2, systemLoad: 0.1, lavalinkLoad: 0.05 },
    };

    dispatcher.dispatch(coordinator, stats);
    await dispatcher.idle();

    expect(tasks).toHaveLength(0);
    expect(reportError).not.toHaveBeenCalled();
  });

  it('reports a failing handler and keeps dispatching', async () => {
    const reportError = jest.fn();
    const failure = new Error('handler broke');
    const trackFinish = jest.fn();
    const dispatcher = createDispatcher(
      {
        trackStart: () => {
          throw failure;
        },
        trackFinish,
      },
      { reportError }
    );

    dispatcher.dispatch(coordinator, start('a'));
    dispatcher.dispatch(coordinator, finish('a'));
    await dispatcher.idle();

    expect(reportError).toHaveBeenCalledTimes(1);
    expect(reportError).toHaveBeenCalledWith('trackStart', failure);
    expect(trackFinish).toHaveBeenCalledWith(coordinator, finish('a'));
  });

  it('reports a rejecting handler', async () => {
    const reportError = jest.fn();
    const dispatcher = createDispatcher(
      {
        trackStart: async () => {
          throw new Error('later');
        },
      },
      { reportError }
    );

    dispatcher.dispatch(coordinator, start('a'));
    await dispatcher.idle();

    expect(reportError).toHaveBeenCalledWith('trackStart', new Error('later'));
  });

  it('settles and reports a dispatch the scheduler refused', async () => {
    const reportError = jest.fn();
    const trackStart = jest.fn();
    const failure = new Error('scheduler closed');
    let refuse = true;
    const dispatcher = createDispatcher(
      { trackStart },
      {
        reportError,
        scheduler: (task) => {
          if (refuse) throw failure;
          setImmediate(task);
        },
      }
    );

    dispatcher.dispatch(coordinator, start('a'));

    expect(dispatcher.pending).toBe(0);
    expect(reportError).toHaveBeenCalledWith('trackStart', failure);

    refuse = false;
    dispatcher.dispatch(coordinator, start('b'));
    await dispatcher.idle();

    expect(trackStart).toHaveBeenCalledTimes(1);
    expect(trackStart).toHaveBeenCalledWith(coordinator, start('b'));
  });

  it('keeps dispatching when the error reporter throws', async () => {
    const reportError = jest.fn(() => {
      throw new Error('reporter broke');
    });
    const trackFinish = jest.fn();
    const dispatcher = createDispatcher(
      {
        trackStart: () => {
          throw new Error('handler broke');
        },
        trackFinish,
      },
      { reportError }
    );

    dispatcher.dispatch(coordinator, start('a'));
    await dispatcher.idle();
    dispatcher.dispatch(coordinator, finish('a'));
    await dispatcher.idle();

    expect(reportError).toHaveBeenCalledTimes(1);
    expect(trackFinish).toHaveBeenCalledWith(coordinator, finish('a'));
    expect(dispatcher.pending).toBe(0);
  });

  it('calls handler methods on the handler object', async () => {
    class Recorder implements VoiceEventHandler {
      readonly tracks: string[] = [];

      trackStart(_coordinator: VoiceCoordinator, event: TrackStartEvent): void {
        this.tracks.push(event.track);
      }
    }
    const recorder = new Recorder();
    const dispatcher = createDispatcher(recorder);

    dispatcher.dispatch(coordinator, start('a'));
    await dispatcher.idle();

    expect(recorder.tracks).toEqual(['a']);
  });
});
