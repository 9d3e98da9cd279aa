/**
 * Tests for the play builder
 */

import { PlayBuilder, type PlaybackTarget } from '../../components/builders/playBuilder';
import { InvalidArgumentError } from '../../utils/errors';
import type { Snowflake, TrackQueue } from '../../types/voice';

const GUILD = '100';
const TRACK = { track: 'encoded-track' };

describe('PlayBuilder', () => {
  let startNow: jest.Mock<Promise<void>, [Snowflake, TrackQueue, boolean]>;
  let enqueue: jest.Mock<Promise<void>, [Snowflake, TrackQueue]>;
  let target: PlaybackTarget;

  beforeEach(() => {
    startNow = jest.fn<Promise<void>, [Snowflake, TrackQueue, boolean]>().mockResolvedValue(undefined);
    enqueue = jest.fn<Promise<void>, [Snowflake, TrackQueue]>().mockResolvedValue(undefined);
    target = { startNow, enqueue };
  });

  describe('toTrackQueue', () => {
    it('plays from the start to the natural end by default', () => {
      const entry = new PlayBuilder(target, GUILD, TRACK).toTrackQueue();

      expect(entry).toEqual({ track: TRACK, startTime: 0 });
      expect('endTime' in entry).toBe(false);
    });

    it('maps a zero finish time to no end time', () => {
      const entry = new PlayBuilder(target, GUILD, TRACK)
        .startTimeMillis(250)
        .finishTimeMillis(0)
        .toTrackQueue();

      expect(entry).toEqual({ track: TRACK, startTime: 250 });
      expect(entry.endTime).toBeUndefined();
    });

    it('converts seconds to milliseconds', () => {
      const entry = new PlayBuilder(target, GUILD, TRACK)
        .startTimeSecs(3)
        .finishTimeSecs(90)
        .requester('7')
        .toTrackQueue();

      expect(entry).toEqual({ track: TRACK, startTime: 3000, endTime: 90000, requester: '7' });
    });

    it('freezes the entry', () => {
      const entry = new PlayBuilder(target, GUILD, TRACK).toTrackQueue();

      expect(Object.isFrozen(entry)).toBe(true);
    });

    it('rejects negative and fractional offsets', () => {
      const builder = new PlayBuilder(target, GUILD, TRACK);

      expect(() => builder.startTimeMillis(-1)).toThrow(InvalidArgumentError);
      expect(() => builder.finishTimeSecs(1.5)).toThrow(
        'finishTime must be a non-negative integer, got 1.5'
      );
    });
  });

  describe('start', () => {
    it('plays now without replacing by default', async () => {
      await new PlayBuilder(target, GUILD, TRACK).start();

      expect(startNow).toHaveBeenCalledWith(GUILD, { track: TRACK, startTime: 0 }, false);
      expect(enqueue).not.toHaveBeenCalled();
    });

    it('passes the replace flag', async () => {
      await new PlayBuilder(target, GUILD, TRACK).replace(true).start();

      expect(startNow).toHaveBeenCalledWith(GUILD, { track: TRACK, startTime: 0 }, true);
    });
  });

  describe('queue', () => {
    it('appends the entry to the guild queue', async () => {
      await new PlayBuilder(target, GUILD, TRACK).requester('7').startTimeMillis(10).queue();

      expect(enqueue).toHaveBeenCalledWith(GUILD, { track: TRACK, startTime: 10, requester: '7' });
      expect(startNow).not.toHaveBeenCalled();
    });

    it('propagates rejections from the target', async () => {
      enqueue.mockRejectedValueOnce(new Error('No session present for guild 100'));

      await expect(new PlayBuilder(target, GUILD, TRACK).queue()).rejects.toThrow(
        'No session present for guild 100'
      );
    });
  });
});
