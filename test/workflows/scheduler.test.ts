import { describe, it, expect, vi, afterEach } from 'vitest';
import type { Cron } from 'croner';
import { dailyPattern, startDailySchedule } from '../../src/workflows/scheduler.js';

const HOUR = 60 * 60 * 1000;

let schedule: Cron | undefined;

afterEach(() => {
  schedule?.stop();
  schedule = undefined;
  vi.useRealTimers();
});

describe('dailyPattern', () => {
  it('fires on the hour every day', () => {
    expect(dailyPattern(10)).toBe('0 10 * * *');
  });
});

describe('startDailySchedule', () => {
  it('plans the next run later today', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2026, 9, 19, 8, 30));

    schedule = startDailySchedule(10, async () => {});

    expect(schedule.nextRun()).toEqual(new Date(2026, 9, 19, 10, 0));
  });

  it('rolls over to tomorrow once the hour has passed', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2026, 9, 19, 11, 0));

    schedule = startDailySchedule(10, async () => {});

    expect(schedule.nextRun()).toEqual(new Date(2026, 9, 20, 10, 0));
  });

  it('runs the task when the hour comes', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2026, 9, 19, 9, 0));
    const task = vi.fn(async () => {});

    schedule = startDailySchedule(10, task);
    await vi.advanceTimersByTimeAsync(HOUR + 1000);

    expect(task).toHaveBeenCalledTimes(1);
  });

  it('keeps the schedule after a failed run', async () => {
    const task = vi.fn(async () => {
      throw new Error('offers unavailable');
    });

    schedule = startDailySchedule(10, task);
    await schedule.trigger();

    expect(task).toHaveBeenCalledTimes(1);
    expect(schedule.isStopped()).toBe(false);
    expect(schedule.nextRun()).not.toBeNull();
  });

  it('plans nothing after stop()', () => {
    schedule = startDailySchedule(10, async () => {});
    schedule.stop();

    expect(schedule.nextRun()).toBeNull();
  });
});
