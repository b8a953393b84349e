import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PollScheduler } from '../../src/services/pollScheduler.js';
import type { CycleResult } from '../../src/services/updateCycle.js';
import type { Snapshot } from '../../src/types/match.js';
import { SETTINGS } from '../helpers/fixtures.js';

function snapshot(fetchedAt: string): Snapshot {
  return {
    team_path: '/schedule',
    source_url: 'https://club.example.org/schedule',
    fetched_at: fetchedAt,
    live: null,
    upcoming: [],
    finished: [],
    last_finished_with_score: null,
    debug: {
      parse_mode: 'href',
      links_found: 0,
      matches_found: 0,
      has_item_path: false,
      has_uuid: false,
      html_head: '',
      detail_targets: [],
      detail_failures: 0,
      cache_size: 0
    }
  };
}

function result(fetchedAt: string, nextIntervalSeconds = 600): CycleResult {
  return { snapshot: snapshot(fetchedAt), nextIntervalSeconds };
}

// Settles pending promise callbacks; setImmediate is left unfaked
const flush = () => new Promise<void>(resolve => setImmediate(resolve));

async function advance(ms: number): Promise<void> {
  await vi.advanceTimersByTimeAsync(ms);
  await flush();
}

describe('PollScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should run the first cycle immediately and then wait the returned interval', async () => {
    const run = vi.fn(async () => result('2025-03-01T12:00:00.000Z'));
    const scheduler = new PollScheduler({ cycle: { run }, settings: () => SETTINGS });

    scheduler.start();
    await advance(0);
    expect(run).toHaveBeenCalledTimes(1);
    expect(scheduler.latestSnapshot?.fetched_at).toBe('2025-03-01T12:00:00.000Z');

    await advance(599_999);
    expect(run).toHaveBeenCalledTimes(1);

    await advance(1);
    expect(run).toHaveBeenCalledTimes(2);

    await scheduler.stop();
  });

  it('should use the short interval a live cycle asks for', async () => {
    const run = vi.fn(async () => result('2025-03-01T12:00:00.000Z', 20));
    const scheduler = new PollScheduler({ cycle: { run }, settings: () => SETTINGS });

    scheduler.start();
    await advance(0);
    await advance(20_000);
    expect(run).toHaveBeenCalledTimes(2);

    await scheduler.stop();
  });

  it('should keep the last snapshot and retry after the normal interval when a cycle fails', async () => {
    const run = vi.fn<() => Promise<CycleResult>>()
      .mockResolvedValueOnce(result('2025-03-01T12:00:00.000Z', 20))
      .mockRejectedValueOnce(new Error('schedule unavailable'))
      .mockResolvedValue(result('2025-03-01T12:10:20.000Z'));
    const scheduler = new PollScheduler({ cycle: { run }, settings: () => SETTINGS });

    scheduler.start();
    await advance(0);
    await advance(20_000);
    expect(run).toHaveBeenCalledTimes(2);
    expect(scheduler.latestSnapshot?.fetched_at).toBe('2025-03-01T12:00:00.000Z');

    await advance(600_000);
    expect(run).toHaveBeenCalledTimes(3);
    expect(scheduler.latestSnapshot?.fetched_at).toBe('2025-03-01T12:10:20.000Z');

    await scheduler.stop();
  });

  it('should wait for an in-flight cycle on stop and schedule nothing after it', async () => {
    let finish: (value: CycleResult) => void = () => undefined;
    const run = vi.fn(() => new Promise<CycleResult>(resolve => { finish = resolve; }));
    const scheduler = new PollScheduler({ cycle: { run }, settings: () => SETTINGS });

    scheduler.start();
    await advance(0);
    expect(run).toHaveBeenCalledTimes(1);

    let stopped = false;
    const stopping = scheduler.stop().then(() => { stopped = true; });
    await flush();
    expect(stopped).toBe(false);

    finish(result('2025-03-01T12:00:00.000Z'));
    await stopping;
    expect(scheduler.isRunning).toBe(false);
    expect(scheduler.latestSnapshot?.fetched_at).toBe('2025-03-01T12:00:00.000Z');

    await advance(3_600_000);
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('should not overlap cycles when restarted while a cycle is in flight', async () => {
    const pending: Array<(value: CycleResult) => void> = [];
    let active = 0;
    let maxActive = 0;
    const run = vi.fn(() => new Promise<CycleResult>(resolve => {
      active++;
      maxActive = Math.max(maxActive, active);
      pending.push(value => {
        active--;
        resolve(value);
      });
    }));
    const scheduler = new PollScheduler({ cycle: { run }, settings: () => SETTINGS });

    scheduler.start();
    await advance(0);
    const stopping = scheduler.stop();
    scheduler.start();
    await advance(0);
    expect(run).toHaveBeenCalledTimes(1);

    pending[0](result('2025-03-01T12:00:00.000Z'));
    await stopping;
    await flush();
    await advance(0);
    expect(run).toHaveBeenCalledTimes(2);

    pending[1](result('2025-03-01T12:01:00.000Z'));
    await flush();
    await advance(600_000);
    expect(run).toHaveBeenCalledTimes(3);
    expect(maxActive).toBe(1);

    const final = scheduler.stop();
    pending[2](result('2025-03-01T12:11:00.000Z'));
    await final;
    await advance(3_600_000);
    expect(run).toHaveBeenCalledTimes(3);
  });

  it('should hand each snapshot to the listener and survive listener errors', async () => {
    const run = vi.fn(async () => result('2025-03-01T12:00:00.000Z'));
    const onSnapshot = vi.fn(async () => { throw new Error('broker down'); });
    const scheduler = new PollScheduler({ cycle: { run }, settings: () => SETTINGS, onSnapshot });

    scheduler.start();
    await advance(0);
    expect(onSnapshot).toHaveBeenCalledWith(snapshot('2025-03-01T12:00:00.000Z'));

    await advance(600_000);
    expect(run).toHaveBeenCalledTimes(2);
    expect(onSnapshot).toHaveBeenCalledTimes(2);

    await scheduler.stop();
  });
});
