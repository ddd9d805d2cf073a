import type { GameResultPayload } from '../../src/lib/api/schemas';
import type { Store } from '../../src/lib/database/connection';
import { NetworkError } from '../../src/lib/errors';
import { EventBus, EventTypes } from '../../src/services/eventBus';
import { ResultCache } from '../../src/services/resultCache';
import { ResultService } from '../../src/services/results/resultService';
import { parseSchedule } from '../../src/services/schedule/drawSchedule';
import {
  ResultPoller,
  type TaskScheduler,
} from '../../src/services/scheduler/resultPoller';
import type { ScheduleEntry } from '../../src/types/models';
import { createTestStore } from '../helpers/store';

const SCHEDULE = parseSchedule('Wed 20:30 America/Edmonton,Sat 20:30 America/Edmonton');

function payload(winningNumbers: number[]): GameResultPayload {
  return {
    winningNumbers,
    bonusNumber: null,
    totalCombinations: null,
    odds: {},
    userScore: null,
    winId: null,
    archivePassword: null,
    archiveChecksum: null,
  };
}

describe('Result Poller', () => {
  let db: Store;
  let results: ResultCache;
  let getGameResult: jest.Mock<Promise<GameResultPayload | null>, [string, string]>;
  let getNextDrawDate: jest.Mock<Promise<string | null>, [string, { forceRefresh?: boolean }?]>;
  let scheduleFor: jest.Mock<Promise<ScheduleEntry[]>, [string]>;
  let session: { isSignedIn: boolean; userId: number | null; authToken: string | null };
  let ticks: Array<() => void>;
  let stopTask: jest.Mock<void, []>;
  let bus: EventBus;
  let poller: ResultPoller;

  beforeEach(() => {
    db = createTestStore();
    results = new ResultCache(db);
    getGameResult = jest.fn<Promise<GameResultPayload | null>, [string, string]>();
    getNextDrawDate = jest
      .fn<Promise<string | null>, [string, { forceRefresh?: boolean }?]>()
      .mockResolvedValue('2024-06-08');
    scheduleFor = jest.fn<Promise<ScheduleEntry[]>, [string]>().mockResolvedValue(SCHEDULE);
    session = { isSignedIn: true, userId: 7, authToken: 'test-token' };
    ticks = [];
    stopTask = jest.fn<void, []>();
    bus = new EventBus();

    const scheduler: TaskScheduler = (_expression, task) => {
      ticks.push(task);
      return { stop: stopTask };
    };
    poller = new ResultPoller({
      drawInfo: { getNextDrawDate },
      results,
      resultService: new ResultService({ getGameResult }, results, bus),
      session,
      scheduleFor,
      cronExpression: '0 * * * *',
      scheduler,
      bus,
    });
  });

  afterEach(() => {
    poller.stop();
    db.close();
  });

  it('should stop as soon as the first check captures numbers', async () => {
    getGameResult.mockResolvedValue(payload([3, 11, 19, 27, 38, 45]));

    await poller.start('lotto649', '2024-06-05');

    expect(getGameResult).toHaveBeenCalledWith('lotto649', '2024-06-05');
    expect(getNextDrawDate).toHaveBeenCalledWith('lotto649', { forceRefresh: true });
    expect(poller.isRunning()).toBe(false);
    expect(stopTask).toHaveBeenCalledTimes(1);
    expect((await results.get('lotto649', '2024-06-05'))?.isNew).toBe(true);
    expect(bus.getHistory({ type: EventTypes.RESULTS_CAPTURED })).toHaveLength(1);
  });

  it('should keep polling until numbers are published', async () => {
    getGameResult.mockResolvedValue(payload([]));

    await poller.start('lotto649', '2024-06-05');
    expect(poller.isRunning()).toBe(true);

    getGameResult.mockResolvedValue(payload([3, 11, 19, 27, 38, 45]));
    expect(await poller.check()).toBe('stopped');
    expect(poller.isRunning()).toBe(false);
  });

  it('should schedule only one task while running', async () => {
    getGameResult.mockResolvedValue(payload([]));

    await poller.start('lotto649', '2024-06-05');
    await poller.start('lotto649', '2024-06-05');

    expect(ticks).toHaveLength(1);
    expect(poller.target).toEqual({ gameName: 'lotto649', lastDrawDate: '2024-06-05' });
  });

  it('should stop without a remote call when a new result is cached', async () => {
    await results.upsert({ gameName: 'lotto649', drawDate: '2024-06-05', ...payload([3, 11, 19, 27, 38, 45]) });

    await poller.start('lotto649', '2024-06-05');

    expect(getGameResult).not.toHaveBeenCalled();
    expect(poller.isRunning()).toBe(false);
  });

  it('should keep running when the cached result was already seen', async () => {
    await results.upsert({ gameName: 'lotto649', drawDate: '2024-06-05', ...payload([3, 11, 19, 27, 38, 45]) });
    await results.markSeen('lotto649', '2024-06-05');

    await poller.start('lotto649', '2024-06-05');

    expect(getGameResult).not.toHaveBeenCalled();
    expect(poller.isRunning()).toBe(true);
  });

  it('should follow the draw before the refreshed next draw', async () => {
    getNextDrawDate.mockResolvedValue('2024-06-12');
    getGameResult.mockResolvedValue(payload([]));

    await poller.start('lotto649', '2024-06-05');

    expect(getGameResult).toHaveBeenCalledWith('lotto649', '2024-06-08');
    expect(poller.target).toEqual({ gameName: 'lotto649', lastDrawDate: '2024-06-08' });
  });

  it('should keep running after a failed check', async () => {
    getGameResult.mockRejectedValue(new NetworkError('/game-result', new Error('socket hang up')));

    await poller.start('lotto649', '2024-06-05');

    expect(poller.isRunning()).toBe(true);
    expect(await poller.check()).toBe('continue');
    expect(console.error).toHaveBeenCalled();
  });

  it('should stop when the session has signed out', async () => {
    getGameResult.mockResolvedValue(payload([]));
    await poller.start('lotto649', '2024-06-05');
    session.isSignedIn = false;

    expect(await poller.check()).toBe('stopped');
    expect(poller.isRunning()).toBe(false);
  });

  it('should skip a tick while the previous check is still running', async () => {
    let release: (schedule: ScheduleEntry[]) => void = () => undefined;
    scheduleFor.mockImplementationOnce(
      () => new Promise<ScheduleEntry[]>((resolve) => {
        release = resolve;
      }),
    );
    getGameResult.mockResolvedValue(payload([]));

    const started = poller.start('lotto649', '2024-06-05');
    expect(await poller.check()).toBe('skipped');

    release(SCHEDULE);
    await started;
    expect(poller.isRunning()).toBe(true);
  });

  it('should run a check from the scheduled tick', async () => {
    getGameResult.mockResolvedValue(payload([]));
    await poller.start('lotto649', '2024-06-05');
    getGameResult.mockResolvedValue(payload([3, 11, 19, 27, 38, 45]));

    ticks[0]();
    await new Promise((resolve) => setImmediate(resolve));

    expect(poller.isRunning()).toBe(false);
  });

  it('should publish start and stop once each', async () => {
    getGameResult.mockResolvedValue(payload([]));
    await poller.start('lotto649', '2024-06-05');

    poller.stop();
    poller.stop();

    expect(stopTask).toHaveBeenCalledTimes(1);
    expect(bus.getStats().eventTypes).toEqual({
      [EventTypes.POLLER_STARTED]: 1,
      [EventTypes.POLLER_STOPPED]: 1,
    });
  });
});
