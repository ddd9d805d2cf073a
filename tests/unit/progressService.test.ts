import type { Store } from '../../src/lib/database/connection';
import { ProgressService } from '../../src/services/progressService';
import { createTestStore } from '../helpers/store';

describe('Progress Service', () => {
  let db: Store;
  let progress: ProgressService;

  beforeEach(() => {
    db = createTestStore();
    progress = new ProgressService(db);
  });

  afterEach(() => {
    db.close();
  });

  it('should store and read back a profile', async () => {
    await progress.upsertProfile({
      userId: 7,
      membershipLevel: 'gold',
      globalAwards: ['first-lock'],
      globalStatistics: { locks: 1 },
    });

    expect(await progress.getProfile(7)).toMatchObject({
      userId: 7,
      membershipLevel: 'gold',
      globalAwards: ['first-lock'],
      globalStatistics: { locks: 1 },
    });
    expect(await progress.getProfile(8)).toBeNull();
  });

  it('should accumulate score and merge awards and statistics', async () => {
    await progress.recordProgress(7, 'lotto649', {
      scoreDelta: 10,
      awards: ['streak-3'],
      statistics: { draws: 1, best: 3 },
      membershipLevel: 'silver',
      playedAt: '2024-06-05T03:00:00.000Z',
    });

    const updated = await progress.recordProgress(7, 'lotto649', {
      scoreDelta: 5,
      awards: ['streak-3', 'jackpot-near-miss'],
      statistics: { draws: 2 },
      playedAt: '2024-06-09T03:00:00.000Z',
    });

    expect(updated).toEqual({
      userId: 7,
      gameName: 'lotto649',
      score: 15,
      awards: ['streak-3', 'jackpot-near-miss'],
      statistics: { draws: 2, best: 3 },
      membershipLevel: 'silver',
      lastPlayed: '2024-06-09T03:00:00.000Z',
    });
    expect(await progress.getProgress(7, 'lotto649')).toEqual(updated);
  });

  it('should list per-game progress and total the score', async () => {
    await progress.recordProgress(7, 'lotto649', { scoreDelta: 10 });
    await progress.recordProgress(7, 'DailyGrand', { scoreDelta: 4 });
    await progress.recordProgress(8, 'lotto649', { scoreDelta: 100 });

    const listed = await progress.listProgress(7);
    expect(listed.map((row) => row.gameName)).toEqual(['DailyGrand', 'lotto649']);
    expect(await progress.totalScore(7)).toBe(14);
    expect(await progress.totalScore(9)).toBe(0);
  });
});
