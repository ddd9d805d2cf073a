import type { Store } from '../../src/lib/database/connection';
import { ResultCache } from '../../src/services/resultCache';
import type { CachedResultInput } from '../../src/types/models';
import { createTestStore } from '../helpers/store';

function result(drawDate: string, winningNumbers: number[], gameName = 'lotto649'): CachedResultInput {
  return {
    gameName,
    drawDate,
    winningNumbers,
    bonusNumber: winningNumbers.length > 0 ? 44 : null,
    totalCombinations: 13983816,
    odds: { '6/6': 13983816, '3/6': 56.7 },
    userScore: null,
    winId: null,
    archivePassword: null,
    archiveChecksum: null,
  };
}

describe('Result Cache', () => {
  let db: Store;
  let cache: ResultCache;

  beforeEach(() => {
    db = createTestStore();
    cache = new ResultCache(db);
  });

  afterEach(() => {
    db.close();
  });

  it('should flag a result with numbers as new', async () => {
    const stored = await cache.upsert(result('2024-06-05', [3, 11, 19, 27, 38, 45]));

    expect(stored.isNew).toBe(true);
    expect(await cache.get('lotto649', '2024-06-05')).toMatchObject({
      winningNumbers: [3, 11, 19, 27, 38, 45],
      bonusNumber: 44,
      odds: { '6/6': 13983816, '3/6': 56.7 },
      isNew: true,
    });
  });

  it('should never flag an empty result as new', async () => {
    const stored = await cache.upsert(result('2024-06-08', []));

    expect(stored.isNew).toBe(false);
    expect(await cache.anyUnseenAcrossAllGames()).toBe(false);
  });

  it('should clear the new flag exactly once', async () => {
    await cache.upsert(result('2024-06-05', [3, 11, 19, 27, 38, 45]));

    expect(await cache.markSeen('lotto649', '2024-06-05')).toBe(1);
    expect(await cache.markSeen('lotto649', '2024-06-05')).toBe(0);
    expect((await cache.get('lotto649', '2024-06-05'))?.isNew).toBe(false);
  });

  it('should report nothing changed for an absent row', async () => {
    expect(await cache.markSeen('lotto649', '2024-06-05')).toBe(0);
  });

  it('should see unseen results in any game', async () => {
    await cache.upsert(result('2024-06-05', [3, 11, 19, 27, 38, 45]));
    await cache.upsert(result('2024-06-04', [1, 2, 3, 4, 5, 6, 7], 'LottoMax'));
    await cache.markSeen('lotto649', '2024-06-05');

    expect(await cache.anyUnseenAcrossAllGames()).toBe(true);

    await cache.markSeen('LottoMax', '2024-06-04');
    expect(await cache.anyUnseenAcrossAllGames()).toBe(false);
  });

  it('should list a game newest first up to the limit', async () => {
    await cache.upsert(result('2024-06-01', [1, 2, 3, 4, 5, 6]));
    await cache.upsert(result('2024-06-08', []));
    await cache.upsert(result('2024-06-05', [7, 8, 9, 10, 11, 12]));
    await cache.upsert(result('2024-06-04', [1, 2, 3, 4, 5, 6, 7], 'LottoMax'));

    const listed = await cache.listForGame('lotto649', 2);
    expect(listed.map((row) => row.drawDate)).toEqual(['2024-06-08', '2024-06-05']);
  });
});
