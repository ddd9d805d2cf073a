import type { Store } from '../../src/lib/database/connection';
import { IngotCollectionStore } from '../../src/services/collectionStore';
import { createTestStore, makeIngot } from '../helpers/store';

describe('Ingot Collection Store', () => {
  let db: Store;
  let collection: IngotCollectionStore;

  beforeEach(() => {
    db = createTestStore();
    collection = new IngotCollectionStore(db, {
      userId: 7,
      gameName: 'lotto649',
      drawDate: '2024-06-08',
    });
  });

  afterEach(() => {
    db.close();
  });

  it('should list the most recently added ingot first', async () => {
    await collection.add(makeIngot(101));
    await collection.add(makeIngot(102));
    await collection.add(makeIngot(103));

    const listed = await collection.list();
    expect(listed.map((item) => item.ingotId)).toEqual([103, 102, 101]);
    expect(listed[0].numbers).toEqual(makeIngot(103).numbers);
  });

  it('should upsert when the same ingot is added twice', async () => {
    await collection.add(makeIngot(101));
    await collection.add(makeIngot(102));
    await collection.add({ ingotId: 101, numbers: [1, 2, 3, 4, 5, 6] });

    const listed = await collection.list();
    expect(listed.map((item) => item.ingotId)).toEqual([101, 102]);
    expect(listed[0].numbers).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('should report membership', async () => {
    await collection.add(makeIngot(101));

    expect(await collection.contains(101)).toBe(true);
    expect(await collection.contains(999)).toBe(false);
  });

  it('should read back a single collected ingot', async () => {
    await collection.add(makeIngot(101));

    const found = await collection.get(101);
    expect(found?.ingotId).toBe(101);
    expect(found?.numbers).toEqual(makeIngot(101).numbers);
    expect(await collection.get(999)).toBeNull();
  });

  it('should return the number of rows removed', async () => {
    await collection.add(makeIngot(101));

    expect(await collection.remove(101)).toBe(1);
    expect(await collection.remove(101)).toBe(0);
    expect(await collection.list()).toEqual([]);
  });

  it('should keep other draws and users separate', async () => {
    const otherDraw = new IngotCollectionStore(db, {
      userId: 7,
      gameName: 'lotto649',
      drawDate: '2024-06-12',
    });
    const otherUser = new IngotCollectionStore(db, {
      userId: 8,
      gameName: 'lotto649',
      drawDate: '2024-06-08',
    });
    await collection.add(makeIngot(101));
    await collection.add(makeIngot(102));
    await otherDraw.add(makeIngot(201));
    await otherUser.add(makeIngot(301));

    expect(await collection.clearAll()).toBe(2);

    expect(await collection.list()).toEqual([]);
    expect((await otherDraw.list()).map((item) => item.ingotId)).toEqual([201]);
    expect(await otherUser.contains(301)).toBe(true);
    expect(await otherUser.contains(201)).toBe(false);
  });
});
