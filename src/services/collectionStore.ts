import type { Store } from "../lib/database/connection.js";
import { nowIso } from "../lib/utils/dates.js";
import { isInteger, parseJsonArray } from "../lib/utils/json.js";
import type {
  CollectedIngot,
  CollectionScope,
  Ingot,
} from "../types/models.js";

interface IngotRow {
  ingot_id: number;
  numbers: string;
  added_timestamp: string;
}

function toCollectedIngot(row: IngotRow): CollectedIngot {
  return {
    ingotId: row.ingot_id,
    numbers: parseJsonArray(row.numbers, isInteger),
    addedAt: row.added_timestamp,
  };
}

/**
 * Uncommitted ingots held by one user for one (game, draw)
 */
export class IngotCollectionStore {
  constructor(
    private readonly db: Store,
    readonly scope: CollectionScope,
  ) {}

  /**
   * Upsert by ingot id; re-adding refreshes the numbers and added time
   */
  async add(ingot: Ingot): Promise<void> {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO ingot_collection (
          ingot_id, user_id, game_name, draw_date, numbers, added_timestamp
        ) VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(
        ingot.ingotId,
        this.scope.userId,
        this.scope.gameName,
        this.scope.drawDate,
        JSON.stringify(ingot.numbers),
        nowIso(),
      );
  }

  /**
   * Most recently added first
   */
  async list(): Promise<CollectedIngot[]> {
    const rows = this.db
      .prepare<[number, string, string], IngotRow>(
        `SELECT ingot_id, numbers, added_timestamp FROM ingot_collection
         WHERE user_id = ? AND game_name = ? AND draw_date = ?
         ORDER BY added_timestamp DESC, id DESC`,
      )
      .all(this.scope.userId, this.scope.gameName, this.scope.drawDate);

    return rows.map(toCollectedIngot);
  }

  async get(ingotId: number): Promise<CollectedIngot | null> {
    const row = this.db
      .prepare<[number, number, string, string], IngotRow>(
        `SELECT ingot_id, numbers, added_timestamp FROM ingot_collection
         WHERE ingot_id = ? AND user_id = ? AND game_name = ? AND draw_date = ?`,
      )
      .get(ingotId, this.scope.userId, this.scope.gameName, this.scope.drawDate);
    return row ? toCollectedIngot(row) : null;
  }

  async contains(ingotId: number): Promise<boolean> {
    const row = this.db
      .prepare<[number, number, string, string], { found: number }>(
        `SELECT 1 AS found FROM ingot_collection
         WHERE ingot_id = ? AND user_id = ? AND game_name = ? AND draw_date = ?`,
      )
      .get(ingotId, this.scope.userId, this.scope.gameName, this.scope.drawDate);
    return row !== undefined;
  }

  /**
   * Returns rows removed; 0 means the ingot was not in the collection
   */
  async remove(ingotId: number): Promise<number> {
    const changes = this.db
      .prepare(
        `DELETE FROM ingot_collection
         WHERE ingot_id = ? AND user_id = ? AND game_name = ? AND draw_date = ?`,
      )
      .run(ingotId, this.scope.userId, this.scope.gameName, this.scope.drawDate)
      .changes;

    if (changes === 0) {
      console.log(`ℹ️ Ingot ${ingotId} not in collection, nothing removed`);
    }
    return changes;
  }

  async clearAll(): Promise<number> {
    return this.db
      .prepare(
        `DELETE FROM ingot_collection
         WHERE user_id = ? AND game_name = ? AND draw_date = ?`,
      )
      .run(this.scope.userId, this.scope.gameName, this.scope.drawDate).changes;
  }
}
