import type { Store } from "../../lib/database/connection.js";
import { nowIso } from "../../lib/utils/dates.js";
import { isInteger, isRecord, parseJsonArray } from "../../lib/utils/json.js";
import type {
  CollectionScope,
  Crucible,
  CrucibleStatus,
  Ingot,
} from "../../types/models.js";

interface CrucibleRow {
  id: number;
  name: string;
  user_id: number;
  game_name: string;
  draw_date: string;
  status: string;
  combinations: string;
  submitted_date: string;
}

function isIngot(value: unknown): value is Ingot {
  return (
    isRecord(value) &&
    isInteger(value.ingotId) &&
    Array.isArray(value.numbers) &&
    value.numbers.every(isInteger)
  );
}

function toStatus(value: string): CrucibleStatus {
  if (value === "submitted" || value === "locked") return value;
  return "draft";
}

function toCrucible(row: CrucibleRow): Crucible {
  return {
    id: row.id,
    name: row.name,
    userId: row.user_id,
    gameName: row.game_name,
    drawDate: row.draw_date,
    status: toStatus(row.status),
    combinations: parseJsonArray(row.combinations, isIngot),
    submittedAt: row.submitted_date,
  };
}

/**
 * Persistence for the single crucible per (user, game, draw)
 */
export class CrucibleRepository {
  constructor(private readonly db: Store) {}

  async find(scope: CollectionScope): Promise<Crucible | null> {
    const row = this.db
      .prepare<[number, string, string], CrucibleRow>(
        `SELECT * FROM ingot_crucibles
         WHERE user_id = ? AND game_name = ? AND draw_date = ?`,
      )
      .get(scope.userId, scope.gameName, scope.drawDate);
    return row ? toCrucible(row) : null;
  }

  async exists(scope: CollectionScope): Promise<boolean> {
    return (await this.find(scope)) !== null;
  }

  /**
   * Upsert by scope; returns the stored crucible with its id and timestamp
   */
  async save(crucible: Crucible): Promise<Crucible> {
    const submittedAt = nowIso();
    const row = this.db
      .prepare<[string, number, string, string, string, string, string], { id: number }>(
        `INSERT INTO ingot_crucibles (
          name, user_id, game_name, draw_date, status, combinations, submitted_date
        ) VALUES (?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT (user_id, game_name, draw_date) DO UPDATE SET
          name = excluded.name,
          status = excluded.status,
          combinations = excluded.combinations,
          submitted_date = excluded.submitted_date
        RETURNING id`,
      )
      .get(
        crucible.name,
        crucible.userId,
        crucible.gameName,
        crucible.drawDate,
        crucible.status,
        JSON.stringify(
          crucible.combinations.map(({ ingotId, numbers }) => ({
            ingotId,
            numbers,
          })),
        ),
        submittedAt,
      );

    return {
      ...crucible,
      id: row?.id ?? crucible.id,
      combinations: [...crucible.combinations],
      submittedAt,
    };
  }
}
