import type { Store } from "../lib/database/connection.js";
import { nowIso } from "../lib/utils/dates.js";
import type { DateKey, DrawInfo, DrawInfoInput } from "../types/models.js";

interface DrawInfoRow {
  game_name: string;
  draw_date: string;
  total_combinations: number | null;
  user_request_limit: number | null;
  user_combinations_requested: number | null;
  archive_checksum: string | null;
  last_updated: string | null;
}

function toDrawInfo(row: DrawInfoRow): DrawInfo {
  return {
    gameName: row.game_name,
    drawDate: row.draw_date,
    totalCombinations: row.total_combinations,
    userRequestLimit: row.user_request_limit,
    userCombinationsRequested: row.user_combinations_requested,
    archiveChecksum: row.archive_checksum,
    lastUpdated: row.last_updated,
  };
}

/**
 * Durable cache of server-reported draw metadata, keyed by (game, drawDate)
 */
export class DrawInfoCache {
  constructor(private readonly db: Store) {}

  /**
   * Without a date, returns the latest cached draw for the game
   */
  async get(gameName: string, drawDate?: DateKey): Promise<DrawInfo | null> {
    const row =
      drawDate === undefined
        ? this.db
            .prepare<[string], DrawInfoRow>(
              `SELECT * FROM game_draw_info WHERE game_name = ?
               ORDER BY draw_date DESC LIMIT 1`,
            )
            .get(gameName)
        : this.db
            .prepare<[string, string], DrawInfoRow>(
              `SELECT * FROM game_draw_info WHERE game_name = ? AND draw_date = ?`,
            )
            .get(gameName, drawDate);
    return row ? toDrawInfo(row) : null;
  }

  /**
   * Replace the row for (game, drawDate), stamping a fresh update time
   */
  async upsert(info: DrawInfoInput): Promise<DrawInfo> {
    const stored: DrawInfo = { ...info, lastUpdated: nowIso() };
    this.db
      .prepare(
        `INSERT OR REPLACE INTO game_draw_info (
          game_name, draw_date, total_combinations, user_request_limit,
          user_combinations_requested, archive_checksum, last_updated
        ) VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        stored.gameName,
        stored.drawDate,
        stored.totalCombinations,
        stored.userRequestLimit,
        stored.userCombinationsRequested,
        stored.archiveChecksum,
        stored.lastUpdated,
      );
    return stored;
  }
}
