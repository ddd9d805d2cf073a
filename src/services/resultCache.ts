import type { Store } from "../lib/database/connection.js";
import { nowIso } from "../lib/utils/dates.js";
import {
  isInteger,
  parseJsonArray,
  parseJsonObject,
} from "../lib/utils/json.js";
import type {
  CachedResult,
  CachedResultInput,
  DateKey,
} from "../types/models.js";

interface ResultRow {
  game_name: string;
  draw_date: string;
  winning_numbers: string;
  bonus_number: number | null;
  total_combinations: number | null;
  odds: string;
  user_score: number | null;
  new_draw_flag: number;
  win_id: string | null;
  archive_password: string | null;
  archive_checksum: string | null;
  fetched_at: string;
}

function toResult(row: ResultRow): CachedResult {
  const odds: Record<string, number> = {};
  for (const [tier, value] of Object.entries(parseJsonObject(row.odds))) {
    if (typeof value === "number") odds[tier] = value;
  }

  return {
    gameName: row.game_name,
    drawDate: row.draw_date,
    winningNumbers: parseJsonArray(row.winning_numbers, isInteger),
    bonusNumber: row.bonus_number,
    totalCombinations: row.total_combinations,
    odds,
    userScore: row.user_score,
    isNew: row.new_draw_flag === 1,
    winId: row.win_id,
    archivePassword: row.archive_password,
    archiveChecksum: row.archive_checksum,
    fetchedAt: row.fetched_at,
  };
}

/**
 * Durable cache of draw results keyed by (game, drawDate)
 */
export class ResultCache {
  constructor(private readonly db: Store) {}

  /**
   * Replace the row; a result is "new" exactly when it carries numbers
   */
  async upsert(result: CachedResultInput): Promise<CachedResult> {
    const stored: CachedResult = {
      ...result,
      isNew: result.winningNumbers.length > 0,
      fetchedAt: nowIso(),
    };

    this.db
      .prepare(
        `INSERT OR REPLACE INTO game_results_cache (
          game_name, draw_date, winning_numbers, bonus_number, total_combinations,
          odds, user_score, new_draw_flag, win_id, archive_password,
          archive_checksum, fetched_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        stored.gameName,
        stored.drawDate,
        JSON.stringify(stored.winningNumbers),
        stored.bonusNumber,
        stored.totalCombinations,
        JSON.stringify(stored.odds),
        stored.userScore,
        stored.isNew ? 1 : 0,
        stored.winId,
        stored.archivePassword,
        stored.archiveChecksum,
        stored.fetchedAt,
      );

    return stored;
  }

  async get(gameName: string, drawDate: DateKey): Promise<CachedResult | null> {
    const row = this.db
      .prepare<[string, string], ResultRow>(
        `SELECT * FROM game_results_cache WHERE game_name = ? AND draw_date = ?`,
      )
      .get(gameName, drawDate);
    return row ? toResult(row) : null;
  }

  /**
   * Newest draws first
   */
  async listForGame(gameName: string, limit = 10): Promise<CachedResult[]> {
    return this.db
      .prepare<[string, number], ResultRow>(
        `SELECT * FROM game_results_cache WHERE game_name = ?
         ORDER BY draw_date DESC LIMIT ?`,
      )
      .all(gameName, limit)
      .map(toResult);
  }

  /**
   * Clears the new flag; 0 means it was already clear or the row is absent
   */
  async markSeen(gameName: string, drawDate: DateKey): Promise<number> {
    return this.db
      .prepare(
        `UPDATE game_results_cache SET new_draw_flag = 0
         WHERE game_name = ? AND draw_date = ? AND new_draw_flag = 1`,
      )
      .run(gameName, drawDate).changes;
  }

  async anyUnseenAcrossAllGames(): Promise<boolean> {
    const row = this.db
      .prepare<[], { found: number }>(
        `SELECT 1 AS found FROM game_results_cache WHERE new_draw_flag = 1 LIMIT 1`,
      )
      .get();
    return row !== undefined;
  }
}
