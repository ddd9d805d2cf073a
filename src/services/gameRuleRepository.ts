import type { Store } from "../lib/database/connection.js";
import { nowIso } from "../lib/utils/dates.js";
import { parseJsonObject } from "../lib/utils/json.js";
import type { GameRule, ScheduleEntry } from "../types/models.js";
import { parseSchedule } from "./schedule/drawSchedule.js";

interface GameRuleRow {
  game_name: string;
  total_numbers: number;
  regular_balls_drawn: number;
  bonus_ball_pool: number;
  bonus_balls_drawn: number;
  draw_schedule: string;
  prize_tier_format: string;
  official_odds: string;
}

function toGameRule(row: GameRuleRow): GameRule {
  const officialOdds: Record<string, string> = {};
  for (const [tier, value] of Object.entries(parseJsonObject(row.official_odds))) {
    if (typeof value === "string") officialOdds[tier] = value;
  }
  return {
    gameName: row.game_name,
    totalNumbers: row.total_numbers,
    regularBallsDrawn: row.regular_balls_drawn,
    bonusBallPool: row.bonus_ball_pool,
    bonusBallsDrawn: row.bonus_balls_drawn,
    drawSchedule: row.draw_schedule,
    prizeTierFormat: row.prize_tier_format,
    officialOdds,
  };
}

/**
 * Read access to the seeded game rules and the games each user follows
 */
export class GameRuleRepository {
  constructor(private readonly db: Store) {}

  async get(gameName: string): Promise<GameRule | null> {
    const row = this.db
      .prepare<[string], GameRuleRow>(`SELECT * FROM game_rules WHERE game_name = ?`)
      .get(gameName);
    return row ? toGameRule(row) : null;
  }

  async list(): Promise<GameRule[]> {
    return this.db
      .prepare<[], GameRuleRow>(`SELECT * FROM game_rules ORDER BY game_name`)
      .all()
      .map(toGameRule);
  }

  /**
   * Parsed draw schedule; empty when the game is unknown
   */
  async scheduleFor(gameName: string): Promise<ScheduleEntry[]> {
    const rule = await this.get(gameName);
    if (!rule) {
      console.warn(`⚠️ No game rule for ${gameName}`);
      return [];
    }
    return parseSchedule(rule.drawSchedule);
  }

  async followGame(userId: number, gameName: string): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO user_active_games (user_id, game_name, is_active, activated_at, deactivated_at)
         VALUES (?, ?, 1, ?, NULL)
         ON CONFLICT (user_id, game_name) DO UPDATE SET
           is_active = 1,
           activated_at = excluded.activated_at,
           deactivated_at = NULL`,
      )
      .run(userId, gameName, nowIso());
  }

  async unfollowGame(userId: number, gameName: string): Promise<number> {
    return this.db
      .prepare(
        `UPDATE user_active_games SET is_active = 0, deactivated_at = ?
         WHERE user_id = ? AND game_name = ? AND is_active = 1`,
      )
      .run(nowIso(), userId, gameName).changes;
  }

  async listFollowedGames(userId: number): Promise<string[]> {
    return this.db
      .prepare<[number], { game_name: string }>(
        `SELECT game_name FROM user_active_games
         WHERE user_id = ? AND is_active = 1
         ORDER BY activated_at, game_name`,
      )
      .all(userId)
      .map((row) => row.game_name);
  }
}
