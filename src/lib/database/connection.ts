import Database from "better-sqlite3";
import { GAME_RULES } from "../../data/gameRules.js";
import type { GameRule } from "../../types/models.js";
import { SCHEMA_STATEMENTS, TABLE_NAMES } from "./schema.js";

export type Store = Database.Database;

/**
 * Open the local store, apply the schema and seed static game rules.
 * The caller owns the returned handle and must close it.
 */
export function openDatabase(
  path: string,
  rules: readonly GameRule[] = GAME_RULES,
): Store {
  try {
    const db = new Database(path);
    db.pragma("journal_mode = WAL");
    migrate(db);
    seedGameRules(db, rules);
    console.log(`✅ Database opened (${path})`);
    return db;
  } catch (error) {
    console.error("❌ Database open failed:", error);
    throw error;
  }
}

export function migrate(db: Store): void {
  db.transaction(() => {
    for (const statement of SCHEMA_STATEMENTS) {
      db.exec(statement);
    }
  })();
}

/**
 * Insert rules that are not present yet; existing rows are left untouched
 */
export function seedGameRules(db: Store, rules: readonly GameRule[]): number {
  const insert = db.prepare(`
    INSERT OR IGNORE INTO game_rules (
      game_name, total_numbers, regular_balls_drawn, bonus_ball_pool,
      bonus_balls_drawn, draw_schedule, prize_tier_format, official_odds
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `);

  let inserted = 0;
  db.transaction(() => {
    for (const rule of rules) {
      inserted += insert.run(
        rule.gameName,
        rule.totalNumbers,
        rule.regularBallsDrawn,
        rule.bonusBallPool,
        rule.bonusBallsDrawn,
        rule.drawSchedule,
        rule.prizeTierFormat,
        JSON.stringify(rule.officialOdds),
      ).changes;
    }
  })();
  return inserted;
}

/**
 * Drop every table and rebuild from scratch
 */
export function resetDatabase(
  db: Store,
  rules: readonly GameRule[] = GAME_RULES,
): void {
  db.transaction(() => {
    for (const table of TABLE_NAMES) {
      db.exec(`DROP TABLE IF EXISTS ${table}`);
    }
  })();
  migrate(db);
  seedGameRules(db, rules);
  console.log("🗑️  Database reset");
}

/**
 * Close database connection
 */
export function closeDatabase(db: Store): void {
  if (!db.open) return;
  db.close();
  console.log("👋 Database closed");
}

/**
 * Get database connection status
 */
export function getDatabaseStatus(db: Store): {
  connected: boolean;
  version?: string;
  error?: string;
} {
  try {
    const row = db
      .prepare<[], { version: string }>("SELECT sqlite_version() AS version")
      .get();
    return {
      connected: true,
      version: row?.version,
    };
  } catch (error) {
    return {
      connected: false,
      error: error instanceof Error ? error.message : "Unknown error",
    };
  }
}
