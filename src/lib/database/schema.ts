/**
 * Local store schema
 * All statements are idempotent so the schema can be applied on every open.
 */

export const TABLE_NAMES = [
  "game_rules",
  "game_draw_info",
  "game_results_cache",
  "ingot_collection",
  "ingot_crucibles",
  "user_profiles",
  "user_game_progress",
  "user_active_games",
] as const;

export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS game_rules (
    game_name TEXT PRIMARY KEY,
    total_numbers INTEGER NOT NULL,
    regular_balls_drawn INTEGER NOT NULL,
    bonus_ball_pool INTEGER NOT NULL,
    bonus_balls_drawn INTEGER NOT NULL,
    draw_schedule TEXT NOT NULL,
    prize_tier_format TEXT NOT NULL,
    official_odds TEXT NOT NULL DEFAULT '{}'
  )`,
  `CREATE TABLE IF NOT EXISTS game_draw_info (
    game_name TEXT NOT NULL,
    draw_date TEXT NOT NULL,
    total_combinations INTEGER,
    user_request_limit INTEGER,
    user_combinations_requested INTEGER,
    archive_checksum TEXT,
    last_updated TEXT,
    PRIMARY KEY (game_name, draw_date)
  )`,
  `CREATE TABLE IF NOT EXISTS game_results_cache (
    game_name TEXT NOT NULL,
    draw_date TEXT NOT NULL,
    winning_numbers TEXT NOT NULL DEFAULT '[]',
    bonus_number INTEGER,
    total_combinations INTEGER,
    odds TEXT NOT NULL DEFAULT '{}',
    user_score INTEGER,
    new_draw_flag INTEGER NOT NULL DEFAULT 0,
    win_id TEXT,
    archive_password TEXT,
    archive_checksum TEXT,
    fetched_at TEXT NOT NULL,
    PRIMARY KEY (game_name, draw_date)
  )`,
  `CREATE TABLE IF NOT EXISTS ingot_collection (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    ingot_id INTEGER NOT NULL UNIQUE,
    user_id INTEGER NOT NULL,
    game_name TEXT NOT NULL,
    draw_date TEXT NOT NULL,
    numbers TEXT NOT NULL,
    added_timestamp TEXT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_ingot_collection_scope
    ON ingot_collection (user_id, game_name, draw_date)`,
  `CREATE TABLE IF NOT EXISTS ingot_crucibles (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    user_id INTEGER NOT NULL,
    game_name TEXT NOT NULL,
    draw_date TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'draft',
    combinations TEXT NOT NULL DEFAULT '[]',
    submitted_date TEXT NOT NULL
  )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_ingot_crucibles_scope
    ON ingot_crucibles (user_id, game_name, draw_date)`,
  `CREATE TABLE IF NOT EXISTS user_profiles (
    user_id INTEGER PRIMARY KEY,
    membership_level TEXT,
    global_awards TEXT NOT NULL DEFAULT '[]',
    global_statistics TEXT NOT NULL DEFAULT '{}',
    last_updated TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS user_game_progress (
    user_id INTEGER NOT NULL,
    game_name TEXT NOT NULL,
    score INTEGER NOT NULL DEFAULT 0,
    awards TEXT NOT NULL DEFAULT '[]',
    statistics TEXT NOT NULL DEFAULT '{}',
    membership_level TEXT,
    last_played TEXT,
    PRIMARY KEY (user_id, game_name)
  )`,
  `CREATE TABLE IF NOT EXISTS user_active_games (
    user_id INTEGER NOT NULL,
    game_name TEXT NOT NULL,
    is_active INTEGER NOT NULL DEFAULT 1,
    activated_at TEXT NOT NULL,
    deactivated_at TEXT,
    PRIMARY KEY (user_id, game_name)
  )`,
];
