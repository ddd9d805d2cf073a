import type { Store } from "../lib/database/connection.js";
import { nowIso } from "../lib/utils/dates.js";
import {
  isString,
  parseJsonArray,
  parseJsonObject,
} from "../lib/utils/json.js";
import type { UserGameProgress, UserProfile } from "../types/models.js";

interface ProfileRow {
  user_id: number;
  membership_level: string | null;
  global_awards: string;
  global_statistics: string;
  last_updated: string;
}

interface ProgressRow {
  user_id: number;
  game_name: string;
  score: number;
  awards: string;
  statistics: string;
  membership_level: string | null;
  last_played: string | null;
}

export interface ProgressUpdate {
  // Added to the stored score
  scoreDelta?: number;
  awards?: string[];
  statistics?: Record<string, unknown>;
  membershipLevel?: string | null;
  playedAt?: string;
}

function toProfile(row: ProfileRow): UserProfile {
  return {
    userId: row.user_id,
    membershipLevel: row.membership_level,
    globalAwards: parseJsonArray(row.global_awards, isString),
    globalStatistics: parseJsonObject(row.global_statistics),
    lastUpdated: row.last_updated,
  };
}

function toProgress(row: ProgressRow): UserGameProgress {
  return {
    userId: row.user_id,
    gameName: row.game_name,
    score: row.score,
    awards: parseJsonArray(row.awards, isString),
    statistics: parseJsonObject(row.statistics),
    membershipLevel: row.membership_level,
    lastPlayed: row.last_played,
  };
}

/**
 * User profile and per-game progress
 */
export class ProgressService {
  constructor(private readonly db: Store) {}

  async upsertProfile(
    profile: Omit<UserProfile, "lastUpdated">,
  ): Promise<UserProfile> {
    const stored: UserProfile = { ...profile, lastUpdated: nowIso() };
    this.db
      .prepare(
        `INSERT OR REPLACE INTO user_profiles (
          user_id, membership_level, global_awards, global_statistics, last_updated
        ) VALUES (?, ?, ?, ?, ?)`,
      )
      .run(
        stored.userId,
        stored.membershipLevel,
        JSON.stringify(stored.globalAwards),
        JSON.stringify(stored.globalStatistics),
        stored.lastUpdated,
      );
    return stored;
  }

  async getProfile(userId: number): Promise<UserProfile | null> {
    const row = this.db
      .prepare<[number], ProfileRow>(`SELECT * FROM user_profiles WHERE user_id = ?`)
      .get(userId);
    return row ? toProfile(row) : null;
  }

  /**
   * Adds to the score, merges awards as a set and statistics by key
   */
  async recordProgress(
    userId: number,
    gameName: string,
    update: ProgressUpdate,
  ): Promise<UserGameProgress> {
    const current = await this.getProgress(userId, gameName);
    const next: UserGameProgress = {
      userId,
      gameName,
      score: (current?.score ?? 0) + (update.scoreDelta ?? 0),
      awards: [...new Set([...(current?.awards ?? []), ...(update.awards ?? [])])],
      statistics: { ...(current?.statistics ?? {}), ...(update.statistics ?? {}) },
      membershipLevel:
        update.membershipLevel !== undefined
          ? update.membershipLevel
          : (current?.membershipLevel ?? null),
      lastPlayed: update.playedAt ?? nowIso(),
    };

    this.db
      .prepare(
        `INSERT OR REPLACE INTO user_game_progress (
          user_id, game_name, score, awards, statistics, membership_level, last_played
        ) VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        next.userId,
        next.gameName,
        next.score,
        JSON.stringify(next.awards),
        JSON.stringify(next.statistics),
        next.membershipLevel,
        next.lastPlayed,
      );
    return next;
  }

  async getProgress(
    userId: number,
    gameName: string,
  ): Promise<UserGameProgress | null> {
    const row = this.db
      .prepare<[number, string], ProgressRow>(
        `SELECT * FROM user_game_progress WHERE user_id = ? AND game_name = ?`,
      )
      .get(userId, gameName);
    return row ? toProgress(row) : null;
  }

  async listProgress(userId: number): Promise<UserGameProgress[]> {
    return this.db
      .prepare<[number], ProgressRow>(
        `SELECT * FROM user_game_progress WHERE user_id = ? ORDER BY game_name`,
      )
      .all(userId)
      .map(toProgress);
  }

  async totalScore(userId: number): Promise<number> {
    const row = this.db
      .prepare<[number], { total: number | null }>(
        `SELECT SUM(score) AS total FROM user_game_progress WHERE user_id = ?`,
      )
      .get(userId);
    return row?.total ?? 0;
  }
}
