/**
 * Domain Types
 * Shared definitions for the locally persisted engine state
 */

// Calendar date formatted yyyy-MM-dd
export type DateKey = string;

export interface GameRule {
  gameName: string;
  totalNumbers: number;
  regularBallsDrawn: number;
  bonusBallPool: number;
  bonusBallsDrawn: number;
  drawSchedule: string;
  prizeTierFormat: string;
  officialOdds: Record<string, string>;
}

export interface DrawInfo {
  gameName: string;
  drawDate: DateKey;
  totalCombinations: number | null;
  userRequestLimit: number | null;
  userCombinationsRequested: number | null;
  archiveChecksum: string | null;
  lastUpdated: string | null;
}

export type DrawInfoInput = Omit<DrawInfo, "lastUpdated">;

// A server-issued combination held by the user ("ingot")
export interface Ingot {
  ingotId: number;
  numbers: number[];
}

export interface CollectionScope {
  userId: number;
  gameName: string;
  drawDate: DateKey;
}

export interface CollectedIngot extends Ingot {
  addedAt: string;
}

export type CrucibleStatus = "draft" | "submitted" | "locked";

// The user's per-draw submission ("crucible")
export interface Crucible {
  id: number | null;
  name: string;
  userId: number;
  gameName: string;
  drawDate: DateKey;
  status: CrucibleStatus;
  combinations: Ingot[];
  submittedAt: string;
}

export interface CachedResult {
  gameName: string;
  drawDate: DateKey;
  winningNumbers: number[];
  bonusNumber: number | null;
  totalCombinations: number | null;
  odds: Record<string, number>;
  userScore: number | null;
  isNew: boolean;
  winId: string | null;
  archivePassword: string | null;
  archiveChecksum: string | null;
  fetchedAt: string;
}

export type CachedResultInput = Omit<CachedResult, "isNew" | "fetchedAt">;

export interface UserProfile {
  userId: number;
  membershipLevel: string | null;
  globalAwards: string[];
  globalStatistics: Record<string, unknown>;
  lastUpdated: string;
}

export interface UserGameProgress {
  userId: number;
  gameName: string;
  score: number;
  awards: string[];
  statistics: Record<string, unknown>;
  membershipLevel: string | null;
  lastPlayed: string | null;
}

export interface ScheduleEntry {
  // ISO weekday, 1 = Monday ... 7 = Sunday
  weekday: number;
  hour: number;
  minute: number;
  tzId: string;
}
