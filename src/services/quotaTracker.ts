import { DecodeError } from "../lib/errors.js";
import type { DateKey, DrawInfo } from "../types/models.js";
import type { DrawInfoCache } from "./drawInfoCache.js";

/**
 * Throws a DecodeError unless the server count is a non-negative integer
 */
export function assertUsedCount(value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new DecodeError("user_requests_count", [
      `expected a non-negative integer, got ${String(value)}`,
    ]);
  }
}

/**
 * Per-(game, draw) combination request allowance.
 * The server owns the used count; this tracker only mirrors what it reports.
 */
export class QuotaTracker {
  private limitValue: number | null;
  private usedValue: number | null;

  constructor(
    private readonly cache: DrawInfoCache,
    readonly gameName: string,
    readonly drawDate: DateKey,
    info: Pick<DrawInfo, "userRequestLimit" | "userCombinationsRequested"> | null = null,
  ) {
    this.limitValue = info?.userRequestLimit ?? null;
    this.usedValue = info?.userCombinationsRequested ?? null;
  }

  static async load(
    cache: DrawInfoCache,
    gameName: string,
    drawDate: DateKey,
  ): Promise<QuotaTracker> {
    const info = await cache.get(gameName, drawDate);
    return new QuotaTracker(cache, gameName, drawDate, info);
  }

  get limit(): number | null {
    return this.limitValue;
  }

  get used(): number | null {
    return this.usedValue;
  }

  remaining(): number {
    return Math.max(0, (this.limitValue ?? 0) - (this.usedValue ?? 0));
  }

  /**
   * Persist the post-request count returned by the server and mirror it
   */
  async recordRequest(serverUsedCount: number): Promise<void> {
    assertUsedCount(serverUsedCount);

    if (this.usedValue !== null && serverUsedCount < this.usedValue) {
      console.warn(
        `⚠️ Server lowered requests used for ${this.gameName} ${this.drawDate}: ${this.usedValue} -> ${serverUsedCount}`,
      );
    }

    const existing = await this.cache.get(this.gameName, this.drawDate);
    const stored = await this.cache.upsert({
      gameName: this.gameName,
      drawDate: this.drawDate,
      totalCombinations: existing?.totalCombinations ?? null,
      userRequestLimit: existing?.userRequestLimit ?? this.limitValue,
      userCombinationsRequested: serverUsedCount,
      archiveChecksum: existing?.archiveChecksum ?? null,
    });

    this.limitValue = stored.userRequestLimit;
    this.usedValue = serverUsedCount;
  }
}
