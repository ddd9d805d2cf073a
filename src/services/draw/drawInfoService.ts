import type { SessionState } from "../../lib/auth/session.js";
import type { GameInfo } from "../../lib/api/schemas.js";
import { AuthRequiredError } from "../../lib/errors.js";
import type { DateKey, DrawInfo } from "../../types/models.js";
import type { MemoryCache } from "../cacheService.js";
import type { DrawInfoCache } from "../drawInfoCache.js";

export interface GameInfoSource {
  getGameInfo(gameName: string): Promise<GameInfo | null>;
}

/**
 * Next-draw lookups backed by the durable draw-info cache, with a
 * short-TTL memory entry per game in front of it
 */
export class DrawInfoService {
  constructor(
    private readonly api: GameInfoSource,
    private readonly cache: DrawInfoCache,
    private readonly session: SessionState,
    private readonly nextDrawDates: MemoryCache<DateKey>,
  ) {}

  /**
   * A memory hit is trusted only while its durable row still exists;
   * otherwise the draw info is refreshed from the backend
   */
  async getNextDrawDate(
    gameName: string,
    options: { forceRefresh?: boolean } = {},
  ): Promise<DateKey | null> {
    if (!this.session.isSignedIn) {
      throw new AuthRequiredError("get next draw date");
    }

    if (!options.forceRefresh) {
      const cached = this.nextDrawDates.get(gameName);
      if (cached) {
        if (await this.cache.get(gameName, cached)) return cached;
        console.warn(
          `⚠️ Draw info for ${gameName} ${cached} missing from store, refreshing`,
        );
      }
    }

    const info = await this.refresh(gameName);
    return info?.drawDate ?? null;
  }

  /**
   * Fetch game info, store the full row and remember the draw date
   */
  async refresh(gameName: string): Promise<DrawInfo | null> {
    let info: GameInfo | null;
    try {
      info = await this.api.getGameInfo(gameName);
    } catch (error) {
      this.nextDrawDates.invalidate(gameName);
      throw error;
    }

    if (!info?.drawDate) {
      console.warn(`⚠️ No upcoming draw reported for ${gameName}`);
      this.nextDrawDates.invalidate(gameName);
      return null;
    }

    const stored = await this.cache.upsert({
      gameName,
      drawDate: info.drawDate,
      totalCombinations: info.totalCombinations,
      userRequestLimit: info.userRequestLimit,
      userCombinationsRequested: info.userCombinationsRequested,
      archiveChecksum: info.archiveChecksum,
    });
    this.nextDrawDates.set(gameName, info.drawDate);
    return stored;
  }
}
