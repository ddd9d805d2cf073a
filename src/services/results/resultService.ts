import type { GameResultPayload } from "../../lib/api/schemas.js";
import type { CachedResultInput, DateKey } from "../../types/models.js";
import { EventTypes, type EventBus } from "../eventBus.js";
import type { ResultCache } from "../resultCache.js";

export interface ResultSource {
  getGameResult(
    gameName: string,
    drawDate: DateKey,
  ): Promise<GameResultPayload | null>;
}

export function toResultInput(
  gameName: string,
  drawDate: DateKey,
  payload: GameResultPayload,
): CachedResultInput {
  return { gameName, drawDate, ...payload };
}

/**
 * Fetches results from the backend into the result cache
 */
export class ResultService {
  constructor(
    private readonly api: ResultSource,
    private readonly cache: ResultCache,
    private readonly bus?: EventBus,
  ) {}

  /**
   * Returns the stored candidate, or null for an empty response
   */
  async fetchAndStore(
    gameName: string,
    drawDate: DateKey,
  ): Promise<CachedResultInput | null> {
    const payload = await this.api.getGameResult(gameName, drawDate);
    if (!payload) {
      console.log(`ℹ️ No result body for ${gameName} ${drawDate}`);
      return null;
    }

    const candidate = toResultInput(gameName, drawDate, payload);
    await this.cache.upsert(candidate);
    if (candidate.winningNumbers.length === 0) {
      console.log(`🕐 Results for ${gameName} ${drawDate} not published yet`);
      return candidate;
    }

    console.log(
      `✅ Results captured for ${gameName} ${drawDate}: ${candidate.winningNumbers.join(", ")}`,
    );
    this.bus?.publish(
      EventTypes.RESULTS_CAPTURED,
      { gameName, drawDate },
      "results",
    );
    return candidate;
  }

  /**
   * Empty row so "has this draw got a result yet" lookups find something
   */
  async ensurePlaceholder(gameName: string, drawDate: DateKey): Promise<boolean> {
    if (await this.cache.get(gameName, drawDate)) return false;
    await this.cache.upsert({
      gameName,
      drawDate,
      winningNumbers: [],
      bonusNumber: null,
      totalCombinations: null,
      odds: {},
      userScore: null,
      winId: null,
      archivePassword: null,
      archiveChecksum: null,
    });
    return true;
  }
}
