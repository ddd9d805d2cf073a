import { randomInt } from "crypto";
import type { CombinationRequest } from "../lib/api/apiClient.js";
import type { SessionState } from "../lib/auth/session.js";
import type { CombinationGrant } from "../lib/api/schemas.js";
import { AuthRequiredError, LocalPersistenceError } from "../lib/errors.js";
import { captureError } from "../lib/sentry.js";
import type { Ingot } from "../types/models.js";
import type { IngotCollectionStore } from "./collectionStore.js";
import { EventTypes, type EventBus } from "./eventBus.js";
import { assertUsedCount, type QuotaTracker } from "./quotaTracker.js";

export interface CombinationSource {
  requestCombination(request: CombinationRequest): Promise<CombinationGrant>;
}

export type SmeltOutcome =
  | { ok: true; ingot: Ingot; remaining: number }
  | { ok: false; reason: "unknown_totals" | "quota_exhausted"; message: string };

// Uniform in [min, max]
export type RandomPicker = (min: number, max: number) => number;

const cryptoPicker: RandomPicker = (min, max) => randomInt(min, max + 1);

/**
 * Requests one random combination ("smelts an ingot") for a draw
 */
export class CombinationService {
  constructor(
    private readonly api: CombinationSource,
    private readonly session: SessionState,
    private readonly pick: RandomPicker = cryptoPicker,
    private readonly bus?: EventBus,
  ) {}

  async requestCombination(
    quota: QuotaTracker,
    collection: IngotCollectionStore,
    totalCombinations: number | null,
  ): Promise<SmeltOutcome> {
    if (!this.session.isSignedIn) {
      throw new AuthRequiredError("request a combination");
    }
    if (!totalCombinations || totalCombinations < 1) {
      console.log(`ℹ️ Combination totals unknown for ${quota.gameName} ${quota.drawDate}`);
      return {
        ok: false,
        reason: "unknown_totals",
        message: "Combination totals for this draw are not known yet",
      };
    }
    if (quota.remaining() <= 0) {
      console.log(`ℹ️ Request quota exhausted for ${quota.gameName} ${quota.drawDate}`);
      return {
        ok: false,
        reason: "quota_exhausted",
        message: "No combination requests left for this draw",
      };
    }

    const grant = await this.api.requestCombination({
      gameName: quota.gameName,
      drawDate: quota.drawDate,
      combinationNumber: this.pick(1, totalCombinations),
    });
    const ingot: Ingot = { ingotId: grant.ingotId, numbers: grant.numbers };
    // A bad count is a malformed response, not a local write failure
    assertUsedCount(grant.userRequestsCount);

    // The server has already counted this request from here on
    try {
      await collection.add(ingot);
      await quota.recordRequest(grant.userRequestsCount);
    } catch (error) {
      const wrapped = new LocalPersistenceError("Combination request", error);
      console.error("❌ Smelted ingot could not be stored:", error);
      captureError(wrapped, {
        tags: { component: "combinationService" },
        extra: { ingotId: grant.ingotId, gameName: quota.gameName },
        userId: this.session.userId ?? undefined,
      });
      throw wrapped;
    }

    console.log(
      `✅ Ingot ${ingot.ingotId} smelted for ${quota.gameName} ${quota.drawDate}`,
    );
    this.bus?.publish(
      EventTypes.INGOT_SMELTED,
      { ...collection.scope, ingotId: ingot.ingotId },
      "combination",
    );
    return { ok: true, ingot, remaining: quota.remaining() };
  }
}
