/**
 * Sync Orchestrator
 * @module services/syncOrchestrator
 *
 * Owns the result poller and keeps the local caches in step with the
 * backend across sign-in and sign-out. Also assembles the per-draw objects
 * (collection, quota, crucible) a user works with.
 */

import { cutoffLeadMs, type EngineConfig } from "../config/engine.js";
import type { SessionState } from "../lib/auth/session.js";
import type { Store } from "../lib/database/connection.js";
import { AuthRequiredError } from "../lib/errors.js";
import type {
  CollectionScope,
  DateKey,
  ScheduleEntry,
} from "../types/models.js";
import { IngotCollectionStore } from "./collectionStore.js";
import {
  CrucibleMachine,
  type PlaycardSubmitter,
} from "./crucible/crucibleMachine.js";
import type { CrucibleRepository } from "./crucible/crucibleRepository.js";
import type { DrawInfoService } from "./draw/drawInfoService.js";
import type { DrawInfoCache } from "./drawInfoCache.js";
import { EventTypes, type EventBus, type EventHandler } from "./eventBus.js";
import type { GameRuleRepository } from "./gameRuleRepository.js";
import { QuotaTracker } from "./quotaTracker.js";
import type { ResultCache } from "./resultCache.js";
import type { ResultService } from "./results/resultService.js";
import type { ResultPoller } from "./scheduler/resultPoller.js";
import {
  cutoffInstantUtc,
  previousDrawDate,
  shouldPoll,
} from "./schedule/drawSchedule.js";

export interface SyncOrchestratorDeps {
  db: Store;
  session: SessionState;
  bus: EventBus;
  rules: GameRuleRepository;
  drawInfo: DrawInfoService;
  drawInfoCache: DrawInfoCache;
  results: ResultCache;
  resultService: ResultService;
  crucibles: CrucibleRepository;
  poller: ResultPoller;
  playcards: PlaycardSubmitter;
  config: Pick<EngineConfig, "draw" | "defaultGame" | "lockSuccessStatuses">;
  now?: () => Date;
}

export interface DrawCycle {
  gameName: string;
  nextDrawDate: DateKey;
  lastDrawDate: DateKey | null;
  cutoffAt: Date | null;
  schedule: ScheduleEntry[];
}

export interface InitialCacheReport {
  drawInfoRefreshed: boolean;
  lastResultFetched: boolean;
  placeholderInserted: boolean;
}

export interface AggregateStatus {
  needsSubmission: boolean;
  hasUnseenResults: boolean;
}

export interface DrawContext {
  cycle: DrawCycle;
  scope: CollectionScope;
  collection: IngotCollectionStore;
  quota: QuotaTracker;
  crucible: CrucibleMachine;
  totalCombinations: number | null;
}

export class SyncOrchestrator {
  private readonly now: () => Date;
  private readonly onSignedIn: EventHandler;
  private readonly onSignedOut: EventHandler;
  private attached = false;

  constructor(private readonly deps: SyncOrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
    this.onSignedIn = () => {
      this.handleSignIn().catch((error: unknown) => {
        console.error("❌ Sign-in sync failed:", error);
      });
    };
    this.onSignedOut = () => {
      this.handleSignOut();
    };
  }

  /**
   * Follow session events until shutdown()
   */
  attach(): void {
    if (this.attached) return;
    this.deps.bus.subscribe(EventTypes.SESSION_SIGNED_IN, this.onSignedIn);
    this.deps.bus.subscribe(EventTypes.SESSION_SIGNED_OUT, this.onSignedOut);
    this.attached = true;
  }

  /**
   * Next draw (cached), the draw before it and the submission cutoff
   */
  async resolveDrawCycle(gameName: string): Promise<DrawCycle | null> {
    const nextDrawDate = await this.deps.drawInfo.getNextDrawDate(gameName);
    if (!nextDrawDate) return null;

    const schedule = await this.deps.rules.scheduleFor(gameName);
    return {
      gameName,
      nextDrawDate,
      lastDrawDate: previousDrawDate(nextDrawDate, schedule),
      cutoffAt: cutoffInstantUtc(
        nextDrawDate,
        schedule,
        cutoffLeadMs(this.deps.config),
      ),
      schedule,
    };
  }

  /**
   * Each step runs even when an earlier one failed
   */
  async ensureInitialCache(
    gameName: string,
    lastDrawDate: DateKey | null,
    nextDrawDate: DateKey,
  ): Promise<InitialCacheReport> {
    const report: InitialCacheReport = {
      drawInfoRefreshed: false,
      lastResultFetched: false,
      placeholderInserted: false,
    };

    try {
      report.drawInfoRefreshed =
        (await this.deps.drawInfo.refresh(gameName)) !== null;
    } catch (error) {
      console.error(`❌ Draw info refresh failed for ${gameName}:`, error);
    }

    if (lastDrawDate) {
      try {
        const cached = await this.deps.results.get(gameName, lastDrawDate);
        if (!cached || cached.winningNumbers.length === 0) {
          const fetched = await this.deps.resultService.fetchAndStore(
            gameName,
            lastDrawDate,
          );
          report.lastResultFetched = fetched !== null;
        }
      } catch (error) {
        console.error(
          `❌ Result fetch failed for ${gameName} ${lastDrawDate}:`,
          error,
        );
      }
    }

    try {
      report.placeholderInserted = await this.deps.resultService.ensurePlaceholder(
        gameName,
        nextDrawDate,
      );
    } catch (error) {
      console.error(
        `❌ Placeholder result insert failed for ${gameName} ${nextDrawDate}:`,
        error,
      );
    }

    return report;
  }

  async startPollingIfNeeded(
    gameName: string,
    lastDrawDate: DateKey,
  ): Promise<boolean> {
    const schedule = await this.deps.rules.scheduleFor(gameName);
    if (
      !shouldPoll(
        lastDrawDate,
        schedule,
        this.now(),
        this.deps.config.draw.resultsExpectedHour,
      )
    ) {
      return false;
    }
    await this.deps.poller.start(gameName, lastDrawDate);
    return true;
  }

  async aggregateStatus(
    userId: number,
    gameName: string,
  ): Promise<AggregateStatus> {
    const nextDrawDate = await this.deps.drawInfo.getNextDrawDate(gameName);
    const needsSubmission = nextDrawDate
      ? !(await this.deps.crucibles.exists({
          userId,
          gameName,
          drawDate: nextDrawDate,
        }))
      : false;

    return {
      needsSubmission,
      hasUnseenResults: await this.deps.results.anyUnseenAcrossAllGames(),
    };
  }

  /**
   * Refresh every followed game (or the default one) and start polling
   */
  async handleSignIn(): Promise<void> {
    const userId = this.deps.session.userId;
    if (userId === null) return;

    const followed = await this.deps.rules.listFollowedGames(userId);
    const games = followed.length > 0 ? followed : [this.deps.config.defaultGame];

    for (const gameName of games) {
      try {
        const cycle = await this.resolveDrawCycle(gameName);
        if (!cycle) {
          console.warn(`⚠️ No draw cycle available for ${gameName}`);
          continue;
        }
        await this.ensureInitialCache(
          gameName,
          cycle.lastDrawDate,
          cycle.nextDrawDate,
        );
        if (cycle.lastDrawDate) {
          await this.startPollingIfNeeded(gameName, cycle.lastDrawDate);
        }
      } catch (error) {
        console.error(`❌ Sync failed for ${gameName}:`, error);
      }
    }
    console.log(`✅ Sign-in sync finished for ${games.join(", ")}`);
  }

  handleSignOut(): void {
    this.deps.poller.stop();
  }

  /**
   * Everything needed to smelt, fill and lock for the upcoming draw
   */
  async openDraw(gameName: string): Promise<DrawContext | null> {
    const userId = this.deps.session.userId;
    if (userId === null) {
      throw new AuthRequiredError("open a draw");
    }

    const rule = await this.deps.rules.get(gameName);
    if (!rule) {
      console.warn(`⚠️ Unknown game ${gameName}`);
      return null;
    }
    const cycle = await this.resolveDrawCycle(gameName);
    if (!cycle) return null;

    const scope: CollectionScope = {
      userId,
      gameName,
      drawDate: cycle.nextDrawDate,
    };
    const collection = new IngotCollectionStore(this.deps.db, scope);
    const info = await this.deps.drawInfoCache.get(gameName, cycle.nextDrawDate);
    const quota = new QuotaTracker(
      this.deps.drawInfoCache,
      gameName,
      cycle.nextDrawDate,
      info,
    );
    const crucible = await CrucibleMachine.load(
      {
        repository: this.deps.crucibles,
        collection,
        api: this.deps.playcards,
        requiredCount: rule.regularBallsDrawn,
        cutoffAt: cycle.cutoffAt,
        lockSuccessStatuses: this.deps.config.lockSuccessStatuses,
        now: this.now,
        bus: this.deps.bus,
      },
      scope,
    );

    return {
      cycle,
      scope,
      collection,
      quota,
      crucible,
      totalCombinations: info?.totalCombinations ?? null,
    };
  }

  shutdown(): void {
    this.deps.poller.stop();
    if (this.attached) {
      this.deps.bus.unsubscribe(EventTypes.SESSION_SIGNED_IN, this.onSignedIn);
      this.deps.bus.unsubscribe(EventTypes.SESSION_SIGNED_OUT, this.onSignedOut);
      this.attached = false;
    }
  }
}
