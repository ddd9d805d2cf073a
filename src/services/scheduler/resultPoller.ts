import cron from "node-cron";
import type { SessionState } from "../../lib/auth/session.js";
import { captureError } from "../../lib/sentry.js";
import type { DateKey, ScheduleEntry } from "../../types/models.js";
import { EventTypes, type EventBus } from "../eventBus.js";
import type { ResultCache } from "../resultCache.js";
import type { ResultService } from "../results/resultService.js";
import { previousDrawDate } from "../schedule/drawSchedule.js";

export interface ScheduledTask {
  stop(): void;
}

export type TaskScheduler = (
  expression: string,
  task: () => void,
) => ScheduledTask;

export const cronScheduler: TaskScheduler = (expression, task) =>
  cron.schedule(expression, task);

export type PollDecision = "stopped" | "continue" | "skipped";

export interface ResultPollerDeps {
  drawInfo: {
    getNextDrawDate(
      gameName: string,
      options?: { forceRefresh?: boolean },
    ): Promise<DateKey | null>;
  };
  results: ResultCache;
  resultService: ResultService;
  session: SessionState;
  scheduleFor: (gameName: string) => Promise<ScheduleEntry[]>;
  cronExpression: string;
  scheduler?: TaskScheduler;
  bus?: EventBus;
}

/**
 * Background check for a draw's results; one task at a time
 */
export class ResultPoller {
  private task: ScheduledTask | null = null;
  private gameName: string | null = null;
  private lastDrawDate: DateKey | null = null;
  private checking = false;

  constructor(private readonly deps: ResultPollerDeps) {}

  isRunning(): boolean {
    return this.task !== null;
  }

  get target(): { gameName: string; lastDrawDate: DateKey } | null {
    return this.gameName && this.lastDrawDate
      ? { gameName: this.gameName, lastDrawDate: this.lastDrawDate }
      : null;
  }

  /**
   * Schedule the recurring check and run one immediately.
   * No-op while already running.
   */
  async start(gameName: string, lastDrawDate: DateKey): Promise<void> {
    if (this.task) return;

    this.gameName = gameName;
    this.lastDrawDate = lastDrawDate;
    const schedule = this.deps.scheduler ?? cronScheduler;
    this.task = schedule(this.deps.cronExpression, () => {
      this.check().catch((error: unknown) => {
        console.error("❌ Result poll tick failed:", error);
      });
    });

    console.log(
      `🕐 Result poller started for ${gameName} ${lastDrawDate} (${this.deps.cronExpression})`,
    );
    this.deps.bus?.publish(
      EventTypes.POLLER_STARTED,
      { gameName, lastDrawDate },
      "poller",
    );

    await this.check();
  }

  /**
   * One poll cycle. Errors are reported and leave the poller running.
   */
  async check(): Promise<PollDecision> {
    const { gameName, lastDrawDate } = this;
    if (!this.task || !gameName || !lastDrawDate) return "skipped";
    if (this.checking) {
      console.log("ℹ️ Previous result check still running, skipping tick");
      return "skipped";
    }

    this.checking = true;
    try {
      if (!this.deps.session.isSignedIn) {
        console.log("ℹ️ Session signed out, stopping result poller");
        this.stop();
        return "stopped";
      }

      const schedule = await this.deps.scheduleFor(gameName);
      const nextDrawDate = await this.deps.drawInfo.getNextDrawDate(gameName, {
        forceRefresh: true,
      });
      const drawDate =
        (nextDrawDate && previousDrawDate(nextDrawDate, schedule)) ||
        lastDrawDate;
      this.lastDrawDate = drawDate;

      const cached = await this.deps.results.get(gameName, drawDate);
      if (!cached || cached.winningNumbers.length === 0) {
        const fetched = await this.deps.resultService.fetchAndStore(
          gameName,
          drawDate,
        );
        if (fetched && fetched.winningNumbers.length > 0) {
          this.stop();
          return "stopped";
        }
        return "continue";
      }

      if (cached.isNew) {
        this.stop();
        return "stopped";
      }
      // Seen result: the next draw's result may still be pending
      return "continue";
    } catch (error) {
      console.error(`❌ Result check failed for ${gameName}:`, error);
      captureError(error, {
        tags: { component: "resultPoller", gameName },
        extra: { lastDrawDate: this.lastDrawDate },
      });
      return "continue";
    } finally {
      this.checking = false;
    }
  }

  stop(): void {
    if (!this.task) return;
    this.task.stop();
    this.task = null;
    console.log(`🛑 Result poller stopped for ${this.gameName}`);
    this.deps.bus?.publish(
      EventTypes.POLLER_STOPPED,
      { gameName: this.gameName, lastDrawDate: this.lastDrawDate },
      "poller",
    );
  }
}
