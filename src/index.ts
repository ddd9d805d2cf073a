import dotenv from "dotenv";
import { loadEngineConfig, type EngineConfig } from "./config/engine.js";
import { GoldenTicketApi, type FetchLike } from "./lib/api/apiClient.js";
import { AuthSession } from "./lib/auth/session.js";
import {
  closeDatabase,
  getDatabaseStatus,
  openDatabase,
  type Store,
} from "./lib/database/connection.js";
import { flushSentry, initSentry } from "./lib/sentry.js";
import { AuthService } from "./services/authService.js";
import { MemoryCache } from "./services/cacheService.js";
import { CombinationService } from "./services/combinationService.js";
import { CrucibleRepository } from "./services/crucible/crucibleRepository.js";
import { DrawInfoService } from "./services/draw/drawInfoService.js";
import { DrawInfoCache } from "./services/drawInfoCache.js";
import { EventBus } from "./services/eventBus.js";
import { GameRuleRepository } from "./services/gameRuleRepository.js";
import { ProgressService } from "./services/progressService.js";
import { ResultCache } from "./services/resultCache.js";
import { ResultService } from "./services/results/resultService.js";
import {
  ResultPoller,
  type TaskScheduler,
} from "./services/scheduler/resultPoller.js";
import { SyncOrchestrator } from "./services/syncOrchestrator.js";

export interface Engine {
  config: EngineConfig;
  db: Store;
  bus: EventBus;
  session: AuthSession;
  api: GoldenTicketApi;
  auth: AuthService;
  rules: GameRuleRepository;
  drawInfo: DrawInfoService;
  drawInfoCache: DrawInfoCache;
  results: ResultCache;
  crucibles: CrucibleRepository;
  combinations: CombinationService;
  progress: ProgressService;
  orchestrator: SyncOrchestrator;
  shutdown(): Promise<void>;
}

export interface EngineOptions {
  fetch?: FetchLike;
  scheduler?: TaskScheduler;
  now?: () => Date;
}

/**
 * Open the store and wire every service around it
 */
export function createEngine(
  config: EngineConfig,
  options: EngineOptions = {},
): Engine {
  const db = openDatabase(config.database.path);
  const bus = new EventBus();
  const session = new AuthSession(bus);

  const api = new GoldenTicketApi({
    baseUrl: config.api.baseUrl,
    timeoutMs: config.api.timeoutMs,
    resultTimeoutMs: config.api.resultTimeoutMs,
    getAuthToken: () => session.authToken,
    fetch: options.fetch,
  });

  const rules = new GameRuleRepository(db);
  const drawInfoCache = new DrawInfoCache(db);
  const drawInfo = new DrawInfoService(
    api,
    drawInfoCache,
    session,
    new MemoryCache<string>(config.cache.nextDrawTtlSeconds),
  );
  const results = new ResultCache(db);
  const resultService = new ResultService(api, results, bus);
  const crucibles = new CrucibleRepository(db);
  const progress = new ProgressService(db);

  const poller = new ResultPoller({
    drawInfo,
    results,
    resultService,
    session,
    scheduleFor: (gameName) => rules.scheduleFor(gameName),
    cronExpression: config.poller.cronExpression,
    scheduler: options.scheduler,
    bus,
  });

  const orchestrator = new SyncOrchestrator({
    db,
    session,
    bus,
    rules,
    drawInfo,
    drawInfoCache,
    results,
    resultService,
    crucibles,
    poller,
    playcards: api,
    config,
    now: options.now,
  });
  let closed = false;
  return {
    config,
    db,
    bus,
    session,
    api,
    auth: new AuthService(api, session, progress),
    rules,
    drawInfo,
    drawInfoCache,
    results,
    crucibles,
    combinations: new CombinationService(api, session, undefined, bus),
    progress,
    orchestrator,
    async shutdown() {
      if (closed) return;
      closed = true;
      orchestrator.shutdown();
      closeDatabase(db);
      await flushSentry();
    },
  };
}

async function main(): Promise<void> {
  dotenv.config();

  // Error reporting first, before anything can throw
  initSentry();

  const config = loadEngineConfig();
  console.log("🚀 Starting Golden Ticket engine...");
  console.log("📍 API:", config.api.baseUrl);
  console.log("📍 Store:", config.database.path);

  const engine = createEngine(config);
  engine.orchestrator.attach();
  const status = getDatabaseStatus(engine.db);
  console.log(
    `📍 SQLite: ${status.connected ? `${status.version} ✅` : `${status.error} ❌`}`,
  );

  const shutdown = (signal: string) => {
    console.log(`👋 ${signal} received`);
    engine
      .shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error("❌ Shutdown failed:", error);
        process.exit(1);
      });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("uncaughtException", (error) => {
    console.error("❌ Uncaught Exception:", error);
    process.exit(1);
  });
  process.on("unhandledRejection", (reason) => {
    console.error("❌ Unhandled Rejection:", reason);
    process.exit(1);
  });

  const username = process.env.GOLDEN_TICKET_USERNAME;
  const password = process.env.GOLDEN_TICKET_PASSWORD;
  if (!username || !password) {
    console.warn("⚠️ GOLDEN_TICKET_USERNAME/PASSWORD not set - staying signed out");
    return;
  }

  // The orchestrator syncs caches on the sign-in event
  const user = await engine.auth.signIn(username, password);

  const game = config.defaultGame;
  const aggregate = await engine.orchestrator.aggregateStatus(user.userId, game);
  console.log(
    `📊 ${game}: needs submission=${aggregate.needsSubmission}, unseen results=${aggregate.hasUnseenResults}`,
  );
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error("❌ Engine failed to start:", error);
    process.exit(1);
  });
}
