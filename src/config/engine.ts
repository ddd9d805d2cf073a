/**
 * Engine Configuration
 * All draw-cycle constants in one place
 */

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export interface EngineConfig {
  api: {
    baseUrl: string;
    timeoutMs: number;
    resultTimeoutMs: number;
  };
  database: {
    path: string;
  };
  draw: {
    // Submissions close this long before the scheduled draw
    cutoffLeadMinutes: number;
    // Local hour on the day after a draw when results are expected
    resultsExpectedHour: number;
  };
  poller: {
    cronExpression: string;
  };
  cache: {
    nextDrawTtlSeconds: number;
  };
  defaultGame: string;
  lockSuccessStatuses: readonly string[];
}

export function loadEngineConfig(): EngineConfig {
  return {
    api: {
      baseUrl:
        process.env.GOLDEN_TICKET_API_URL ||
        "https://governance.page/wp-json/apigold/v1",
      timeoutMs: intFromEnv("API_TIMEOUT_MS", 15_000),
      resultTimeoutMs: intFromEnv("RESULT_API_TIMEOUT_MS", 20_000),
    },
    database: {
      path: process.env.GOLDEN_TICKET_DB_PATH || "golden-ticket.db",
    },
    draw: {
      cutoffLeadMinutes: intFromEnv("CUTOFF_LEAD_MINUTES", 60),
      resultsExpectedHour: 12,
    },
    poller: {
      cronExpression: process.env.RESULT_POLL_CRON || "0 * * * *",
    },
    cache: {
      nextDrawTtlSeconds: intFromEnv("NEXT_DRAW_CACHE_TTL_SECONDS", 300),
    },
    defaultGame: process.env.DEFAULT_GAME || "lotto649",
    lockSuccessStatuses: ["success", "playcard_submitted"],
  };
}

export function cutoffLeadMs(config: Pick<EngineConfig, "draw">): number {
  return config.draw.cutoffLeadMinutes * 60 * 1000;
}
