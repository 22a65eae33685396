import { z } from "zod";

const configSchema = z.object({
  port: z.number().int().positive().default(3000),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  // Empty disables the X-API-Key check
  apiKey: z.string().default(""),
  databasePath: z.string().min(1).default("data/padelwatch.db"),
  appBaseUrl: z.string().url("APP_BASE_URL must be a valid URL").default("http://localhost:3000"),

  timezone: z.string().min(1).default("Europe/Amsterdam"),

  cache: z.object({
    freshnessMinutes: z.number().min(0).default(15),
    upstreamRetries: z.number().int().min(0).max(1).default(1),
    retryDelayMs: z.number().int().min(0).default(500),
  }),

  search: z.object({
    concurrency: z.number().int().min(1).max(10).default(3),
  }),

  provider: z.object({
    timeoutMs: z.number().int().min(1000).default(15000),
  }),

  scheduler: z.object({
    enabled: z.boolean().default(true),
    schedule: z.string().default("*/15 * * * *"),
  }),

  tasks: z.object({
    retentionHours: z.number().min(1).default(24),
  }),

  mail: z.object({
    enabled: z.boolean().default(false),
    smtp: z.object({
      host: z.string().default(""),
      port: z.number().default(465),
      user: z.string().default(""),
      pass: z.string().default(""),
    }),
    from: z.string().default(""),
    alertTo: z.array(z.string().email()).default([]),
    cooldownMinutes: z.number().min(1).default(30),
  }),
});

export type Config = z.infer<typeof configSchema>;

function intFrom(value: string | undefined, fallback: number): number {
  if (value === undefined || value === "") return fallback;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? Number.NaN : parsed;
}

function boolFrom(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") return fallback;
  return value.toLowerCase() === "true" || value === "1";
}

export function parseConfig(env: NodeJS.ProcessEnv) {
  const rawConfig = {
    port: intFrom(env.PORT, 3000),
    nodeEnv: env.NODE_ENV || "development",
    apiKey: env.API_KEY || "",
    databasePath: env.DATABASE_PATH || "data/padelwatch.db",
    appBaseUrl: env.APP_BASE_URL || "http://localhost:3000",

    timezone: env.TZ || "Europe/Amsterdam",

    cache: {
      freshnessMinutes: intFrom(env.CACHE_FRESHNESS_MINUTES, 15),
      upstreamRetries: intFrom(env.CACHE_UPSTREAM_RETRIES, 1),
      retryDelayMs: intFrom(env.CACHE_RETRY_DELAY_MS, 500),
    },

    search: {
      concurrency: intFrom(env.SEARCH_CONCURRENCY, 3),
    },

    provider: {
      timeoutMs: intFrom(env.PROVIDER_TIMEOUT_MS, 15000),
    },

    scheduler: {
      enabled: boolFrom(env.SCHEDULER_ENABLED, true),
      schedule: env.SCHEDULER_CRON || "*/15 * * * *",
    },

    tasks: {
      retentionHours: intFrom(env.TASK_RETENTION_HOURS, 24),
    },

    mail: {
      enabled: !!env.SMTP_HOST,
      smtp: {
        host: env.SMTP_HOST || "",
        port: intFrom(env.SMTP_PORT, 465),
        user: env.SMTP_USER || "",
        pass: env.SMTP_PASS || "",
      },
      from: env.MAIL_FROM || env.SMTP_USER || "",
      alertTo: (env.ALERT_TO || "")
        .split(",")
        .map((e) => e.trim())
        .filter(Boolean),
      cooldownMinutes: intFrom(env.ALERT_COOLDOWN_MINUTES, 30),
    },
  };

  return configSchema.safeParse(rawConfig);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = parseConfig(env);

  if (!result.success) {
    console.error("Configuration validation failed:");
    for (const issue of result.error.issues) {
      console.error(`  - ${issue.path.join(".")}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

/**
 * Fully defaulted config, used by tests and scripts that build services by hand
 */
export function defaultConfig(overrides: Partial<Config> = {}): Config {
  const result = parseConfig({});
  if (!result.success) {
    throw new Error("Default configuration is invalid");
  }
  return { ...result.data, ...overrides };
}
