import { z } from "zod";

const toInt = (def?: number) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === "") return def;
    const n = typeof v === "number" ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number().int());

const toFloat = (def?: number) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === "") return def;
    const n = typeof v === "number" ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number());

const toBool = (def?: boolean) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === "") return def;
    if (typeof v === "boolean") return v;
    const s = String(v).trim().toLowerCase();
    if (["true", "1", "yes", "y", "on"].includes(s)) return true;
    if (["false", "0", "no", "n", "off"].includes(s)) return false;
    return v;
  }, z.boolean());

const required = (key: string) => z.string({ required_error: `${key} is required` }).trim().min(1, `${key} is required`);

const seconds = (def: number, min: number, max: number) => toInt(def).pipe(z.number().int().min(min).max(max));

/**
 * Environment contract of the worker. Credentials are required; everything else
 * falls back to the documented defaults.
 */
const envObject = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
    APP_NAME: z.string().trim().default("market-alerts-bot"),
    LOG_LEVEL: z.enum(["error", "warn", "log", "debug", "verbose"]).default("log"),

    MBOUM_API_KEY: required("MBOUM_API_KEY"),
    MBOUM_BASE_URL: z.string().trim().url().default("https://api.mboum.com"),
    MBOUM_SCREENER_PATH: z.string().trim().default("/v1/screener"),
    MBOUM_SCREENER_FILTER: z.string().trim().default("day_gainers"),
    MBOUM_INSIDER_TRADES_PATH: z.string().trim().default("/v1/markets/insider-trades"),
    MBOUM_UNUSUAL_OPTIONS_PATH: z.string().trim().default("/v1/markets/options/unusual-options-activity"),
    MBOUM_HALTS_PATH: z.string().trim().default("/v1/markets/stock/halts"),
    MBOUM_REQUEST_TIMEOUT_MS: toInt(10_000).pipe(z.number().int().min(1000).max(60_000)),

    TELEGRAM_BOT_TOKEN: required("TELEGRAM_BOT_TOKEN"),
    TELEGRAM_CHAT_ID: required("TELEGRAM_CHAT_ID"),
    TELEGRAM_PARSE_MODE: z.enum(["HTML", "MarkdownV2", "Markdown"]).default("HTML"),
    TELEGRAM_DISABLE_WEB_PAGE_PREVIEW: toBool(true).default(true),
    TELEGRAM_SEND_TIMEOUT_MS: toInt(10_000).pipe(z.number().int().min(1000).max(60_000)),

    MARKET_TIMEZONE: z.string().trim().default("America/New_York"),
    MARKET_OPEN_HOUR: toInt(6).pipe(z.number().int().min(0).max(23)),
    MARKET_CLOSE_HOUR: toInt(18).pipe(z.number().int().min(1).max(24)),

    TOP_MOVERS_LIMIT: toInt(25).pipe(z.number().int().min(1).max(250)),
    SUMMARY_TOP_K: toInt(5).pipe(z.number().int().min(1).max(50)),

    MIN_PERCENT_MOVE: toFloat(5).pipe(z.number().min(0).max(10_000)),
    BID_EXACT_PRICE: toFloat(199_999).pipe(z.number().min(0)),
    BID_EXACT_SHARES: toInt(100).pipe(z.number().int().min(0)),
    BID_HIGH_VALUE_PRICE: toFloat(2000).pipe(z.number().min(0)),
    BID_HIGH_VALUE_SHARES: toInt(20).pipe(z.number().int().min(0)),
    INSIDER_MIN_SHARES: toInt(10_000).pipe(z.number().int().min(1)),
    OPTIONS_MIN_VOL_OI_RATIO: toFloat(5).pipe(z.number().min(0)),
    OPTIONS_MIN_VOLUME: toInt(5000).pipe(z.number().int().min(0)),
    VOLUME_HISTORY_SIZE: toInt(30).pipe(z.number().int().min(1).max(10_000)),
    VOLUME_MIN_SAMPLES: toInt(5).pipe(z.number().int().min(1).max(10_000)),
    ALERT_COOLDOWN_SECONDS: seconds(300, 0, 7 * 24 * 3600),
    WATCHLIST_TTL_SECONDS: seconds(86_400, 60, 30 * 24 * 3600),

    PRIMARY_SCAN_INTERVAL_SECONDS: seconds(30, 1, 3600),
    OPTIONS_SCAN_INTERVAL_SECONDS: seconds(180, 1, 3600),
    SUMMARY_INTERVAL_SECONDS: seconds(300, 1, 24 * 3600),
    WATCHLIST_SWEEP_INTERVAL_SECONDS: seconds(30, 1, 3600),
    MARKET_CHECK_INTERVAL_SECONDS: seconds(60, 1, 3600),
    HOUSEKEEPING_INTERVAL_SECONDS: seconds(600, 10, 24 * 3600),
    SCHEDULER_TICK_MS: toInt(1000).pipe(z.number().int().min(1000).max(60_000)),
    CLOSED_HEARTBEAT_CHECKS: toInt(30).pipe(z.number().int().min(0).max(100_000)),
    NOTIFY_TASK_ERRORS: toBool(true).default(true),
  })
  .passthrough();

export const envSchema = envObject;

export const envSchemaWithRefinements = envObject.superRefine((env, ctx) => {
  if (env.MARKET_OPEN_HOUR >= env.MARKET_CLOSE_HOUR) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["MARKET_OPEN_HOUR"],
      message: "MARKET_OPEN_HOUR must be lower than MARKET_CLOSE_HOUR",
    });
  }

  if (env.VOLUME_MIN_SAMPLES > env.VOLUME_HISTORY_SIZE) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["VOLUME_MIN_SAMPLES"],
      message: "VOLUME_MIN_SAMPLES cannot exceed VOLUME_HISTORY_SIZE",
    });
  }
});

export type Env = z.infer<typeof envSchemaWithRefinements>;

/** One line per issue, e.g. `MBOUM_API_KEY: MBOUM_API_KEY is required`. */
export const formatEnvIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
