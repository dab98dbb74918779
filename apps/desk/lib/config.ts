/**
 * Centralized Configuration
 *
 * Single source of truth for all environment variables.
 * - Getters read process.env on every access
 * - Provides typed access with sensible defaults
 * - validateConfig() fails fast if critical config is missing
 *
 * Usage:
 *   import { config } from '@/lib/config';
 *   const groupId = config.telegram.supportGroupId;
 *   const hours = config.support.urgentResponseHours;
 */

// =============================================================================
// Helpers
// =============================================================================

function required(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(
      `Missing required environment variable: ${name}\n` +
        `See .env.example for configuration options.`
    );
  }
  return value;
}

function optional(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

function optionalInt(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    console.warn(`Invalid integer for ${name}: "${value}", using default: ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function optionalFloat(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    console.warn(`Invalid float for ${name}: "${value}", using default: ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function optionalBool(name: string, defaultValue: boolean): boolean {
  const value = process.env[name];
  if (!value) return defaultValue;
  return value.toLowerCase() === "true" || value === "1";
}

/** Comma-separated numeric ids ("123, 456"). Invalid entries are skipped with a warning. */
function optionalIdList(name: string): number[] {
  const value = process.env[name];
  if (!value) return [];
  const ids: number[] = [];
  for (const part of value.split(",")) {
    const trimmed = part.trim();
    if (!trimmed) continue;
    const parsed = Number(trimmed);
    if (!Number.isSafeInteger(parsed)) {
      console.warn(`Invalid id in ${name}: "${trimmed}", skipping`);
      continue;
    }
    ids.push(parsed);
  }
  return ids;
}

const HOUR_MS = 60 * 60 * 1000;

// =============================================================================
// Configuration Object
// =============================================================================

export const config = {
  // ---------------------------------------------------------------------------
  // Database
  // ---------------------------------------------------------------------------
  database: {
    /** PostgreSQL connection string [REQUIRED in production] */
    get url(): string {
      return required("DATABASE_URL");
    },
    /** Without a database the service runs on the in-memory store */
    get isConfigured(): boolean {
      return !!process.env.DATABASE_URL;
    },
    /** Max pooled connections */
    get poolSize(): number {
      return optionalInt("DATABASE_POOL_SIZE", 10);
    },
  },

  // ---------------------------------------------------------------------------
  // Telegram
  // ---------------------------------------------------------------------------
  telegram: {
    /** Bot API token [REQUIRED] */
    get botToken(): string {
      return required("TELEGRAM_BOT_TOKEN");
    },
    get isConfigured(): boolean {
      return !!process.env.TELEGRAM_BOT_TOKEN;
    },
    /** Secret Telegram echoes in X-Telegram-Bot-Api-Secret-Token */
    get webhookSecret(): string | undefined {
      return process.env.TELEGRAM_WEBHOOK_SECRET;
    },
    /** Staff forum group (topics enabled) where ticket threads live [REQUIRED] */
    get supportGroupId(): number {
      return optionalInt("SUPPORT_GROUP_ID", 0);
    },
    /** Public channel for feedback announcements (optional) */
    get feedbackChannelId(): number | null {
      const id = optionalInt("FEEDBACK_CHANNEL_ID", 0);
      return id === 0 ? null : id;
    },
    get apiBaseUrl(): string {
      return optional("TELEGRAM_API_BASE_URL", "https://api.telegram.org");
    },
    /** Bot API request timeout (ms) */
    get timeoutMs(): number {
      return optionalInt("TELEGRAM_TIMEOUT_MS", 10000);
    },
  },

  // ---------------------------------------------------------------------------
  // Access
  // ---------------------------------------------------------------------------
  access: {
    /** Administrators: may reply, close and reopen */
    get adminIds(): number[] {
      return optionalIdList("ADMIN_IDS");
    },
    /** Support staff: may reply, close and reopen */
    get staffIds(): number[] {
      return optionalIdList("SUPPORT_STAFF_IDS");
    },
    /** Permanently suppressed users */
    get blockedUserIds(): number[] {
      return optionalIdList("BLOCKED_USER_IDS");
    },
    /** Bearer token for /api/support/* [REQUIRED] */
    get apiToken(): string | undefined {
      return process.env.SUPPORT_API_TOKEN;
    },
  },

  // ---------------------------------------------------------------------------
  // Support policy
  // ---------------------------------------------------------------------------
  support: {
    /** Waiting time after which a ticket is urgent */
    get urgentResponseHours(): number {
      return optionalFloat("URGENT_RESPONSE_HOURS", 2);
    },
    get urgentThresholdMs(): number {
      return Math.round(this.urgentResponseHours * HOUR_MS);
    },
    /** Escalation sweep interval (ms) */
    get escalationIntervalMs(): number {
      return optionalInt("ESCALATION_INTERVAL_MS", 5 * 60 * 1000);
    },
    /** Minimum gap between escalations of one ticket (ms) */
    get escalationCooldownMs(): number {
      return optionalInt("ESCALATION_COOLDOWN_MS", HOUR_MS);
    },
    /** Idle open tickets are closed after this many days; 0 disables */
    get autoCloseDays(): number {
      return optionalInt("AUTO_CLOSE_DAYS", 7);
    },
    get maxMessageLength(): number {
      return optionalInt("MAX_MESSAGE_LENGTH", 4000);
    },
    get allowReplyToClosed(): boolean {
      return optionalBool("ALLOW_REPLY_TO_CLOSED", false);
    },
    get notificationQueueSize(): number {
      return optionalInt("NOTIFICATION_QUEUE_SIZE", 100);
    },
  },

  // ---------------------------------------------------------------------------
  // Rate limiting & suppression
  // ---------------------------------------------------------------------------
  rateLimit: {
    /** Minimum gap between two messages of one user (ms) */
    get minIntervalMs(): number {
      return optionalInt("RATE_LIMIT_MIN_INTERVAL_MS", 5000);
    },
    get perHour(): number {
      return optionalInt("RATE_LIMIT_PER_HOUR", 20);
    },
    get perDay(): number {
      return optionalInt("RATE_LIMIT_PER_DAY", 100);
    },
    /** How long a spam-flagged user stays blocked (ms) */
    get spamBlockMs(): number {
      return optionalInt("SPAM_BLOCK_MS", HOUR_MS);
    },
  },

  // ---------------------------------------------------------------------------
  // Email
  // ---------------------------------------------------------------------------
  email: {
    get smtpHost(): string | undefined {
      return process.env.SMTP_HOST;
    },
    get smtpPort(): number {
      return optionalInt("SMTP_PORT", 587);
    },
    get smtpUser(): string | undefined {
      return process.env.SMTP_USER;
    },
    get smtpPassword(): string | undefined {
      return process.env.SMTP_PASSWORD;
    },
    get from(): string {
      return optional("EMAIL_FROM", "Event Support <support@localhost>");
    },
    /** Inbox that receives new-ticket and escalation emails */
    get supportEmail(): string | undefined {
      return process.env.SUPPORT_EMAIL;
    },
    get isConfigured(): boolean {
      return !!process.env.SMTP_HOST;
    },
  },

  // ---------------------------------------------------------------------------
  // Logging
  // ---------------------------------------------------------------------------
  logging: {
    get enabled(): boolean {
      return optionalBool("LOGGING_ENABLED", true);
    },
    get dir(): string {
      return optional("LOG_DIR", "logs");
    },
  },

  // ---------------------------------------------------------------------------
  // Application
  // ---------------------------------------------------------------------------
  app: {
    /** Display name used in emails and the welcome text */
    get name(): string {
      return optional("APP_NAME", "Event Support");
    },
    /** Node environment */
    get nodeEnv(): string {
      return optional("NODE_ENV", "development");
    },
    /** Is production environment */
    get isProduction(): boolean {
      return process.env.NODE_ENV === "production";
    },
    /** Start monitor and auto-close timers with the server */
    get backgroundJobsEnabled(): boolean {
      return optionalBool("BACKGROUND_JOBS_ENABLED", true);
    },
  },
} as const;

// =============================================================================
// Validation (call on app startup)
// =============================================================================

/**
 * Validate that all required environment variables are set.
 * Call this on app startup to fail fast if config is missing.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  if (!process.env.TELEGRAM_BOT_TOKEN) {
    errors.push("TELEGRAM_BOT_TOKEN is required");
  }
  if (!config.telegram.supportGroupId) {
    errors.push("SUPPORT_GROUP_ID is required");
  }
  if (!process.env.SUPPORT_API_TOKEN) {
    errors.push("SUPPORT_API_TOKEN is required");
  }
  if (config.app.isProduction && !process.env.DATABASE_URL) {
    errors.push("DATABASE_URL is required in production");
  }
  if (config.app.isProduction && !process.env.TELEGRAM_WEBHOOK_SECRET) {
    errors.push("TELEGRAM_WEBHOOK_SECRET is required in production");
  }

  if (!config.database.isConfigured) {
    console.warn("⚠️  DATABASE_URL not set. Tickets are kept in memory and lost on restart.");
  }
  if (config.access.adminIds.length === 0 && config.access.staffIds.length === 0) {
    console.warn("⚠️  No ADMIN_IDS or SUPPORT_STAFF_IDS configured. Staff replies will be ignored.");
  }

  if (errors.length > 0) {
    throw new Error(
      `Configuration validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}\n\n` +
        `See .env.example for configuration options.`
    );
  }
}

// =============================================================================
// Debug helper
// =============================================================================

/**
 * Get a sanitized view of current config (safe to log, no secrets)
 */
export function getConfigSummary(): Record<string, unknown> {
  return {
    database: {
      configured: config.database.isConfigured,
      poolSize: config.database.poolSize,
    },
    telegram: {
      configured: config.telegram.isConfigured,
      webhookSecretSet: !!config.telegram.webhookSecret,
      supportGroupId: config.telegram.supportGroupId,
      feedbackChannelId: config.telegram.feedbackChannelId ?? "(not set)",
    },
    access: {
      admins: config.access.adminIds.length,
      staff: config.access.staffIds.length,
      blocked: config.access.blockedUserIds.length,
      apiTokenSet: !!config.access.apiToken,
    },
    support: {
      urgentResponseHours: config.support.urgentResponseHours,
      escalationIntervalMs: config.support.escalationIntervalMs,
      escalationCooldownMs: config.support.escalationCooldownMs,
      autoCloseDays: config.support.autoCloseDays,
      maxMessageLength: config.support.maxMessageLength,
      allowReplyToClosed: config.support.allowReplyToClosed,
      notificationQueueSize: config.support.notificationQueueSize,
    },
    rateLimit: {
      minIntervalMs: config.rateLimit.minIntervalMs,
      perHour: config.rateLimit.perHour,
      perDay: config.rateLimit.perDay,
      spamBlockMs: config.rateLimit.spamBlockMs,
    },
    email: {
      configured: config.email.isConfigured,
      supportEmail: config.email.supportEmail ?? "(not set)",
    },
    logging: {
      enabled: config.logging.enabled,
      dir: config.logging.dir,
    },
    app: {
      name: config.app.name,
      nodeEnv: config.app.nodeEnv,
    },
  };
}
