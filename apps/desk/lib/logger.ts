/**
 * General Logger - Unified logging system for the support desk
 *
 * Logs are written to: <LOG_DIR>/app.jsonl (one JSON object per line)
 *
 * Log types:
 *   - routing: ticket creation, forwarding, lifecycle, registry rebuilds
 *   - escalation: SLA sweeps and auto-close runs
 *   - notify: notification channel deliveries
 *   - api: API requests and responses
 *   - system: startup, shutdown and everything else
 *
 * Warnings and errors are echoed to the console as `[LEVEL] [stage] message`.
 *
 * Usage:
 *   import { log, logAPI } from "@/lib/logger";
 *   log("routing", "ticket.created", { ticketId: 12 });
 *   logAPI("support.stats", { method: "GET", status: 200 });
 */

import { appendFileSync, mkdirSync, existsSync, readFileSync } from "fs";
import { isAbsolute, join } from "path";
import type { SupportLogger } from "@support-desk/core";
import { config } from "@/lib/config";

// =====================================================
// TYPES
// =====================================================

export type LogType = "routing" | "escalation" | "notify" | "api" | "system";

export type LogLevel = "info" | "warn" | "error";

export const LOG_TYPES: readonly LogType[] = ["routing", "escalation", "notify", "api", "system"];

export interface LogEntry {
  timestamp: string;
  type: LogType;
  level: LogLevel;
  stage: string;
  message?: string;
  durationMs?: number;
  metadata?: Record<string, unknown>;
}

interface LoggingConfig {
  enabled: boolean;
  enabledTypes?: LogType[];
}

// =====================================================
// PATHS & CONFIG
// =====================================================

function logDir(): string {
  const dir = config.logging.dir;
  return isAbsolute(dir) ? dir : join(process.cwd(), dir);
}

/**
 * Get path to the log file
 */
export function getLogFilePath(): string {
  return join(logDir(), "app.jsonl");
}

function isLogType(value: unknown): value is LogType {
  return typeof value === "string" && (LOG_TYPES as readonly string[]).includes(value);
}

/**
 * Optional <LOG_DIR>/logging-config.json narrows what gets written:
 *   { "enabled": true, "enabledTypes": ["routing", "escalation"] }
 */
function getConfig(): LoggingConfig {
  const file = join(logDir(), "logging-config.json");
  if (!existsSync(file)) return { enabled: true };

  try {
    const raw: unknown = JSON.parse(readFileSync(file, "utf-8"));
    if (typeof raw !== "object" || raw === null) return { enabled: true };
    const enabled = "enabled" in raw ? raw.enabled !== false : true;
    const types = "enabledTypes" in raw && Array.isArray(raw.enabledTypes)
      ? raw.enabledTypes.filter(isLogType)
      : undefined;
    return { enabled, enabledTypes: types };
  } catch (error) {
    console.warn("[Logger] Ignoring unreadable logging-config.json:", error);
    return { enabled: true };
  }
}

/**
 * Check if logging is enabled (LOGGING_ENABLED and logging-config.json)
 */
export function isLoggingEnabled(): boolean {
  return config.logging.enabled && getConfig().enabled;
}

/**
 * Get enabled log types (default: all)
 */
export function getEnabledTypes(): LogType[] {
  return getConfig().enabledTypes ?? [...LOG_TYPES];
}

// =====================================================
// CORE LOGGING
// =====================================================

function echo(level: LogLevel, stage: string, message: string | undefined, data?: Record<string, unknown>): void {
  if (level === "info") return;
  const line = `[${level.toUpperCase()}] [${stage}] ${message ?? ""}`.trimEnd();
  const context = data && Object.keys(data).length > 0 ? data : "";
  if (level === "error") {
    console.error(line, context);
  } else {
    console.warn(line, context);
  }
}

/**
 * Write a log entry
 */
export function log(
  type: LogType,
  stage: string,
  data?: {
    level?: LogLevel;
    message?: string;
    durationMs?: number;
    [key: string]: unknown;
  }
): void {
  const level = data?.level ?? "info";
  echo(level, stage, data?.message, data);

  if (!isLoggingEnabled()) return;
  if (!getEnabledTypes().includes(type)) return;

  try {
    const dir = logDir();
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      type,
      level,
      stage,
      message: data?.message,
      durationMs: data?.durationMs,
      metadata: data,
    };

    appendFileSync(getLogFilePath(), JSON.stringify(entry) + "\n");
  } catch (error) {
    console.error("[Logger] Failed to write log:", error);
  }
}

/**
 * Log an API request
 */
export function logAPI(
  endpoint: string,
  data?: {
    method?: string;
    status?: number;
    durationMs?: number;
    [key: string]: unknown;
  }
): void {
  log("api", endpoint, { level: data?.status && data.status >= 500 ? "error" : "info", ...data });
}

/**
 * Log a system event
 */
export function logSystem(
  event: string,
  data?: {
    level?: LogLevel;
    message?: string;
    [key: string]: unknown;
  }
): void {
  log("system", event, data);
}

// =====================================================
// CORE ADAPTER
// =====================================================

const STAGE_TYPES: Record<string, LogType> = {
  routing: "routing",
  registry: "routing",
  feedback: "routing",
  escalation: "escalation",
  notify: "notify",
};

function typeForStage(stage: string): LogType {
  return STAGE_TYPES[stage] ?? "system";
}

/**
 * SupportLogger handed to the core services. Core stages map onto log types.
 */
export const supportLogger: SupportLogger = {
  info: (stage, message, data) => log(typeForStage(stage), stage, { ...data, level: "info", message }),
  warn: (stage, message, data) => log(typeForStage(stage), stage, { ...data, level: "warn", message }),
  error: (stage, message, data) => log(typeForStage(stage), stage, { ...data, level: "error", message }),
};
