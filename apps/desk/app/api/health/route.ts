import { NextResponse } from "next/server";
import { describeError } from "@support-desk/core";
import { config } from "@/lib/config";
import { getRuntime } from "@/lib/support/runtime";

export const runtime = "nodejs";

type Check = { status: "ok" | "error" | "warning"; message: string; details?: Record<string, unknown> };

/**
 * GET /api/health
 *
 * Public health check:
 * - Ticket store connectivity (PostgreSQL, or the in-memory fallback)
 * - Escalation monitor state
 * - Notification queue
 * - Required environment variables
 *
 * Returns:
 * {
 *   ok: boolean,
 *   status: "ok" | "warning" | "error",
 *   checks: { store, monitor, notifications, env }
 * }
 */
export async function GET() {
  const checks: Record<string, Check> = {};

  // Required env first: the runtime cannot be built without it
  const requiredEnv = {
    TELEGRAM_BOT_TOKEN: config.telegram.isConfigured,
    SUPPORT_GROUP_ID: config.telegram.supportGroupId !== 0,
    SUPPORT_API_TOKEN: !!config.access.apiToken,
  };
  const allRequired = Object.values(requiredEnv).every(Boolean);
  checks.env = {
    status: allRequired ? "ok" : "error",
    message: allRequired ? "All required environment variables set" : "Missing required environment variables",
    details: { required: requiredEnv, databaseConfigured: config.database.isConfigured },
  };

  if (allRequired) {
    try {
      const support = getRuntime();

      try {
        await support.store.ping();
        checks.store = support.storeKind === "postgres"
          ? { status: "ok", message: "Database connection successful" }
          : { status: "warning", message: "In-memory store (tickets are lost on restart)" };
      } catch (err) {
        checks.store = { status: "error", message: describeError(err) };
      }

      checks.monitor = {
        status: support.monitor.isRunning || !config.app.backgroundJobsEnabled ? "ok" : "warning",
        message: support.monitor.isRunning ? "Escalation monitor running" : "Escalation monitor stopped",
        details: {
          lastSweepAt: support.monitor.lastSweepAt?.toISOString() ?? null,
          urgentTickets: support.monitor.urgentTicketCount(),
          skippedCycles: support.monitor.skippedCycles,
        },
      };

      const stats = support.dispatcher.stats();
      checks.notifications = {
        status: stats.dropped > 0 ? "warning" : "ok",
        message: `${stats.queued} queued, ${stats.dropped} dropped`,
        details: { ...stats },
      };
    } catch (err) {
      checks.runtime = { status: "error", message: describeError(err) };
    }
  }

  const hasError = Object.values(checks).some((c) => c.status === "error");
  const hasWarning = Object.values(checks).some((c) => c.status === "warning");

  return NextResponse.json(
    {
      ok: !hasError,
      status: hasError ? "error" : hasWarning ? "warning" : "ok",
      checks,
      timestamp: new Date().toISOString(),
    },
    { status: hasError ? 503 : 200 },
  );
}
