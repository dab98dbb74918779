import { NextRequest, NextResponse } from "next/server";
import { describeError, isSupportError } from "@support-desk/core";
import { config } from "@/lib/config";
import { log, logAPI } from "@/lib/logger";
import { readJson } from "@/lib/validation";
import { verifyTelegramRequest } from "@/lib/telegram/auth";
import { parseTelegramUpdate } from "@/lib/telegram/updates";
import { handleInboundEvent } from "@/lib/support/inbound";
import { getRuntime } from "@/lib/support/runtime";

export const runtime = "nodejs";

/**
 * @api POST /api/telegram/webhook
 * @visibility public
 * @auth webhook-secret
 * @tags telegram, support
 * @description Receives Telegram Bot API updates. Private chat messages are
 *   routed to the sender's ticket, staff group topic messages to the ticket's
 *   user. Updates the service does not handle are acknowledged and dropped.
 *
 *   Only STORE_UNAVAILABLE / SERVICE_SHUTTING_DOWN answer 503: nothing was
 *   written, so Telegram's redelivery is safe. Every other failure answers
 *   200 to stop redelivery of a half-processed update.
 * @response 200 { ok: true, status: "routed" | "welcome" | ... }
 * @response 400 { ok: false, error: "Invalid update" }
 * @response 401 { ok: false, error: "Invalid secret token" }
 * @response 503 { ok: false, error: "...", code }
 */
export async function POST(request: NextRequest) {
  const started = Date.now();
  const authError = verifyTelegramRequest(request);
  if (authError) return authError;

  const parsed = parseTelegramUpdate(await readJson(request), config.telegram.supportGroupId);
  if (!parsed.ok) {
    log("api", "telegram.webhook", { level: "warn", message: parsed.error });
    return NextResponse.json({ ok: false, error: "Invalid update" }, { status: 400 });
  }
  if (!parsed.event) {
    return NextResponse.json({ ok: true, status: "skipped" });
  }

  try {
    const support = getRuntime();
    const outcome = await handleInboundEvent(parsed.event, support);
    logAPI("telegram.webhook", {
      method: "POST",
      status: 200,
      outcome: outcome.status,
      durationMs: Date.now() - started,
    });
    return NextResponse.json({ ok: true, status: outcome.status });
  } catch (error) {
    const retryable =
      isSupportError(error) && (error.code === "STORE_UNAVAILABLE" || error.code === "SERVICE_SHUTTING_DOWN");
    const status = retryable ? 503 : 200;
    log("api", "telegram.webhook", {
      level: "error",
      message: describeError(error),
      status,
      durationMs: Date.now() - started,
    });
    return NextResponse.json(
      { ok: false, error: describeError(error), ...(isSupportError(error) ? { code: error.code } : {}) },
      { status },
    );
  }
}
