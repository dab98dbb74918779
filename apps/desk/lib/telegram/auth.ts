/**
 * Telegram Webhook Authentication
 *
 * Telegram echoes the secret given to setWebhook in the
 * X-Telegram-Bot-Api-Secret-Token header of every update.
 */

import { NextResponse } from "next/server";
import { config } from "@/lib/config";
import { safeEqual } from "@/lib/support/auth";

export const SECRET_HEADER = "x-telegram-bot-api-secret-token";

/**
 * Verify a Telegram webhook request.
 * Returns null if valid, or a 401 NextResponse if invalid.
 *
 * When TELEGRAM_WEBHOOK_SECRET is not configured, requests pass through
 * (local dev); validateConfig() requires it in production.
 */
export function verifyTelegramRequest(request: Request): NextResponse | null {
  const secret = config.telegram.webhookSecret;
  if (!secret) return null;

  const provided = request.headers.get(SECRET_HEADER);
  if (!provided) {
    console.warn("[telegram/auth] Missing secret token header");
    return NextResponse.json({ ok: false, error: "Missing secret token" }, { status: 401 });
  }

  if (!safeEqual(provided, secret)) {
    console.warn("[telegram/auth] Invalid secret token");
    return NextResponse.json({ ok: false, error: "Invalid secret token" }, { status: 401 });
  }

  return null;
}
