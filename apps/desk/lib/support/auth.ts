/**
 * Bearer-token access for /api/support/* routes.
 *
 * Usage:
 *   const authResult = requireSupportToken(request);
 *   if (isAuthError(authResult)) return authResult.error;
 */

import { NextResponse } from "next/server";
import crypto from "node:crypto";
import { config } from "@/lib/config";

type AuthSuccess = { ok: true };
type AuthFailure = { error: NextResponse };
type AuthResult = AuthSuccess | AuthFailure;

export function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) return false;
  return crypto.timingSafeEqual(left, right);
}

export function requireSupportToken(request: Request): AuthResult {
  const token = config.access.apiToken;
  if (!token) {
    console.error("[support/auth] SUPPORT_API_TOKEN is not configured");
    return {
      error: NextResponse.json({ ok: false, error: "Support API disabled" }, { status: 503 }),
    };
  }

  const header = request.headers.get("authorization") ?? "";
  const match = /^Bearer\s+(.+)$/i.exec(header);
  if (!match || !safeEqual(match[1].trim(), token)) {
    return {
      error: NextResponse.json({ ok: false, error: "Unauthorized" }, { status: 401 }),
    };
  }

  return { ok: true };
}

/**
 * Type guard: check if result is an auth error response.
 */
export function isAuthError(result: AuthResult): result is AuthFailure {
  return "error" in result;
}
