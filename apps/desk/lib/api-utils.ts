import { NextResponse } from "next/server";
import { isSupportError, type SupportErrorCode } from "@support-desk/core";

/**
 * Standard JSON error response with `ok: false`.
 *
 * @example
 * ```ts
 * if (!id) return apiError("ID is required", 400);
 * ```
 */
export function apiError(message: string, status = 500, extra: Record<string, unknown> = {}) {
  return NextResponse.json({ ok: false, error: message, ...extra }, { status });
}

/**
 * Standard JSON success response with `ok: true`.
 *
 * @example
 * ```ts
 * return apiOk({ ticket, responses });
 * ```
 */
export function apiOk<T extends Record<string, unknown>>(data: T, status = 200) {
  return NextResponse.json({ ok: true, ...data }, { status });
}

export const SUPPORT_ERROR_STATUS: Record<SupportErrorCode, number> = {
  INVALID_CONTENT: 400,
  USER_BLOCKED: 403,
  UNKNOWN_THREAD: 404,
  TICKET_NOT_FOUND: 404,
  TICKET_ALREADY_CLOSED: 409,
  OPEN_TICKET_EXISTS: 409,
  DELIVERY_FAILED: 502,
  STORE_UNAVAILABLE: 503,
  SERVICE_SHUTTING_DOWN: 503,
};

/**
 * Map a thrown error onto the `{ ok: false, error, code }` response.
 * Anything that is not a SupportError is a 500.
 */
export function supportErrorResponse(error: unknown) {
  if (isSupportError(error)) {
    return apiError(error.message, SUPPORT_ERROR_STATUS[error.code], { code: error.code });
  }
  return apiError(error instanceof Error ? error.message : "Internal error", 500);
}

/** Parse a numeric route segment; null when it is not a positive integer */
export function parseId(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}
