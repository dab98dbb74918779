import { NextRequest } from "next/server";
import { UserBlockedError, describeError } from "@support-desk/core";
import { logAPI } from "@/lib/logger";
import { apiOk, supportErrorResponse } from "@/lib/api-utils";
import { requireSupportToken, isAuthError } from "@/lib/support/auth";
import { checkMessageRateLimit, rateLimitResponse } from "@/lib/rate-limit";
import { readJson, supportMessageSchema, validateBody } from "@/lib/validation";
import { getRuntime } from "@/lib/support/runtime";

export const runtime = "nodejs";

/**
 * @api POST /api/support/messages
 * @visibility internal
 * @auth bearer
 * @tags support
 * @description Routes a user message into the user's ticket (web widget and
 *   integrations). Same rate limits and spam screening as the bot.
 * @body userId number - Platform user id
 * @body text string - Message text (text or attachment required)
 * @body attachment { kind, fileRef } - Optional attachment
 * @body email string - Contact email, stored on the ticket
 * @body startNew boolean - Close the open ticket and start a new one
 * @response 200 { ok: true, ticketId, action, responseId, deliveryError? }
 * @response 400 { ok: false, error: "Invalid request", details }
 * @response 403 { ok: false, error, code: "USER_BLOCKED" }
 * @response 429 { ok: false, error, reason }
 * @response 503 { ok: false, error, code: "STORE_UNAVAILABLE" }
 */
export async function POST(request: NextRequest) {
  const authResult = requireSupportToken(request);
  if (isAuthError(authResult)) return authResult.error;

  const v = validateBody(supportMessageSchema, await readJson(request));
  if (!v.ok) return v.error;
  const body = v.data;

  try {
    const support = getRuntime();

    if (support.suppression.isBlocked(body.userId)) {
      return supportErrorResponse(new UserBlockedError(body.userId));
    }
    const limit = checkMessageRateLimit(body.userId);
    if (!limit.ok) return rateLimitResponse(limit);
    // A spam verdict blocks the author; the router then rejects the message
    support.suppression.screen(body.userId, body.text);

    const result = await support.router.routeUserMessage(
      body.userId,
      { text: body.text ?? null, attachment: body.attachment ?? null },
      body.email ?? null,
      {
        profile: { displayName: body.displayName ?? null, username: body.username ?? null },
        startNew: body.startNew ?? false,
      },
    );

    logAPI("support.messages", { method: "POST", status: 200, ticketId: result.ticketId, action: result.action });
    return apiOk({
      ticketId: result.ticketId,
      action: result.action,
      responseId: result.responseId,
      deliveryError: result.deliveryError?.message ?? null,
    });
  } catch (error) {
    const response = supportErrorResponse(error);
    logAPI("support.messages", { method: "POST", status: response.status, error: describeError(error) });
    return response;
  }
}
