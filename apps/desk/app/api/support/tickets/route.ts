import { NextRequest } from "next/server";
import { describeError } from "@support-desk/core";
import { logAPI } from "@/lib/logger";
import { apiOk, supportErrorResponse } from "@/lib/api-utils";
import { requireSupportToken, isAuthError } from "@/lib/support/auth";
import { ticketSearchQuerySchema, validateQuery } from "@/lib/validation";
import { getRuntime } from "@/lib/support/runtime";

export const runtime = "nodejs";

/**
 * @api GET /api/support/tickets
 * @visibility internal
 * @auth bearer
 * @tags support
 * @description Searches tickets, newest first. `q` matches the opening
 *   message, the user's name or username, or the contact email.
 * @query q string - Case-insensitive substring
 * @query userId number - Only this user's tickets
 * @query status string - open | closed
 * @query limit number - Max tickets (1-200, default 50)
 * @response 200 { ok: true, total, tickets: [{ ticket, displayName, username, firstMessage }] }
 * @response 503 { ok: false, error, code: "STORE_UNAVAILABLE" }
 */
export async function GET(request: NextRequest) {
  const authResult = requireSupportToken(request);
  if (isAuthError(authResult)) return authResult.error;

  const params = request.nextUrl.searchParams;
  const v = validateQuery(ticketSearchQuerySchema, {
    q: params.get("q"),
    userId: params.get("userId"),
    status: params.get("status"),
    limit: params.get("limit"),
  });
  if (!v.ok) return v.error;

  try {
    const { q, ...filters } = v.data;
    const tickets = await getRuntime().store.searchTickets({ query: q, ...filters });
    return apiOk({ total: tickets.length, tickets });
  } catch (error) {
    const response = supportErrorResponse(error);
    logAPI("support.tickets.search", { method: "GET", status: response.status, error: describeError(error) });
    return response;
  }
}
