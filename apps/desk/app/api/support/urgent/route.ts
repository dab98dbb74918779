import { NextRequest } from "next/server";
import { apiOk } from "@/lib/api-utils";
import { requireSupportToken, isAuthError } from "@/lib/support/auth";
import { urgentQuerySchema, validateQuery } from "@/lib/validation";
import { getRuntime } from "@/lib/support/runtime";

export const runtime = "nodejs";

/**
 * @api GET /api/support/urgent
 * @visibility internal
 * @auth bearer
 * @tags support
 * @description Tickets flagged urgent by the last escalation sweep, longest wait first.
 * @query limit number - Max tickets (1-500, default all)
 * @response 200 { ok: true, total, lastSweepAt, tickets: [{ ticketId, userId, threadHandle, waitingDurationMs, lastUserMessageAt }] }
 */
export async function GET(request: NextRequest) {
  const authResult = requireSupportToken(request);
  if (isAuthError(authResult)) return authResult.error;

  const v = validateQuery(urgentQuerySchema, { limit: request.nextUrl.searchParams.get("limit") });
  if (!v.ok) return v.error;

  const { monitor } = getRuntime();
  const urgent = monitor.urgentTickets();
  const tickets = v.data.limit ? urgent.slice(0, v.data.limit) : urgent;

  return apiOk({
    total: urgent.length,
    lastSweepAt: monitor.lastSweepAt?.toISOString() ?? null,
    tickets: tickets.map((t) => ({ ...t, lastUserMessageAt: t.lastUserMessageAt.toISOString() })),
  });
}
