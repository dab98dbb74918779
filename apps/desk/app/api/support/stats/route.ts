import { NextRequest } from "next/server";
import { describeError } from "@support-desk/core";
import { logAPI } from "@/lib/logger";
import { apiOk, supportErrorResponse } from "@/lib/api-utils";
import { requireSupportToken, isAuthError } from "@/lib/support/auth";
import { getRuntime } from "@/lib/support/runtime";

export const runtime = "nodejs";

/**
 * @api GET /api/support/stats
 * @visibility internal
 * @auth bearer
 * @tags support, metrics
 * @description Operational counters: open and urgent tickets, users, feedback
 *   in the last 24 h, dropped notifications, last escalation sweep. `statistics`
 *   adds ticket and message volume over 24 h / 7 d / 30 d, the average time to
 *   a first staff reply and per-staff reply counts for the last 7 days.
 * @response 200 { ok: true, stats: { openTickets, urgentTickets, ... }, statistics: { tickets, messages, ... }, dispatcher: { ... } }
 * @response 503 { ok: false, error, code: "STORE_UNAVAILABLE" }
 */
export async function GET(request: NextRequest) {
  const authResult = requireSupportToken(request);
  if (isAuthError(authResult)) return authResult.error;

  try {
    const support = getRuntime();
    const [stats, statistics] = await Promise.all([support.metrics.snapshot(), support.metrics.statistics()]);
    return apiOk({ stats, statistics, dispatcher: support.dispatcher.stats() });
  } catch (error) {
    const response = supportErrorResponse(error);
    logAPI("support.stats", { method: "GET", status: response.status, error: describeError(error) });
    return response;
  }
}
