import { NextRequest } from "next/server";
import { describeError } from "@support-desk/core";
import { logAPI } from "@/lib/logger";
import { apiOk, supportErrorResponse } from "@/lib/api-utils";
import { requireSupportToken, isAuthError } from "@/lib/support/auth";
import { feedbackSchema, readJson, validateBody } from "@/lib/validation";
import { getRuntime } from "@/lib/support/runtime";

export const runtime = "nodejs";

/**
 * @api POST /api/support/feedback
 * @visibility internal
 * @auth bearer
 * @tags support, feedback
 * @description Record a 1-5 rating with an optional comment and announce it
 *   to the feedback channel.
 * @body userId number
 * @body rating number - 1 to 5
 * @body comment string - Optional
 * @body category string - Optional, default "general"
 * @response 201 { ok: true, feedback }
 * @response 400 { ok: false, error: "Invalid request", details }
 */
export async function POST(request: NextRequest) {
  const authResult = requireSupportToken(request);
  if (isAuthError(authResult)) return authResult.error;

  const v = validateBody(feedbackSchema, await readJson(request));
  if (!v.ok) return v.error;
  const { userId, rating, comment, category } = v.data;

  try {
    const feedback = await getRuntime().feedback.recordFeedback(userId, rating, comment, category);
    logAPI("support.feedback", { method: "POST", status: 201, userId, rating });
    return apiOk({ feedback }, 201);
  } catch (error) {
    const response = supportErrorResponse(error);
    logAPI("support.feedback", { method: "POST", status: response.status, error: describeError(error) });
    return response;
  }
}
