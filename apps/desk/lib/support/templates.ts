/**
 * User- and staff-facing bot texts that are not part of the router's
 * ticket formatting.
 */

import { describeRateLimit, type RateLimitBlocked } from "@/lib/rate-limit";

export function welcomeText(appName: string, displayName: string | null): string {
  const greeting = displayName ? `Hi, ${displayName}! 👋` : "Hi! 👋";
  return [
    `🎪 Welcome to ${appName} support!`,
    "",
    greeting,
    "",
    "Just write your question here and our team will answer in this chat.",
    "",
    "• /new <text> starts a new request",
    "• /email <address> adds a contact email to your request",
    "• /feedback <1-5> [comment] rates the event",
  ].join("\n");
}

export function ticketConfirmation(ticketId: number, urgentResponseHours: number, askForEmail = false): string {
  const lines = [
    `✅ Your request #${ticketId} has been received!`,
    "",
    `⏱ We usually answer within ${urgentResponseHours} h.`,
    "📱 The answer will arrive in this chat.",
    "",
    "💬 You can keep writing: new messages are added to this request.",
  ];
  if (askForEmail) {
    lines.push("📧 Want updates by email too? Send /email <address>.");
  }
  return lines.join("\n");
}

export const EMAIL_USAGE = "Usage: /email <address>\nExample: /email ada@example.com";

export function invalidEmailNotice(address: string): string {
  return `❌ "${address}" is not a valid email address.\n\n${EMAIL_USAGE}`;
}

export function emailSaved(email: string, ticketId: number | null): string {
  return ticketId === null
    ? `📧 Saved ${email}. It will be added to your next request.`
    : `📧 Saved ${email} for request #${ticketId}.`;
}

export function rateLimitNotice(result: RateLimitBlocked): string {
  return `⏳ ${describeRateLimit(result.reason)}\n\nPlease wait ${result.retryAfter} s before sending the next message.`;
}

export const BLOCKED_NOTICE = "🚫 Your messages are temporarily not accepted. Please try again later.";

export function invalidContentNotice(reason: string): string {
  return `❌ ${reason}`;
}

export const FEEDBACK_USAGE = "Usage: /feedback <1-5> [comment]\nExample: /feedback 5 Great lineup!";

export function feedbackThanks(rating: number, comment: string | null): string {
  return [
    "✅ Thank you for your feedback!",
    "",
    `🌟 Rating: ${"⭐".repeat(rating)} (${rating}/5)`,
    `💬 Comment: ${comment ? "yes" : "no"}`,
  ].join("\n");
}

export const SERVICE_UNAVAILABLE_NOTICE = "⚠️ Support is temporarily unavailable. Please try again in a few minutes.";

// ── Staff thread notices ────────────────────────────────

export const UNKNOWN_THREAD_NOTICE = "⚠️ This thread is not linked to any ticket. The reply was not delivered.";

export function ticketClosedNotice(ticketId: number): string {
  return `⚠️ Ticket #${ticketId} is closed. Use /reopen to reply to the user.`;
}

export function openTicketExistsNotice(ticketId: number, openTicketId: number): string {
  return `⚠️ Ticket #${ticketId} cannot be reopened: the user already has open ticket #${openTicketId}.`;
}

export function deliveryFailedNotice(reason: string): string {
  return `⚠️ Saved, but not delivered to the user: ${reason}`;
}
