/**
 * Inbound handler
 *
 * Turns parsed platform events into router calls:
 *   private chat  - /start, /email, /feedback, /new, or a message for the user's ticket
 *   staff thread  - /close, /reopen, or a reply to the ticket's user
 *
 * Failures the sender can act on are answered in the same chat. Store and
 * shutdown failures are answered with a generic notice and rethrown so the
 * webhook can log them.
 */

import {
  OpenTicketExistsError,
  StoreUnavailableError,
  ServiceShuttingDownError,
  TicketAlreadyClosedError,
  describeError,
  isSupportError,
  type FeedbackService,
  type MessageContent,
  type MessageRouter,
  type MessagingPlatform,
  type Recipient,
  type RoutingResult,
  type StaffRole,
  type ThreadHandle,
  type ThreadRegistry,
  type TicketId,
} from "@support-desk/core";
import { config } from "@/lib/config";
import { log } from "@/lib/logger";
import { checkMessageRateLimit } from "@/lib/rate-limit";
import type { InboundEvent, StaffMessageEvent, UserMessageEvent } from "@/lib/telegram/updates";
import { emailSchema } from "@/lib/validation";
import type { ContactBook } from "./contacts";
import type { SuppressionList } from "./suppression";
import {
  BLOCKED_NOTICE,
  EMAIL_USAGE,
  FEEDBACK_USAGE,
  SERVICE_UNAVAILABLE_NOTICE,
  UNKNOWN_THREAD_NOTICE,
  deliveryFailedNotice,
  emailSaved,
  feedbackThanks,
  invalidEmailNotice,
  invalidContentNotice,
  openTicketExistsNotice,
  rateLimitNotice,
  ticketClosedNotice,
  ticketConfirmation,
  welcomeText,
} from "./templates";

export interface InboundDeps {
  router: Pick<
    MessageRouter,
    "routeUserMessage" | "routeStaffReply" | "closeTicket" | "reopenTicket" | "setContactEmail"
  >;
  registry: Pick<ThreadRegistry, "resolveByThread">;
  feedback: Pick<FeedbackService, "recordFeedback">;
  suppression: Pick<SuppressionList, "isBlocked" | "screen">;
  contacts: Pick<ContactBook, "remember" | "get">;
  platform: MessagingPlatform;
}

export type InboundOutcome =
  | { status: "welcome" }
  | { status: "feedback"; rating: number }
  | { status: "email"; ticketId: TicketId | null }
  | { status: "routed"; result: RoutingResult }
  | { status: "closed"; ticketId: TicketId }
  | { status: "reopened"; ticketId: TicketId }
  | { status: "rejected"; reason: string }
  | { status: "ignored" };

export async function handleInboundEvent(event: InboundEvent, deps: InboundDeps): Promise<InboundOutcome> {
  return event.kind === "user_message" ? handleUserMessage(event, deps) : handleStaffMessage(event, deps);
}

// =====================================================
// PRIVATE CHAT
// =====================================================

/** "/feedback 4 great food" -> { rating: 4, comment: "great food" } */
export function parseFeedbackArgs(args: string): { rating: number; comment: string | null } | null {
  const match = /^([1-5])(?:\s+([\s\S]*))?$/.exec(args.trim());
  if (!match) return null;
  return { rating: Number(match[1]), comment: match[2]?.trim() || null };
}

async function handleUserMessage(event: UserMessageEvent, deps: InboundDeps): Promise<InboundOutcome> {
  const user: Recipient = { kind: "user", userId: event.userId };
  const command = event.command;

  if (command?.name === "start" || command?.name === "help") {
    await reply(deps.platform, user, welcomeText(config.app.name, event.profile.displayName ?? null));
    return { status: "welcome" };
  }

  if (command?.name === "feedback") {
    const parsed = parseFeedbackArgs(command.args);
    if (!parsed) {
      await reply(deps.platform, user, FEEDBACK_USAGE);
      return { status: "rejected", reason: "feedback_usage" };
    }
    try {
      await deps.feedback.recordFeedback(event.userId, parsed.rating, parsed.comment);
    } catch (error) {
      return handleUserError(error, deps, user);
    }
    await reply(deps.platform, user, feedbackThanks(parsed.rating, parsed.comment));
    return { status: "feedback", rating: parsed.rating };
  }

  if (command?.name === "email") {
    return handleEmailCommand(event, command.args, deps);
  }

  const newArgs = command?.name === "new" ? command.args : null;
  const startNew = newArgs !== null;
  const content: MessageContent =
    newArgs !== null ? { text: newArgs, attachment: event.content.attachment ?? null } : event.content;

  if (startNew && !content.text?.trim() && !content.attachment) {
    await reply(deps.platform, user, "Usage: /new <your question>");
    return { status: "rejected", reason: "new_usage" };
  }

  if (deps.suppression.isBlocked(event.userId)) {
    return { status: "rejected", reason: "blocked" };
  }

  const limit = checkMessageRateLimit(event.userId);
  if (!limit.ok) {
    await reply(deps.platform, user, rateLimitNotice(limit));
    return { status: "rejected", reason: limit.reason };
  }

  if (deps.suppression.screen(event.userId, content.text).spam) {
    await reply(deps.platform, user, BLOCKED_NOTICE);
    return { status: "rejected", reason: "spam" };
  }

  const email = deps.contacts.get(event.userId);
  let result: RoutingResult;
  try {
    result = await deps.router.routeUserMessage(event.userId, content, email, {
      profile: event.profile,
      startNew,
    });
  } catch (error) {
    return handleUserError(error, deps, user);
  }

  if (result.action === "created") {
    await reply(
      deps.platform,
      user,
      ticketConfirmation(result.ticketId, config.support.urgentResponseHours, email === null),
    );
  }
  return { status: "routed", result };
}

/** "/email ada@example.com": remember the address and attach it to the open ticket */
async function handleEmailCommand(
  event: UserMessageEvent,
  args: string,
  deps: InboundDeps,
): Promise<InboundOutcome> {
  const user: Recipient = { kind: "user", userId: event.userId };
  const address = args.trim();
  if (!address) {
    await reply(deps.platform, user, EMAIL_USAGE);
    return { status: "rejected", reason: "email_usage" };
  }

  const parsed = emailSchema.safeParse(address);
  if (!parsed.success) {
    await reply(deps.platform, user, invalidEmailNotice(address));
    return { status: "rejected", reason: "invalid_email" };
  }

  deps.contacts.remember(event.userId, parsed.data);
  let ticketId: TicketId | null;
  try {
    ticketId = await deps.router.setContactEmail(event.userId, parsed.data);
  } catch (error) {
    return handleUserError(error, deps, user);
  }
  await reply(deps.platform, user, emailSaved(parsed.data, ticketId));
  return { status: "email", ticketId };
}

async function handleUserError(error: unknown, deps: InboundDeps, user: Recipient): Promise<InboundOutcome> {
  if (!isSupportError(error)) throw error;

  switch (error.code) {
    case "INVALID_CONTENT":
      await reply(deps.platform, user, invalidContentNotice(error.message));
      return { status: "rejected", reason: error.code };
    case "USER_BLOCKED":
      await reply(deps.platform, user, BLOCKED_NOTICE);
      return { status: "rejected", reason: error.code };
    case "STORE_UNAVAILABLE":
    case "SERVICE_SHUTTING_DOWN":
      await reply(deps.platform, user, SERVICE_UNAVAILABLE_NOTICE);
      throw error;
    default:
      throw error;
  }
}

// =====================================================
// STAFF THREAD
// =====================================================

export function staffRoleOf(userId: number): StaffRole | null {
  if (config.access.adminIds.includes(userId)) return "admin";
  if (config.access.staffIds.includes(userId)) return "staff";
  return null;
}

async function handleStaffMessage(event: StaffMessageEvent, deps: InboundDeps): Promise<InboundOutcome> {
  const role = staffRoleOf(event.staffId);
  if (!role) {
    return { status: "ignored" };
  }

  const staff: Recipient = { kind: "staff" };
  const thread = event.threadHandle;
  const command = event.command;

  try {
    if (command?.name === "close" || command?.name === "reopen") {
      const ticketId = await deps.registry.resolveByThread(thread);
      if (ticketId === null) {
        await reply(deps.platform, staff, UNKNOWN_THREAD_NOTICE, thread);
        return { status: "rejected", reason: "UNKNOWN_THREAD" };
      }
      if (command.name === "close") {
        await deps.router.closeTicket(ticketId, event.staffId);
        return { status: "closed", ticketId };
      }
      await deps.router.reopenTicket(ticketId, event.staffId);
      return { status: "reopened", ticketId };
    }

    if (command) {
      return { status: "ignored" };
    }

    const result = await deps.router.routeStaffReply(thread, event.staffId, event.content, role);
    if (result.deliveryError) {
      await reply(deps.platform, staff, deliveryFailedNotice(result.deliveryError.message), thread);
    }
    return { status: "routed", result };
  } catch (error) {
    return handleStaffError(error, deps, thread);
  }
}

async function handleStaffError(
  error: unknown,
  deps: InboundDeps,
  thread: ThreadHandle,
): Promise<InboundOutcome> {
  if (!isSupportError(error)) throw error;
  const staff: Recipient = { kind: "staff" };

  if (error instanceof OpenTicketExistsError) {
    await reply(deps.platform, staff, openTicketExistsNotice(error.ticketId, error.openTicketId), thread);
    return { status: "rejected", reason: error.code };
  }
  if (error instanceof StoreUnavailableError || error instanceof ServiceShuttingDownError) {
    await reply(deps.platform, staff, SERVICE_UNAVAILABLE_NOTICE, thread);
    throw error;
  }

  if (error instanceof TicketAlreadyClosedError) {
    await reply(deps.platform, staff, ticketClosedNotice(error.ticketId), thread);
  } else if (error.code === "UNKNOWN_THREAD" || error.code === "TICKET_NOT_FOUND") {
    await reply(deps.platform, staff, UNKNOWN_THREAD_NOTICE, thread);
  } else {
    await reply(deps.platform, staff, invalidContentNotice(error.message), thread);
  }
  return { status: "rejected", reason: error.code };
}

// =====================================================
// HELPERS
// =====================================================

/** Best-effort notice; a failed send is logged, never thrown */
async function reply(
  platform: MessagingPlatform,
  recipient: Recipient,
  text: string,
  threadHandle?: ThreadHandle,
): Promise<void> {
  try {
    const result = await platform.sendMessage(recipient, { text }, threadHandle);
    if (!result.ok) {
      log("routing", "inbound.notice_failed", { level: "warn", message: result.error, recipient: recipient.kind });
    }
  } catch (error) {
    log("routing", "inbound.notice_failed", { level: "warn", message: describeError(error), recipient: recipient.kind });
  }
}
