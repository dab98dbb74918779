/**
 * Ticket lifecycle transitions
 *
 * Pure functions computing the patch a message or staff action applies to a
 * ticket. The router runs them inside a store transaction while holding the
 * ticket lock. Timestamps never move backwards, so a staff reply always
 * leaves lastStaffResponseAt >= lastUserMessageAt.
 */

import type { ClosedBy, SupportTicket, TicketPatch } from "./types";

function latest(a: Date, b: Date | null): Date {
  return b !== null && b.getTime() > a.getTime() ? b : a;
}

export interface UserMessageTransition {
  patch: TicketPatch;
  /** The ticket was closed and this message reopens it */
  reopened: boolean;
}

/**
 * A user message on an existing ticket. A message landing on a ticket that
 * was closed in the meantime reopens it: an unanswered user message is never
 * dropped.
 */
export function applyUserMessage(ticket: SupportTicket, now: Date): UserMessageTransition {
  const at = latest(now, ticket.lastUserMessageAt);
  const reopened = ticket.status === "closed";
  const patch: TicketPatch = {
    lastUserMessageAt: at,
    updatedAt: latest(at, ticket.updatedAt),
  };
  if (reopened) {
    patch.status = "open";
    patch.closedAt = null;
    patch.closedBy = null;
  }
  return { patch, reopened };
}

/**
 * Whether a closed ticket was closed after the message arrived, that is, the
 * close raced the message. Only such a message reopens the ticket; a close
 * persisted before the message arrived means the user starts a new ticket.
 */
export function closedAfter(ticket: SupportTicket, arrivedAt: Date): boolean {
  return ticket.closedAt !== null && ticket.closedAt.getTime() > arrivedAt.getTime();
}

/** Whether nothing touched the ticket at or after the given instant */
export function untouchedSince(ticket: SupportTicket, since: Date): boolean {
  return ticket.updatedAt.getTime() < since.getTime();
}

export function applyStaffReply(ticket: SupportTicket, now: Date): TicketPatch {
  const at = latest(latest(now, ticket.lastUserMessageAt), ticket.lastStaffResponseAt);
  return {
    lastStaffResponseAt: at,
    updatedAt: latest(at, ticket.updatedAt),
  };
}

/** Returns null when the ticket is already closed (close is idempotent) */
export function applyClose(
  ticket: SupportTicket,
  closedBy: ClosedBy,
  now: Date
): TicketPatch | null {
  if (ticket.status === "closed") return null;
  const at = latest(now, ticket.updatedAt);
  return {
    status: "closed",
    closedAt: at,
    closedBy,
    updatedAt: at,
  };
}

/** Returns null when the ticket is already open */
export function applyReopen(ticket: SupportTicket, now: Date): TicketPatch | null {
  if (ticket.status === "open") return null;
  return {
    status: "open",
    closedAt: null,
    closedBy: null,
    updatedAt: latest(now, ticket.updatedAt),
  };
}

/**
 * Whether the user is owed a reply: no staff response yet, or the user spoke
 * after the last staff response.
 */
export function isAwaitingStaff(ticket: SupportTicket): boolean {
  if (ticket.status !== "open") return false;
  if (ticket.lastStaffResponseAt === null) return true;
  return ticket.lastUserMessageAt.getTime() > ticket.lastStaffResponseAt.getTime();
}

/** How long the user has been waiting, measured from their latest message */
export function waitingDurationMs(ticket: SupportTicket, now: Date): number {
  const since = latest(ticket.lastUserMessageAt, ticket.createdAt);
  return Math.max(0, now.getTime() - since.getTime());
}
