/**
 * Text the router posts on its own behalf: thread titles, the ticket card,
 * prefixes on forwarded messages and lifecycle notices.
 */

import type {
  ClosedBy,
  MessageContent,
  StaffRole,
  SupportTicket,
  User,
} from "../tickets/types";

export interface RouterFormatter {
  threadTitle(ticket: SupportTicket, user: User | null): string;
  ticketCard(ticket: SupportTicket, user: User | null): string;
  /** User message as it appears in the staff thread */
  userMessage(ticket: SupportTicket, user: User | null, content: MessageContent): MessageContent;
  /** Staff reply as it appears in the user's chat */
  staffReply(role: StaffRole, content: MessageContent): MessageContent;
  closedNoticeForUser(ticket: SupportTicket): string;
  closedNoticeForThread(ticket: SupportTicket, closedBy: ClosedBy): string;
  reopenedNoticeForThread(ticket: SupportTicket, byUserMessage: boolean): string;
}

/** Max topic title length accepted by forum-style thread APIs */
const MAX_TITLE_LENGTH = 128;

export function displayNameOf(user: User | null, fallbackId: number): string {
  if (user?.displayName) return user.displayName;
  if (user?.username) return `@${user.username}`;
  return `User ${fallbackId}`;
}

function withPrefix(prefix: string, content: MessageContent): MessageContent {
  const text = content.text ? `${prefix}\n${content.text}` : prefix;
  return { text, attachment: content.attachment ?? null };
}

export const defaultFormatter: RouterFormatter = {
  threadTitle(ticket, user) {
    const title = `#${ticket.id} ${displayNameOf(user, ticket.userId)}`;
    return title.length > MAX_TITLE_LENGTH ? title.slice(0, MAX_TITLE_LENGTH) : title;
  },

  ticketCard(ticket, user) {
    const lines = [
      `🆕 Ticket #${ticket.id}`,
      `👤 ${displayNameOf(user, ticket.userId)}${user?.username ? ` (@${user.username})` : ""}`,
      `🆔 ${ticket.userId}`,
    ];
    if (ticket.contactEmail) lines.push(`📧 ${ticket.contactEmail}`);
    lines.push(`🕐 ${ticket.createdAt.toISOString()}`);
    return lines.join("\n");
  },

  userMessage(ticket, user, content) {
    return withPrefix(`👤 ${displayNameOf(user, ticket.userId)}:`, content);
  },

  staffReply(role, content) {
    return withPrefix(role === "admin" ? "👨‍💼 Administrator:" : "🧑‍💼 Support:", content);
  },

  closedNoticeForUser(ticket) {
    return (
      `✅ Request #${ticket.id} closed\n\n` +
      "Thank you for contacting us! If you have a new question, just write again."
    );
  },

  closedNoticeForThread(ticket, closedBy) {
    const by = closedBy === "system" ? "auto-close (inactivity)" : closedBy === ticket.userId ? "the user" : `staff ${closedBy}`;
    return `🔒 Ticket #${ticket.id} closed by ${by}`;
  },

  reopenedNoticeForThread(ticket, byUserMessage) {
    return byUserMessage
      ? `🔓 Ticket #${ticket.id} reopened: the user wrote again`
      : `🔓 Ticket #${ticket.id} reopened`;
  },
};
