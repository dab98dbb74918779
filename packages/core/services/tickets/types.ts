/**
 * Support ticket data model
 *
 * Shared record shapes for users, tickets, responses and feedback.
 * Stores persist these; the router and monitor only ever see these shapes.
 */

export type UserId = number;
export type TicketId = number;

/** Opaque reference to the staff-side discussion context (forum topic, thread, ...) */
export type ThreadHandle = string;

export type TicketStatus = "open" | "closed";

export type ResponseRole = "user" | "staff" | "admin";

export type StaffRole = Exclude<ResponseRole, "user">;

export type AttachmentKind = "photo" | "document" | "video";

export interface Attachment {
  kind: AttachmentKind;
  /** Platform file reference (e.g. a Telegram file_id) */
  fileRef: string;
}

/**
 * Content of one inbound or outbound message.
 * At least one of text/attachment must be present to be routable.
 */
export interface MessageContent {
  text?: string | null;
  attachment?: Attachment | null;
}

export interface UserProfile {
  displayName?: string | null;
  username?: string | null;
  locale?: string | null;
}

export interface User {
  id: UserId;
  displayName: string | null;
  username: string | null;
  locale: string | null;
  createdAt: Date;
  lastActivityAt: Date;
}

/** Who closed a ticket: a platform user id, or the idle auto-close job */
export type ClosedBy = UserId | "system";

export interface SupportTicket {
  id: TicketId;
  userId: UserId;
  contactEmail: string | null;
  status: TicketStatus;
  threadHandle: ThreadHandle | null;
  /** Platform reference of the ticket card posted first into the thread */
  initialMessageRef: string | null;
  createdAt: Date;
  updatedAt: Date;
  lastUserMessageAt: Date;
  lastStaffResponseAt: Date | null;
  closedAt: Date | null;
  closedBy: ClosedBy | null;
}

export interface SupportResponse {
  id: number;
  ticketId: TicketId;
  authorId: UserId;
  role: ResponseRole;
  text: string | null;
  attachment: Attachment | null;
  createdAt: Date;
}

export interface Feedback {
  id: number;
  userId: UserId;
  category: string;
  rating: number;
  comment: string | null;
  createdAt: Date;
}

// =====================================================
// Write shapes
// =====================================================

export interface NewTicket {
  userId: UserId;
  contactEmail: string | null;
  createdAt: Date;
}

export interface NewResponse {
  ticketId: TicketId;
  authorId: UserId;
  role: ResponseRole;
  text: string | null;
  attachment: Attachment | null;
  createdAt: Date;
}

export interface NewFeedback {
  userId: UserId;
  category: string;
  rating: number;
  comment: string | null;
  createdAt: Date;
}

/** Mutable ticket fields. threadHandle is set through setThreadHandle only. */
export type TicketPatch = Partial<
  Pick<
    SupportTicket,
    | "contactEmail"
    | "status"
    | "updatedAt"
    | "lastUserMessageAt"
    | "lastStaffResponseAt"
    | "closedAt"
    | "closedBy"
  >
>;

/** A (ticket, thread, user) triple used to rebuild the thread registry */
export interface ThreadMappingRecord {
  ticketId: TicketId;
  threadHandle: ThreadHandle | null;
  userId: UserId;
  status: TicketStatus;
  createdAt: Date;
}

// =====================================================
// Queries
// =====================================================

export const DEFAULT_SEARCH_LIMIT = 50;

export interface TicketSearch {
  /** Case-insensitive substring of the first message, name, username or contact email */
  query?: string;
  userId?: UserId;
  status?: TicketStatus;
  /** Default DEFAULT_SEARCH_LIMIT */
  limit?: number;
}

/** A search hit: the ticket with its owner's names and opening message */
export interface TicketSummary {
  ticket: SupportTicket;
  displayName: string | null;
  username: string | null;
  firstMessage: string | null;
}

export interface StaffActivity {
  authorId: UserId;
  role: StaffRole;
  replies: number;
}
