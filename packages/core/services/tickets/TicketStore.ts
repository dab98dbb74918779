/**
 * TicketStore contract
 *
 * The durability boundary of the support core. Implementations provide
 * record CRUD plus a transaction scope in which a ticket row can be read
 * and locked, then conditionally written (read-then-conditionally-write).
 *
 * Implementations throw StoreUnavailableError when the backend cannot be
 * reached. A transaction whose callback throws writes nothing.
 */

import type {
  Feedback,
  NewFeedback,
  NewResponse,
  NewTicket,
  ResponseRole,
  StaffActivity,
  SupportResponse,
  SupportTicket,
  ThreadHandle,
  ThreadMappingRecord,
  TicketId,
  TicketPatch,
  TicketSearch,
  TicketStatus,
  TicketSummary,
  User,
  UserId,
  UserProfile,
} from "./types";

export interface TicketTransaction {
  /** Read a ticket and hold its row lock until the transaction ends */
  getTicketForUpdate(ticketId: TicketId): Promise<SupportTicket | null>;

  findOpenTicketForUser(userId: UserId): Promise<SupportTicket | null>;

  insertTicket(input: NewTicket): Promise<SupportTicket>;

  updateTicket(ticketId: TicketId, patch: TicketPatch): Promise<SupportTicket>;

  /**
   * Assign the thread handle. A ticket's handle is assigned once; assigning a
   * different handle to a ticket that already has one throws.
   */
  setThreadHandle(
    ticketId: TicketId,
    threadHandle: ThreadHandle,
    initialMessageRef: string | null,
    at: Date
  ): Promise<SupportTicket>;

  appendResponse(input: NewResponse): Promise<SupportResponse>;

  /** Create the user on first contact, otherwise refresh profile and activity */
  upsertUser(userId: UserId, profile: UserProfile, at: Date): Promise<User>;
}

export interface TicketStore {
  transaction<T>(fn: (tx: TicketTransaction) => Promise<T>): Promise<T>;

  getTicket(ticketId: TicketId): Promise<SupportTicket | null>;

  getUser(userId: UserId): Promise<User | null>;

  /** Responses of a ticket ordered by (createdAt, id) */
  listResponses(ticketId: TicketId): Promise<SupportResponse[]>;

  findOpenTicketForUser(userId: UserId): Promise<SupportTicket | null>;

  listOpenTickets(): Promise<SupportTicket[]>;

  /** Every ticket's (handle, user, status), used to rebuild the thread registry */
  listThreadMappings(): Promise<ThreadMappingRecord[]>;

  countOpenTickets(): Promise<number>;

  /** Newest first, at most `search.limit` (default 50) */
  searchTickets(search: TicketSearch): Promise<TicketSummary[]>;

  countTicketsByStatus(): Promise<Record<TicketStatus, number>>;

  countTicketsCreatedSince(since: Date): Promise<number>;

  countResponsesSince(since: Date): Promise<Record<ResponseRole, number>>;

  /** Staff and admin replies per author since `since`, most active first */
  staffActivitySince(since: Date): Promise<StaffActivity[]>;

  /**
   * Mean time from ticket creation to its first staff reply, over tickets
   * created since `since` that have one. Null when there are none.
   */
  averageFirstReplyMs(since: Date): Promise<number | null>;

  countUsers(): Promise<number>;

  addFeedback(input: NewFeedback): Promise<Feedback>;

  countFeedbackSince(since: Date): Promise<number>;

  /** Cheap connectivity check */
  ping(): Promise<void>;
}
