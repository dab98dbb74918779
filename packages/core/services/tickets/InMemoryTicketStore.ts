/**
 * InMemoryTicketStore
 *
 * TicketStore kept in process memory. Used for local development when no
 * DATABASE_URL is configured, and as the store behind the core's tests.
 *
 * Transactions buffer their writes and apply them on commit, so a callback
 * that throws leaves the store untouched. getTicketForUpdate holds a
 * per-ticket lock until commit/rollback, mirroring SELECT ... FOR UPDATE.
 * Ids are allocated at insert time and are not reused after a rollback.
 */

import { KeyedMutex } from "./KeyedMutex";
import { StoreUnavailableError } from "./errors";
import type { TicketStore, TicketTransaction } from "./TicketStore";
import { DEFAULT_SEARCH_LIMIT } from "./types";
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

interface StoreState {
  users: Map<UserId, User>;
  tickets: Map<TicketId, SupportTicket>;
  responses: SupportResponse[];
  feedback: Feedback[];
  nextTicketId: number;
  nextResponseId: number;
  nextFeedbackId: number;
}

function copyTicket(ticket: SupportTicket): SupportTicket {
  return { ...ticket };
}

function compareResponses(a: SupportResponse, b: SupportResponse): number {
  return a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id;
}

export class InMemoryTicketStore implements TicketStore {
  private state: StoreState = {
    users: new Map(),
    tickets: new Map(),
    responses: [],
    feedback: [],
    nextTicketId: 1,
    nextResponseId: 1,
    nextFeedbackId: 1,
  };
  private rowLocks = new KeyedMutex();
  private unavailable = false;

  async transaction<T>(fn: (tx: TicketTransaction) => Promise<T>): Promise<T> {
    this.assertAvailable();
    const tx = new InMemoryTransaction(this.state, this.rowLocks);
    try {
      const result = await fn(tx);
      this.assertAvailable();
      tx.commit();
      return result;
    } finally {
      tx.releaseLocks();
    }
  }

  async getTicket(ticketId: TicketId): Promise<SupportTicket | null> {
    this.assertAvailable();
    const ticket = this.state.tickets.get(ticketId);
    return ticket ? copyTicket(ticket) : null;
  }

  async getUser(userId: UserId): Promise<User | null> {
    this.assertAvailable();
    const user = this.state.users.get(userId);
    return user ? { ...user } : null;
  }

  async listResponses(ticketId: TicketId): Promise<SupportResponse[]> {
    this.assertAvailable();
    return this.state.responses
      .filter((r) => r.ticketId === ticketId)
      .sort(compareResponses)
      .map((r) => ({ ...r }));
  }

  async findOpenTicketForUser(userId: UserId): Promise<SupportTicket | null> {
    this.assertAvailable();
    return latestOpenTicket(this.state.tickets.values(), userId);
  }

  async listOpenTickets(): Promise<SupportTicket[]> {
    this.assertAvailable();
    return Array.from(this.state.tickets.values())
      .filter((t) => t.status === "open")
      .sort((a, b) => a.id - b.id)
      .map(copyTicket);
  }

  async listThreadMappings(): Promise<ThreadMappingRecord[]> {
    this.assertAvailable();
    return Array.from(this.state.tickets.values())
      .sort((a, b) => a.id - b.id)
      .map((t) => ({
        ticketId: t.id,
        threadHandle: t.threadHandle,
        userId: t.userId,
        status: t.status,
        createdAt: t.createdAt,
      }));
  }

  async countOpenTickets(): Promise<number> {
    this.assertAvailable();
    let count = 0;
    for (const ticket of this.state.tickets.values()) {
      if (ticket.status === "open") count++;
    }
    return count;
  }

  async searchTickets(search: TicketSearch): Promise<TicketSummary[]> {
    this.assertAvailable();
    const needle = search.query?.trim().toLowerCase() || null;

    const hits: TicketSummary[] = [];
    for (const ticket of this.state.tickets.values()) {
      if (search.userId !== undefined && ticket.userId !== search.userId) continue;
      if (search.status !== undefined && ticket.status !== search.status) continue;

      const user = this.state.users.get(ticket.userId);
      const summary: TicketSummary = {
        ticket: copyTicket(ticket),
        displayName: user?.displayName ?? null,
        username: user?.username ?? null,
        firstMessage: this.firstUserMessage(ticket.id),
      };
      if (needle) {
        const fields = [summary.firstMessage, summary.displayName, summary.username, ticket.contactEmail];
        if (!fields.some((field) => field?.toLowerCase().includes(needle))) continue;
      }
      hits.push(summary);
    }

    return hits
      .sort((a, b) => b.ticket.createdAt.getTime() - a.ticket.createdAt.getTime() || b.ticket.id - a.ticket.id)
      .slice(0, search.limit ?? DEFAULT_SEARCH_LIMIT);
  }

  async countTicketsByStatus(): Promise<Record<TicketStatus, number>> {
    this.assertAvailable();
    const counts: Record<TicketStatus, number> = { open: 0, closed: 0 };
    for (const ticket of this.state.tickets.values()) counts[ticket.status]++;
    return counts;
  }

  async countTicketsCreatedSince(since: Date): Promise<number> {
    this.assertAvailable();
    let count = 0;
    for (const ticket of this.state.tickets.values()) {
      if (ticket.createdAt.getTime() >= since.getTime()) count++;
    }
    return count;
  }

  async countResponsesSince(since: Date): Promise<Record<ResponseRole, number>> {
    this.assertAvailable();
    const counts: Record<ResponseRole, number> = { user: 0, staff: 0, admin: 0 };
    for (const response of this.state.responses) {
      if (response.createdAt.getTime() >= since.getTime()) counts[response.role]++;
    }
    return counts;
  }

  async staffActivitySince(since: Date): Promise<StaffActivity[]> {
    this.assertAvailable();
    const byAuthor = new Map<string, StaffActivity>();
    for (const response of this.state.responses) {
      if (response.role === "user" || response.createdAt.getTime() < since.getTime()) continue;
      const key = `${response.authorId}:${response.role}`;
      const current = byAuthor.get(key);
      if (current) {
        current.replies++;
      } else {
        byAuthor.set(key, { authorId: response.authorId, role: response.role, replies: 1 });
      }
    }
    return Array.from(byAuthor.values()).sort((a, b) => b.replies - a.replies || a.authorId - b.authorId);
  }

  async averageFirstReplyMs(since: Date): Promise<number | null> {
    this.assertAvailable();
    const firstReply = new Map<TicketId, number>();
    for (const response of this.state.responses) {
      if (response.role === "user") continue;
      const at = response.createdAt.getTime();
      const current = firstReply.get(response.ticketId);
      if (current === undefined || at < current) firstReply.set(response.ticketId, at);
    }

    const waits: number[] = [];
    for (const ticket of this.state.tickets.values()) {
      const repliedAt = firstReply.get(ticket.id);
      if (repliedAt === undefined || ticket.createdAt.getTime() < since.getTime()) continue;
      waits.push(repliedAt - ticket.createdAt.getTime());
    }
    if (waits.length === 0) return null;
    return Math.round(waits.reduce((sum, wait) => sum + wait, 0) / waits.length);
  }

  async countUsers(): Promise<number> {
    this.assertAvailable();
    return this.state.users.size;
  }

  async addFeedback(input: NewFeedback): Promise<Feedback> {
    this.assertAvailable();
    const feedback: Feedback = { id: this.state.nextFeedbackId++, ...input };
    this.state.feedback.push(feedback);
    return { ...feedback };
  }

  async countFeedbackSince(since: Date): Promise<number> {
    this.assertAvailable();
    return this.state.feedback.filter((f) => f.createdAt.getTime() >= since.getTime()).length;
  }

  async ping(): Promise<void> {
    this.assertAvailable();
  }

  /** Visible for testing: make every call fail as if the backend were down */
  _setUnavailableForTesting(unavailable: boolean): void {
    this.unavailable = unavailable;
  }

  private firstUserMessage(ticketId: TicketId): string | null {
    const first = this.state.responses
      .filter((r) => r.ticketId === ticketId && r.role === "user")
      .sort(compareResponses)[0];
    return first?.text ?? null;
  }

  private assertAvailable(): void {
    if (this.unavailable) {
      throw new StoreUnavailableError("In-memory store is marked unavailable");
    }
  }
}

function latestOpenTicket(
  tickets: Iterable<SupportTicket>,
  userId: UserId
): SupportTicket | null {
  let latest: SupportTicket | null = null;
  for (const ticket of tickets) {
    if (ticket.userId !== userId || ticket.status !== "open") continue;
    if (!latest || ticket.id > latest.id) {
      latest = ticket;
    }
  }
  return latest ? copyTicket(latest) : null;
}

class InMemoryTransaction implements TicketTransaction {
  private tickets = new Map<TicketId, SupportTicket>();
  private users = new Map<UserId, User>();
  private responses: SupportResponse[] = [];
  private releases = new Map<TicketId, () => void>();

  constructor(
    private state: StoreState,
    private rowLocks: KeyedMutex
  ) {}

  async getTicketForUpdate(ticketId: TicketId): Promise<SupportTicket | null> {
    if (!this.releases.has(ticketId)) {
      const release = await this.rowLocks.acquire(`ticket:${ticketId}`);
      this.releases.set(ticketId, release);
    }
    const ticket = this.readTicket(ticketId);
    return ticket ? copyTicket(ticket) : null;
  }

  async findOpenTicketForUser(userId: UserId): Promise<SupportTicket | null> {
    const merged = new Map(this.state.tickets);
    for (const [id, ticket] of this.tickets) merged.set(id, ticket);
    return latestOpenTicket(merged.values(), userId);
  }

  async insertTicket(input: NewTicket): Promise<SupportTicket> {
    const ticket: SupportTicket = {
      id: this.state.nextTicketId++,
      userId: input.userId,
      contactEmail: input.contactEmail,
      status: "open",
      threadHandle: null,
      initialMessageRef: null,
      createdAt: input.createdAt,
      updatedAt: input.createdAt,
      lastUserMessageAt: input.createdAt,
      lastStaffResponseAt: null,
      closedAt: null,
      closedBy: null,
    };
    this.tickets.set(ticket.id, ticket);
    return copyTicket(ticket);
  }

  async updateTicket(ticketId: TicketId, patch: TicketPatch): Promise<SupportTicket> {
    const current = this.readTicket(ticketId);
    if (!current) {
      throw new Error(`Ticket #${ticketId} does not exist`);
    }
    const next = { ...current, ...patch };
    this.tickets.set(ticketId, next);
    return copyTicket(next);
  }

  async setThreadHandle(
    ticketId: TicketId,
    threadHandle: ThreadHandle,
    initialMessageRef: string | null,
    at: Date
  ): Promise<SupportTicket> {
    const current = this.readTicket(ticketId);
    if (!current) {
      throw new Error(`Ticket #${ticketId} does not exist`);
    }
    if (current.threadHandle !== null && current.threadHandle !== threadHandle) {
      throw new Error(`Ticket #${ticketId} already has thread ${current.threadHandle}`);
    }
    const next = { ...current, threadHandle, initialMessageRef, updatedAt: at };
    this.tickets.set(ticketId, next);
    return copyTicket(next);
  }

  async appendResponse(input: NewResponse): Promise<SupportResponse> {
    const response: SupportResponse = { id: this.state.nextResponseId++, ...input };
    this.responses.push(response);
    return { ...response };
  }

  async upsertUser(userId: UserId, profile: UserProfile, at: Date): Promise<User> {
    const current = this.users.get(userId) ?? this.state.users.get(userId);
    const next: User = current
      ? {
          ...current,
          displayName: profile.displayName ?? current.displayName,
          username: profile.username ?? current.username,
          locale: profile.locale ?? current.locale,
          lastActivityAt: at,
        }
      : {
          id: userId,
          displayName: profile.displayName ?? null,
          username: profile.username ?? null,
          locale: profile.locale ?? null,
          createdAt: at,
          lastActivityAt: at,
        };
    this.users.set(userId, next);
    return { ...next };
  }

  commit(): void {
    for (const [id, ticket] of this.tickets) this.state.tickets.set(id, ticket);
    for (const [id, user] of this.users) this.state.users.set(id, user);
    this.state.responses.push(...this.responses);
  }

  releaseLocks(): void {
    for (const release of this.releases.values()) release();
    this.releases.clear();
  }

  private readTicket(ticketId: TicketId): SupportTicket | undefined {
    return this.tickets.get(ticketId) ?? this.state.tickets.get(ticketId);
  }
}
