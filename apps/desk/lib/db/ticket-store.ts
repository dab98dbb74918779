/**
 * PostgresTicketStore
 *
 * TicketStore on PostgreSQL through drizzle. getTicketForUpdate takes a row
 * lock with SELECT ... FOR UPDATE that lasts until the surrounding
 * transaction commits or rolls back.
 *
 * Connection-level failures surface as StoreUnavailableError; constraint and
 * query errors are rethrown untouched.
 */

import { and, asc, count, desc, eq, gte, ilike, ne, or, sql, type SQL } from "drizzle-orm";
import {
  DEFAULT_SEARCH_LIMIT,
  StoreUnavailableError,
  describeError,
  type ClosedBy,
  type Feedback,
  type NewFeedback,
  type NewResponse,
  type NewTicket,
  type ResponseRole,
  type StaffActivity,
  type SupportResponse,
  type SupportTicket,
  type ThreadHandle,
  type ThreadMappingRecord,
  type TicketId,
  type TicketPatch,
  type TicketSearch,
  type TicketStatus,
  type TicketStore,
  type TicketSummary,
  type TicketTransaction,
  type User,
  type UserId,
  type UserProfile,
} from "@support-desk/core";
import type { Database } from "./client";
import {
  feedback,
  supportTickets,
  ticketResponses,
  users,
  type FeedbackRow,
  type ResponseRow,
  type TicketRow,
  type UserRow,
} from "./schema";

type Executor = Pick<Database, "select" | "insert" | "update">;

// =====================================================
// ROW MAPPING
// =====================================================

export function parseClosedBy(value: string | null): ClosedBy | null {
  if (value === null) return null;
  if (value === "system") return "system";
  const id = Number(value);
  return Number.isSafeInteger(id) ? id : null;
}

export function rowToTicket(row: TicketRow): SupportTicket {
  return {
    id: row.id,
    userId: row.userId,
    contactEmail: row.contactEmail,
    status: row.status,
    threadHandle: row.threadHandle,
    initialMessageRef: row.initialMessageRef,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    lastUserMessageAt: row.lastUserMessageAt,
    lastStaffResponseAt: row.lastStaffResponseAt,
    closedAt: row.closedAt,
    closedBy: parseClosedBy(row.closedBy),
  };
}

export function rowToResponse(row: ResponseRow): SupportResponse {
  return {
    id: row.id,
    ticketId: row.ticketId,
    authorId: row.authorId,
    role: row.role,
    text: row.text,
    attachment:
      row.attachmentKind && row.attachmentRef
        ? { kind: row.attachmentKind, fileRef: row.attachmentRef }
        : null,
    createdAt: row.createdAt,
  };
}

function rowToUser(row: UserRow): User {
  return { ...row };
}

function rowToFeedback(row: FeedbackRow): Feedback {
  return { ...row };
}

/** TicketPatch -> column values; closedBy is stored as text */
export function patchToColumns(patch: TicketPatch): Partial<typeof supportTickets.$inferInsert> {
  const { closedBy, ...rest } = patch;
  if (closedBy === undefined) return rest;
  return { ...rest, closedBy: closedBy === null ? null : String(closedBy) };
}

// =====================================================
// ERROR MAPPING
// =====================================================

const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "57P01", // admin_shutdown
  "57P03", // cannot_connect_now
  "53300", // too_many_connections
]);

function errorCode(error: unknown): string | null {
  if (typeof error !== "object" || error === null || !("code" in error)) return null;
  return typeof error.code === "string" ? error.code : null;
}

/** True for failures of the connection itself, looking through wrapped causes */
export function isConnectionError(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current; depth++) {
    const code = errorCode(current);
    if (code && (CONNECTION_ERROR_CODES.has(code) || code.startsWith("08"))) return true;
    if (current instanceof Error && /Connection terminated|timeout exceeded when trying to connect/i.test(current.message)) {
      return true;
    }
    current = current instanceof Error ? current.cause : null;
  }
  return false;
}

async function guarded<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof StoreUnavailableError) throw error;
    if (isConnectionError(error)) {
      throw new StoreUnavailableError(`Database unavailable during ${operation}: ${describeError(error)}`, error);
    }
    throw error;
  }
}

// =====================================================
// QUERIES
// =====================================================

async function findOpenTicket(db: Executor, userId: UserId): Promise<SupportTicket | null> {
  const rows = await db
    .select()
    .from(supportTickets)
    .where(and(eq(supportTickets.userId, userId), eq(supportTickets.status, "open")))
    .orderBy(desc(supportTickets.id))
    .limit(1);
  return rows.length > 0 ? rowToTicket(rows[0]) : null;
}

/** Escapes LIKE wildcards so the needle matches literally */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

function firstOrThrow<T>(rows: T[], what: string): T {
  if (rows.length === 0) {
    throw new Error(`${what} does not exist`);
  }
  return rows[0];
}

class PostgresTransaction implements TicketTransaction {
  constructor(private tx: Executor) {}

  async getTicketForUpdate(ticketId: TicketId): Promise<SupportTicket | null> {
    const rows = await this.tx
      .select()
      .from(supportTickets)
      .where(eq(supportTickets.id, ticketId))
      .for("update");
    return rows.length > 0 ? rowToTicket(rows[0]) : null;
  }

  findOpenTicketForUser(userId: UserId): Promise<SupportTicket | null> {
    return findOpenTicket(this.tx, userId);
  }

  async insertTicket(input: NewTicket): Promise<SupportTicket> {
    const rows = await this.tx
      .insert(supportTickets)
      .values({
        userId: input.userId,
        contactEmail: input.contactEmail,
        status: "open",
        createdAt: input.createdAt,
        updatedAt: input.createdAt,
        lastUserMessageAt: input.createdAt,
      })
      .returning();
    return rowToTicket(firstOrThrow(rows, "Inserted ticket"));
  }

  async updateTicket(ticketId: TicketId, patch: TicketPatch): Promise<SupportTicket> {
    const rows = await this.tx
      .update(supportTickets)
      .set(patchToColumns(patch))
      .where(eq(supportTickets.id, ticketId))
      .returning();
    return rowToTicket(firstOrThrow(rows, `Ticket #${ticketId}`));
  }

  async setThreadHandle(
    ticketId: TicketId,
    threadHandle: ThreadHandle,
    initialMessageRef: string | null,
    at: Date
  ): Promise<SupportTicket> {
    const current = await this.getTicketForUpdate(ticketId);
    if (!current) {
      throw new Error(`Ticket #${ticketId} does not exist`);
    }
    if (current.threadHandle !== null && current.threadHandle !== threadHandle) {
      throw new Error(`Ticket #${ticketId} already has thread ${current.threadHandle}`);
    }
    const rows = await this.tx
      .update(supportTickets)
      .set({ threadHandle, initialMessageRef, updatedAt: at })
      .where(eq(supportTickets.id, ticketId))
      .returning();
    return rowToTicket(firstOrThrow(rows, `Ticket #${ticketId}`));
  }

  async appendResponse(input: NewResponse): Promise<SupportResponse> {
    const rows = await this.tx
      .insert(ticketResponses)
      .values({
        ticketId: input.ticketId,
        authorId: input.authorId,
        role: input.role,
        text: input.text,
        attachmentKind: input.attachment?.kind ?? null,
        attachmentRef: input.attachment?.fileRef ?? null,
        createdAt: input.createdAt,
      })
      .returning();
    return rowToResponse(firstOrThrow(rows, "Inserted response"));
  }

  async upsertUser(userId: UserId, profile: UserProfile, at: Date): Promise<User> {
    const rows = await this.tx
      .insert(users)
      .values({
        id: userId,
        displayName: profile.displayName ?? null,
        username: profile.username ?? null,
        locale: profile.locale ?? null,
        createdAt: at,
        lastActivityAt: at,
      })
      .onConflictDoUpdate({
        target: users.id,
        set: {
          displayName: sql`coalesce(excluded.display_name, ${users.displayName})`,
          username: sql`coalesce(excluded.username, ${users.username})`,
          locale: sql`coalesce(excluded.locale, ${users.locale})`,
          lastActivityAt: at,
        },
      })
      .returning();
    return rowToUser(firstOrThrow(rows, `User ${userId}`));
  }
}

// =====================================================
// STORE
// =====================================================

export class PostgresTicketStore implements TicketStore {
  constructor(private db: Database) {}

  transaction<T>(fn: (tx: TicketTransaction) => Promise<T>): Promise<T> {
    return guarded("transaction", () => this.db.transaction((tx) => fn(new PostgresTransaction(tx))));
  }

  getTicket(ticketId: TicketId): Promise<SupportTicket | null> {
    return guarded("getTicket", async () => {
      const rows = await this.db.select().from(supportTickets).where(eq(supportTickets.id, ticketId));
      return rows.length > 0 ? rowToTicket(rows[0]) : null;
    });
  }

  getUser(userId: UserId): Promise<User | null> {
    return guarded("getUser", async () => {
      const rows = await this.db.select().from(users).where(eq(users.id, userId));
      return rows.length > 0 ? rowToUser(rows[0]) : null;
    });
  }

  listResponses(ticketId: TicketId): Promise<SupportResponse[]> {
    return guarded("listResponses", async () => {
      const rows = await this.db
        .select()
        .from(ticketResponses)
        .where(eq(ticketResponses.ticketId, ticketId))
        .orderBy(asc(ticketResponses.createdAt), asc(ticketResponses.id));
      return rows.map(rowToResponse);
    });
  }

  findOpenTicketForUser(userId: UserId): Promise<SupportTicket | null> {
    return guarded("findOpenTicketForUser", () => findOpenTicket(this.db, userId));
  }

  listOpenTickets(): Promise<SupportTicket[]> {
    return guarded("listOpenTickets", async () => {
      const rows = await this.db
        .select()
        .from(supportTickets)
        .where(eq(supportTickets.status, "open"))
        .orderBy(asc(supportTickets.id));
      return rows.map(rowToTicket);
    });
  }

  listThreadMappings(): Promise<ThreadMappingRecord[]> {
    return guarded("listThreadMappings", async () => {
      const rows = await this.db
        .select({
          ticketId: supportTickets.id,
          threadHandle: supportTickets.threadHandle,
          userId: supportTickets.userId,
          status: supportTickets.status,
          createdAt: supportTickets.createdAt,
        })
        .from(supportTickets)
        .orderBy(asc(supportTickets.id));
      return rows;
    });
  }

  countOpenTickets(): Promise<number> {
    return guarded("countOpenTickets", async () => {
      const rows = await this.db
        .select({ value: count() })
        .from(supportTickets)
        .where(eq(supportTickets.status, "open"));
      return rows[0]?.value ?? 0;
    });
  }

  searchTickets(search: TicketSearch): Promise<TicketSummary[]> {
    return guarded("searchTickets", async () => {
      const firstMessage = sql<string | null>`(
        select ${ticketResponses.text} from ${ticketResponses}
        where ${ticketResponses.ticketId} = ${supportTickets.id} and ${ticketResponses.role} = 'user'
        order by ${ticketResponses.createdAt}, ${ticketResponses.id}
        limit 1
      )`;

      const conditions: SQL[] = [];
      if (search.userId !== undefined) conditions.push(eq(supportTickets.userId, search.userId));
      if (search.status !== undefined) conditions.push(eq(supportTickets.status, search.status));
      const needle = search.query?.trim();
      if (needle) {
        const pattern = `%${escapeLike(needle)}%`;
        const match = or(
          ilike(firstMessage, pattern),
          ilike(users.displayName, pattern),
          ilike(users.username, pattern),
          ilike(supportTickets.contactEmail, pattern)
        );
        if (match) conditions.push(match);
      }

      const rows = await this.db
        .select({
          ticket: supportTickets,
          displayName: users.displayName,
          username: users.username,
          firstMessage,
        })
        .from(supportTickets)
        .innerJoin(users, eq(users.id, supportTickets.userId))
        .where(and(...conditions))
        .orderBy(desc(supportTickets.createdAt), desc(supportTickets.id))
        .limit(search.limit ?? DEFAULT_SEARCH_LIMIT);

      return rows.map((row) => ({
        ticket: rowToTicket(row.ticket),
        displayName: row.displayName,
        username: row.username,
        firstMessage: row.firstMessage,
      }));
    });
  }

  countTicketsByStatus(): Promise<Record<TicketStatus, number>> {
    return guarded("countTicketsByStatus", async () => {
      const rows = await this.db
        .select({ status: supportTickets.status, value: count() })
        .from(supportTickets)
        .groupBy(supportTickets.status);
      const counts: Record<TicketStatus, number> = { open: 0, closed: 0 };
      for (const row of rows) counts[row.status] = row.value;
      return counts;
    });
  }

  countTicketsCreatedSince(since: Date): Promise<number> {
    return guarded("countTicketsCreatedSince", async () => {
      const rows = await this.db
        .select({ value: count() })
        .from(supportTickets)
        .where(gte(supportTickets.createdAt, since));
      return rows[0]?.value ?? 0;
    });
  }

  countResponsesSince(since: Date): Promise<Record<ResponseRole, number>> {
    return guarded("countResponsesSince", async () => {
      const rows = await this.db
        .select({ role: ticketResponses.role, value: count() })
        .from(ticketResponses)
        .where(gte(ticketResponses.createdAt, since))
        .groupBy(ticketResponses.role);
      const counts: Record<ResponseRole, number> = { user: 0, staff: 0, admin: 0 };
      for (const row of rows) counts[row.role] = row.value;
      return counts;
    });
  }

  staffActivitySince(since: Date): Promise<StaffActivity[]> {
    return guarded("staffActivitySince", async () => {
      const replies = count();
      const rows = await this.db
        .select({ authorId: ticketResponses.authorId, role: ticketResponses.role, replies })
        .from(ticketResponses)
        .where(and(ne(ticketResponses.role, "user"), gte(ticketResponses.createdAt, since)))
        .groupBy(ticketResponses.authorId, ticketResponses.role)
        .orderBy(desc(replies), asc(ticketResponses.authorId));
      return rows.flatMap((row) =>
        row.role === "user" ? [] : [{ authorId: row.authorId, role: row.role, replies: row.replies }]
      );
    });
  }

  averageFirstReplyMs(since: Date): Promise<number | null> {
    return guarded("averageFirstReplyMs", async () => {
      const firstReplies = this.db
        .select({
          ticketId: ticketResponses.ticketId,
          repliedAt: sql<Date>`min(${ticketResponses.createdAt})`.as("replied_at"),
        })
        .from(ticketResponses)
        .where(ne(ticketResponses.role, "user"))
        .groupBy(ticketResponses.ticketId)
        .as("first_replies");

      // avg() comes back from pg as a numeric string
      const rows = await this.db
        .select({
          value: sql<string | null>`avg(extract(epoch from (${firstReplies.repliedAt} - ${supportTickets.createdAt})) * 1000)`,
        })
        .from(supportTickets)
        .innerJoin(firstReplies, eq(firstReplies.ticketId, supportTickets.id))
        .where(gte(supportTickets.createdAt, since));
      const value = rows[0]?.value;
      return value === null || value === undefined ? null : Math.round(Number(value));
    });
  }

  countUsers(): Promise<number> {
    return guarded("countUsers", async () => {
      const rows = await this.db.select({ value: count() }).from(users);
      return rows[0]?.value ?? 0;
    });
  }

  addFeedback(input: NewFeedback): Promise<Feedback> {
    return guarded("addFeedback", async () => {
      const rows = await this.db.insert(feedback).values(input).returning();
      return rowToFeedback(firstOrThrow(rows, "Inserted feedback"));
    });
  }

  countFeedbackSince(since: Date): Promise<number> {
    return guarded("countFeedbackSince", async () => {
      const rows = await this.db
        .select({ value: count() })
        .from(feedback)
        .where(gte(feedback.createdAt, since));
      return rows[0]?.value ?? 0;
    });
  }

  ping(): Promise<void> {
    return guarded("ping", async () => {
      await this.db.execute(sql`select 1`);
    });
  }
}
