/**
 * Database schema (drizzle, PostgreSQL)
 *
 * Mirrors db/init.sql. Platform user ids are 64-bit, so they are stored as
 * bigint and read back as numbers.
 */

import { bigint, index, integer, pgTable, serial, text, timestamp } from "drizzle-orm/pg-core";

export const users = pgTable("users", {
  id: bigint("id", { mode: "number" }).primaryKey(),
  displayName: text("display_name"),
  username: text("username"),
  locale: text("locale"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  lastActivityAt: timestamp("last_activity_at", { withTimezone: true }).notNull().defaultNow(),
});

export const supportTickets = pgTable(
  "support_tickets",
  {
    id: serial("id").primaryKey(),
    userId: bigint("user_id", { mode: "number" })
      .notNull()
      .references(() => users.id),
    contactEmail: text("contact_email"),
    status: text("status", { enum: ["open", "closed"] }).notNull().default("open"),
    threadHandle: text("thread_handle").unique(),
    initialMessageRef: text("initial_message_ref"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
    lastUserMessageAt: timestamp("last_user_message_at", { withTimezone: true }).notNull(),
    lastStaffResponseAt: timestamp("last_staff_response_at", { withTimezone: true }),
    closedAt: timestamp("closed_at", { withTimezone: true }),
    /** Platform user id, or "system" for the auto-close job */
    closedBy: text("closed_by"),
  },
  (table) => ({
    userStatusIdx: index("support_tickets_user_status_idx").on(table.userId, table.status),
  })
);

export const ticketResponses = pgTable(
  "ticket_responses",
  {
    id: serial("id").primaryKey(),
    ticketId: integer("ticket_id")
      .notNull()
      .references(() => supportTickets.id, { onDelete: "cascade" }),
    authorId: bigint("author_id", { mode: "number" }).notNull(),
    role: text("role", { enum: ["user", "staff", "admin"] }).notNull(),
    text: text("text"),
    attachmentKind: text("attachment_kind", { enum: ["photo", "document", "video"] }),
    attachmentRef: text("attachment_ref"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    ticketIdx: index("ticket_responses_ticket_idx").on(table.ticketId, table.createdAt),
  })
);

export const feedback = pgTable("feedback", {
  id: serial("id").primaryKey(),
  userId: bigint("user_id", { mode: "number" }).notNull(),
  category: text("category").notNull().default("general"),
  rating: integer("rating").notNull(),
  comment: text("comment"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});

export const schema = { users, supportTickets, ticketResponses, feedback };

export type UserRow = typeof users.$inferSelect;
export type TicketRow = typeof supportTickets.$inferSelect;
export type ResponseRow = typeof ticketResponses.$inferSelect;
export type FeedbackRow = typeof feedback.$inferSelect;
