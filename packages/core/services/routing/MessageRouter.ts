/**
 * MessageRouter
 *
 * Dispatcher between end users and the staff workspace. Every inbound
 * message is resolved to a ticket through the ThreadRegistry, persisted
 * through the TicketStore, and only then forwarded to its counterpart.
 *
 * Serialization:
 *   - user messages hold the `user:<id>` lock for the whole call, so a
 *     user's first messages can never create two tickets
 *   - every ticket mutation holds the `ticket:<id>` lock (always taken after
 *     the user lock, never before)
 *   - different tickets never wait on each other
 *
 * A failed outbound send never rolls back persisted state; it is returned
 * on the result as a DeliveryFailedError.
 */

import { KeyedMutex } from "../tickets/KeyedMutex";
import {
  DeliveryFailedError,
  InvalidContentError,
  OpenTicketExistsError,
  ServiceShuttingDownError,
  TicketAlreadyClosedError,
  TicketNotFoundError,
  UnknownThreadError,
  UserBlockedError,
  describeError,
} from "../tickets/errors";
import type { TicketStore } from "../tickets/TicketStore";
import {
  applyClose,
  applyReopen,
  applyStaffReply,
  applyUserMessage,
  closedAfter,
  untouchedSince,
} from "../tickets/transitions";
import type {
  ClosedBy,
  MessageContent,
  StaffRole,
  SupportResponse,
  SupportTicket,
  ThreadHandle,
  TicketId,
  User,
  UserId,
  UserProfile,
} from "../tickets/types";
import type { DeliveryResult, MessagingPlatform, Recipient } from "../messaging/MessagingPlatform";
import type { NotificationDispatcher } from "../notifications/NotificationDispatcher";
import { consoleLogger, systemClock, type Clock, type SupportLogger } from "../shared/logger";
import type { ThreadRegistry } from "./ThreadRegistry";
import { defaultFormatter, type RouterFormatter } from "./formatting";

export type RoutingAction = "created" | "forwarded" | "reopened";

export interface RoutingResult {
  ticketId: TicketId;
  action: RoutingAction;
  responseId: number;
  /** Present when the change was persisted but forwarding it failed */
  deliveryError?: DeliveryFailedError;
}

/** Suppression policy input (blocklists, abuse detection) */
export interface UserPolicy {
  isBlocked(userId: UserId): boolean | Promise<boolean>;
}

export interface UserMessageOptions {
  profile?: UserProfile;
  /** Close the user's open ticket and start a new one */
  startNew?: boolean;
}

export interface MessageRouterOptions {
  store: TicketStore;
  registry: ThreadRegistry;
  platform: MessagingPlatform;
  dispatcher?: NotificationDispatcher;
  policy?: UserPolicy;
  /** Accept staff replies on closed tickets. Default false. */
  allowReplyToClosed?: boolean;
  /** Longest accepted message text. Default 4000. */
  maxMessageLength?: number;
  formatter?: Partial<RouterFormatter>;
  logger?: SupportLogger;
  now?: Clock;
  locks?: KeyedMutex;
}

export interface CloseOptions {
  /** Close only when the ticket was not updated at or after this instant */
  ifUntouchedSince?: Date;
}

interface NormalizedContent {
  text: string | null;
  attachment: MessageContent["attachment"];
}

interface InboundUserMessage {
  userId: UserId;
  content: NormalizedContent;
  email: string | null;
  profile: UserProfile | undefined;
  /** When the router received the message, before any lock wait */
  arrivedAt: Date;
}

type CreateOutcome =
  | { kind: "existing"; ticket: SupportTicket }
  | { kind: "created"; ticket: SupportTicket; user: User; response: SupportResponse };

interface UnsavedThread {
  handle: ThreadHandle;
  cardRef: string | null;
}

const userKey = (userId: UserId) => `user:${userId}`;
const ticketKey = (ticketId: TicketId) => `ticket:${ticketId}`;

export class MessageRouter {
  private store: TicketStore;
  private registry: ThreadRegistry;
  private platform: MessagingPlatform;
  private dispatcher: NotificationDispatcher | null;
  private policy: UserPolicy | null;
  private allowReplyToClosed: boolean;
  private maxMessageLength: number;
  private format: RouterFormatter;
  private logger: SupportLogger;
  private now: Clock;
  private locks: KeyedMutex;

  private active = 0;
  private stopping = false;
  private idleWaiters: Array<() => void> = [];
  private unsavedThreads = new Map<TicketId, UnsavedThread>();

  constructor(options: MessageRouterOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.platform = options.platform;
    this.dispatcher = options.dispatcher ?? null;
    this.policy = options.policy ?? null;
    this.allowReplyToClosed = options.allowReplyToClosed ?? false;
    this.maxMessageLength = options.maxMessageLength ?? 4000;
    this.format = { ...defaultFormatter, ...options.formatter };
    this.logger = options.logger ?? consoleLogger;
    this.now = options.now ?? systemClock;
    this.locks = options.locks ?? new KeyedMutex();
  }

  // =====================================================
  // USER -> STAFF
  // =====================================================

  /**
   * Route a message from an end user. Appends to the user's open ticket, or
   * creates a ticket (and its staff thread) when there is none.
   */
  routeUserMessage(
    userId: UserId,
    content: MessageContent,
    email?: string | null,
    options: UserMessageOptions = {}
  ): Promise<RoutingResult> {
    return this.track(async () => {
      const normalized = this.validateContent(content);
      const arrivedAt = this.now();

      if (this.policy && (await this.policy.isBlocked(userId))) {
        this.logger.warn("routing", "Blocked user message rejected", { userId });
        throw new UserBlockedError(userId);
      }

      return this.locks.runExclusive(userKey(userId), async () => {
        const message: InboundUserMessage = {
          userId,
          content: normalized,
          email: email ?? null,
          profile: options.profile,
          arrivedAt,
        };

        if (options.startNew) {
          // The store decides: another process may have reopened a ticket this registry never saw
          const current = (await this.store.findOpenTicketForUser(userId))?.id
            ?? (await this.registry.resolveByUser(userId));
          if (current !== null) {
            await this.locks.runExclusive(ticketKey(current), () =>
              this.closeLocked(current, userId)
            );
          }
        }

        const openTicketId = await this.registry.resolveByUser(userId);
        if (openTicketId !== null) {
          const appended = await this.locks.runExclusive(ticketKey(openTicketId), () =>
            this.appendUserMessage(openTicketId, message)
          );
          if (appended) return appended;
        }

        return this.createTicket(message);
      });
    });
  }

  /**
   * Append to an existing ticket. Returns null, leaving the caller to create a
   * ticket, when the ticket is gone, belongs to someone else, or was already
   * closed when the message arrived. Caller holds the ticket lock.
   */
  private async appendUserMessage(
    ticketId: TicketId,
    message: InboundUserMessage
  ): Promise<RoutingResult | null> {
    const { userId, content, email, profile, arrivedAt } = message;
    const now = this.now();

    const persisted = await this.store.transaction(async (tx) => {
      const ticket = await tx.getTicketForUpdate(ticketId);
      if (!ticket || ticket.userId !== userId) return null;
      if (ticket.status === "closed" && !closedAfter(ticket, arrivedAt)) return null;

      const user = await tx.upsertUser(userId, profile ?? {}, now);
      const { patch, reopened } = applyUserMessage(ticket, now);
      if (email && !ticket.contactEmail) patch.contactEmail = email;

      const updated = await tx.updateTicket(ticketId, patch);
      const response = await tx.appendResponse({
        ticketId,
        authorId: userId,
        role: "user",
        text: content.text,
        attachment: content.attachment ?? null,
        createdAt: now,
      });
      return { ticket: updated, user, response, reopened };
    });

    if (!persisted) {
      // The registry pointed at a ticket that is no longer this user's open ticket
      this.logger.warn("routing", "Stale user mapping dropped", { ticketId, userId });
      this.registry.unregister(ticketId);
      return null;
    }

    const { ticket, user, response, reopened } = persisted;
    if (reopened) {
      this.registry.register(ticket.id, ticket.threadHandle, userId);
      this.logger.info("routing", "Closed ticket reopened by late user message", { ticketId });
    }

    const deliveryError = await this.forwardToThread(ticket, user, content, reopened);
    return this.result(ticket.id, reopened ? "reopened" : "forwarded", response, deliveryError);
  }

  /**
   * Create a ticket for the message. When the store already holds an open
   * ticket for the user (opened or reopened by another process), the message
   * goes to that ticket instead.
   */
  private async createTicket(message: InboundUserMessage): Promise<RoutingResult> {
    const { userId, content, email, profile } = message;
    const now = this.now();

    const created = await this.store.transaction(async (tx): Promise<CreateOutcome> => {
      const open = await tx.findOpenTicketForUser(userId);
      if (open) return { kind: "existing", ticket: open };

      const user = await tx.upsertUser(userId, profile ?? {}, now);
      const ticket = await tx.insertTicket({ userId, contactEmail: email, createdAt: now });
      const response = await tx.appendResponse({
        ticketId: ticket.id,
        authorId: userId,
        role: "user",
        text: content.text,
        attachment: content.attachment ?? null,
        createdAt: now,
      });
      return { kind: "created", ticket, user, response };
    });

    if (created.kind === "existing") {
      const existing = created.ticket;
      this.logger.warn("routing", "Open ticket missing from registry, adopting it", {
        ticketId: existing.id,
        userId,
      });
      this.registry.register(existing.id, existing.threadHandle, userId);
      const appended = await this.locks.runExclusive(ticketKey(existing.id), () =>
        this.appendUserMessage(existing.id, message)
      );
      return appended ?? this.createTicket(message);
    }

    const { ticket, user, response } = created;
    this.registry.register(ticket.id, null, userId);
    this.logger.info("routing", "Ticket created", { ticketId: ticket.id, userId });

    this.dispatcher?.publish({
      type: "ticket_created",
      ticketId: ticket.id,
      userId,
      contactEmail: ticket.contactEmail,
      displayName: user.displayName,
      text: content.text,
      at: now,
    });

    const deliveryError = await this.locks.runExclusive(ticketKey(ticket.id), () =>
      this.forwardToThread(ticket, user, content, false)
    );
    return this.result(ticket.id, "created", response, deliveryError);
  }

  /**
   * Set the contact email on the user's open ticket, replacing any earlier
   * one. Returns the ticket id, or null when the user has no open ticket.
   */
  setContactEmail(userId: UserId, email: string): Promise<TicketId | null> {
    return this.track(() =>
      this.locks.runExclusive(userKey(userId), async () => {
        const open = await this.store.findOpenTicketForUser(userId);
        if (!open) return null;

        return this.locks.runExclusive(ticketKey(open.id), () =>
          this.store.transaction(async (tx) => {
            const ticket = await tx.getTicketForUpdate(open.id);
            if (!ticket || ticket.status !== "open") return null;
            await tx.updateTicket(ticket.id, { contactEmail: email });
            this.logger.info("routing", "Contact email updated", { ticketId: ticket.id, userId });
            return ticket.id;
          })
        );
      })
    );
  }

  /** Caller holds the ticket lock */
  private async forwardToThread(
    ticket: SupportTicket,
    user: User,
    content: NormalizedContent,
    reopened: boolean
  ): Promise<DeliveryFailedError | undefined> {
    const threaded = await this.ensureThread(ticket, user);
    if (threaded instanceof DeliveryFailedError) return threaded;

    const handle = threaded.threadHandle;
    if (handle === null) {
      return new DeliveryFailedError(ticket.id, "ticket has no staff thread");
    }

    if (reopened) {
      await this.notify(
        ticket.id,
        { kind: "staff" },
        { text: this.format.reopenedNoticeForThread(threaded, true) },
        handle
      );
    }

    return this.deliver(
      ticket.id,
      { kind: "staff" },
      this.format.userMessage(threaded, user, content),
      handle
    );
  }

  /**
   * Give the ticket a staff thread if it has none yet: open the thread, post
   * the ticket card, then persist the handle. A ticket whose thread could not
   * be created keeps a null handle and is retried on its next message. A
   * thread whose handle could not be saved is kept here and saved on the next
   * attempt instead of opening another one.
   * Caller holds the ticket lock.
   */
  private async ensureThread(
    ticket: SupportTicket,
    user: User | null
  ): Promise<SupportTicket | DeliveryFailedError> {
    if (ticket.threadHandle !== null) {
      this.unsavedThreads.delete(ticket.id);
      return ticket;
    }

    let thread = this.unsavedThreads.get(ticket.id);
    if (!thread) {
      let handle: ThreadHandle;
      try {
        handle = await this.platform.createThread(this.format.threadTitle(ticket, user));
      } catch (error) {
        this.logger.error("routing", "Staff thread creation failed", {
          ticketId: ticket.id,
          error: describeError(error),
        });
        return new DeliveryFailedError(ticket.id, "could not create staff thread", error);
      }

      const card = await this.send({ kind: "staff" }, { text: this.format.ticketCard(ticket, user) }, handle);
      if (!card.ok) {
        this.logger.warn("routing", "Ticket card not posted", { ticketId: ticket.id, error: card.error });
      }
      thread = { handle, cardRef: card.ok ? card.messageRef : null };
    }

    // Staff replies in the new thread resolve even if saving the handle fails
    this.registry.register(ticket.id, thread.handle, ticket.userId, false);

    const saved = thread;
    let updated: SupportTicket;
    try {
      updated = await this.store.transaction((tx) =>
        tx.setThreadHandle(ticket.id, saved.handle, saved.cardRef, this.now())
      );
    } catch (error) {
      this.unsavedThreads.set(ticket.id, saved);
      this.logger.error("routing", "Staff thread handle not saved", {
        ticketId: ticket.id,
        threadHandle: saved.handle,
        error: describeError(error),
      });
      return new DeliveryFailedError(ticket.id, "could not save staff thread", error);
    }

    this.unsavedThreads.delete(ticket.id);
    this.registry.register(updated.id, saved.handle, updated.userId, updated.status === "open");
    return updated;
  }

  // =====================================================
  // STAFF -> USER
  // =====================================================

  /**
   * Route a staff reply posted in a ticket thread back to the user.
   * An unknown handle triggers one registry rebuild before failing.
   */
  routeStaffReply(
    threadHandle: ThreadHandle,
    staffId: UserId,
    content: MessageContent,
    role: StaffRole = "staff"
  ): Promise<RoutingResult> {
    return this.track(async () => {
      const normalized = this.validateContent(content);

      const ticketId = await this.registry.resolveByThread(threadHandle);
      if (ticketId === null) {
        this.logger.warn("routing", "Orphaned staff reply", { threadHandle, staffId });
        throw new UnknownThreadError(threadHandle);
      }

      return this.locks.runExclusive(ticketKey(ticketId), async () => {
        const now = this.now();

        const persisted = await this.store.transaction(async (tx) => {
          const ticket = await tx.getTicketForUpdate(ticketId);
          if (!ticket) return null;
          if (ticket.status === "closed" && !this.allowReplyToClosed) {
            throw new TicketAlreadyClosedError(ticketId);
          }

          const updated = await tx.updateTicket(ticketId, applyStaffReply(ticket, now));
          const response = await tx.appendResponse({
            ticketId,
            authorId: staffId,
            role,
            text: normalized.text,
            attachment: normalized.attachment ?? null,
            createdAt: now,
          });
          return { ticket: updated, response };
        });

        if (!persisted) {
          this.logger.warn("routing", "Thread maps to a missing ticket", { threadHandle, ticketId });
          throw new UnknownThreadError(threadHandle);
        }

        const deliveryError = await this.deliver(
          ticketId,
          { kind: "user", userId: persisted.ticket.userId },
          this.format.staffReply(role, normalized)
        );
        return this.result(ticketId, "forwarded", persisted.response, deliveryError);
      });
    });
  }

  // =====================================================
  // LIFECYCLE
  // =====================================================

  /**
   * Close a ticket. Idempotent: closing a closed ticket changes nothing and
   * emits nothing. The thread stays resolvable; the user's next message
   * starts a new ticket.
   *
   * With `ifUntouchedSince`, the close only happens when the ticket's
   * updatedAt, read under its row lock, is still before that instant.
   *
   * @returns whether this call closed the ticket
   */
  closeTicket(ticketId: TicketId, closedBy: ClosedBy, options: CloseOptions = {}): Promise<boolean> {
    return this.track(() =>
      this.locks.runExclusive(ticketKey(ticketId), () =>
        this.closeLocked(ticketId, closedBy, options.ifUntouchedSince ?? null)
      )
    );
  }

  private async closeLocked(
    ticketId: TicketId,
    closedBy: ClosedBy,
    ifUntouchedSince: Date | null = null
  ): Promise<boolean> {
    const now = this.now();

    const outcome = await this.store.transaction(async (tx) => {
      const ticket = await tx.getTicketForUpdate(ticketId);
      if (!ticket) throw new TicketNotFoundError(ticketId);
      if (ifUntouchedSince && !untouchedSince(ticket, ifUntouchedSince)) {
        return { ticket, changed: false };
      }

      const patch = applyClose(ticket, closedBy, now);
      if (!patch) return { ticket, changed: false };
      return { ticket: await tx.updateTicket(ticketId, patch), changed: true };
    });

    const { ticket } = outcome;
    if (ticket.status === "closed") this.registry.unregister(ticketId);
    if (!outcome.changed) {
      if (ticket.status === "open") {
        this.logger.info("routing", "Close skipped, ticket active again", { ticketId, closedBy });
      }
      return false;
    }

    this.logger.info("routing", "Ticket closed", { ticketId, closedBy });
    this.dispatcher?.publish({
      type: "ticket_closed",
      ticketId,
      userId: ticket.userId,
      closedBy,
      at: now,
    });

    if (ticket.threadHandle !== null) {
      await this.notify(
        ticketId,
        { kind: "staff" },
        { text: this.format.closedNoticeForThread(ticket, closedBy) },
        ticket.threadHandle
      );
    }
    await this.notify(
      ticketId,
      { kind: "user", userId: ticket.userId },
      { text: this.format.closedNoticeForUser(ticket) }
    );
    return true;
  }

  /**
   * Explicitly reopen a closed ticket. Fails when the user already has
   * another open ticket.
   */
  reopenTicket(ticketId: TicketId, reopenedBy: UserId): Promise<void> {
    return this.track(async () => {
      const existing = await this.store.getTicket(ticketId);
      if (!existing) throw new TicketNotFoundError(ticketId);
      const userId = existing.userId;

      await this.locks.runExclusive(userKey(userId), () =>
        this.locks.runExclusive(ticketKey(ticketId), async () => {
          const now = this.now();

          const ticket = await this.store.transaction(async (tx) => {
            const current = await tx.getTicketForUpdate(ticketId);
            if (!current) throw new TicketNotFoundError(ticketId);

            const patch = applyReopen(current, now);
            if (!patch) return null;

            const open = await tx.findOpenTicketForUser(userId);
            if (open && open.id !== ticketId) {
              throw new OpenTicketExistsError(ticketId, open.id);
            }
            return tx.updateTicket(ticketId, patch);
          });

          if (!ticket) return;

          this.registry.register(ticketId, ticket.threadHandle, userId);
          this.logger.info("routing", "Ticket reopened", { ticketId, reopenedBy });
          if (ticket.threadHandle !== null) {
            await this.notify(
              ticketId,
              { kind: "staff" },
              { text: this.format.reopenedNoticeForThread(ticket, false) },
              ticket.threadHandle
            );
          }
        })
      );
    });
  }

  /**
   * Stop accepting calls and wait for in-flight ones. In-flight calls finish
   * their persist-then-send sequence.
   */
  async shutdown(): Promise<void> {
    this.stopping = true;
    if (this.active === 0) return;
    await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  get inFlight(): number {
    return this.active;
  }

  // =====================================================
  // HELPERS
  // =====================================================

  private async track<T>(fn: () => Promise<T>): Promise<T> {
    if (this.stopping) throw new ServiceShuttingDownError();
    this.active++;
    try {
      return await fn();
    } finally {
      this.active--;
      if (this.active === 0) {
        for (const resolve of this.idleWaiters.splice(0)) resolve();
      }
    }
  }

  private validateContent(content: MessageContent): NormalizedContent {
    const text = content.text?.trim() || null;
    const attachment = content.attachment ?? null;

    if (attachment && !attachment.fileRef.trim()) {
      throw new InvalidContentError("attachment has no file reference");
    }
    if (!text && !attachment) {
      throw new InvalidContentError("message is empty");
    }
    if (text && text.length > this.maxMessageLength) {
      throw new InvalidContentError(`message exceeds ${this.maxMessageLength} characters`);
    }
    return { text, attachment };
  }

  private async send(
    recipient: Recipient,
    content: MessageContent,
    threadHandle?: ThreadHandle
  ): Promise<DeliveryResult> {
    try {
      return await this.platform.sendMessage(recipient, content, threadHandle);
    } catch (error) {
      return { ok: false, error: describeError(error) };
    }
  }

  /** Forward routed content; a failure becomes a DeliveryFailedError on the result */
  private async deliver(
    ticketId: TicketId,
    recipient: Recipient,
    content: MessageContent,
    threadHandle?: ThreadHandle
  ): Promise<DeliveryFailedError | undefined> {
    const result = await this.send(recipient, content, threadHandle);
    if (result.ok) return undefined;

    this.logger.error("routing", "Delivery failed after persist", {
      ticketId,
      recipient: recipient.kind,
      error: result.error,
    });
    return new DeliveryFailedError(ticketId, result.error);
  }

  /** Lifecycle notices are informational; failures are only logged */
  private async notify(
    ticketId: TicketId,
    recipient: Recipient,
    content: MessageContent,
    threadHandle?: ThreadHandle
  ): Promise<void> {
    const result = await this.send(recipient, content, threadHandle);
    if (!result.ok) {
      this.logger.warn("routing", "Notice not delivered", {
        ticketId,
        recipient: recipient.kind,
        error: result.error,
      });
    }
  }

  private result(
    ticketId: TicketId,
    action: RoutingAction,
    response: SupportResponse,
    deliveryError: DeliveryFailedError | undefined
  ): RoutingResult {
    return deliveryError
      ? { ticketId, action, responseId: response.id, deliveryError }
      : { ticketId, action, responseId: response.id };
  }
}
