/**
 * NotificationDispatcher
 *
 * Best-effort fan-out of support events to notification channels (email,
 * staff alerts, feedback channel). Events go through a bounded queue: when
 * it is full the oldest queued event is dropped and counted. Channel
 * failures are logged and never reach the code that published the event.
 */

import type { ClosedBy, ThreadHandle, TicketId, UserId } from "../tickets/types";
import { describeError } from "../tickets/errors";
import { consoleLogger, systemClock, type Clock, type SupportLogger } from "../shared/logger";

export interface EscalationEvent {
  type: "escalation";
  ticketId: TicketId;
  waitingDurationMs: number;
  userId: UserId | null;
  threadHandle: ThreadHandle | null;
  at: Date;
}

export interface FeedbackEvent {
  type: "feedback";
  userId: UserId;
  rating: number;
  comment: string | null;
  category: string;
  at: Date;
}

export interface TicketCreatedEvent {
  type: "ticket_created";
  ticketId: TicketId;
  userId: UserId;
  contactEmail: string | null;
  displayName: string | null;
  text: string | null;
  at: Date;
}

export interface TicketClosedEvent {
  type: "ticket_closed";
  ticketId: TicketId;
  userId: UserId;
  closedBy: ClosedBy;
  at: Date;
}

export type SupportEvent =
  | EscalationEvent
  | FeedbackEvent
  | TicketCreatedEvent
  | TicketClosedEvent;

export type SupportEventType = SupportEvent["type"];

export interface NotificationChannel {
  readonly name: string;
  /** Channels that skip some event types say so here; default accepts all */
  accepts?(event: SupportEvent): boolean;
  deliver(event: SupportEvent): Promise<void>;
}

export interface NotificationDispatcherOptions {
  /** Maximum queued (undelivered) events. Default 100. */
  capacity?: number;
  logger?: SupportLogger;
  now?: Clock;
}

export interface DispatcherStats {
  queued: number;
  published: number;
  delivered: number;
  failed: number;
  dropped: number;
}

export class NotificationDispatcher {
  private queue: SupportEvent[] = [];
  private draining: Promise<void> | null = null;
  private closed = false;
  private readonly capacity: number;
  private logger: SupportLogger;
  private now: Clock;
  private counters = { published: 0, delivered: 0, failed: 0, dropped: 0 };

  constructor(
    private channels: NotificationChannel[],
    options: NotificationDispatcherOptions = {}
  ) {
    this.capacity = Math.max(1, options.capacity ?? 100);
    this.logger = options.logger ?? consoleLogger;
    this.now = options.now ?? systemClock;
  }

  /**
   * Queue an event for delivery. Returns false when the dispatcher is closed.
   * Never throws and never waits for delivery.
   */
  publish(event: SupportEvent): boolean {
    if (this.closed) {
      this.logger.warn("notify", "Dispatcher closed, event discarded", { type: event.type });
      return false;
    }

    if (this.queue.length >= this.capacity) {
      const dropped = this.queue.shift();
      this.counters.dropped++;
      this.logger.warn("notify", "Notification queue full, dropped oldest event", {
        droppedType: dropped?.type,
        dropped: this.counters.dropped,
      });
    }

    this.queue.push(event);
    this.counters.published++;
    this.scheduleDrain();
    return true;
  }

  onEscalation(
    ticketId: TicketId,
    waitingDurationMs: number,
    context: { userId?: UserId | null; threadHandle?: ThreadHandle | null } = {}
  ): boolean {
    return this.publish({
      type: "escalation",
      ticketId,
      waitingDurationMs,
      userId: context.userId ?? null,
      threadHandle: context.threadHandle ?? null,
      at: this.now(),
    });
  }

  onFeedbackReceived(
    userId: UserId,
    rating: number,
    comment: string | null,
    category = "general"
  ): boolean {
    return this.publish({ type: "feedback", userId, rating, comment, category, at: this.now() });
  }

  get droppedCount(): number {
    return this.counters.dropped;
  }

  get queueLength(): number {
    return this.queue.length;
  }

  stats(): DispatcherStats {
    return { queued: this.queue.length, ...this.counters };
  }

  /** Resolves once every queued event has been handed to its channels */
  async flush(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  /** Stop accepting events and drain what is queued */
  async close(): Promise<void> {
    this.closed = true;
    await this.flush();
  }

  private scheduleDrain(): void {
    if (this.draining) return;
    this.draining = this.drain().finally(() => {
      this.draining = null;
      if (this.queue.length > 0) this.scheduleDrain();
    });
  }

  private async drain(): Promise<void> {
    let event = this.queue.shift();
    while (event) {
      await this.deliver(event);
      event = this.queue.shift();
    }
  }

  private async deliver(event: SupportEvent): Promise<void> {
    const targets = this.channels.filter((c) => !c.accepts || c.accepts(event));
    const results = await Promise.allSettled(targets.map(async (c) => c.deliver(event)));

    results.forEach((result, i) => {
      if (result.status === "fulfilled") {
        this.counters.delivered++;
        return;
      }
      this.counters.failed++;
      this.logger.error("notify", `Channel ${targets[i].name} failed to deliver ${event.type}`, {
        error: describeError(result.reason),
      });
    });
  }
}
