/**
 * EscalationMonitor
 *
 * Periodic SLA sweep over open tickets. A ticket whose user has been waiting
 * longer than the urgent threshold is flagged urgent and escalated through
 * the dispatcher, at most once per cool-down window.
 *
 * The monitor only reads ticket state. Urgent flags and cool-down stamps live
 * in memory and are recomputed by the first sweep after a restart.
 */

import type { TicketStore } from "../tickets/TicketStore";
import type { SupportTicket, TicketId } from "../tickets/types";
import { describeError } from "../tickets/errors";
import { isAwaitingStaff, waitingDurationMs } from "../tickets/transitions";
import type { NotificationDispatcher } from "../notifications/NotificationDispatcher";
import { consoleLogger, systemClock, type Clock, type SupportLogger } from "../shared/logger";

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

export interface EscalationMonitorOptions {
  /** Sweep interval. Default 5 minutes. */
  intervalMs?: number;
  /** Waiting time after which a ticket is urgent. Default 2 hours. */
  urgentThresholdMs?: number;
  /** Minimum gap between two escalations of the same ticket. Default 1 hour. */
  cooldownMs?: number;
  logger?: SupportLogger;
  now?: Clock;
}

export interface UrgentTicket {
  ticketId: TicketId;
  userId: number;
  threadHandle: string | null;
  waitingDurationMs: number;
  lastUserMessageAt: Date;
}

export interface SweepResult {
  checked: number;
  urgent: number;
  escalated: number;
  /** The sweep was asked to stop before it reached every ticket */
  aborted: boolean;
}

export class EscalationMonitor {
  private readonly intervalMs: number;
  private readonly urgentThresholdMs: number;
  private readonly cooldownMs: number;
  private logger: SupportLogger;
  private now: Clock;

  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<SweepResult> | null = null;
  private stopRequested = false;

  private urgent = new Map<TicketId, UrgentTicket>();
  private lastEscalatedAt = new Map<TicketId, number>();
  private skipped = 0;
  private lastSweep: Date | null = null;

  constructor(
    private store: Pick<TicketStore, "listOpenTickets">,
    private dispatcher: Pick<NotificationDispatcher, "onEscalation">,
    options: EscalationMonitorOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? 5 * MINUTE_MS;
    this.urgentThresholdMs = options.urgentThresholdMs ?? 2 * HOUR_MS;
    this.cooldownMs = options.cooldownMs ?? HOUR_MS;
    this.logger = options.logger ?? consoleLogger;
    this.now = options.now ?? systemClock;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.timer.unref?.();
    this.logger.info("escalation", "Escalation monitor started", {
      intervalMs: this.intervalMs,
      urgentThresholdMs: this.urgentThresholdMs,
    });
  }

  /** Cancel the timer and wait for a sweep in progress to stop */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.stopRequested = true;
    try {
      if (this.running) {
        await this.running.catch((error: unknown) => {
          this.logger.error("escalation", "Sweep failed during stop", { error: describeError(error) });
        });
      }
    } finally {
      this.stopRequested = false;
    }
    this.logger.info("escalation", "Escalation monitor stopped");
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /** Cycles skipped because the previous sweep was still running */
  get skippedCycles(): number {
    return this.skipped;
  }

  get lastSweepAt(): Date | null {
    return this.lastSweep;
  }

  urgentTicketCount(): number {
    return this.urgent.size;
  }

  /** Urgent tickets, longest wait first */
  urgentTickets(): UrgentTicket[] {
    return Array.from(this.urgent.values()).sort(
      (a, b) => b.waitingDurationMs - a.waitingDurationMs || a.ticketId - b.ticketId
    );
  }

  /**
   * Run one sweep now. A sweep already in progress is joined rather than
   * started twice.
   */
  sweep(): Promise<SweepResult> {
    if (this.running) return this.running;
    this.running = this.runSweep().finally(() => {
      this.running = null;
    });
    return this.running;
  }

  private tick(): void {
    if (this.running) {
      this.skipped++;
      this.logger.warn("escalation", "Previous sweep still running, cycle skipped", {
        skipped: this.skipped,
      });
      return;
    }
    this.sweep().catch((error: unknown) => {
      this.logger.error("escalation", "Sweep failed", { error: describeError(error) });
    });
  }

  private async runSweep(): Promise<SweepResult> {
    const tickets = await this.store.listOpenTickets();
    const result: SweepResult = { checked: 0, urgent: 0, escalated: 0, aborted: false };
    const seen = new Set<TicketId>();

    for (const ticket of tickets) {
      if (this.stopRequested) {
        result.aborted = true;
        break;
      }
      seen.add(ticket.id);
      result.checked++;
      if (this.evaluate(ticket)) result.escalated++;
    }

    if (!result.aborted) {
      // Tickets that are no longer open leave the urgent set
      for (const ticketId of Array.from(this.urgent.keys())) {
        if (!seen.has(ticketId)) this.forget(ticketId);
      }
      this.lastSweep = this.now();
    }

    result.urgent = this.urgent.size;
    if (result.escalated > 0 || result.aborted) {
      this.logger.info("escalation", "Sweep finished", { ...result });
    }
    return result;
  }

  /** Returns true when an escalation was emitted for this ticket */
  private evaluate(ticket: SupportTicket): boolean {
    const now = this.now();

    if (!isAwaitingStaff(ticket)) {
      this.forget(ticket.id);
      return false;
    }

    const waiting = waitingDurationMs(ticket, now);
    if (waiting <= this.urgentThresholdMs) {
      this.forget(ticket.id);
      return false;
    }

    this.urgent.set(ticket.id, {
      ticketId: ticket.id,
      userId: ticket.userId,
      threadHandle: ticket.threadHandle,
      waitingDurationMs: waiting,
      lastUserMessageAt: ticket.lastUserMessageAt,
    });

    const last = this.lastEscalatedAt.get(ticket.id);
    if (last !== undefined && now.getTime() - last < this.cooldownMs) {
      return false;
    }

    this.lastEscalatedAt.set(ticket.id, now.getTime());
    this.dispatcher.onEscalation(ticket.id, waiting, {
      userId: ticket.userId,
      threadHandle: ticket.threadHandle,
    });
    return true;
  }

  private forget(ticketId: TicketId): void {
    this.urgent.delete(ticketId);
    this.lastEscalatedAt.delete(ticketId);
  }
}
