/**
 * Idle auto-close.
 *
 * Closes open tickets whose last activity (updatedAt) is older than
 * AUTO_CLOSE_DAYS, as "system". Runs on the escalation interval. The list
 * is a snapshot, so each close re-checks updatedAt under the ticket's lock
 * and skips tickets that saw activity since.
 */

import { describeError, type MessageRouter, type SupportTicket, type TicketStore } from "@support-desk/core";
import { log } from "@/lib/logger";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface AutoCloseDeps {
  store: Pick<TicketStore, "listOpenTickets">;
  router: Pick<MessageRouter, "closeTicket">;
}

/** Tickets updated before this instant are idle */
export function idleCutoff(idleDays: number, now: Date): Date {
  return new Date(now.getTime() - idleDays * DAY_MS);
}

export function isIdle(ticket: SupportTicket, idleDays: number, now: Date): boolean {
  return ticket.updatedAt.getTime() < idleCutoff(idleDays, now).getTime();
}

/**
 * Close every idle open ticket. One failing ticket does not stop the run.
 *
 * @returns ids of the tickets that were closed
 */
export async function closeIdleTickets(
  deps: AutoCloseDeps,
  idleDays: number,
  now: Date = new Date(),
): Promise<number[]> {
  if (idleDays <= 0) return [];

  const tickets = await deps.store.listOpenTickets();
  const cutoff = idleCutoff(idleDays, now);
  const closed: number[] = [];

  for (const ticket of tickets) {
    if (!isIdle(ticket, idleDays, now)) continue;
    try {
      if (await deps.router.closeTicket(ticket.id, "system", { ifUntouchedSince: cutoff })) {
        closed.push(ticket.id);
      }
    } catch (error) {
      log("escalation", "autoclose.ticket_failed", {
        level: "error",
        message: describeError(error),
        ticketId: ticket.id,
      });
    }
  }

  if (closed.length > 0) {
    log("escalation", "autoclose.run", {
      message: `Closed ${closed.length} idle ticket(s)`,
      ticketIds: closed,
    });
  }
  return closed;
}

/**
 * Run closeIdleTickets every intervalMs. Overlapping runs are skipped.
 *
 * @returns stop function
 */
export function startAutoClose(deps: AutoCloseDeps, idleDays: number, intervalMs: number): () => void {
  let running = false;

  const timer = setInterval(() => {
    if (running) return;
    running = true;
    closeIdleTickets(deps, idleDays)
      .catch((error: unknown) => {
        log("escalation", "autoclose.run_failed", { level: "error", message: describeError(error) });
      })
      .finally(() => {
        running = false;
      });
  }, intervalMs);
  timer.unref?.();

  return () => clearInterval(timer);
}
