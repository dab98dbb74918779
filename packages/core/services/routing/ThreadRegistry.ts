/**
 * ThreadRegistry
 *
 * In-memory index between tickets and staff threads:
 *   - thread handle -> ticket id (every ticket that has a thread, open or closed)
 *   - user id -> open ticket id (the default routing target for that user)
 *
 * It is a cache, not a source of truth. rebuild() recreates both indices from
 * the store alone, which is how the registry recovers after a restart or a
 * desync. The registry is constructed explicitly and passed to the router.
 */

import type { TicketStore } from "../tickets/TicketStore";
import type { ThreadHandle, TicketId, UserId } from "../tickets/types";
import { consoleLogger, systemClock, type Clock, type SupportLogger } from "../shared/logger";

type RegistryOp =
  | {
      type: "register";
      ticketId: TicketId;
      threadHandle: ThreadHandle | null;
      userId: UserId;
      active: boolean;
    }
  | { type: "unregister"; ticketId: TicketId };

interface Indices {
  byThread: Map<ThreadHandle, TicketId>;
  activeByUser: Map<UserId, TicketId>;
  /** ticket id -> owning user, for unregister() */
  owners: Map<TicketId, UserId>;
}

export interface RegistrySnapshot {
  threads: Array<[ThreadHandle, TicketId]>;
  activeUsers: Array<[UserId, TicketId]>;
}

export interface ThreadRegistryOptions {
  logger?: SupportLogger;
  /** How long a handle that missed after a rebuild is answered from memory. Default 30s. */
  missCooldownMs?: number;
  now?: Clock;
}

const MAX_REMEMBERED_MISSES = 1000;

function emptyIndices(): Indices {
  return { byThread: new Map(), activeByUser: new Map(), owners: new Map() };
}

export class ThreadRegistry {
  private indices: Indices = emptyIndices();
  private hydrated = false;
  private rebuilding: Promise<void> | null = null;
  /** Writes that arrive while a rebuild is in flight, replayed onto its result */
  private pendingOps: RegistryOp[] | null = null;
  /** handle -> epoch ms of its last miss, oldest first */
  private recentMisses = new Map<ThreadHandle, number>();
  private logger: SupportLogger;
  private missCooldownMs: number;
  private now: Clock;

  constructor(
    private store: Pick<TicketStore, "listThreadMappings">,
    options: ThreadRegistryOptions = {}
  ) {
    this.logger = options.logger ?? consoleLogger;
    this.missCooldownMs = options.missCooldownMs ?? 30_000;
    this.now = options.now ?? systemClock;
  }

  get isHydrated(): boolean {
    return this.hydrated;
  }

  /**
   * Ticket mapped to a thread. A miss rebuilds from the store once and
   * retries, so a desynchronized registry heals itself. A handle that still
   * missed after a rebuild answers null without rebuilding again until the
   * cool-down passes.
   */
  async resolveByThread(threadHandle: ThreadHandle): Promise<TicketId | null> {
    const hit = this.indices.byThread.get(threadHandle);
    if (hit !== undefined) return hit;

    const missedAt = this.recentMisses.get(threadHandle);
    if (missedAt !== undefined && this.now().getTime() - missedAt < this.missCooldownMs) {
      return null;
    }

    this.logger.warn("registry", "Thread miss, rebuilding from store", {
      threadHandle,
      hydrated: this.hydrated,
    });
    await this.rebuild();

    const resolved = this.indices.byThread.get(threadHandle);
    if (resolved !== undefined) {
      this.recentMisses.delete(threadHandle);
      return resolved;
    }
    this.rememberMiss(threadHandle);
    return null;
  }

  /**
   * The user's open ticket. Misses are normal (first contact), so only an
   * un-hydrated registry rebuilds on a miss.
   */
  async resolveByUser(userId: UserId): Promise<TicketId | null> {
    const hit = this.indices.activeByUser.get(userId);
    if (hit !== undefined) return hit;
    if (this.hydrated) return null;

    this.logger.warn("registry", "Registry empty, rebuilding from store", { userId });
    await this.rebuild();
    return this.indices.activeByUser.get(userId) ?? null;
  }

  /**
   * Record a ticket's thread if it has one, and make it the user's active
   * ticket unless `active` is false (a closed ticket that just got a thread).
   */
  register(
    ticketId: TicketId,
    threadHandle: ThreadHandle | null,
    userId: UserId,
    active = true
  ): void {
    const op: RegistryOp = { type: "register", ticketId, threadHandle, userId, active };
    if (threadHandle !== null) this.recentMisses.delete(threadHandle);
    this.pendingOps?.push(op);
    applyOp(this.indices, op);
  }

  /** Remove a ticket from the active index. Its thread stays resolvable. */
  unregister(ticketId: TicketId): void {
    const op: RegistryOp = { type: "unregister", ticketId };
    this.pendingOps?.push(op);
    applyOp(this.indices, op);
  }

  /**
   * Recreate both indices from the store. Concurrent callers share the
   * in-flight rebuild.
   */
  rebuild(): Promise<void> {
    if (!this.rebuilding) {
      this.rebuilding = this.doRebuild().finally(() => {
        this.rebuilding = null;
      });
    }
    return this.rebuilding;
  }

  snapshot(): RegistrySnapshot {
    return {
      threads: Array.from(this.indices.byThread.entries()).sort((a, b) => a[1] - b[1]),
      activeUsers: Array.from(this.indices.activeByUser.entries()).sort((a, b) => a[0] - b[0]),
    };
  }

  get activeCount(): number {
    return this.indices.activeByUser.size;
  }

  private rememberMiss(threadHandle: ThreadHandle): void {
    this.recentMisses.delete(threadHandle);
    if (this.recentMisses.size >= MAX_REMEMBERED_MISSES) {
      const oldest = this.recentMisses.keys().next();
      if (!oldest.done) this.recentMisses.delete(oldest.value);
    }
    this.recentMisses.set(threadHandle, this.now().getTime());
  }

  private async doRebuild(): Promise<void> {
    this.pendingOps = [];
    try {
      const records = await this.store.listThreadMappings();
      const next = emptyIndices();

      for (const record of records) {
        next.owners.set(record.ticketId, record.userId);
        if (record.threadHandle !== null) {
          next.byThread.set(record.threadHandle, record.ticketId);
        }
        if (record.status === "open") {
          const current = next.activeByUser.get(record.userId);
          if (current === undefined || record.ticketId > current) {
            next.activeByUser.set(record.userId, record.ticketId);
          }
        }
      }

      for (const op of this.pendingOps) applyOp(next, op);

      this.indices = next;
      this.hydrated = true;
      this.logger.info("registry", "Rebuilt thread registry", {
        threads: next.byThread.size,
        activeUsers: next.activeByUser.size,
      });
    } finally {
      this.pendingOps = null;
    }
  }
}

function applyOp(indices: Indices, op: RegistryOp): void {
  if (op.type === "register") {
    indices.owners.set(op.ticketId, op.userId);
    if (op.active) indices.activeByUser.set(op.userId, op.ticketId);
    if (op.threadHandle !== null) {
      indices.byThread.set(op.threadHandle, op.ticketId);
    }
    return;
  }

  const userId = indices.owners.get(op.ticketId);
  if (userId !== undefined && indices.activeByUser.get(userId) === op.ticketId) {
    indices.activeByUser.delete(userId);
  }
}
