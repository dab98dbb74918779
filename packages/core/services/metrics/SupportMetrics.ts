/**
 * Read-only operational counters. Nothing here drives ticket state.
 */

import type { TicketStore } from "../tickets/TicketStore";
import type { EscalationMonitor } from "../escalation/EscalationMonitor";
import type { NotificationDispatcher } from "../notifications/NotificationDispatcher";
import type { StaffActivity } from "../tickets/types";
import { systemClock, type Clock } from "../shared/logger";

const DAY_MS = 24 * 60 * 60 * 1000;
const PERIODS = { last24h: DAY_MS, last7d: 7 * DAY_MS, last30d: 30 * DAY_MS } as const;

type Period = keyof typeof PERIODS;
export type PeriodCounts = Record<Period, number>;

export interface MetricsSnapshot {
  openTickets: number;
  urgentTickets: number;
  totalUsers: number;
  feedbackLast24h: number;
  droppedNotifications: number;
  lastSweepAt: string | null;
  generatedAt: string;
}

/** Workload over trailing windows; staff figures cover the last 7 days */
export interface SupportStatistics {
  tickets: {
    total: number;
    open: number;
    closed: number;
    created: PeriodCounts;
  };
  messages: {
    fromUsers: PeriodCounts;
    fromStaff: PeriodCounts;
  };
  averageFirstReplyMinutes: number | null;
  staffActivity: StaffActivity[];
  generatedAt: string;
}

export interface SupportMetricsDeps {
  store: Pick<
    TicketStore,
    | "countOpenTickets"
    | "countUsers"
    | "countFeedbackSince"
    | "countTicketsByStatus"
    | "countTicketsCreatedSince"
    | "countResponsesSince"
    | "staffActivitySince"
    | "averageFirstReplyMs"
  >;
  monitor: Pick<EscalationMonitor, "urgentTicketCount" | "lastSweepAt">;
  dispatcher?: Pick<NotificationDispatcher, "droppedCount"> | null;
  now?: Clock;
}

export class SupportMetrics {
  private now: Clock;

  constructor(private deps: SupportMetricsDeps) {
    this.now = deps.now ?? systemClock;
  }

  openTicketCount(): Promise<number> {
    return this.deps.store.countOpenTickets();
  }

  /** As of the monitor's last sweep */
  urgentTicketCount(): number {
    return this.deps.monitor.urgentTicketCount();
  }

  totalUserCount(): Promise<number> {
    return this.deps.store.countUsers();
  }

  recentFeedbackCount(windowMs = DAY_MS): Promise<number> {
    return this.deps.store.countFeedbackSince(new Date(this.now().getTime() - windowMs));
  }

  async snapshot(): Promise<MetricsSnapshot> {
    const [openTickets, totalUsers, feedbackLast24h] = await Promise.all([
      this.openTicketCount(),
      this.totalUserCount(),
      this.recentFeedbackCount(DAY_MS),
    ]);
    const lastSweepAt = this.deps.monitor.lastSweepAt;

    return {
      openTickets,
      urgentTickets: this.urgentTicketCount(),
      totalUsers,
      feedbackLast24h,
      droppedNotifications: this.deps.dispatcher?.droppedCount ?? 0,
      lastSweepAt: lastSweepAt ? lastSweepAt.toISOString() : null,
      generatedAt: this.now().toISOString(),
    };
  }

  async statistics(): Promise<SupportStatistics> {
    const now = this.now();
    const since = (period: Period) => new Date(now.getTime() - PERIODS[period]);
    const store = this.deps.store;

    const [byStatus, created24h, created7d, created30d, responses24h, responses7d, responses30d, staffActivity, averageMs] =
      await Promise.all([
        store.countTicketsByStatus(),
        store.countTicketsCreatedSince(since("last24h")),
        store.countTicketsCreatedSince(since("last7d")),
        store.countTicketsCreatedSince(since("last30d")),
        store.countResponsesSince(since("last24h")),
        store.countResponsesSince(since("last7d")),
        store.countResponsesSince(since("last30d")),
        store.staffActivitySince(since("last7d")),
        store.averageFirstReplyMs(since("last7d")),
      ]);

    const staffCount = (counts: typeof responses24h) => counts.staff + counts.admin;

    return {
      tickets: {
        total: byStatus.open + byStatus.closed,
        open: byStatus.open,
        closed: byStatus.closed,
        created: { last24h: created24h, last7d: created7d, last30d: created30d },
      },
      messages: {
        fromUsers: { last24h: responses24h.user, last7d: responses7d.user, last30d: responses30d.user },
        fromStaff: {
          last24h: staffCount(responses24h),
          last7d: staffCount(responses7d),
          last30d: staffCount(responses30d),
        },
      },
      averageFirstReplyMinutes: averageMs === null ? null : Math.round(averageMs / 600) / 100,
      staffActivity,
      generatedAt: now.toISOString(),
    };
  }
}
