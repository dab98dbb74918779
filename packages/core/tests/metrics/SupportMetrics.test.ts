import { describe, it, expect } from "vitest";
import { SupportMetrics } from "../../services/metrics/SupportMetrics";
import { InMemoryTicketStore } from "../../services/tickets/InMemoryTicketStore";

const NOW = new Date("2026-05-02T12:00:00.000Z");

describe("SupportMetrics", () => {
  it("combines store counts with monitor and dispatcher state", async () => {
    const store = new InMemoryTicketStore();
    await store.transaction(async (tx) => {
      await tx.upsertUser(1, {}, NOW);
      await tx.upsertUser(2, {}, NOW);
      await tx.insertTicket({ userId: 1, contactEmail: null, createdAt: NOW });
      const closed = await tx.insertTicket({ userId: 2, contactEmail: null, createdAt: NOW });
      await tx.updateTicket(closed.id, { status: "closed", closedAt: NOW, closedBy: "system" });
    });
    await store.addFeedback({ userId: 1, category: "general", rating: 5, comment: null, createdAt: new Date("2026-05-02T08:00:00.000Z") });
    await store.addFeedback({ userId: 2, category: "general", rating: 2, comment: null, createdAt: new Date("2026-04-30T08:00:00.000Z") });

    const metrics = new SupportMetrics({
      store,
      monitor: { urgentTicketCount: () => 3, lastSweepAt: new Date("2026-05-02T11:55:00.000Z") },
      dispatcher: { droppedCount: 2 },
      now: () => NOW,
    });

    expect(await metrics.openTicketCount()).toBe(1);
    expect(await metrics.totalUserCount()).toBe(2);
    expect(await metrics.recentFeedbackCount(60 * 60 * 1000)).toBe(0);
    expect(await metrics.snapshot()).toEqual({
      openTickets: 1,
      urgentTickets: 3,
      totalUsers: 2,
      feedbackLast24h: 1,
      droppedNotifications: 2,
      lastSweepAt: "2026-05-02T11:55:00.000Z",
      generatedAt: "2026-05-02T12:00:00.000Z",
    });
  });

  it("summarizes workload over trailing windows", async () => {
    const store = new InMemoryTicketStore();
    const hoursAgo = (hours: number) => new Date(NOW.getTime() - hours * 60 * 60 * 1000);
    const MINUTE = 60 * 1000;

    await store.transaction(async (tx) => {
      const reply = (ticketId: number, authorId: number, role: "user" | "staff" | "admin", createdAt: Date) =>
        tx.appendResponse({ ticketId, authorId, role, text: "…", attachment: null, createdAt });

      const recent = await tx.insertTicket({ userId: 1, contactEmail: null, createdAt: hoursAgo(1) });
      await reply(recent.id, 1, "user", hoursAgo(1));
      await reply(recent.id, 900, "staff", new Date(hoursAgo(1).getTime() + 30 * MINUTE));
      await reply(recent.id, 901, "admin", new Date(hoursAgo(1).getTime() + 45 * MINUTE));

      const lastWeek = await tx.insertTicket({ userId: 2, contactEmail: null, createdAt: hoursAgo(72) });
      await reply(lastWeek.id, 2, "user", hoursAgo(72));
      await reply(lastWeek.id, 900, "staff", new Date(hoursAgo(72).getTime() + 90 * MINUTE));
      await tx.updateTicket(lastWeek.id, { status: "closed", closedAt: hoursAgo(60), closedBy: 900 });

      const old = await tx.insertTicket({ userId: 2, contactEmail: null, createdAt: hoursAgo(20 * 24) });
      await reply(old.id, 2, "user", hoursAgo(20 * 24));
      await tx.updateTicket(old.id, { status: "closed", closedAt: hoursAgo(19 * 24), closedBy: "system" });
    });

    const metrics = new SupportMetrics({
      store,
      monitor: { urgentTicketCount: () => 0, lastSweepAt: null },
      now: () => NOW,
    });

    expect(await metrics.statistics()).toEqual({
      tickets: {
        total: 3,
        open: 1,
        closed: 2,
        created: { last24h: 1, last7d: 2, last30d: 3 },
      },
      messages: {
        fromUsers: { last24h: 1, last7d: 2, last30d: 3 },
        fromStaff: { last24h: 2, last7d: 3, last30d: 3 },
      },
      averageFirstReplyMinutes: 60,
      staffActivity: [
        { authorId: 900, role: "staff", replies: 2 },
        { authorId: 901, role: "admin", replies: 1 },
      ],
      generatedAt: "2026-05-02T12:00:00.000Z",
    });
  });

  it("reports no reply time before any staff reply", async () => {
    const metrics = new SupportMetrics({
      store: new InMemoryTicketStore(),
      monitor: { urgentTicketCount: () => 0, lastSweepAt: null },
      now: () => NOW,
    });

    expect((await metrics.statistics()).averageFirstReplyMinutes).toBeNull();
  });
});
