import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { EscalationMonitor } from "../../services/escalation/EscalationMonitor";
import { MessageRouter } from "../../services/routing/MessageRouter";
import { ThreadRegistry } from "../../services/routing/ThreadRegistry";
import { InMemoryTicketStore } from "../../services/tickets/InMemoryTicketStore";
import { NotificationDispatcher } from "../../services/notifications/NotificationDispatcher";
import { silentLogger } from "../../services/shared/logger";
import type { SupportTicket } from "../../services/tickets/types";
import { FakePlatform, RecordingChannel, createClock, deferred, HOUR, MINUTE } from "../helpers";

function setup() {
  const clock = createClock("2026-05-01T10:00:00.000Z");
  const store = new InMemoryTicketStore();
  const registry = new ThreadRegistry(store, { logger: silentLogger });
  const channel = new RecordingChannel();
  const dispatcher = new NotificationDispatcher([channel], { logger: silentLogger, now: clock.now });
  const router = new MessageRouter({
    store,
    registry,
    platform: new FakePlatform(),
    logger: silentLogger,
    now: clock.now,
  });
  const monitor = new EscalationMonitor(store, dispatcher, {
    logger: silentLogger,
    now: clock.now,
  });
  return { clock, store, channel, dispatcher, router, monitor };
}

function openTicket(id: number, lastUserMessageAt: string): SupportTicket {
  const at = new Date(lastUserMessageAt);
  return {
    id,
    userId: id * 10,
    contactEmail: null,
    status: "open",
    threadHandle: String(id),
    initialMessageRef: null,
    createdAt: at,
    updatedAt: at,
    lastUserMessageAt: at,
    lastStaffResponseAt: null,
    closedAt: null,
    closedBy: null,
  };
}

describe("EscalationMonitor", () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup();
  });

  it("escalates a ticket waiting past the threshold once per cool-down", async () => {
    const { router, monitor, clock, dispatcher, channel } = ctx;

    await router.routeUserMessage(7, { text: "Nobody answered" });
    clock.advance(3 * HOUR);

    expect(await monitor.sweep()).toEqual({ checked: 1, urgent: 1, escalated: 1, aborted: false });

    clock.advance(10 * MINUTE);
    expect((await monitor.sweep()).escalated).toBe(0);
    expect(monitor.urgentTicketCount()).toBe(1);

    clock.advance(HOUR);
    expect((await monitor.sweep()).escalated).toBe(1);

    await dispatcher.flush();
    expect(channel.ofType("escalation").map((e) => e.waitingDurationMs)).toEqual([
      3 * HOUR,
      4 * HOUR + 10 * MINUTE,
    ]);
    expect(channel.ofType("escalation")[0]).toMatchObject({
      ticketId: 1,
      userId: 7,
      threadHandle: "100",
    });
  });

  it("does not flag a ticket answered 10 minutes ago", async () => {
    const { router, monitor, clock } = ctx;

    await router.routeUserMessage(7, { text: "Hello" });
    clock.advance(2 * HOUR + 50 * MINUTE);
    await router.routeStaffReply("100", 900, { text: "Hi!" });
    clock.advance(10 * MINUTE);

    expect(await monitor.sweep()).toEqual({ checked: 1, urgent: 0, escalated: 0, aborted: false });
  });

  it("does not flag a ticket below the threshold", async () => {
    const { router, monitor, clock } = ctx;

    await router.routeUserMessage(7, { text: "Hello" });
    clock.advance(2 * HOUR);

    expect((await monitor.sweep()).urgent).toBe(0);
  });

  it("drops closed and answered tickets from the urgent set", async () => {
    const { router, monitor, clock } = ctx;

    await router.routeUserMessage(7, { text: "Hello" });
    await router.routeUserMessage(8, { text: "Hello too" });
    clock.advance(3 * HOUR);
    await monitor.sweep();
    expect(monitor.urgentTicketCount()).toBe(2);

    await router.closeTicket(1, 900);
    await router.routeStaffReply("101", 900, { text: "Sorry for the wait" });
    await monitor.sweep();

    expect(monitor.urgentTicketCount()).toBe(0);
    expect(monitor.urgentTickets()).toEqual([]);
  });

  it("lists urgent tickets longest wait first", async () => {
    const { router, monitor, clock } = ctx;

    await router.routeUserMessage(7, { text: "First" });
    clock.advance(HOUR);
    await router.routeUserMessage(8, { text: "Second" });
    clock.advance(3 * HOUR);
    await monitor.sweep();

    expect(monitor.urgentTickets().map((t) => [t.ticketId, t.waitingDurationMs])).toEqual([
      [1, 4 * HOUR],
      [2, 3 * HOUR],
    ]);
    expect(monitor.lastSweepAt).toEqual(new Date("2026-05-01T14:00:00.000Z"));
  });

  describe("scheduling", () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it("skips a cycle while the previous sweep is still running", async () => {
      vi.useFakeTimers();
      const gate = deferred<SupportTicket[]>();
      const store = { listOpenTickets: vi.fn(() => gate.promise) };
      const dispatcher = { onEscalation: vi.fn(() => true) };
      const monitor = new EscalationMonitor(store, dispatcher, {
        intervalMs: 1000,
        logger: silentLogger,
      });

      monitor.start();
      vi.advanceTimersByTime(1000);
      vi.advanceTimersByTime(1000);

      expect(store.listOpenTickets).toHaveBeenCalledTimes(1);
      expect(monitor.skippedCycles).toBe(1);

      gate.resolve([]);
      await monitor.stop();
      expect(monitor.isRunning).toBe(false);
    });

    it("stop() waits for the in-flight sweep and aborts it before evaluating", async () => {
      const gate = deferred<SupportTicket[]>();
      const store = { listOpenTickets: vi.fn(() => gate.promise) };
      const dispatcher = { onEscalation: vi.fn(() => true) };
      const monitor = new EscalationMonitor(store, dispatcher, {
        logger: silentLogger,
        now: () => new Date("2026-05-01T15:00:00.000Z"),
      });

      const sweep = monitor.sweep();
      const stopped = monitor.stop();
      gate.resolve([openTicket(1, "2026-05-01T10:00:00.000Z")]);

      await stopped;
      expect(await sweep).toEqual({ checked: 0, urgent: 0, escalated: 0, aborted: true });
      expect(dispatcher.onEscalation).not.toHaveBeenCalled();
    });

    it("sweeps on the configured interval", async () => {
      vi.useFakeTimers();
      const store = {
        listOpenTickets: vi.fn(async () => [openTicket(1, "2026-05-01T10:00:00.000Z")]),
      };
      const dispatcher = { onEscalation: vi.fn(() => true) };
      const monitor = new EscalationMonitor(store, dispatcher, {
        intervalMs: 5 * MINUTE,
        logger: silentLogger,
        now: () => new Date("2026-05-01T13:00:00.000Z"),
      });

      monitor.start();
      await vi.advanceTimersByTimeAsync(5 * MINUTE);

      expect(dispatcher.onEscalation).toHaveBeenCalledWith(1, 3 * HOUR, {
        userId: 10,
        threadHandle: "1",
      });
      await monitor.stop();
    });
  });
});
