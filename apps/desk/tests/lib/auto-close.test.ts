import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { SupportTicket } from "@support-desk/core";
import { closeIdleTickets, isIdle, startAutoClose } from "@/lib/support/auto-close";
import { createTestRuntime } from "../support/fakes";

const DAY_MS = 24 * 60 * 60 * 1000;
const NOW = new Date("2024-06-10T12:00:00Z");

function ticket(id: number, idleDays: number): SupportTicket {
  const updatedAt = new Date(NOW.getTime() - idleDays * DAY_MS);
  return {
    id,
    userId: 100 + id,
    contactEmail: null,
    status: "open",
    threadHandle: String(500 + id),
    initialMessageRef: null,
    createdAt: updatedAt,
    updatedAt,
    lastUserMessageAt: updatedAt,
    lastStaffResponseAt: null,
    closedAt: null,
    closedBy: null,
  };
}

describe("isIdle", () => {
  it("is strict about the boundary", () => {
    expect(isIdle(ticket(1, 7), 7, NOW)).toBe(false);
    expect(isIdle(ticket(1, 7.01), 7, NOW)).toBe(true);
  });
});

describe("closeIdleTickets", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("closes only idle tickets, as system", async () => {
    const closeTicket = vi.fn().mockResolvedValue(true);
    const deps = {
      store: { listOpenTickets: async () => [ticket(1, 8), ticket(2, 1), ticket(3, 30)] },
      router: { closeTicket },
    };

    const closed = await closeIdleTickets(deps, 7, NOW);

    expect(closed).toEqual([1, 3]);
    const ifUntouchedSince = new Date("2024-06-03T12:00:00Z");
    expect(closeTicket.mock.calls).toEqual([
      [1, "system", { ifUntouchedSince }],
      [3, "system", { ifUntouchedSince }],
    ]);
  });

  it("keeps going when one ticket fails", async () => {
    const closeTicket = vi.fn().mockRejectedValueOnce(new Error("locked")).mockResolvedValue(true);
    const deps = {
      store: { listOpenTickets: async () => [ticket(1, 8), ticket(2, 9)] },
      router: { closeTicket },
    };

    expect(await closeIdleTickets(deps, 7, NOW)).toEqual([2]);
  });

  it("leaves out tickets the router declined to close", async () => {
    const closeTicket = vi.fn().mockResolvedValueOnce(false).mockResolvedValue(true);
    const deps = {
      store: { listOpenTickets: async () => [ticket(1, 8), ticket(2, 9)] },
      router: { closeTicket },
    };

    expect(await closeIdleTickets(deps, 7, NOW)).toEqual([2]);
  });

  it("does nothing when disabled", async () => {
    const listOpenTickets = vi.fn();
    const closed = await closeIdleTickets(
      { store: { listOpenTickets }, router: { closeTicket: vi.fn() } },
      0,
      NOW
    );
    expect(closed).toEqual([]);
    expect(listOpenTickets).not.toHaveBeenCalled();
  });

  it("closes real tickets through the router", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const { runtime, platform, store } = createTestRuntime();
    await runtime.router.routeUserMessage(42, { text: "hello" }, null, { profile: { displayName: "Ada" } });

    const later = new Date(Date.now() + 8 * DAY_MS);
    const closed = await closeIdleTickets({ store, router: runtime.router }, 7, later);

    expect(closed).toEqual([1]);
    expect((await store.getTicket(1))?.closedBy).toBe("system");
    expect(platform.textsTo("staff").at(-1)).toBe("🔒 Ticket #1 closed by auto-close (inactivity)");
  });

  it("skips a ticket the user wrote to after the idle list was read", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.useFakeTimers({ toFake: ["Date"] });
    try {
      vi.setSystemTime(NOW);
      const { runtime, store } = createTestRuntime();
      await runtime.router.routeUserMessage(42, { text: "hello" });

      const later = new Date(NOW.getTime() + 8 * DAY_MS);
      vi.setSystemTime(later);
      const listOpenTickets = async () => {
        const snapshot = await store.listOpenTickets();
        await runtime.router.routeUserMessage(42, { text: "still waiting" });
        return snapshot;
      };

      const closed = await closeIdleTickets({ store: { listOpenTickets }, router: runtime.router }, 7, later);

      expect(closed).toEqual([]);
      expect(await store.getTicket(1)).toMatchObject({ status: "open", updatedAt: later });
    } finally {
      vi.useRealTimers();
    }
  });
});

describe("startAutoClose", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs on the interval until stopped", async () => {
    const closeTicket = vi.fn().mockResolvedValue(true);
    const listOpenTickets = vi.fn(async () => [ticket(1, 8)]);
    const stop = startAutoClose({ store: { listOpenTickets }, router: { closeTicket } }, 7, 60_000);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(closeTicket).toHaveBeenCalledWith(1, "system", {
      ifUntouchedSince: new Date("2024-06-03T12:01:00Z"),
    });

    stop();
    await vi.advanceTimersByTimeAsync(120_000);
    expect(listOpenTickets).toHaveBeenCalledTimes(1);
  });
});
