import { describe, it, expect, beforeEach } from "vitest";
import { MessageRouter, type MessageRouterOptions } from "../../services/routing/MessageRouter";
import { ThreadRegistry } from "../../services/routing/ThreadRegistry";
import { InMemoryTicketStore } from "../../services/tickets/InMemoryTicketStore";
import { NotificationDispatcher } from "../../services/notifications/NotificationDispatcher";
import { silentLogger } from "../../services/shared/logger";
import {
  DeliveryFailedError,
  InvalidContentError,
  OpenTicketExistsError,
  ServiceShuttingDownError,
  StoreUnavailableError,
  TicketAlreadyClosedError,
  TicketNotFoundError,
  UnknownThreadError,
  UserBlockedError,
} from "../../services/tickets/errors";
import { FakePlatform, RecordingChannel, createClock, deferred, MINUTE } from "../helpers";

function setup(options: Partial<MessageRouterOptions> = {}) {
  const clock = createClock("2026-05-01T10:00:00.000Z");
  const store = new InMemoryTicketStore();
  const registry = new ThreadRegistry(store, { logger: silentLogger });
  const platform = new FakePlatform();
  const channel = new RecordingChannel();
  const dispatcher = new NotificationDispatcher([channel], { logger: silentLogger, now: clock.now });
  const router = new MessageRouter({
    store,
    registry,
    platform,
    dispatcher,
    logger: silentLogger,
    now: clock.now,
    ...options,
  });
  return { clock, store, registry, platform, channel, dispatcher, router };
}

describe("MessageRouter", () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup();
  });

  // =====================================================
  // USER MESSAGES
  // =====================================================

  describe("routeUserMessage", () => {
    it("creates a ticket and a staff thread on first contact", async () => {
      const { router, platform, store } = ctx;

      const result = await router.routeUserMessage(
        42,
        { text: "Where is the main stage?" },
        "guest@example.com",
        { profile: { displayName: "Alex" } }
      );

      expect(result).toEqual({ ticketId: 1, action: "created", responseId: 1 });
      expect(platform.threads).toEqual([{ handle: "100", title: "#1 Alex" }]);
      expect(platform.sent).toEqual([
        {
          recipient: { kind: "staff" },
          content: {
            text: "🆕 Ticket #1\n👤 Alex\n🆔 42\n📧 guest@example.com\n🕐 2026-05-01T10:00:00.000Z",
          },
          threadHandle: "100",
        },
        {
          recipient: { kind: "staff" },
          content: { text: "👤 Alex:\nWhere is the main stage?", attachment: null },
          threadHandle: "100",
        },
      ]);
      expect(await store.getTicket(1)).toMatchObject({
        userId: 42,
        status: "open",
        threadHandle: "100",
        initialMessageRef: "msg-1",
        contactEmail: "guest@example.com",
      });
    });

    it("publishes ticket_created", async () => {
      const { router, dispatcher, channel } = ctx;

      await router.routeUserMessage(42, { text: "Lost my wristband" }, null, {
        profile: { displayName: "Alex" },
      });
      await dispatcher.flush();

      expect(channel.ofType("ticket_created")).toEqual([
        {
          type: "ticket_created",
          ticketId: 1,
          userId: 42,
          contactEmail: null,
          displayName: "Alex",
          text: "Lost my wristband",
          at: new Date("2026-05-01T10:00:00.000Z"),
        },
      ]);
    });

    it("appends follow-up messages to the open ticket", async () => {
      const { router, platform, store, clock } = ctx;

      await router.routeUserMessage(42, { text: "Hello" });
      clock.advance(MINUTE);
      const result = await router.routeUserMessage(42, { text: "Anyone there?" });

      expect(result).toEqual({ ticketId: 1, action: "forwarded", responseId: 2 });
      expect(platform.threads).toHaveLength(1);
      const responses = await store.listResponses(1);
      expect(responses.map((r) => r.text)).toEqual(["Hello", "Anyone there?"]);
      expect((await store.getTicket(1))?.lastUserMessageAt).toEqual(
        new Date("2026-05-01T10:01:00.000Z")
      );
    });

    it("forwards attachments with the author prefix as caption", async () => {
      const { router, platform } = ctx;

      await router.routeUserMessage(42, { text: "Hi" }, null, { profile: { displayName: "Alex" } });
      await router.routeUserMessage(42, { attachment: { kind: "photo", fileRef: "file-1" } });

      expect(platform.sent[platform.sent.length - 1]).toEqual({
        recipient: { kind: "staff" },
        content: { text: "👤 Alex:", attachment: { kind: "photo", fileRef: "file-1" } },
        threadHandle: "100",
      });
    });

    it("records the contact email when a later message supplies it", async () => {
      const { router, store } = ctx;

      await router.routeUserMessage(42, { text: "Hi" });
      await router.routeUserMessage(42, { text: "My email" }, "late@example.com");

      expect((await store.getTicket(1))?.contactEmail).toBe("late@example.com");
    });

    it("sets the contact email on the open ticket", async () => {
      const { router, store } = ctx;

      expect(await router.setContactEmail(42, "ada@example.com")).toBeNull();
      await router.routeUserMessage(42, { text: "Hello" }, "old@example.com");

      expect(await router.setContactEmail(42, "ada@example.com")).toBe(1);
      expect((await store.getTicket(1))?.contactEmail).toBe("ada@example.com");
    });

    it("rejects empty and oversized content", async () => {
      const { router } = setup({ maxMessageLength: 10 });

      await expect(router.routeUserMessage(42, { text: "   " })).rejects.toBeInstanceOf(
        InvalidContentError
      );
      await expect(
        router.routeUserMessage(42, { attachment: { kind: "document", fileRef: " " } })
      ).rejects.toBeInstanceOf(InvalidContentError);
      await expect(router.routeUserMessage(42, { text: "x".repeat(11) })).rejects.toThrow(
        "Invalid message content: message exceeds 10 characters"
      );
    });

    it("rejects blocked users without creating a ticket", async () => {
      const { router, store, platform } = setup({ policy: { isBlocked: (userId) => userId === 13 } });

      await expect(router.routeUserMessage(13, { text: "spam" })).rejects.toBeInstanceOf(
        UserBlockedError
      );
      expect(await store.countOpenTickets()).toBe(0);
      expect(platform.sent).toEqual([]);
    });

    it("closes the open ticket and starts a new one with startNew", async () => {
      const { router, store } = ctx;

      await router.routeUserMessage(42, { text: "First question" });
      const result = await router.routeUserMessage(42, { text: "Different question" }, null, {
        startNew: true,
      });

      expect(result).toEqual({ ticketId: 2, action: "created", responseId: 2 });
      expect(await store.getTicket(1)).toMatchObject({ status: "closed", closedBy: 42 });
      expect(await store.getTicket(2)).toMatchObject({ status: "open", threadHandle: "101" });
    });

    it("reopens a ticket that was closed while the message was in flight", async () => {
      const { router, store, platform, clock } = ctx;
      await router.routeUserMessage(42, { text: "Hello" });

      // Another writer holds the row lock and commits the close after the message arrived
      const gate = deferred();
      const closing = store.transaction(async (tx) => {
        await tx.getTicketForUpdate(1);
        await gate.promise;
        clock.advance(MINUTE);
        await tx.updateTicket(1, { status: "closed", closedAt: clock.now(), closedBy: 900 });
      });
      const routing = router.routeUserMessage(42, { text: "Still there?" });
      gate.resolve();
      await closing;
      const result = await routing;

      expect(result).toEqual({ ticketId: 1, action: "reopened", responseId: 2 });
      expect(await store.getTicket(1)).toMatchObject({
        status: "open",
        closedAt: null,
        closedBy: null,
      });
      expect(platform.sentTo("staff").slice(-2).map((m) => m.content.text)).toEqual([
        "🔓 Ticket #1 reopened: the user wrote again",
        "👤 User 42:\nStill there?",
      ]);
    });

    it("starts a new ticket when the close was persisted before the message arrived", async () => {
      const { router, store, registry, clock } = ctx;
      await router.routeUserMessage(42, { text: "Hello" });

      // Closed behind the registry's back
      await store.transaction(async (tx) => {
        await tx.updateTicket(1, { status: "closed", closedAt: clock.now(), closedBy: 900 });
      });
      clock.advance(MINUTE);
      const result = await router.routeUserMessage(42, { text: "New question" });

      expect(result).toEqual({ ticketId: 2, action: "created", responseId: 2 });
      expect((await store.getTicket(1))?.status).toBe("closed");
      expect(await registry.resolveByUser(42)).toBe(2);
    });

    it("surfaces StoreUnavailableError when the store is down", async () => {
      const { router, store } = ctx;
      store._setUnavailableForTesting(true);

      await expect(router.routeUserMessage(42, { text: "Hello" })).rejects.toBeInstanceOf(
        StoreUnavailableError
      );
    });
  });

  // =====================================================
  // STAFF REPLIES
  // =====================================================

  describe("routeStaffReply", () => {
    it("delivers the reply to the ticket's user", async () => {
      const { router, platform, store, clock } = ctx;

      await router.routeUserMessage(42, { text: "Where is gate B?" });
      clock.advance(5 * MINUTE);
      const result = await router.routeStaffReply("100", 900, {
        text: "Next to the food court",
      });

      expect(result).toEqual({ ticketId: 1, action: "forwarded", responseId: 2 });
      expect(platform.sentTo("user")).toEqual([
        {
          recipient: { kind: "user", userId: 42 },
          content: { text: "🧑‍💼 Support:\nNext to the food court", attachment: null },
          threadHandle: null,
        },
      ]);
      expect((await store.getTicket(1))?.lastStaffResponseAt).toEqual(
        new Date("2026-05-01T10:05:00.000Z")
      );
    });

    it("labels admin replies", async () => {
      const { router, platform } = ctx;

      await router.routeUserMessage(42, { text: "Refund?" });
      await router.routeStaffReply("100", 901, { text: "Approved" }, "admin");

      expect(platform.sentTo("user")[0].content.text).toBe("👨‍💼 Administrator:\nApproved");
    });

    it("rejects replies in unknown threads", async () => {
      await expect(ctx.router.routeStaffReply("999", 900, { text: "Hi" })).rejects.toBeInstanceOf(
        UnknownThreadError
      );
    });

    it("rejects replies on closed tickets by default", async () => {
      const { router } = ctx;

      await router.routeUserMessage(42, { text: "Hello" });
      await router.closeTicket(1, 900);

      await expect(router.routeStaffReply("100", 900, { text: "Late" })).rejects.toBeInstanceOf(
        TicketAlreadyClosedError
      );
    });

    it("accepts replies on closed tickets when allowed", async () => {
      const { router, platform } = setup({ allowReplyToClosed: true });

      await router.routeUserMessage(42, { text: "Hello" });
      await router.closeTicket(1, 900);
      const result = await router.routeStaffReply("100", 900, { text: "Late answer" });

      expect(result.action).toBe("forwarded");
      expect(platform.sentTo("user").map((m) => m.content.text)).toContain(
        "🧑‍💼 Support:\nLate answer"
      );
    });

    it("persists the reply before sending it", async () => {
      const { router, platform, store } = ctx;

      await router.routeUserMessage(42, { text: "hello" });
      const seenAtSend: string[] = [];
      platform.beforeSend = async (message) => {
        if (message.recipient.kind !== "user") return;
        const responses = await store.listResponses(1);
        seenAtSend.push(...responses.map((r) => `${r.role}:${r.text}`));
      };

      await router.routeStaffReply("100", 900, { text: "On it" });

      expect(seenAtSend).toEqual(["user:hello", "staff:On it"]);
    });

    it("returns a delivery failure without rolling back", async () => {
      const { router, platform, store } = ctx;

      await router.routeUserMessage(42, { text: "hello" });
      platform.failWhen = (m) =>
        m.recipient.kind === "user" ? "Forbidden: bot was blocked by the user" : null;

      const result = await router.routeStaffReply("100", 900, { text: "On it" });

      expect(result.deliveryError).toBeInstanceOf(DeliveryFailedError);
      expect(result.deliveryError?.message).toBe(
        "Delivery failed for ticket #1: Forbidden: bot was blocked by the user"
      );
      expect(await store.listResponses(1)).toHaveLength(2);
      expect((await store.getTicket(1))?.lastStaffResponseAt).not.toBeNull();
    });
  });

  // =====================================================
  // THREAD CREATION FAILURE
  // =====================================================

  it("keeps the ticket when thread creation fails and retries on the next message", async () => {
    const { router, platform, store } = ctx;
    platform.failCreateThread = true;

    const first = await router.routeUserMessage(42, { text: "Hello" });

    expect(first.action).toBe("created");
    expect(first.deliveryError?.message).toBe(
      "Delivery failed for ticket #1: could not create staff thread"
    );
    expect((await store.getTicket(1))?.threadHandle).toBeNull();
    expect(platform.sent).toEqual([]);

    platform.failCreateThread = false;
    const second = await router.routeUserMessage(42, { text: "Hello again" });

    expect(second).toEqual({ ticketId: 1, action: "forwarded", responseId: 2 });
    expect(platform.threads).toEqual([{ handle: "100", title: "#1 User 42" }]);
    expect((await store.getTicket(1))?.threadHandle).toBe("100");
  });

  it("keeps the thread when saving its handle fails and saves it on the next message", async () => {
    const { router, platform, store, registry } = ctx;
    // The store goes down right after the thread is opened and its card posted
    platform.beforeSend = async () => {
      store._setUnavailableForTesting(true);
      platform.beforeSend = null;
    };

    const first = await router.routeUserMessage(42, { text: "help" });

    expect(first.action).toBe("created");
    expect(first.deliveryError?.message).toBe(
      "Delivery failed for ticket #1: could not save staff thread"
    );
    expect(await registry.resolveByThread("100")).toBe(1);

    store._setUnavailableForTesting(false);
    expect((await store.getTicket(1))?.threadHandle).toBeNull();

    const second = await router.routeUserMessage(42, { text: "help again" });

    expect(second).toEqual({ ticketId: 1, action: "forwarded", responseId: 2 });
    expect(platform.threads).toEqual([{ handle: "100", title: "#1 User 42" }]);
    expect(await store.getTicket(1)).toMatchObject({ threadHandle: "100", initialMessageRef: "msg-1" });
    expect((await store.listResponses(1)).map((r) => r.text)).toEqual(["help", "help again"]);
  });

  // =====================================================
  // LIFECYCLE
  // =====================================================

  describe("closeTicket", () => {
    it("closes the ticket and notifies both sides", async () => {
      const { router, store, registry, platform, clock } = ctx;

      await router.routeUserMessage(42, { text: "Hello" });
      clock.advance(MINUTE);
      await router.closeTicket(1, 900);

      expect(await store.getTicket(1)).toMatchObject({
        status: "closed",
        closedBy: 900,
        closedAt: new Date("2026-05-01T10:01:00.000Z"),
      });
      expect(await registry.resolveByUser(42)).toBeNull();
      expect(await registry.resolveByThread("100")).toBe(1);
      expect(platform.sent.slice(-2)).toEqual([
        {
          recipient: { kind: "staff" },
          content: { text: "🔒 Ticket #1 closed by staff 900" },
          threadHandle: "100",
        },
        {
          recipient: { kind: "user", userId: 42 },
          content: {
            text:
              "✅ Request #1 closed\n\n" +
              "Thank you for contacting us! If you have a new question, just write again.",
          },
          threadHandle: null,
        },
      ]);
    });

    it("is idempotent", async () => {
      const { router, dispatcher, channel, platform } = ctx;

      await router.routeUserMessage(42, { text: "Hello" });
      expect(await router.closeTicket(1, 900)).toBe(true);
      const sentAfterFirstClose = platform.sent.length;
      expect(await router.closeTicket(1, 900)).toBe(false);
      await dispatcher.flush();

      expect(channel.ofType("ticket_closed")).toHaveLength(1);
      expect(platform.sent).toHaveLength(sentAfterFirstClose);
    });

    it("starts a new ticket on the next user message", async () => {
      const { router } = ctx;

      await router.routeUserMessage(42, { text: "Hello" });
      await router.closeTicket(1, 900);
      const result = await router.routeUserMessage(42, { text: "New question" });

      expect(result).toEqual({ ticketId: 2, action: "created", responseId: 2 });
    });

    it("throws for unknown tickets", async () => {
      await expect(ctx.router.closeTicket(77, 900)).rejects.toBeInstanceOf(TicketNotFoundError);
    });

    it("closes conditionally only when the ticket was untouched since the given instant", async () => {
      const { router, store, registry, platform, clock } = ctx;

      await router.routeUserMessage(42, { text: "Hello" });
      clock.advance(MINUTE);
      const sentBefore = platform.sent.length;

      const skipped = await router.closeTicket(1, "system", {
        ifUntouchedSince: new Date("2026-05-01T10:00:00.000Z"),
      });

      expect(skipped).toBe(false);
      expect((await store.getTicket(1))?.status).toBe("open");
      expect(await registry.resolveByUser(42)).toBe(1);
      expect(platform.sent).toHaveLength(sentBefore);

      const closed = await router.closeTicket(1, "system", {
        ifUntouchedSince: new Date("2026-05-01T10:00:30.000Z"),
      });

      expect(closed).toBe(true);
      expect(await store.getTicket(1)).toMatchObject({ status: "closed", closedBy: "system" });
    });
  });

  describe("reopenTicket", () => {
    it("reopens a closed ticket and routes the user to it again", async () => {
      const { router, store, platform } = ctx;

      await router.routeUserMessage(42, { text: "Hello" });
      await router.closeTicket(1, 900);
      await router.reopenTicket(1, 900);

      expect(await store.getTicket(1)).toMatchObject({ status: "open", closedAt: null });
      expect(platform.sentTo("staff").slice(-1)[0].content.text).toBe("🔓 Ticket #1 reopened");

      const result = await router.routeUserMessage(42, { text: "Thanks" });
      expect(result).toEqual({ ticketId: 1, action: "forwarded", responseId: 2 });
    });

    it("refuses when the user has another open ticket", async () => {
      const { router } = ctx;

      await router.routeUserMessage(42, { text: "Hello" });
      await router.closeTicket(1, 900);
      await router.routeUserMessage(42, { text: "Another thing" });

      const attempt = router.reopenTicket(1, 900);
      await expect(attempt).rejects.toBeInstanceOf(OpenTicketExistsError);
      await expect(attempt).rejects.toMatchObject({ ticketId: 1, openTicketId: 2 });
    });

    it("throws for unknown tickets", async () => {
      await expect(ctx.router.reopenTicket(77, 900)).rejects.toBeInstanceOf(TicketNotFoundError);
    });
  });

  // =====================================================
  // SHARED STORE
  // =====================================================

  describe("with another router on the same store", () => {
    function twoRouters() {
      const clock = createClock("2026-05-01T10:00:00.000Z");
      const store = new InMemoryTicketStore();
      const make = () =>
        new MessageRouter({
          store,
          registry: new ThreadRegistry(store, { logger: silentLogger }),
          platform: new FakePlatform(),
          logger: silentLogger,
          now: clock.now,
        });
      return { clock, store, server: make(), control: make() };
    }

    it("starts a new ticket after the other router closed the old one", async () => {
      const { clock, store, server, control } = twoRouters();

      await server.routeUserMessage(42, { text: "Hello" });
      clock.advance(MINUTE);
      await control.closeTicket(1, 900);
      clock.advance(MINUTE);
      const result = await server.routeUserMessage(42, { text: "New question" });

      expect(result).toEqual({ ticketId: 2, action: "created", responseId: 2 });
      expect((await store.getTicket(1))?.status).toBe("closed");
    });

    it("routes to a ticket the other router reopened instead of opening a second one", async () => {
      const { store, server, control } = twoRouters();

      await server.routeUserMessage(42, { text: "Hello" });
      await server.closeTicket(1, 900);
      await control.reopenTicket(1, 900);
      const result = await server.routeUserMessage(42, { text: "Thanks" });

      expect(result).toEqual({ ticketId: 1, action: "forwarded", responseId: 2 });
      expect((await store.listOpenTickets()).map((t) => t.id)).toEqual([1]);
    });

    it("closes an externally reopened ticket on startNew", async () => {
      const { store, server, control } = twoRouters();

      await server.routeUserMessage(42, { text: "Hello" });
      await server.closeTicket(1, 900);
      await control.reopenTicket(1, 900);
      const result = await server.routeUserMessage(42, { text: "Other topic" }, null, { startNew: true });

      expect(result).toEqual({ ticketId: 2, action: "created", responseId: 2 });
      expect((await store.listOpenTickets()).map((t) => t.id)).toEqual([2]);
    });
  });

  // =====================================================
  // CONCURRENCY
  // =====================================================

  describe("concurrency", () => {
    it("serializes a user's first messages into one ticket", async () => {
      const { router, store, platform } = ctx;

      const results = await Promise.all(
        Array.from({ length: 10 }, (_, i) => router.routeUserMessage(42, { text: `message ${i}` }))
      );

      expect(results.filter((r) => r.action === "created")).toHaveLength(1);
      expect(new Set(results.map((r) => r.ticketId))).toEqual(new Set([1]));
      expect(await store.countOpenTickets()).toBe(1);
      expect(platform.threads).toHaveLength(1);
    });

    it("routes 100 concurrent staff replies to their own tickets", async () => {
      const { router, store, platform } = ctx;

      for (let userId = 1; userId <= 100; userId++) {
        await router.routeUserMessage(userId, { text: `question from ${userId}` });
      }

      const results = await Promise.all(
        Array.from({ length: 100 }, (_, i) =>
          router.routeStaffReply(String(100 + i), 900, { text: `answer ${i + 1}` })
        )
      );

      expect(results.map((r) => r.ticketId)).toEqual(Array.from({ length: 100 }, (_, i) => i + 1));
      for (let ticketId = 1; ticketId <= 100; ticketId++) {
        expect(await store.listResponses(ticketId)).toHaveLength(2);
      }
      const delivered = platform.sentTo("user");
      expect(delivered).toHaveLength(100);
      for (const message of delivered) {
        const userId = message.recipient.kind === "user" ? message.recipient.userId : null;
        expect(message.content.text).toBe(`🧑‍💼 Support:\nanswer ${userId}`);
      }
    });

    it("keeps 50 concurrent replies on one ticket in persisted order", async () => {
      const { router, store, platform } = ctx;

      await router.routeUserMessage(42, { text: "hello" });
      const results = await Promise.all(
        Array.from({ length: 50 }, (_, i) => router.routeStaffReply("100", 900, { text: `reply ${i}` }))
      );

      expect(new Set(results.map((r) => r.responseId)).size).toBe(50);
      const persisted = (await store.listResponses(1))
        .filter((r) => r.role === "staff")
        .map((r) => r.text);
      const delivered = platform
        .sentTo("user")
        .map((m) => m.content.text?.replace("🧑‍💼 Support:\n", ""));
      expect(persisted).toHaveLength(50);
      expect(delivered).toEqual(persisted);
    });
  });

  // =====================================================
  // SHUTDOWN
  // =====================================================

  it("rejects new calls during shutdown and drains in-flight ones", async () => {
    const { router, platform } = ctx;

    await router.routeUserMessage(42, { text: "hello" });
    const gate = deferred();
    platform.beforeSend = () => gate.promise;

    const pending = router.routeStaffReply("100", 900, { text: "On it" });
    let drained = false;
    const shutdown = router.shutdown().then(() => {
      drained = true;
    });

    await expect(router.routeUserMessage(42, { text: "more" })).rejects.toBeInstanceOf(
      ServiceShuttingDownError
    );
    expect(drained).toBe(false);

    gate.resolve();
    await expect(pending).resolves.toMatchObject({ ticketId: 1, action: "forwarded" });
    await shutdown;
    expect(drained).toBe(true);
    expect(router.inFlight).toBe(0);
  });
});
