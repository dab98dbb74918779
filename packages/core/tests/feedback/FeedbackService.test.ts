import { describe, it, expect, vi } from "vitest";
import { FeedbackService } from "../../services/feedback/FeedbackService";
import { InMemoryTicketStore } from "../../services/tickets/InMemoryTicketStore";
import { InvalidContentError } from "../../services/tickets/errors";
import { silentLogger } from "../../services/shared/logger";

const NOW = new Date("2026-05-01T10:00:00.000Z");

function setup() {
  const store = new InMemoryTicketStore();
  const dispatcher = { onFeedbackReceived: vi.fn(() => true) };
  const service = new FeedbackService(store, dispatcher, { logger: silentLogger, now: () => NOW });
  return { store, dispatcher, service };
}

describe("FeedbackService", () => {
  it("persists the rating and emits a feedback event", async () => {
    const { store, dispatcher, service } = setup();

    const feedback = await service.recordFeedback(42, 4, "  Loved the lineup  ", "music");

    expect(feedback).toEqual({
      id: 1,
      userId: 42,
      rating: 4,
      comment: "Loved the lineup",
      category: "music",
      createdAt: NOW,
    });
    expect(await store.countFeedbackSince(NOW)).toBe(1);
    expect(dispatcher.onFeedbackReceived).toHaveBeenCalledWith(42, 4, "Loved the lineup", "music");
  });

  it("defaults the category and drops blank comments", async () => {
    const { service } = setup();

    const feedback = await service.recordFeedback(42, 5, "   ");

    expect(feedback).toMatchObject({ category: "general", comment: null });
  });

  it.each([0, 6, 2.5, Number.NaN])("rejects rating %s", async (rating) => {
    const { store, dispatcher, service } = setup();

    await expect(service.recordFeedback(42, rating)).rejects.toBeInstanceOf(InvalidContentError);
    expect(await store.countFeedbackSince(NOW)).toBe(0);
    expect(dispatcher.onFeedbackReceived).not.toHaveBeenCalled();
  });

  it("works without a dispatcher", async () => {
    const store = new InMemoryTicketStore();
    const service = new FeedbackService(store, null, { logger: silentLogger, now: () => NOW });

    await expect(service.recordFeedback(42, 3)).resolves.toMatchObject({ rating: 3 });
  });
});
