/**
 * FeedbackService
 *
 * Records attendee ratings (1-5) and announces them to the feedback channels.
 */

import type { TicketStore } from "../tickets/TicketStore";
import type { Feedback, UserId } from "../tickets/types";
import { InvalidContentError } from "../tickets/errors";
import type { NotificationDispatcher } from "../notifications/NotificationDispatcher";
import { consoleLogger, systemClock, type Clock, type SupportLogger } from "../shared/logger";

export const MIN_RATING = 1;
export const MAX_RATING = 5;
const MAX_COMMENT_LENGTH = 2000;

export interface FeedbackServiceOptions {
  logger?: SupportLogger;
  now?: Clock;
}

export class FeedbackService {
  private logger: SupportLogger;
  private now: Clock;

  constructor(
    private store: Pick<TicketStore, "addFeedback">,
    private dispatcher: Pick<NotificationDispatcher, "onFeedbackReceived"> | null,
    options: FeedbackServiceOptions = {}
  ) {
    this.logger = options.logger ?? consoleLogger;
    this.now = options.now ?? systemClock;
  }

  async recordFeedback(
    userId: UserId,
    rating: number,
    comment?: string | null,
    category = "general"
  ): Promise<Feedback> {
    if (!Number.isInteger(rating) || rating < MIN_RATING || rating > MAX_RATING) {
      throw new InvalidContentError(`rating must be an integer from ${MIN_RATING} to ${MAX_RATING}`);
    }
    const text = comment?.trim() || null;
    if (text && text.length > MAX_COMMENT_LENGTH) {
      throw new InvalidContentError(`comment exceeds ${MAX_COMMENT_LENGTH} characters`);
    }

    const feedback = await this.store.addFeedback({
      userId,
      rating,
      comment: text,
      category: category.trim() || "general",
      createdAt: this.now(),
    });

    this.logger.info("feedback", "Feedback recorded", { userId, rating, category: feedback.category });
    this.dispatcher?.onFeedbackReceived(userId, rating, text, feedback.category);
    return feedback;
  }
}
