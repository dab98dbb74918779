/**
 * Suppression list
 *
 * Users whose messages the router refuses: the configured BLOCKED_USER_IDS
 * plus temporary blocks applied when a message looks like spam.
 * Implements the router's UserPolicy.
 */

import type { UserPolicy } from "@support-desk/core";
import { config } from "@/lib/config";
import { log } from "@/lib/logger";

const SPAM_WORDS = ["spam", "casino", "viagra", "bitcoin"];

export interface SpamVerdict {
  spam: boolean;
  signals: string[];
}

/**
 * Spam heuristic: a message is spam when it trips at least two signals.
 */
export function inspectMessage(text: string): SpamVerdict {
  const signals: string[] = [];
  const lower = text.toLowerCase();

  if (text.length > 2000) signals.push("long");
  if (lower.split("http").length - 1 > 3) signals.push("links");
  if (text.split("@").length - 1 > 5) signals.push("mentions");
  if (SPAM_WORDS.some((word) => lower.includes(word))) signals.push("blacklisted_word");

  return { spam: signals.length >= 2, signals };
}

export class SuppressionList implements UserPolicy {
  /** userId -> blocked-until epoch ms */
  private temporary = new Map<number, number>();

  constructor(
    private permanent: () => readonly number[] = () => config.access.blockedUserIds,
    private now: () => number = Date.now
  ) {}

  isBlocked(userId: number): boolean {
    if (this.permanent().includes(userId)) return true;

    const until = this.temporary.get(userId);
    if (until === undefined) return false;
    if (until > this.now()) return true;

    this.temporary.delete(userId);
    return false;
  }

  blockTemporarily(userId: number, durationMs: number, reason: string): void {
    this.temporary.set(userId, this.now() + durationMs);
    log("routing", "suppression.block", {
      level: "warn",
      message: `User ${userId} blocked for ${Math.round(durationMs / 60000)} min`,
      userId,
      reason,
    });
  }

  unblock(userId: number): void {
    this.temporary.delete(userId);
  }

  /**
   * Check a message against the spam heuristic and block its author when it
   * trips. Returns the verdict.
   */
  screen(userId: number, text: string | null | undefined): SpamVerdict {
    if (!text) return { spam: false, signals: [] };
    const verdict = inspectMessage(text);
    if (verdict.spam) {
      this.blockTemporarily(userId, config.rateLimit.spamBlockMs, verdict.signals.join(","));
    }
    return verdict;
  }

  get temporaryCount(): number {
    return this.temporary.size;
  }
}
