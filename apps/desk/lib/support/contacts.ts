/**
 * Contact emails given with /email, kept per user so tickets opened later
 * carry the address too. Process memory only; the open ticket at the time
 * of /email stores it durably.
 */

import type { UserId } from "@support-desk/core";

const MAX_CONTACTS = 10_000;

export class ContactBook {
  private emails = new Map<UserId, string>();

  constructor(private capacity: number = MAX_CONTACTS) {}

  remember(userId: UserId, email: string): void {
    this.emails.delete(userId);
    if (this.emails.size >= this.capacity) {
      const oldest = this.emails.keys().next();
      if (!oldest.done) this.emails.delete(oldest.value);
    }
    this.emails.set(userId, email);
  }

  get(userId: UserId): string | null {
    return this.emails.get(userId) ?? null;
  }

  get size(): number {
    return this.emails.size;
  }
}
