/**
 * Shared fakes for the core tests: a recording messaging platform, a
 * recording notification channel, a manual clock and a deferred promise.
 */

import type {
  DeliveryResult,
  MessagingPlatform,
  Recipient,
} from "../services/messaging/MessagingPlatform";
import type {
  NotificationChannel,
  SupportEvent,
} from "../services/notifications/NotificationDispatcher";
import type { MessageContent, ThreadHandle } from "../services/tickets/types";

export interface SentMessage {
  recipient: Recipient;
  content: MessageContent;
  threadHandle: ThreadHandle | null;
}

export class FakePlatform implements MessagingPlatform {
  sent: SentMessage[] = [];
  threads: Array<{ handle: ThreadHandle; title: string }> = [];
  /** Return an error string to fail a send */
  failWhen: ((message: SentMessage) => string | null) | null = null;
  failCreateThread = false;
  /** Awaited before every send completes */
  beforeSend: ((message: SentMessage) => Promise<void>) | null = null;

  private nextThread = 100;
  private nextMessage = 1;

  async sendMessage(
    recipient: Recipient,
    content: MessageContent,
    threadHandle?: ThreadHandle
  ): Promise<DeliveryResult> {
    const message: SentMessage = { recipient, content, threadHandle: threadHandle ?? null };
    if (this.beforeSend) await this.beforeSend(message);

    const error = this.failWhen?.(message) ?? null;
    if (error) return { ok: false, error };

    this.sent.push(message);
    return { ok: true, messageRef: `msg-${this.nextMessage++}` };
  }

  async createThread(title: string): Promise<ThreadHandle> {
    if (this.failCreateThread) {
      throw new Error("createForumTopic failed");
    }
    const handle = String(this.nextThread++);
    this.threads.push({ handle, title });
    return handle;
  }

  sentTo(kind: Recipient["kind"]): SentMessage[] {
    return this.sent.filter((m) => m.recipient.kind === kind);
  }
}

export class RecordingChannel implements NotificationChannel {
  readonly name = "recording";
  events: SupportEvent[] = [];

  async deliver(event: SupportEvent): Promise<void> {
    this.events.push(event);
  }

  ofType<T extends SupportEvent["type"]>(type: T): Array<Extract<SupportEvent, { type: T }>> {
    return this.events.filter((e): e is Extract<SupportEvent, { type: T }> => e.type === type);
  }
}

export function createClock(start: string) {
  let current = new Date(start).getTime();
  return {
    now: () => new Date(current),
    advance(ms: number) {
      current += ms;
    },
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export const MINUTE = 60 * 1000;
export const HOUR = 60 * MINUTE;
