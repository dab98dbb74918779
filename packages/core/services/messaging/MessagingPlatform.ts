/**
 * Messaging platform seam
 *
 * The router consumes the platform through this interface only. Chat ids,
 * topic ids and message ids stay opaque: the core hands back whatever the
 * platform gave it.
 */

import type { MessageContent, ThreadHandle, UserId } from "../tickets/types";

export type Recipient =
  /** The end user's private conversation */
  | { kind: "user"; userId: UserId }
  /** The shared staff workspace; pair with a thread handle to target a ticket thread */
  | { kind: "staff" }
  /** Public feedback channel */
  | { kind: "feedback" };

export type DeliveryResult =
  | { ok: true; messageRef: string | null }
  | { ok: false; error: string };

export interface MessagingPlatform {
  sendMessage(
    recipient: Recipient,
    content: MessageContent,
    threadHandle?: ThreadHandle
  ): Promise<DeliveryResult>;

  /** Open a new staff-side discussion context and return its handle */
  createThread(title: string): Promise<ThreadHandle>;
}
