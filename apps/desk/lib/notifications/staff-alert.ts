/**
 * Chat notification channels: escalation alerts into the staff group (in the
 * ticket's own thread when it has one) and feedback posts to the feedback
 * channel.
 */

import type {
  MessagingPlatform,
  NotificationChannel,
  Recipient,
  SupportEvent,
  ThreadHandle,
} from "@support-desk/core";

type EscalationEvent = Extract<SupportEvent, { type: "escalation" }>;
type FeedbackEvent = Extract<SupportEvent, { type: "feedback" }>;

export function formatWaiting(ms: number): string {
  const minutes = Math.floor(ms / 60000);
  const hours = Math.floor(minutes / 60);
  return hours > 0 ? `${hours}h ${minutes % 60}m` : `${minutes}m`;
}

export function escalationAlertText(event: EscalationEvent): string {
  return (
    `⚠️ Urgent: ticket #${event.ticketId} has waited ${formatWaiting(event.waitingDurationMs)} ` +
    "without a staff reply"
  );
}

export function feedbackPostText(event: FeedbackEvent): string {
  const stars = "⭐".repeat(event.rating);
  const lines = [`${stars} New feedback (${event.rating}/5)`, `Category: ${event.category}`];
  if (event.comment) lines.push("", event.comment);
  return lines.join("\n");
}

async function post(
  platform: MessagingPlatform,
  recipient: Recipient,
  text: string,
  threadHandle?: ThreadHandle
): Promise<void> {
  const result = await platform.sendMessage(recipient, { text }, threadHandle);
  if (!result.ok) {
    throw new Error(result.error);
  }
}

export class StaffAlertChannel implements NotificationChannel {
  readonly name = "staff-alert";

  constructor(private platform: MessagingPlatform) {}

  accepts(event: SupportEvent): boolean {
    return event.type === "escalation";
  }

  async deliver(event: SupportEvent): Promise<void> {
    if (event.type !== "escalation") return;
    await post(this.platform, { kind: "staff" }, escalationAlertText(event), event.threadHandle ?? undefined);
  }
}

export class FeedbackChannel implements NotificationChannel {
  readonly name = "feedback-channel";

  constructor(private platform: MessagingPlatform) {}

  accepts(event: SupportEvent): boolean {
    return event.type === "feedback";
  }

  async deliver(event: SupportEvent): Promise<void> {
    if (event.type !== "feedback") return;
    await post(this.platform, { kind: "feedback" }, feedbackPostText(event));
  }
}
