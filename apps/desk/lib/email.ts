import nodemailer from "nodemailer";
import type { NotificationChannel, SupportEvent } from "@support-desk/core";
import { config } from "@/lib/config";
import { escapeHtml, renderEmailHtml } from "@/lib/email-render";
import { formatWaiting } from "@/lib/notifications/staff-alert";
export { renderEmailHtml, type RenderEmailOptions } from "@/lib/email-render";

/** The slice of a nodemailer transporter the channel uses */
export interface MailTransport {
  sendMail(message: {
    from: string;
    to: string;
    subject: string;
    text: string;
    html: string;
  }): Promise<unknown>;
}

export function createTransport(): MailTransport {
  return nodemailer.createTransport({
    host: config.email.smtpHost,
    port: config.email.smtpPort,
    secure: config.email.smtpPort === 465,
    auth: config.email.smtpUser
      ? { user: config.email.smtpUser, pass: config.email.smtpPassword ?? "" }
      : undefined,
  });
}

// ── Helpers ─────────────────────────────────────────────

function paragraphs(lines: string[]): string {
  return lines.map((line) => `<p style="margin: 0 0 12px;">${line}</p>`).join("");
}

interface RenderedEmail {
  subject: string;
  text: string;
  html: string;
}

// ── Templates ───────────────────────────────────────────

export function renderTicketCreatedEmail(
  event: Extract<SupportEvent, { type: "ticket_created" }>,
  appName = config.app.name
): RenderedEmail {
  const who = event.displayName ?? `User ${event.userId}`;
  const subject = `[${appName}] New ticket #${event.ticketId} from ${who}`;
  const lines = [
    `New support request #${event.ticketId}`,
    `From: ${who} (id ${event.userId})`,
    `Contact email: ${event.contactEmail ?? "not provided"}`,
    "",
    event.text ?? "(attachment)",
  ];
  const html = renderEmailHtml({
    heading: `New ticket #${event.ticketId}`,
    bodyHtml: paragraphs([
      `<strong>From:</strong> ${escapeHtml(who)} (id ${event.userId})`,
      `<strong>Contact email:</strong> ${escapeHtml(event.contactEmail ?? "not provided")}`,
      escapeHtml(event.text ?? "(attachment)").replace(/\n/g, "<br>"),
    ]),
    footer: `${appName} support desk`,
  });
  return { subject, text: lines.join("\n"), html };
}

export function renderEscalationEmail(
  event: Extract<SupportEvent, { type: "escalation" }>,
  appName = config.app.name
): RenderedEmail {
  const waiting = formatWaiting(event.waitingDurationMs);
  const subject = `[${appName}] Ticket #${event.ticketId} waiting ${waiting}`;
  const text =
    `Ticket #${event.ticketId} has been waiting for a staff reply for ${waiting}.\n` +
    (event.userId !== null ? `User id: ${event.userId}\n` : "") +
    "Please answer it in the support group.";
  const html = renderEmailHtml({
    heading: `⚠️ Ticket #${event.ticketId} needs a reply`,
    bodyHtml: paragraphs([
      `The user has been waiting <strong>${waiting}</strong> for a staff reply.`,
      "Please answer it in the support group.",
    ]),
    footer: `${appName} support desk`,
  });
  return { subject, text, html };
}

// ── Channel ─────────────────────────────────────────────

/**
 * Emails the support inbox about new tickets and escalations.
 */
export class EmailNotificationChannel implements NotificationChannel {
  readonly name = "email";

  constructor(
    private transport: MailTransport,
    private to: string,
    private from: string = config.email.from
  ) {}

  accepts(event: SupportEvent): boolean {
    return event.type === "ticket_created" || event.type === "escalation";
  }

  async deliver(event: SupportEvent): Promise<void> {
    let email: RenderedEmail;
    if (event.type === "ticket_created") {
      email = renderTicketCreatedEmail(event);
    } else if (event.type === "escalation") {
      email = renderEscalationEmail(event);
    } else {
      return;
    }

    await this.transport.sendMail({ from: this.from, to: this.to, ...email });
  }
}
