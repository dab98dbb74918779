/**
 * Telegram webhook updates -> inbound support events.
 *
 * Only `message` updates are handled. Private chats produce user messages;
 * topic messages in the support group produce staff messages. Everything
 * else (channel posts, edits, bots, the group's general topic) yields null.
 */

import { z } from "zod";
import type { MessageContent, ThreadHandle, UserProfile } from "@support-desk/core";

// ---------------------------------------------------------------------------
// Schema (the subset of the Bot API Update object the desk reads)
// ---------------------------------------------------------------------------

const fileSchema = z.object({ file_id: z.string().min(1) });

const messageSchema = z.object({
  message_id: z.number(),
  date: z.number(),
  from: z
    .object({
      id: z.number(),
      is_bot: z.boolean(),
      first_name: z.string(),
      last_name: z.string().optional(),
      username: z.string().optional(),
      language_code: z.string().optional(),
    })
    .optional(),
  chat: z.object({
    id: z.number(),
    type: z.enum(["private", "group", "supergroup", "channel"]),
  }),
  message_thread_id: z.number().optional(),
  is_topic_message: z.boolean().optional(),
  text: z.string().optional(),
  caption: z.string().optional(),
  photo: z.array(fileSchema).optional(),
  document: fileSchema.optional(),
  video: fileSchema.optional(),
});

export const telegramUpdateSchema = z.object({
  update_id: z.number(),
  message: messageSchema.optional(),
});

export type TelegramUpdate = z.infer<typeof telegramUpdateSchema>;
type TelegramMessage = z.infer<typeof messageSchema>;

// ---------------------------------------------------------------------------
// Inbound events
// ---------------------------------------------------------------------------

export interface BotCommand {
  name: string;
  args: string;
}

export interface UserMessageEvent {
  kind: "user_message";
  userId: number;
  messageId: number;
  profile: UserProfile;
  content: MessageContent;
  command: BotCommand | null;
}

export interface StaffMessageEvent {
  kind: "staff_message";
  staffId: number;
  threadHandle: ThreadHandle;
  messageId: number;
  content: MessageContent;
  command: BotCommand | null;
}

export type InboundEvent = UserMessageEvent | StaffMessageEvent;

export type ParseResult =
  | { ok: true; event: InboundEvent | null }
  | { ok: false; error: string };

/** "/close@desk_bot now" -> { name: "close", args: "now" } */
export function parseCommand(text: string | undefined): BotCommand | null {
  if (!text?.startsWith("/")) return null;
  const match = /^\/([a-zA-Z0-9_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/.exec(text.trim());
  if (!match) return null;
  return { name: match[1].toLowerCase(), args: (match[2] ?? "").trim() };
}

function contentOf(message: TelegramMessage): MessageContent {
  const text = message.text ?? message.caption ?? null;
  const largestPhoto = message.photo?.[message.photo.length - 1];

  if (largestPhoto) return { text, attachment: { kind: "photo", fileRef: largestPhoto.file_id } };
  if (message.document) return { text, attachment: { kind: "document", fileRef: message.document.file_id } };
  if (message.video) return { text, attachment: { kind: "video", fileRef: message.video.file_id } };
  return { text, attachment: null };
}

function profileOf(from: NonNullable<TelegramMessage["from"]>): UserProfile {
  const displayName = [from.first_name, from.last_name].filter(Boolean).join(" ").trim();
  return {
    displayName: displayName || null,
    username: from.username ?? null,
    locale: from.language_code ?? null,
  };
}

/**
 * Validate a webhook body and classify it. Malformed bodies are `ok: false`;
 * well-formed updates the desk ignores are `{ ok: true, event: null }`.
 */
export function parseTelegramUpdate(body: unknown, supportGroupId: number): ParseResult {
  const parsed = telegramUpdateSchema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ") };
  }

  const message = parsed.data.message;
  if (!message?.from || message.from.is_bot) return { ok: true, event: null };

  if (message.chat.type === "private") {
    return {
      ok: true,
      event: {
        kind: "user_message",
        userId: message.from.id,
        messageId: message.message_id,
        profile: profileOf(message.from),
        content: contentOf(message),
        command: parseCommand(message.text),
      },
    };
  }

  if (message.chat.id === supportGroupId && message.message_thread_id !== undefined && message.is_topic_message) {
    return {
      ok: true,
      event: {
        kind: "staff_message",
        staffId: message.from.id,
        threadHandle: String(message.message_thread_id),
        messageId: message.message_id,
        content: contentOf(message),
        command: parseCommand(message.text),
      },
    };
  }

  return { ok: true, event: null };
}
