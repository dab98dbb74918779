/**
 * TelegramMessenger
 *
 * MessagingPlatform over the Bot API. Staff threads are forum topics in the
 * support group; a thread handle is the topic's message_thread_id.
 */

import type {
  AttachmentKind,
  DeliveryResult,
  MessageContent,
  MessagingPlatform,
  Recipient,
  ThreadHandle,
} from "@support-desk/core";
import { describeError } from "@support-desk/core";
import type { FileMethod, TelegramClient } from "@/lib/telegram/client";

export interface TelegramMessengerOptions {
  supportGroupId: number;
  feedbackChannelId: number | null;
}

const FILE_METHODS: Record<AttachmentKind, FileMethod> = {
  photo: "sendPhoto",
  document: "sendDocument",
  video: "sendVideo",
};

/** Bot API caption limit */
const MAX_CAPTION_LENGTH = 1024;

export class TelegramMessenger implements MessagingPlatform {
  constructor(
    private client: TelegramClient,
    private options: TelegramMessengerOptions
  ) {}

  async sendMessage(
    recipient: Recipient,
    content: MessageContent,
    threadHandle?: ThreadHandle
  ): Promise<DeliveryResult> {
    const chatId = this.chatFor(recipient);
    if (chatId === null) {
      return { ok: false, error: `no chat configured for ${recipient.kind}` };
    }

    let threadId: number | undefined;
    if (threadHandle !== undefined) {
      threadId = Number(threadHandle);
      if (!Number.isSafeInteger(threadId)) {
        return { ok: false, error: `invalid thread handle ${threadHandle}` };
      }
    }

    try {
      const text = content.text ?? null;
      if (content.attachment) {
        const caption = text && text.length > MAX_CAPTION_LENGTH ? text.slice(0, MAX_CAPTION_LENGTH) : text;
        const sent = await this.client.sendFile(
          FILE_METHODS[content.attachment.kind],
          chatId,
          content.attachment.fileRef,
          caption,
          threadId
        );
        return { ok: true, messageRef: String(sent.message_id) };
      }

      if (!text) {
        return { ok: false, error: "empty message" };
      }
      const sent = await this.client.sendMessage(chatId, text, threadId);
      return { ok: true, messageRef: String(sent.message_id) };
    } catch (error) {
      return { ok: false, error: describeError(error) };
    }
  }

  async createThread(title: string): Promise<ThreadHandle> {
    const topic = await this.client.createForumTopic(this.options.supportGroupId, title);
    return String(topic.message_thread_id);
  }

  private chatFor(recipient: Recipient): number | null {
    switch (recipient.kind) {
      case "user":
        return recipient.userId;
      case "staff":
        return this.options.supportGroupId || null;
      case "feedback":
        return this.options.feedbackChannelId;
    }
  }
}
