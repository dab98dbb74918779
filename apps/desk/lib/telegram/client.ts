/**
 * Telegram Bot API client
 *
 * Thin fetch wrapper over https://api.telegram.org/bot<token>/<method>.
 * Every response is validated with zod; `ok: false` bodies and HTTP errors
 * become TelegramApiError.
 */

import { z } from "zod";
import { config } from "@/lib/config";

export class TelegramApiError extends Error {
  constructor(
    readonly method: string,
    readonly errorCode: number | null,
    description: string
  ) {
    super(`Telegram ${method} failed${errorCode ? ` (${errorCode})` : ""}: ${description}`);
    this.name = "TelegramApiError";
  }
}

const envelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

export const sentMessageSchema = z.object({
  message_id: z.number(),
  message_thread_id: z.number().optional(),
});

export const forumTopicSchema = z.object({
  message_thread_id: z.number(),
  name: z.string(),
});

export type SentMessage = z.infer<typeof sentMessageSchema>;
export type ForumTopic = z.infer<typeof forumTopicSchema>;

function threadParams(threadId: number | undefined): Record<string, number> {
  return threadId === undefined ? {} : { message_thread_id: threadId };
}

export type FileMethod = "sendPhoto" | "sendDocument" | "sendVideo";

export interface TelegramClientOptions {
  token?: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export class TelegramClient {
  private token: string;
  private baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;

  constructor(options: TelegramClientOptions = {}) {
    this.token = options.token ?? config.telegram.botToken;
    this.baseUrl = options.baseUrl ?? config.telegram.apiBaseUrl;
    this.timeoutMs = options.timeoutMs ?? config.telegram.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async call<T>(method: string, params: Record<string, unknown>, schema: z.ZodType<T>): Promise<T> {
    // Add timeout support with AbortController
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}/bot${this.token}/${method}`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(params),
        signal: controller.signal,
      });
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new TelegramApiError(method, null, reason);
    } finally {
      clearTimeout(timer);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch {
      throw new TelegramApiError(method, res.status, `non-JSON response (HTTP ${res.status})`);
    }

    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new TelegramApiError(method, res.status, "unexpected response shape");
    }
    if (!envelope.data.ok) {
      throw new TelegramApiError(
        method,
        envelope.data.error_code ?? res.status,
        envelope.data.description ?? "unknown error"
      );
    }

    const result = schema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new TelegramApiError(method, null, "unexpected result shape");
    }
    return result.data;
  }

  sendMessage(chatId: number, text: string, threadId?: number): Promise<SentMessage> {
    return this.call(
      "sendMessage",
      { chat_id: chatId, text, ...threadParams(threadId) },
      sentMessageSchema
    );
  }

  sendFile(
    method: FileMethod,
    chatId: number,
    fileRef: string,
    caption: string | null,
    threadId?: number
  ): Promise<SentMessage> {
    const field = method === "sendPhoto" ? "photo" : method === "sendDocument" ? "document" : "video";
    return this.call(
      method,
      {
        chat_id: chatId,
        [field]: fileRef,
        ...(caption ? { caption } : {}),
        ...threadParams(threadId),
      },
      sentMessageSchema
    );
  }

  createForumTopic(chatId: number, name: string): Promise<ForumTopic> {
    return this.call("createForumTopic", { chat_id: chatId, name }, forumTopicSchema);
  }

  setWebhook(url: string, secretToken?: string): Promise<boolean> {
    return this.call(
      "setWebhook",
      {
        url,
        allowed_updates: ["message"],
        ...(secretToken ? { secret_token: secretToken } : {}),
      },
      z.boolean()
    );
  }
}
