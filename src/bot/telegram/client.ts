import * as z from "zod";
import type { ChatNotifier, FileUrlResolver } from "../documentIngestion.js";
import type { FetchLike } from "../core/services/backendApi.js";
import type { InlineKeyboard, OutboundMessage } from "../messages.js";
import type { UpdateContext } from "./updates.js";
import { RemoteUnavailableError, describeError } from "../core/errors.js";
import { logError } from "../core/helpers/logging.js";

export type TelegramClientOptions = {
  botToken: string;
  apiBaseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
};

const ApiResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  result: z.unknown().optional(),
});

const FileResultSchema = z.object({
  file_path: z.string().min(1),
});

function toReplyMarkup(keyboard: InlineKeyboard | undefined) {
  if (!keyboard) return undefined;
  return {
    inline_keyboard: keyboard.map((row) => row.map((b) => ({ text: b.text, callback_data: b.callbackData }))),
  };
}

/**
 * Thin Telegram Bot API client: delivers a turn's replies and follow-ups, and resolves file URLs.
 */
export class TelegramClient implements FileUrlResolver, ChatNotifier {
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: TelegramClientOptions) {
    this.apiBaseUrl = (options.apiBaseUrl ?? "https://api.telegram.org").replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async call(method: string, body: Record<string, unknown>): Promise<unknown> {
    const url = `${this.apiBaseUrl}/bot${this.options.botToken}/${method}`;
    let payload: unknown;
    try {
      const response = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      payload = await response.json();
    } catch (error) {
      throw new RemoteUnavailableError("telegram", `${method} failed: ${describeError(error)}`, { cause: error });
    }
    const parsed = ApiResponseSchema.safeParse(payload);
    if (!parsed.success || !parsed.data.ok) {
      const reason = parsed.success ? parsed.data.description ?? "not ok" : "malformed response";
      throw new RemoteUnavailableError("telegram", `${method} failed: ${reason}`);
    }
    return parsed.data.result;
  }

  async resolveFileUrl(fileId: string): Promise<string> {
    const result = FileResultSchema.parse(await this.call("getFile", { file_id: fileId }));
    if (result.file_path.startsWith("http")) return result.file_path;
    return `${this.apiBaseUrl}/file/bot${this.options.botToken}/${result.file_path}`;
  }

  /**
   * Send replies in order. A callback query is always answered once, even when
   * the turn produced no explicit answer.
   */
  async deliver(context: UpdateContext, replies: OutboundMessage[]): Promise<void> {
    let answered = false;
    for (const message of replies) {
      try {
        answered = (await this.deliverOne(context, message)) || answered;
      } catch (error) {
        logError("telegram", error, context.chatId);
      }
    }
    if (context.callbackQueryId && !answered) {
      await this.call("answerCallbackQuery", { callback_query_id: context.callbackQueryId });
    }
  }

  /** Messages sent outside a turn; there is no message to edit or query to answer. */
  async notify(sessionKey: string, messages: OutboundMessage[]): Promise<void> {
    await this.deliver({ chatId: sessionKey, messageId: null, callbackQueryId: null }, messages);
  }

  private async deliverOne(context: UpdateContext, message: OutboundMessage): Promise<boolean> {
    switch (message.kind) {
      case "callback_answer":
        if (!context.callbackQueryId) return false;
        await this.call("answerCallbackQuery", {
          callback_query_id: context.callbackQueryId,
          text: message.text,
          show_alert: message.showAlert ?? false,
        });
        return true;
      case "edit":
        if (context.messageId !== null && context.callbackQueryId) {
          await this.call("editMessageText", {
            chat_id: context.chatId,
            message_id: context.messageId,
            text: message.text,
            parse_mode: message.parseMode,
            reply_markup: toReplyMarkup(message.keyboard),
            disable_web_page_preview: true,
          });
          return false;
        }
        await this.send(context.chatId, message.text, message.parseMode, message.keyboard);
        return false;
      case "send":
        await this.send(context.chatId, message.text, message.parseMode, message.keyboard);
        return false;
    }
  }

  private async send(chatId: string, text: string, parseMode: string | undefined, keyboard: InlineKeyboard | undefined): Promise<void> {
    await this.call("sendMessage", {
      chat_id: chatId,
      text,
      parse_mode: parseMode,
      reply_markup: toReplyMarkup(keyboard),
      disable_web_page_preview: true,
    });
  }
}
