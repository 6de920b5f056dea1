import * as z from "zod";
import type { InboundEvent } from "../actions.js";

// Minimal subset of the Telegram Update object the bot reads.
const ChatSchema = z.object({ id: z.union([z.number(), z.string()]) });

const PhotoSizeSchema = z.object({
  file_id: z.string(),
  file_size: z.number().optional(),
});

const DocumentSchema = z.object({
  file_id: z.string(),
  file_name: z.string().optional(),
});

const MessageSchema = z.object({
  message_id: z.number(),
  chat: ChatSchema,
  text: z.string().optional(),
  document: DocumentSchema.optional(),
  photo: z.array(PhotoSizeSchema).optional(),
});

const CallbackQuerySchema = z.object({
  id: z.string(),
  data: z.string().optional(),
  message: MessageSchema.optional(),
});

export const TelegramUpdateSchema = z.object({
  update_id: z.number(),
  message: MessageSchema.optional(),
  callback_query: CallbackQuerySchema.optional(),
});
export type TelegramUpdate = z.infer<typeof TelegramUpdateSchema>;

/** Where replies for an update go. */
export type UpdateContext = {
  chatId: string;
  messageId: number | null;
  callbackQueryId: string | null;
};

export type ParsedUpdate = {
  context: UpdateContext;
  event: InboundEvent;
};

/** Convert a Telegram update into the bot's inbound event; null when it carries nothing the bot handles. */
export function parseTelegramUpdate(update: TelegramUpdate): ParsedUpdate | null {
  const query = update.callback_query;
  if (query) {
    if (!query.message || !query.data) return null;
    return {
      context: { chatId: String(query.message.chat.id), messageId: query.message.message_id, callbackQueryId: query.id },
      event: { kind: "callback", data: query.data },
    };
  }

  const message = update.message;
  if (!message) return null;
  const context: UpdateContext = { chatId: String(message.chat.id), messageId: message.message_id, callbackQueryId: null };

  if (message.document) {
    return {
      context,
      event: { kind: "attachment", attachment: { kind: "document", fileId: message.document.file_id, fileName: message.document.file_name ?? null } },
    };
  }
  // An empty size list still counts as a photo; ingestion answers it with a prompt.
  if (message.photo) {
    const variants = message.photo.map((size) => ({ fileId: size.file_id, fileSize: size.file_size ?? null }));
    return { context, event: { kind: "attachment", attachment: { kind: "photo", variants } } };
  }

  const text = message.text?.trim();
  if (!text) return null;
  if (text.startsWith("/")) return { context, event: { kind: "command", command: text } };
  return { context, event: { kind: "text", text } };
}
