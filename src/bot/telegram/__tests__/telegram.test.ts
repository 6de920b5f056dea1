import { jest } from "@jest/globals";
import { TelegramClient } from "../client.js";
import { TelegramUpdateSchema, parseTelegramUpdate } from "../updates.js";
import { verifyWebhookSecret } from "../webhook.js";
import type { FetchLike } from "../../core/services/backendApi.js";
import { answerCallback, button, reply } from "../../messages.js";

function okResponse(result: unknown = true): Response {
  return new Response(JSON.stringify({ ok: true, result }), { status: 200 });
}

function setup() {
  const fetchImpl = jest.fn<FetchLike>(async () => okResponse());
  const client = new TelegramClient({ botToken: "test-token", fetchImpl });
  const calls = () =>
    fetchImpl.mock.calls.map(([url, init]) => ({
      method: url.split("/").pop(),
      body: JSON.parse(String(init?.body)),
    }));
  return { fetchImpl, client, calls };
}

describe("parseTelegramUpdate", () => {
  const chat = { id: 42 };

  it("maps slash text to a command and other text to text", () => {
    const command = TelegramUpdateSchema.parse({ update_id: 1, message: { message_id: 5, chat, text: "/start" } });
    expect(parseTelegramUpdate(command)).toEqual({
      context: { chatId: "42", messageId: 5, callbackQueryId: null },
      event: { kind: "command", command: "/start" },
    });

    const text = TelegramUpdateSchema.parse({ update_id: 2, message: { message_id: 6, chat, text: " Asha " } });
    expect(parseTelegramUpdate(text)?.event).toEqual({ kind: "text", text: "Asha" });
  });

  it("maps callback queries with the originating message", () => {
    const update = TelegramUpdateSchema.parse({
      update_id: 3,
      callback_query: { id: "cb-1", data: "action_summary", message: { message_id: 9, chat } },
    });
    expect(parseTelegramUpdate(update)).toEqual({
      context: { chatId: "42", messageId: 9, callbackQueryId: "cb-1" },
      event: { kind: "callback", data: "action_summary" },
    });
  });

  it("maps documents and photos to attachments", () => {
    const document = TelegramUpdateSchema.parse({
      update_id: 4,
      message: { message_id: 10, chat, document: { file_id: "doc-1", file_name: "scan.pdf" } },
    });
    expect(parseTelegramUpdate(document)?.event).toEqual({
      kind: "attachment",
      attachment: { kind: "document", fileId: "doc-1", fileName: "scan.pdf" },
    });

    const photo = TelegramUpdateSchema.parse({
      update_id: 5,
      message: { message_id: 11, chat, photo: [{ file_id: "p-1", file_size: 10 }, { file_id: "p-2" }] },
    });
    expect(parseTelegramUpdate(photo)?.event).toEqual({
      kind: "attachment",
      attachment: {
        kind: "photo",
        variants: [
          { fileId: "p-1", fileSize: 10 },
          { fileId: "p-2", fileSize: null },
        ],
      },
    });
  });

  it("keeps a photo message with no sizes as an attachment", () => {
    const photo = TelegramUpdateSchema.parse({ update_id: 8, message: { message_id: 12, chat, photo: [] } });
    expect(parseTelegramUpdate(photo)).toEqual({
      context: { chatId: "42", messageId: 12, callbackQueryId: null },
      event: { kind: "attachment", attachment: { kind: "photo", variants: [] } },
    });
  });

  it("skips updates without anything to handle", () => {
    expect(parseTelegramUpdate(TelegramUpdateSchema.parse({ update_id: 6 }))).toBeNull();
    expect(parseTelegramUpdate(TelegramUpdateSchema.parse({ update_id: 7, message: { message_id: 1, chat, text: "  " } }))).toBeNull();
  });
});

describe("verifyWebhookSecret", () => {
  it("accepts everything without a configured secret", () => {
    expect(verifyWebhookSecret(null, undefined)).toBe(true);
  });

  it("compares the header with the secret", () => {
    expect(verifyWebhookSecret("test-secret", "test-secret")).toBe(true);
    expect(verifyWebhookSecret("test-secret", "test-secreT")).toBe(false);
    expect(verifyWebhookSecret("test-secret", "short")).toBe(false);
    expect(verifyWebhookSecret("test-secret", "test-secret-and-more")).toBe(false);
    expect(verifyWebhookSecret("test-secret", undefined)).toBe(false);
  });
});

describe("TelegramClient", () => {
  const callbackContext = { chatId: "42", messageId: 7, callbackQueryId: "cb-1" };

  it("answers the callback and edits the originating message", async () => {
    const { client, calls } = setup();
    await client.deliver(callbackContext, [
      answerCallback("Hiding switch panel."),
      { kind: "edit", text: "Dashboard", parseMode: "Markdown", keyboard: [[button("📄 Health Reports", "action_summary")]] },
    ]);

    expect(calls()).toEqual([
      {
        method: "answerCallbackQuery",
        body: { callback_query_id: "cb-1", text: "Hiding switch panel.", show_alert: false },
      },
      {
        method: "editMessageText",
        body: {
          chat_id: "42",
          message_id: 7,
          text: "Dashboard",
          parse_mode: "Markdown",
          reply_markup: { inline_keyboard: [[{ text: "📄 Health Reports", callback_data: "action_summary" }]] },
          disable_web_page_preview: true,
        },
      },
    ]);
  });

  it("answers a callback the turn left unanswered", async () => {
    const { client, calls } = setup();
    await client.deliver(callbackContext, [reply("Finish registration first or send /cancel.")]);

    expect(calls()).toEqual([
      {
        method: "sendMessage",
        body: { chat_id: "42", text: "Finish registration first or send /cancel.", disable_web_page_preview: true },
      },
      { method: "answerCallbackQuery", body: { callback_query_id: "cb-1" } },
    ]);
  });

  it("sends an edit as a new message outside a callback", async () => {
    const { client, calls } = setup();
    await client.deliver({ chatId: "42", messageId: 3, callbackQueryId: null }, [{ kind: "edit", text: "Dashboard" }]);
    expect(calls()).toEqual([{ method: "sendMessage", body: { chat_id: "42", text: "Dashboard", disable_web_page_preview: true } }]);
  });

  it("keeps delivering after a failed message", async () => {
    const { client, fetchImpl, calls } = setup();
    jest.spyOn(console, "error").mockImplementation(() => undefined);
    fetchImpl.mockResolvedValueOnce(new Response(JSON.stringify({ ok: false, description: "Bad Request" }), { status: 400 }));

    await client.deliver({ chatId: "42", messageId: null, callbackQueryId: null }, [reply("first"), reply("second")]);

    expect(calls().map((call) => call.body.text)).toEqual(["first", "second"]);
  });

  it("sends follow-up messages as plain sends to the chat", async () => {
    const { client, calls } = setup();
    await client.notify("42", [reply("Analysis done", { parseMode: "Markdown" }), { kind: "edit", text: "Dashboard" }]);

    expect(calls()).toEqual([
      { method: "sendMessage", body: { chat_id: "42", text: "Analysis done", parse_mode: "Markdown", disable_web_page_preview: true } },
      { method: "sendMessage", body: { chat_id: "42", text: "Dashboard", disable_web_page_preview: true } },
    ]);
  });

  it("resolves a download URL for a file id", async () => {
    const { client, fetchImpl } = setup();
    fetchImpl.mockResolvedValueOnce(okResponse({ file_id: "doc-1", file_path: "documents/file_1.pdf" }));

    await expect(client.resolveFileUrl("doc-1")).resolves.toBe(
      "https://api.telegram.org/file/bottest-token/documents/file_1.pdf"
    );
    expect(fetchImpl.mock.calls[0]?.[0]).toBe("https://api.telegram.org/bottest-token/getFile");
  });
});
