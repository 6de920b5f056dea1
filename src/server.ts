import express, { Request, Response } from "express";
import cors from "cors";
import dotenv from "dotenv";
import { resolveAppConfig } from "./config/appConfig.js";
import { loadFlowDsl } from "./bot/schema/flowLoader.js";
import { setBotMessagingConfig } from "./bot/core/config/messaging.js";
import { createSupabaseBot } from "./bot/bot.js";
import { TelegramClient } from "./bot/telegram/client.js";
import { TelegramUpdateSchema, parseTelegramUpdate } from "./bot/telegram/updates.js";
import { SECRET_HEADER, verifyWebhookSecret } from "./bot/telegram/webhook.js";
import { log, logError } from "./bot/core/helpers/logging.js";

dotenv.config();

const appConfig = resolveAppConfig();
const flow = loadFlowDsl(appConfig.flowPath);
setBotMessagingConfig(flow.config);

if (!appConfig.telegram.botToken) {
  throw new Error("TELEGRAM_BOT_TOKEN is not set.");
}

const telegram = new TelegramClient({
  botToken: appConfig.telegram.botToken,
  apiBaseUrl: appConfig.telegram.apiBaseUrl,
});
const bot = createSupabaseBot(appConfig, telegram);

const app = express();

app.use(cors());
app.use(express.json());

// Telegram retries anything but a 2xx, so handled failures still answer 200.
app.post("/telegram/webhook", async (req: Request, res: Response) => {
  if (!verifyWebhookSecret(appConfig.telegram.webhookSecret, req.get(SECRET_HEADER))) {
    return res.status(401).json({ error: "Unauthorized" });
  }

  const update = TelegramUpdateSchema.safeParse(req.body);
  if (!update.success) {
    log({ level: "warn", component: "server", message: "Ignoring malformed update" });
    return res.json({ ok: true });
  }

  const parsed = parseTelegramUpdate(update.data);
  if (!parsed) {
    return res.json({ ok: true });
  }

  try {
    const turn = await bot.handleEvent(parsed.context.chatId, parsed.event);
    await telegram.deliver(parsed.context, turn.replies);
  } catch (error) {
    logError("server", error, parsed.context.chatId);
  }
  return res.json({ ok: true });
});

app.get("/test", (_req: Request, res: Response) => {
  res.json({ status: "Server is running", flowId: flow.flow.flowId, sessions: bot.sessions.size });
});

app.listen(appConfig.port, () => {
  log({ level: "info", component: "server", message: `Server running at http://localhost:${appConfig.port}` });
  log({ level: "info", component: "server", message: `Telegram webhook at http://localhost:${appConfig.port}/telegram/webhook` });
});
