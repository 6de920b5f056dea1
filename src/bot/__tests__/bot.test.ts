import { jest } from "@jest/globals";
import { buildBot } from "../bot.js";
import { resolveAppConfig } from "../../config/appConfig.js";
import type { FetchLike } from "../core/services/backendApi.js";
import type { ProfileStore } from "../core/services/profileDirectory.js";
import { clearBotMessagingConfig } from "../core/config/messaging.js";
import { fakeDirectory, fakeFiles, fakeHistory, fakeNotifier, fakeUploadStore, makeProfile, now } from "./fakes.js";

function setup() {
  const config = resolveAppConfig({ BACKEND_API_BASE_URL: "http://backend.test" });
  const directory = fakeDirectory();
  const profileStore = { insertProfile: jest.fn<ProfileStore["insertProfile"]>() };
  const fetchImpl = jest.fn<FetchLike>();
  const bot = buildBot(config, {
    directory,
    profileStore,
    uploads: fakeUploadStore(),
    history: fakeHistory(),
    files: fakeFiles(),
    notifier: fakeNotifier(),
    fetchImpl,
    now,
  });
  return { bot, directory, profileStore, fetchImpl };
}

beforeEach(() => {
  clearBotMessagingConfig();
});

describe("MaternalCareBot", () => {
  it("welcomes a new chat on /start", async () => {
    const { bot } = setup();
    const turn = await bot.handleEvent("chat-1", { kind: "command", command: "/start" });
    expect(turn.sessionKey).toBe("chat-1");
    expect(turn.replies[0]).toMatchObject({ kind: "send", keyboard: [[{ callbackData: "register_new" }]] });
  });

  it("registers through the fallback store when the backend is down", async () => {
    const { bot, directory, profileStore, fetchImpl } = setup();
    const saved = makeProfile({ id: "m-1", name: "Asha" });
    fetchImpl.mockRejectedValue(new Error("connect ECONNREFUSED"));
    profileStore.insertProfile.mockResolvedValue(saved);
    directory.listProfiles.mockResolvedValue([saved]);

    await bot.handleEvent("chat-1", { kind: "callback", data: "register_new" });
    for (const text of ["Asha", "skip", "skip", "skip", "skip", "skip", "skip", "skip"]) {
      await bot.handleEvent("chat-1", { kind: "text", text });
    }
    const turn = await bot.handleEvent("chat-1", { kind: "callback", data: "lang_hi" });

    expect(fetchImpl.mock.calls[0]?.[0]).toBe("http://backend.test/mothers/register");
    expect(profileStore.insertProfile).toHaveBeenCalledTimes(1);
    expect(profileStore.insertProfile.mock.calls[0]?.[0]).toMatchObject({ name: "Asha", preferred_language: "hi" });
    expect(turn.replies.map((message) => message.kind)).toEqual(["send", "send", "send"]);
    expect(bot.sessions.get("chat-1")?.active_profile_id).toBe("m-1");
  });

  it("handles concurrent events for one chat in arrival order", async () => {
    const { bot } = setup();
    const [begin, name] = await Promise.all([
      bot.handleEvent("chat-1", { kind: "command", command: "/register" }),
      bot.handleEvent("chat-1", { kind: "text", text: "Asha" }),
    ]);
    expect(begin.replies).toEqual([{ kind: "send", text: "Please enter your full name:" }]);
    expect(name.replies).toEqual([{ kind: "send", text: "Please enter your age (or type 'skip')." }]);
  });
});
