import type { Profile } from "./state.js";
import { CALLBACK } from "./actions.js";
import { button, type DeliveryMode, type InlineKeyboard, type OutboundMessage } from "./messages.js";
import { formatDate, formatPregnancyStage } from "./core/helpers/dates.js";
import { escapeMarkdown } from "./core/helpers/text.js";
import { configString } from "./core/config/messaging.js";

export type DashboardInput = {
  activeProfile: Profile;
  profiles: Profile[];
  switchPanelVisible: boolean;
  chatId?: string | null;
  now?: Date;
};

export type DashboardView = {
  lines: string[];
  text: string;
  keyboard: InlineKeyboard;
};

export function buildDashboardKeyboard(profiles: Profile[], activeId: string | null, showSwitchPanel: boolean): InlineKeyboard {
  const rows: InlineKeyboard = [
    [button("📄 Health Reports", CALLBACK.summary)],
    [button("🔁 Switch Profiles", CALLBACK.openSwitch)],
    [button("📎 Upload Documents", CALLBACK.uploadHint)],
    [button("🆕 Register Another Mother", CALLBACK.registerAnother)],
  ];
  if (!showSwitchPanel) return rows;

  rows.push([button("❌ Hide Profiles", CALLBACK.closeSwitch)]);
  for (const profile of profiles) {
    if (!profile.id || profile.id === activeId) continue;
    rows.push([button(`👩 ${profile.name || "Mother"}`, `${CALLBACK.switchPrefix}${profile.id}`)]);
  }
  return rows;
}

/**
 * Home view for the active profile. Pure: the same input always yields the same view.
 */
export function renderDashboard(input: DashboardInput): DashboardView {
  const { activeProfile, profiles, switchPanelVisible, chatId, now } = input;
  const name = escapeMarkdown(activeProfile.name || "Mother");
  const location = escapeMarkdown(activeProfile.location || "Not set");
  const pregnancy = formatPregnancyStage(activeProfile.due_date, now);

  const lines = [
    `👋 *Welcome back, ${name}!*`,
    "",
    chatId ? `🆔 *Telegram Chat ID:* \`${chatId}\`` : null,
    `👩‍🍼 *Active Profile:* ${name}`,
    `📍 *Location:* ${location}`,
    `📅 *Due Date:* ${escapeMarkdown(formatDate(activeProfile.due_date))}`,
    pregnancy ? `🤰 *Pregnancy:* ${pregnancy}` : null,
    "",
    configString(
      "dashboard.hint",
      "Use the buttons below to view your health summary, upload documents, or switch between registered mothers."
    ),
  ].filter((line): line is string => line !== null);

  const listed = profiles.length ? profiles : [activeProfile];
  return {
    lines,
    text: lines.join("\n"),
    keyboard: buildDashboardKeyboard(listed, activeProfile.id, switchPanelVisible),
  };
}

export function dashboardMessage(view: DashboardView, mode: DeliveryMode): OutboundMessage {
  return { kind: mode, text: view.text, parseMode: "Markdown", keyboard: view.keyboard };
}

export function welcomeMessage(chatId: string): OutboundMessage {
  const text = [
    configString("welcome.title", "👋 Welcome to your maternal health assistant!"),
    "",
    "It looks like you haven't registered yet.",
    "",
    `🆔 Your Telegram Chat ID: \`${chatId}\``,
    "",
    "Tap the button below to register as a new mother or use /register.",
  ].join("\n");
  return {
    kind: "send",
    text,
    parseMode: "Markdown",
    keyboard: [[button("🆕 Register Mother", CALLBACK.registerNew)]],
  };
}
