import type { Profile, UploadRecord } from "./state.js";
import type { SummaryPayload } from "./core/services/backendApi.js";
import type { UploadStore } from "./core/services/reports.js";
import { escapeHtml } from "./core/helpers/text.js";
import { formatDate, formatPregnancyStage } from "./core/helpers/dates.js";
import { log, logError } from "./core/helpers/logging.js";

export const SUMMARY_LIMITS = {
  timelineEvents: 5,
  memories: 5,
  reports: 5,
  recommendations: 5,
  risks: 5,
} as const;

export interface SummarySource {
  fetchSummary(profileId: string): Promise<SummaryPayload>;
}

export const SUMMARY_UNAVAILABLE_NOTICE = "⚠️ Unable to fetch latest summary right now. Please try again later.";
export const SUMMARY_CLOSING = "💬 Ask me anything for personalized guidance based on these records.";

function firstText(record: Record<string, unknown>, keys: string[]): string | null {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value) return value;
  }
  return null;
}

function asList(value: unknown, limit: number): string[] {
  if (value === null || value === undefined || value === "" || value === false) return [];
  const items = Array.isArray(value) ? value.slice(0, limit) : [value];
  return items.map(displayText).filter((item) => item !== "");
}

/** Text for a loosely typed backend value; objects render as JSON. */
export function displayText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function section(title: string, bullets: string[]): string[] {
  if (!bullets.length) return [];
  return [`<b>${title}</b>`, ...bullets, ""];
}

export function headerLines(profile: Profile, now?: Date): string[] {
  const lines = [
    `<b>📊 Health Summary for ${escapeHtml(profile.name || "Mother")}</b>`,
    `<b>🆔 Mother ID:</b> <code>${escapeHtml(profile.id)}</code>`,
  ];
  const pregnancy = formatPregnancyStage(profile.due_date, now);
  if (pregnancy) lines.push(`<b>🤰 Pregnancy:</b> ${escapeHtml(pregnancy)}`);
  if (profile.due_date) lines.push(`<b>📅 Due Date:</b> ${escapeHtml(formatDate(profile.due_date))}`);
  if (profile.location) lines.push(`<b>📍 Location:</b> ${escapeHtml(profile.location)}`);
  lines.push("");
  return lines;
}

export function timelineLines(payload: SummaryPayload): string[] {
  const bullets = payload.recent_timeline.slice(0, SUMMARY_LIMITS.timelineEvents).map((event) => {
    const date = formatDate(firstText(event, ["event_date", "date", "created_at"]));
    const text = firstText(event, ["summary", "event_summary"]) ?? "Update";
    return `• ${escapeHtml(date)}: ${escapeHtml(text)}`;
  });
  return section("🗂 Key Timeline Events:", bullets);
}

export function memoryLines(payload: SummaryPayload): string[] {
  const bullets = payload.key_memories.slice(0, SUMMARY_LIMITS.memories).map((memory) => {
    const key = memory.memory_key ?? "Note";
    const value = memory.memory_value ?? "";
    return `• ${escapeHtml(key)}: ${escapeHtml(value)}`;
  });
  return section("🧠 Important Notes:", bullets);
}

export function uploadLines(reports: UploadRecord[]): string[] {
  const bullets: string[] = [];
  for (const report of reports.slice(0, SUMMARY_LIMITS.reports)) {
    const title = report.file_name || "Document";
    const uploadedAt = formatDate(report.uploaded_at ?? report.created_at);
    bullets.push(`• ${escapeHtml(uploadedAt)} — ${escapeHtml(title)}`);
    const analysis = displayText(report.analysis_summary);
    if (analysis) {
      bullets.push(`  ↳ ${escapeHtml(analysis)}`);
    }
  }
  return section("📎 Uploaded Documents:", bullets);
}

export function overviewLines(payload: SummaryPayload): string[] {
  const overview = payload.summary;
  if (!overview) return [];
  const recommendations = asList(overview.recommendations, SUMMARY_LIMITS.recommendations);
  // An empty risk_flags list falls through to risks.
  const flags = asList(overview.risk_flags, SUMMARY_LIMITS.risks);
  const risks = flags.length ? flags : asList(overview.risks, SUMMARY_LIMITS.risks);
  return [
    ...section("✅ Recommendations:", recommendations.map((rec) => `• ${escapeHtml(rec)}`)),
    ...section("⚠️ Risks / Alerts:", risks.map((risk) => `• ${escapeHtml(risk)}`)),
  ];
}

/**
 * Builds the health summary for one profile. The remote summary and the stored
 * uploads are fetched independently; a failing source drops only its own sections.
 */
export class SummaryAggregator {
  constructor(
    private readonly summaries: SummarySource,
    private readonly uploads: UploadStore
  ) {}

  async buildReport(profile: Profile, options: { sessionId?: string; now?: Date } = {}): Promise<string> {
    const { sessionId, now } = options;
    const [remote, reports] = await Promise.allSettled([
      this.summaries.fetchSummary(profile.id),
      this.uploads.listRecentUploads(profile.id, SUMMARY_LIMITS.reports),
    ]);

    const lines = headerLines(profile, now);

    if (remote.status === "rejected") {
      logError("summary", remote.reason, sessionId);
      lines.push(SUMMARY_UNAVAILABLE_NOTICE, "");
    } else {
      lines.push(...timelineLines(remote.value), ...memoryLines(remote.value));
    }

    if (reports.status === "fulfilled") {
      lines.push(...uploadLines(reports.value));
    } else {
      logError("summary", reports.reason, sessionId);
    }

    if (remote.status === "fulfilled") {
      lines.push(...overviewLines(remote.value), SUMMARY_CLOSING);
    }

    log({ level: "info", component: "summary", message: `Summary built (remote=${remote.status}, uploads=${reports.status})`, sessionId });
    return trimTrailingBlank(lines).join("\n");
  }
}

function trimTrailingBlank(lines: string[]): string[] {
  const out = [...lines];
  while (out.length && out[out.length - 1] === "") out.pop();
  return out;
}
