const DAY_MS = 24 * 60 * 60 * 1000;
const WEEK_MS = 7 * DAY_MS;
const GESTATION_WEEKS = 40;
const MAX_WEEKS = 42;

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

// Date-only values parse as UTC midnight.
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}([T ][0-9:.]+(Z|[+-]\d{2}:?\d{2})?)?$/;

export function parseIsoDate(value: string | null | undefined): Date | null {
  if (!value) return null;
  const text = value.trim();
  if (!ISO_DATE_PATTERN.test(text)) return null;
  const ms = Date.parse(text.replace(" ", "T"));
  return Number.isNaN(ms) ? null : new Date(ms);
}

/** "05 Jan 2024"; "N/A" when absent; the first ten characters when unparseable. */
export function formatDate(value: string | null | undefined): string {
  if (!value) return "N/A";
  const date = parseIsoDate(value);
  if (!date) return value.slice(0, 10);
  const day = String(date.getUTCDate()).padStart(2, "0");
  return `${day} ${MONTHS[date.getUTCMonth()]} ${date.getUTCFullYear()}`;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export type PregnancyStage = {
  weeks: number;
  month: number;
};

/**
 * Weeks since conception (due date minus 40 weeks) and the derived month.
 * Null when the due date is missing, unparseable, or more than 40 weeks past.
 */
export function computePregnancyStage(dueDate: string | null | undefined, now: Date = new Date()): PregnancyStage | null {
  const due = parseIsoDate(dueDate);
  if (!due) return null;
  if (now.getTime() - due.getTime() > GESTATION_WEEKS * WEEK_MS) return null;
  const conception = due.getTime() - GESTATION_WEEKS * WEEK_MS;
  const weeks = clamp(Math.floor((now.getTime() - conception) / WEEK_MS), 0, MAX_WEEKS);
  const month = clamp(Math.floor(weeks / 4) || 1, 1, 10);
  return { weeks, month };
}

export function formatPregnancyStage(dueDate: string | null | undefined, now: Date = new Date()): string | null {
  const stage = computePregnancyStage(dueDate, now);
  return stage ? `Week ${stage.weeks} (Month ${stage.month})` : null;
}
