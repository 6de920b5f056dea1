const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Whole-number parse of trimmed text; null when the text is not an integer. */
export function parseIntegerField(raw: string): number | null {
  const text = raw.trim();
  if (!INTEGER_PATTERN.test(text)) return null;
  const value = Number.parseInt(text, 10);
  return Number.isSafeInteger(value) ? value : null;
}

/** Decimal parse of trimmed text; null for anything else, including NaN and Infinity. */
export function parseFloatField(raw: string): number | null {
  const text = raw.trim();
  if (!FLOAT_PATTERN.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

/** File extension in lower case, or "unknown" when the name has none. */
export function fileExtension(fileName: string): string {
  const dot = fileName.lastIndexOf(".");
  if (dot < 0) return "unknown";
  return fileName.slice(dot + 1).toLowerCase();
}
