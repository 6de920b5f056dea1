const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

/** Escape text for Telegram's HTML parse mode. */
export function escapeHtml(value: unknown): string {
  return String(value ?? "").replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** Escape the characters legacy Markdown treats as entity delimiters. */
export function escapeMarkdown(value: string): string {
  return value.replace(/([_*`[])/g, "\\$1");
}

export function isSkipToken(text: string): boolean {
  return text.trim().toLowerCase() === "skip";
}
