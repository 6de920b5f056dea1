export type LogLevel = "info" | "warn" | "error" | "trace";

interface LogEntry {
  level: LogLevel;
  component?: string;
  message: string;
  durationMs?: number;
  sessionId?: string;
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

export function formatEntry(entry: LogEntry): string {
  const parts = [`[${formatTimestamp()}]`, `[${entry.level.toUpperCase()}]`];

  if (entry.sessionId) {
    parts.push(`[session:${entry.sessionId}]`);
  }

  if (entry.component) {
    parts.push(`[${entry.component}]`);
  }

  parts.push(entry.message);

  if (entry.durationMs !== undefined) {
    parts.push(`(${entry.durationMs}ms)`);
  }

  return parts.join(" ");
}

export function log(entry: LogEntry): void {
  if (entry.level === "trace" && process.env.LOG_TRACE !== "1") return;
  const formatted = formatEntry(entry);

  switch (entry.level) {
    case "error":
      console.error(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

export function logError(component: string, error: unknown, sessionId?: string): void {
  const message = error instanceof Error ? `${error.name}: ${error.message}` : "Unknown error";
  log({ level: "error", component, message, sessionId });
}

export function logTiming(component: string, message: string, startTime: number, sessionId?: string): void {
  log({ level: "info", component, message, durationMs: Date.now() - startTime, sessionId });
}
