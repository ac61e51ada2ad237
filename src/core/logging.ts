type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function currentLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? "").trim().toLowerCase();
  return raw === "debug" || raw === "info" || raw === "warn" || raw === "error"
    ? raw
    : "info";
}

// stdout is left to the caller (report output); diagnostics go to stderr.
function write(level: LogLevel, message: string, args: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel()]) return;
  console.error(`[${level.toUpperCase()}] ${message}`, ...args);
}

export function logDebug(message: string, ...args: unknown[]): void {
  write("debug", message, args);
}

export function logInfo(message: string, ...args: unknown[]): void {
  write("info", message, args);
}

export function logWarn(message: string, ...args: unknown[]): void {
  write("warn", message, args);
}

export function logError(message: string, ...args: unknown[]): void {
  write("error", message, args);
}

export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
