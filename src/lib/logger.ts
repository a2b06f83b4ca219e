type LogContext = Record<string, unknown>;
type Level = "debug" | "info" | "warn" | "error";

function debugEnabled(): boolean {
  return process.env.LOG_LEVEL === "debug";
}

function emit(level: Level, msg: string, context?: LogContext) {
  if (level === "debug" && !debugEnabled()) return;
  const entry = { level, msg, ts: new Date().toISOString(), ...context };
  const line = JSON.stringify(entry);
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export const log = {
  debug: (msg: string, context?: LogContext) => emit("debug", msg, context),
  info: (msg: string, context?: LogContext) => emit("info", msg, context),
  warn: (msg: string, context?: LogContext) => emit("warn", msg, context),
  error: (msg: string, context?: LogContext) => emit("error", msg, context),
};
