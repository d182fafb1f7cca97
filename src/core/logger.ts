export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function resolveMinLevel(): LogLevel {
  const raw = (process.env.CHATGATE_LOG_LEVEL ?? "").trim().toLowerCase();
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") {
    return raw;
  }
  return "info";
}

export class Logger {
  private readonly minLevel: LogLevel;

  constructor(private readonly scope: string, minLevel?: LogLevel) {
    this.minLevel = minLevel ?? resolveMinLevel();
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) {
      return;
    }
    const payload = {
      ts: new Date().toISOString(),
      level: level.toUpperCase(),
      scope: this.scope,
      message,
      ...(data ?? {})
    };
    process.stdout.write(`${JSON.stringify(payload)}\n`);
  }
}
