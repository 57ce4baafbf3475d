// herocore/config/logconfig.ts

export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

export function parseLevel(raw: string | undefined | null): LogLevel | null {
  if (!raw) return null;
  const v = raw.toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") {
    return v;
  }
  return null;
}

// Per-scope defaults (can be overridden by env per scope)
const PER_SCOPE_DEFAULTS: Record<string, LogLevel> = {
  SERVER: "info",
  HERO: "info",
  PROGRESSION: "info",
  DISPATCH: "info",
  FEED: "info",
  SESSION: "info",
  SAVE: "info",
  DB: "info",
};

// Env is read on every call so LOG_LEVEL / LOG_SCOPE_<X> can be changed at
// runtime (tests flip them per case).
function getScopeLevel(scope: string): LogLevel {
  const key = scope.toUpperCase();

  const fromEnv = parseLevel(process.env[`LOG_SCOPE_${key}`]);
  if (fromEnv) return fromEnv;

  const fromGlobal = parseLevel(process.env.LOG_LEVEL);
  if (fromGlobal) return fromGlobal;

  return PER_SCOPE_DEFAULTS[key] ?? "info";
}

export function logEnabled(scope: string, level: LogLevel): boolean {
  const wantedIdx = ORDER.indexOf(getScopeLevel(scope));
  const levelIdx = ORDER.indexOf(level);
  return levelIdx >= wantedIdx;
}
