// game-backend/config.ts

import { Config } from "../herocore/config/config";

export interface BackendConfig {
  /** "postgres" in production; "memory" for local runs without a database. */
  store: "postgres" | "memory";
  saveIntervalMs: number;
  /** Create the progression tables on boot. */
  ensureSchema: boolean;
  /** Mirror console output to this file when set. */
  logFile: string | null;
}

export const backendConfig: BackendConfig = {
  store: process.env.HC_STORE === "memory" ? "memory" : "postgres",
  saveIntervalMs: Config.SAVE_INTERVAL_MS,
  ensureSchema: process.env.HC_DB_ENSURE_SCHEMA !== "false",
  logFile: process.env.HC_LOG_FILE || null,
};
