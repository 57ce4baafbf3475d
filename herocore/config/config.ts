// herocore/config/config.ts

import dotenv from "dotenv";

// Load .env into process.env before anything below reads it.
dotenv.config();

function numberFromEnv(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

// XP rewards feed giveXp(), which only takes whole non-negative amounts.
function xpFromEnv(raw: string | undefined, fallback: number): number {
  const n = numberFromEnv(raw, fallback);
  return Number.isInteger(n) && n >= 0 ? n : fallback;
}

function teamsFromEnv(raw: string | undefined, fallback: number[]): number[] {
  if (!raw) return fallback;
  const teams = raw
    .split(",")
    .map((t) => Number(t.trim()))
    .filter((t) => Number.isInteger(t));
  return teams.length > 0 ? teams : fallback;
}

export const Config = {
  // XP quota curve: quota(level) = XP_QUOTA_BASE + XP_QUOTA_PER_LEVEL * level
  XP_QUOTA_BASE: 80,
  XP_QUOTA_PER_LEVEL: 15,

  KILL_XP: xpFromEnv(process.env.HC_KILL_XP, 30),
  HEADSHOT_XP: xpFromEnv(process.env.HC_HEADSHOT_XP, 45),

  // Periodic flush of every connected player's progress (4 minutes)
  SAVE_INTERVAL_MS: numberFromEnv(process.env.HC_SAVE_INTERVAL_MS, 240_000),

  // Teams whose members get single-subject skill dispatch (spectators don't)
  ACTIVE_TEAMS: teamsFromEnv(process.env.HC_ACTIVE_TEAMS, [2, 3]),
};

export type HeroCoreConfig = typeof Config;
