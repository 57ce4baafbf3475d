// herocore/progression/XpRewards.ts

import { Config } from "../config/config";
import {
  type GameEvent,
  type GameEventFeed,
  userIdArg,
} from "../dispatch/GameEventFeed";
import type { PlayerRegistry } from "../players/PlayerRegistry";

export interface KillXpConfig {
  killXp: number;
  headshotXp: number;
}

export function defaultKillXpConfig(): KillXpConfig {
  return { killXp: Config.KILL_XP, headshotXp: Config.HEADSHOT_XP };
}

/**
 * XP for a player_death event, or 0 when it does not earn any (no attacker,
 * suicide).
 */
export function killXpFor(event: GameEvent, cfg: KillXpConfig): number {
  const attackerId = userIdArg(event.args, "attacker");
  if (attackerId === null || attackerId === userIdArg(event.args, "userid")) {
    return 0;
  }
  return event.args.headshot ? cfg.headshotXp : cfg.killXp;
}

/** Award the killer's active hero XP on every player_death. */
export function attachKillXp(
  feed: GameEventFeed,
  players: PlayerRegistry,
  cfg: KillXpConfig = defaultKillXpConfig(),
): () => void {
  return feed.on("player_death", (event) => {
    const amount = killXpFor(event, cfg);
    if (amount <= 0) return;

    const attackerId = userIdArg(event.args, "attacker");
    const hero = attackerId === null ? null : players.get(attackerId)?.hero;
    if (!hero) return;

    hero.xp += amount;
  });
}
