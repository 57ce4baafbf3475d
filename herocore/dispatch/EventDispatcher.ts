// herocore/dispatch/EventDispatcher.ts

import { Config } from "../config/config";
import { ConfigurationError } from "../entities/errors";
import type { Player } from "../players/Player";
import type { PlayerRegistry } from "../players/PlayerRegistry";
import { Logger } from "../utils/logger";
import {
  type GameEvent,
  type GameEventFeed,
  omitArgs,
  userIdArg,
} from "./GameEventFeed";

const log = Logger.scope("DISPATCH");

/** Events with one acting player, forwarded under their own name. */
export const SINGLE_SUBJECT_EVENTS: readonly string[] = Object.freeze([
  "player_spawn",
  "player_jump",
  "player_disconnect",
]);

/** [instigator's event name, target's event name] */
export type PerspectiveNames = readonly [instigator: string, target: string];

/**
 * Raw two-player event -> per-perspective skill event names.
 * player_death: the attacker scores a kill, the victim dies.
 * player_hurt:  the attacker attacks, the victim is hit.
 */
export const INTERACTION_EVENT_NAMES: Readonly<Record<string, PerspectiveNames>> =
  Object.freeze({
    player_death: ["player_kill", "player_death"],
    player_hurt: ["player_attack", "player_victim"],
  });

export interface EventDispatcherOptions {
  players: PlayerRegistry;
  /** Teams whose players get single-subject dispatch. */
  activeTeams?: readonly number[];
  singleSubjectEvents?: readonly string[];
  /** Raw two-player events to handle; each needs an entry in `interactionNames`. */
  interactionEvents?: readonly string[];
  interactionNames?: Readonly<Record<string, PerspectiveNames>>;
}

/**
 * Routes raw game events to the active heroes of the players involved.
 *
 * Unresolved players (mid connect/disconnect) are skipped, not errors. A
 * two-player event without a distinct attacker (world damage, suicide) is
 * skipped entirely.
 */
export class EventDispatcher {
  private readonly players: PlayerRegistry;
  private readonly activeTeams: readonly number[];
  private readonly singleSubjectEvents: readonly string[];
  private readonly interactionEvents: readonly string[];
  private readonly interactionNames: Readonly<Record<string, PerspectiveNames>>;

  constructor(opts: EventDispatcherOptions) {
    this.players = opts.players;
    this.activeTeams = opts.activeTeams ?? Config.ACTIVE_TEAMS;
    this.singleSubjectEvents = opts.singleSubjectEvents ?? SINGLE_SUBJECT_EVENTS;
    this.interactionNames = opts.interactionNames ?? INTERACTION_EVENT_NAMES;
    this.interactionEvents =
      opts.interactionEvents ?? Object.keys(this.interactionNames);

    for (const name of this.interactionEvents) {
      if (!Object.prototype.hasOwnProperty.call(this.interactionNames, name)) {
        throw new ConfigurationError(
          `Two-player event "${name}" has no perspective names configured.`
        );
      }
    }
  }

  /** Subscribe to every raw event this dispatcher handles. */
  attach(feed: GameEventFeed): () => void {
    const detachers: Array<() => void> = [];
    for (const name of this.singleSubjectEvents) {
      detachers.push(feed.on(name, (ev) => this.dispatchIndividual(ev)));
    }
    for (const name of this.interactionEvents) {
      detachers.push(feed.on(name, (ev) => this.dispatchInteraction(ev)));
    }
    return () => detachers.forEach((d) => d());
  }

  perspectiveNames(rawName: string): PerspectiveNames {
    if (!Object.prototype.hasOwnProperty.call(this.interactionNames, rawName)) {
      throw new ConfigurationError(`Unmapped two-player event "${rawName}".`);
    }
    return this.interactionNames[rawName];
  }

  /** Returns true when the event reached a hero. */
  dispatchIndividual(event: GameEvent): boolean {
    const player = this.resolve(event, "userid");
    if (!player) return false;

    const hero = player.hero;
    if (!hero) return false;

    if (!this.activeTeams.includes(player.actor.team)) {
      log.debug("Skipping event for inactive team", {
        event: event.name,
        userId: player.userId,
        team: player.actor.team,
      });
      return false;
    }

    const args = omitArgs(event.args, ["userid"]);
    args.player = player;
    hero.executeSkills(event.name, args);
    return true;
  }

  /** Returns true when both perspectives were dispatched. */
  dispatchInteraction(event: GameEvent): boolean {
    const [instigatorName, targetName] = this.perspectiveNames(event.name);

    const attackerId = userIdArg(event.args, "attacker");
    const victimId = userIdArg(event.args, "userid");
    if (attackerId === null || attackerId === victimId) return false;

    const attacker = this.resolve(event, "attacker");
    const victim = this.resolve(event, "userid");
    if (!attacker || !victim) return false;

    const attackerHero = attacker.hero;
    const victimHero = victim.hero;
    if (!attackerHero || !victimHero) return false;

    const base = omitArgs(event.args, ["attacker", "userid"]);

    attackerHero.executeSkills(instigatorName, {
      ...base,
      attacker,
      victim,
      player: attacker,
    });
    victimHero.executeSkills(targetName, {
      ...base,
      attacker,
      victim,
      player: victim,
    });
    return true;
  }

  private resolve(event: GameEvent, key: string): Player | undefined {
    const userId = userIdArg(event.args, key);
    if (userId === null) return undefined;

    const player = this.players.get(userId);
    if (!player) {
      log.debug("Skipping event for unknown player", {
        event: event.name,
        key,
        userId,
      });
    }
    return player;
  }
}
