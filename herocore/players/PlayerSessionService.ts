// herocore/players/PlayerSessionService.ts

import type { ProgressionStore, SaveBatch } from "../db/ProgressionStore";
import { emptySaveBatch } from "../db/ProgressionStore";
import { type GameEventFeed, userIdArg } from "../dispatch/GameEventFeed";
import { ConfigurationError, PreconditionError } from "../entities/errors";
import type { Hero } from "../entities/Hero";
import type { HeroCatalog } from "../heroes/HeroCatalog";
import {
  type ProgressionNotifier,
  progressionNotifier,
} from "../progression/ProgressionNotifier";
import { Logger } from "../utils/logger";
import { type GameActor, Player } from "./Player";
import type { PlayerRegistry } from "./PlayerRegistry";

export interface PlayerSessionServiceOptions {
  store: ProgressionStore;
  catalog: HeroCatalog;
  players: PlayerRegistry;
  notifier?: ProgressionNotifier;
}

interface PendingConnect {
  cancelled: boolean;
}

// Stored levels may outlive a lowered maxLevel.
function clampLevel(level: number, maxLevel: number): number {
  return Math.min(Math.max(level, 0), maxLevel);
}

/**
 * Loads players' heroes when they connect and writes them back at save
 * points (disconnect, periodic flush, shutdown).
 */
export class PlayerSessionService {
  private log = Logger.scope("SESSION");

  private readonly store: ProgressionStore;
  private readonly catalog: HeroCatalog;
  private readonly players: PlayerRegistry;
  private readonly notifier: ProgressionNotifier;
  private readonly pending = new Map<number, PendingConnect>();

  constructor(opts: PlayerSessionServiceOptions) {
    this.store = opts.store;
    this.catalog = opts.catalog;
    this.players = opts.players;
    this.notifier = opts.notifier ?? progressionNotifier;
  }

  /**
   * Build a Player from stored progress:
   * - stored heroes (unknown hero/skill ids are skipped, levels above the
   *   variant's max are clamped),
   * - plus every hero the total level unlocks,
   * - active hero = stored one when still owned, else the first owned.
   *
   * A disconnect for the same userid while loading cancels the connect: the
   * player is never registered and the promise rejects.
   */
  async connect(actor: GameActor): Promise<Player> {
    if (this.catalog.size === 0) {
      throw new ConfigurationError("No heroes are registered in the catalog.");
    }
    if (this.pending.has(actor.userId)) {
      throw new PreconditionError(`Player with userid ${actor.userId} is already connecting.`);
    }

    const pending: PendingConnect = { cancelled: false };
    this.pending.set(actor.userId, pending);
    try {
      const player = await this.load(actor);

      if (pending.cancelled) {
        this.log.info("Player left before loading finished", {
          playerId: player.id,
          userId: player.userId,
        });
        throw new PreconditionError(
          `Player with userid ${actor.userId} disconnected while connecting.`
        );
      }

      this.players.add(player);
      this.log.info("Player connected", {
        playerId: player.id,
        userId: player.userId,
        heroes: player.heroes.size,
        activeHero: player.hero?.classId,
      });
      return player;
    } finally {
      this.pending.delete(actor.userId);
    }
  }

  /**
   * Save and then drop a player. A failed save rejects and leaves the player
   * registered so saveAll() retries it. Cancels a connect still loading;
   * unknown ids are ignored.
   */
  async disconnect(userId: number): Promise<void> {
    const pending = this.pending.get(userId);
    if (pending) pending.cancelled = true;

    const player = this.players.get(userId);
    if (!player) return;

    await this.savePlayer(player);
    if (this.players.get(userId) === player) this.players.remove(userId);
    this.log.info("Player disconnected", { playerId: player.id, userId });
  }

  serializePlayer(player: Player): SaveBatch {
    const batch = emptySaveBatch();
    const playerId = player.id;

    const active = player.hero;
    if (active) {
      batch.players.push({ playerId, activeHeroId: active.classId });
    }

    for (const hero of player.heroes.values()) {
      batch.heroes.push({
        playerId,
        heroId: hero.classId,
        level: hero.level,
        xp: hero.xp,
      });
      for (const [skillId, skill] of hero.skills) {
        batch.skills.push({
          playerId,
          heroId: hero.classId,
          skillId,
          level: skill.level,
        });
      }
    }

    return batch;
  }

  async savePlayer(player: Player): Promise<void> {
    await this.store.saveBatch(this.serializePlayer(player));
  }

  /** Save every connected player in a single batch; returns how many. */
  async saveAll(): Promise<number> {
    const players = this.players.values();
    if (players.length === 0) return 0;

    const batch = emptySaveBatch();
    for (const player of players) {
      const one = this.serializePlayer(player);
      batch.players.push(...one.players);
      batch.heroes.push(...one.heroes);
      batch.skills.push(...one.skills);
    }

    await this.store.saveBatch(batch);
    this.log.debug("Saved all players", { count: players.length });
    return players.length;
  }

  /**
   * Save and drop players on player_disconnect. Attach after the dispatcher
   * so the disconnect skills still see the player.
   */
  attach(feed: GameEventFeed): () => void {
    return feed.on("player_disconnect", (event) => {
      const userId = userIdArg(event.args, "userid");
      if (userId === null) return;

      this.disconnect(userId).catch((err) => {
        this.log.error("Failed to save disconnecting player", { userId, err });
      });
    });
  }

  private async load(actor: GameActor): Promise<Player> {
    const player = new Player(actor, this.notifier);

    for (const stored of await this.store.getHeroesData(player.id)) {
      const variant = this.catalog.get(stored.heroId);
      if (!variant) {
        this.log.warn("Skipping stored hero missing from catalog", {
          playerId: player.id,
          heroId: stored.heroId,
        });
        continue;
      }

      const level = clampLevel(stored.level, variant.maxLevel);
      if (level !== stored.level) {
        this.log.warn("Clamping stored hero level", {
          playerId: player.id,
          heroId: stored.heroId,
          stored: stored.level,
          level,
        });
      }

      const hero = player.createHero(variant, { level, xp: stored.xp });
      await this.loadSkills(player, hero);
    }

    player.unlockHeroes(this.catalog);

    const first = player.heroes.values().next();
    if (first.done) {
      throw new ConfigurationError(
        `No hero is available to player ${player.id} at total level 0.`
      );
    }

    const activeId = await this.store.getActiveHeroId(player.id);
    const active = activeId !== null ? player.heroes.get(activeId) : undefined;
    player.hero = active ?? first.value;
    return player;
  }

  private async loadSkills(player: Player, hero: Hero): Promise<void> {
    for (const stored of await this.store.getSkillsData(player.id, hero.classId)) {
      const skill = hero.skills.get(stored.skillId);
      if (!skill) {
        this.log.warn("Skipping stored skill missing from hero", {
          playerId: player.id,
          heroId: hero.classId,
          skillId: stored.skillId,
        });
        continue;
      }

      const level = clampLevel(stored.level, skill.maxLevel);
      if (level !== stored.level) {
        this.log.warn("Clamping stored skill level", {
          playerId: player.id,
          heroId: hero.classId,
          skillId: stored.skillId,
          stored: stored.level,
          level,
        });
      }
      skill.level = level;
    }
  }
}
