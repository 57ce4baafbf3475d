// herocore/players/Player.ts

import { Hero, type HeroState, type HeroVariant } from "../entities/Hero";
import type { SkillEventArgs } from "../entities/Skill";
import {
  ConfigurationError,
  OwnershipError,
  PreconditionError,
} from "../entities/errors";
import type { HeroCatalog } from "../heroes/HeroCatalog";
import {
  ProgressionNotifier,
  progressionNotifier,
} from "../progression/ProgressionNotifier";

/**
 * The host game's view of a connected participant. Skill callbacks read and
 * mutate these fields; the host applies them to the real game entity.
 */
export interface GameActor {
  /** Per-connection id the game's events refer to. */
  readonly userId: number;
  /** Stable account id; the persistence key. */
  readonly uniqueId: string;
  readonly isBot: boolean;
  team: number;
  health: number;
  speed: number;
}

export class Player {
  private readonly _heroes = new Map<string, Hero>();
  private activeHero: Hero | null = null;

  constructor(
    readonly actor: GameActor,
    readonly notifier: ProgressionNotifier = progressionNotifier,
  ) {}

  get id(): string {
    return this.actor.uniqueId;
  }

  get userId(): number {
    return this.actor.userId;
  }

  get heroes(): ReadonlyMap<string, Hero> {
    return this._heroes;
  }

  /** Active hero; null only while the player is being built. */
  get hero(): Hero | null {
    return this.activeHero;
  }

  set hero(value: Hero) {
    if (this._heroes.get(value.classId) !== value) {
      throw new OwnershipError(`Hero ${value.classId} not owned by player ${this.id}.`);
    }
    this.activeHero = value;
  }

  /** Create a hero of `variant` owned by this player and store it. */
  createHero(variant: HeroVariant, state?: HeroState): Hero {
    const hero = new Hero(this, variant, state);
    this.addHero(hero);
    return hero;
  }

  addHero(hero: Hero): void {
    if (hero.owner !== this) {
      throw new OwnershipError(`Hero ${hero.classId} belongs to another player.`);
    }
    if (this._heroes.has(hero.classId)) {
      throw new ConfigurationError(`Player ${this.id} already owns hero ${hero.classId}.`);
    }
    this._heroes.set(hero.classId, hero);
  }

  calculateTotalLevel(): number {
    let total = 0;
    for (const hero of this._heroes.values()) total += hero.level;
    return total;
  }

  /** Give the player every catalog hero their total level unlocks. */
  unlockHeroes(catalog: HeroCatalog): Hero[] {
    const totalLevel = this.calculateTotalLevel();
    const created: Hero[] = [];
    for (const variant of catalog.unlockedFor(totalLevel)) {
      if (this._heroes.has(variant.classId)) continue;
      created.push(this.createHero(variant));
    }
    return created;
  }

  /**
   * Switch the active hero, creating it first when unlocked but not owned.
   * Returns false when it already is the active hero.
   */
  changeHero(catalog: HeroCatalog, classId: string): boolean {
    const variant = catalog.get(classId);
    if (!variant) {
      throw new ConfigurationError(`Unknown hero ${classId}.`);
    }
    if (this.activeHero?.classId === classId) return false;

    let hero = this._heroes.get(classId);
    if (!hero) {
      if (variant.requiredLevel > this.calculateTotalLevel()) {
        throw new PreconditionError(
          `Hero ${classId} requires total level ${variant.requiredLevel}.`
        );
      }
      hero = this.createHero(variant);
    }

    this.hero = hero;
    return true;
  }
}

/** Read a Player out of dispatched event args, e.g. args.player / args.attacker. */
export function playerArg(args: SkillEventArgs, key: string = "player"): Player | undefined {
  const value = args[key];
  return value instanceof Player ? value : undefined;
}
