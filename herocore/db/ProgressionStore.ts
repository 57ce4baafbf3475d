// herocore/db/ProgressionStore.ts

export interface PlayerRow {
  playerId: string;
  activeHeroId: string;
}

export interface HeroRow {
  playerId: string;
  heroId: string;
  level: number;
  xp: number;
}

export interface SkillRow {
  playerId: string;
  heroId: string;
  skillId: string;
  level: number;
}

export interface StoredHero {
  heroId: string;
  level: number;
  xp: number;
}

export interface StoredSkill {
  skillId: string;
  level: number;
}

export interface SaveBatch {
  players: PlayerRow[];
  heroes: HeroRow[];
  skills: SkillRow[];
}

export function emptySaveBatch(): SaveBatch {
  return { players: [], heroes: [], skills: [] };
}

/**
 * ProgressionStore – persistence for players' heroes and skill levels.
 *
 * Only called when a player connects (load) and at save points
 * (disconnect, periodic flush); never while a level/skill change is in
 * flight.
 */
export interface ProgressionStore {
  getActiveHeroId(playerId: string): Promise<string | null>;

  getHeroesData(playerId: string): Promise<StoredHero[]>;

  getSkillsData(playerId: string, heroId: string): Promise<StoredSkill[]>;

  savePlayer(row: PlayerRow): Promise<void>;
  saveHero(row: HeroRow): Promise<void>;
  saveSkill(row: SkillRow): Promise<void>;

  /** Save everything in one unit; either all rows land or none do. */
  saveBatch(batch: SaveBatch): Promise<void>;

  close(): Promise<void>;
}
