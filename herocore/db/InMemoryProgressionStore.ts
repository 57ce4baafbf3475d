// herocore/db/InMemoryProgressionStore.ts
//
// Process-local store for dev runs and tests (no Postgres).

import type {
  HeroRow,
  PlayerRow,
  ProgressionStore,
  SaveBatch,
  SkillRow,
  StoredHero,
  StoredSkill,
} from "./ProgressionStore";

export class InMemoryProgressionStore implements ProgressionStore {
  private readonly activeHeroes = new Map<string, string>();
  // playerId -> heroId -> row; Map keeps first-save order
  private readonly heroes = new Map<string, Map<string, StoredHero>>();
  // `${playerId}/${heroId}` -> skillId -> level
  private readonly skills = new Map<string, Map<string, number>>();

  saveCount = 0;

  async getActiveHeroId(playerId: string): Promise<string | null> {
    return this.activeHeroes.get(playerId) ?? null;
  }

  async getHeroesData(playerId: string): Promise<StoredHero[]> {
    const rows = this.heroes.get(playerId);
    return rows ? [...rows.values()].map((r) => ({ ...r })) : [];
  }

  async getSkillsData(playerId: string, heroId: string): Promise<StoredSkill[]> {
    const rows = this.skills.get(`${playerId}/${heroId}`);
    if (!rows) return [];
    return [...rows.entries()].map(([skillId, level]) => ({ skillId, level }));
  }

  async savePlayer(row: PlayerRow): Promise<void> {
    this.activeHeroes.set(row.playerId, row.activeHeroId);
  }

  async saveHero(row: HeroRow): Promise<void> {
    let rows = this.heroes.get(row.playerId);
    if (!rows) {
      rows = new Map();
      this.heroes.set(row.playerId, rows);
    }
    rows.set(row.heroId, { heroId: row.heroId, level: row.level, xp: row.xp });
  }

  async saveSkill(row: SkillRow): Promise<void> {
    const key = `${row.playerId}/${row.heroId}`;
    let rows = this.skills.get(key);
    if (!rows) {
      rows = new Map();
      this.skills.set(key, rows);
    }
    rows.set(row.skillId, row.level);
  }

  async saveBatch(batch: SaveBatch): Promise<void> {
    for (const row of batch.players) await this.savePlayer(row);
    for (const row of batch.heroes) await this.saveHero(row);
    for (const row of batch.skills) await this.saveSkill(row);
    this.saveCount++;
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
