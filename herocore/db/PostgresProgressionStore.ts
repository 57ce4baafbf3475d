// herocore/db/PostgresProgressionStore.ts

import fs from "fs";
import path from "path";

import { Logger } from "../utils/logger";
import type {
  HeroRow,
  PlayerRow,
  ProgressionStore,
  SaveBatch,
  SkillRow,
  StoredHero,
  StoredSkill,
} from "./ProgressionStore";

/** The slice of pg's Pool/PoolClient this store needs. */
export interface SqlClient {
  query(
    text: string,
    values?: unknown[],
  ): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlClient & { release(): void }>;
  end(): Promise<void>;
}

export const SCHEMA_PATH = path.join(__dirname, "schema.sql");

const UPSERT_PLAYER = `
  INSERT INTO hero_players (player_id, active_hero_id)
  VALUES ($1, $2)
  ON CONFLICT (player_id) DO UPDATE SET active_hero_id = EXCLUDED.active_hero_id
`;

const UPSERT_HERO = `
  INSERT INTO hero_heroes (player_id, hero_id, level, xp)
  VALUES ($1, $2, $3, $4)
  ON CONFLICT (player_id, hero_id) DO UPDATE SET level = EXCLUDED.level, xp = EXCLUDED.xp
`;

const UPSERT_SKILL = `
  INSERT INTO hero_skills (player_id, hero_id, skill_id, level)
  VALUES ($1, $2, $3, $4)
  ON CONFLICT (player_id, hero_id, skill_id) DO UPDATE SET level = EXCLUDED.level
`;

function field(row: unknown, key: string): unknown {
  if (typeof row !== "object" || row === null) return undefined;
  return Reflect.get(row, key);
}

function stringField(row: unknown, key: string): string {
  const v = field(row, key);
  if (typeof v !== "string") {
    throw new TypeError(`Expected text column "${key}", got ${typeof v}.`);
  }
  return v;
}

// pg returns INTEGER as number, BIGINT/NUMERIC as string
function intField(row: unknown, key: string): number {
  const v = field(row, key);
  const n = typeof v === "string" ? Number(v) : v;
  if (typeof n !== "number" || !Number.isInteger(n)) {
    throw new TypeError(`Expected integer column "${key}", got ${String(v)}.`);
  }
  return n;
}

export class PostgresProgressionStore implements ProgressionStore {
  private log = Logger.scope("DB");

  constructor(private readonly pool: SqlPool) {}

  /** Create the tables when missing. */
  async ensureSchema(schemaPath: string = SCHEMA_PATH): Promise<void> {
    const sql = await fs.promises.readFile(schemaPath, "utf8");
    await this.pool.query(sql);
    this.log.info("Progression schema ensured");
  }

  async getActiveHeroId(playerId: string): Promise<string | null> {
    const r = await this.pool.query(
      `SELECT active_hero_id FROM hero_players WHERE player_id = $1`,
      [playerId],
    );
    if (r.rows.length === 0) return null;
    return stringField(r.rows[0], "active_hero_id");
  }

  async getHeroesData(playerId: string): Promise<StoredHero[]> {
    const r = await this.pool.query(
      `SELECT hero_id, level, xp FROM hero_heroes WHERE player_id = $1 ORDER BY hero_id ASC`,
      [playerId],
    );
    return r.rows.map((row) => ({
      heroId: stringField(row, "hero_id"),
      level: intField(row, "level"),
      xp: intField(row, "xp"),
    }));
  }

  async getSkillsData(playerId: string, heroId: string): Promise<StoredSkill[]> {
    const r = await this.pool.query(
      `SELECT skill_id, level FROM hero_skills WHERE player_id = $1 AND hero_id = $2`,
      [playerId, heroId],
    );
    return r.rows.map((row) => ({
      skillId: stringField(row, "skill_id"),
      level: intField(row, "level"),
    }));
  }

  async savePlayer(row: PlayerRow): Promise<void> {
    await this.writePlayer(this.pool, row);
  }

  async saveHero(row: HeroRow): Promise<void> {
    await this.writeHero(this.pool, row);
  }

  async saveSkill(row: SkillRow): Promise<void> {
    await this.writeSkill(this.pool, row);
  }

  async saveBatch(batch: SaveBatch): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      for (const row of batch.players) await this.writePlayer(client, row);
      for (const row of batch.heroes) await this.writeHero(client, row);
      for (const row of batch.skills) await this.writeSkill(client, row);
      await client.query("COMMIT");
    } catch (err) {
      await client.query("ROLLBACK");
      this.log.error("saveBatch failed, rolled back", {
        players: batch.players.length,
        heroes: batch.heroes.length,
        skills: batch.skills.length,
        err,
      });
      throw err;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async writePlayer(db: SqlClient, row: PlayerRow): Promise<void> {
    await db.query(UPSERT_PLAYER, [row.playerId, row.activeHeroId]);
  }

  private async writeHero(db: SqlClient, row: HeroRow): Promise<void> {
    await db.query(UPSERT_HERO, [row.playerId, row.heroId, row.level, row.xp]);
  }

  private async writeSkill(db: SqlClient, row: SkillRow): Promise<void> {
    await db.query(UPSERT_SKILL, [row.playerId, row.heroId, row.skillId, row.level]);
  }
}
