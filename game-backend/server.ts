// game-backend/server.ts
//
// Boots the progression engine for a game server. The host game pushes its
// raw events into `engine.feed` and calls sessions.connect() for every
// joining participant; everything else (skill dispatch, kill XP, saving on
// disconnect and on a timer) is wired here.

import { Logger } from "../herocore/utils/logger";
import { Config } from "../herocore/config/config";
import { GameEventFeed } from "../herocore/dispatch/GameEventFeed";
import { EventDispatcher } from "../herocore/dispatch/EventDispatcher";
import { HeroCatalog } from "../herocore/heroes/HeroCatalog";
import { getHeroes } from "../herocore/heroes/definitions";
import type { HeroVariant } from "../herocore/entities/Hero";
import { PlayerRegistry } from "../herocore/players/PlayerRegistry";
import { PlayerSessionService } from "../herocore/players/PlayerSessionService";
import { ProgressionNotifier } from "../herocore/progression/ProgressionNotifier";
import { attachProgressionLogging } from "../herocore/progression/progressionLog";
import { attachKillXp } from "../herocore/progression/XpRewards";
import { SaveScheduler } from "../herocore/core/SaveScheduler";
import type { ProgressionStore } from "../herocore/db/ProgressionStore";
import { InMemoryProgressionStore } from "../herocore/db/InMemoryProgressionStore";
import { PostgresProgressionStore } from "../herocore/db/PostgresProgressionStore";
import { sqlPool, testDbConnection } from "../herocore/db/Database";
import { backendConfig } from "./config";
import { installFileLogTap } from "./FileLogTap";

const log = Logger.scope("SERVER");

export interface EngineOptions {
  store: ProgressionStore;
  heroes?: readonly HeroVariant[];
  feed?: GameEventFeed;
  notifier?: ProgressionNotifier;
  saveIntervalMs?: number;
  /** Standalone runs: let the save timer hold the process open. */
  keepProcessAlive?: boolean;
  activeTeams?: readonly number[];
}

export interface ProgressionEngine {
  feed: GameEventFeed;
  catalog: HeroCatalog;
  players: PlayerRegistry;
  notifier: ProgressionNotifier;
  sessions: PlayerSessionService;
  scheduler: SaveScheduler;
  /** Stop timers, detach from the feed, save everyone, close the store. */
  shutdown(): Promise<void>;
}

export function createProgressionEngine(opts: EngineOptions): ProgressionEngine {
  const feed = opts.feed ?? new GameEventFeed();
  const notifier = opts.notifier ?? new ProgressionNotifier();
  const catalog = new HeroCatalog(opts.heroes ?? getHeroes());
  const players = new PlayerRegistry();

  const sessions = new PlayerSessionService({
    store: opts.store,
    catalog,
    players,
    notifier,
  });

  const dispatcher = new EventDispatcher({
    players,
    activeTeams: opts.activeTeams ?? Config.ACTIVE_TEAMS,
  });

  // Order matters: skills see player_disconnect before the session
  // service saves and drops the player.
  const detachers = [
    attachProgressionLogging(notifier),
    dispatcher.attach(feed),
    attachKillXp(feed, players),
    sessions.attach(feed),
  ];

  const scheduler = new SaveScheduler(sessions, {
    intervalMs: opts.saveIntervalMs ?? Config.SAVE_INTERVAL_MS,
    keepProcessAlive: opts.keepProcessAlive,
  });
  scheduler.start();

  log.info("Progression engine ready", {
    heroes: catalog.list().map((h) => h.classId),
  });

  let stopped = false;
  const shutdown = async (): Promise<void> => {
    if (stopped) return;
    stopped = true;

    scheduler.stop();
    detachers.forEach((d) => d());

    try {
      const saved = await sessions.saveAll();
      log.info("Saved players on shutdown", { count: saved });
    } finally {
      await opts.store.close();
    }
  };

  return { feed, catalog, players, notifier, sessions, scheduler, shutdown };
}

async function main(): Promise<void> {
  if (backendConfig.logFile) installFileLogTap(backendConfig.logFile);

  let store: ProgressionStore;
  if (backendConfig.store === "postgres") {
    if (!(await testDbConnection())) {
      throw new Error("Postgres is unreachable; set HC_DB_* or HC_STORE=memory");
    }
    const pg = new PostgresProgressionStore(sqlPool());
    if (backendConfig.ensureSchema) await pg.ensureSchema();
    store = pg;
  } else {
    log.warn("Using in-memory progression store; progress is lost on exit");
    store = new InMemoryProgressionStore();
  }

  const engine = createProgressionEngine({
    store,
    saveIntervalMs: backendConfig.saveIntervalMs,
    keepProcessAlive: true,
  });

  const stop = (signal: string) => {
    log.info("Shutting down", { signal });
    engine
      .shutdown()
      .then(() => process.exit(0))
      .catch((err) => {
        log.error("Shutdown failed", { err });
        process.exit(1);
      });
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));
}

// Entry point
if (require.main === module) {
  main().catch((err: unknown) => {
    log.error("Fatal error in progression server", { err });
    process.exit(1);
  });
}
