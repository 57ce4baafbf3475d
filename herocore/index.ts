// herocore/index.ts

// Config
export * from "./config/config";
export * from "./config/logconfig";

// Entities
export * from "./entities/errors";
export * from "./entities/Entity";
export * from "./entities/Skill";
export * from "./entities/Hero";

// Catalog + shipped heroes
export * from "./heroes/HeroCatalog";
export { getHeroes } from "./heroes/definitions";

// Players
export * from "./players/Player";
export * from "./players/PlayerRegistry";
export * from "./players/PlayerSessionService";

// Events
export * from "./dispatch/GameEventFeed";
export * from "./dispatch/EventDispatcher";

// Progression
export * from "./progression/ProgressionNotifier";
export * from "./progression/progressionLog";
export * from "./progression/XpRewards";

// Skills
export * from "./skills/Cooldown";

// Persistence
export * from "./db/ProgressionStore";
export * from "./db/InMemoryProgressionStore";
export * from "./db/PostgresProgressionStore";
export * from "./db/Database";

// Scheduling
export * from "./core/SaveScheduler";

// Logging
export * from "./utils/logger";
