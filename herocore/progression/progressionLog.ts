// herocore/progression/progressionLog.ts

import { Logger } from "../utils/logger";
import {
  ProgressionEvents,
  type ProgressionNotifier,
} from "./ProgressionNotifier";

const log = Logger.scope("HERO");

/** Log every progression transition; returns a function that detaches. */
export function attachProgressionLogging(notifier: ProgressionNotifier): () => void {
  const detachers = [
    notifier.on(ProgressionEvents.HeroLevelUp, ({ hero, player, levels }) => {
      log.info(`${hero.name} reached level ${hero.level}`, {
        playerId: player.id,
        levels,
        skillPoints: hero.skillPoints,
      });
    }),
    notifier.on(ProgressionEvents.HeroLevelDown, ({ hero, player, levels }) => {
      log.info(`${hero.name} dropped to level ${hero.level}`, {
        playerId: player.id,
        levels,
      });
    }),
    notifier.on(ProgressionEvents.SkillUpgrade, ({ skill, hero, player }) => {
      log.debug(`${hero.name}: ${skill.name} upgraded to ${skill.level}`, {
        playerId: player.id,
      });
    }),
    notifier.on(ProgressionEvents.SkillDowngrade, ({ skill, hero, player }) => {
      log.debug(`${hero.name}: ${skill.name} downgraded to ${skill.level}`, {
        playerId: player.id,
      });
    }),
  ];

  return () => detachers.forEach((d) => d());
}
