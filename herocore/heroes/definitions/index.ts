// herocore/heroes/definitions/index.ts

import type { HeroVariant } from "../../entities/Hero";
import { Paladin } from "./paladin";
import { Ranger } from "./ranger";

export { BonusHealth, HolyStrike, Paladin, holyStrike } from "./paladin";
export { Bounty, Evasion, FleetFoot, Ranger } from "./ranger";

/** Heroes shipped with the server, in menu order. */
export function getHeroes(): HeroVariant[] {
  return [Paladin, Ranger];
}
