// herocore/heroes/definitions/ranger.ts

import { defineHero } from "../../entities/Hero";
import { defineSkill } from "../../entities/Skill";
import { playerArg } from "../../players/Player";

export const FleetFoot = defineSkill({
  classId: "Fleet_Foot",
  description: "Move 5% faster per level.",
  maxLevel: 5,
  callbacks: [
    {
      // re-applied on jump in case the game reset the speed
      events: ["player_spawn", "player_jump"],
      run: (skill, args) => {
        const player = playerArg(args);
        if (player) player.actor.speed = 1 + skill.level * 0.05;
      },
    },
  ],
});

export const Evasion = defineSkill({
  classId: "Evasion",
  description: "Recover 10% of damage taken per level.",
  maxLevel: 5,
  callbacks: [
    {
      events: ["player_victim"],
      run: (skill, args) => {
        const player = playerArg(args);
        const damage = args.dmg_health;
        if (!player || typeof damage !== "number" || damage <= 0) return;
        player.actor.health += Math.floor(damage * 0.1 * skill.level);
      },
    },
  ],
});

export const Bounty = defineSkill({
  classId: "Bounty",
  description: "Heal 5 health per level for each kill.",
  maxLevel: 3,
  callbacks: [
    {
      events: ["player_kill"],
      run: (skill, args) => {
        const player = playerArg(args);
        if (player) player.actor.health += skill.level * 5;
      },
    },
  ],
});

export const Ranger = defineHero({
  classId: "Ranger",
  description: "A swift hunter who strikes and slips away.",
  requiredLevel: 5,
  skills: [FleetFoot, Evasion, Bounty],
});
