// herocore/heroes/definitions/paladin.ts

import { defineHero } from "../../entities/Hero";
import { defineSkill } from "../../entities/Skill";
import { playerArg } from "../../players/Player";
import { withCooldown } from "../../skills/Cooldown";

export const BonusHealth = defineSkill({
  classId: "Bonus_Health",
  description: "Gain 5 bonus health per level upon spawning.",
  maxLevel: 8,
  callbacks: [
    {
      events: ["player_spawn"],
      run: (skill, args) => {
        const player = playerArg(args);
        if (player) player.actor.health += skill.level * 5;
      },
    },
  ],
});

// 10s at level 1, one second shorter per extra level.
export const holyStrike = withCooldown(
  (skill) => 11 - skill.level,
  (skill, args) => {
    const victim = playerArg(args, "victim");
    if (victim) victim.actor.health -= skill.level * 3;
  },
);

export const HolyStrike = defineSkill({
  classId: "Holy_Strike",
  description: "Attacks smite the victim for 3 extra damage per level.",
  maxLevel: 4,
  requiredLevel: 2,
  callbacks: [{ events: ["player_attack"], run: holyStrike.run }],
});

export const Paladin = defineHero({
  classId: "Paladin",
  description: "A sturdy warrior blessed with holy power.",
  maxLevel: 12,
  skills: [BonusHealth, HolyStrike],
});
