// herocore/entities/Hero.ts

import type { Player } from "../players/Player";
import { Config } from "../config/config";
import { ProgressionEvents } from "../progression/ProgressionNotifier";
import {
  Entity,
  type EntityVariant,
  type EntityVariantInput,
  resolveEntityVariant,
} from "./Entity";
import { Skill, type SkillEventArgs, type SkillVariant } from "./Skill";
import {
  ConfigurationError,
  EntityRangeError,
  OwnershipError,
  PreconditionError,
} from "./errors";

export interface HeroVariantInput extends EntityVariantInput {
  /** Skill types of the hero, in menu/iteration order. */
  skills?: readonly SkillVariant[];
}

export interface HeroVariant extends EntityVariant {
  readonly kind: "hero";
  readonly skills: readonly SkillVariant[];
}

export function defineHero(input: HeroVariantInput): HeroVariant {
  const base = resolveEntityVariant(input);
  const skills = input.skills ?? [];

  const seen = new Set<string>();
  for (const skill of skills) {
    if (seen.has(skill.classId)) {
      throw new ConfigurationError(
        `Skill ${skill.classId} already added to hero ${base.classId}.`
      );
    }
    seen.add(skill.classId);
  }

  return Object.freeze({
    ...base,
    kind: "hero" as const,
    skills: Object.freeze([...skills]),
  });
}

export function xpQuotaForLevel(level: number): number {
  return Config.XP_QUOTA_BASE + Config.XP_QUOTA_PER_LEVEL * level;
}

export interface HeroState {
  level?: number;
  xp?: number;
}

function assertXpAmount(op: string, amount: number, other: string): void {
  if (!Number.isFinite(amount)) {
    throw new PreconditionError(`${op}() received a non-finite amount ${amount}.`);
  }
  if (!Number.isInteger(amount)) {
    throw new PreconditionError(`${op}() received a non-integer amount ${amount}.`);
  }
  if (amount < 0) {
    throw new PreconditionError(
      `${op}() received a negative value, use ${other}() instead.`
    );
  }
}

/**
 * A player's progressible character.
 *
 * XP fills `xpQuota` (80 + 15 * level) to gain levels; every level is a skill
 * point, spent with upgradeSkill() and refunded with downgradeSkill(). Once
 * the hero sits on a finite max level the quota becomes Infinity and further
 * XP is only banked.
 */
export class Hero extends Entity<HeroVariant> {
  private _xp: number;
  private readonly _skills = new Map<string, Skill>();

  constructor(readonly owner: Player, variant: HeroVariant, state: HeroState = {}) {
    super(variant, state.level ?? 0);

    const xp = state.xp ?? 0;
    if (!Number.isInteger(xp)) {
      throw new EntityRangeError(`Hero ${variant.classId} cannot start with xp ${xp}.`);
    }
    this._xp = xp;

    for (const skillVariant of variant.skills) {
      this._skills.set(skillVariant.classId, new Skill(this, skillVariant));
    }
  }

  get skills(): ReadonlyMap<string, Skill> {
    return this._skills;
  }

  get xp(): number {
    return this._xp;
  }

  set xp(value: number) {
    if (!Number.isInteger(value)) {
      throw new EntityRangeError(`Attempt to set ${this.classId}'s xp to ${value}.`);
    }
    if (value < this._xp) {
      this.takeXp(this._xp - value);
    } else {
      this.giveXp(value - this._xp);
    }
  }

  get xpQuota(): number {
    if (this.onMaxLevel()) return Infinity;
    return xpQuotaForLevel(this.level);
  }

  get skillPoints(): number {
    let used = 0;
    for (const skill of this._skills.values()) used += skill.level;
    return this.level - used;
  }

  giveXp(amount: number): void {
    assertXpAmount("giveXp", amount, "takeXp");

    const initialLevel = this.level;
    let level = initialLevel;
    let xp = this._xp + amount;

    while (level !== this.maxLevel && xp >= xpQuotaForLevel(level)) {
      xp -= xpQuotaForLevel(level);
      level += 1;
    }

    this._xp = xp;
    if (level !== initialLevel) this.level = level;

    const gained = level - initialLevel;
    if (gained > 0) {
      this.owner.notifier.notify(ProgressionEvents.HeroLevelUp, {
        hero: this,
        player: this.owner,
        levels: gained,
      });
    }
  }

  /**
   * Take XP away, de-leveling while xp is negative. At level 0 xp is left
   * negative; nothing floors it.
   */
  takeXp(amount: number): void {
    assertXpAmount("takeXp", amount, "giveXp");

    const initialLevel = this.level;
    let level = initialLevel;
    let xp = this._xp - amount;

    while (level > 0 && xp < 0) {
      level -= 1;
      xp += xpQuotaForLevel(level);
    }

    this._xp = xp;
    if (level !== initialLevel) this.level = level;

    const lost = initialLevel - level;
    if (lost > 0) {
      this.owner.notifier.notify(ProgressionEvents.HeroLevelDown, {
        hero: this,
        player: this.owner,
        levels: lost,
      });
    }
  }

  ownsSkill(skill: Skill): boolean {
    return this._skills.get(skill.classId) === skill;
  }

  /** Skills whose requiredLevel the hero has reached. */
  availableSkills(): Skill[] {
    return [...this._skills.values()].filter((s) => s.requiredLevel <= this.level);
  }

  canUpgradeSkill(skill: Skill): boolean {
    return this.ownsSkill(skill) && this.skillPoints > 0 && !skill.onMaxLevel();
  }

  upgradeSkill(skill: Skill): void {
    if (!this.ownsSkill(skill)) {
      throw new OwnershipError(`Skill ${skill.classId} is not owned by hero ${this.classId}.`);
    }
    if (!this.canUpgradeSkill(skill)) {
      throw new PreconditionError(`Unable to upgrade skill ${skill}.`);
    }

    skill.level += 1;
    this.owner.notifier.notify(ProgressionEvents.SkillUpgrade, {
      skill,
      hero: this,
      player: this.owner,
    });
  }

  canDowngradeSkill(skill: Skill): boolean {
    return this.ownsSkill(skill) && skill.level > 0;
  }

  downgradeSkill(skill: Skill): void {
    if (!this.ownsSkill(skill)) {
      throw new OwnershipError(`Skill ${skill.classId} is not owned by hero ${this.classId}.`);
    }
    if (!this.canDowngradeSkill(skill)) {
      throw new PreconditionError(`Unable to downgrade skill ${skill}.`);
    }

    skill.level -= 1;
    this.owner.notifier.notify(ProgressionEvents.SkillDowngrade, {
      skill,
      hero: this,
      player: this.owner,
    });
  }

  /** Refund every spent skill point; returns how many were refunded. */
  resetSkills(): number {
    let refunded = 0;
    for (const skill of this._skills.values()) {
      while (this.canDowngradeSkill(skill)) {
        this.downgradeSkill(skill);
        refunded++;
      }
    }
    return refunded;
  }

  executeSkills(eventName: string, eventArgs: SkillEventArgs): void {
    for (const skill of this._skills.values()) {
      if (skill.level > 0) {
        skill.execute(eventName, eventArgs);
      }
    }
  }
}
