// herocore/skills/Cooldown.ts

import type { Skill, SkillCallback, SkillEventArgs } from "../entities/Skill";

/** Seconds, or a function of the skill and event (e.g. shorter per level). */
export type CooldownSpec = number | ((skill: Skill, args: SkillEventArgs) => number);

export interface CooldownOptions {
  /** Runs instead of the callback while it is cooling down. */
  onCooldown?: SkillCallback;
  /** Milliseconds clock; defaults to Date.now. */
  clock?: () => number;
}

interface CooldownState {
  /** Cooldown (seconds) computed on the last successful call. */
  previous: number;
  startedAt: number;
}

/**
 * Wraps a skill callback with a per-skill-instance cooldown.
 *
 *   const strike = withCooldown((s) => 12 - s.level * 2, onStrike);
 *   defineSkill({ classId: "Holy_Strike", callbacks: [{ events: ["player_attack"], run: strike.run }] });
 *
 * State is keyed by the skill instance, so two heroes using the same
 * variant cool down independently.
 */
export class SkillCooldown {
  private readonly states = new WeakMap<Skill, CooldownState>();
  private readonly clock: () => number;

  constructor(
    private readonly cooldown: CooldownSpec,
    private readonly callback: SkillCallback,
    private readonly options: CooldownOptions = {},
  ) {
    this.clock = options.clock ?? Date.now;
  }

  readonly run: SkillCallback = (skill, args) => {
    if (this.remaining(skill) > 0) {
      this.options.onCooldown?.(skill, args);
      return;
    }
    this.set(skill, this.maxCooldown(skill, args));
    this.callback(skill, args);
  };

  maxCooldown(skill: Skill, args: SkillEventArgs): number {
    return typeof this.cooldown === "number"
      ? this.cooldown
      : this.cooldown(skill, args);
  }

  /** Seconds left before the callback can run again for this skill. */
  remaining(skill: Skill): number {
    const state = this.states.get(skill);
    if (!state) return 0;
    const elapsed = (this.clock() - state.startedAt) / 1000;
    return Math.max(0, state.previous - elapsed);
  }

  previous(skill: Skill): number {
    return this.states.get(skill)?.previous ?? 0;
  }

  /** Start (or restart) a cooldown of `seconds` for this skill. */
  set(skill: Skill, seconds: number): void {
    this.states.set(skill, { previous: seconds, startedAt: this.clock() });
  }

  reset(skill: Skill): void {
    this.states.delete(skill);
  }
}

export function withCooldown(
  cooldown: CooldownSpec,
  callback: SkillCallback,
  options?: CooldownOptions,
): SkillCooldown {
  return new SkillCooldown(cooldown, callback, options);
}
