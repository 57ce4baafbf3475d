// herocore/entities/Skill.ts

import type { Hero } from "./Hero";
import {
  Entity,
  type EntityVariant,
  type EntityVariantInput,
  resolveEntityVariant,
} from "./Entity";
import { ConfigurationError } from "./errors";

/** Named arguments of a game event as handed to skill callbacks. */
export type SkillEventArgs = Readonly<Record<string, unknown>>;

export type SkillCallback = (skill: Skill, args: SkillEventArgs) => void;

export interface SkillCallbackSpec {
  /** Event names this callback reacts to; one callback may claim several. */
  events: readonly string[];
  run: SkillCallback;
}

export interface SkillVariantInput extends EntityVariantInput {
  callbacks?: readonly SkillCallbackSpec[];
}

export interface SkillVariant extends EntityVariant {
  readonly kind: "skill";
  readonly callbacks: ReadonlyMap<string, SkillCallback>;
}

/**
 * Define a skill type. The event registry is built here, once, and shared
 * read-only by every instance of the variant.
 *
 * Two callbacks claiming the same event name is a ConfigurationError; one
 * callback listed twice for the same name is fine.
 */
export function defineSkill(input: SkillVariantInput): SkillVariant {
  const base = resolveEntityVariant(input);
  const callbacks = new Map<string, SkillCallback>();

  for (const entry of input.callbacks ?? []) {
    if (entry.events.length === 0) {
      throw new ConfigurationError(
        `Skill ${base.classId} registers a callback without any event names.`
      );
    }
    for (const eventName of entry.events) {
      const existing = callbacks.get(eventName);
      if (existing && existing !== entry.run) {
        throw new ConfigurationError(
          `Skill ${base.classId} registers more than one callback for event "${eventName}".`
        );
      }
      callbacks.set(eventName, entry.run);
    }
  }

  return Object.freeze({ ...base, kind: "skill" as const, callbacks });
}

/**
 * A leveled ability owned by one hero. Skills on level 0 are never executed
 * by the hero; see Hero.executeSkills().
 */
export class Skill extends Entity<SkillVariant> {
  constructor(readonly hero: Hero, variant: SkillVariant, level: number = 0) {
    super(variant, level);
  }

  get heroId(): string {
    return this.hero.classId;
  }

  handles(eventName: string): boolean {
    return this.variant.callbacks.has(eventName);
  }

  execute(eventName: string, eventArgs: SkillEventArgs): void {
    const callback = this.variant.callbacks.get(eventName);
    if (callback) {
      callback(this, eventArgs);
    }
  }
}
