// herocore/entities/Entity.ts

import { ConfigurationError, EntityRangeError } from "./errors";

/**
 * Static, per-variant attributes shared by every instance of a hero or
 * skill type. Built once by defineHero()/defineSkill() and frozen.
 */
export interface EntityVariant {
  readonly classId: string;
  readonly name: string;
  readonly description: string;
  /** Upper bound for `level`; Infinity when unbounded. */
  readonly maxLevel: number;
  /** Owner level needed before the entity becomes available. */
  readonly requiredLevel: number;
}

export interface EntityVariantInput {
  classId: string;
  name?: string;
  description?: string;
  maxLevel?: number;
  requiredLevel?: number;
}

// "Bonus_Health" -> "Bonus Health"
export function displayNameFromClassId(classId: string): string {
  return classId.replace(/_/g, " ");
}

export function resolveEntityVariant(input: EntityVariantInput): EntityVariant {
  const classId = input.classId.trim();
  if (classId === "") {
    throw new ConfigurationError("Entity variant needs a non-empty classId.");
  }

  const maxLevel = input.maxLevel ?? Infinity;
  if (!(maxLevel === Infinity || (Number.isInteger(maxLevel) && maxLevel >= 0))) {
    throw new ConfigurationError(
      `Variant ${classId} has an invalid maxLevel ${maxLevel}.`
    );
  }

  const requiredLevel = input.requiredLevel ?? 0;
  if (!Number.isInteger(requiredLevel) || requiredLevel < 0) {
    throw new ConfigurationError(
      `Variant ${classId} has an invalid requiredLevel ${requiredLevel}.`
    );
  }

  return {
    classId,
    name: input.name ?? displayNameFromClassId(classId),
    description: input.description ?? "",
    maxLevel,
    requiredLevel,
  };
}

function assertLevelInRange(variant: EntityVariant, value: number): void {
  if (!Number.isInteger(value)) {
    throw new EntityRangeError(
      `Attempt to set ${variant.classId}'s level to a non-integer value ${value}.`
    );
  }
  if (value < 0) {
    throw new EntityRangeError(
      `Attempt to set ${variant.classId}'s level to a negative value.`
    );
  }
  if (variant.maxLevel < value) {
    throw new EntityRangeError(
      `Attempt to set ${variant.classId}'s level to ${value}, above its max level ${variant.maxLevel}.`
    );
  }
}

/**
 * Base class for heroes and skills: a variant plus a bounded level.
 *
 * Invariant: 0 <= level <= variant.maxLevel. A rejected assignment throws
 * EntityRangeError and leaves the previous level in place.
 */
export abstract class Entity<V extends EntityVariant = EntityVariant> {
  private _level: number;

  protected constructor(readonly variant: V, level: number = 0) {
    assertLevelInRange(variant, level);
    this._level = level;
  }

  get classId(): string {
    return this.variant.classId;
  }

  get name(): string {
    return this.variant.name;
  }

  get description(): string {
    return this.variant.description;
  }

  get maxLevel(): number {
    return this.variant.maxLevel;
  }

  get requiredLevel(): number {
    return this.variant.requiredLevel;
  }

  get level(): number {
    return this._level;
  }

  set level(value: number) {
    assertLevelInRange(this.variant, value);
    this._level = value;
  }

  onMaxLevel(): boolean {
    return this._level === this.variant.maxLevel;
  }

  toString(): string {
    return `${this.name} (${this._level})`;
  }
}
