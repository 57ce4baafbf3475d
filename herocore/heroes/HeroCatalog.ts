// herocore/heroes/HeroCatalog.ts

import type { HeroVariant } from "../entities/Hero";
import { ConfigurationError } from "../entities/errors";

/**
 * The closed set of hero variants available on the server, keyed by
 * classId. Built once at startup; never mutated afterwards.
 */
export class HeroCatalog {
  private readonly variants: ReadonlyMap<string, HeroVariant>;

  constructor(variants: readonly HeroVariant[]) {
    const map = new Map<string, HeroVariant>();
    for (const variant of variants) {
      if (map.has(variant.classId)) {
        throw new ConfigurationError(`Hero ${variant.classId} is registered twice.`);
      }
      map.set(variant.classId, variant);
    }
    this.variants = map;
  }

  get size(): number {
    return this.variants.size;
  }

  has(classId: string): boolean {
    return this.variants.has(classId);
  }

  get(classId: string): HeroVariant | undefined {
    return this.variants.get(classId);
  }

  /** Variants in declaration order. */
  list(): HeroVariant[] {
    return [...this.variants.values()];
  }

  unlockedFor(totalLevel: number): HeroVariant[] {
    return this.list().filter((v) => v.requiredLevel <= totalLevel);
  }
}
