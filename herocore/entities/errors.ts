// herocore/entities/errors.ts

export class HeroCoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HeroCoreError";
  }
}

/**
 * Level outside [0, maxLevel]. Extends the built-in RangeError so callers
 * that already catch RangeError keep working.
 */
export class EntityRangeError extends RangeError {
  constructor(message: string) {
    super(message);
    this.name = "EntityRangeError";
  }
}

// A can*() check failed, or an xp delta went the wrong way.
export class PreconditionError extends HeroCoreError {
  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

export class OwnershipError extends HeroCoreError {
  constructor(message: string) {
    super(message);
    this.name = "OwnershipError";
  }
}

export class ConfigurationError extends HeroCoreError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
