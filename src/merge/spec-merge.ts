/**
 * Spec merge used to apply condition overrides.
 *
 * Merge rules (override is the right-hand side):
 * 1. Constraints and `type`: override wins when present, otherwise inherited
 * 2. `required`, `conditions` and `items`: override replaces the base's when present
 * 3. `properties`: key-wise union, shared keys merged recursively
 *
 * Neither input is mutated.
 *
 * @module merge/spec-merge
 */

import type { Spec, SpecOverrides } from '../types/spec';
import { getOwn } from '../utils/object';

type MutableSpec = { -readonly [K in keyof Spec]: Spec[K] };

/**
 * @example
 * ```typescript
 * const merger = new SpecMerger();
 * const base = { type: 'string', minLength: 0, maxLength: 64 };
 * merger.merge(base, { minLength: 1 });
 * // { type: 'string', minLength: 1, maxLength: 64 }
 * ```
 */
export class SpecMerger {
  merge(base: Spec, override: Spec): Spec {
    if (!base) {
      return override;
    }
    if (!override) {
      return base;
    }

    const merged: MutableSpec = { ...base };

    if (override.type) {
      merged.type = override.type;
    }
    if (override.min !== undefined) {
      merged.min = override.min;
    }
    if (override.max !== undefined) {
      merged.max = override.max;
    }
    if (override.minLength !== undefined) {
      merged.minLength = override.minLength;
    }
    if (override.maxLength !== undefined) {
      merged.maxLength = override.maxLength;
    }
    if (override.pattern !== undefined) {
      merged.pattern = override.pattern;
    }
    if (override.enum !== undefined) {
      merged.enum = override.enum;
    }
    if (override.allowEmpty !== undefined) {
      merged.allowEmpty = override.allowEmpty;
    }

    if (override.required !== undefined) {
      merged.required = override.required;
    }
    if (override.conditions !== undefined) {
      merged.conditions = override.conditions;
    }

    if (override.properties) {
      merged.properties = this.mergeProperties(base.properties, override.properties);
    }
    if (override.items) {
      merged.items = override.items;
    }

    return merged;
  }

  private mergeProperties(base: SpecOverrides | undefined, override: SpecOverrides): SpecOverrides {
    const entries = new Map<string, Spec>(base ? Object.entries(base) : []);

    for (const [name, overrideSpec] of Object.entries(override)) {
      const existing = getOwn(base, name);
      entries.set(name, existing ? this.merge(existing, overrideSpec) : overrideSpec);
    }

    return Object.fromEntries(entries);
  }
}

const defaultMerger = new SpecMerger();

/**
 * Convenience function for one-off merges.
 */
export function mergeSpecs(base: Spec, override: Spec): Spec {
  return defaultMerger.merge(base, override);
}
