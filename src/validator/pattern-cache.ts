import { SpecDefinitionError } from '../errors/spec-error';
import { describeError } from '../errors/utils';

/**
 * Bounded cache of compiled `pattern` constraints, least recently used entry
 * evicted first. Compile failures are cached too.
 */
export class PatternCache {
  private readonly entries = new Map<string, RegExp | SpecDefinitionError>();

  constructor(private readonly maxSize: number) {}

  get size(): number {
    return this.entries.size;
  }

  /**
   * @throws SpecDefinitionError when the pattern is not a valid regular expression
   */
  compile(pattern: string): RegExp {
    const cached = this.entries.get(pattern);
    if (cached !== undefined) {
      this.entries.delete(pattern);
      this.entries.set(pattern, cached);
      return this.unwrap(cached);
    }

    const compiled = PatternCache.build(pattern);
    if (this.maxSize > 0) {
      this.entries.set(pattern, compiled);
      if (this.entries.size > this.maxSize) {
        const oldest = this.entries.keys().next();
        if (!oldest.done) {
          this.entries.delete(oldest.value);
        }
      }
    }
    return this.unwrap(compiled);
  }

  private unwrap(entry: RegExp | SpecDefinitionError): RegExp {
    if (entry instanceof SpecDefinitionError) {
      throw entry;
    }
    return entry;
  }

  private static build(pattern: string): RegExp | SpecDefinitionError {
    try {
      return new RegExp(pattern);
    } catch (error) {
      return new SpecDefinitionError(describeError(error), {
        code: 'SPEC_PATTERN_INVALID',
        cause: error,
        context: { data: { pattern } },
      });
    }
  }
}
