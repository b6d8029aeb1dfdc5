/**
 * Expected HTTP status matcher.
 *
 * A pattern is a comma separated list of tokens, each one of:
 * - an exact code: `403`
 * - a status class: `2xx`
 * - an inclusive range: `200-299`
 */
export class StatusPattern {
  private constructor(
    private readonly source: string,
    private readonly ranges: ReadonlyArray<readonly [number, number]>
  ) {}

  static parse(pattern: string): StatusPattern {
    const tokens = pattern
      .split(',')
      .map(token => token.trim().toLowerCase())
      .filter(Boolean);

    if (tokens.length === 0) {
      throw new Error(`Empty status pattern: '${pattern}'`);
    }

    const ranges = tokens.map(token => StatusPattern.parseToken(token, pattern));
    return new StatusPattern(pattern.trim(), ranges);
  }

  /**
   * Returns an error message when the pattern is malformed, otherwise null.
   */
  static validate(pattern: string): string | null {
    try {
      StatusPattern.parse(pattern);
      return null;
    } catch (error) {
      return error instanceof Error ? error.message : String(error);
    }
  }

  private static parseToken(token: string, pattern: string): readonly [number, number] {
    const classMatch = token.match(/^([1-5])xx$/);
    if (classMatch) {
      const base = Number(classMatch[1]) * 100;
      return [base, base + 99];
    }

    const rangeMatch = token.match(/^(\d{3})-(\d{3})$/);
    if (rangeMatch) {
      const low = Number(rangeMatch[1]);
      const high = Number(rangeMatch[2]);
      if (low > high) {
        throw new Error(`Invalid status range '${token}' in pattern '${pattern}'`);
      }
      return [low, high];
    }

    if (/^\d{3}$/.test(token)) {
      const code = Number(token);
      return [code, code];
    }

    throw new Error(`Invalid status token '${token}' in pattern '${pattern}'`);
  }

  matches(status: number): boolean {
    return this.ranges.some(([low, high]) => status >= low && status <= high);
  }

  toString(): string {
    return this.source;
  }
}
