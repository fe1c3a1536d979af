/** Version this client was written against. */
export const DEFAULT_API_VERSION = '1.47';

/** Last API version that predates version negotiation on the daemon side. */
export const LEGACY_FLOOR_API_VERSION = '1.24';

/**
 * Strips the optional leading "v" marker and surrounding whitespace.
 * Returns an empty string for unset input.
 */
export function normalizeVersion(input?: string | null): string {
  const trimmed = (input ?? '').trim();
  return trimmed.startsWith('v') ? trimmed.slice(1) : trimmed;
}

/**
 * API version value. Keeps the normalized text for the wire and numeric
 * segments for ordering, so "1.9" sorts before "1.10".
 *
 * No validation happens beyond normalization: a manually configured
 * "something-weird" is kept as is and its non-numeric segments compare as 0.
 */
export class ApiVersion {
  private readonly segments: number[];

  private constructor(readonly value: string) {
    this.segments = value.split('.').map((part) => {
      const parsed = Number.parseInt(part, 10);
      return Number.isNaN(parsed) ? 0 : parsed;
    });
  }

  /** Returns undefined when the input is unset (empty or a bare "v"). */
  static parse(input?: string | null): ApiVersion | undefined {
    const normalized = normalizeVersion(input);
    return normalized ? new ApiVersion(normalized) : undefined;
  }

  static of(input: string): ApiVersion {
    const parsed = ApiVersion.parse(input);
    if (!parsed) {
      throw new Error(`invalid API version \`${input}\``);
    }
    return parsed;
  }

  get major(): number {
    return this.segments[0] ?? 0;
  }

  get minor(): number {
    return this.segments[1] ?? 0;
  }

  compare(other: ApiVersion): -1 | 0 | 1 {
    const length = Math.max(this.segments.length, other.segments.length);
    for (let i = 0; i < length; i += 1) {
      const a = this.segments[i] ?? 0;
      const b = other.segments[i] ?? 0;
      if (a < b) return -1;
      if (a > b) return 1;
    }
    return 0;
  }

  lessThan(other: ApiVersion): boolean {
    return this.compare(other) < 0;
  }

  equals(other: ApiVersion): boolean {
    return this.compare(other) === 0;
  }

  toString(): string {
    return this.value;
  }
}

export function minVersion(a: ApiVersion, b: ApiVersion): ApiVersion {
  return b.lessThan(a) ? b : a;
}
