/**
 * Version Ordering
 *
 * Loose ordering for conda and pip version strings. Only what package
 * specifications need: exact equality, ordering comparisons, prefix
 * ("fuzzy") matching and glob patterns.
 *
 * @module packages/core/domain/version
 */

type Component = number | string;

/** Split a version into comparable components */
function components(version: string): Component[] {
  const parts = version.trim().toLowerCase().match(/\d+|[a-z]+/g) ?? [];
  return parts.map((part) => (/^\d+$/.test(part) ? Number(part) : part));
}

/**
 * Ordering class of a component:
 * "dev" < other strings < numbers < "post"
 */
function rank(component: Component): number {
  if (typeof component === 'number') return 2;
  if (component === 'dev') return 0;
  if (component === 'post') return 3;
  return 1;
}

function compareComponent(a: Component, b: Component): number {
  const byRank = rank(a) - rank(b);
  if (byRank !== 0) {
    return byRank;
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const left = String(a);
  const right = String(b);
  return left === right ? 0 : left < right ? -1 : 1;
}

/**
 * Compare two version strings: -1 (a<b), 0 (a==b), 1 (a>b)
 *
 * Missing trailing components count as 0, so "1.2" equals "1.2.0",
 * "1.0a1" orders before "1.0" and "1.0.post1" after it.
 */
export function compareVersions(a: string, b: string): -1 | 0 | 1 {
  const left = components(a);
  const right = components(b);
  const length = Math.max(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const result = compareComponent(left[i] ?? 0, right[i] ?? 0);
    if (result !== 0) {
      return result < 0 ? -1 : 1;
    }
  }
  return 0;
}

/**
 * True when `version` equals `base` or extends it with further segments.
 *
 * @example
 * startsWithVersion('1.2.3', '1.2')  // true
 * startsWithVersion('1.20', '1.2')   // false
 */
export function startsWithVersion(version: string, base: string): boolean {
  const prefix = components(base);
  const actual = components(version);
  if (prefix.length === 0) {
    return true;
  }
  if (actual.length < prefix.length) {
    return compareVersions(version, base) === 0;
  }
  return prefix.every((part, i) => compareComponent(part, actual[i] ?? 0) === 0);
}

/**
 * Build a matcher for a glob containing `*`
 */
export function globMatcher(pattern: string): (value: string) => boolean {
  const source = pattern
    .split('*')
    .map((literal) => literal.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  const regex = new RegExp(`^${source}$`);
  return (value) => regex.test(value);
}
