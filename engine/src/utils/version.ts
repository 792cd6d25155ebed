/**
 * tcsetup Engine - Version Ordering
 *
 * Version-aware comparison for Tomcat release strings
 * ("9.0.98", "10.1.50", "11.0.0-M1").
 *
 * Numeric segments compare as numbers, so "9.10.1" sorts after "9.9.5".
 * When the numeric parts are equal a bare release sorts BEFORE a suffixed
 * one ("11.0.0" < "11.0.0-M1"), matching `sort -V`, and two suffixes
 * compare lexically.
 */

export interface VersionParts {
  /** Numeric dot-separated segments */
  segments: number[];
  /** Text after the first "-", or "" */
  suffix: string;
  /** Input after trimming and dropping a leading "v" */
  normalized: string;
}

/**
 * Strip a leading "v"/"V" and surrounding whitespace.
 *
 *   "v10.1.50"  → "10.1.50"
 *   " 9.0.1 "   → "9.0.1"
 */
export function normalizeVersion(version: string): string {
  return version.trim().replace(/^[vV]/, "");
}

/**
 * Parse a release string. Returns null when the numeric part is not
 * dot-separated digits.
 */
export function parseVersion(version: string): VersionParts | null {
  const normalized = normalizeVersion(version);
  const dash = normalized.indexOf("-");
  const numeric = dash === -1 ? normalized : normalized.slice(0, dash);
  const suffix = dash === -1 ? "" : normalized.slice(dash + 1);

  if (!/^\d+(\.\d+)*$/.test(numeric)) return null;

  return {
    segments: numeric.split(".").map((s) => parseInt(s, 10)),
    suffix,
    normalized,
  };
}

/**
 * Compare two release strings.
 *
 * Returns -1, 0 or 1. Unparseable input sorts before any parseable
 * version and unparseable values compare lexically among themselves.
 */
export function compareVersions(a: string, b: string): -1 | 0 | 1 {
  const pa = parseVersion(a);
  const pb = parseVersion(b);

  if (!pa || !pb) {
    if (pa) return 1;
    if (pb) return -1;
    return a < b ? -1 : a > b ? 1 : 0;
  }

  const len = Math.max(pa.segments.length, pb.segments.length);
  for (let i = 0; i < len; i++) {
    const va = pa.segments[i] ?? 0;
    const vb = pb.segments[i] ?? 0;
    if (va !== vb) return va > vb ? 1 : -1;
  }

  if (pa.suffix === pb.suffix) return 0;
  if (pa.suffix === "") return -1;
  if (pb.suffix === "") return 1;
  return pa.suffix < pb.suffix ? -1 : 1;
}

/**
 * Sort ascending without mutating the input.
 */
export function sortVersions(versions: readonly string[]): string[] {
  return [...versions].sort(compareVersions);
}

/**
 * Highest version in the list, or undefined when empty.
 */
export function latestVersion(versions: readonly string[]): string | undefined {
  const sorted = sortVersions(versions);
  return sorted[sorted.length - 1];
}
