import type { Relation } from "~/types";

export const VERSION_SEPARATOR = ".";

function splitParts(s: string): string[] {
  return s.split(VERSION_SEPARATOR);
}

/**
 * Orders two version parts by length first, then lexically.
 * For canonical non-negative integers without leading zeros this is numeric order, with no parsing
 * involved; anything else (e.g. "rc1") falls back to plain lexical order among parts of equal length.
 */
export function compareParts(a: string, b: string): number {
  if (a.length !== b.length) {
    return a.length < b.length ? -1 : 1;
  }
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * Returns the prefix relation of version a (first argument) to version b (second argument).
 * @returns "sub" if b is a strict dot-prefix of a ("1.12.0" vs "1.12").
 *          "super" if a is a strict dot-prefix of b ("1.12" vs "1.12.0").
 *          "different" as soon as any compared part differs ("1.9" vs "1.10").
 *          "equal" if every part matches.
 */
export function relationTo(a: string, b: string): Relation {
  const [pa, pb] = [splitParts(a), splitParts(b)];

  for (let i = 0; ; i++) {
    if (i >= pa.length && i >= pb.length) {
      return "equal";
    } else if (i >= pb.length) {
      return "sub";
    } else if (i >= pa.length) {
      return "super";
    } else if (pa[i] !== pb[i]) {
      return "different";
    }
  }
}

export function isSubVersionOf(a: string, b: string): boolean {
  const relation = relationTo(a, b);
  return relation === "equal" || relation === "sub";
}

/**
 * Total order over version strings. Parts are compared pairwise up to the shorter length, so a version
 * and any of its refinements compare as equal ("1.12" vs "1.12.0.7192"). Callers taking a maximum
 * have to live with that tie.
 */
export function versionOrd(a: string, b: string): number {
  const [pa, pb] = [splitParts(a), splitParts(b)];
  const length = Math.min(pa.length, pb.length);

  for (let i = 0; i < length; i++) {
    const ord = compareParts(pa[i], pb[i]);
    if (ord !== 0) {
      return ord;
    }
  }

  return 0;
}

/**
 * Picks the maximum item by {@link versionOrd} of its key. Among tied items the last one wins.
 */
export function maxByVersion<T>(items: Iterable<T>, key: (item: T) => string): T | null {
  let best: T | null = null;
  for (const item of items) {
    if (best === null || versionOrd(key(item), key(best)) >= 0) {
      best = item;
    }
  }
  return best;
}
