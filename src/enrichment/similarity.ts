/**
 * String similarity used to rank UNII candidates against a record name.
 */

/**
 * Characters of `a` that match a not-yet-used character of `b` within the
 * match window, in the order of `a`, and the matched positions in `b`.
 */
function matchWithin(a: string, b: string, window: number): { chars: string[]; positions: number[] } {
  const used = new Set<number>();
  const chars: string[] = [];

  for (let i = 0; i < a.length; i++) {
    const ch = a.charAt(i);
    const last = Math.min(b.length - 1, i + window);
    for (let j = Math.max(0, i - window); j <= last; j++) {
      if (!used.has(j) && b.charAt(j) === ch) {
        used.add(j);
        chars.push(ch);
        break;
      }
    }
  }

  return { chars, positions: [...used].sort((x, y) => x - y) };
}

/**
 * Jaro similarity in [0, 1].
 */
function jaro(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length === 0 || b.length === 0) return 0;

  const window = Math.max(0, Math.floor(Math.max(a.length, b.length) / 2) - 1);
  const { chars, positions } = matchWithin(a, b, window);
  const m = chars.length;
  if (m === 0) return 0;

  // Matched characters that differ in order count as half a transposition each.
  const outOfOrder = chars.filter((ch, k) => ch !== b.charAt(positions[k] ?? -1)).length;

  return (m / a.length + m / b.length + (m - outOfOrder / 2) / m) / 3;
}

/**
 * Jaro-Winkler similarity in [0, 1]; a shared prefix of up to four
 * characters raises the score.
 *
 * @example
 *   jaroWinkler("martha", "marhta") // ≈ 0.961
 */
export function jaroWinkler(a: string, b: string, prefixScale = 0.1): number {
  const similarity = jaro(a, b);

  let prefix = 0;
  while (prefix < Math.min(4, a.length, b.length) && a.charAt(prefix) === b.charAt(prefix)) {
    prefix++;
  }

  return similarity + prefix * prefixScale * (1 - similarity);
}
