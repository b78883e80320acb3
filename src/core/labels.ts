/**
 * Label assignment for search occurrences
 */
import type { Normalizer, Occurrence, UnlabeledOccurrence } from './types';

/** Home row first, then the rest of the keyboard, lower case before upper */
export const DEFAULT_LABEL_ALPHABET =
  'asdfghjklqwertyuiopzxcvbnmASDFGHJKLQWERTYUIOPZXCVBNM';

function charSet(text: string, normalize: Normalizer): Set<string> {
  return new Set(Array.from(normalize(text)));
}

/**
 * Characters that would extend a match if typed next.
 * A label equal to one of these could mean "select" or "keep typing".
 */
export function continuationChars(
  occurrences: readonly UnlabeledOccurrence[],
  normalize: Normalizer
): Set<string> {
  const chars = new Set<string>();
  for (const occurrence of occurrences) {
    const next = occurrence.text.codePointAt(occurrence.matchEnd);
    if (next !== undefined) {
      chars.add(normalize(String.fromCodePoint(next)));
    }
  }
  return chars;
}

/**
 * Assign labels in priority order.
 *
 * A label is never a query character, a continuation character or a
 * character of the occurrence's own text, and is used at most once.
 */
export function assignLabels(
  occurrences: readonly UnlabeledOccurrence[],
  query: string,
  alphabet: string,
  normalize: Normalizer
): Occurrence[] {
  const pool = Array.from(alphabet || DEFAULT_LABEL_ALPHABET);
  const banned = charSet(query, normalize);
  for (const char of continuationChars(occurrences, normalize)) {
    banned.add(char);
  }

  const used = new Set<string>();

  return occurrences.map((occurrence) => {
    const own = charSet(occurrence.text, normalize);
    const label = pool.find((candidate) => {
      if (used.has(candidate)) return false;
      const folded = normalize(candidate);
      return !banned.has(folded) && !own.has(folded);
    }) ?? null;

    if (label !== null) {
      used.add(label);
    }
    return { ...occurrence, label };
  });
}
