/**
 * Tokenizer for captured pane text.
 *
 * Searchable units are always whitespace-delimited. The separator set only
 * decides which part of a unit is copied.
 */

export type WordSpan = {
  text: string;
  start: number;
  end: number;
};

export interface Tokenizer {
  /** Separator set in effect, null when whole units are copied */
  readonly separators: string | null;
  /** Maximal non-whitespace runs in one line */
  units: (line: string) => WordSpan[];
  /** Separator-delimited sub-words of one unit */
  words: (unit: string) => WordSpan[];
  /** Copy text for a unit without a match position */
  defaultCopyText: (unit: string) => string;
  /** Copy text for a match starting at `position` inside `unit` */
  copyTextAt: (unit: string, position: number) => string;
}

const CHAR_CLASS_SPECIALS = /[\\\]\[^-]/g;

function escapeForCharClass(chars: string): string {
  return chars.replace(CHAR_CLASS_SPECIALS, '\\$&');
}

function collectSpans(pattern: RegExp, text: string): WordSpan[] {
  const spans: WordSpan[] = [];
  pattern.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(text)) !== null) {
    spans.push({ text: match[0], start: match.index, end: match.index + match[0].length });
  }
  return spans;
}

function longest(spans: WordSpan[]): WordSpan | null {
  let best: WordSpan | null = null;
  for (const span of spans) {
    if (!best || span.text.length > best.text.length) {
      best = span;
    }
  }
  return best;
}

/**
 * Build a tokenizer for one index. Patterns live only as long as the
 * tokenizer, so a changed separator set never sees a stale pattern.
 */
export function createTokenizer(wordSeparators: string | null | undefined): Tokenizer {
  const separators = wordSeparators ? wordSeparators : null;
  const unitPattern = /\S+/g;
  const wordPattern = separators
    ? new RegExp(`[^${escapeForCharClass(separators)}]+`, 'gu')
    : null;

  const units = (line: string): WordSpan[] => collectSpans(unitPattern, line);

  const words = (unit: string): WordSpan[] => {
    if (!wordPattern) {
      return unit ? [{ text: unit, start: 0, end: unit.length }] : [];
    }
    return collectSpans(wordPattern, unit);
  };

  const defaultCopyText = (unit: string): string => {
    if (!wordPattern) return unit;
    return longest(words(unit))?.text ?? unit;
  };

  const copyTextAt = (unit: string, position: number): string => {
    if (!wordPattern) return unit;
    const spans = words(unit);
    // The word holding the match wins, then the first word after it
    for (const span of spans) {
      if ((span.start <= position && position < span.end) || span.start > position) {
        return span.text;
      }
    }
    return longest(spans)?.text ?? unit;
  };

  return { separators, units, words, defaultCopyText, copyTextAt };
}
