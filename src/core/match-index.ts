/**
 * Match index: tokenizes captured text once, then answers per-keystroke
 * queries with an ordered, labeled occurrence list.
 *
 * Everything here is pure. A query never mutates the index, so callers keep
 * the latest result themselves.
 */
import { DEFAULT_LABEL_ALPHABET, assignLabels } from './labels';
import { createTokenizer, type Tokenizer } from './tokenizer';
import type {
  CandidateUnit,
  Normalizer,
  Occurrence,
  QueryOptions,
  SearchOptions,
  UnlabeledOccurrence,
} from './types';

export interface MatchIndex {
  readonly options: Readonly<SearchOptions>;
  readonly tokenizer: Tokenizer;
  readonly normalize: Normalizer;
  /** Units keyed by normalized text, in order of first appearance */
  readonly entries: ReadonlyMap<string, readonly CandidateUnit[]>;
  /** Number of units indexed */
  readonly size: number;
}

export const DEFAULT_SEARCH_OPTIONS: SearchOptions = {
  caseSensitive: false,
  wordSeparators: null,
};

export const DEFAULT_QUERY_OPTIONS: QueryOptions = {
  reverseOrder: true,
  labelAlphabet: DEFAULT_LABEL_ALPHABET,
};

const identity: Normalizer = (value) => value;

// Per code point, so every folded unit can be traced back to its source character
const lowerCase: Normalizer = (value) =>
  Array.from(value, (char) => char.toLowerCase()).join('');

/** Single place where case sensitivity is decided */
export function createNormalizer(caseSensitive: boolean): Normalizer {
  return caseSensitive ? identity : lowerCase;
}

/**
 * Build an index over the whole source text.
 */
export function buildMatchIndex(
  sourceText: string,
  options: Partial<SearchOptions> = {}
): MatchIndex {
  const resolved: SearchOptions = {
    caseSensitive: options.caseSensitive ?? DEFAULT_SEARCH_OPTIONS.caseSensitive,
    wordSeparators: options.wordSeparators ? options.wordSeparators : null,
  };
  const tokenizer = createTokenizer(resolved.wordSeparators);
  const normalize = createNormalizer(resolved.caseSensitive);
  const entries = new Map<string, CandidateUnit[]>();
  let size = 0;

  if (sourceText.length > 0) {
    let lineOffset = 0;
    const lines = sourceText.split('\n');
    for (let line = 0; line < lines.length; line++) {
      const lineText = lines[line];
      for (const span of tokenizer.units(lineText)) {
        const unit: CandidateUnit = {
          text: span.text,
          copyText: tokenizer.defaultCopyText(span.text),
          startOffset: lineOffset + span.start,
          endOffset: lineOffset + span.end,
          line,
          column: span.start,
        };
        const key = normalize(span.text);
        const bucket = entries.get(key);
        if (bucket) {
          bucket.push(unit);
        } else {
          entries.set(key, [unit]);
        }
        size++;
      }
      lineOffset += lineText.length + 1;
    }
  }

  return { options: resolved, tokenizer, normalize, entries, size };
}

/**
 * Normalized text plus, for each of its UTF-16 units, the span of the source
 * character it came from. Folding can change length ('İ' becomes two units),
 * so match positions are mapped back through this before use.
 */
interface FoldedText {
  readonly text: string;
  readonly sourceStart: readonly number[];
  readonly sourceEnd: readonly number[];
}

function foldWithOffsets(text: string, normalize: Normalizer): FoldedText {
  let folded = '';
  const sourceStart: number[] = [];
  const sourceEnd: number[] = [];
  let offset = 0;
  for (const char of text) {
    const mapped = normalize(char);
    for (let i = 0; i < mapped.length; i++) {
      sourceStart.push(offset);
      sourceEnd.push(offset + char.length);
    }
    folded += mapped;
    offset += char.length;
  }
  return { text: folded, sourceStart, sourceEnd };
}

function occurrenceKey(occurrence: UnlabeledOccurrence): string {
  return `${occurrence.startOffset}\u0000${occurrence.matchStart}\u0000${occurrence.text}`;
}

/**
 * Find every occurrence of `query`, ordered by priority, without labels.
 */
export function findOccurrences(
  index: MatchIndex,
  query: string,
  reverseOrder: boolean
): UnlabeledOccurrence[] {
  if (!query) return [];

  const needle = index.normalize(query);
  const found: UnlabeledOccurrence[] = [];
  const seen = new Set<string>();

  for (const [key, units] of index.entries) {
    if (!key.includes(needle)) continue;

    for (const unit of units) {
      const haystack = foldWithOffsets(unit.text, index.normalize);
      let position = haystack.text.indexOf(needle);
      while (position !== -1) {
        const matchStart = haystack.sourceStart[position];
        const matchEnd = haystack.sourceEnd[position + needle.length - 1];
        const occurrence: UnlabeledOccurrence = {
          ...unit,
          copyText: index.tokenizer.copyTextAt(unit.text, matchStart),
          matchStart,
          matchEnd,
        };
        const dedupeKey = occurrenceKey(occurrence);
        if (!seen.has(dedupeKey)) {
          seen.add(dedupeKey);
          found.push(occurrence);
        }
        // Step by one so repeated-letter queries report every position
        position = haystack.text.indexOf(needle, position + 1);
      }
    }
  }

  found.sort((a, b) => a.startOffset - b.startOffset || a.matchStart - b.matchStart);
  if (reverseOrder) {
    found.reverse();
  }
  return found;
}

/**
 * Evaluate a query: ordered, de-duplicated and labeled occurrences.
 * Total for any input; an empty query yields an empty list.
 */
export function queryMatchIndex(
  index: MatchIndex,
  query: string,
  options: Partial<QueryOptions> = {}
): Occurrence[] {
  const reverseOrder = options.reverseOrder ?? DEFAULT_QUERY_OPTIONS.reverseOrder;
  const labelAlphabet = options.labelAlphabet || DEFAULT_QUERY_OPTIONS.labelAlphabet;
  const ordered = findOccurrences(index, query, reverseOrder);
  return assignLabels(ordered, query, labelAlphabet, index.normalize);
}

export function lookupByLabel(
  occurrences: readonly Occurrence[],
  label: string
): Occurrence | null {
  if (!label) return null;
  return occurrences.find((occurrence) => occurrence.label === label) ?? null;
}

export function occurrencesOnLine(
  occurrences: readonly Occurrence[],
  line: number
): Occurrence[] {
  return occurrences.filter((occurrence) => occurrence.line === line);
}

/**
 * Group occurrences by line for rendering.
 */
export function buildLineLookup(
  occurrences: readonly Occurrence[]
): Map<number, Occurrence[]> {
  const lookup = new Map<number, Occurrence[]>();
  for (const occurrence of occurrences) {
    const existing = lookup.get(occurrence.line) ?? [];
    existing.push(occurrence);
    lookup.set(occurrence.line, existing);
  }
  return lookup;
}
