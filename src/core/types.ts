/**
 * Core type definitions for the match index and label engine
 */

/** Options fixed when the index is built */
export interface SearchOptions {
  /** Match case exactly instead of folding to lower case */
  caseSensitive: boolean;

  /**
   * Characters that delimit the word to copy inside a token.
   * `null` (or an empty string) copies the whole token.
   */
  wordSeparators: string | null;
}

/** Options fixed for one search session */
export interface QueryOptions {
  /** Give bottom-most occurrences the first labels */
  reverseOrder: boolean;

  /** Label characters in priority order */
  labelAlphabet: string;
}

/**
 * A maximal run of non-whitespace characters in the captured text.
 * Offsets are positions in the text with lines joined by `\n`.
 */
export interface CandidateUnit {
  readonly text: string;
  /** Word to copy when no occurrence position is known */
  readonly copyText: string;
  readonly startOffset: number;
  readonly endOffset: number;
  /** Zero-based line index */
  readonly line: number;
  /** Column in `line` where `text` begins */
  readonly column: number;
}

/**
 * One located occurrence of the query inside a candidate unit
 */
export interface Occurrence extends CandidateUnit {
  /** Start of the query inside `text` */
  readonly matchStart: number;
  /** End of the query inside `text` (exclusive) */
  readonly matchEnd: number;
  /** Selection key, or null when the label pool ran out */
  readonly label: string | null;
}

/** Occurrence before label assignment */
export type UnlabeledOccurrence = Omit<Occurrence, 'label'>;

/** Maps text onto the form used for keys and comparisons */
export type Normalizer = (value: string) => string;
