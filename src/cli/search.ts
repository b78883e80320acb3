/**
 * `paneflash search`: run one query over text and print the occurrences.
 */
import { buildMatchIndex, queryMatchIndex } from '../core/match-index';
import type { Occurrence } from '../core/types';
import { stripAnsi } from '../terminal/ansi';

/** One occurrence as printed, label first */
export interface SearchHit {
  label: string | null;
  text: string;
  copyText: string;
  line: number;
  column: number;
  matchStart: number;
  matchEnd: number;
  startOffset: number;
  endOffset: number;
}

export interface SearchCommandOptions {
  query: string;
  caseSensitive: boolean;
  separators: string | null;
  labels: string | null;
  topFirst: boolean;
}

export function toSearchHit(occurrence: Occurrence): SearchHit {
  return {
    label: occurrence.label,
    text: occurrence.text,
    copyText: occurrence.copyText,
    line: occurrence.line,
    column: occurrence.column,
    matchStart: occurrence.matchStart,
    matchEnd: occurrence.matchEnd,
    startOffset: occurrence.startOffset,
    endOffset: occurrence.endOffset,
  };
}

export function searchText(text: string, options: SearchCommandOptions): SearchHit[] {
  const index = buildMatchIndex(stripAnsi(text), {
    caseSensitive: options.caseSensitive,
    wordSeparators: options.separators,
  });
  const occurrences = queryMatchIndex(index, options.query, {
    reverseOrder: !options.topFirst,
    ...(options.labels ? { labelAlphabet: options.labels } : {}),
  });
  return occurrences.map(toSearchHit);
}

export function formatSearchHits(hits: readonly SearchHit[]): string {
  return JSON.stringify(hits, null, 2);
}
