/**
 * Search session state machine.
 *
 * Turns decoded keys into query edits and selections. The occurrence list is
 * always recomputed from (index, query); nothing else carries over.
 */
import {
  DEFAULT_QUERY_OPTIONS,
  lookupByLabel,
  queryMatchIndex,
  type MatchIndex,
} from './match-index';
import type { Occurrence, QueryOptions } from './types';

export type SessionKey =
  | { kind: 'char'; char: string }
  | { kind: 'enter' }
  | { kind: 'backspace' }
  | { kind: 'deleteWord' }
  | { kind: 'clear' }
  | { kind: 'escape' }
  | { kind: 'interrupt' };

export interface SearchSession {
  readonly index: MatchIndex;
  readonly options: QueryOptions;
  /** `;` and `:` arm auto-paste instead of being typed */
  readonly autoPasteEnabled: boolean;
  readonly query: string;
  readonly occurrences: readonly Occurrence[];
  readonly autoPasteArmed: boolean;
}

export type SessionOutcome =
  | { kind: 'continue'; session: SearchSession }
  | { kind: 'selected'; occurrence: Occurrence; text: string; paste: boolean; via: 'enter' | 'label' }
  | { kind: 'cancelled'; reason: 'escape' | 'interrupt' };

export const AUTO_PASTE_MODIFIERS: ReadonlySet<string> = new Set([';', ':']);

const WORD_DELIMITERS = new Set(Array.from(' \t-_.,;:!?/\\()[]{}'));

/**
 * Delete backwards to the previous word boundary.
 * Trailing whitespace goes first, then a delimiter run, then the word.
 */
export function deleteWordBackward(query: string): string {
  const trimmed = query.trimEnd();
  if (!trimmed) return trimmed;

  let i = trimmed.length - 1;
  if (WORD_DELIMITERS.has(trimmed[i])) {
    while (i >= 0 && WORD_DELIMITERS.has(trimmed[i])) i--;
  }
  while (i >= 0 && !WORD_DELIMITERS.has(trimmed[i])) i--;
  return trimmed.slice(0, i + 1);
}

/** Drop the last code point */
export function deleteCharBackward(query: string): string {
  const chars = Array.from(query);
  chars.pop();
  return chars.join('');
}

export function createSearchSession(
  index: MatchIndex,
  options: Partial<QueryOptions> = {},
  autoPasteEnabled = true
): SearchSession {
  return {
    index,
    options: {
      reverseOrder: options.reverseOrder ?? DEFAULT_QUERY_OPTIONS.reverseOrder,
      labelAlphabet: options.labelAlphabet || DEFAULT_QUERY_OPTIONS.labelAlphabet,
    },
    autoPasteEnabled,
    query: '',
    occurrences: [],
    autoPasteArmed: false,
  };
}

function withQuery(session: SearchSession, query: string, autoPasteArmed: boolean): SessionOutcome {
  return {
    kind: 'continue',
    session: {
      ...session,
      query,
      occurrences: queryMatchIndex(session.index, query, session.options),
      autoPasteArmed,
    },
  };
}

function select(
  session: SearchSession,
  occurrence: Occurrence,
  via: 'enter' | 'label'
): SessionOutcome {
  return {
    kind: 'selected',
    occurrence,
    text: occurrence.copyText,
    paste: session.autoPasteArmed,
    via,
  };
}

/**
 * Apply one key to the session.
 */
export function applyKey(session: SearchSession, key: SessionKey): SessionOutcome {
  switch (key.kind) {
    case 'interrupt':
      return { kind: 'cancelled', reason: 'interrupt' };

    case 'escape':
      // Escape is easy to hit while holding the modifier
      if (session.autoPasteArmed) {
        return { kind: 'continue', session };
      }
      return { kind: 'cancelled', reason: 'escape' };

    case 'clear':
      return withQuery(session, '', false);

    case 'deleteWord':
      return withQuery(session, deleteWordBackward(session.query), false);

    case 'backspace':
      if (!session.query) {
        return { kind: 'continue', session: { ...session, autoPasteArmed: false } };
      }
      return withQuery(session, deleteCharBackward(session.query), false);

    case 'enter': {
      const head = session.occurrences[0];
      if (!head) return { kind: 'continue', session };
      return select(session, head, 'enter');
    }

    case 'char': {
      if (session.autoPasteEnabled && AUTO_PASTE_MODIFIERS.has(key.char)) {
        return { kind: 'continue', session: { ...session, autoPasteArmed: true } };
      }
      // The first typed character is always part of the query
      if (session.query && session.occurrences.length > 0) {
        const labeled = lookupByLabel(session.occurrences, key.char);
        if (labeled) {
          return select(session, labeled, 'label');
        }
      }
      return withQuery(session, session.query + key.char, session.autoPasteArmed);
    }
  }
}
