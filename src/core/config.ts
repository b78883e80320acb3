/**
 * Settings for a paneflash session
 */
import { DEFAULT_LABEL_ALPHABET } from './labels';

export type PromptPosition = 'top' | 'bottom';

export interface FlashSettings {
  /** Give bottom-most occurrences the first labels */
  reverseSearch: boolean;
  caseSensitive: boolean;
  /** Null copies whole whitespace-delimited tokens */
  wordSeparators: string | null;
  labelCharacters: string;

  /** `;` and `:` arm auto-paste while held */
  autoPaste: boolean;

  promptPosition: PromptPosition;
  promptIndicator: string;
  promptPlaceholderText: string;

  /** SGR sequences */
  promptColour: string;
  highlightColour: string;
  labelColour: string;

  /** Seconds without input before the popup closes */
  idleTimeout: number;
  /** Seconds before the timeout when the warning appears */
  idleWarning: number;

  debug: boolean;
}

export const DEFAULT_SETTINGS: FlashSettings = {
  reverseSearch: true,
  caseSensitive: false,
  wordSeparators: null,
  labelCharacters: DEFAULT_LABEL_ALPHABET,
  autoPaste: true,
  promptPosition: 'bottom',
  promptIndicator: '>',
  promptPlaceholderText: 'search...',
  promptColour: '\x1b[1m',
  highlightColour: '\x1b[1;33m',
  labelColour: '\x1b[1;32m',
  idleTimeout: 15,
  idleWarning: 5,
  debug: false,
};

/** Prefix of every user option in the tmux option store */
export const OPTION_PREFIX = '@paneflash-';
