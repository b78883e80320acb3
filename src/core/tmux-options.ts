/**
 * Parsing for values read from the tmux option store.
 */
import { DEFAULT_SETTINGS, OPTION_PREFIX, type FlashSettings, type PromptPosition } from './config';

export type OptionMap = ReadonlyMap<string, string>;

const TRUE_VALUES = new Set(['on', 'true', '1', 'yes']);

/**
 * Decode the body of a double-quoted tmux value.
 */
export function unescapeTmuxString(value: string): string {
  let output = '';

  for (let i = 0; i < value.length; i++) {
    const char = value[i];
    if (char !== '\\') {
      output += char;
      continue;
    }

    const next = value[i + 1];
    if (next === undefined) {
      output += '\\';
      continue;
    }

    switch (next) {
      case 'n':
        output += '\n';
        i++;
        break;
      case 'r':
        output += '\r';
        i++;
        break;
      case 't':
        output += '\t';
        i++;
        break;
      case 'e':
        output += '\x1b';
        i++;
        break;
      case 'x': {
        const hex = value.slice(i + 2, i + 4);
        if (/^[0-9a-fA-F]{2}$/.test(hex)) {
          output += String.fromCharCode(Number.parseInt(hex, 16));
          i += 3;
        } else {
          output += 'x';
          i++;
        }
        break;
      }
      case 'u': {
        const hex = value.slice(i + 2, i + 6);
        if (/^[0-9a-fA-F]{4}$/.test(hex)) {
          output += String.fromCharCode(Number.parseInt(hex, 16));
          i += 5;
        } else {
          output += 'u';
          i++;
        }
        break;
      }
      default: {
        const octal = /^[0-7]{1,3}/.exec(value.slice(i + 1));
        if (octal) {
          output += String.fromCharCode(Number.parseInt(octal[0], 8));
          i += octal[0].length;
        } else {
          output += next;
          i++;
        }
        break;
      }
    }
  }

  return output;
}

/**
 * Strip surrounding quotes and decode escapes. Unquoted values pass through.
 */
export function decodeOptionValue(raw: string): string {
  const value = raw.trim();
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return unescapeTmuxString(value.slice(1, -1));
  }
  if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Parse `tmux show-options` output: one `name value` pair per line.
 * Lines without a value are skipped.
 */
export function parseOptionLines(output: string): Map<string, string> {
  const options = new Map<string, string>();
  for (const line of output.split(/\r?\n/)) {
    const space = line.indexOf(' ');
    if (space <= 0) continue;
    options.set(line.slice(0, space), decodeOptionValue(line.slice(space + 1)));
  }
  return options;
}

export function parseBool(value: string): boolean {
  return TRUE_VALUES.has(value.trim().toLowerCase());
}

export function parseChoice<T extends string>(value: string, choices: readonly T[]): T | null {
  const lowered = value.trim().toLowerCase();
  return choices.find((choice) => choice.toLowerCase() === lowered) ?? null;
}

export function parseInteger(value: string): number | null {
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return null;
  return Number.parseInt(trimmed, 10);
}

function readBool(options: OptionMap, name: string, fallback: boolean): boolean {
  const value = options.get(OPTION_PREFIX + name);
  return value ? parseBool(value) : fallback;
}

function readString(options: OptionMap, name: string, fallback: string): string {
  return options.get(OPTION_PREFIX + name) ?? fallback;
}

function readNonEmpty(options: OptionMap, name: string, fallback: string): string {
  const value = options.get(OPTION_PREFIX + name);
  return value ? value : fallback;
}

function readInteger(options: OptionMap, name: string, fallback: number): number {
  const value = options.get(OPTION_PREFIX + name);
  if (!value) return fallback;
  return parseInteger(value) ?? fallback;
}

function readChoice<T extends string>(
  options: OptionMap,
  name: string,
  choices: readonly T[],
  fallback: T
): T {
  const value = options.get(OPTION_PREFIX + name);
  if (!value) return fallback;
  return parseChoice(value, choices) ?? fallback;
}

/**
 * Raw `word-separators` output from `show-window-options -g[v]`.
 * Accepts the bare value, `"quoted"` or `word-separators "quoted"`.
 * Spaces inside the value are significant.
 */
export function decodeWordSeparators(raw: string): string | null {
  let output = raw.replace(/[\r\n]+$/, '');
  if (!output) return null;

  if (output.startsWith('word-separators')) {
    const rest = output.slice('word-separators'.length);
    if (!rest.startsWith(' ')) return rest ? output : null;
    output = rest.slice(1);
    if (!output) return null;
  }

  if (output.startsWith('"')) {
    if (output.length > 1 && output.endsWith('"')) {
      const decoded = unescapeTmuxString(output.slice(1, -1));
      return decoded ? decoded : null;
    }
    return null;
  }

  return output;
}

/**
 * Custom override first, then tmux's own `word-separators` window option.
 */
export function resolveWordSeparators(
  globalOptions: OptionMap,
  windowOptions: OptionMap
): string | null {
  const custom = globalOptions.get(`${OPTION_PREFIX}word-separators`);
  if (custom) return custom;
  const builtin = windowOptions.get('word-separators');
  return builtin ? builtin : null;
}

const PROMPT_POSITIONS: readonly PromptPosition[] = ['top', 'bottom'];

/**
 * Resolve settings from the global and window option maps.
 */
export function resolveSettings(
  globalOptions: OptionMap,
  windowOptions: OptionMap = new Map()
): FlashSettings {
  const defaults = DEFAULT_SETTINGS;
  return {
    reverseSearch: readBool(globalOptions, 'reverse-search', defaults.reverseSearch),
    caseSensitive: readBool(globalOptions, 'case-sensitive', defaults.caseSensitive),
    wordSeparators: resolveWordSeparators(globalOptions, windowOptions),
    labelCharacters: readNonEmpty(globalOptions, 'label-characters', defaults.labelCharacters),
    autoPaste: readBool(globalOptions, 'auto-paste', defaults.autoPaste),
    promptPosition: readChoice(globalOptions, 'prompt-position', PROMPT_POSITIONS, defaults.promptPosition),
    promptIndicator: readString(globalOptions, 'prompt-indicator', defaults.promptIndicator),
    promptPlaceholderText: readString(globalOptions, 'prompt-placeholder-text', defaults.promptPlaceholderText),
    promptColour: readString(globalOptions, 'prompt-colour', defaults.promptColour),
    highlightColour: readString(globalOptions, 'highlight-colour', defaults.highlightColour),
    labelColour: readString(globalOptions, 'label-colour', defaults.labelColour),
    idleTimeout: readInteger(globalOptions, 'idle-timeout', defaults.idleTimeout),
    idleWarning: readInteger(globalOptions, 'idle-warning', defaults.idleWarning),
    debug: readBool(globalOptions, 'debug', defaults.debug),
  };
}
