import { type HelpTopic } from './help';
import { unescapeTmuxString } from '../core/tmux-options';

export type CliCommand =
  | { kind: 'help'; topic: HelpTopic }
  | { kind: 'version' }
  | { kind: 'run'; pane?: string }
  | { kind: 'interactive'; pane: string }
  | {
      kind: 'search';
      query: string;
      file?: string;
      caseSensitive: boolean;
      separators: string | null;
      labels: string | null;
      topFirst: boolean;
    };

export type ParseResult =
  | { ok: true; command: CliCommand }
  | { ok: false; error: string };

const HELP_FLAGS = new Set(['-h', '--help']);
const VERSION_FLAGS = new Set(['-v', '--version']);

function shouldShowHelp(args: string[]): boolean {
  if (args.length === 0) return false;
  if (args[0] === 'help') return true;
  return args.some((arg) => HELP_FLAGS.has(arg));
}

function resolveHelpTopic(args: string[]): HelpTopic {
  const tokens = args[0] === 'help' ? args.slice(1) : args;
  const first = tokens.find((arg) => !arg.startsWith('-'));

  if (first === 'run') return 'run';
  if (first === 'interactive') return 'interactive';
  if (first === 'search') return 'search';
  return 'root';
}

function readOptionValue(args: string[], index: number, flag: string): { value: string; nextIndex: number } | { error: string } {
  const arg = args[index];
  const eqIndex = arg.indexOf('=');
  if (eqIndex >= 0) {
    return { value: arg.slice(eqIndex + 1), nextIndex: index };
  }
  const next = args[index + 1];
  if (next === undefined) {
    return { error: `Missing value for ${flag}.` };
  }
  return { value: next, nextIndex: index + 1 };
}

function isFlag(arg: string, flag: string): boolean {
  return arg === flag || arg.startsWith(`${flag}=`);
}

function readPane(args: string[], index: number): { value: string; nextIndex: number } | { error: string } {
  const value = readOptionValue(args, index, '--pane');
  if ('error' in value) return value;
  if (!value.value.trim()) return { error: 'Pane id must not be empty.' };
  return value;
}

function parseRun(args: string[]): ParseResult {
  let pane: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (isFlag(arg, '--pane')) {
      const value = readPane(args, i);
      if ('error' in value) return { ok: false, error: value.error };
      pane = value.value;
      i = value.nextIndex;
      continue;
    }

    return { ok: false, error: `Unknown argument: ${arg}` };
  }

  return { ok: true, command: { kind: 'run', pane } };
}

function parseInteractive(args: string[]): ParseResult {
  let pane: string | null = null;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (isFlag(arg, '--pane')) {
      const value = readPane(args, i);
      if ('error' in value) return { ok: false, error: value.error };
      pane = value.value;
      i = value.nextIndex;
      continue;
    }

    return { ok: false, error: `Unknown argument: ${arg}` };
  }

  if (!pane) {
    return { ok: false, error: 'Missing --pane.' };
  }

  return { ok: true, command: { kind: 'interactive', pane } };
}

function parseSearch(args: string[]): ParseResult {
  let query: string | null = null;
  let file: string | undefined;
  let caseSensitive = false;
  let separators: string | null = null;
  let labels: string | null = null;
  let topFirst = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (isFlag(arg, '--query')) {
      const value = readOptionValue(args, i, '--query');
      if ('error' in value) return { ok: false, error: value.error };
      query = value.value;
      i = value.nextIndex;
      continue;
    }
    if (isFlag(arg, '--file')) {
      const value = readOptionValue(args, i, '--file');
      if ('error' in value) return { ok: false, error: value.error };
      file = value.value;
      i = value.nextIndex;
      continue;
    }
    if (isFlag(arg, '--separators')) {
      const value = readOptionValue(args, i, '--separators');
      if ('error' in value) return { ok: false, error: value.error };
      separators = unescapeTmuxString(value.value) || null;
      i = value.nextIndex;
      continue;
    }
    if (isFlag(arg, '--labels')) {
      const value = readOptionValue(args, i, '--labels');
      if ('error' in value) return { ok: false, error: value.error };
      if (!value.value) return { ok: false, error: 'Labels must not be empty.' };
      labels = value.value;
      i = value.nextIndex;
      continue;
    }
    if (arg === '--case-sensitive') {
      caseSensitive = true;
      continue;
    }
    if (arg === '--top-first') {
      topFirst = true;
      continue;
    }

    return { ok: false, error: `Unknown argument: ${arg}` };
  }

  if (query === null) {
    return { ok: false, error: 'Missing --query.' };
  }

  return {
    ok: true,
    command: { kind: 'search', query, file, caseSensitive, separators, labels, topFirst },
  };
}

export function parseCliArgs(args: string[]): ParseResult {
  if (shouldShowHelp(args)) {
    return { ok: true, command: { kind: 'help', topic: resolveHelpTopic(args) } };
  }

  if (args.length === 0) {
    return { ok: true, command: { kind: 'run' } };
  }

  const [command, ...rest] = args;
  if (VERSION_FLAGS.has(command)) {
    return rest.length === 0
      ? { ok: true, command: { kind: 'version' } }
      : { ok: false, error: `Unknown argument: ${rest[0]}` };
  }

  if (command === 'run') return parseRun(rest);
  if (command === 'interactive') return parseInteractive(rest);
  if (command === 'search') return parseSearch(rest);

  // `paneflash --pane %3` is shorthand for run
  if (command.startsWith('-')) return parseRun(args);

  return { ok: false, error: `Unknown command: ${command}` };
}
