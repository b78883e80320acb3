export type HelpTopic = 'root' | 'run' | 'interactive' | 'search';

function formatHeader(topic: HelpTopic, version?: string): string {
  const base = version && version !== 'unknown' ? `paneflash v${version}` : 'paneflash';
  if (topic === 'root') {
    return base;
  }
  return `${base} ${topic}`;
}

const ROOT_HELP = (version?: string): string[] => [
  formatHeader('root', version),
  '',
  'Usage:',
  '  paneflash [run] [--pane <id>]',
  '  paneflash <command> [<args>]',
  '',
  'Commands:',
  '  run              Open the search popup over a pane (default).',
  '  interactive      Search UI inside the popup (internal).',
  '  search           Label a query over text and print JSON.',
  '',
  'Options:',
  '  -h, --help       Show help (try `paneflash search --help`).',
  '  -v, --version    Show version.',
  '',
  'Exit codes:',
  '  0  success',
  '  2  usage error',
  '  6  internal error',
];

const RUN_HELP = (version?: string): string[] => [
  formatHeader('run', version),
  '',
  'Usage:',
  '  paneflash run [--pane <id>]',
  '',
  'Description:',
  '  Capture the pane, search it in a popup and copy the selection.',
  '  Hold ; or : while picking a label to paste into the pane as well.',
  '',
  'Options:',
  '  --pane <id>   tmux pane id (defaults to $TMUX_PANE).',
];

const INTERACTIVE_HELP = (version?: string): string[] => [
  formatHeader('interactive', version),
  '',
  'Usage:',
  '  paneflash interactive --pane <id>',
  '',
  'Description:',
  '  Runs inside the popup opened by `paneflash run`.',
  '',
  'Keys:',
  '  <text>       Extend the query; a label selects its occurrence.',
  '  Enter        Select the first occurrence.',
  '  Backspace    Delete a character.',
  '  Ctrl-W       Delete a word.',
  '  Ctrl-U       Clear the query.',
  '  Esc, Ctrl-C  Cancel.',
];

const SEARCH_HELP = (version?: string): string[] => [
  formatHeader('search', version),
  '',
  'Usage:',
  '  paneflash search --query <text> [--file <path>] [--case-sensitive]',
  '                   [--separators <chars>] [--labels <chars>] [--top-first]',
  '',
  'Options:',
  '  --query <text>        Literal text to find (required).',
  '  --file <path>         Read text from a file (default: stdin).',
  '  --case-sensitive      Match case exactly.',
  '  --separators <chars>  Copy the word around the match (\\t \\xNN escapes).',
  '  --labels <chars>      Label alphabet.',
  '  --top-first           Label from the top instead of the bottom.',
  '',
  'Output:',
  '  A JSON array of occurrences in label order.',
];

const HELP_TOPICS: Record<HelpTopic, (version?: string) => string[]> = {
  root: ROOT_HELP,
  run: RUN_HELP,
  interactive: INTERACTIVE_HELP,
  search: SEARCH_HELP,
};

export function formatHelp(topic: HelpTopic, version?: string): string {
  const formatter = HELP_TOPICS[topic] ?? ROOT_HELP;
  return formatter(version).join('\n');
}
