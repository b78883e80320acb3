/**
 * Debug session report: configuration, tmux environment and an ASCII
 * drawing of the pane layout, as plain log lines.
 */
import type { FlashSettings } from './config';
import { PANE_GEOMETRY_FORMAT, parsePaneGeometry, type PaneGeometry } from './popup';

// =============================================================================
// Types
// =============================================================================

export interface TmuxSessionInfo {
  name: string;
  windows: number;
}

export interface TmuxWindowInfo {
  index: string;
  name: string;
  panes: number;
}

export interface TmuxPaneInfo extends PaneGeometry {
  command: string;
}

export interface TmuxEnvironment {
  version: string;
  sessionName: string;
  windowIndex: string;
  sessions: TmuxSessionInfo[];
  windows: TmuxWindowInfo[];
  panes: TmuxPaneInfo[];
}

export type ReportValue =
  | string
  | number
  | boolean
  | null
  | { readonly [key: string]: ReportValue };

export interface SessionReportInput {
  paneId: string;
  logFile: string;
  runtime: string;
  settings: FlashSettings;
  environment: TmuxEnvironment;
  geometry: PaneGeometry | null;
}

// =============================================================================
// Parsing list-* output
// =============================================================================

// Names go last: they may contain spaces
export const SESSION_LIST_FORMAT = '#{session_windows} #{session_name}';
export const WINDOW_LIST_FORMAT = '#{window_index} #{window_panes} #{window_name}';
export const PANE_LIST_FORMAT = `${PANE_GEOMETRY_FORMAT} #{pane_current_command}`;

function splitLeading(line: string, count: number): { fields: string[]; rest: string } | null {
  const parts = line.trim().split(/\s+/);
  if (parts.length < count) return null;
  return { fields: parts.slice(0, count), rest: parts.slice(count).join(' ') };
}

function nonEmptyLines(output: string): string[] {
  return output.split('\n').filter((line) => line.trim() !== '');
}

export function parseSessionList(output: string): TmuxSessionInfo[] {
  return nonEmptyLines(output).flatMap((line) => {
    const split = splitLeading(line, 1);
    if (!split || !split.rest) return [];
    const windows = Number.parseInt(split.fields[0], 10);
    return Number.isFinite(windows) ? [{ name: split.rest, windows }] : [];
  });
}

export function parseWindowList(output: string): TmuxWindowInfo[] {
  return nonEmptyLines(output).flatMap((line) => {
    const split = splitLeading(line, 2);
    if (!split) return [];
    const panes = Number.parseInt(split.fields[1], 10);
    return Number.isFinite(panes) ? [{ index: split.fields[0], name: split.rest, panes }] : [];
  });
}

export function parsePaneList(output: string): TmuxPaneInfo[] {
  return nonEmptyLines(output).flatMap((line) => {
    const split = splitLeading(line, 7);
    if (!split) return [];
    const geometry = parsePaneGeometry(split.fields.join(' '));
    return geometry ? [{ ...geometry, command: split.rest }] : [];
  });
}

// =============================================================================
// Formatting
// =============================================================================

const RULE = '='.repeat(80);
const ACTIVE_MARKER = ' <- active';

export function formatSection(title: string): string[] {
  return [RULE, `  ${title}`, RULE];
}

export function formatEntries(
  data: { readonly [key: string]: ReportValue },
  indent = 0
): string[] {
  const prefix = '  '.repeat(indent);
  const lines: string[] = [];
  for (const [key, value] of Object.entries(data)) {
    if (value !== null && typeof value === 'object') {
      lines.push(`${prefix}${key}:`);
      lines.push(...formatEntries(value, indent + 1));
    } else {
      lines.push(`${prefix}${key}: ${String(value)}`);
    }
  }
  return lines;
}

/** Escapes stay visible, so SGR colours and separators can be read back */
export function describeSettings(settings: FlashSettings): { [key: string]: ReportValue } {
  return {
    autoPaste: settings.autoPaste,
    reverseSearch: settings.reverseSearch,
    caseSensitive: settings.caseSensitive,
    wordSeparators:
      settings.wordSeparators === null ? '(default)' : JSON.stringify(settings.wordSeparators),
    labelCharacters: settings.labelCharacters,
    promptPosition: settings.promptPosition,
    promptIndicator: settings.promptIndicator,
    promptPlaceholderText: settings.promptPlaceholderText,
    promptColour: JSON.stringify(settings.promptColour),
    highlightColour: JSON.stringify(settings.highlightColour),
    labelColour: JSON.stringify(settings.labelColour),
    idleTimeout: settings.idleTimeout,
    idleWarning: settings.idleWarning,
    debug: settings.debug,
  };
}

// =============================================================================
// Pane layout drawing
// =============================================================================

/** Widest drawing before coordinates are scaled down */
const MAX_LAYOUT_WIDTH = 78;

/**
 * Box-drawing sketch of the window, one box per pane labeled
 * `<id> <width>x<height>` when the label fits.
 */
export function drawPaneLayout(panes: readonly PaneGeometry[]): string[] {
  if (panes.length === 0) return ['No panes to display'];

  const maxRight = Math.max(...panes.map((pane) => pane.right));
  const maxBottom = Math.max(...panes.map((pane) => pane.bottom));
  const scale = maxRight > MAX_LAYOUT_WIDTH ? maxRight / MAX_LAYOUT_WIDTH : 1;
  const toGrid = (value: number) => Math.floor(value / scale);

  const width = toGrid(maxRight) + 2;
  const height = toGrid(maxBottom) + 2;
  const grid = Array.from({ length: height }, () => Array.from({ length: width }, () => ' '));
  const put = (y: number, x: number, char: string) => {
    if (y >= 0 && y < height && x >= 0 && x < width) grid[y][x] = char;
  };

  for (const pane of panes) {
    const left = toGrid(pane.left);
    const top = toGrid(pane.top);
    const right = toGrid(pane.right);
    const bottom = toGrid(pane.bottom);

    for (let x = left; x <= right; x++) {
      put(top, x, '─');
      put(bottom, x, '─');
    }
    for (let y = top; y <= bottom; y++) {
      put(y, left, '│');
      put(y, right, '│');
    }
    put(top, left, '┌');
    put(top, right, '┐');
    put(bottom, left, '└');
    put(bottom, right, '┘');

    const label = `${pane.paneId} ${pane.width}x${pane.height}`;
    const centerY = Math.floor((top + bottom) / 2);
    const start = Math.floor((left + right) / 2) - Math.floor(label.length / 2);
    if (start >= left + 1) {
      Array.from(label).forEach((char, i) => {
        if (start + i < right) put(centerY, start + i, char);
      });
    }
  }

  const lines = grid.map((row) => row.join('').trimEnd());
  while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

// =============================================================================
// Session report
// =============================================================================

function marker(active: boolean): string {
  return active ? ACTIVE_MARKER : '';
}

export function formatEnvironment(environment: TmuxEnvironment, paneId: string): string[] {
  const { sessions, windows, panes } = environment;
  return [
    `Sessions (${sessions.length}):`,
    ...sessions.map(
      (session) =>
        `  - ${session.name} (${session.windows} windows)${marker(session.name === environment.sessionName)}`
    ),
    `Windows (${windows.length}):`,
    ...windows.map(
      (window) =>
        `  - [${window.index}] ${window.name} (${window.panes} panes)${marker(window.index === environment.windowIndex)}`
    ),
    `Panes (${panes.length}):`,
    ...panes.map(
      (pane) =>
        `  - ${pane.paneId}: ${pane.width}x${pane.height} (${pane.command})${marker(pane.paneId === paneId)}`
    ),
  ];
}

export function buildSessionReport(input: SessionReportInput): string[] {
  const lines = [
    ...formatSection('PANEFLASH DEBUG SESSION STARTED'),
    `Runtime: ${input.runtime}`,
    `Tmux: ${input.environment.version}`,
    `Pane ID: ${input.paneId}`,
    `Log file: ${input.logFile}`,
    ...formatSection('Configuration Settings'),
    ...formatEntries(describeSettings(input.settings)),
    ...formatSection('Tmux Environment'),
    ...formatEnvironment(input.environment, input.paneId),
    ...formatSection('Pane Layout'),
    ...drawPaneLayout(input.environment.panes),
  ];

  if (input.geometry) {
    const { left, top, right, bottom, width, height } = input.geometry;
    lines.push(
      ...formatSection('Current Pane Dimensions'),
      ...formatEntries({ left, top, right, bottom, width, height })
    );
  }
  return lines;
}
