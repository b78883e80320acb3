/**
 * Popup placement and command construction for the tmux overlay
 */

export interface PaneGeometry {
  paneId: string;
  left: number;
  top: number;
  right: number;
  bottom: number;
  width: number;
  height: number;
}

export interface PopupPlacement {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Format string for `display-message -p` matching parsePaneGeometry */
export const PANE_GEOMETRY_FORMAT =
  '#{pane_id} #{pane_left} #{pane_top} #{pane_right} #{pane_bottom} #{pane_width} #{pane_height}';

export function parsePaneGeometry(output: string): PaneGeometry | null {
  const parts = output.trim().split(/\s+/);
  if (parts.length !== 7) return null;
  const [paneId, ...rest] = parts;
  const numbers = rest.map((part) => Number.parseInt(part, 10));
  if (numbers.some((value) => !Number.isFinite(value))) return null;
  const [left, top, right, bottom, width, height] = numbers;
  return { paneId, left, top, right, bottom, width, height };
}

/**
 * Place the popup exactly over the pane.
 * tmux measures popup `-y` from the bottom edge, so panes below the top row
 * need `bottom + 1` to cover the border above them.
 */
export function calculatePopupPlacement(geometry: PaneGeometry): PopupPlacement {
  return {
    x: geometry.left,
    y: geometry.top === 0 ? geometry.top : geometry.bottom + 1,
    width: geometry.width,
    height: geometry.height,
  };
}

const SAFE_SHELL_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

/** Quote one argument for /bin/sh */
export function quoteShellArg(value: string): string {
  if (value === '') return "''";
  if (SAFE_SHELL_WORD.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function buildShellCommand(argv: readonly string[]): string {
  return argv.map(quoteShellArg).join(' ');
}

/** Arguments for `tmux display-popup`, borderless and closed on exit */
export function buildPopupArgs(placement: PopupPlacement, command: string): string[] {
  return [
    'display-popup',
    '-E',
    '-B',
    '-x',
    String(placement.x),
    '-y',
    String(placement.y),
    '-w',
    String(placement.width),
    '-h',
    String(placement.height),
    command,
  ];
}

/** Buffer names are per pane so concurrent popups never collide */
export function captureBufferName(paneId: string): string {
  return `__paneflash_capture_${paneId}__`;
}

export function resultBufferName(paneId: string): string {
  return `__paneflash_result_${paneId}__`;
}

export const PASTE_BUFFER_NAME = '__paneflash_paste__';
