/**
 * ANSI escape helpers for captured pane text.
 *
 * `tmux capture-pane -e` keeps SGR styling and may carry OSC hyperlinks.
 * Strip and position mapping share one scanner so they always agree.
 */

export const ESC = '\x1b';
export const BEL = '\x07';

export const AnsiStyles = {
  BOLD: '\x1b[1m',
  DIM: '\x1b[2m',
  RESET: '\x1b[0m',
  YELLOW: '\x1b[33m',
} as const;

export const TerminalSequences = {
  CLEAR_SCREEN: '\x1b[2J\x1b[H',
  RESET_SCROLL_REGION: '\x1b[r',
  setScrollRegion: (top: number, bottom: number): string => `\x1b[${top};${bottom}r`,
  moveTo: (row: number, col: number): string => `\x1b[${row};${col}H`,
  moveToColumn: (col: number): string => `\x1b[${col}G`,
} as const;

/**
 * Length of the escape sequence starting at `index`, or 0 when the
 * character there is visible.
 */
export function escapeLengthAt(text: string, index: number): number {
  if (text[index] !== ESC) return 0;
  const kind = text[index + 1];

  if (kind === '[') {
    // CSI: parameters and intermediates, then one final byte in @-~
    let pos = index + 2;
    while (pos < text.length) {
      const code = text.charCodeAt(pos);
      if (code >= 0x40 && code <= 0x7e) return pos - index + 1;
      pos++;
    }
    return text.length - index;
  }

  if (kind === ']') {
    // OSC: terminated by BEL or ST (ESC \)
    let pos = index + 2;
    while (pos < text.length) {
      if (text[pos] === BEL) return pos - index + 1;
      if (text[pos] === ESC && text[pos + 1] === '\\') return pos - index + 2;
      pos++;
    }
    return text.length - index;
  }

  return kind === undefined ? 1 : 2;
}

export function stripAnsi(text: string): string {
  let output = '';
  let i = 0;
  while (i < text.length) {
    const skip = escapeLengthAt(text, i);
    if (skip > 0) {
      i += skip;
      continue;
    }
    output += text[i];
    i++;
  }
  return output;
}

export function hasAnsi(text: string): boolean {
  return text.includes(ESC);
}

export function visibleLength(text: string): number {
  return stripAnsi(text).length;
}

/**
 * Map a position in the plain text to the matching position in the styled
 * text. Escapes before the target character are skipped; escapes right
 * after the previous character are not.
 */
export function mapPlainToStyled(styled: string, plainPosition: number): number {
  let styledIndex = 0;
  let plainIndex = 0;

  while (plainIndex < plainPosition && styledIndex < styled.length) {
    const skip = escapeLengthAt(styled, styledIndex);
    if (skip > 0) {
      styledIndex += skip;
    } else {
      styledIndex++;
      plainIndex++;
    }
  }

  return styledIndex;
}
