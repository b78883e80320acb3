/**
 * Raw stdin decoding for the search prompt
 */
import type { SessionKey } from '../core/search-session';

export const ControlChars = {
  CTRL_C: '\x03',
  ESC: '\x1b',
  CTRL_U: '\x15',
  CTRL_W: '\x17',
  BACKSPACE: '\x7f',
  BACKSPACE_ALT: '\b',
  ENTER: '\r',
  ENTER_ALT: '\n',
} as const;

function isPrintable(codePoint: number): boolean {
  return codePoint >= 0x20 && codePoint !== 0x7f && !(codePoint >= 0x80 && codePoint < 0xa0);
}

/** Length of a CSI or SS3 sequence at `index` (which holds ESC), or 0 */
function sequenceLength(chunk: string, index: number): number {
  const kind = chunk[index + 1];
  if (kind === 'O') {
    return chunk.length > index + 2 ? 3 : 2;
  }
  if (kind !== '[') return 0;
  let pos = index + 2;
  while (pos < chunk.length) {
    const code = chunk.charCodeAt(pos);
    if (code >= 0x40 && code <= 0x7e) return pos - index + 1;
    pos++;
  }
  return chunk.length - index;
}

/**
 * Decode one chunk of raw input into session keys.
 * Arrow keys and other CSI/SS3 sequences are dropped.
 */
export function decodeKeys(chunk: string): SessionKey[] {
  const keys: SessionKey[] = [];
  let i = 0;

  while (i < chunk.length) {
    const char = chunk[i];

    switch (char) {
      case ControlChars.CTRL_C:
        keys.push({ kind: 'interrupt' });
        i++;
        continue;
      case ControlChars.ESC: {
        const skip = sequenceLength(chunk, i);
        if (skip > 0) {
          i += skip;
        } else {
          keys.push({ kind: 'escape' });
          i++;
        }
        continue;
      }
      case ControlChars.CTRL_U:
        keys.push({ kind: 'clear' });
        i++;
        continue;
      case ControlChars.CTRL_W:
        keys.push({ kind: 'deleteWord' });
        i++;
        continue;
      case ControlChars.BACKSPACE:
      case ControlChars.BACKSPACE_ALT:
        keys.push({ kind: 'backspace' });
        i++;
        continue;
      case ControlChars.ENTER:
        keys.push({ kind: 'enter' });
        // \r\n is one keypress
        i += chunk[i + 1] === ControlChars.ENTER_ALT ? 2 : 1;
        continue;
      case ControlChars.ENTER_ALT:
        keys.push({ kind: 'enter' });
        i++;
        continue;
    }

    const codePoint = chunk.codePointAt(i) ?? 0;
    const width = codePoint > 0xffff ? 2 : 1;
    if (isPrintable(codePoint)) {
      keys.push({ kind: 'char', char: String.fromCodePoint(codePoint) });
    }
    i += width;
  }

  return keys;
}
