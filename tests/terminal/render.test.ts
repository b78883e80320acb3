import { describe, expect, test } from 'vitest';
import { DEFAULT_SETTINGS } from '../../src/core/config';
import { buildMatchIndex, queryMatchIndex } from '../../src/core/match-index';
import {
  decorateLine,
  dimLine,
  promptCursorColumn,
  renderFrame,
  renderPromptBar,
  renderTeardown,
  visibleLines,
} from '../../src/terminal/render';

const DIM = '\x1b[2m';
const RESET = '\x1b[0m';
const HL = DEFAULT_SETTINGS.highlightColour;
const LB = DEFAULT_SETTINGS.labelColour;
const PROMPT = `\x1b[1m>${RESET} `;

describe('dimLine', () => {
  test('wraps plain lines', () => {
    expect(dimLine('abc')).toBe(`${DIM}abc${RESET}`);
  });

  test('re-applies dim after inner resets', () => {
    expect(dimLine(`\x1b[31mred${RESET} tail`)).toBe(`${DIM}\x1b[31mred${RESET}${DIM} tail${RESET}`);
  });
});

describe('decorateLine', () => {
  const theme = { highlightColour: HL, labelColour: LB };

  test('puts the label on the character after the match', () => {
    const [occurrence] = queryMatchIndex(buildMatchIndex('hello world'), 'w');
    expect(occurrence.label).toBe('a');
    expect(decorateLine('hello world', 'hello world', [occurrence], theme)).toBe(
      `hello ${RESET}${HL}w${RESET}${LB}a${RESET}rld`
    );
  });

  test('appends the label at end of line', () => {
    const [occurrence] = queryMatchIndex(buildMatchIndex('hello world'), 'world');
    expect(occurrence.label).toBe('a');
    expect(decorateLine('hello world', 'hello world', [occurrence], theme)).toBe(
      `hello ${RESET}${HL}world${RESET}${LB}a${RESET}`
    );
  });

  test('highlights unlabeled occurrences', () => {
    const [occurrence] = queryMatchIndex(buildMatchIndex('ab'), 'a', { labelAlphabet: 'b' });
    expect(occurrence.label).toBeNull();
    expect(decorateLine('ab', 'ab', [occurrence], theme)).toBe(`${RESET}${HL}a${RESET}b`);
  });
});

describe('prompt bar', () => {
  const state = { query: '', columns: 40, idleSecondsLeft: null, debug: false };

  test('shows the placeholder for an empty query', () => {
    expect(renderPromptBar(state, DEFAULT_SETTINGS)).toBe(`${PROMPT}${DIM}search...${RESET}`);
  });

  test('shows the query', () => {
    expect(renderPromptBar({ ...state, query: 'ab' }, DEFAULT_SETTINGS)).toBe(`${PROMPT}ab`);
  });

  test('right-aligns the idle warning', () => {
    expect(renderPromptBar({ ...state, query: 'ab', idleSecondsLeft: 3 }, DEFAULT_SETTINGS)).toBe(
      `${PROMPT}ab${' '.repeat(9)}\x1b[1m\x1b[33mIdle, terminating in 3s...${RESET}`
    );
  });

  test('drops the warning when it does not fit', () => {
    expect(
      renderPromptBar({ ...state, query: 'ab', columns: 20, idleSecondsLeft: 3 }, DEFAULT_SETTINGS)
    ).toBe(`${PROMPT}ab`);
  });

  test('shows the debug indicator', () => {
    expect(renderPromptBar({ ...state, debug: true }, DEFAULT_SETTINGS)).toBe(
      `${PROMPT}${DIM}search...${RESET}${' '.repeat(14)}${DIM}!! DEBUG ON !!${RESET}`
    );
  });

  test('places the cursor after the query', () => {
    expect(promptCursorColumn('>', 'ab')).toBe(5);
    expect(promptCursorColumn('\x1b[1m>>\x1b[0m', '')).toBe(4);
  });
});

describe('frames', () => {
  test('drops the captured prompt line and trailing blank lines', () => {
    expect(visibleLines('a\nb\nprompt$ \n\n', 10)).toEqual(['a', 'b']);
    expect(visibleLines('a\nb\nprompt$ ', 2)).toEqual(['a']);
  });

  test('renders the bottom layout', () => {
    const frame = renderFrame(
      {
        styledContent: 'cat cow\n$ ',
        occurrences: [],
        query: '',
        rows: 5,
        columns: 20,
        idleSecondsLeft: null,
        debug: false,
      },
      DEFAULT_SETTINGS
    );
    expect(frame).toBe(
      `\x1b[2J\x1b[H\x1b[1;4r\x1b[1;1Hcat cow\x1b[5;1H${PROMPT}${DIM}search...${RESET}\x1b[3G`
    );
  });

  test('renders the top layout', () => {
    const frame = renderFrame(
      {
        styledContent: 'cat cow\n$ ',
        occurrences: [],
        query: '',
        rows: 5,
        columns: 20,
        idleSecondsLeft: null,
        debug: false,
      },
      { ...DEFAULT_SETTINGS, promptPosition: 'top' }
    );
    expect(frame).toBe(
      `\x1b[2J\x1b[H${PROMPT}${DIM}search...${RESET}\n\x1b[2;5r\x1b[2;1Hcat cow\x1b[1;3H`
    );
  });

  test('dims content and decorates matches while searching', () => {
    const occurrences = queryMatchIndex(buildMatchIndex('cat cow'), 'c');
    const frame = renderFrame(
      {
        styledContent: 'cat cow\n$ ',
        occurrences,
        query: 'c',
        rows: 5,
        columns: 20,
        idleSecondsLeft: null,
        debug: false,
      },
      DEFAULT_SETTINGS
    );
    const line =
      `${RESET}${HL}c${RESET}${DIM}${LB}d${RESET}${DIM}t ` +
      `${RESET}${HL}c${RESET}${DIM}${LB}s${RESET}${DIM}w${RESET}`;
    expect(frame).toBe(`\x1b[2J\x1b[H\x1b[1;4r\x1b[1;1H${line}\x1b[5;1H${PROMPT}c\x1b[4G`);
  });

  test('teardown resets the scroll region', () => {
    expect(renderTeardown()).toBe('\x1b[r\x1b[2J\x1b[H');
  });
});
