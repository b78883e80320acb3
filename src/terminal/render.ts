/**
 * Frame rendering for the popup: captured lines with highlights and labels,
 * plus the prompt bar.
 */
import type { FlashSettings } from '../core/config';
import { buildLineLookup } from '../core/match-index';
import type { Occurrence } from '../core/types';
import { AnsiStyles, TerminalSequences, mapPlainToStyled, stripAnsi, visibleLength } from './ansi';

export type RenderTheme = Pick<
  FlashSettings,
  | 'promptPosition'
  | 'promptIndicator'
  | 'promptPlaceholderText'
  | 'promptColour'
  | 'highlightColour'
  | 'labelColour'
>;

export interface PromptBarState {
  query: string;
  columns: number;
  /** Seconds left before the idle timeout, when the warning is showing */
  idleSecondsLeft: number | null;
  debug: boolean;
}

export interface FrameInput extends PromptBarState {
  /** Captured text with styling */
  styledContent: string;
  occurrences: readonly Occurrence[];
  rows: number;
}

const DEBUG_INDICATOR = '!! DEBUG ON !!';

/**
 * Dim a styled line, re-applying dim after every reset inside it.
 */
export function dimLine(line: string): string {
  const parts: string[] = [];
  if (!line.startsWith(AnsiStyles.DIM)) {
    parts.push(AnsiStyles.DIM);
  }
  parts.push(line.split(AnsiStyles.RESET).join(AnsiStyles.RESET + AnsiStyles.DIM));
  if (!line.endsWith(AnsiStyles.RESET)) {
    parts.push(AnsiStyles.RESET);
  }
  return parts.join('');
}

function replacePlainRange(
  styled: string,
  plainStart: number,
  plainEnd: number,
  replacement: string
): string {
  const start = mapPlainToStyled(styled, plainStart);
  const end = mapPlainToStyled(styled, plainEnd);
  return styled.slice(0, start) + replacement + styled.slice(end);
}

/**
 * Highlight each occurrence on one line and put its label on the character
 * right after the match, appending it at end of line. Works right to left
 * so earlier plain positions stay valid. `resume` is re-applied after each
 * inserted reset, e.g. to keep a dimmed line dim.
 */
export function decorateLine(
  styledLine: string,
  plainLine: string,
  occurrences: readonly Occurrence[],
  theme: Pick<RenderTheme, 'highlightColour' | 'labelColour'>,
  resume = ''
): string {
  const ordered = [...occurrences].sort(
    (a, b) => b.column + b.matchStart - (a.column + a.matchStart)
  );
  let line = styledLine;

  for (const occurrence of ordered) {
    const matchStart = occurrence.column + occurrence.matchStart;
    const matchEnd = occurrence.column + occurrence.matchEnd;

    if (occurrence.label !== null) {
      const label = `${theme.labelColour}${occurrence.label}${AnsiStyles.RESET}${resume}`;
      if (matchEnd < plainLine.length) {
        line = replacePlainRange(line, matchEnd, matchEnd + 1, label);
      } else {
        line = replacePlainRange(line, matchEnd, matchEnd, label);
      }
    }

    const matched = occurrence.text.slice(occurrence.matchStart, occurrence.matchEnd);
    line = replacePlainRange(
      line,
      matchStart,
      matchEnd,
      `${AnsiStyles.RESET}${theme.highlightColour}${matched}${AnsiStyles.RESET}${resume}`
    );
  }

  return line;
}

/** Column where the cursor sits after the prompt and query (1-based) */
export function promptCursorColumn(indicator: string, query: string): number {
  return visibleLength(indicator) + 2 + Array.from(query).length;
}

export function renderPromptBar(state: PromptBarState, theme: RenderTheme): string {
  const prompt = `${theme.promptColour}${theme.promptIndicator}${AnsiStyles.RESET} `;
  let output: string;
  if (state.query) {
    output = prompt + state.query;
  } else if (theme.promptPlaceholderText) {
    output = `${prompt}${AnsiStyles.DIM}${theme.promptPlaceholderText}${AnsiStyles.RESET}`;
  } else {
    output = prompt;
  }

  const baseLength = visibleLength(output);

  if (state.idleSecondsLeft !== null) {
    const warning = `Idle, terminating in ${state.idleSecondsLeft}s...`;
    if (baseLength + warning.length + 3 < state.columns) {
      const padding = state.columns - baseLength - warning.length - 1;
      output += `${' '.repeat(padding)}${AnsiStyles.BOLD}${AnsiStyles.YELLOW}${warning}${AnsiStyles.RESET}`;
    }
  } else if (state.debug) {
    if (baseLength + DEBUG_INDICATOR.length + 3 < state.columns) {
      const padding = state.columns - baseLength - DEBUG_INDICATOR.length - 1;
      output += `${' '.repeat(padding)}${AnsiStyles.DIM}${DEBUG_INDICATOR}${AnsiStyles.RESET}`;
    }
  }

  return output;
}

/**
 * Lines shown above or below the prompt. The captured last line is the
 * user's shell prompt, which the search bar replaces.
 */
export function visibleLines(styledContent: string, rows: number): string[] {
  const lines = styledContent.replace(/\n+$/, '').split('\n');
  lines.pop();
  return lines.slice(0, Math.max(0, rows - 1));
}

function renderContentLines(input: FrameInput, theme: RenderTheme): string {
  const lookup = buildLineLookup(input.occurrences);
  const lines = visibleLines(input.styledContent, input.rows);

  return lines
    .map((line, index) => {
      if (!input.query) return line;
      const dimmed = dimLine(line);
      const onLine = lookup.get(index);
      if (!onLine) return dimmed;
      return decorateLine(dimmed, stripAnsi(line), onLine, theme, AnsiStyles.DIM);
    })
    .join('\n');
}

/**
 * Full frame: clear, scroll region, content and prompt bar, cursor placed
 * after the query.
 */
export function renderFrame(input: FrameInput, theme: RenderTheme): string {
  const bar = renderPromptBar(input, theme);
  const cursorColumn = promptCursorColumn(theme.promptIndicator, input.query);
  const content = renderContentLines(input, theme);
  const parts: string[] = [TerminalSequences.CLEAR_SCREEN];

  if (theme.promptPosition === 'top') {
    parts.push(
      bar,
      '\n',
      TerminalSequences.setScrollRegion(2, input.rows),
      TerminalSequences.moveTo(2, 1),
      content,
      TerminalSequences.moveTo(1, cursorColumn)
    );
  } else {
    parts.push(
      TerminalSequences.setScrollRegion(1, input.rows - 1),
      TerminalSequences.moveTo(1, 1),
      content,
      TerminalSequences.moveTo(input.rows, 1),
      bar,
      TerminalSequences.moveToColumn(cursorColumn)
    );
  }

  return parts.join('');
}

/** Undo the scroll region and clear before the popup closes */
export function renderTeardown(): string {
  return TerminalSequences.RESET_SCROLL_REGION + TerminalSequences.CLEAR_SCREEN;
}
