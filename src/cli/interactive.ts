/**
 * `paneflash interactive`: the search UI running inside the popup.
 */
import { Duration, Effect, Option, Queue, type Scope } from 'effect';
import type { FlashSettings } from '../core/config';
import { buildMatchIndex } from '../core/match-index';
import { captureBufferName, resultBufferName } from '../core/popup';
import {
  applyKey,
  createSearchSession,
  type SearchSession,
  type SessionOutcome,
} from '../core/search-session';
import { stripAnsi } from '../terminal/ansi';
import { decodeKeys } from '../terminal/keys';
import { renderFrame, renderTeardown, visibleLines } from '../terminal/render';
import { FlashConfig } from '../effect/Config';
import { SessionResult, encodeSessionResult } from '../effect/models';
import { Tmux } from '../effect/services';

export interface PopupScreen {
  readonly columns: number;
  readonly rows: number;
  readonly write: (data: string) => Effect.Effect<void>;
}

export type LoopOutcome =
  | Exclude<SessionOutcome, { kind: 'continue' }>
  | { kind: 'idle' };

type IdleSettings = Pick<FlashSettings, 'idleTimeout' | 'idleWarning'>;

/**
 * Wait for the next input chunk. Goes quiet for `idleTimeout - idleWarning`
 * seconds, then counts the warning down once per second. None means the
 * session went idle; a timeout of 0 or less waits forever.
 */
export const nextInput = (
  input: Queue.Dequeue<string>,
  settings: IdleSettings,
  onWarning: (secondsLeft: number) => Effect.Effect<void>
): Effect.Effect<Option.Option<string>> =>
  Effect.gen(function* () {
    if (settings.idleTimeout <= 0) {
      return Option.some(yield* Queue.take(input));
    }

    const warning = Math.min(Math.max(0, settings.idleWarning), settings.idleTimeout);
    const quiet = settings.idleTimeout - warning;

    if (quiet > 0) {
      const chunk = yield* Queue.take(input).pipe(Effect.timeoutOption(Duration.seconds(quiet)));
      if (Option.isSome(chunk)) return chunk;
    }

    for (let left = warning; left > 0; left--) {
      yield* onWarning(left);
      const chunk = yield* Queue.take(input).pipe(Effect.timeoutOption(Duration.seconds(1)));
      if (Option.isSome(chunk)) return chunk;
    }

    return Option.none();
  });

/**
 * Draw, read keys, apply them, redraw until a selection, a cancel or the
 * idle timeout.
 */
export const runSearchLoop = (
  initial: SearchSession,
  styledContent: string,
  input: Queue.Dequeue<string>,
  screen: PopupScreen,
  settings: FlashSettings
): Effect.Effect<LoopOutcome> =>
  Effect.gen(function* () {
    let session = initial;

    const draw = (idleSecondsLeft: number | null) =>
      screen.write(
        renderFrame(
          {
            styledContent,
            occurrences: session.occurrences,
            query: session.query,
            rows: screen.rows,
            columns: screen.columns,
            idleSecondsLeft,
            debug: settings.debug,
          },
          settings
        )
      );

    yield* draw(null);

    while (true) {
      const chunk = yield* nextInput(input, settings, (left) => draw(left));
      if (Option.isNone(chunk)) {
        yield* Effect.logDebug(`Idle for ${settings.idleTimeout}s, closing`);
        return { kind: 'idle' } satisfies LoopOutcome;
      }

      for (const key of decodeKeys(chunk.value)) {
        const outcome = applyKey(session, key);
        if (outcome.kind !== 'continue') {
          yield* Effect.logDebug(`Session ended: ${outcome.kind}`);
          return outcome;
        }
        session = outcome.session;
      }

      yield* Effect.logDebug(
        `Query "${session.query}": ${session.occurrences.length} matches` +
          (session.autoPasteArmed ? ' (paste armed)' : '')
      );
      yield* draw(null);
    }
  });

/** Raw-mode stdin as a queue of chunks, restored when the scope closes */
export const acquireStdinQueue: Effect.Effect<Queue.Dequeue<string>, never, Scope.Scope> =
  Effect.acquireRelease(
    Effect.gen(function* () {
      const queue = yield* Queue.unbounded<string>();
      const stdin = process.stdin;
      const wasRaw = stdin.isTTY ? stdin.isRaw : false;
      const onData = (chunk: string) => {
        queue.unsafeOffer(chunk);
      };

      if (stdin.isTTY) stdin.setRawMode(true);
      stdin.setEncoding('utf8');
      stdin.on('data', onData);
      stdin.resume();

      return { queue, wasRaw, onData };
    }),
    ({ queue, wasRaw, onData }) =>
      Effect.gen(function* () {
        const stdin = process.stdin;
        stdin.off('data', onData);
        stdin.pause();
        if (stdin.isTTY) stdin.setRawMode(wasRaw);
        yield* Queue.shutdown(queue);
      })
  ).pipe(Effect.map(({ queue }) => queue));

export const stdoutScreen = (): PopupScreen => ({
  columns: process.stdout.columns || 80,
  rows: process.stdout.rows || 24,
  write: (data) =>
    Effect.sync(() => {
      process.stdout.write(data);
    }),
});

/** Index only what the popup shows: the last captured line is the prompt */
export const searchableText = (styledContent: string, rows: number): string =>
  visibleLines(styledContent, rows).map(stripAnsi).join('\n');

export const runInteractive = (
  paneId: string,
  io: {
    input: Effect.Effect<Queue.Dequeue<string>, never, Scope.Scope>;
    screen: PopupScreen;
  } = { input: acquireStdinQueue, screen: stdoutScreen() }
) =>
  Effect.gen(function* () {
    const tmux = yield* Tmux;
    const settings = yield* FlashConfig;

    const stashed = yield* tmux.showBuffer(captureBufferName(paneId));
    const styledContent = Option.isSome(stashed)
      ? stashed.value
      : yield* tmux.capturePane(paneId);

    const index = buildMatchIndex(searchableText(styledContent, io.screen.rows), {
      caseSensitive: settings.caseSensitive,
      wordSeparators: settings.wordSeparators,
    });
    yield* Effect.logDebug(`Indexed ${index.size} units from pane ${paneId}`);

    const session = createSearchSession(
      index,
      { reverseOrder: settings.reverseSearch, labelAlphabet: settings.labelCharacters },
      settings.autoPaste
    );

    const outcome = yield* Effect.scoped(
      Effect.gen(function* () {
        const input = yield* io.input;
        yield* Effect.addFinalizer(() => io.screen.write(renderTeardown()));
        return yield* runSearchLoop(session, styledContent, input, io.screen, settings);
      })
    );

    if (outcome.kind === 'selected') {
      const buffer = resultBufferName(paneId);
      const payload = yield* encodeSessionResult(
        new SessionResult({ text: outcome.text, paste: outcome.paste }),
        buffer
      );
      yield* tmux.loadBuffer(buffer, payload);
    }

    return outcome;
  });
