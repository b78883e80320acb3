/**
 * `paneflash run`: capture the pane, open the search popup over it, then
 * copy (and maybe paste) whatever the popup selected.
 */
import { Effect, Option } from 'effect';
import { buildSessionReport } from '../core/diagnostics';
import {
  calculatePopupPlacement,
  captureBufferName,
  resultBufferName,
} from '../core/popup';
import { FlashConfig, type FlashConfigShape } from '../effect/Config';
import { decodeSessionResult } from '../effect/models';
import { Clipboard, Tmux, type CopyMethod } from '../effect/services';

export interface LaunchOptions {
  /** Defaults to the invoking pane */
  paneId?: string;
  /** Shell command the popup runs for a pane */
  popupCommand: (paneId: string) => string;
}

export type LaunchOutcome =
  | { kind: 'copied'; paneId: string; text: string; paste: boolean; method: CopyMethod }
  | { kind: 'cancelled'; paneId: string; popupExitCode: number };

/** Settings, tmux environment and pane layout, logged once per debug session */
export const logSessionReport = (paneId: string, settings: FlashConfigShape) =>
  Effect.gen(function* () {
    const tmux = yield* Tmux;
    const environment = yield* tmux.describeEnvironment(paneId);
    const geometry = yield* tmux.paneGeometry(paneId).pipe(Effect.option);

    const lines = buildSessionReport({
      paneId,
      logFile: settings.debugLogPath,
      runtime: `Node.js ${process.version}`,
      settings,
      environment,
      geometry: Option.getOrNull(geometry),
    });
    yield* Effect.forEach(lines, (line) => Effect.logDebug(line), { discard: true });
  });

export const launchSearch = (options: LaunchOptions) =>
  Effect.gen(function* () {
    const tmux = yield* Tmux;
    const clipboard = yield* Clipboard;
    const settings = yield* FlashConfig;

    const paneId = options.paneId ?? (yield* tmux.currentPaneId());
    if (settings.debug) {
      yield* logSessionReport(paneId, settings);
    }
    const captureBuffer = captureBufferName(paneId);
    const resultBuffer = resultBufferName(paneId);

    const session = Effect.gen(function* () {
      const content = yield* tmux.capturePane(paneId);
      yield* tmux.deleteBuffer(resultBuffer);
      yield* tmux.loadBuffer(captureBuffer, content);

      const placement = calculatePopupPlacement(yield* tmux.paneGeometry(paneId));
      yield* Effect.logDebug(
        `Popup for ${paneId} at ${placement.x},${placement.y} ${placement.width}x${placement.height}`
      );

      const popupExitCode = yield* tmux.displayPopup(placement, options.popupCommand(paneId));
      const raw = yield* tmux.showBuffer(resultBuffer);
      if (Option.isNone(raw) || !raw.value.trim()) {
        yield* Effect.logDebug(`Popup closed without a selection (exit ${popupExitCode})`);
        return { kind: 'cancelled', paneId, popupExitCode } satisfies LaunchOutcome;
      }

      const result = yield* decodeSessionResult(raw.value, resultBuffer);
      const method = yield* clipboard.copyAndPaste(result.text, { paneId, paste: result.paste });
      yield* Effect.logDebug(`Copied ${result.text.length} chars via ${method}`);

      return {
        kind: 'copied',
        paneId,
        text: result.text,
        paste: result.paste,
        method,
      } satisfies LaunchOutcome;
    });

    const outcome: LaunchOutcome = yield* session.pipe(
      Effect.ensuring(
        Effect.all([tmux.deleteBuffer(captureBuffer), tmux.deleteBuffer(resultBuffer)], {
          discard: true,
        })
      )
    );
    return outcome;
  });
