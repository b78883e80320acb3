/**
 * Tmux service: pane capture, option reads and named buffers.
 */
import { Config, Context, Effect, Layer, Option } from "effect"
import {
  PANE_GEOMETRY_FORMAT,
  buildPopupArgs,
  parsePaneGeometry,
  type PaneGeometry,
  type PopupPlacement,
} from "../../core/popup"
import {
  PANE_LIST_FORMAT,
  SESSION_LIST_FORMAT,
  WINDOW_LIST_FORMAT,
  parsePaneList,
  parseSessionList,
  parseWindowList,
  type TmuxEnvironment,
} from "../../core/diagnostics"
import { decodeWordSeparators, parseOptionLines } from "../../core/tmux-options"
import { CommandError, PaneCaptureError, PaneNotFoundError } from "../errors"
import { CommandRunner, expectSuccess } from "./CommandRunner"

// =============================================================================
// Types
// =============================================================================

export interface TmuxOptionSnapshot {
  /** `show-options -g` */
  readonly global: ReadonlyMap<string, string>
  /** `show-window-options -g`, with `word-separators` read verbatim */
  readonly window: ReadonlyMap<string, string>
}

/** Long enough for a person to finish searching */
const POPUP_TIMEOUT = "1 hour"

// =============================================================================
// Tmux Service
// =============================================================================

export class Tmux extends Context.Tag("@paneflash/Tmux")<
  Tmux,
  {
    /** Pane of the invoking client */
    readonly currentPaneId: () => Effect.Effect<string, PaneNotFoundError>
    /** Visible pane contents with styling, wrapped lines joined */
    readonly capturePane: (paneId: string) => Effect.Effect<string, PaneCaptureError>
    readonly paneGeometry: (paneId: string) => Effect.Effect<PaneGeometry, PaneCaptureError>
    readonly readOptions: () => Effect.Effect<TmuxOptionSnapshot>
    /** Version, sessions, the pane's windows and panes; unreadable parts are left empty */
    readonly describeEnvironment: (paneId: string) => Effect.Effect<TmuxEnvironment>
    /** Store text in a named buffer (read from stdin, no size limit on argv) */
    readonly loadBuffer: (name: string, text: string) => Effect.Effect<void, CommandError>
    /** Buffer contents, or none when the buffer does not exist */
    readonly showBuffer: (name: string) => Effect.Effect<Option.Option<string>>
    readonly deleteBuffer: (name: string) => Effect.Effect<void>
    /** `set-buffer`, optionally forwarded to the outer terminal (OSC 52) */
    readonly setBuffer: (
      text: string,
      options?: { readonly name?: string; readonly clipboard?: boolean }
    ) => Effect.Effect<void, CommandError>
    readonly pasteBuffer: (name: string, paneId: string) => Effect.Effect<void, CommandError>
    /** Run a command in a popup and wait for it to close */
    readonly displayPopup: (
      placement: PopupPlacement,
      command: string
    ) => Effect.Effect<number, CommandError>
  }
>() {
  /** Production layer - runs the tmux binary */
  static readonly layer = Layer.effect(
    Tmux,
    Effect.gen(function* () {
      const runner = yield* CommandRunner

      const tmux = (args: readonly string[], input?: string) =>
        runner.run("tmux", args, { input }).pipe(Effect.flatMap(expectSuccess("tmux", args)))

      const currentPaneId = () =>
        Effect.gen(function* () {
          const fromEnv = yield* Config.option(Config.string("TMUX_PANE")).pipe(
            Effect.orElseSucceed(() => Option.none<string>())
          )
          if (Option.isSome(fromEnv) && fromEnv.value) return fromEnv.value

          const result = yield* tmux(["display-message", "-p", "#{pane_id}"])
          const paneId = result.stdout.trim()
          if (!paneId) return yield* PaneNotFoundError.make({})
          return paneId
        }).pipe(
          Effect.catchTag("CommandError", (error) =>
            Effect.fail(PaneNotFoundError.make({ cause: error }))
          )
        )

      const capturePane = (paneId: string) =>
        tmux(["capture-pane", "-p", "-e", "-J", "-t", paneId]).pipe(
          Effect.map((result) => result.stdout),
          Effect.mapError((error) => PaneCaptureError.make({ paneId, cause: error }))
        )

      const paneGeometry = (paneId: string) =>
        tmux(["display-message", "-t", paneId, "-p", PANE_GEOMETRY_FORMAT]).pipe(
          Effect.mapError((error) => PaneCaptureError.make({ paneId, cause: error })),
          Effect.flatMap((result) => {
            const geometry = parsePaneGeometry(result.stdout)
            return geometry
              ? Effect.succeed(geometry)
              : Effect.fail(
                  PaneCaptureError.make({
                    paneId,
                    cause: new Error(`Unexpected geometry: ${result.stdout.trim()}`),
                  })
                )
          })
        )

      const readLines = (args: readonly string[]) =>
        tmux(args).pipe(
          Effect.map((result) => parseOptionLines(result.stdout)),
          Effect.catchAll((error) =>
            Effect.logWarning("Reading tmux options failed", error.message).pipe(
              Effect.as(new Map<string, string>())
            )
          )
        )

      const readOr = <A>(args: readonly string[], parse: (stdout: string) => A, fallback: A) =>
        tmux(args).pipe(
          Effect.map((result) => parse(result.stdout)),
          Effect.catchAll((error) =>
            Effect.logDebug(`tmux ${args[0]} failed`, error.message).pipe(Effect.as(fallback))
          )
        )

      const trimmed = (stdout: string) => stdout.trim()

      const describeEnvironment = (paneId: string) =>
        Effect.all({
          version: readOr(["-V"], (stdout) => stdout.trim() || "unknown", "unknown"),
          sessionName: readOr(["display-message", "-t", paneId, "-p", "#{session_name}"], trimmed, ""),
          windowIndex: readOr(["display-message", "-t", paneId, "-p", "#{window_index}"], trimmed, ""),
          sessions: readOr(["list-sessions", "-F", SESSION_LIST_FORMAT], parseSessionList, []),
          windows: readOr(["list-windows", "-t", paneId, "-F", WINDOW_LIST_FORMAT], parseWindowList, []),
          panes: readOr(["list-panes", "-t", paneId, "-F", PANE_LIST_FORMAT], parsePaneList, []),
        })

      const readOptions = () =>
        Effect.gen(function* () {
          const global = yield* readLines(["show-options", "-g"])
          const window = yield* readLines(["show-window-options", "-g"])

          // Leading and trailing spaces are separators, so read the raw value
          if (!window.has("word-separators")) {
            const raw = yield* runner
              .run("tmux", ["show-window-options", "-gv", "word-separators"])
              .pipe(Effect.option)
            const separators = Option.flatMap(raw, (result) =>
              result.exitCode === 0
                ? Option.fromNullable(decodeWordSeparators(result.stdout))
                : Option.none()
            )
            if (Option.isSome(separators)) {
              window.set("word-separators", separators.value)
            }
          }

          return { global, window }
        })

      const loadBuffer = (name: string, text: string) =>
        tmux(["load-buffer", "-b", name, "-"], text).pipe(Effect.asVoid)

      const showBuffer = (name: string) =>
        runner.run("tmux", ["show-buffer", "-b", name]).pipe(
          Effect.map((result) =>
            result.exitCode === 0 ? Option.some(result.stdout) : Option.none<string>()
          ),
          Effect.catchAll((error) =>
            Effect.logDebug(`show-buffer ${name} failed`, error.message).pipe(
              Effect.as(Option.none<string>())
            )
          )
        )

      const deleteBuffer = (name: string) =>
        runner.run("tmux", ["delete-buffer", "-b", name]).pipe(
          Effect.catchAll((error) => Effect.logDebug(`delete-buffer ${name} failed`, error.message)),
          Effect.asVoid
        )

      const setBuffer = (
        text: string,
        options: { readonly name?: string; readonly clipboard?: boolean } = {}
      ) => {
        const args = ["set-buffer"]
        if (options.clipboard) args.push("-w")
        if (options.name) args.push("-b", options.name)
        args.push("--", text)
        return tmux(args).pipe(Effect.asVoid)
      }

      const pasteBuffer = (name: string, paneId: string) =>
        tmux(["paste-buffer", "-b", name, "-t", paneId]).pipe(Effect.asVoid)

      const displayPopup = (placement: PopupPlacement, command: string) =>
        runner
          .run("tmux", buildPopupArgs(placement, command), { timeout: POPUP_TIMEOUT })
          .pipe(Effect.map((result) => result.exitCode))

      return Tmux.of({
        currentPaneId,
        capturePane,
        paneGeometry,
        readOptions,
        describeEnvironment,
        loadBuffer,
        showBuffer,
        deleteBuffer,
        setBuffer,
        pasteBuffer,
        displayPopup,
      })
    })
  )
}
