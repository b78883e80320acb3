/**
 * Clipboard service for copying from inside tmux.
 *
 * Tries tmux's OSC 52 forwarding first, then the platform clipboard tools,
 * then a plain tmux buffer.
 */
import { Config, Context, Effect, Layer, Option } from "effect"
import { PASTE_BUFFER_NAME } from "../../core/popup"
import { ClipboardError, CommandError } from "../errors"
import { CommandRunner, expectSuccess } from "./CommandRunner"
import { Tmux } from "./Tmux"

// =============================================================================
// Types
// =============================================================================

export type CopyMethod = "tmux-osc52" | "pbcopy" | "xclip" | "xsel" | "tmux-buffer"

export interface PasteRequest {
  readonly paneId: string
  readonly paste: boolean
}

/** Record kept by the test layer */
export interface ClipboardLog {
  readonly copied: string[]
  readonly pasted: Array<{ readonly text: string; readonly paneId: string }>
}

interface CopyStrategy {
  readonly method: CopyMethod
  readonly copy: (text: string) => Effect.Effect<void, CommandError>
}

// =============================================================================
// Clipboard Service
// =============================================================================

export class Clipboard extends Context.Tag("@paneflash/Clipboard")<
  Clipboard,
  {
    /** Copy text, returning the method that worked */
    readonly write: (text: string) => Effect.Effect<CopyMethod, ClipboardError>
    /** Copy, then paste into the pane when requested; paste failures are logged */
    readonly copyAndPaste: (
      text: string,
      request: PasteRequest
    ) => Effect.Effect<CopyMethod, ClipboardError>
  }
>() {
  /** Production layer for the running platform */
  static readonly layer = Layer.effect(
    Clipboard,
    Effect.suspend(() => makeClipboard(process.platform))
  )

  /** Layer for a given platform */
  static readonly layerFor = (platform: NodeJS.Platform) =>
    Layer.effect(Clipboard, makeClipboard(platform))

  /** Test layer - records copies and pastes */
  static readonly testLayer = (log: ClipboardLog) =>
    Layer.succeed(
      Clipboard,
      Clipboard.of({
        write: (text) =>
          Effect.sync(() => {
            log.copied.push(text)
            return "tmux-buffer" as const
          }),
        copyAndPaste: (text, request) =>
          Effect.sync(() => {
            log.copied.push(text)
            if (request.paste) log.pasted.push({ text, paneId: request.paneId })
            return "tmux-buffer" as const
          }),
      })
    )
}

const makeClipboard = (platform: NodeJS.Platform) =>
  Effect.gen(function* () {
    const runner = yield* CommandRunner
    const tmux = yield* Tmux

    const piped = (method: CopyMethod, command: string, args: readonly string[]): CopyStrategy => ({
      method,
      copy: (text) =>
        runner
          .run(command, args, { input: text })
          .pipe(Effect.flatMap(expectSuccess(command, args)), Effect.asVoid),
    })

    const strategies: CopyStrategy[] = [
      { method: "tmux-osc52", copy: (text) => tmux.setBuffer(text, { clipboard: true }) },
    ]
    if (platform === "darwin") {
      strategies.push(piped("pbcopy", "pbcopy", []))
    } else if (platform === "linux") {
      strategies.push(
        piped("xclip", "xclip", ["-selection", "clipboard"]),
        piped("xsel", "xsel", ["--clipboard", "--input"])
      )
    }
    strategies.push({ method: "tmux-buffer", copy: (text) => tmux.setBuffer(text) })

    const write = (text: string): Effect.Effect<CopyMethod, ClipboardError> =>
      Effect.gen(function* () {
        const session = yield* Config.option(Config.string("TMUX")).pipe(
          Effect.orElseSucceed(() => Option.none<string>())
        )
        if (Option.isNone(session)) {
          yield* Effect.logDebug("Clipboard: not inside tmux")
          return yield* ClipboardError.make({
            operation: "write",
            cause: new Error("Not running inside tmux"),
          })
        }

        const failures: CommandError[] = []
        for (const strategy of strategies) {
          const attempt = yield* Effect.either(strategy.copy(text))
          if (attempt._tag === "Right") {
            yield* Effect.logDebug(`Clipboard: success via ${strategy.method}`)
            return strategy.method
          }
          failures.push(attempt.left)
          yield* Effect.logDebug(`Clipboard: ${strategy.method} failed`, attempt.left.message)
        }

        return yield* ClipboardError.make({
          operation: "write",
          cause: new AggregateError(failures, "All clipboard methods failed"),
        })
      })

    const copyAndPaste = (
      text: string,
      request: PasteRequest
    ): Effect.Effect<CopyMethod, ClipboardError> =>
      Effect.gen(function* () {
        const method = yield* write(text)
        if (!request.paste) return method

        yield* tmux.setBuffer(text, { name: PASTE_BUFFER_NAME }).pipe(
          Effect.zipRight(tmux.pasteBuffer(PASTE_BUFFER_NAME, request.paneId)),
          Effect.tap(() => Effect.logDebug(`Auto-paste to pane ${request.paneId}: success`)),
          Effect.catchAll((error) =>
            Effect.logWarning(`Auto-paste to pane ${request.paneId} failed`, error.message)
          )
        )
        return method
      })

    return Clipboard.of({ write, copyAndPaste })
  })
