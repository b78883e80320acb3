/**
 * Session configuration service.
 *
 * User settings live in the tmux option store; the debug log path comes from
 * the environment through Effect.Config.
 */
import { Config, Context, Effect, Layer } from "effect"
import { DEFAULT_SETTINGS, type FlashSettings } from "../core/config"
import { resolveSettings } from "../core/tmux-options"
import { Tmux } from "./services/Tmux"

// =============================================================================
// FlashConfig Service
// =============================================================================

export interface FlashConfigShape extends FlashSettings {
  readonly debugLogPath: string
}

/** Used when neither $PANEFLASH_DEBUG_LOG nor $HOME is set */
export const FALLBACK_DEBUG_LOG_PATH = "/tmp/paneflash-debug.log"

/** Debug log location: $PANEFLASH_DEBUG_LOG, else ~/.paneflash-debug.log */
export const debugLogPathConfig = Config.string("PANEFLASH_DEBUG_LOG").pipe(
  Config.orElse(() =>
    Config.string("HOME").pipe(Config.map((home) => `${home}/.paneflash-debug.log`))
  ),
  Config.withDefault(FALLBACK_DEBUG_LOG_PATH)
)

export class FlashConfig extends Context.Tag("@paneflash/FlashConfig")<
  FlashConfig,
  FlashConfigShape
>() {
  /** Production layer - reads the tmux option store */
  static readonly layer = Layer.effect(
    FlashConfig,
    Effect.gen(function* () {
      const tmux = yield* Tmux
      const options = yield* tmux.readOptions()
      const debugLogPath = yield* debugLogPathConfig.pipe(Effect.orDie)

      return FlashConfig.of({
        ...resolveSettings(options.global, options.window),
        debugLogPath,
      })
    })
  )

  /** Test layer - defaults, with optional overrides */
  static readonly testLayer = (overrides: Partial<FlashConfigShape> = {}) =>
    Layer.succeed(
      FlashConfig,
      FlashConfig.of({
        ...DEFAULT_SETTINGS,
        debugLogPath: "/tmp/paneflash-test/debug.log",
        ...overrides,
      })
    )
}
