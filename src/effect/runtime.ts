/**
 * Effect runtime for the CLI programs.
 */
import { Effect, Layer } from "effect"
import { FlashConfig } from "./Config"
import { DebugLogLayer, silentLoggerLayer } from "./logging"
import { Clipboard, CommandRunner, Tmux } from "./services"

// =============================================================================
// Layer Composition
// =============================================================================

/** Tmux layer (depends on CommandRunner) */
const TmuxLayer = Tmux.layer.pipe(Layer.provide(CommandRunner.layer))

/** Config layer (reads the tmux option store) */
const ConfigLayer = FlashConfig.layer.pipe(Layer.provide(TmuxLayer))

/** Clipboard layer (depends on CommandRunner and Tmux) */
const ClipboardLayer = Clipboard.layer.pipe(
  Layer.provide(Layer.merge(CommandRunner.layer, TmuxLayer))
)

/** Full application layer */
export const AppLayer = Layer.mergeAll(
  CommandRunner.layer,
  TmuxLayer,
  ConfigLayer,
  ClipboardLayer
)

// =============================================================================
// Runtime Types
// =============================================================================

/** All services provided by the app layer */
export type AppServices = CommandRunner | Tmux | FlashConfig | Clipboard

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Run a program with the app layer. Nothing is logged while the layer is
 * built; afterwards logs go to the debug file when debug is on.
 */
export const runProgramExit = <A, E>(effect: Effect.Effect<A, E, AppServices>) =>
  Effect.runPromiseExit(
    effect.pipe(
      Effect.provide(DebugLogLayer),
      Effect.provide(AppLayer),
      Effect.provide(silentLoggerLayer)
    )
  )
