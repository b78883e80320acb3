/**
 * Tests for the Clipboard service.
 * Each test builds its layers over a fresh tmux stand-in.
 */
import { ConfigProvider, Effect, Layer } from "effect"
import { describe, expect, it } from "@effect/vitest"
import { Clipboard, type ClipboardLog } from "../../../src/effect/services/Clipboard"
import { CommandRunner } from "../../../src/effect/services/CommandRunner"
import { Tmux } from "../../../src/effect/services/Tmux"
import { fakeTmux, makeFakeTmuxState, tmuxCalls, type FakeTmuxState } from "../../mocks/fake-tmux"

const INSIDE_TMUX = new Map([["TMUX", "/tmp/tmux-test/default,1,0"]])

const withClipboard = <A, E>(
  state: FakeTmuxState,
  effect: Effect.Effect<A, E, Clipboard>,
  options: { platform?: NodeJS.Platform; env?: Map<string, string> } = {}
) => {
  const runner = CommandRunner.testLayer(fakeTmux(state))
  const tmux = Tmux.layer.pipe(Layer.provide(runner))
  const clipboard = Clipboard.layerFor(options.platform ?? "linux").pipe(
    Layer.provide(Layer.merge(runner, tmux))
  )
  return effect.pipe(
    Effect.provide(clipboard),
    Effect.withConfigProvider(ConfigProvider.fromMap(options.env ?? INSIDE_TMUX))
  )
}

describe("Clipboard", () => {
  it.effect("copies through tmux OSC 52 first", () => {
    const state = makeFakeTmuxState()
    return withClipboard(
      state,
      Effect.gen(function* () {
        const clipboard = yield* Clipboard
        expect(yield* clipboard.write("cow")).toBe("tmux-osc52")
        expect(tmuxCalls(state)).toEqual([["set-buffer", "-w", "--", "cow"]])
      })
    )
  })

  it.effect("falls back to xclip on linux", () => {
    const state = makeFakeTmuxState({ failing: new Set(["tmux set-buffer -w"]) })
    return withClipboard(
      state,
      Effect.gen(function* () {
        const clipboard = yield* Clipboard
        expect(yield* clipboard.write("cow")).toBe("xclip")
        const xclip = state.calls.find((call) => call.command === "xclip")
        expect(xclip?.args).toEqual(["-selection", "clipboard"])
        expect(xclip?.options.input).toBe("cow")
      })
    )
  })

  it.effect("falls back to xsel, then a plain buffer", () => {
    const state = makeFakeTmuxState({
      failing: new Set(["tmux set-buffer -w", "xclip", "xsel"]),
    })
    return withClipboard(
      state,
      Effect.gen(function* () {
        const clipboard = yield* Clipboard
        expect(yield* clipboard.write("cow")).toBe("tmux-buffer")
        expect(state.calls.map((call) => call.command)).toEqual(["tmux", "xclip", "xsel", "tmux"])
        expect(state.buffers.get("buffer0")).toBe("cow")
      })
    )
  })

  it.effect("uses pbcopy on macOS", () => {
    const state = makeFakeTmuxState({ failing: new Set(["tmux set-buffer -w"]) })
    return withClipboard(
      state,
      Effect.gen(function* () {
        const clipboard = yield* Clipboard
        expect(yield* clipboard.write("cow")).toBe("pbcopy")
      }),
      { platform: "darwin" }
    )
  })

  it.effect("fails when every method fails", () => {
    const state = makeFakeTmuxState({
      failing: new Set(["tmux set-buffer", "xclip", "xsel"]),
    })
    return withClipboard(
      state,
      Effect.gen(function* () {
        const clipboard = yield* Clipboard
        const error = yield* Effect.flip(clipboard.write("cow"))
        expect(error._tag).toBe("ClipboardError")
        expect(error.operation).toBe("write")
        expect(error.cause).toBeInstanceOf(AggregateError)
      })
    )
  })

  it.effect("fails outside tmux without running anything", () => {
    const state = makeFakeTmuxState()
    return withClipboard(
      state,
      Effect.gen(function* () {
        const clipboard = yield* Clipboard
        const error = yield* Effect.flip(clipboard.write("cow"))
        expect(error._tag).toBe("ClipboardError")
        expect(state.calls).toEqual([])
      }),
      { env: new Map() }
    )
  })

  it.effect("pastes into the pane when requested", () => {
    const state = makeFakeTmuxState()
    return withClipboard(
      state,
      Effect.gen(function* () {
        const clipboard = yield* Clipboard
        const method = yield* clipboard.copyAndPaste("cow", { paneId: "%1", paste: true })
        expect(method).toBe("tmux-osc52")
        expect(tmuxCalls(state)).toEqual([
          ["set-buffer", "-w", "--", "cow"],
          ["set-buffer", "-b", "__paneflash_paste__", "--", "cow"],
          ["paste-buffer", "-b", "__paneflash_paste__", "-t", "%1"],
        ])
      })
    )
  })

  it.effect("does not paste unless asked", () => {
    const state = makeFakeTmuxState()
    return withClipboard(
      state,
      Effect.gen(function* () {
        const clipboard = yield* Clipboard
        yield* clipboard.copyAndPaste("cow", { paneId: "%1", paste: false })
        expect(tmuxCalls(state)).toEqual([["set-buffer", "-w", "--", "cow"]])
      })
    )
  })

  it.effect("a failed paste still counts as copied", () => {
    const state = makeFakeTmuxState({ failing: new Set(["tmux paste-buffer"]) })
    return withClipboard(
      state,
      Effect.gen(function* () {
        const clipboard = yield* Clipboard
        const method = yield* clipboard.copyAndPaste("cow", { paneId: "%1", paste: true })
        expect(method).toBe("tmux-osc52")
      })
    )
  })

  describe("testLayer", () => {
    it.effect("records copies and pastes", () => {
      const log: ClipboardLog = { copied: [], pasted: [] }
      return Effect.gen(function* () {
        const clipboard = yield* Clipboard
        yield* clipboard.copyAndPaste("a", { paneId: "%1", paste: false })
        yield* clipboard.copyAndPaste("b", { paneId: "%2", paste: true })
        expect(log).toEqual({ copied: ["a", "b"], pasted: [{ text: "b", paneId: "%2" }] })
      }).pipe(Effect.provide(Layer.fresh(Clipboard.testLayer(log))))
    })
  })
})
