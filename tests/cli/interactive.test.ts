/**
 * Tests for the popup search loop with a scripted input queue.
 */
import { Effect, Layer, Option, Queue } from "effect"
import { describe, expect, it } from "@effect/vitest"
import {
  nextInput,
  runInteractive,
  runSearchLoop,
  searchableText,
  type PopupScreen,
} from "../../src/cli/interactive"
import { DEFAULT_SETTINGS } from "../../src/core/config"
import { buildMatchIndex } from "../../src/core/match-index"
import { createSearchSession } from "../../src/core/search-session"
import { FlashConfig } from "../../src/effect/Config"
import { CommandRunner } from "../../src/effect/services/CommandRunner"
import { Tmux } from "../../src/effect/services/Tmux"
import { fakeTmux, makeFakeTmuxState } from "../mocks/fake-tmux"

const recordingScreen = (frames: string[]): PopupScreen => ({
  columns: 80,
  rows: 24,
  write: (data) =>
    Effect.sync(() => {
      frames.push(data)
    }),
})

const scriptedInput = (chunks: string[]) =>
  Effect.gen(function* () {
    const queue = yield* Queue.unbounded<string>()
    yield* Queue.offerAll(queue, chunks)
    return queue
  })

describe("searchableText", () => {
  it("drops styling and the prompt line", () => {
    expect(searchableText("\x1b[1mcat\x1b[0m cow\nsecond\n$ ", 24)).toBe("cat cow\nsecond")
  })
})

describe("nextInput", () => {
  it.effect("waits without a timeout when idle-timeout is 0", () =>
    Effect.gen(function* () {
      const queue = yield* scriptedInput(["x"])
      const chunk = yield* nextInput(queue, { idleTimeout: 0, idleWarning: 5 }, () => Effect.void)
      expect(chunk).toEqual(Option.some("x"))
    })
  )

  it.live("counts down and gives up when idle", () =>
    Effect.gen(function* () {
      const queue = yield* Queue.unbounded<string>()
      const warnings: number[] = []
      const chunk = yield* nextInput(queue, { idleTimeout: 1, idleWarning: 3 }, (left) =>
        Effect.sync(() => {
          warnings.push(left)
        })
      )
      expect(chunk).toEqual(Option.none())
      expect(warnings).toEqual([1])
    })
  )
})

describe("runSearchLoop", () => {
  const index = buildMatchIndex("cat cow")

  it.effect("selects by label", () =>
    Effect.gen(function* () {
      const frames: string[] = []
      const outcome = yield* runSearchLoop(
        createSearchSession(index),
        "cat cow\n$ ",
        yield* scriptedInput(["c", "d"]),
        recordingScreen(frames),
        DEFAULT_SETTINGS
      )
      expect(outcome).toMatchObject({ kind: "selected", text: "cat", paste: false, via: "label" })
      // Initial frame plus one after "c"
      expect(frames).toHaveLength(2)
    })
  )

  it.effect("handles several keys in one chunk", () =>
    Effect.gen(function* () {
      const outcome = yield* runSearchLoop(
        createSearchSession(index),
        "cat cow\n$ ",
        yield* scriptedInput(["c;s"]),
        recordingScreen([]),
        DEFAULT_SETTINGS
      )
      expect(outcome).toMatchObject({ kind: "selected", text: "cow", paste: true })
    })
  )

  it.effect("cancels on escape", () =>
    Effect.gen(function* () {
      const outcome = yield* runSearchLoop(
        createSearchSession(index),
        "cat cow\n$ ",
        yield* scriptedInput(["\x1b"]),
        recordingScreen([]),
        DEFAULT_SETTINGS
      )
      expect(outcome).toEqual({ kind: "cancelled", reason: "escape" })
    })
  )

  it.live("warns, then closes when idle", () =>
    Effect.gen(function* () {
      const frames: string[] = []
      const outcome = yield* runSearchLoop(
        createSearchSession(index),
        "cat cow\n$ ",
        yield* Queue.unbounded<string>(),
        recordingScreen(frames),
        { ...DEFAULT_SETTINGS, idleTimeout: 1, idleWarning: 1 }
      )
      expect(outcome).toEqual({ kind: "idle" })
      expect(frames).toHaveLength(2)
      expect(frames[0]).not.toContain("Idle, terminating")
      expect(frames[1]).toContain("Idle, terminating in 1s...")
    })
  )
})

describe("runInteractive", () => {
  it.effect("writes the selection to the result buffer", () => {
    const state = makeFakeTmuxState()
    state.buffers.set("__paneflash_capture_%1__", "cat cow\n$ ")
    const frames: string[] = []

    return Effect.gen(function* () {
      const outcome = yield* runInteractive("%1", {
        input: scriptedInput(["c", ";", "d"]),
        screen: recordingScreen(frames),
      })
      expect(outcome).toMatchObject({ kind: "selected", text: "cat", paste: true })
      expect(state.buffers.get("__paneflash_result_%1__")).toBe('{"text":"cat","paste":true}')
      expect(frames[frames.length - 1]).toBe("\x1b[r\x1b[2J\x1b[H")
      expect(state.calls.some((call) => call.args[0] === "capture-pane")).toBe(false)
    }).pipe(
      Effect.provide(
        Layer.merge(
          Tmux.layer.pipe(Layer.provide(CommandRunner.testLayer(fakeTmux(state)))),
          FlashConfig.testLayer()
        )
      )
    )
  })

  it.effect("captures the pane when nothing was stashed and writes nothing on cancel", () => {
    const state = makeFakeTmuxState()

    return Effect.gen(function* () {
      const outcome = yield* runInteractive("%1", {
        input: scriptedInput(["\x03"]),
        screen: recordingScreen([]),
      })
      expect(outcome).toEqual({ kind: "cancelled", reason: "interrupt" })
      expect(state.calls.some((call) => call.args[0] === "capture-pane")).toBe(true)
      expect(state.buffers.size).toBe(0)
    }).pipe(
      Effect.provide(
        Layer.merge(
          Tmux.layer.pipe(Layer.provide(CommandRunner.testLayer(fakeTmux(state)))),
          FlashConfig.testLayer()
        )
      )
    )
  })
})
