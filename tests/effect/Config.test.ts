/**
 * Tests for FlashConfig resolution from the tmux option store.
 */
import { ConfigProvider, Effect, Layer } from "effect"
import { describe, expect, it } from "@effect/vitest"
import { DEFAULT_SETTINGS } from "../../src/core/config"
import { FALLBACK_DEBUG_LOG_PATH, FlashConfig, debugLogPathConfig } from "../../src/effect/Config"
import { CommandRunner } from "../../src/effect/services/CommandRunner"
import { Tmux } from "../../src/effect/services/Tmux"
import { fakeTmux, makeFakeTmuxState, type FakeTmuxState } from "../mocks/fake-tmux"

const configLayer = (state: FakeTmuxState) =>
  FlashConfig.layer.pipe(
    Layer.provide(Tmux.layer),
    Layer.provide(CommandRunner.testLayer(fakeTmux(state)))
  )

describe("FlashConfig", () => {
  it.effect("reads user options and the debug log path", () => {
    const state = makeFakeTmuxState({
      globalOptions: [
        "@paneflash-debug on",
        '@paneflash-prompt-indicator "❯"',
        "@paneflash-idle-timeout 30",
        "@paneflash-reverse-search off",
      ].join("\n"),
      windowOptions: 'word-separators " -/"\n',
    })
    return Effect.gen(function* () {
      const config = yield* FlashConfig
      expect(config.debug).toBe(true)
      expect(config.promptIndicator).toBe("❯")
      expect(config.idleTimeout).toBe(30)
      expect(config.reverseSearch).toBe(false)
      expect(config.wordSeparators).toBe(" -/")
      expect(config.debugLogPath).toBe("/tmp/paneflash-test/custom.log")
    }).pipe(
      Effect.provide(configLayer(state)),
      Effect.withConfigProvider(
        ConfigProvider.fromMap(new Map([["PANEFLASH_DEBUG_LOG", "/tmp/paneflash-test/custom.log"]]))
      )
    )
  })

  it.effect("defaults the log path to the home directory", () =>
    Effect.gen(function* () {
      const config = yield* FlashConfig
      expect(config.debugLogPath).toBe("/home/tester/.paneflash-debug.log")
    }).pipe(
      Effect.provide(configLayer(makeFakeTmuxState())),
      Effect.withConfigProvider(ConfigProvider.fromMap(new Map([["HOME", "/home/tester"]])))
    )
  )

  it.effect("uses defaults when tmux has nothing set", () =>
    Effect.gen(function* () {
      const { debugLogPath, ...settings } = yield* FlashConfig
      expect(settings).toEqual(DEFAULT_SETTINGS)
      expect(debugLogPath).toBe(FALLBACK_DEBUG_LOG_PATH)
    }).pipe(
      Effect.provide(configLayer(makeFakeTmuxState())),
      Effect.withConfigProvider(ConfigProvider.fromMap(new Map()))
    )
  )

  it.effect("log path config resolves without any environment", () =>
    Effect.gen(function* () {
      expect(yield* debugLogPathConfig).toBe("/tmp/paneflash-debug.log")
    }).pipe(Effect.withConfigProvider(ConfigProvider.fromMap(new Map())))
  )

  it.effect("testLayer applies overrides", () =>
    Effect.gen(function* () {
      const config = yield* FlashConfig
      expect(config.caseSensitive).toBe(true)
      expect(config.labelCharacters).toBe(DEFAULT_SETTINGS.labelCharacters)
    }).pipe(Effect.provide(FlashConfig.testLayer({ caseSensitive: true })))
  )
})
