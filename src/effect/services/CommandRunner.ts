/**
 * CommandRunner service for spawning external processes.
 */
import { spawn } from "node:child_process"
import { Context, Duration, Effect, Layer } from "effect"
import { CommandError } from "../errors"

// =============================================================================
// Types
// =============================================================================

export interface CommandOptions {
  /** Written to stdin, which is then closed */
  readonly input?: string
  /** Defaults to 5 seconds */
  readonly timeout?: Duration.DurationInput
}

export interface CommandResult {
  readonly stdout: string
  readonly stderr: string
  readonly exitCode: number
}

export type CommandHandler = (
  command: string,
  args: readonly string[],
  options: CommandOptions
) => CommandResult

const DEFAULT_TIMEOUT: Duration.DurationInput = "5 seconds"

/** Fail unless the command exited with 0 */
export const expectSuccess =
  (command: string, args: readonly string[]) =>
  (result: CommandResult): Effect.Effect<CommandResult, CommandError> =>
    result.exitCode === 0
      ? Effect.succeed(result)
      : Effect.fail(
          CommandError.make({
            command,
            args: [...args],
            reason: "exit",
            exitCode: result.exitCode,
            stderr: result.stderr.trim(),
          })
        )

// =============================================================================
// CommandRunner Service
// =============================================================================

export class CommandRunner extends Context.Tag("@paneflash/CommandRunner")<
  CommandRunner,
  {
    /** Run a command to completion; non-zero exits are not failures */
    readonly run: (
      command: string,
      args: readonly string[],
      options?: CommandOptions
    ) => Effect.Effect<CommandResult, CommandError>
  }
>() {
  /** Production layer - node child processes */
  static readonly layer = Layer.sync(CommandRunner, () => {
    const run = (
      command: string,
      args: readonly string[],
      options: CommandOptions = {}
    ): Effect.Effect<CommandResult, CommandError> =>
      Effect.async<CommandResult, CommandError>((resume) => {
        let settled = false
        const settle = (effect: Effect.Effect<CommandResult, CommandError>) => {
          if (settled) return
          settled = true
          resume(effect)
        }

        const child = spawn(command, [...args], { stdio: ["pipe", "pipe", "pipe"] })

        let stdout = ""
        let stderr = ""
        child.stdout.setEncoding("utf8")
        child.stderr.setEncoding("utf8")
        child.stdout.on("data", (chunk: string) => {
          stdout += chunk
        })
        child.stderr.on("data", (chunk: string) => {
          stderr += chunk
        })

        child.on("error", (error) => {
          settle(
            Effect.fail(
              CommandError.make({ command, args: [...args], reason: "spawn", cause: error })
            )
          )
        })
        child.on("close", (code) => {
          settle(Effect.succeed({ stdout, stderr, exitCode: code ?? -1 }))
        })

        // EPIPE when the process exits before reading stdin; the exit code still reports
        child.stdin.on("error", (error) => {
          stderr += `stdin: ${error.message}\n`
        })
        child.stdin.end(options.input ?? "")

        return Effect.sync(() => {
          if (child.exitCode === null) child.kill()
        })
      }).pipe(
        Effect.timeout(options.timeout ?? DEFAULT_TIMEOUT),
        Effect.catchTag("TimeoutException", () =>
          Effect.fail(CommandError.make({ command, args: [...args], reason: "timeout" }))
        )
      )

    return CommandRunner.of({ run })
  })

  /** Test layer - answers every command through a handler */
  static readonly testLayer = (handler: CommandHandler) =>
    Layer.succeed(
      CommandRunner,
      CommandRunner.of({
        run: (command, args, options = {}) =>
          Effect.sync(() => handler(command, args, options)),
      })
    )
}
