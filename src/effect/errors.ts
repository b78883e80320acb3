/**
 * Domain errors with Schema.TaggedError for type-safe, serializable errors.
 */
import { Schema } from "effect"

// =============================================================================
// Process Errors
// =============================================================================

/** An external command could not run, timed out or exited non-zero */
export class CommandError extends Schema.TaggedError<CommandError>()(
  "CommandError",
  {
    command: Schema.String,
    args: Schema.Array(Schema.String),
    reason: Schema.Literal("spawn", "timeout", "exit"),
    exitCode: Schema.optional(Schema.Number),
    stderr: Schema.optional(Schema.String),
    cause: Schema.optional(Schema.Defect),
  }
) {
  get message(): string {
    const invocation = [this.command, ...this.args.slice(0, 2)].join(" ")
    switch (this.reason) {
      case "spawn":
        return `Failed to run ${invocation}`
      case "timeout":
        return `${invocation} timed out`
      case "exit":
        return `${invocation} exited with code ${this.exitCode ?? "unknown"}`
    }
  }
}

// =============================================================================
// Tmux Errors
// =============================================================================

/** Capturing pane contents or geometry failed */
export class PaneCaptureError extends Schema.TaggedError<PaneCaptureError>()(
  "PaneCaptureError",
  {
    paneId: Schema.String,
    cause: Schema.Defect,
  }
) {
  get message(): string {
    return `Failed to capture pane ${this.paneId}`
  }
}

/** No pane could be resolved for the session */
export class PaneNotFoundError extends Schema.TaggedError<PaneNotFoundError>()(
  "PaneNotFoundError",
  {
    cause: Schema.optional(Schema.Defect),
  }
) {
  get message(): string {
    return "Could not determine the target tmux pane"
  }
}

// =============================================================================
// Clipboard Errors
// =============================================================================

/** Clipboard operation failed */
export class ClipboardError extends Schema.TaggedError<ClipboardError>()(
  "ClipboardError",
  {
    operation: Schema.Literal("write", "paste"),
    cause: Schema.Defect,
  }
) {
  get message(): string {
    return `Clipboard ${this.operation} failed`
  }
}

// =============================================================================
// Session Errors
// =============================================================================

/** The popup's result buffer could not be decoded */
export class SessionPayloadError extends Schema.TaggedError<SessionPayloadError>()(
  "SessionPayloadError",
  {
    buffer: Schema.String,
    cause: Schema.Defect,
  }
) {
  get message(): string {
    return `Invalid session payload in buffer ${this.buffer}`
  }
}
