/**
 * Domain models using Schema.Class for validation and serialization.
 */
import { Effect, Schema } from "effect"
import { SessionPayloadError } from "./errors"

// =============================================================================
// Popup Result
// =============================================================================

/** What the popup hands back to the launcher through a tmux buffer */
export class SessionResult extends Schema.Class<SessionResult>("SessionResult")({
  text: Schema.String,
  paste: Schema.Boolean,
}) {}

const SessionResultJson = Schema.parseJson(SessionResult)

export const encodeSessionResult = (result: SessionResult, buffer: string) =>
  Schema.encode(SessionResultJson)(result).pipe(
    Effect.mapError((error) => SessionPayloadError.make({ buffer, cause: error }))
  )

export const decodeSessionResult = (raw: string, buffer: string) =>
  Schema.decodeUnknown(SessionResultJson)(raw).pipe(
    Effect.mapError((error) => SessionPayloadError.make({ buffer, cause: error }))
  )
