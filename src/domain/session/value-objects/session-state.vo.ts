/**
 * Session state value object.
 * Exactly one of these is current at any time, owned by the orchestrator.
 */
export type SessionState =
  | "booting"
  | "connecting"
  | "ready"
  | "recording"
  | "uploading"
  | "awaitingPlayback"
  | "playing"
  | "recoveringError"
  | "shuttingDown"

export const SessionStates = {
  BOOTING: "booting" as const,
  CONNECTING: "connecting" as const,
  READY: "ready" as const,
  RECORDING: "recording" as const,
  UPLOADING: "uploading" as const,
  AWAITING_PLAYBACK: "awaitingPlayback" as const,
  PLAYING: "playing" as const,
  RECOVERING_ERROR: "recoveringError" as const,
  SHUTTING_DOWN: "shuttingDown" as const,
}
