import type {
  AudioSource,
  ServerInstruction,
} from "../../domain/instruction/value-objects/server-instruction.vo"
import type { Result } from "../../domain/shared/result"

/**
 * Transport failure, timeout or non-success status during upload
 */
export class UploadFailedError extends Error {
  readonly code = "UPLOAD_FAILED"

  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message)
    this.name = "UploadFailedError"
  }
}

/**
 * The endpoint answered but the body was not a JSON object
 */
export class BadResponseError extends Error {
  readonly code = "BAD_RESPONSE"

  constructor(message: string) {
    super(message)
    this.name = "BadResponseError"
  }
}

/**
 * The referenced response audio could not be retrieved
 */
export class FetchFailedError extends Error {
  readonly code = "FETCH_FAILED"

  constructor(message: string) {
    super(message)
    this.name = "FetchFailedError"
  }
}

/**
 * Port interface for the remote processing endpoint.
 * Both calls honour `signal` and release their connection when aborted.
 */
export interface RelayPort {
  /**
   * Send a recording as multipart/form-data and parse the reply
   */
  upload(
    filePath: string,
    signal?: AbortSignal,
  ): Promise<Result<ServerInstruction, UploadFailedError | BadResponseError>>

  /**
   * Materialize response audio as a local file and return its path
   */
  fetch(
    source: AudioSource,
    signal?: AbortSignal,
  ): Promise<Result<string, FetchFailedError>>

  /**
   * Delete a file previously returned by fetch()
   */
  release(path: string): Promise<void>
}
