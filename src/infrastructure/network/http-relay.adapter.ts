import { openAsBlob } from "node:fs"
import { rm, writeFile } from "node:fs/promises"
import { basename, extname, join } from "node:path"
import type { Logger } from "pino"
import {
  BadResponseError,
  FetchFailedError,
  type RelayPort,
  UploadFailedError,
} from "../../application/ports/relay.port"
import {
  type AudioSource,
  ServerInstruction,
} from "../../domain/instruction/value-objects/server-instruction.vo"
import { Result, describeError } from "../../domain/shared/result"

export interface HttpRelayOptions {
  endpoint: string
  uploadTimeoutMs: number
  fetchTimeoutMs: number
  /** Where fetched audio is written */
  tempDir: string
  /** Sent with every upload so the server can tell devices apart */
  deviceName: string
  fetchFn?: typeof fetch
}

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/

/**
 * Abort controller that follows an outer signal and its own deadline
 */
function linkedAbort(outer: AbortSignal | undefined, timeoutMs: number) {
  const controller = new AbortController()
  let timedOut = false

  const timer = setTimeout(() => {
    timedOut = true
    controller.abort(new Error(`timed out after ${timeoutMs} ms`))
  }, timeoutMs)
  const onAbort = () => controller.abort(outer?.reason)

  if (outer?.aborted) controller.abort(outer.reason)
  else outer?.addEventListener("abort", onAbort, { once: true })

  return {
    signal: controller.signal,
    get timedOut() {
      return timedOut
    },
    dispose() {
      clearTimeout(timer)
      outer?.removeEventListener("abort", onAbort)
    },
  }
}

/**
 * HTTP client for the processing endpoint
 */
export class HttpRelayAdapter implements RelayPort {
  private readonly fetchFn: typeof fetch
  private counter = 0

  constructor(
    private readonly options: HttpRelayOptions,
    private readonly logger: Logger,
  ) {
    this.fetchFn = options.fetchFn ?? fetch
  }

  async upload(
    filePath: string,
    signal?: AbortSignal,
  ): Promise<Result<ServerInstruction, UploadFailedError | BadResponseError>> {
    const link = linkedAbort(signal, this.options.uploadTimeoutMs)

    try {
      const name = basename(filePath)
      const form = new FormData()
      form.append("audio", await openAsBlob(filePath, { type: "audio/wav" }), name)
      form.append("filename", name)
      form.append("device", this.options.deviceName)

      const response = await this.fetchFn(this.options.endpoint, {
        method: "POST",
        body: form,
        signal: link.signal,
      })

      if (!response.ok) {
        await response.body?.cancel()
        return Result.err(
          new UploadFailedError(
            `Endpoint answered ${response.status} ${response.statusText}`.trim(),
            response.status,
          ),
        )
      }

      const text = await response.text()
      let body: unknown
      try {
        body = JSON.parse(text)
      } catch (error) {
        return Result.err(
          new BadResponseError(
            `Response is not JSON: ${describeError(error, "parse failed")}`,
          ),
        )
      }

      const instruction = ServerInstruction.parse(body)
      if (!instruction) {
        return Result.err(new BadResponseError("Response is not a JSON object"))
      }
      return Result.ok(instruction)
    } catch (error) {
      const message = link.timedOut
        ? `Upload timed out after ${this.options.uploadTimeoutMs} ms`
        : `Upload failed: ${describeError(error, "network error")}`
      return Result.err(new UploadFailedError(message))
    } finally {
      link.dispose()
    }
  }

  async fetch(
    source: AudioSource,
    signal?: AbortSignal,
  ): Promise<Result<string, FetchFailedError>> {
    if (source.kind === "inline") return this.decodeInline(source.base64)

    const link = linkedAbort(signal, this.options.fetchTimeoutMs)
    try {
      const response = await this.fetchFn(source.url, { signal: link.signal })
      if (!response.ok) {
        await response.body?.cancel()
        return Result.err(
          new FetchFailedError(`Audio fetch answered ${response.status}`),
        )
      }

      const data = Buffer.from(await response.arrayBuffer())
      if (data.length === 0) {
        return Result.err(new FetchFailedError("Audio response was empty"))
      }
      return Result.ok(await this.writeTemp(data, extensionOf(source.url)))
    } catch (error) {
      const message = link.timedOut
        ? `Audio fetch timed out after ${this.options.fetchTimeoutMs} ms`
        : `Audio fetch failed: ${describeError(error, "network error")}`
      return Result.err(new FetchFailedError(message))
    } finally {
      link.dispose()
    }
  }

  async release(path: string): Promise<void> {
    try {
      await rm(path, { force: true })
    } catch (error) {
      this.logger.warn(
        { path, err: describeError(error, "remove failed") },
        "temp-cleanup-failed",
      )
    }
  }

  private async decodeInline(
    base64: string,
  ): Promise<Result<string, FetchFailedError>> {
    const compact = base64.replace(/\s+/g, "")
    if (!BASE64.test(compact)) {
      return Result.err(new FetchFailedError("Inline audio is not valid base64"))
    }

    try {
      return Result.ok(await this.writeTemp(Buffer.from(compact, "base64"), ".wav"))
    } catch (error) {
      return Result.err(
        new FetchFailedError(
          `Cannot store inline audio: ${describeError(error, "write failed")}`,
        ),
      )
    }
  }

  private async writeTemp(data: Buffer, extension: string): Promise<string> {
    this.counter++
    const path = join(
      this.options.tempDir,
      `resp_${process.pid}_${this.counter}${extension}`,
    )
    await writeFile(path, data)
    return path
  }
}

function extensionOf(url: string): string {
  const extension = extname(new URL(url).pathname).toLowerCase()
  return /^\.[a-z0-9]{1,5}$/.test(extension) ? extension : ".wav"
}
