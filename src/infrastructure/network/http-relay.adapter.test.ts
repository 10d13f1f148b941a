import { existsSync } from "node:fs"
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import pino from "pino"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { HttpRelayAdapter } from "./http-relay.adapter"

type FetchInput = string | URL | Request

describe("HttpRelayAdapter", () => {
  let dir = ""
  let recording = ""

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pushtalk-relay-"))
    recording = join(dir, "rec_1.wav")
    await writeFile(recording, Buffer.from("RIFF0000WAVE"))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  function relay(fetchFn: typeof fetch, timeoutMs = 1000) {
    return new HttpRelayAdapter(
      {
        endpoint: "https://relay.test/api/voice",
        uploadTimeoutMs: timeoutMs,
        fetchTimeoutMs: timeoutMs,
        tempDir: dir,
        deviceName: "porch",
        fetchFn,
      },
      pino({ level: "silent" }),
    )
  }

  const json = (body: unknown) =>
    new Response(JSON.stringify(body), {
      status: 200,
      headers: { "content-type": "application/json" },
    })

  /** Never answers; rejects once the request is aborted */
  const hanging = async (_input: FetchInput, init?: RequestInit) =>
    new Promise<Response>((_resolve, reject) => {
      const fail = () => reject(new Error("This operation was aborted"))
      if (init?.signal?.aborted) fail()
      init?.signal?.addEventListener("abort", fail)
    })

  describe("upload", () => {
    it("posts the recording as multipart form data", async () => {
      const fetchFn = vi.fn(async (_input: FetchInput, _init?: RequestInit) =>
        json({ led: "green" }),
      )

      const result = await relay(fetchFn).upload(recording)

      expect(result.ok).toBe(true)
      if (result.ok) expect(result.value.ledPattern).toBe("ready")

      const [url, init] = fetchFn.mock.calls[0]
      expect(url).toBe("https://relay.test/api/voice")
      expect(init?.method).toBe("POST")
      const form = init?.body
      if (!(form instanceof FormData)) throw new Error("expected FormData")
      expect(form.get("filename")).toBe("rec_1.wav")
      expect(form.get("device")).toBe("porch")
      const audio = form.get("audio")
      expect(audio).toBeInstanceOf(Blob)
      if (audio instanceof Blob) expect(audio.size).toBe(12)
    })

    it("fails with the status on a non-success answer", async () => {
      const fetchFn = vi.fn(
        async () =>
          new Response("upstream down", { status: 502, statusText: "Bad Gateway" }),
      )

      const result = await relay(fetchFn).upload(recording)

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.code).toBe("UPLOAD_FAILED")
        expect(result.error.message).toBe("Endpoint answered 502 Bad Gateway")
      }
    })

    it("rejects a body that is not JSON", async () => {
      const fetchFn = vi.fn(async () => new Response("<html>", { status: 200 }))

      const result = await relay(fetchFn).upload(recording)

      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.code).toBe("BAD_RESPONSE")
    })

    it("rejects JSON that is not an object", async () => {
      const fetchFn = vi.fn(async () => json(["led", "red"]))

      const result = await relay(fetchFn).upload(recording)

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.message).toBe("Response is not a JSON object")
      }
    })

    it("gives up after the upload timeout", async () => {
      const result = await relay(hanging, 20).upload(recording)

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.message).toBe("Upload timed out after 20 ms")
      }
    })

    it("aborts when the caller's signal fires", async () => {
      const controller = new AbortController()
      const pending = relay(hanging).upload(recording, controller.signal)
      controller.abort()

      const result = await pending

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.message).toBe(
          "Upload failed: This operation was aborted",
        )
      }
    })

    it("reports a recording that cannot be read", async () => {
      const fetchFn = vi.fn(async () => json({}))

      const result = await relay(fetchFn).upload(join(dir, "missing.wav"))

      expect(result.ok).toBe(false)
      expect(fetchFn).not.toHaveBeenCalled()
    })
  })

  describe("fetch", () => {
    it("downloads referenced audio into the temp dir", async () => {
      const fetchFn = vi.fn(async () => new Response(Buffer.from("RIFFdata")))
      const client = relay(fetchFn)

      const result = await client.fetch({
        kind: "url",
        url: "https://cdn.test/replies/42.mp3?sig=abc",
      })

      if (!result.ok) throw result.error
      expect(result.value.startsWith(dir)).toBe(true)
      expect(result.value.endsWith(".mp3")).toBe(true)
      expect((await readFile(result.value)).toString()).toBe("RIFFdata")

      await client.release(result.value)
      expect(existsSync(result.value)).toBe(false)
    })

    it("decodes inline base64 audio", async () => {
      const fetchFn = vi.fn(async () => json({}))

      const result = await relay(fetchFn).fetch({ kind: "inline", base64: "UklGRg==" })

      if (!result.ok) throw result.error
      expect((await readFile(result.value)).toString()).toBe("RIFF")
      expect(result.value.endsWith(".wav")).toBe(true)
      expect(fetchFn).not.toHaveBeenCalled()
    })

    it("rejects inline audio that is not base64", async () => {
      const result = await relay(vi.fn(async () => json({}))).fetch({
        kind: "inline",
        base64: "not base64!",
      })

      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.code).toBe("FETCH_FAILED")
    })

    it("fails on a missing resource", async () => {
      const fetchFn = vi.fn(async () => new Response("gone", { status: 404 }))

      const result = await relay(fetchFn).fetch({
        kind: "url",
        url: "https://cdn.test/x.wav",
      })

      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.message).toBe("Audio fetch answered 404")
    })

    it("times out a stalled download", async () => {
      const result = await relay(hanging, 20).fetch({
        kind: "url",
        url: "https://cdn.test/x.wav",
      })

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.message).toBe("Audio fetch timed out after 20 ms")
      }
    })
  })
})
