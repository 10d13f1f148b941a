import { connect } from "node:net"
import {
  type ReachabilityPort,
  UnreachableError,
} from "../../application/ports/reachability.port"
import { Result } from "../../domain/shared/result"

/**
 * Checks that the endpoint host accepts TCP connections
 */
export class TcpReachabilityAdapter implements ReachabilityPort {
  constructor(
    private readonly host: string,
    private readonly port: number,
    private readonly timeoutMs = 2500,
  ) {}

  get target(): string {
    return `${this.host}:${this.port}`
  }

  probe(signal?: AbortSignal): Promise<Result<void, UnreachableError>> {
    return new Promise((resolve) => {
      const socket = connect({ host: this.host, port: this.port })

      const finish = (result: Result<void, UnreachableError>) => {
        clearTimeout(timer)
        signal?.removeEventListener("abort", onAbort)
        socket.destroy()
        resolve(result)
      }
      const fail = (message: string) =>
        finish(Result.err(new UnreachableError(message, this.target)))
      const onAbort = () => fail("Probe aborted")

      const timer = setTimeout(
        () => fail(`No connection within ${this.timeoutMs} ms`),
        this.timeoutMs,
      )
      socket.once("connect", () => finish(Result.ok(undefined)))
      socket.once("error", (error) => fail(error.message))

      if (signal?.aborted) onAbort()
      else signal?.addEventListener("abort", onAbort, { once: true })
    })
  }
}
