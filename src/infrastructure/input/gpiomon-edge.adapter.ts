import { type Interface, createInterface } from "node:readline"
import {
  type EdgeSourceCallbacks,
  EdgeSourceError,
  type EdgeSourcePort,
} from "../../application/ports/edge-source.port"
import { describeExit } from "../../application/ports/subprocess.port"
import type { LineBias } from "../../domain/config"
import type { LineLevel } from "../../domain/input/value-objects/button-event.vo"
import { Result, describeError } from "../../domain/shared/result"
import { ManagedProcess } from "../process/managed-process"
import { type Spawner, spawnProcess } from "../process/spawner"

export interface GpiomonOptions {
  chip: string
  line: number
  /** Button pulls the line low when pressed */
  activeLow?: boolean
  /** Defaults to pull-up for a button wired to ground */
  bias?: LineBias
  /** Major version of libgpiod's tools, their flags differ */
  gpiodVersion?: 1 | 2
  clock?: () => number
}

const EDGE = /\b(rising|falling)\b/i

/**
 * Map one line of gpiomon output to the level the button moved to
 */
export function parseEdgeLine(
  text: string,
  activeLow = true,
): LineLevel | null {
  const match = EDGE.exec(text)
  if (!match) return null
  const rising = match[1].toLowerCase() === "rising"
  return rising !== activeLow ? "active" : "inactive"
}

/**
 * Command line for `gpiomon`.
 * v1 takes the chip positionally and `-B`; v2 wants `-c` and `--bias`,
 * and spells the no-bias setting `disabled`.
 */
export function gpiomonArgs(options: GpiomonOptions): string[] {
  const { chip, line, bias = "pull-up", gpiodVersion = 1 } = options
  if (gpiodVersion === 1) {
    return ["-B", bias, chip, String(line)]
  }
  const args = ["-c", chip]
  if (bias !== "as-is") {
    args.push(`--bias=${bias === "disable" ? "disabled" : bias}`)
  }
  args.push(String(line))
  return args
}

/**
 * Edge source backed by libgpiod's `gpiomon`. Edges are stamped with
 * the monotonic clock as their lines arrive.
 */
export class GpiomonEdgeAdapter implements EdgeSourcePort {
  private monitor: ManagedProcess | null = null
  private reader: Interface | null = null
  private stopping = false

  constructor(
    private readonly options: GpiomonOptions,
    private readonly spawner: Spawner = spawnProcess,
  ) {}

  start(callbacks: EdgeSourceCallbacks): Result<void, EdgeSourceError> {
    if (this.monitor?.isAlive) {
      return Result.err(new EdgeSourceError("gpiomon is already running"))
    }

    const { chip, line, activeLow = true } = this.options
    const clock = this.options.clock ?? (() => performance.now())

    let child: ReturnType<Spawner>
    try {
      child = this.spawner("gpiomon", gpiomonArgs(this.options), {
        stdout: true,
      })
    } catch (error) {
      return Result.err(
        new EdgeSourceError(
          `Cannot start gpiomon: ${describeError(error, "spawn failed")}`,
        ),
      )
    }
    if (!child.stdout) {
      return Result.err(new EdgeSourceError("gpiomon has no output stream"))
    }

    this.stopping = false
    const monitor = new ManagedProcess(`${chip}:${line}`, child)
    this.monitor = monitor
    this.reader = createInterface({ input: child.stdout })
    this.reader.on("line", (text) => {
      const level = parseEdgeLine(text, activeLow)
      if (level) callbacks.onEdge({ level, at: clock() })
    })

    void monitor.exited.then((exit) => {
      if (this.stopping) return
      callbacks.onError(
        new EdgeSourceError(`gpiomon exited: ${describeExit(exit)}`),
      )
    })

    return Result.ok(undefined)
  }

  async stop(): Promise<void> {
    this.stopping = true
    this.reader?.close()
    this.reader = null
    const monitor = this.monitor
    this.monitor = null
    await monitor?.terminate("SIGTERM", 500)
  }
}
