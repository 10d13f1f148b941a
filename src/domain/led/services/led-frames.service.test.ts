import { describe, expect, it } from "vitest"
import { resolveLedPattern } from "../value-objects/led-pattern.vo"
import { hsv, OFF_FRAME, renderPattern } from "./led-frames.service"

describe("renderPattern", () => {
  it("fills both pixels green when ready", () => {
    expect(renderPattern("ready", 1234)).toEqual([
      { r: 0, g: 255, b: 0 },
      { r: 0, g: 255, b: 0 },
    ])
  })

  it("breathes orange around the midpoint while connecting", () => {
    expect(renderPattern("connecting", 0)[0]).toEqual({ r: 184, g: 119, b: 0 })
  })

  it("starts the recording sweep at red and moves through hue", () => {
    expect(renderPattern("recording", 0)[0]).toEqual({ r: 255, g: 0, b: 0 })
    expect(renderPattern("recording", 360)[0]).toEqual({ r: 153, g: 255, b: 0 })
  })

  it("strobes red on and off for errors", () => {
    expect(renderPattern("error", 0)[0]).toEqual({ r: 255, g: 0, b: 30 })
    expect(renderPattern("error", 80)).toEqual(OFF_FRAME)
    expect(renderPattern("error", 160)[1]).toEqual({ r: 255, g: 0, b: 30 })
  })

  it("renders the chatter pattern with its flicker applied", () => {
    const [left, right] = renderPattern("playback", 0)
    expect(left).toEqual(right)
    expect(left.r).toBe(103)
    expect(left.g).toBe(103)
    expect(left.b).toBeGreaterThanOrEqual(178)
    expect(left.b).toBeLessThanOrEqual(179)

    const later = renderPattern("playback", 170)
    expect(later[0]).not.toEqual(later[1])
  })

  it("flashes cyan for an unknown instruction", () => {
    expect(renderPattern("unknown", 10)[0]).toEqual({ r: 0, g: 180, b: 255 })
  })
})

describe("hsv", () => {
  it("maps primary hues", () => {
    expect(hsv(120)).toEqual({ r: 0, g: 255, b: 0 })
    expect(hsv(240)).toEqual({ r: 0, g: 0, b: 255 })
    expect(hsv(360)).toEqual({ r: 255, g: 0, b: 0 })
  })
})

describe("resolveLedPattern", () => {
  it("accepts colour words and pattern names", () => {
    expect(resolveLedPattern("white")).toBe("ready")
    expect(resolveLedPattern(" Rainbow ")).toBe("recording")
    expect(resolveLedPattern("red")).toBe("error")
    expect(resolveLedPattern("playback")).toBe("playback")
  })

  it("treats off and blank as no pattern", () => {
    expect(resolveLedPattern("off")).toBeNull()
    expect(resolveLedPattern("  ")).toBeNull()
  })

  it("maps anything else to unknown", () => {
    expect(resolveLedPattern("sparkle")).toBe("unknown")
  })
})
