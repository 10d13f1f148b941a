import { describe, expect, it } from "vitest"
import type { ButtonEvent, RawEdge } from "../value-objects/button-event.vo"
import { GestureDecoder } from "./gesture-decoder.service"

const press = (at: number): RawEdge => ({ level: "active", at })
const release = (at: number): RawEdge => ({ level: "inactive", at })

function run(edges: RawEdge[], until: number): ButtonEvent[] {
  const decoder = new GestureDecoder()
  const events: ButtonEvent[] = []
  for (const edge of edges) {
    events.push(...decoder.push(edge))
  }
  events.push(...decoder.tick(until))
  return events
}

describe("GestureDecoder", () => {
  describe("single press", () => {
    it("emits one down then one up for a short tap once the window closes", () => {
      expect(run([press(0), release(100)], 600)).toEqual([
        { type: "down", at: 0 },
        { type: "up", at: 100 },
      ])
    })

    it("holds back a tap while a second press could still follow", () => {
      expect(run([press(0), release(100)], 450)).toEqual([])
    })

    it("emits down as soon as a press turns into a hold", () => {
      const decoder = new GestureDecoder()
      decoder.push(press(0))

      expect(decoder.tick(299)).toEqual([])
      expect(decoder.tick(300)).toEqual([{ type: "down", at: 0 }])

      decoder.push(release(2000))
      expect(decoder.tick(2100)).toEqual([{ type: "up", at: 2000 }])
    })

    it("ignores contact bounce shorter than the debounce window", () => {
      const edges = [press(0), release(5), press(10), release(200)]
      expect(run(edges, 1000)).toEqual([
        { type: "down", at: 10 },
        { type: "up", at: 200 },
      ])
    })

    it("ignores a glitch that never settles", () => {
      expect(run([press(0), release(10)], 1000)).toEqual([])
    })
  })

  describe("double tap", () => {
    it("replaces two quick taps with exactly one doubleTap", () => {
      const edges = [press(0), release(100), press(250), release(350)]
      expect(run(edges, 1000)).toEqual([{ type: "doubleTap", at: 350 }])
    })

    it("treats taps further apart than the window as two presses", () => {
      const edges = [press(0), release(100), press(600), release(700)]
      expect(run(edges, 1500)).toEqual([
        { type: "down", at: 0 },
        { type: "up", at: 100 },
        { type: "down", at: 600 },
        { type: "up", at: 700 },
      ])
    })

    it("falls back to hold events when the second press is held", () => {
      const decoder = new GestureDecoder()
      decoder.push(press(0))
      decoder.push(release(100))
      decoder.push(press(250))

      expect(decoder.tick(700)).toEqual([
        { type: "down", at: 0 },
        { type: "up", at: 100 },
        { type: "down", at: 250 },
      ])

      decoder.push(release(1500))
      expect(decoder.tick(1600)).toEqual([{ type: "up", at: 1500 }])
    })

    it("does not pair a hold with a following tap", () => {
      const edges = [press(0), release(500), press(600), release(650)]
      expect(run(edges, 2000)).toEqual([
        { type: "down", at: 0 },
        { type: "up", at: 500 },
        { type: "down", at: 600 },
        { type: "up", at: 650 },
      ])
    })
  })

  it("releases a pending tap when an edge arrives out of order", () => {
    const decoder = new GestureDecoder()
    decoder.push(press(0))
    decoder.push(release(100))
    expect(decoder.tick(200)).toEqual([])

    expect(decoder.push(press(150))).toEqual([
      { type: "down", at: 0 },
      { type: "up", at: 100 },
    ])
  })

  it("is deterministic for the same edge sequence", () => {
    const edges = [press(0), release(80), press(200), release(260)]
    expect(run(edges, 900)).toEqual(run(edges, 900))
  })
})
