import { describe, it, expect } from "vitest"
import { HistoryStore } from "./history"

describe("HistoryStore", () => {
  it("keeps only the most recent maxSize messages, oldest first", () => {
    const store = new HistoryStore({ maxSize: 6 })
    for (let k = 0; k <= 5; k++) {
      const id = `s${k}`
      for (let i = 1; i <= 6 + k; i++) store.append(id, i % 2 ? "user" : "assistant", `m${i}`)
      const contents = store.read(id).map((m) => m.content)
      expect(contents).toHaveLength(6)
      expect(contents).toEqual(Array.from({ length: 6 }, (_, i) => `m${k + i + 1}`))
    }
  })

  it("holds fewer than maxSize without padding", () => {
    const store = new HistoryStore({ maxSize: 4 })
    store.append("a", "user", "hello")
    store.append("a", "assistant", "hi")
    expect(store.readPairs("a")).toEqual([
      { role: "user", content: "hello" },
      { role: "assistant", content: "hi" },
    ])
  })

  it("reads the last `limit` messages in chronological order", () => {
    const store = new HistoryStore()
    ;["one", "two", "three", "four"].forEach((c) => store.append("a", "user", c))
    expect(store.read("a", 2).map((m) => m.content)).toEqual(["three", "four"])
    expect(store.read("a").map((m) => m.content)).toEqual(["one", "two", "three", "four"])
  })

  it("stamps messages with the injected clock and freezes them", () => {
    const store = new HistoryStore({ now: () => 1234 })
    store.append("a", "user", "x")
    const [msg] = store.read("a")
    expect(msg).toEqual({ role: "user", content: "x", timestamp: 1234 })
    expect(Object.isFrozen(msg)).toBe(true)
  })

  it("returns an empty list for unknown sessions", () => {
    const store = new HistoryStore()
    expect(store.read("nope")).toEqual([])
    expect(store.readPairs("nope")).toEqual([])
  })

  it("clears known sessions and reports unknown ones", () => {
    const store = new HistoryStore()
    expect(store.clear("nope")).toBe(false)
    store.append("a", "user", "x")
    expect(store.clear("a")).toBe(true)
    expect(store.read("a")).toEqual([])
    expect(store.clear("a")).toBe(false)
  })

  it("keeps sessions independent", () => {
    const store = new HistoryStore({ maxSize: 2 })
    store.append("a", "user", "a1")
    store.append("b", "user", "b1")
    store.append("a", "user", "a2")
    store.append("a", "user", "a3")
    expect(store.read("a").map((m) => m.content)).toEqual(["a2", "a3"])
    expect(store.read("b").map((m) => m.content)).toEqual(["b1"])
    expect(store.size).toBe(2)
  })

  it("sweeps only sessions idle past the retention window", () => {
    let t = 0
    const store = new HistoryStore({ retentionMs: 1000, now: () => t })
    store.append("old", "user", "x")
    t = 500
    store.append("fresh", "user", "y")
    t = 1200
    // no sweep on reads, so an idle session stays readable until swept
    expect(store.read("old")).toHaveLength(1)
    expect(store.sweepExpired()).toBe(1)
    expect(store.read("old")).toEqual([])
    expect(store.read("fresh")).toHaveLength(1)
    expect(store.sweepExpired(1501)).toBe(1)
    expect(store.size).toBe(0)
  })

  it("uses the newest message for expiry", () => {
    let t = 0
    const store = new HistoryStore({ retentionMs: 1000, now: () => t })
    store.append("a", "user", "x")
    t = 900
    store.append("a", "assistant", "y")
    expect(store.sweepExpired(1500)).toBe(0)
    expect(store.read("a")).toHaveLength(2)
  })

  it("generates unique uuid session ids", () => {
    const store = new HistoryStore()
    const ids = new Set(Array.from({ length: 50 }, () => store.newSessionId()))
    expect(ids.size).toBe(50)
    for (const id of ids) expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/)
  })

  it("rejects a non-positive capacity", () => {
    expect(() => new HistoryStore({ maxSize: 0 })).toThrow(RangeError)
  })
})
