import { randomUUID } from "crypto"

export type Role = "user" | "assistant"
export type Msg = { role: Role, content: string }
export type StoredMsg = Readonly<Msg & { timestamp: number }>

export type HistoryOptions = {
  maxSize?: number
  retentionMs?: number
  now?: () => number
}

// Fixed-capacity ring; the oldest entry is overwritten once full.
class Ring<T> {
  private readonly slots: (T | undefined)[]
  private head = 0
  private count = 0

  constructor(readonly capacity: number) {
    this.slots = new Array<T | undefined>(capacity)
  }

  get length() { return this.count }

  push(item: T) {
    this.slots[(this.head + this.count) % this.capacity] = item
    if (this.count < this.capacity) this.count++
    else this.head = (this.head + 1) % this.capacity
  }

  last(): T | undefined {
    return this.count ? this.slots[(this.head + this.count - 1) % this.capacity] : undefined
  }

  toArray(): T[] {
    const out: T[] = []
    for (let i = 0; i < this.count; i++) {
      const item = this.slots[(this.head + i) % this.capacity]
      if (item !== undefined) out.push(item)
    }
    return out
  }
}

/**
 * In-process conversation memory, one ring per session.
 *
 * Every method is synchronous, so calls never interleave on the event loop and
 * append order is conversation order. Expiry only happens through `sweepExpired`.
 */
export class HistoryStore {
  private readonly sessions = new Map<string, Ring<StoredMsg>>()
  readonly maxSize: number
  readonly retentionMs: number
  private readonly now: () => number

  constructor({ maxSize = 6, retentionMs = 24 * 60 * 60 * 1000, now = Date.now }: HistoryOptions = {}) {
    if (!Number.isInteger(maxSize) || maxSize < 1) throw new RangeError(`maxSize must be a positive integer, got ${maxSize}`)
    this.maxSize = maxSize
    this.retentionMs = retentionMs
    this.now = now
  }

  get size() { return this.sessions.size }

  append(sessionId: string, role: Role, content: string) {
    let ring = this.sessions.get(sessionId)
    if (!ring) {
      ring = new Ring<StoredMsg>(this.maxSize)
      this.sessions.set(sessionId, ring)
    }
    ring.push(Object.freeze({ role, content, timestamp: this.now() }))
  }

  read(sessionId: string, limit?: number): StoredMsg[] {
    const all = this.sessions.get(sessionId)?.toArray() ?? []
    return limit ? all.slice(-limit) : all
  }

  readPairs(sessionId: string): Msg[] {
    return this.read(sessionId).map(({ role, content }) => ({ role, content }))
  }

  clear(sessionId: string) {
    return this.sessions.delete(sessionId)
  }

  /** Drops every session idle for longer than the retention window. Returns how many went. */
  sweepExpired(now = this.now()) {
    let removed = 0
    for (const [id, ring] of this.sessions) {
      const newest = ring.last()
      if (!newest || now - newest.timestamp > this.retentionMs) {
        this.sessions.delete(id)
        removed++
      }
    }
    return removed
  }

  newSessionId() {
    return randomUUID()
  }
}
