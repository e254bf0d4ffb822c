import { hash } from "../utils/hash"

export type RateLimitResult = { limited: boolean, retryAfter: number }

/** Fixed one-minute windows keyed by caller (usually the client IP). */
export interface RateLimiter {
  hit(key: string): Promise<RateLimitResult>
}

// the slice of the Upstash client the counter needs
export type Counter = {
  incr(key: string): Promise<number>
  expire(key: string, seconds: number): Promise<unknown>
}

const WINDOW_MS = 60_000

const retryAfter = (now: number) => Math.ceil((WINDOW_MS - (now % WINDOW_MS)) / 1000)

export function redisRateLimiter(redis: Counter, limit: number, now: () => number = Date.now): RateLimiter {
  return {
    async hit(ip) {
      const t = now()
      const key = `rl:${hash(ip || "unknown")}:${Math.floor(t / WINDOW_MS)}`
      const count = await redis.incr(key)
      if (count === 1) await redis.expire(key, 65)
      return { limited: count > limit, retryAfter: retryAfter(t) }
    },
  }
}

export function memoryRateLimiter(limit: number, now: () => number = Date.now): RateLimiter {
  let window = -1
  let counts = new Map<string, number>()
  return {
    async hit(ip) {
      const t = now()
      const w = Math.floor(t / WINDOW_MS)
      if (w !== window) {
        window = w
        counts = new Map()
      }
      const key = hash(ip || "unknown")
      const count = (counts.get(key) ?? 0) + 1
      counts.set(key, count)
      return { limited: count > limit, retryAfter: retryAfter(t) }
    },
  }
}
