import { createHash } from "crypto"

/** Short, non-reversible key for putting client addresses into counters. */
export const hash = (s: string, length = 16) => createHash("sha256").update(String(s)).digest("hex").slice(0, length)
