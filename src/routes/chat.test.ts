import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest"
import { mkdtempSync, rmSync } from "fs"
import { tmpdir } from "os"
import path from "path"
import type { FastifyInstance } from "fastify"
import { createServer } from "../app"
import { loadEnv } from "../config/env"
import { defaultTopicRules } from "../config/topicRules"
import type { RateLimiter } from "../services/rateLimit"

const answer = (content: string) =>
  new Response(JSON.stringify({ choices: [{ message: { role: "assistant", content } }] }), { status: 200 })

let dir: string
let fetchImpl: Mock<typeof fetch>
let app: FastifyInstance

function boot(vars: Record<string, string> = {}, limiter?: RateLimiter) {
  const env = loadEnv({ PROMPTS_DIR: dir, LOG_LEVEL: "silent", ...vars })
  const server = createServer({ env, fetch: fetchImpl, sleep: async () => {}, limiter })
  app = server.app
  return server
}

const chat = (payload: unknown, headers: Record<string, string> = { "x-api-key": "test-key" }) =>
  app.inject({ method: "POST", url: "/v1/chat", payload: JSON.stringify(payload), headers: { "content-type": "application/json", ...headers } })

beforeEach(() => {
  dir = mkdtempSync(path.join(tmpdir(), "prompts-"))
  fetchImpl = vi.fn<typeof fetch>()
})

afterEach(async () => {
  await app.close()
  rmSync(dir, { recursive: true, force: true })
})

describe("service routes", () => {
  it("reports health and version", async () => {
    boot({ APP_VERSION: "2.3.4" })
    const res = await app.inject({ method: "GET", url: "/health" })
    expect(res.statusCode).toBe(200)
    expect(res.json()).toEqual({ status: "healthy", version: "2.3.4" })
    expect(res.headers["x-process-time"]).toBeDefined()
  })

  it("describes itself at the root", async () => {
    boot()
    const res = await app.inject({ method: "GET", url: "/" })
    expect(res.json()).toEqual({ message: "Cultural Assistant API", version: "1.0.0" })
  })
})

describe("POST /v1/chat", () => {
  it("returns the reply and a session id", async () => {
    boot()
    fetchImpl.mockResolvedValueOnce(answer("Diwali is the festival of lights."))
    const res = await chat({ question: "What is the Diwali festival?" })

    expect(res.statusCode).toBe(200)
    const body = res.json()
    expect(body.response).toBe("Diwali is the festival of lights.")
    expect(typeof body.session_id).toBe("string")
    const init = fetchImpl.mock.calls[0][1]
    expect(init?.headers).toMatchObject({ authorization: "Bearer test-key" })
  })

  it("keeps the caller's session id", async () => {
    const { history } = boot()
    fetchImpl.mockResolvedValueOnce(answer("ok"))
    const res = await chat({ question: "Tell me about opera music", session_id: "abc" })
    expect(res.json()).toEqual({ response: "ok", session_id: "abc" })
    expect(history.read("abc")).toHaveLength(2)
  })

  it("requires an API key header", async () => {
    boot()
    const res = await chat({ question: "What is the Diwali festival?" }, {})
    expect(res.statusCode).toBe(401)
    expect(res.json()).toEqual({ code: 401, message: "API key required in X-API-Key header" })
    expect(fetchImpl).not.toHaveBeenCalled()
  })

  it("rejects an oversized question", async () => {
    boot()
    const res = await chat({ question: "a".repeat(1001) })
    expect(res.statusCode).toBe(422)
    expect(res.json()).toMatchObject({ code: 422, message: "Invalid request body" })
  })

  it("maps a topic rejection to 400", async () => {
    boot()
    const res = await chat({ question: "What's the weather today?" })
    expect(res.statusCode).toBe(400)
    expect(res.json()).toEqual({ code: 400, message: defaultTopicRules.rejection, details: { topic: "non-cultural" } })
  })

  it("maps upstream failures to 502", async () => {
    boot()
    fetchImpl.mockResolvedValueOnce(new Response("bad key", { status: 401 }))
    const res = await chat({ question: "What is the Diwali festival?" })
    expect(res.statusCode).toBe(502)
    expect(res.json()).toEqual({ code: 502, message: "LLM API error 401: bad key" })
  })

  it("rate limits per client", async () => {
    boot({ RATE_LIMIT_PER_MINUTE: "1" })
    fetchImpl.mockResolvedValueOnce(answer("ok"))
    expect((await chat({ question: "What is the Diwali festival?" })).statusCode).toBe(200)
    const res = await chat({ question: "What is the Diwali festival?" })
    expect(res.statusCode).toBe(429)
    expect(res.json()).toMatchObject({ code: 429, message: "Rate limit exceeded" })
  })

  it("answers with the error envelope when the rate limiter itself fails", async () => {
    boot({}, { hit: async () => { throw new Error("redis unreachable") } })
    const res = await chat({ question: "What is the Diwali festival?" })
    expect(res.statusCode).toBe(500)
    expect(res.json()).toEqual({ code: 500, message: "Internal server error" })
    expect(fetchImpl).not.toHaveBeenCalled()
    const metrics = await app.inject({ method: "GET", url: "/metrics" })
    expect(metrics.json()).toMatchObject({ errors_total: 1 })
  })
})

describe("DELETE /v1/history/:sessionId", () => {
  it("returns 404 for unknown sessions", async () => {
    boot()
    const res = await app.inject({ method: "DELETE", url: "/v1/history/nope" })
    expect(res.statusCode).toBe(404)
    expect(res.json()).toEqual({ code: 404, message: "Session not found" })
  })

  it("clears an existing session", async () => {
    const { history } = boot()
    history.append("s1", "user", "hello")
    const res = await app.inject({ method: "DELETE", url: "/v1/history/s1" })
    expect(res.statusCode).toBe(200)
    expect(res.json()).toEqual({ message: "History cleared successfully" })
    expect(history.read("s1")).toEqual([])
  })
})
