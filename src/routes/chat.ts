// src/routes/chat.ts
import type { FastifyInstance, FastifyReply } from "fastify"
import type { MetricsRecorder } from "../config/metrics"
import { OutOfScopeError, UpstreamError, ValidationError } from "../errors"
import type { ChatPipeline } from "../helpers/chatTurn"
import { parseChatRequest, type ChatResponse, type ErrorResponse } from "../schemas"
import type { RateLimiter } from "../services/rateLimit"

export type ChatRouteDeps = {
  pipeline: ChatPipeline
  limiter: RateLimiter
  recorder: MetricsRecorder
}

const fail = (reply: FastifyReply, code: number, message: string, details?: Record<string, unknown>) =>
  reply.code(code).send({ code, message, ...(details ? { details } : {}) } satisfies ErrorResponse)

export default async function chatRoutes(app: FastifyInstance, { pipeline, limiter, recorder }: ChatRouteDeps) {
  const { metrics } = recorder

  app.post("/v1/chat", async (req, reply) => {
    try {
      const rl = await limiter.hit(req.ip)
      if (rl.limited) {
        metrics.rate_limited_total++
        reply.header("Retry-After", String(rl.retryAfter))
        return fail(reply, 429, "Rate limit exceeded", { retry_after: `${rl.retryAfter} seconds` })
      }

      // the credential only ever comes from the header, never the body
      const apiKey = req.headers["x-api-key"]
      if (typeof apiKey !== "string" || !apiKey.trim()) {
        return fail(reply, 401, "API key required in X-API-Key header")
      }

      const body = parseChatRequest(req.body)
      const { reply: text, sessionId } = await pipeline.processTurn({
        sessionId: body.session_id,
        question: body.question,
        locale: body.locale,
        credential: apiKey.trim(),
      })
      return reply.send({ response: text, session_id: sessionId } satisfies ChatResponse)
    } catch (e) {
      if (e instanceof ValidationError) return fail(reply, 422, e.message, { issues: e.issues })
      if (e instanceof OutOfScopeError) {
        metrics.rejected_total++
        return fail(reply, 400, e.message, { topic: "non-cultural" })
      }
      metrics.errors_total++
      if (e instanceof UpstreamError) {
        req.log.error({ err: e.message }, "chat-upstream-fail")
        return fail(reply, 502, e.message)
      }
      req.log.error({ err: e instanceof Error ? e.message : String(e) }, "chat-fail")
      return fail(reply, 500, "Internal server error")
    }
  })
}
