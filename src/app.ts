import { randomUUID } from "crypto"
import Fastify from "fastify"
import cors from "@fastify/cors"
import { loadEnv, type Env } from "./config/env"
import { createMetrics } from "./config/metrics"
import { PromptTemplate } from "./config/promptTemplate"
import { ChatPipeline } from "./helpers/chatTurn"
import { HistoryStore } from "./services/history"
import { LlmClient } from "./services/llmClient"
import { memoryRateLimiter, redisRateLimiter, type RateLimiter } from "./services/rateLimit"
import { getRedis } from "./services/redis"
import { TopicGate } from "./services/topicGate"
import healthRoutes from "./routes/health"
import chatRoutes from "./routes/chat"
import historyRoutes from "./routes/history"

export type ServerOptions = {
  env?: Env
  fetch?: typeof fetch
  sleep?: (ms: number) => Promise<void>
  limiter?: RateLimiter
  now?: () => number
}

export function createServer(opts: ServerOptions = {}) {
  const env = opts.env ?? loadEnv()
  const app = Fastify({
    logger: { name: env.APP_NAME, level: env.LOG_LEVEL },
    bodyLimit: env.BODY_LIMIT_BYTES,
    genReqId: () => randomUUID(),
  })
  app.register(cors, { origin: true })

  app.addHook("onSend", async (_req, reply, payload) => {
    reply.header("X-Process-Time", String(reply.elapsedTime / 1000))
    return payload
  })

  const recorder = createMetrics()
  const history = new HistoryStore({
    maxSize: env.HISTORY_SIZE,
    retentionMs: env.RETENTION_HOURS * 60 * 60 * 1000,
    now: opts.now,
  })
  const prompts = PromptTemplate.load(env.PROMPTS_DIR)
  const client = new LlmClient({
    baseUrl: env.LLM_BASE_URL,
    timeoutMs: env.TIMEOUT_MS,
    maxAttempts: env.RETRY_ATTEMPTS,
    minDelayMs: env.RETRY_MIN_MS,
    maxDelayMs: env.RETRY_MAX_MS,
    fetch: opts.fetch,
    sleep: opts.sleep,
    logger: app.log.child({ module: "llm" }),
    metrics: recorder,
  })
  const pipeline = new ChatPipeline({
    gate: new TopicGate(),
    history,
    prompts,
    client,
    logger: app.log.child({ module: "pipeline" }),
    model: env.LLM_MODEL,
    temperature: env.TEMPERATURE,
    maxTokens: env.MAX_OUTPUT_TOKENS || undefined,
    maxWords: env.MAX_OUTPUT_WORDS,
  })

  const redis = getRedis(env)
  const limiter = opts.limiter
    ?? (redis ? redisRateLimiter(redis, env.RATE_LIMIT_PER_MINUTE) : memoryRateLimiter(env.RATE_LIMIT_PER_MINUTE))

  const sweeper = setInterval(() => {
    const removed = history.sweepExpired()
    if (removed) app.log.info({ removed, live: history.size }, "expired sessions swept")
  }, env.SWEEP_INTERVAL_MS)
  sweeper.unref()
  app.addHook("onClose", async () => clearInterval(sweeper))

  app.register(async (f) => healthRoutes(f, env, recorder.metrics))
  app.register(async (f) => chatRoutes(f, { pipeline, limiter, recorder }))
  app.register(async (f) => historyRoutes(f, pipeline))

  return { app, env, history, prompts, pipeline }
}
