// src/services/llmClient.ts
import type { BaseLogger } from "pino"
import type { MetricsRecorder } from "../config/metrics"
import {
  MalformedResponseError,
  TransportFailure,
  UpstreamApplicationError,
} from "../errors"

export type ChatMessage = { role: "system" | "user" | "assistant", content: string }

export type CompletionRequest = {
  model: string
  messages: ChatMessage[]
  credential: string
  temperature?: number
  maxTokens?: number
}

export type LlmClientOptions = {
  baseUrl?: string
  timeoutMs?: number
  maxAttempts?: number
  minDelayMs?: number
  maxDelayMs?: number
  fetch?: typeof fetch
  sleep?: (ms: number) => Promise<void>
  logger: BaseLogger
  metrics?: MetricsRecorder
}

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

/** Only transport failures are retried; a status code from the provider is final. */
export const isRetryable = (err: unknown) => err instanceof TransportFailure

export function backoffDelay(attempt: number, minMs: number, maxMs: number) {
  return Math.min(minMs * 2 ** (attempt - 1), maxMs)
}

export class LlmClient {
  readonly baseUrl: string
  readonly timeoutMs: number
  readonly maxAttempts: number
  private readonly minDelayMs: number
  private readonly maxDelayMs: number
  private readonly fetchImpl: typeof fetch
  private readonly sleep: (ms: number) => Promise<void>
  private readonly log: BaseLogger
  private readonly metrics?: MetricsRecorder

  constructor(opts: LlmClientOptions) {
    this.baseUrl = (opts.baseUrl ?? "https://api.mistral.ai/v1").replace(/\/+$/, "")
    this.timeoutMs = opts.timeoutMs ?? 30000
    this.maxAttempts = Math.max(1, opts.maxAttempts ?? 3)
    this.minDelayMs = opts.minDelayMs ?? 4000
    this.maxDelayMs = opts.maxDelayMs ?? 10000
    this.fetchImpl = opts.fetch ?? fetch
    this.sleep = opts.sleep ?? wait
    this.log = opts.logger
    this.metrics = opts.metrics
  }

  async complete(req: CompletionRequest): Promise<unknown> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.attempt(req, attempt)
      } catch (err) {
        if (!isRetryable(err) || attempt >= this.maxAttempts) throw err
        const delay = backoffDelay(attempt, this.minDelayMs, this.maxDelayMs)
        if (this.metrics) this.metrics.metrics.retries_total++
        this.log.warn({ attempt, delay_ms: delay }, "llm transport failure, retrying")
        await this.sleep(delay)
      }
    }
  }

  private async attempt(req: CompletionRequest, attempt: number): Promise<unknown> {
    const payload: Record<string, unknown> = {
      model: req.model,
      messages: req.messages,
      temperature: req.temperature ?? 0.7,
    }
    if (req.maxTokens) payload.max_tokens = req.maxTokens

    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), this.timeoutMs)
    const t0 = Date.now()
    if (this.metrics) this.metrics.metrics.calls_total++

    try {
      let res: Response
      let text: string
      try {
        res = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
          method: "POST",
          signal: controller.signal,
          headers: {
            "authorization": `Bearer ${req.credential}`,
            "content-type": "application/json",
            "accept": "application/json",
          },
          body: JSON.stringify(payload),
        })
        text = await res.text()
      } catch (e) {
        const timedOut = controller.signal.aborted
        const ms = this.record(t0)
        if (timedOut && this.metrics) this.metrics.metrics.timeouts_total++
        this.log.error({ attempt, ms, timed_out: timedOut, err: String(e) }, "llm request failed")
        throw new TransportFailure(
          timedOut ? "Request to LLM API timed out" : `Request to LLM API failed: ${e instanceof Error ? e.message : String(e)}`,
          timedOut,
          { cause: e },
        )
      }

      const ms = this.record(t0)
      this.log.info({ attempt, ms, status: res.status }, "llm call completed")

      if (!res.ok) {
        this.log.error({ status: res.status, body: text.slice(0, 500) }, "llm api error")
        throw new UpstreamApplicationError(res.status, text)
      }
      try {
        return JSON.parse(text)
      } catch (e) {
        this.log.error({ body: text.slice(0, 500) }, "llm response is not json")
        throw new MalformedResponseError("body is not JSON", { cause: e })
      }
    } finally {
      clearTimeout(timer)
    }
  }

  private record(t0: number) {
    const ms = Date.now() - t0
    this.metrics?.recordLatency(ms)
    return ms
  }
}

const isRecord = (v: unknown): v is Record<string, unknown> => typeof v === "object" && v !== null

export function extractReply(raw: unknown): string {
  const choices = isRecord(raw) ? raw.choices : undefined
  if (!Array.isArray(choices) || choices.length === 0) throw new MalformedResponseError("missing choices")
  const first: unknown = choices[0]
  const message = isRecord(first) ? first.message : undefined
  const content = isRecord(message) ? message.content : undefined
  if (typeof content !== "string") throw new MalformedResponseError("missing choices[0].message.content")
  return content
}
