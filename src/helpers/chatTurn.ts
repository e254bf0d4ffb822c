// src/helpers/chatTurn.ts
import type { BaseLogger } from "pino"
import type { PromptTemplate } from "../config/promptTemplate"
import { DEFAULT_LOCALE } from "../config/promptTemplate"
import { OutOfScopeError, UnexpectedError, UpstreamError, isUpstreamFailure } from "../errors"
import type { HistoryStore } from "../services/history"
import { extractReply, type ChatMessage, type LlmClient } from "../services/llmClient"
import type { TopicGate } from "../services/topicGate"
import { enforceOutputLength, sanitize } from "../utils/sanitize"

export type TurnInput = {
  sessionId?: string
  question: string
  locale?: string
  credential: string
}

export type TurnResult = { reply: string, sessionId: string }

export type PipelineDeps = {
  gate: TopicGate
  history: HistoryStore
  prompts: PromptTemplate
  client: LlmClient
  logger: BaseLogger
  model: string
  temperature?: number
  maxTokens?: number
  maxWords?: number
}

export class ChatPipeline {
  constructor(private readonly deps: PipelineDeps) {}

  async processTurn({ sessionId, question, locale = DEFAULT_LOCALE, credential }: TurnInput): Promise<TurnResult> {
    const { gate, history, prompts, client, logger } = this.deps
    const id = sessionId || history.newSessionId()

    try {
      const clean = sanitize(question)
      const verdict = gate.classify(clean)
      if (!verdict.accepted) throw new OutOfScopeError(verdict.message)

      const past = history.readPairs(id)
      const memory = past.filter((m) => m.role === "user").map((m) => m.content)
      const messages: ChatMessage[] = [
        { role: "system", content: prompts.buildSystem(memory, locale) },
        ...past,
        { role: "user", content: clean },
      ]

      const raw = await client.complete({
        model: this.deps.model,
        messages,
        credential,
        temperature: this.deps.temperature,
        maxTokens: this.deps.maxTokens,
      })
      const reply = enforceOutputLength(extractReply(raw), this.deps.maxWords)

      history.append(id, "user", clean)
      history.append(id, "assistant", reply)
      return { reply, sessionId: id }
    } catch (e) {
      if (e instanceof OutOfScopeError) throw e
      if (isUpstreamFailure(e)) {
        logger.error({ session_id: id, code: e.code, err: e.message }, "upstream failure")
        throw new UpstreamError(e)
      }
      logger.error({ session_id: id, err: e instanceof Error ? e.message : String(e) }, "unexpected failure")
      throw new UnexpectedError(e)
    }
  }

  clearSession(sessionId: string) {
    return this.deps.history.clear(sessionId)
  }
}
