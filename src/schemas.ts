import { z } from "zod"
import { DEFAULT_LOCALE } from "./config/promptTemplate"
import { ValidationError } from "./errors"

export const ChatRequestSchema = z.object({
  question: z.string().min(1).max(1000),
  session_id: z.string().min(1).max(128).optional(),
  locale: z.string().min(2).max(35).default(DEFAULT_LOCALE),
})
export type ChatRequest = z.infer<typeof ChatRequestSchema>

export type ChatResponse = { response: string, session_id: string }

export type ErrorResponse = {
  code: number
  message: string
  details?: Record<string, unknown>
}

export type HealthCheck = { status: string, version: string }

export function parseChatRequest(body: unknown): ChatRequest {
  const parsed = ChatRequestSchema.safeParse(body ?? {})
  if (parsed.success) return parsed.data
  throw new ValidationError(
    "Invalid request body",
    parsed.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`),
  )
}
