import { num } from "../utils/num"

export type Env = {
  APP_NAME: string
  APP_VERSION: string
  LLM_BASE_URL: string
  LLM_MODEL: string
  TEMPERATURE: number
  MAX_OUTPUT_TOKENS: number
  MAX_OUTPUT_WORDS: number
  HISTORY_SIZE: number
  RETENTION_HOURS: number
  SWEEP_INTERVAL_MS: number
  TIMEOUT_MS: number
  RETRY_ATTEMPTS: number
  RETRY_MIN_MS: number
  RETRY_MAX_MS: number
  PROMPTS_DIR: string
  BODY_LIMIT_BYTES: number
  RATE_LIMIT_PER_MINUTE: number
  UPSTASH_REDIS_REST_URL?: string
  UPSTASH_REDIS_REST_TOKEN?: string
  LOG_LEVEL: string
  HOST: string
  PORT: number
}

export function loadEnv(e: NodeJS.ProcessEnv = process.env): Env {
  return {
    APP_NAME: e.APP_NAME ?? "Cultural Assistant API",
    APP_VERSION: e.APP_VERSION ?? "1.0.0",
    LLM_BASE_URL: e.LLM_BASE_URL ?? "https://api.mistral.ai/v1",
    LLM_MODEL: e.LLM_MODEL ?? "mistral-tiny",
    TEMPERATURE: num(e.TEMPERATURE, 0.7),
    MAX_OUTPUT_TOKENS: num(e.MAX_OUTPUT_TOKENS, 0),
    MAX_OUTPUT_WORDS: num(e.MAX_OUTPUT_WORDS, 200),
    HISTORY_SIZE: num(e.HISTORY_SIZE, 6),
    RETENTION_HOURS: num(e.RETENTION_HOURS, 24),
    SWEEP_INTERVAL_MS: num(e.SWEEP_INTERVAL_MS, 10 * 60 * 1000),
    TIMEOUT_MS: num(e.TIMEOUT_MS, 30000),
    RETRY_ATTEMPTS: num(e.RETRY_ATTEMPTS, 3),
    RETRY_MIN_MS: num(e.RETRY_MIN_MS, 4000),
    RETRY_MAX_MS: num(e.RETRY_MAX_MS, 10000),
    PROMPTS_DIR: e.PROMPTS_DIR ?? "prompts",
    BODY_LIMIT_BYTES: num(e.BODY_LIMIT_BYTES, 8 * 1024),
    RATE_LIMIT_PER_MINUTE: num(e.RATE_LIMIT_PER_MINUTE, 10),
    UPSTASH_REDIS_REST_URL: e.UPSTASH_REDIS_REST_URL || undefined,
    UPSTASH_REDIS_REST_TOKEN: e.UPSTASH_REDIS_REST_TOKEN || undefined,
    LOG_LEVEL: e.LOG_LEVEL ?? "info",
    HOST: e.HOST ?? "0.0.0.0",
    PORT: num(e.PORT, 8000),
  }
}
