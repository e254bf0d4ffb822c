import type { FastifyInstance } from "fastify"
import type { Env } from "../config/env"
import type { Metrics } from "../config/metrics"
import type { HealthCheck } from "../schemas"

export default async function healthRoutes(app: FastifyInstance, env: Env, metrics: Metrics) {
  app.get("/", async () => ({ message: env.APP_NAME, version: env.APP_VERSION }))
  app.get("/health", async (): Promise<HealthCheck> => ({ status: "healthy", version: env.APP_VERSION }))
  app.get("/metrics", async () => metrics)
}
