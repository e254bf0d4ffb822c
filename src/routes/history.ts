import type { FastifyInstance } from "fastify"
import type { ChatPipeline } from "../helpers/chatTurn"
import type { ErrorResponse } from "../schemas"

export default async function historyRoutes(app: FastifyInstance, pipeline: ChatPipeline) {
  app.delete<{ Params: { sessionId: string } }>("/v1/history/:sessionId", async (req, reply) => {
    if (pipeline.clearSession(req.params.sessionId)) {
      return reply.send({ message: "History cleared successfully" })
    }
    return reply.code(404).send({ code: 404, message: "Session not found" } satisfies ErrorResponse)
  })
}
