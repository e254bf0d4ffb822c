import "dotenv/config"
import { createServer } from "./app"

const { app, env } = createServer()

const shutdown = (signal: string) => {
  app.log.info({ signal }, "shutting down")
  app.close().then(() => process.exit(0), (err) => { app.log.error(err); process.exit(1) })
}
process.once("SIGINT", shutdown)
process.once("SIGTERM", shutdown)

app.listen({ port: env.PORT, host: env.HOST }, (err, address) => {
  if (err) { app.log.error(err); process.exit(1) }
  app.log.info(`Starting ${env.APP_NAME} v${env.APP_VERSION} at ${address}`)
})
