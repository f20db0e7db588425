import { loadConfig } from './config'
import logger from './logger'
import KeyValueServer from './server'
import { KeyValueStore } from './store'

async function main() {
  const config = loadConfig()
  const store = await KeyValueStore.open({ filePath: config.filePath })
  const server = new KeyValueServer(store, config)
  await server.start()

  const shutdown = async () => {
    logger.info('Server is shutting down gracefully.')
    await server.stop()
    // Open sessions are abandoned rather than drained
    process.exit(0)
  }
  process.once('SIGINT', () => void shutdown())
  process.once('SIGTERM', () => void shutdown())
}

main().catch((error: unknown) => {
  logger.error('Server failed to start:', error)
  process.exitCode = 1
})
