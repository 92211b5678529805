/**
 * Switchyard HTTP Server Entry Point
 * Main server bootstrap and startup
 */

import { config as loadEnv } from 'dotenv'
import { createLogger } from '@switchyard/shared/logger'
import { loadConfig } from './config'
import { SwitchyardServer } from './server'

loadEnv()

const logger = createLogger({ name: 'bootstrap' })

async function main(): Promise<void> {
  const server = new SwitchyardServer(loadConfig())
  await server.start()

  // Graceful shutdown
  process.once('SIGINT', () => {
    logger.info('Shutting down server...')
    server.stop().then(
      () => process.exit(0),
      error => {
        logger.error('Failed to stop server', error)
        process.exit(1)
      }
    )
  })
}

main().catch(error => {
  logger.error('Failed to start server', error)
  process.exit(1)
})
