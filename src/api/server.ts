import express from 'express'
import type { Server } from 'node:http'
import type { ListenerStatus } from '../event-listener/types.js'
import { bigIntReplacer } from '../shared/json-utils.js'
import { logger } from '../shared/logger.js'

export const WELCOME_MESSAGE = 'Welcome to the Chain Event Relay API'

export type StatusSource = () => ListenerStatus[]

export const createApiApp = (getStatuses: StatusSource): express.Express => {
  const app = express()
  app.set('json replacer', bigIntReplacer)

  app.get('/', (_req, res) => {
    res.json({ message: WELCOME_MESSAGE })
  })

  app.get('/status', (_req, res) => {
    res.json({ listeners: getStatuses() })
  })

  return app
}

export const startApiServer = (
  getStatuses: StatusSource,
  options: { port: number; host: string }
): Promise<Server> =>
  new Promise((resolve, reject) => {
    const server = createApiApp(getStatuses).listen(options.port, options.host, () => {
      logger.info(`[API] Listening on http://${options.host}:${options.port}`)
      resolve(server)
    })
    server.once('error', reject)
  })

export const stopApiServer = (server: Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((err) => {
      if (err) {
        reject(err)
      } else {
        logger.info('[API] Server closed.')
        resolve()
      }
    })
  })
