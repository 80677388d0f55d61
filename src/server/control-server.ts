import express from 'express'
import type { Express, Response } from 'express'
import cors from 'cors'
import bodyParser from 'body-parser'
import type { Server } from 'node:http'
import { errorHandler } from '../lib/errors'
import { loggers } from '../lib/logger'
import type { ExecutionPipeline } from '../lib/trading/execution-pipeline'
import { checkOrigin, createControlHandlers } from './control-handlers'
import type { HandlerResponse } from './control-handlers'

const logger = loggers.server

// ============================================================
// Control Server
// ============================================================
// Operator surface over the execution pipeline: status, manual approval,
// the kill switch and recent errors. Binds to localhost unless configured
// otherwise; browsers are only served for the configured origins.
// ============================================================

function send(res: Response, response: HandlerResponse): void {
  res.status(response.status).json(response.body)
}

function sendFailure(res: Response, e: unknown, fn: string): void {
  const error = errorHandler.handle(e, { module: 'server', function: fn })
  res.status(500).json({ success: false, code: error.code, message: error.message })
}

export interface ControlServerOptions {
  host: string
  port: number
  allowedOrigins: string[]
}

export function createControlApp(pipeline: ExecutionPipeline, allowedOrigins: readonly string[] = []): Express {
  const handlers = createControlHandlers(pipeline)
  const app = express()

  app.use((req, res, next) => {
    const refusal = checkOrigin(req.headers.origin, allowedOrigins)
    if (refusal) {
      logger.warn(`Refused ${req.method} ${req.path} from ${req.headers.origin ?? 'unknown origin'}`)
      send(res, refusal)
      return
    }
    next()
  })
  app.use(cors({ origin: [...allowedOrigins], methods: ['GET', 'POST', 'DELETE'] }))
  app.use(bodyParser.json({ limit: '64kb' }))

  app.get('/status', (_req, res) => {
    send(res, handlers.status())
  })

  app.get('/orders/pending', (_req, res) => {
    send(res, handlers.pendingOrders())
  })

  app.post('/orders/:id/approve', (req, res) => {
    handlers
      .approve(req.params.id)
      .then((response) => send(res, response))
      .catch((e: unknown) => sendFailure(res, e, 'approve'))
  })

  app.post('/orders/:id/deny', (req, res) => {
    handlers
      .deny(req.params.id)
      .then((response) => send(res, response))
      .catch((e: unknown) => sendFailure(res, e, 'deny'))
  })

  app.post('/kill-switch', (req, res) => {
    const body: unknown = req.body
    send(res, handlers.activateKillSwitch(body))
  })

  app.delete('/kill-switch', (_req, res) => {
    send(res, handlers.clearKillSwitch())
  })

  app.get('/errors', (req, res) => {
    send(res, handlers.errors(req.query.limit))
  })

  return app
}

export function startControlServer(
  pipeline: ExecutionPipeline,
  options: ControlServerOptions,
): Promise<Server> {
  const app = createControlApp(pipeline, options.allowedOrigins)
  return new Promise((resolve, reject) => {
    const server = app.listen(options.port, options.host, () => {
      logger.start(`Control server on http://${options.host}:${options.port}`)
      resolve(server)
    })
    server.on('error', reject)
  })
}
