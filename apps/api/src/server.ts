import Fastify, { type FastifyInstance } from 'fastify'
import { JfindError, ValidationError, type ErrorCode } from '@jfind/core'
import type { Config } from './config.js'
import { loggerOptions } from './logger.js'
import { healthRoutes } from './routes/health.js'
import { jfindRoutes } from './routes/jfind.js'
import { QueryService } from './services/query.js'
import type { ScanRepository } from './types.js'

const STATUS: Record<ErrorCode, number> = {
  VALIDATION_FAILED: 422,
  NOT_FOUND: 404,
  INVARIANT_VIOLATION: 500,
  STORAGE_UNAVAILABLE: 503
}

export interface ServerDeps {
  repository: ScanRepository
  config: Pick<Config, 'apiPrefix' | 'corsOrigin' | 'logLevel'>
}

export function buildServer({ repository, config }: ServerDeps): FastifyInstance {
  const app = Fastify({ logger: loggerOptions(config) })
  const queries = new QueryService(repository)

  // Minimal CORS: the fleet dashboard is served from another origin
  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('Access-Control-Allow-Origin', config.corsOrigin)
    reply.header('Access-Control-Allow-Headers', '*')
    reply.header('Access-Control-Allow-Methods', 'GET,POST,OPTIONS')
    return payload
  })
  app.options('/*', async (req, reply) => {
    reply.code(204).send()
  })

  app.setErrorHandler(async (err, req, reply) => {
    if (err instanceof JfindError) {
      const status = STATUS[err.code]
      if (status >= 500) req.log.error({ err }, err.message)
      else req.log.warn({ code: err.code }, err.message)
      const body = err instanceof ValidationError
        ? { code: err.code, message: err.message, issues: err.issues }
        : { code: err.code, message: err.message }
      return reply.code(status).send(body)
    }
    // Fastify's body parser reports unreadable JSON as 400; the agent contract says 422
    if (err.statusCode === 400) {
      req.log.warn({ code: err.code }, err.message)
      return reply.code(422).send({ code: 'VALIDATION_FAILED', message: err.message, issues: [] })
    }
    if (err.statusCode !== undefined && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ code: err.code ?? 'BAD_REQUEST', message: err.message })
    }
    req.log.error({ err }, 'request failed')
    return reply.code(500).send({ code: 'INTERNAL', message: 'internal server error' })
  })

  app.setNotFoundHandler(async (req, reply) => {
    return reply.code(404).send({ code: 'NOT_FOUND', message: `route ${req.method} ${req.url} not found` })
  })

  app.register(healthRoutes)
  app.register(jfindRoutes, { prefix: config.apiPrefix, repository, queries })

  return app
}
