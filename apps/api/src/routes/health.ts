import os from 'node:os'
import type { FastifyPluginAsync } from 'fastify'

export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get('/health', async () => ({
    hostname: os.hostname(),
    process_id: process.pid,
    timestamp: new Date().toISOString()
  }))
}
