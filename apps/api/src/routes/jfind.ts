import { z } from 'zod'
import type { FastifyPluginAsync } from 'fastify'
import { ValidationError, licenseRequirementToWire, toIssues } from '@jfind/core'
import type { QueryService } from '../services/query.js'
import type { ScanQuery, ScanRepository } from '../types.js'
import { toMetaResponse, toRuntimeResponse, toScanResponse } from './serialize.js'

export interface JfindRouteOptions {
  repository: ScanRepository
  queries: QueryService
}

const MAX_LIMIT = 1000

const signedLimit = (fallback: number) => z.coerce.number().int().default(fallback)
const positiveLimit = z.coerce.number().int().min(1).max(MAX_LIMIT).default(10)

const scansQuery = z.object({
  scan_id: z.coerce.number().int().positive().optional(),
  computer_name: z.string().min(1).optional(),
  limit: signedLimit(10)
})
const fleetQuery = z.object({ limit: positiveLimit })
const historyQuery = z.object({ limit: signedLimit(0) })

function parseQuery<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const parsed = schema.safeParse(value)
  if (!parsed.success) throw new ValidationError('invalid query parameters', toIssues(parsed.error))
  return parsed.data
}

function toScanQuery(q: z.output<typeof scansQuery>): ScanQuery {
  if (q.scan_id !== undefined) return { kind: 'id', id: q.scan_id }
  if (q.computer_name !== undefined) return { kind: 'host', computerName: q.computer_name, limit: q.limit }
  return { kind: 'latest', limit: parseQuery(fleetQuery, { limit: q.limit }).limit }
}

export const jfindRoutes: FastifyPluginAsync<JfindRouteOptions> = async (app, { repository, queries }) => {
  app.post('/jfind', async (req) => {
    const scan = await repository.submit(req.body)
    req.log.info({ computerName: scan.computerName, scanId: scan.id }, `Saved scan from ${scan.computerName} with ${scan.countResult} Java runtimes`)
    return { result: 'ok', scan_id: scan.id }
  })

  app.get('/jfind', async (req) => {
    const scans = await queries.findScans(toScanQuery(parseQuery(scansQuery, req.query)))
    return scans.map(toScanResponse)
  })

  app.get('/jfind/scans', async (req) => {
    const { limit } = parseQuery(fleetQuery, req.query)
    const scans = await queries.latestFleet(limit)
    return scans.map(toMetaResponse)
  })

  app.get<{ Params: { computer_name: string } }>('/jfind/scans/:computer_name', async (req) => {
    const { limit } = parseQuery(historyQuery, req.query)
    const scans = await queries.history(req.params.computer_name, limit)
    return scans.map(toScanResponse)
  })

  const oracle = async (query: unknown) => {
    const { limit } = parseQuery(fleetQuery, query)
    const runtimes = await queries.oracleRuntimes(limit)
    return runtimes.map(toRuntimeResponse)
  }
  app.get('/jfind/jdk/oracle', async (req) => oracle(req.query))
  app.get('/jfind/oracle', async (req) => oracle(req.query))

  app.get<{ Params: { computer_name: string } }>('/jfind/require_license/:computer_name', async (req) => {
    const requirement = await queries.checkLicenseRequirement(req.params.computer_name)
    return { computer_name: req.params.computer_name, require_license: licenseRequirementToWire(requirement) }
  })
}
