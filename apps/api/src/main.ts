import { Command, InvalidArgumentError } from 'commander'
import type { Logger } from 'pino'
import { loadConfig, type Config, type ConfigOverrides } from './config.js'
import { createLogger } from './logger.js'
import { SqliteScanRepository } from './persistence/sqlite.js'
import { buildServer } from './server.js'
import { MemoryScanRepository } from './store/memory.js'
import type { ScanRepository } from './types.js'

function parsePort(value: string): number {
  const port = Number(value)
  if (!Number.isInteger(port) || port < 0 || port > 65535) throw new InvalidArgumentError('port must be an integer between 0 and 65535')
  return port
}

function parseArgs(argv: string[]): ConfigOverrides {
  const program = new Command()
    .name('jfind-svc')
    .description('Fleet inventory service for Java runtimes reported by the jfind scanner')
    .option('--host <host>', 'address to listen on (default: HOST or 0.0.0.0)')
    .option('--port <port>', 'port to listen on (default: PORT or 8000)', parsePort)
    .option('--database <path>', 'SQLite database file (default: DATABASE_PATH or ./jfind.db)')
    .parse(argv)
  const opts = program.opts<{ host?: string; port?: number; database?: string }>()
  return { host: opts.host, port: opts.port, databasePath: opts.database }
}

function openRepository(config: Config, logger: Logger): ScanRepository {
  if (config.store === 'memory') return new MemoryScanRepository(logger)
  return SqliteScanRepository.open({ file: config.databasePath, logger })
}

async function main() {
  const config = loadConfig(process.env, parseArgs(process.argv))
  const logger = createLogger(config)
  const repository = openRepository(config, logger)
  const app = buildServer({ repository, config })

  let closing = false
  const shutdown = async (signal: string) => {
    if (closing) return
    closing = true
    app.log.info({ signal }, 'shutting down')
    try {
      await app.close()
    } finally {
      await repository.close()
    }
  }
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch(err => {
        logger.error({ err }, 'shutdown failed')
        process.exitCode = 1
      })
    })
  }

  try {
    const address = await app.listen({ host: config.host, port: config.port })
    app.log.info(`JFind service listening on ${address} (store=${config.store})`)
  } catch (err) {
    app.log.error({ err }, `Failed to start server on ${config.host}:${config.port}`)
    await repository.close()
    process.exitCode = 1
  }
}

await main()
