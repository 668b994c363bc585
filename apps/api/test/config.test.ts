import { describe, it, expect } from 'vitest'
import { loadConfig } from '../src/config.js'

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      host: '0.0.0.0',
      port: 8000,
      store: 'sqlite',
      databasePath: './jfind.db',
      apiPrefix: '',
      corsOrigin: '*',
      logLevel: 'info'
    })
  })

  it('reads the environment', () => {
    const config = loadConfig({ PORT: '9090', STORE: 'memory', API_PREFIX: '/api', LOG_LEVEL: 'debug' })
    expect(config).toMatchObject({ port: 9090, store: 'memory', apiPrefix: '/api', logLevel: 'debug' })
  })

  it('ignores variables it has no use for', () => {
    const config = loadConfig({ NODE_ENV: 'staging', LOG_LEVEL: 'warn' })
    expect(config).not.toHaveProperty('nodeEnv')
    expect(config.logLevel).toBe('warn')
  })

  it('lets CLI overrides win over the environment', () => {
    const config = loadConfig({ PORT: '9090', HOST: '127.0.0.1' }, { port: 7000, databasePath: ':memory:' })
    expect(config).toMatchObject({ host: '127.0.0.1', port: 7000, databasePath: ':memory:' })
  })

  it('lists every invalid variable', () => {
    expect(() => loadConfig({ PORT: 'eighty', STORE: 'postgres' })).toThrow(/port: .*\nstore: /)
  })

  it('rejects a prefix without a leading slash', () => {
    expect(() => loadConfig({ API_PREFIX: 'api' })).toThrow('apiPrefix: API_PREFIX must be empty or look like /segment')
  })
})
