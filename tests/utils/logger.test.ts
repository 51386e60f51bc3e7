import { describe, it, expect, afterEach, vi } from 'vitest'
import { mkdtempSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import winston from 'winston'
import chalk from 'chalk'
import { Logger } from '@pigeonpost/utils'

function createLogger(options: ConstructorParameters<typeof Logger>[0] = { silent: true }) {
  const create = vi.spyOn(winston, 'createLogger')
  const logger = new Logger(options)
  const result = create.mock.results[0]
  if (result?.type !== 'return') {
    throw new Error('winston logger was not created')
  }
  return { logger, inner: result.value }
}

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
    vi.unstubAllEnvs()
  })

  it('flattens errors to message and stack', () => {
    const { logger, inner } = createLogger()
    const error = vi.spyOn(inner, 'error')
    const failure = new Error('bad pigeon')

    logger.error('Upload failed', failure, { adjective: 'soggy' })

    expect(error).toHaveBeenCalledWith('Upload failed', {
      error: 'bad pigeon',
      stack: failure.stack,
      adjective: 'soggy',
    })
  })

  it('passes other thrown values through as the error field', () => {
    const { logger, inner } = createLogger()
    const error = vi.spyOn(inner, 'error')

    logger.error('Upload failed', 'timeout', { attempt: 2 })

    expect(error).toHaveBeenCalledWith('Upload failed', { error: 'timeout', attempt: 2 })
  })

  it('logs success in green at info level', () => {
    const { logger, inner } = createLogger()
    const info = vi.spyOn(inner, 'info')

    logger.success('Saved soggy pigeon')

    expect(info).toHaveBeenCalledWith(chalk.green('Saved soggy pigeon'), undefined)
  })

  it('changes level at run time', () => {
    const { logger } = createLogger({ level: 'warn', silent: true })

    expect(logger.level).toBe('warn')
    logger.setLevel('debug')
    expect(logger.level).toBe('debug')
  })

  it('logs to the console only outside production', () => {
    vi.stubEnv('NODE_ENV', 'test')
    const { inner } = createLogger()

    expect(inner.transports).toHaveLength(1)
    expect(inner.transports[0]).toBeInstanceOf(winston.transports.Console)
  })

  it('adds a JSON file transport in production', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const file = join(mkdtempSync(join(tmpdir(), 'pigeonpost-log-')), 'pigeonpost.log')
    const { inner } = createLogger({ silent: true, file })

    const files = inner.transports.filter((transport) => transport instanceof winston.transports.File)
    expect(files).toHaveLength(1)
  })
})
