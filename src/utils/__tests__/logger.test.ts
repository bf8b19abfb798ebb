/**
 * Unit tests for src/utils/logger.ts: pino configuration, configured levels
 * and redaction.
 */

import { describe, it, expect } from 'vitest'
import { Writable } from 'node:stream'
import pino from 'pino'
import { createLogger, childLogger, REDACT_PATHS, setLogLevel } from '../logger.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Create a synchronous in-memory pino logger that writes JSON to a buffer.
 * Uses pino.destination({ sync: true }) pattern via the stream overload.
 */
function createCapturingLogger(name: string): { logger: pino.Logger; getLines: () => string[] } {
  const lines: string[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding: string, callback: () => void) {
      lines.push(chunk.toString().trim())
      callback()
    },
  })

  const logger = pino(
    {
      name,
      level: 'trace',
      redact: REDACT_PATHS,
      formatters: {
        level(label) {
          return { level: label }
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      base: { pid: process.pid },
    },
    stream,
  )

  return { logger, getLines: () => lines }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('createLogger', () => {
  it('returns a pino logger instance', () => {
    const logger = createLogger('test-module', { pretty: false })
    expect(logger).toBeDefined()
    expect(typeof logger.info).toBe('function')
    expect(typeof logger.debug).toBe('function')
    expect(typeof logger.warn).toBe('function')
    expect(typeof logger.error).toBe('function')
  })

  it('uses LOG_LEVEL environment variable to override default log level', () => {
    const original = process.env.LOG_LEVEL
    try {
      process.env.LOG_LEVEL = 'warn'
      const logger = createLogger('test-level', { pretty: false })
      expect(logger.level).toBe('warn')
    } finally {
      if (original === undefined) {
        delete process.env.LOG_LEVEL
      } else {
        process.env.LOG_LEVEL = original
      }
    }
  })

  it('uses info level when NODE_ENV = production', () => {
    const originalEnv = process.env.NODE_ENV
    const originalLevel = process.env.LOG_LEVEL
    try {
      process.env.NODE_ENV = 'production'
      delete process.env.LOG_LEVEL
      const logger = createLogger('test-prod', { pretty: false })
      expect(logger.level).toBe('info')
    } finally {
      process.env.NODE_ENV = originalEnv
      if (originalLevel === undefined) {
        delete process.env.LOG_LEVEL
      } else {
        process.env.LOG_LEVEL = originalLevel
      }
    }
  })
})

describe('childLogger', () => {
  it('returns a child logger with namespace binding', () => {
    const parent = createLogger('parent-module', { pretty: false })
    const child = childLogger(parent, { namespace: 'demo' })
    expect(child).toBeDefined()
    expect(typeof child.info).toBe('function')
    // Child logger should be a different object from parent
    expect(child).not.toBe(parent)
  })
})

describe('REDACT_PATHS', () => {
  it('covers credential fields', () => {
    expect(REDACT_PATHS).toContain('apiKey')
    expect(REDACT_PATHS).toContain('api_key')
    expect(REDACT_PATHS).toContain('*.token')
    expect(REDACT_PATHS).toContain('password')
  })

  it('redacts apiKey field in log output', () => {
    const { logger, getLines } = createCapturingLogger('redact-test')

    logger.info({ apiKey: 'test-secret' }, 'test redaction')

    const lines = getLines()
    expect(lines).toHaveLength(1)
    const parsed = JSON.parse(lines[0] ?? '') as { apiKey?: string }
    expect(parsed.apiKey).toBe('[Redacted]')
  })

  it('redacts nested tokens and passwords', () => {
    const { logger, getLines } = createCapturingLogger('redact-test-2')

    logger.info({ store: { token: 'test-token' }, password: 'test-password' }, 'nested')

    const parsed = JSON.parse(getLines()[0] ?? '') as {
      store?: { token?: string }
      password?: string
    }
    expect(parsed.store?.token).toBe('[Redacted]')
    expect(parsed.password).toBe('[Redacted]')
  })
})

describe('setLogLevel', () => {
  function withoutLogLevelEnv(fn: () => void): void {
    const original = process.env.LOG_LEVEL
    delete process.env.LOG_LEVEL
    try {
      fn()
    } finally {
      if (original !== undefined) process.env.LOG_LEVEL = original
    }
  }

  it('moves loggers without an explicit level to the configured level', () => {
    withoutLogLevelEnv(() => {
      const follower = createLogger('follower', { pretty: false })
      const pinned = createLogger('pinned', { level: 'trace', pretty: false })

      setLogLevel('error')

      expect(follower.level).toBe('error')
      expect(pinned.level).toBe('trace')
      expect(createLogger('created-later', { pretty: false }).level).toBe('error')
    })
  })

  it('leaves levels alone when LOG_LEVEL is set', () => {
    const original = process.env.LOG_LEVEL
    try {
      process.env.LOG_LEVEL = 'info'
      const logger = createLogger('env-level', { pretty: false })
      setLogLevel('fatal')
      expect(logger.level).toBe('info')
    } finally {
      if (original === undefined) {
        delete process.env.LOG_LEVEL
      } else {
        process.env.LOG_LEVEL = original
      }
    }
  })
})
