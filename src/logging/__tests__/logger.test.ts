import { describe, it, expect, afterEach, vi } from 'vitest'
import { configureLogging, logger, resetLogging, type Logger } from '../logger.js'

describe('logger', () => {
  afterEach(() => {
    resetLogging()
    vi.restoreAllMocks()
  })

  it('forwards every level to a configured logger', () => {
    const custom: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
    configureLogging(custom)

    logger.debug('path=<a.ipynb> | loaded')
    logger.info('starting')
    logger.warn('careful', { detail: 1 })
    logger.error('failed')

    expect(custom.debug).toHaveBeenCalledWith('path=<a.ipynb> | loaded')
    expect(custom.info).toHaveBeenCalledWith('starting')
    expect(custom.warn).toHaveBeenCalledWith('careful', { detail: 1 })
    expect(custom.error).toHaveBeenCalledWith('failed')
  })

  it('writes only warnings and errors by default', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})

    logger.debug('hidden')
    logger.info('hidden')
    logger.warn('shown')
    logger.error('shown too')

    expect(debug).not.toHaveBeenCalled()
    expect(info).not.toHaveBeenCalled()
    expect(warn).toHaveBeenCalledWith('shown')
    expect(error).toHaveBeenCalledWith('shown too')
  })

  it('restores the default logger on reset', () => {
    const custom: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    configureLogging(custom)
    resetLogging()

    logger.warn('after reset')

    expect(custom.warn).not.toHaveBeenCalled()
    expect(warn).toHaveBeenCalledWith('after reset')
  })
})
