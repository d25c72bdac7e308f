import { describe, it, expect, vi, afterEach } from 'vitest'
import { createDebugLogger } from '@/utils/logger'

describe('createDebugLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should stay silent when disabled', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const log = createDebugLogger('Posture')

    log.debug('hidden')
    log.warn('hidden')

    expect(logSpy).not.toHaveBeenCalled()
    expect(warnSpy).not.toHaveBeenCalled()
  })

  it('should prefix debug lines with the tag when enabled', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
    const log = createDebugLogger('Posture', true)

    log.debug('State confirmed')

    expect(logSpy).toHaveBeenCalledWith('[Posture] State confirmed')
  })

  it('should pass warning details through', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const log = createDebugLogger('HeartRate', true)

    log.warn('Ignoring sample', { bpm: -1 })

    expect(warnSpy).toHaveBeenCalledWith('[HeartRate] Ignoring sample', { bpm: -1 })
  })

  it('should toggle at runtime', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
    const log = createDebugLogger('Alerts')

    log.setEnabled(true)
    log.debug('now visible')

    expect(log.isEnabled()).toBe(true)
    expect(logSpy).toHaveBeenCalledTimes(1)
  })
})
