import { describe, it, expect } from 'vitest'
import {
  alertMessage,
  classifyDelta,
  evaluateHeartRateChange,
  formatDelta,
  isInCooldown,
} from '@/services/alerts/change-rules'
import { DEFAULT_SETTINGS } from '@/types/settings'

const settings = DEFAULT_SETTINGS.alerts
const T0 = 1_700_000_000_000
const fixedId = (): string => 'change-1'

describe('formatDelta', () => {
  it('should sign positive deltas', () => {
    expect(formatDelta(55)).toBe('+55')
    expect(formatDelta(-40)).toBe('-40')
    expect(formatDelta(0)).toBe('0')
  })
})

describe('alertMessage', () => {
  it('should describe an increase', () => {
    expect(alertMessage(55)).toBe('Heart Rate\nincreased +55')
  })

  it('should describe a decrease', () => {
    expect(alertMessage(-40)).toBe('Heart Rate\ndecreased -40')
  })
})

describe('classifyDelta', () => {
  it('should ignore deltas below 30', () => {
    expect(classifyDelta(29, settings)).toBeNull()
    expect(classifyDelta(-29, settings)).toBeNull()
  })

  it('should classify 30..49 as minor', () => {
    expect(classifyDelta(30, settings)).toBe('minor')
    expect(classifyDelta(-49, settings)).toBe('minor')
  })

  it('should classify 50 and above as major', () => {
    expect(classifyDelta(50, settings)).toBe('major')
    expect(classifyDelta(-75, settings)).toBe('major')
  })
})

describe('isInCooldown', () => {
  it('should never be in cooldown before the first alert', () => {
    expect(isInCooldown(null, T0, 30_000)).toBe(false)
  })

  it('should include the window boundary', () => {
    expect(isInCooldown(T0, T0 + 30_000, 30_000)).toBe(true)
    expect(isInCooldown(T0, T0 + 30_001, 30_000)).toBe(false)
  })
})

describe('evaluateHeartRateChange', () => {
  it('should report a major jump with an alert', () => {
    const result = evaluateHeartRateChange(70, 125, null, T0, settings, fixedId)

    expect(result).toEqual({
      change: {
        id: 'change-1',
        timestamp: T0,
        fromRate: 70,
        toRate: 125,
        delta: 55,
        isMajor: true,
      },
      alert: {
        timestamp: T0,
        fromRate: 70,
        toRate: 125,
        delta: 55,
        severity: 'major',
        message: 'Heart Rate\nincreased +55',
      },
    })
  })

  it('should keep the change but drop the alert inside the cooldown', () => {
    const result = evaluateHeartRateChange(125, 85, T0, T0 + 10_000, settings, fixedId)

    expect(result.change?.delta).toBe(-40)
    expect(result.change?.isMajor).toBe(false)
    expect(result.alert).toBeNull()
  })

  it('should report nothing for a small delta', () => {
    expect(evaluateHeartRateChange(70, 99, null, T0, settings, fixedId)).toEqual({
      change: null,
      alert: null,
    })
  })

  it('should report nothing without a previous reading', () => {
    expect(evaluateHeartRateChange(0, 125, null, T0, settings, fixedId).change).toBeNull()
  })
})
