import type { AlertSettings } from '@/types/settings'
import type {
  AlertRequest,
  AlertSeverity,
  ChangeEvaluation,
  SignificantChange,
} from './alert-types'
import { NO_CHANGE } from './alert-types'

export function formatDelta(delta: number): string {
  return delta > 0 ? `+${delta}` : `${delta}`
}

export function alertMessage(delta: number): string {
  const changeText = delta > 0 ? `increased ${formatDelta(delta)}` : `decreased ${delta}`
  return `Heart Rate\n${changeText}`
}

export function classifyDelta(delta: number, settings: AlertSettings): AlertSeverity | null {
  const absDelta = Math.abs(delta)
  if (absDelta >= settings.majorDelta) return 'major'
  if (absDelta >= settings.minorDelta) return 'minor'
  return null
}

export function isInCooldown(
  lastAlertAt: number | null,
  now: number,
  cooldownMs: number,
): boolean {
  return lastAlertAt !== null && now - lastAlertAt <= cooldownMs
}

/**
 * Classify the change between two consecutive readings.
 *
 * A significant change is reported whenever |delta| reaches the minor
 * threshold; the alert alongside it is dropped inside the cooldown window.
 */
export function evaluateHeartRateChange(
  previousRate: number,
  currentRate: number,
  lastAlertAt: number | null,
  now: number,
  settings: AlertSettings,
  createId: () => string,
): ChangeEvaluation {
  if (!(previousRate > 0) || !(currentRate > 0)) {
    return NO_CHANGE
  }

  const delta = currentRate - previousRate
  const severity = classifyDelta(delta, settings)
  if (severity === null) {
    return NO_CHANGE
  }

  const change: SignificantChange = {
    id: createId(),
    timestamp: now,
    fromRate: previousRate,
    toRate: currentRate,
    delta,
    isMajor: severity === 'major',
  }

  if (isInCooldown(lastAlertAt, now, settings.cooldownMs)) {
    return { change, alert: null }
  }

  const alert: AlertRequest = {
    timestamp: now,
    fromRate: previousRate,
    toRate: currentRate,
    delta,
    severity,
    message: alertMessage(delta),
  }
  return { change, alert }
}
