import { randomUUID } from 'node:crypto'
import type { AlertSettings } from '@/types/settings'
import { DEFAULT_SETTINGS } from '@/types/settings'
import { BoundedLog } from '@/utils/bounded-log'
import { createDebugLogger, type DebugLogger } from '@/utils/logger'
import type { ChangeEvaluation, SignificantChange } from './alert-types'
import { evaluateHeartRateChange, formatDelta } from './change-rules'

export interface SignificantChangeEvaluatorOptions {
  readonly createId?: () => string
  readonly debugMode?: boolean
}

export class SignificantChangeEvaluator {
  private readonly settings: AlertSettings
  private readonly changes: BoundedLog<SignificantChange>
  private readonly createId: () => string
  private readonly log: DebugLogger
  private lastAlertAt: number | null = null

  constructor(
    settings: AlertSettings = DEFAULT_SETTINGS.alerts,
    options: SignificantChangeEvaluatorOptions = {},
  ) {
    if (settings.majorDelta < settings.minorDelta) {
      throw new RangeError(
        `majorDelta (${settings.majorDelta}) must not be below minorDelta (${settings.minorDelta})`,
      )
    }
    this.settings = settings
    this.changes = new BoundedLog<SignificantChange>(settings.maxSignificantChanges)
    this.createId = options.createId ?? randomUUID
    this.log = createDebugLogger('Alerts', options.debugMode ?? false)
  }

  evaluate(previousRate: number, currentRate: number, now: number): ChangeEvaluation {
    const result = evaluateHeartRateChange(
      previousRate,
      currentRate,
      this.lastAlertAt,
      now,
      this.settings,
      this.createId,
    )

    if (result.change !== null) {
      this.changes.append(result.change)
      this.log.debug(
        `Significant change: ${formatDelta(result.change.delta)} BPM ` +
          `(${result.change.fromRate}→${result.change.toRate})`,
      )
    }

    if (result.alert !== null) {
      this.lastAlertAt = now
      this.log.debug(`Alert triggered (${result.alert.severity}): ${result.alert.message.replace('\n', ' ')}`)
    } else if (result.change !== null) {
      this.log.debug('Alert suppressed by cooldown')
    }

    return result
  }

  getLastAlertAt(): number | null {
    return this.lastAlertAt
  }

  getSignificantChanges(): readonly SignificantChange[] {
    return this.changes.toArray()
  }

  setDebugMode(enabled: boolean): void {
    this.log.setEnabled(enabled)
  }

  reset(): void {
    this.changes.clear()
    this.lastAlertAt = null
  }
}
