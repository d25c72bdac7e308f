import type { AccelerometerSettings, PostureSettings } from '@/types/settings'
import { DEFAULT_SETTINGS } from '@/types/settings'
import { createDebugLogger, type DebugLogger } from '@/utils/logger'
import { PostureSampleZ } from '@/utils/validation'
import { AccelerometerPostureEstimator } from './accelerometer-estimator'
import type {
  AccelerationSample,
  ActivityConfidence,
  ActivityKind,
  Posture,
  PostureChange,
  PostureChangeSource,
  PostureSample,
  PostureState,
} from './posture-types'

const STANDING_ACTIVITIES: ReadonlySet<ActivityKind> = new Set(['walking', 'running'])

const STATIONARY_CLASS: ReadonlySet<ActivityKind> = new Set([
  'stationary',
  'automotive',
  'cycling',
])

// Signals the accelerometer estimate may never override
const HIGH_PRIORITY_ACTIVITIES: ReadonlySet<ActivityKind> = new Set([
  'walking',
  'running',
  'automotive',
  'cycling',
])

export interface PostureClassifierOptions {
  readonly accelerometer?: AccelerometerSettings
  readonly onChange?: (change: PostureChange) => void
  readonly debugMode?: boolean
}

/**
 * Debounced standing/sitting classifier over motion-activity reports.
 *
 * Standing is applied as soon as walking or running is reported. Sitting is
 * deferred behind a stabilization deadline that is re-checked when it
 * expires, unless enough consecutive stationary-class reports force it.
 * Deadlines are compared against caller-supplied timestamps; nothing is
 * scheduled here, so the caller drives expiry through `poll`.
 */
export class PostureClassifier {
  private readonly settings: PostureSettings
  private readonly estimator: AccelerometerPostureEstimator | null
  private readonly flipConfidence: number
  private readonly onChange: ((change: PostureChange) => void) | undefined
  private readonly log: DebugLogger

  private posture: Posture = 'sitting'
  private consecutiveStationary = 0
  private lastObservationAt: number | null = null
  private pendingSittingAt: number | null = null
  private history: PostureSample[] = []
  private lastConfident: PostureSample | null = null

  constructor(
    settings: PostureSettings = DEFAULT_SETTINGS.posture,
    options: PostureClassifierOptions = {},
  ) {
    if (settings.stabilizationDelayMs < 0) {
      throw new RangeError(
        `stabilizationDelayMs must be non-negative, got ${settings.stabilizationDelayMs}`,
      )
    }
    if (settings.historySize < 1) {
      throw new RangeError(`historySize must be at least 1, got ${settings.historySize}`)
    }

    const accelerometer = options.accelerometer ?? DEFAULT_SETTINGS.accelerometer
    this.settings = settings
    this.estimator = accelerometer.enabled ? new AccelerometerPostureEstimator(accelerometer) : null
    this.flipConfidence = accelerometer.flipConfidence
    this.onChange = options.onChange
    this.log = createDebugLogger('Posture', options.debugMode ?? false)
  }

  /**
   * Feed one motion-activity report.
   *
   * @returns the change caused by this report, or else a change resolved
   *   from an expired deadline or idle fallback during the same call
   */
  observe(
    activity: ActivityKind,
    confidence: ActivityConfidence,
    now: number,
  ): PostureChange | null {
    const parsed = PostureSampleZ.safeParse({ activity, confidence, timestamp: now })
    if (!parsed.success) {
      this.log.warn('Ignoring malformed activity report', parsed.error.issues)
      return null
    }

    const sample = parsed.data
    const resolved = this.poll(now)

    this.record(sample)

    if (sample.confidence === 'low') {
      this.log.debug(`Low confidence activity ignored: ${sample.activity}`)
      return resolved
    }

    this.lastConfident = sample
    return this.applyActivity(sample.activity, now, 'activity') ?? resolved
  }

  /**
   * Feed one accelerometer sample to the advisory estimator. The estimate
   * only takes effect while the activity classifier is silent.
   */
  observeAcceleration(sample: AccelerationSample): PostureChange | null {
    if (this.estimator === null || !this.estimator.add(sample)) {
      return null
    }

    const estimate = this.estimator.evaluate(sample.timestamp)
    if (estimate === null) {
      return null
    }

    this.log.debug(
      `Accelerometer estimate: ${estimate.posture} ` +
        `(score ${estimate.score.toFixed(2)}, confidence ${estimate.confidence.toFixed(2)})`,
    )

    if (
      estimate.confidence <= this.flipConfidence ||
      estimate.posture === this.posture ||
      !this.accelerometerMayDecide(sample.timestamp)
    ) {
      return null
    }

    if (estimate.posture === 'standing') {
      this.consecutiveStationary = 0
    }
    this.pendingSittingAt = null
    return this.transition(estimate.posture, sample.timestamp, 'accelerometer', false)
  }

  /**
   * Resolve an expired stabilization deadline and apply the idle-timeout
   * fallback. Call from the caller's timer or before reading the posture.
   */
  poll(now: number): PostureChange | null {
    let change: PostureChange | null = null

    if (this.pendingSittingAt !== null && now >= this.pendingSittingAt) {
      change = this.resolvePendingSitting(now)
    }

    if (
      this.lastObservationAt !== null &&
      now - this.lastObservationAt > this.settings.idleTimeoutMs
    ) {
      this.log.debug(
        `No activity for ${Math.round((now - this.lastObservationAt) / 1000)}s, treating as stationary`,
      )
      this.lastObservationAt = now
      change = this.applyActivity('stationary', now, 'idle-timeout') ?? change
    }

    return change
  }

  /**
   * Manual posture override.
   */
  setPosture(posture: Posture, now: number): PostureChange | null {
    this.pendingSittingAt = null
    if (posture === 'standing') {
      this.consecutiveStationary = 0
    }
    return this.transition(posture, now, 'manual', false)
  }

  getPosture(): Posture {
    return this.posture
  }

  isStanding(): boolean {
    return this.posture === 'standing'
  }

  getState(): PostureState {
    return {
      posture: this.posture,
      consecutiveStationary: this.consecutiveStationary,
      lastObservationAt: this.lastObservationAt,
    }
  }

  getPendingSittingDeadline(): number | null {
    return this.pendingSittingAt
  }

  getHistory(): readonly PostureSample[] {
    return [...this.history]
  }

  getStatusSummary(now: number): string {
    const latest = this.history[this.history.length - 1]
    const lastSeen =
      this.lastObservationAt === null
        ? 'never'
        : `${Math.round((now - this.lastObservationAt) / 1000)}s ago`

    return [
      `Standing: ${this.posture === 'standing'}`,
      `Activity: ${latest?.activity ?? 'unknown'}`,
      `Confidence: ${latest?.confidence ?? 'low'}`,
      `Last Update: ${lastSeen}`,
      `Consecutive Stationary: ${this.consecutiveStationary}`,
    ].join('\n')
  }

  setDebugMode(enabled: boolean): void {
    this.log.setEnabled(enabled)
  }

  reset(): void {
    this.posture = 'sitting'
    this.consecutiveStationary = 0
    this.lastObservationAt = null
    this.pendingSittingAt = null
    this.history = []
    this.lastConfident = null
    this.estimator?.reset()
  }

  private record(sample: PostureSample): void {
    this.lastObservationAt = sample.timestamp
    this.history.push(sample)
    if (this.history.length > this.settings.historySize) {
      this.history.shift()
    }
  }

  private applyActivity(
    activity: ActivityKind,
    now: number,
    source: PostureChangeSource,
  ): PostureChange | null {
    if (STANDING_ACTIVITIES.has(activity)) {
      this.consecutiveStationary = 0
      this.pendingSittingAt = null
      return this.transition('standing', now, source, false)
    }

    if (!STATIONARY_CLASS.has(activity)) {
      return null
    }

    this.consecutiveStationary += 1

    if (this.consecutiveStationary >= this.settings.forceSittingAfter) {
      this.pendingSittingAt = null
      return this.transition('sitting', now, source, false)
    }

    if (this.posture === 'standing' && this.pendingSittingAt === null) {
      this.pendingSittingAt = now + this.settings.stabilizationDelayMs
      this.log.debug(`Sitting proposed by ${activity}, confirming at ${this.pendingSittingAt}`)
    }

    return null
  }

  private resolvePendingSitting(now: number): PostureChange | null {
    this.pendingSittingAt = null

    if (this.consecutiveStationary < this.settings.confirmSittingAfter) {
      this.log.debug('Delayed sitting change cancelled - not consistently stationary')
      return null
    }

    return this.transition('sitting', now, 'stabilized', true)
  }

  private accelerometerMayDecide(now: number): boolean {
    const last = this.lastConfident
    if (last === null) {
      return true
    }

    const stale = now - last.timestamp > this.settings.idleTimeoutMs
    if (stale) {
      return true
    }

    if (HIGH_PRIORITY_ACTIVITIES.has(last.activity)) {
      return false
    }

    const latest = this.history[this.history.length - 1]
    return latest !== undefined && latest.confidence === 'low'
  }

  private transition(
    to: Posture,
    now: number,
    source: PostureChangeSource,
    delayed: boolean,
  ): PostureChange | null {
    if (this.posture === to) {
      return null
    }

    const change: PostureChange = { from: this.posture, to, timestamp: now, source, delayed }
    this.posture = to
    if (to === 'standing') {
      this.pendingSittingAt = null
    }

    this.log.debug(`State confirmed: ${change.from} -> ${change.to} (${source})`)
    this.onChange?.(change)
    return change
  }
}
