import type { SignificantChangeEvaluator } from '@/services/alerts/significant-change-evaluator'
import type { OrthostaticTracker } from '@/services/orthostatic/orthostatic-tracker'
import type { OrthostaticEventUpdate } from '@/services/orthostatic/orthostatic-types'
import type { PostureChange } from '@/services/posture-detection/posture-types'
import { createDebugLogger, type DebugLogger } from '@/utils/logger'
import { HeartRateSampleZ } from '@/utils/validation'
import type { ForwardingThrottle } from './forwarding-throttle'
import type { HeartRateUpdate } from './heart-rate-types'

export interface HeartRateCoordinatorDeps {
  readonly tracker: OrthostaticTracker
  readonly evaluator: SignificantChangeEvaluator
  readonly throttle: ForwardingThrottle
}

/**
 * Sequences the tracker and the change evaluator for each heart-rate
 * sample and owns the previous/current/baseline bookkeeping.
 */
export class HeartRateCoordinator {
  private readonly tracker: OrthostaticTracker
  private readonly evaluator: SignificantChangeEvaluator
  private readonly throttle: ForwardingThrottle
  private readonly log: DebugLogger

  private currentRate = 0
  private previousRate = 0
  private baselineRate = 0
  private delta = 0

  constructor(deps: HeartRateCoordinatorDeps, debugMode = false) {
    this.tracker = deps.tracker
    this.evaluator = deps.evaluator
    this.throttle = deps.throttle
    this.log = createDebugLogger('HeartRate', debugMode)
  }

  /**
   * @returns null when the sample is rejected (non-positive or non-integer bpm)
   */
  handleSample(bpm: number, now: number): HeartRateUpdate | null {
    const parsed = HeartRateSampleZ.safeParse({ bpm, timestamp: now })
    if (!parsed.success) {
      this.log.warn('Ignoring malformed heart-rate sample', parsed.error.issues)
      return null
    }

    if (this.currentRate > 0) {
      this.previousRate = this.currentRate
    }
    this.currentRate = bpm

    const delta = this.previousRate > 0 ? bpm - this.previousRate : 0
    this.delta = delta
    const shouldForward = this.throttle.shouldForward(bpm, delta, now)

    const orthostatic = this.tracker.onHeartRate(bpm, now)

    if (this.baselineRate === 0) {
      this.baselineRate = bpm
    }

    const { change, alert } =
      this.previousRate > 0
        ? this.evaluator.evaluate(this.previousRate, bpm, now)
        : { change: null, alert: null }

    this.log.debug(`Heart rate: ${bpm} BPM, delta: ${delta}, forward: ${shouldForward}`)

    return {
      sample: parsed.data,
      delta,
      shouldForward,
      orthostatic,
      significantChange: change,
      alert,
    }
  }

  /**
   * Start or end the standing episode to match a posture change. The
   * standing baseline is the current rate, or the previous one when no
   * current rate is known yet.
   */
  handlePostureChange(change: PostureChange): OrthostaticEventUpdate | null {
    if (change.to === 'standing') {
      const baseline = this.currentRate > 0 ? this.currentRate : this.previousRate
      this.tracker.startStanding(change.timestamp, baseline)
      return null
    }

    return this.tracker.endStanding(change.timestamp)
  }

  getCurrentRate(): number {
    return this.currentRate
  }

  getPreviousRate(): number {
    return this.previousRate
  }

  getBaselineRate(): number {
    return this.baselineRate
  }

  getDelta(): number {
    return this.delta
  }

  setDebugMode(enabled: boolean): void {
    this.log.setEnabled(enabled)
  }
}
