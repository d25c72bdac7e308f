import type { AccelerometerSettings } from '@/types/settings'
import { DEFAULT_SETTINGS } from '@/types/settings'
import { axisStats, clamp01, magnitude } from '@/utils/math'
import { AccelerationSampleZ } from '@/utils/validation'
import type {
  AccelerationSample,
  PostureEstimate,
  PostureScores,
} from './posture-types'

// Weighted contribution of each sub-score to the standing score
const WEIGHTS = {
  verticalOrientation: 0.4,
  movementVariance: 0.3,
  armAngle: 0.2,
  rangeOfMotion: 0.1,
} as const

// Magnitude variance (g²) that counts as full standing-level micro-movement
const MOVEMENT_VARIANCE_REFERENCE = 0.02
// Summed per-axis range (g) that counts as full range of motion
const RANGE_OF_MOTION_REFERENCE = 1.5

/**
 * Pure scoring of one accelerometer window. Each sub-score is a standing
 * likelihood in [0, 1].
 */
export function scoreWindow(samples: readonly AccelerationSample[]): PostureScores {
  const xs = samples.map((s) => s.x)
  const ys = samples.map((s) => s.y)
  const zs = samples.map((s) => s.z)
  const magnitudes = samples.map((s) => magnitude(s.x, s.y, s.z))

  const x = axisStats(xs)
  const y = axisStats(ys)
  const z = axisStats(zs)
  const mag = axisStats(magnitudes)

  if (mag.mean === 0) {
    return { verticalOrientation: 0, movementVariance: 0, armAngle: 0, rangeOfMotion: 0 }
  }

  return {
    // Arm hanging at the side puts gravity along the forearm (y)
    verticalOrientation: clamp01(Math.abs(y.mean) / mag.mean),
    movementVariance: clamp01(mag.variance / MOVEMENT_VARIANCE_REFERENCE),
    // Forearm resting on a lap or armrest tilts gravity onto the lateral axis
    armAngle: 1 - clamp01(Math.abs(x.mean) / mag.mean),
    rangeOfMotion: clamp01((x.range + y.range + z.range) / RANGE_OF_MOTION_REFERENCE),
  }
}

export function combineScores(scores: PostureScores): number {
  return (
    WEIGHTS.verticalOrientation * scores.verticalOrientation +
    WEIGHTS.movementVariance * scores.movementVariance +
    WEIGHTS.armAngle * scores.armAngle +
    WEIGHTS.rangeOfMotion * scores.rangeOfMotion
  )
}

/**
 * Advisory posture estimator over a rolling accelerometer window.
 * Produces at most one estimate per evaluation interval.
 */
export class AccelerometerPostureEstimator {
  private readonly settings: AccelerometerSettings
  private samples: AccelerationSample[] = []
  private lastEvaluatedAt: number | null = null
  private lastEstimate: PostureEstimate | null = null

  constructor(settings: AccelerometerSettings = DEFAULT_SETTINGS.accelerometer) {
    if (settings.minSamples < 1) {
      throw new RangeError(`minSamples must be at least 1, got ${settings.minSamples}`)
    }
    if (settings.maxSamples < settings.minSamples) {
      throw new RangeError(
        `maxSamples (${settings.maxSamples}) must not be below minSamples (${settings.minSamples})`,
      )
    }
    this.settings = settings
  }

  /**
   * Buffer a sample. Malformed samples are dropped.
   * @returns false when the sample was rejected
   */
  add(sample: AccelerationSample): boolean {
    if (!AccelerationSampleZ.safeParse(sample).success) {
      return false
    }

    this.samples.push(sample)
    this.prune(sample.timestamp)
    return true
  }

  /**
   * Evaluate the window if the evaluation interval has elapsed and enough
   * samples are buffered; otherwise null.
   */
  evaluate(now: number): PostureEstimate | null {
    if (
      this.lastEvaluatedAt !== null &&
      now - this.lastEvaluatedAt < this.settings.evaluationIntervalMs
    ) {
      return null
    }

    this.prune(now)
    if (this.samples.length < this.settings.minSamples) {
      return null
    }

    this.lastEvaluatedAt = now

    const scores = scoreWindow(this.samples)
    const score = combineScores(scores)
    const estimate: PostureEstimate = {
      posture: score >= 0.5 ? 'standing' : 'sitting',
      score,
      confidence: Math.abs(score - 0.5) * 2,
      scores,
      sampleCount: this.samples.length,
      timestamp: now,
    }

    this.lastEstimate = estimate
    return estimate
  }

  getLastEstimate(): PostureEstimate | null {
    return this.lastEstimate
  }

  getSampleCount(): number {
    return this.samples.length
  }

  reset(): void {
    this.samples = []
    this.lastEvaluatedAt = null
    this.lastEstimate = null
  }

  private prune(now: number): void {
    const cutoff = now - this.settings.windowMs
    this.samples = this.samples.filter((s) => s.timestamp > cutoff)
    if (this.samples.length > this.settings.maxSamples) {
      this.samples = this.samples.slice(-this.settings.maxSamples)
    }
  }
}
