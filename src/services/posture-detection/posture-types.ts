export const ACTIVITY_KINDS = [
  'walking',
  'running',
  'stationary',
  'automotive',
  'cycling',
  'unknown',
] as const

export const ACTIVITY_CONFIDENCES = ['low', 'medium', 'high'] as const

export type ActivityKind = (typeof ACTIVITY_KINDS)[number]
export type ActivityConfidence = (typeof ACTIVITY_CONFIDENCES)[number]
export type Posture = 'standing' | 'sitting'

export type PostureChangeSource =
  | 'activity'
  | 'stabilized'
  | 'idle-timeout'
  | 'accelerometer'
  | 'manual'

export interface PostureSample {
  readonly activity: ActivityKind
  readonly confidence: ActivityConfidence
  readonly timestamp: number
}

export interface PostureState {
  readonly posture: Posture
  readonly consecutiveStationary: number
  readonly lastObservationAt: number | null
}

export interface PostureChange {
  readonly from: Posture
  readonly to: Posture
  readonly timestamp: number
  readonly source: PostureChangeSource
  // true when applied at an expired stabilization deadline
  readonly delayed: boolean
}

/**
 * Wrist-frame acceleration in g. y runs along the forearm, x across the
 * wrist, z out of the display.
 */
export interface AccelerationSample {
  readonly x: number
  readonly y: number
  readonly z: number
  readonly timestamp: number
}

export interface PostureScores {
  readonly verticalOrientation: number
  readonly movementVariance: number
  readonly armAngle: number
  readonly rangeOfMotion: number
}

export interface PostureEstimate {
  readonly posture: Posture
  readonly score: number
  readonly confidence: number
  readonly scores: PostureScores
  readonly sampleCount: number
  readonly timestamp: number
}
