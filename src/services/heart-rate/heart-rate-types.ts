import type { AlertRequest, SignificantChange } from '@/services/alerts/alert-types'
import type { OrthostaticEventUpdate } from '@/services/orthostatic/orthostatic-types'

export interface HeartRateSample {
  readonly bpm: number
  readonly timestamp: number
}

export interface HeartRateUpdate {
  readonly sample: HeartRateSample
  // Change from the previous reading, 0 when there is none
  readonly delta: number
  // Whether transport/history collaborators should receive this update
  readonly shouldForward: boolean
  readonly orthostatic: OrthostaticEventUpdate | null
  readonly significantChange: SignificantChange | null
  readonly alert: AlertRequest | null
}
