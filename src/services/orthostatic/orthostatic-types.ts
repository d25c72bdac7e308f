export interface HeartRatePoint {
  readonly rate: number
  readonly secondsSinceStanding: number
}

export type OrthostaticSeverity = 'normal' | 'mild' | 'moderate' | 'severe'

export interface OrthostaticEvent {
  readonly id: string
  // Elevation onset
  readonly timestamp: number
  readonly baselineRate: number
  readonly peakRate: number
  readonly increase: number
  // Standing duration when the event was detected
  readonly standingSeconds: number
  readonly sustainedSeconds: number
  // Time the rate held within the recovery band, null until recovered
  readonly recoverySeconds: number | null
  readonly pattern: readonly HeartRatePoint[]
  readonly isRecovered: boolean
}

export type OrthostaticEventUpdate =
  | { readonly kind: 'created'; readonly event: OrthostaticEvent }
  | {
      readonly kind: 'amended'
      readonly event: OrthostaticEvent
      readonly previous: OrthostaticEvent
    }

export type ElevationPhase = 'idle' | 'no-elevation' | 'elevated' | 'recovering' | 'recovered'

export interface StandingEpisode {
  readonly startedAt: number
  readonly baselineRate: number
  readonly pattern: readonly HeartRatePoint[]
  readonly isElevated: boolean
  readonly elevationStartedAt: number | null
  readonly recoveryStartedAt: number | null
  readonly recoveryBandEnteredAt: number | null
  readonly hasRecovered: boolean
  // Latest event of this episode still awaiting its recovery amendment
  readonly pendingEventId: string | null
}
