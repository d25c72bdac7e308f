export type AlertSeverity = 'minor' | 'major'

export interface SignificantChange {
  readonly id: string
  readonly timestamp: number
  readonly fromRate: number
  readonly toRate: number
  readonly delta: number
  // |delta| reached the major threshold
  readonly isMajor: boolean
}

export interface AlertRequest {
  readonly timestamp: number
  readonly fromRate: number
  readonly toRate: number
  readonly delta: number
  readonly severity: AlertSeverity
  readonly message: string
}

export interface ChangeEvaluation {
  readonly change: SignificantChange | null
  readonly alert: AlertRequest | null
}

export const NO_CHANGE: ChangeEvaluation = { change: null, alert: null }
