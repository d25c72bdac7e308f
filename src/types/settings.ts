export interface MonitorSettings {
  readonly posture: PostureSettings
  readonly accelerometer: AccelerometerSettings
  readonly orthostatic: OrthostaticSettings
  readonly alerts: AlertSettings
  readonly forwarding: ForwardingSettings
  readonly advanced: AdvancedSettings
}

export interface PostureSettings {
  readonly stabilizationDelayMs: number
  readonly idleTimeoutMs: number
  // Consecutive stationary-class observations needed at deadline expiry
  readonly confirmSittingAfter: number
  // Consecutive stationary-class observations that force sitting immediately
  readonly forceSittingAfter: number
  readonly historySize: number
}

export interface AccelerometerSettings {
  readonly enabled: boolean
  readonly windowMs: number
  readonly maxSamples: number
  readonly evaluationIntervalMs: number
  readonly minSamples: number
  readonly flipConfidence: number
}

export interface OrthostaticSettings {
  readonly warmupSeconds: number
  readonly elevationThreshold: number
  readonly minSustainedSeconds: number
  readonly recoveryBand: number
  readonly recoveryHoldSeconds: number
  readonly patternWindowSeconds: number
  readonly maxEvents: number
}

export interface AlertSettings {
  readonly minorDelta: number
  readonly majorDelta: number
  readonly cooldownMs: number
  readonly maxSignificantChanges: number
}

export interface ForwardingSettings {
  readonly intervalMs: number
  readonly significantDeltaIntervalMs: number
  readonly significantDelta: number
  readonly stabilizedDelta: number
}

export interface AdvancedSettings {
  readonly debugMode: boolean
}

export const DEFAULT_SETTINGS: MonitorSettings = {
  posture: {
    stabilizationDelayMs: 5000,
    idleTimeoutMs: 120_000,
    confirmSittingAfter: 2,
    forceSittingAfter: 3,
    historySize: 10,
  },
  accelerometer: {
    enabled: true,
    windowMs: 10_000,
    maxSamples: 50,
    evaluationIntervalMs: 10_000,
    minSamples: 5,
    flipConfidence: 0.7,
  },
  orthostatic: {
    warmupSeconds: 10,
    elevationThreshold: 30,
    minSustainedSeconds: 30,
    recoveryBand: 10,
    recoveryHoldSeconds: 30,
    patternWindowSeconds: 600,
    maxEvents: 20,
  },
  alerts: {
    minorDelta: 30,
    majorDelta: 50,
    cooldownMs: 30_000,
    maxSignificantChanges: 50,
  },
  forwarding: {
    intervalMs: 300_000,
    significantDeltaIntervalMs: 60_000,
    significantDelta: 30,
    stabilizedDelta: 15,
  },
  advanced: {
    debugMode: false,
  },
}
