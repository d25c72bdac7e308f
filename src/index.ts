export { PosturalMonitor } from './services/monitor/postural-monitor'
export type {
  MonitorCallbacks,
  MonitorOptions,
  MonitorSnapshot,
} from './services/monitor/postural-monitor'

export { PostureClassifier } from './services/posture-detection/posture-classifier'
export type { PostureClassifierOptions } from './services/posture-detection/posture-classifier'
export {
  AccelerometerPostureEstimator,
  combineScores,
  scoreWindow,
} from './services/posture-detection/accelerometer-estimator'
export { ACTIVITY_CONFIDENCES, ACTIVITY_KINDS } from './services/posture-detection/posture-types'
export type {
  AccelerationSample,
  ActivityConfidence,
  ActivityKind,
  Posture,
  PostureChange,
  PostureChangeSource,
  PostureEstimate,
  PostureSample,
  PostureScores,
  PostureState,
} from './services/posture-detection/posture-types'

export { OrthostaticTracker } from './services/orthostatic/orthostatic-tracker'
export type { OrthostaticTrackerOptions } from './services/orthostatic/orthostatic-tracker'
export {
  SEVERITY_LABELS,
  baseSeverity,
  clinicalSummary,
  describeEvent,
  getSeverity,
} from './services/orthostatic/severity'
export type {
  ElevationPhase,
  HeartRatePoint,
  OrthostaticEvent,
  OrthostaticEventUpdate,
  OrthostaticSeverity,
  StandingEpisode,
} from './services/orthostatic/orthostatic-types'

export { SignificantChangeEvaluator } from './services/alerts/significant-change-evaluator'
export {
  alertMessage,
  classifyDelta,
  evaluateHeartRateChange,
  isInCooldown,
} from './services/alerts/change-rules'
export type {
  AlertRequest,
  AlertSeverity,
  ChangeEvaluation,
  SignificantChange,
} from './services/alerts/alert-types'

export { HeartRateCoordinator } from './services/heart-rate/heart-rate-coordinator'
export { ForwardingThrottle } from './services/heart-rate/forwarding-throttle'
export type { HeartRateSample, HeartRateUpdate } from './services/heart-rate/heart-rate-types'

export { DEFAULT_SETTINGS } from './types/settings'
export type { MonitorSettings } from './types/settings'
export { SettingsStore } from './store/settings-store'
export { mergeSettings, parseSettings, safeParseSettings } from './store/settings-schema'
export type { SettingsPatch } from './store/settings-schema'
