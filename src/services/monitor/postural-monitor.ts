import type { AlertRequest, SignificantChange } from '@/services/alerts/alert-types'
import { SignificantChangeEvaluator } from '@/services/alerts/significant-change-evaluator'
import { ForwardingThrottle } from '@/services/heart-rate/forwarding-throttle'
import { HeartRateCoordinator } from '@/services/heart-rate/heart-rate-coordinator'
import type { HeartRateUpdate } from '@/services/heart-rate/heart-rate-types'
import { OrthostaticTracker } from '@/services/orthostatic/orthostatic-tracker'
import type {
  ElevationPhase,
  OrthostaticEvent,
  OrthostaticEventUpdate,
} from '@/services/orthostatic/orthostatic-types'
import { PostureClassifier } from '@/services/posture-detection/posture-classifier'
import type {
  AccelerationSample,
  ActivityConfidence,
  ActivityKind,
  Posture,
  PostureChange,
} from '@/services/posture-detection/posture-types'
import type { MonitorSettings } from '@/types/settings'
import { DEFAULT_SETTINGS } from '@/types/settings'

export interface MonitorCallbacks {
  readonly onPostureChange?: (change: PostureChange) => void
  readonly onOrthostaticEvent?: (update: OrthostaticEventUpdate) => void
  readonly onSignificantChange?: (change: SignificantChange) => void
  readonly onAlert?: (alert: AlertRequest) => void
  readonly onForward?: (update: HeartRateUpdate) => void
}

export interface MonitorOptions {
  readonly createId?: () => string
}

export interface MonitorSnapshot {
  readonly posture: Posture
  readonly phase: ElevationPhase
  readonly currentRate: number
  readonly previousRate: number
  readonly baselineRate: number
  readonly standingBaselineRate: number | null
  readonly lastAlertAt: number | null
  readonly events: readonly OrthostaticEvent[]
  readonly significantChanges: readonly SignificantChange[]
}

/**
 * One engine instance: posture classification, orthostatic tracking and
 * change alerts behind a single synchronous entry point per input feed.
 * Callers serialize access; nothing here schedules work.
 */
export class PosturalMonitor {
  private readonly callbacks: MonitorCallbacks
  private readonly classifier: PostureClassifier
  private readonly tracker: OrthostaticTracker
  private readonly evaluator: SignificantChangeEvaluator
  private readonly throttle: ForwardingThrottle
  private readonly coordinator: HeartRateCoordinator

  constructor(
    settings: MonitorSettings = DEFAULT_SETTINGS,
    callbacks: MonitorCallbacks = {},
    options: MonitorOptions = {},
  ) {
    const debugMode = settings.advanced.debugMode
    this.callbacks = callbacks

    this.tracker = new OrthostaticTracker(settings.orthostatic, {
      onEvent: (update) => this.callbacks.onOrthostaticEvent?.(update),
      createId: options.createId,
      debugMode,
    })
    this.evaluator = new SignificantChangeEvaluator(settings.alerts, {
      createId: options.createId,
      debugMode,
    })
    this.throttle = new ForwardingThrottle(settings.forwarding, debugMode)
    this.coordinator = new HeartRateCoordinator(
      { tracker: this.tracker, evaluator: this.evaluator, throttle: this.throttle },
      debugMode,
    )
    this.classifier = new PostureClassifier(settings.posture, {
      accelerometer: settings.accelerometer,
      onChange: (change) => this.handlePostureChange(change),
      debugMode,
    })
  }

  observeActivity(
    activity: ActivityKind,
    confidence: ActivityConfidence,
    now: number,
  ): PostureChange | null {
    return this.classifier.observe(activity, confidence, now)
  }

  observeAcceleration(sample: AccelerationSample): PostureChange | null {
    return this.classifier.observeAcceleration(sample)
  }

  /**
   * Resolve posture deadlines (stabilization delay, idle timeout) at `now`.
   */
  poll(now: number): PostureChange | null {
    return this.classifier.poll(now)
  }

  setPosture(posture: Posture, now: number): PostureChange | null {
    return this.classifier.setPosture(posture, now)
  }

  /**
   * Resolves posture deadlines at `now` first, so a standing episode that
   * has already ended never sees this sample.
   */
  recordHeartRate(bpm: number, now: number): HeartRateUpdate | null {
    this.classifier.poll(now)

    const update = this.coordinator.handleSample(bpm, now)
    if (update === null) {
      return null
    }

    if (update.significantChange !== null) {
      this.callbacks.onSignificantChange?.(update.significantChange)
    }
    if (update.alert !== null) {
      this.callbacks.onAlert?.(update.alert)
    }
    if (update.shouldForward) {
      this.callbacks.onForward?.(update)
    }

    return update
  }

  setForwardInterval(intervalMs: number): void {
    this.throttle.setIntervalMs(intervalMs)
  }

  restoreEvents(events: readonly OrthostaticEvent[]): void {
    this.tracker.restoreEvents(events)
  }

  getStatusSummary(now: number): string {
    return this.classifier.getStatusSummary(now)
  }

  setDebugMode(enabled: boolean): void {
    this.classifier.setDebugMode(enabled)
    this.tracker.setDebugMode(enabled)
    this.evaluator.setDebugMode(enabled)
    this.throttle.setDebugMode(enabled)
    this.coordinator.setDebugMode(enabled)
  }

  getSnapshot(): MonitorSnapshot {
    const episode = this.tracker.getEpisode()
    return {
      posture: this.classifier.getPosture(),
      phase: this.tracker.getPhase(),
      currentRate: this.coordinator.getCurrentRate(),
      previousRate: this.coordinator.getPreviousRate(),
      baselineRate: this.coordinator.getBaselineRate(),
      standingBaselineRate: episode?.baselineRate ?? null,
      lastAlertAt: this.evaluator.getLastAlertAt(),
      events: this.tracker.getEvents(),
      significantChanges: this.evaluator.getSignificantChanges(),
    }
  }

  private handlePostureChange(change: PostureChange): void {
    this.coordinator.handlePostureChange(change)
    this.callbacks.onPostureChange?.(change)
  }
}
