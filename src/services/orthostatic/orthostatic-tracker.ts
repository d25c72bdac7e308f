import { randomUUID } from 'node:crypto'
import type { OrthostaticSettings } from '@/types/settings'
import { DEFAULT_SETTINGS } from '@/types/settings'
import { BoundedLog } from '@/utils/bounded-log'
import { createDebugLogger, type DebugLogger } from '@/utils/logger'
import type {
  ElevationPhase,
  HeartRatePoint,
  OrthostaticEvent,
  OrthostaticEventUpdate,
  StandingEpisode,
} from './orthostatic-types'
import { describeEvent } from './severity'

export interface OrthostaticTrackerOptions {
  readonly onEvent?: (update: OrthostaticEventUpdate) => void
  readonly createId?: () => string
  readonly debugMode?: boolean
}

interface MutableEpisode {
  startedAt: number
  baselineRate: number
  pattern: HeartRatePoint[]
  isElevated: boolean
  elevationStartedAt: number | null
  recoveryStartedAt: number | null
  recoveryBandEnteredAt: number | null
  hasRecovered: boolean
  pendingEventId: string | null
  lastRate: number
}

function secondsBetween(from: number, to: number): number {
  return (to - from) / 1000
}

/**
 * Tracks heart rate across one standing episode at a time and turns
 * sustained elevations above the standing baseline into orthostatic events.
 *
 * Phases: no-elevation -> elevated -> recovering -> recovered. An event is
 * created when an elevation of at least `minSustainedSeconds` ends, and is
 * amended once when the rate settles back within the recovery band.
 */
export class OrthostaticTracker {
  private readonly settings: OrthostaticSettings
  private readonly events: BoundedLog<OrthostaticEvent>
  private readonly onEvent: ((update: OrthostaticEventUpdate) => void) | undefined
  private readonly createId: () => string
  private readonly log: DebugLogger
  private episode: MutableEpisode | null = null

  constructor(
    settings: OrthostaticSettings = DEFAULT_SETTINGS.orthostatic,
    options: OrthostaticTrackerOptions = {},
  ) {
    this.settings = settings
    this.events = new BoundedLog<OrthostaticEvent>(settings.maxEvents)
    this.onEvent = options.onEvent
    this.createId = options.createId ?? randomUUID
    this.log = createDebugLogger('Orthostatic', options.debugMode ?? false)
  }

  /**
   * Begin a new standing episode. Any episode in progress is discarded
   * without finalizing; call `endStanding` first to keep its elevation.
   */
  startStanding(now: number, baselineRate: number): void {
    this.episode = {
      startedAt: now,
      baselineRate: Number.isFinite(baselineRate) && baselineRate > 0 ? baselineRate : 0,
      pattern: [],
      isElevated: false,
      elevationStartedAt: null,
      recoveryStartedAt: null,
      recoveryBandEnteredAt: null,
      hasRecovered: false,
      pendingEventId: null,
      lastRate: 0,
    }

    if (this.episode.baselineRate > 0) {
      this.log.debug(`Standing detected, baseline ${this.episode.baselineRate} BPM`)
    } else {
      this.log.debug('Standing detected without a baseline, events disabled for this episode')
    }
  }

  /**
   * End the current standing episode, finalizing an elevation still in
   * progress.
   */
  endStanding(now: number): OrthostaticEventUpdate | null {
    const episode = this.episode
    if (episode === null) {
      return null
    }

    let update: OrthostaticEventUpdate | null = null
    if (episode.isElevated) {
      update = this.closeElevation(episode, now)
    }

    this.log.debug(
      `Standing episode ended after ${Math.round(secondsBetween(episode.startedAt, now))}s`,
    )
    this.episode = null
    return update
  }

  onHeartRate(rate: number, now: number): OrthostaticEventUpdate | null {
    const episode = this.episode
    if (episode === null || episode.baselineRate <= 0 || !Number.isFinite(rate) || rate <= 0) {
      return null
    }

    const elapsed = secondsBetween(episode.startedAt, now)
    if (elapsed < this.settings.warmupSeconds) {
      return null
    }

    episode.lastRate = rate
    episode.pattern.push({ rate, secondsSinceStanding: elapsed })
    const windowStart = elapsed - this.settings.patternWindowSeconds
    episode.pattern = episode.pattern.filter((p) => p.secondsSinceStanding > windowStart)

    const increase = rate - episode.baselineRate
    const atElevation = increase >= this.settings.elevationThreshold

    if (atElevation && !episode.isElevated) {
      this.startElevation(episode, now, rate, increase)
      return null
    }

    if (atElevation) {
      this.log.debug(`Ongoing elevation: ${rate} BPM (+${increase})`)
      return null
    }

    if (episode.isElevated) {
      episode.isElevated = false
      episode.recoveryStartedAt = now
      const update = this.closeElevation(episode, now)
      this.trackRecoveryBand(episode, increase, now)
      return update
    }

    if (episode.recoveryStartedAt !== null && !episode.hasRecovered) {
      return this.monitorRecovery(episode, increase, now)
    }

    return null
  }

  getPhase(): ElevationPhase {
    const episode = this.episode
    if (episode === null) return 'idle'
    if (episode.isElevated) return 'elevated'
    if (episode.hasRecovered) return 'recovered'
    if (episode.recoveryStartedAt !== null) return 'recovering'
    return 'no-elevation'
  }

  getEpisode(): StandingEpisode | null {
    const episode = this.episode
    if (episode === null) {
      return null
    }

    return {
      startedAt: episode.startedAt,
      baselineRate: episode.baselineRate,
      pattern: [...episode.pattern],
      isElevated: episode.isElevated,
      elevationStartedAt: episode.elevationStartedAt,
      recoveryStartedAt: episode.recoveryStartedAt,
      recoveryBandEnteredAt: episode.recoveryBandEnteredAt,
      hasRecovered: episode.hasRecovered,
      pendingEventId: episode.pendingEventId,
    }
  }

  getEvents(): readonly OrthostaticEvent[] {
    return this.events.toArray()
  }

  /**
   * Seed the event log from a previously saved snapshot (oldest first).
   */
  restoreEvents(events: readonly OrthostaticEvent[]): void {
    this.events.replaceAll(events)
  }

  clearEvents(): void {
    this.events.clear()
  }

  setDebugMode(enabled: boolean): void {
    this.log.setEnabled(enabled)
  }

  private startElevation(
    episode: MutableEpisode,
    now: number,
    rate: number,
    increase: number,
  ): void {
    episode.isElevated = true
    episode.elevationStartedAt = now
    episode.recoveryStartedAt = null
    episode.recoveryBandEnteredAt = null
    episode.hasRecovered = false

    this.log.debug(
      `Elevation started: ${rate} BPM (+${increase}) at ${Math.round(secondsBetween(episode.startedAt, now))}s`,
    )
  }

  private closeElevation(episode: MutableEpisode, now: number): OrthostaticEventUpdate | null {
    if (episode.elevationStartedAt === null) {
      return null
    }

    const sustainedSeconds = secondsBetween(episode.elevationStartedAt, now)
    if (sustainedSeconds < this.settings.minSustainedSeconds) {
      this.log.debug(`Elevation of ${sustainedSeconds}s too brief, discarded`)
      return null
    }

    // Peak comes from the pattern window only; older points are already gone
    const peakRate = episode.pattern.reduce(
      (max, point) => Math.max(max, point.rate),
      episode.pattern.length > 0 ? 0 : episode.lastRate,
    )

    const event: OrthostaticEvent = {
      id: this.createId(),
      timestamp: episode.elevationStartedAt,
      baselineRate: episode.baselineRate,
      peakRate,
      increase: peakRate - episode.baselineRate,
      standingSeconds: secondsBetween(episode.startedAt, now),
      sustainedSeconds,
      recoverySeconds: null,
      pattern: [...episode.pattern],
      isRecovered: false,
    }

    this.events.append(event)
    episode.pendingEventId = event.id
    this.log.debug(`Sustained elevation event: ${describeEvent(event)}`)

    const update: OrthostaticEventUpdate = { kind: 'created', event }
    this.onEvent?.(update)
    return update
  }

  private trackRecoveryBand(episode: MutableEpisode, increase: number, now: number): void {
    if (increase > this.settings.recoveryBand) {
      episode.recoveryBandEnteredAt = null
    } else if (episode.recoveryBandEnteredAt === null) {
      episode.recoveryBandEnteredAt = now
    }
  }

  private monitorRecovery(
    episode: MutableEpisode,
    increase: number,
    now: number,
  ): OrthostaticEventUpdate | null {
    this.trackRecoveryBand(episode, increase, now)
    if (episode.recoveryBandEnteredAt === null || episode.recoveryStartedAt === null) {
      return null
    }

    const heldSeconds = secondsBetween(episode.recoveryBandEnteredAt, now)
    if (heldSeconds < this.settings.recoveryHoldSeconds) {
      return null
    }

    episode.hasRecovered = true
    this.log.debug(`Full recovery achieved in ${Math.round(heldSeconds)}s`)
    return this.amendWithRecovery(episode, heldSeconds)
  }

  private amendWithRecovery(
    episode: MutableEpisode,
    recoverySeconds: number,
  ): OrthostaticEventUpdate | null {
    const pendingId = episode.pendingEventId
    if (pendingId === null) {
      return null
    }

    episode.pendingEventId = null

    const previous = this.events.last()
    if (previous === undefined || previous.id !== pendingId || previous.isRecovered) {
      return null
    }

    const amended = this.events.amendLast((last) => ({ ...last, recoverySeconds, isRecovered: true }))
    if (amended === null) {
      return null
    }

    this.log.debug(`Updated event with recovery: ${describeEvent(amended)}`)
    const update: OrthostaticEventUpdate = { kind: 'amended', event: amended, previous }
    this.onEvent?.(update)
    return update
  }
}
