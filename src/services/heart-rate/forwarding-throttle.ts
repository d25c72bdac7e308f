import type { ForwardingSettings } from '@/types/settings'
import { DEFAULT_SETTINGS } from '@/types/settings'
import { createDebugLogger, type DebugLogger } from '@/utils/logger'

/**
 * Decides which heart-rate updates reach external collaborators.
 *
 * Normally one update per `intervalMs`. While the rate is far from the last
 * forwarded value the throttle switches to `significantDeltaIntervalMs`
 * (never longer than the configured interval), and
 * leaves that mode once the rate is back within `stabilizedDelta`. A
 * consecutive delta at or above `significantDelta` is always forwarded.
 */
export class ForwardingThrottle {
  private readonly settings: ForwardingSettings
  private intervalMs: number
  private lastForwardedAt: number | null = null
  private lastForwardedRate: number | null = null
  private significantDeltaMode = false
  private readonly log: DebugLogger

  constructor(settings: ForwardingSettings = DEFAULT_SETTINGS.forwarding, debugMode = false) {
    this.settings = settings
    this.intervalMs = settings.intervalMs
    this.log = createDebugLogger('Recording', debugMode)
  }

  shouldForward(rate: number, delta: number, now: number): boolean {
    if (this.lastForwardedAt === null || this.lastForwardedRate === null) {
      this.markForwarded(rate, now)
      return true
    }

    this.updateMode(Math.abs(rate - this.lastForwardedRate))

    const requiredInterval = this.significantDeltaMode
      ? Math.min(this.intervalMs, this.settings.significantDeltaIntervalMs)
      : this.intervalMs
    const elapsed = now - this.lastForwardedAt
    const significant = Math.abs(delta) >= this.settings.significantDelta

    if (elapsed >= requiredInterval || significant) {
      this.markForwarded(rate, now)
      return true
    }

    this.log.debug(
      `Skipped - need ${Math.ceil((requiredInterval - elapsed) / 1000)}s more (Δ${delta} BPM)`,
    )
    return false
  }

  setIntervalMs(intervalMs: number): void {
    if (!Number.isFinite(intervalMs) || intervalMs < 0) {
      throw new RangeError(`intervalMs must be a non-negative number, got ${intervalMs}`)
    }
    this.intervalMs = intervalMs
    this.log.debug(`Recording interval updated to ${intervalMs / 1000}s`)
  }

  getIntervalMs(): number {
    return this.intervalMs
  }

  isInSignificantDeltaMode(): boolean {
    return this.significantDeltaMode
  }

  getLastForwardedAt(): number | null {
    return this.lastForwardedAt
  }

  setDebugMode(enabled: boolean): void {
    this.log.setEnabled(enabled)
  }

  reset(): void {
    this.lastForwardedAt = null
    this.lastForwardedRate = null
    this.significantDeltaMode = false
  }

  private updateMode(deltaFromForwarded: number): void {
    if (deltaFromForwarded >= this.settings.significantDelta && !this.significantDeltaMode) {
      this.significantDeltaMode = true
      this.log.debug(`Entering significant delta mode (Δ${deltaFromForwarded} BPM)`)
    } else if (this.significantDeltaMode && deltaFromForwarded < this.settings.stabilizedDelta) {
      this.significantDeltaMode = false
      this.log.debug('Exiting significant delta mode (heart rate stabilized)')
    }
  }

  private markForwarded(rate: number, now: number): void {
    this.lastForwardedAt = now
    this.lastForwardedRate = rate
  }
}
