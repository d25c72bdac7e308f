import { z } from 'zod'
import type { MonitorSettings } from '@/types/settings'
import { DEFAULT_SETTINGS } from '@/types/settings'

const d = DEFAULT_SETTINGS

const Millis = z.number().finite().nonnegative()
const Bpm = z.number().finite().positive()
const Count = z.number().int().positive()

const PostureSettingsZ = z
  .object({
    stabilizationDelayMs: Millis.default(d.posture.stabilizationDelayMs),
    idleTimeoutMs: Millis.default(d.posture.idleTimeoutMs),
    confirmSittingAfter: Count.default(d.posture.confirmSittingAfter),
    forceSittingAfter: Count.default(d.posture.forceSittingAfter),
    historySize: Count.default(d.posture.historySize),
  })
  .default({})

const AccelerometerSettingsZ = z
  .object({
    enabled: z.boolean().default(d.accelerometer.enabled),
    windowMs: Millis.default(d.accelerometer.windowMs),
    maxSamples: Count.default(d.accelerometer.maxSamples),
    evaluationIntervalMs: Millis.default(d.accelerometer.evaluationIntervalMs),
    minSamples: Count.default(d.accelerometer.minSamples),
    flipConfidence: z.number().min(0).max(1).default(d.accelerometer.flipConfidence),
  })
  .default({})
  .refine((s) => s.maxSamples >= s.minSamples, {
    message: 'maxSamples must not be below minSamples',
  })

const OrthostaticSettingsZ = z
  .object({
    warmupSeconds: z.number().finite().nonnegative().default(d.orthostatic.warmupSeconds),
    elevationThreshold: Bpm.default(d.orthostatic.elevationThreshold),
    minSustainedSeconds: z.number().finite().nonnegative().default(d.orthostatic.minSustainedSeconds),
    recoveryBand: z.number().finite().nonnegative().default(d.orthostatic.recoveryBand),
    recoveryHoldSeconds: z.number().finite().nonnegative().default(d.orthostatic.recoveryHoldSeconds),
    patternWindowSeconds: z.number().finite().positive().default(d.orthostatic.patternWindowSeconds),
    maxEvents: Count.default(d.orthostatic.maxEvents),
  })
  .default({})

const AlertSettingsZ = z
  .object({
    minorDelta: Bpm.default(d.alerts.minorDelta),
    majorDelta: Bpm.default(d.alerts.majorDelta),
    cooldownMs: Millis.default(d.alerts.cooldownMs),
    maxSignificantChanges: Count.default(d.alerts.maxSignificantChanges),
  })
  .default({})
  .refine((s) => s.majorDelta >= s.minorDelta, {
    message: 'majorDelta must not be below minorDelta',
  })

const ForwardingSettingsZ = z
  .object({
    intervalMs: Millis.default(d.forwarding.intervalMs),
    significantDeltaIntervalMs: Millis.default(d.forwarding.significantDeltaIntervalMs),
    significantDelta: Bpm.default(d.forwarding.significantDelta),
    stabilizedDelta: Bpm.default(d.forwarding.stabilizedDelta),
  })
  .default({})

const AdvancedSettingsZ = z
  .object({
    debugMode: z.boolean().default(d.advanced.debugMode),
  })
  .default({})

export const MonitorSettingsZ = z.object({
  posture: PostureSettingsZ,
  accelerometer: AccelerometerSettingsZ,
  orthostatic: OrthostaticSettingsZ,
  alerts: AlertSettingsZ,
  forwarding: ForwardingSettingsZ,
  advanced: AdvancedSettingsZ,
})

/**
 * Validate a settings document, filling absent fields from the defaults.
 * Throws a ZodError when a present field is invalid.
 */
export function parseSettings(raw: unknown): MonitorSettings {
  return MonitorSettingsZ.parse(raw ?? {})
}

export function safeParseSettings(raw: unknown): MonitorSettings | null {
  const result = MonitorSettingsZ.safeParse(raw ?? {})
  return result.success ? result.data : null
}

export type SettingsPatch = {
  readonly [K in keyof MonitorSettings]?: Partial<MonitorSettings[K]>
}

/**
 * Shallow-merge each section of `patch` over `base`, then validate.
 */
export function mergeSettings(base: MonitorSettings, patch: SettingsPatch): MonitorSettings {
  return parseSettings({
    posture: { ...base.posture, ...patch.posture },
    accelerometer: { ...base.accelerometer, ...patch.accelerometer },
    orthostatic: { ...base.orthostatic, ...patch.orthostatic },
    alerts: { ...base.alerts, ...patch.alerts },
    forwarding: { ...base.forwarding, ...patch.forwarding },
    advanced: { ...base.advanced, ...patch.advanced },
  })
}
