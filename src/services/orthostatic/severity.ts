import type { OrthostaticEvent, OrthostaticSeverity } from './orthostatic-types'

export const SEVERITY_LABELS: Readonly<Record<OrthostaticSeverity, string>> = {
  normal: 'Normal',
  mild: 'Mild Response',
  moderate: 'Moderate Response',
  severe: 'Significant Response',
}

// 30+ BPM held for 10 minutes
const SUSTAINED_RESPONSE_SECONDS = 600
const PROLONGED_SECONDS = 180
const ELEVATION_INCREASE = 30

export function baseSeverity(increase: number): OrthostaticSeverity {
  if (increase >= 50) return 'severe'
  if (increase >= 40) return 'moderate'
  if (increase >= ELEVATION_INCREASE) return 'mild'
  return 'normal'
}

function isSustainedResponse(event: OrthostaticEvent): boolean {
  return (
    event.sustainedSeconds >= SUSTAINED_RESPONSE_SECONDS && event.increase >= ELEVATION_INCREASE
  )
}

/**
 * Severity from peak increase, escalated by how long the elevation held.
 */
export function getSeverity(event: OrthostaticEvent): OrthostaticSeverity {
  const base = baseSeverity(event.increase)

  if (isSustainedResponse(event)) {
    return 'severe'
  }

  if (event.sustainedSeconds >= PROLONGED_SECONDS && base === 'mild') {
    return 'moderate'
  }

  return base
}

export function describeEvent(event: OrthostaticEvent): string {
  const sustainedText =
    event.sustainedSeconds >= 60
      ? ` (sustained ${Math.round(event.sustainedSeconds / 60)} min)`
      : ''

  let recoveryText = ', not recovered'
  if (event.recoverySeconds !== null) {
    recoveryText = `, recovered in ${Math.round(event.recoverySeconds)}s`
  } else if (event.isRecovered) {
    recoveryText = ', recovered'
  }

  return (
    `Standing: +${event.increase} BPM (${event.baselineRate}→${event.peakRate})` +
    `${sustainedText}${recoveryText}`
  )
}

export function clinicalSummary(event: OrthostaticEvent): string {
  const indicator = isSustainedResponse(event) ? ' [Sustained Response]' : ''
  return `Peak: +${event.increase} BPM, Sustained: ${Math.trunc(event.sustainedSeconds)}s${indicator}`
}
