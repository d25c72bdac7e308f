export interface DebugLogger {
  debug(message: string): void
  warn(message: string, detail?: unknown): void
  setEnabled(enabled: boolean): void
  isEnabled(): boolean
}

/**
 * Tagged console logger. Silent unless debug mode is enabled.
 */
export function createDebugLogger(tag: string, enabled = false): DebugLogger {
  let active = enabled

  return {
    debug(message: string): void {
      if (active) {
        console.log(`[${tag}] ${message}`)
      }
    },
    warn(message: string, detail?: unknown): void {
      if (!active) return
      if (detail === undefined) {
        console.warn(`[${tag}] ${message}`)
      } else {
        console.warn(`[${tag}] ${message}`, detail)
      }
    },
    setEnabled(value: boolean): void {
      active = value
    },
    isEnabled(): boolean {
      return active
    },
  }
}
