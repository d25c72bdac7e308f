import Conf from 'conf'
import type { MonitorSettings } from '@/types/settings'
import { DEFAULT_SETTINGS } from '@/types/settings'
import { mergeSettings, safeParseSettings, type SettingsPatch } from './settings-schema'

type StoreSchema = {
  settings: MonitorSettings
}

export interface SettingsStoreOptions {
  // Directory holding the settings file; defaults to the OS config directory
  readonly cwd?: string
  readonly configName?: string
}

export class SettingsStore {
  private readonly store: Conf<StoreSchema>

  constructor(options: SettingsStoreOptions = {}) {
    this.store = new Conf<StoreSchema>({
      projectName: 'orthostatic-monitor',
      configName: options.configName ?? 'monitor-settings',
      cwd: options.cwd,
      defaults: {
        settings: DEFAULT_SETTINGS,
      },
      clearInvalidConfig: true,
    })
  }

  /**
   * Stored settings, or the defaults when the stored document fails
   * validation.
   */
  getSettings(): MonitorSettings {
    const stored: unknown = this.store.get('settings')
    const parsed = safeParseSettings(stored)
    if (parsed === null) {
      console.warn(`Invalid settings in ${this.store.path}, using defaults`)
      return DEFAULT_SETTINGS
    }
    return parsed
  }

  setSettings(settings: MonitorSettings): void {
    this.store.set('settings', settings)
  }

  updateSettings(patch: SettingsPatch): MonitorSettings {
    const next = mergeSettings(this.getSettings(), patch)
    this.setSettings(next)
    return next
  }

  getPath(): string {
    return this.store.path
  }

  clear(): void {
    this.store.clear()
  }
}
