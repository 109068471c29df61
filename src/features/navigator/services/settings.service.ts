import { readFile } from 'node:fs/promises'
import { getErrorCode, getErrorMessage } from '@/shared/lib/error'
import { DEFAULT_SHELL } from '@/shared/lib/shell'

export const SETTINGS_FILE = 'navigator.settings.json'

export type NavigatorSettings = {
  showHidden: boolean
  shell: string
}

export const defaultSettings = (): NavigatorSettings => ({
  showHidden: false,
  shell: DEFAULT_SHELL,
})

const asRecord = (value: unknown): Record<string, unknown> | null => {
  if (value && typeof value === 'object' && !Array.isArray(value)) return value as Record<string, unknown>
  return null
}

export const parseSettings = (value: unknown): NavigatorSettings => {
  const settings = defaultSettings()
  const record = asRecord(value)
  if (!record) {
    console.warn('Ignoring settings: expected a JSON object')
    return settings
  }
  if (typeof record.showHidden === 'boolean') {
    settings.showHidden = record.showHidden
  } else if (record.showHidden !== undefined) {
    console.warn('Ignoring settings.showHidden: expected a boolean')
  }
  if (typeof record.shell === 'string' && record.shell.trim().length > 0) {
    settings.shell = record.shell.trim()
  } else if (record.shell !== undefined) {
    console.warn('Ignoring settings.shell: expected a non-empty string')
  }
  return settings
}

export const loadSettings = async (path: string = SETTINGS_FILE): Promise<NavigatorSettings> => {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (err) {
    if (getErrorCode(err) !== 'ENOENT') {
      console.warn(`Failed to read ${path}, using defaults:`, getErrorMessage(err))
    }
    return defaultSettings()
  }
  try {
    return parseSettings(JSON.parse(text))
  } catch (err) {
    console.warn(`Invalid JSON in ${path}, using defaults:`, getErrorMessage(err))
    return defaultSettings()
  }
}
