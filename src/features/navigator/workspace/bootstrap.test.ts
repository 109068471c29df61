import { get } from 'svelte/store'
import { describe, expect, it, vi } from 'vitest'

const { loadSettingsMock, createPowerShellRunnerMock } = vi.hoisted(() => ({
  loadSettingsMock: vi.fn(),
  createPowerShellRunnerMock: vi.fn(),
}))

vi.mock('../services/settings.service', () => ({
  loadSettings: loadSettingsMock,
}))

vi.mock('@/shared/lib/shell', async () => {
  const actual = await vi.importActual<typeof import('@/shared/lib/shell')>('@/shared/lib/shell')
  return {
    ...actual,
    createPowerShellRunner: createPowerShellRunnerMock,
  }
})

import { bootstrapWorkspace } from './bootstrap'

describe('bootstrapWorkspace', () => {
  it('builds the workspace from the settings file', async () => {
    loadSettingsMock.mockResolvedValue({ showHidden: true, shell: 'pwsh' })
    createPowerShellRunnerMock.mockReturnValue({ run: vi.fn() })

    const workspace = await bootstrapWorkspace({
      settingsPath: '/etc/navigator.json',
      confirmOverwrite: vi.fn(async () => false),
      notify: { warn: vi.fn(), error: vi.fn() },
    })

    expect(loadSettingsMock).toHaveBeenCalledWith('/etc/navigator.json')
    expect(createPowerShellRunnerMock).toHaveBeenCalledWith({ executable: 'pwsh' })
    expect(get(workspace.source.navigator.showHidden)).toBe(true)
    expect(get(workspace.destination.navigator.showHidden)).toBe(true)
    expect(get(workspace.status)).toBe('Ready')
  })
})
