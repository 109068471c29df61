import { createPowerShellRunner } from '@/shared/lib/shell'
import { createNodeDirectoryReader } from '../services/listing.service'
import { loadSettings } from '../services/settings.service'
import { createTransferWorkspace } from './createTransferWorkspace'

type BootstrapOptions = {
  settingsPath?: string
  confirmOverwrite: (name: string, target: string) => Promise<boolean>
  notify: Parameters<typeof createTransferWorkspace>[0]['notify']
}

// Wires the Node-backed reader and PowerShell runner from the settings file.
export const bootstrapWorkspace = async ({ settingsPath, confirmOverwrite, notify }: BootstrapOptions) => {
  const settings = await loadSettings(settingsPath)
  return createTransferWorkspace({
    reader: createNodeDirectoryReader(),
    runner: createPowerShellRunner({ executable: settings.shell }),
    showHidden: settings.showHidden,
    confirmOverwrite,
    notify,
  })
}
