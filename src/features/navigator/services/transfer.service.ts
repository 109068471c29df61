import { NavigatorError, getErrorMessage } from '@/shared/lib/error'
import { quotePowerShell, type CommandRunner } from '@/shared/lib/shell'
import type { TransferMode } from '../model/types'

// Move-Item carries whole trees on its own; Copy-Item needs -Recurse for directories.
const CMDLETS: Record<TransferMode, string> = {
  copy: 'Copy-Item -Recurse',
  move: 'Move-Item',
}

export const buildTransferCommand = (mode: TransferMode, source: string, target: string) =>
  [
    `$source = ${quotePowerShell(source)}`,
    `$dest = ${quotePowerShell(target)}`,
    `${CMDLETS[mode]} -LiteralPath $source -Destination $dest -Force`,
  ].join('\n')

/**
 * Runs one copy or move through the command runner. Any stderr output counts as
 * failure, whatever the exit code.
 */
export const runTransfer = async (
  runner: CommandRunner,
  mode: TransferMode,
  source: string,
  target: string,
): Promise<void> => {
  let stderr: string
  try {
    const output = await runner.run(buildTransferCommand(mode, source, target))
    stderr = output.stderr
  } catch (err) {
    throw new NavigatorError('CommandFailed', getErrorMessage(err))
  }
  if (stderr.length > 0) {
    throw new NavigatorError('CommandFailed', stderr.trim() || 'Command failed')
  }
}
