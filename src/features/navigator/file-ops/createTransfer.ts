import { get } from 'svelte/store'
import { NavigatorError, getErrorMessage } from '@/shared/lib/error'
import type { CommandRunner } from '@/shared/lib/shell'
import type { TransferMode, TransferResult } from '../model/types'
import type { DirectoryReader } from '../services/listing.service'
import { runTransfer } from '../services/transfer.service'
import type { Navigator } from '../state/createNavigator'
import { baseName, dirName, joinPath, samePath } from '../utils'

type Deps = {
  runner: CommandRunner
  reader: Pick<DirectoryReader, 'exists'>
  sourcePane: Pick<Navigator, 'current' | 'refresh' | 'navigateToDirectory'>
  destinationPane: Pick<Navigator, 'refresh'>
  confirmOverwrite: (name: string, target: string) => Promise<boolean>
}

export const createTransfer = (deps: Deps) => {
  const relistSourceParent = async (source: string) => {
    const dir = dirName(source)
    if (samePath(get(deps.sourcePane.current), dir)) {
      await deps.sourcePane.refresh()
    } else {
      await deps.sourcePane.navigateToDirectory(dir)
    }
  }

  const transfer = async (mode: TransferMode, source: string, destDir: string): Promise<TransferResult> => {
    const name = baseName(source)
    const target = joinPath(destDir, name)

    try {
      if (await deps.reader.exists(target)) {
        const confirmed = await deps.confirmOverwrite(name, target)
        if (!confirmed) {
          return { status: 'cancelled', mode, source, target }
        }
      }
      await runTransfer(deps.runner, mode, source, target)
    } catch (err) {
      const error =
        err instanceof NavigatorError ? err : new NavigatorError('CommandFailed', getErrorMessage(err))
      console.error(`${mode} ${source} -> ${target} failed:`, error.message)
      return { status: 'failed', mode, error }
    }

    await deps.destinationPane.refresh()
    if (mode === 'move') {
      await relistSourceParent(source)
    }
    return { status: 'done', mode, source, target }
  }

  return {
    copy: (source: string, destDir: string) => transfer('copy', source, destDir),
    move: (source: string, destDir: string) => transfer('move', source, destDir),
  }
}

export type Transfer = ReturnType<typeof createTransfer>
