import { get, writable, type Writable } from 'svelte/store'
import { NavigatorError, getErrorMessage } from '@/shared/lib/error'
import type { CommandRunner } from '@/shared/lib/shell'
import { createTransfer } from '../file-ops/createTransfer'
import type { Drive, PaneId, Row, TransferMode, TransferResult } from '../model/types'
import { listDrives } from '../services/drives.service'
import type { DirectoryReader } from '../services/listing.service'
import { createNavigator, type Navigator } from '../state/createNavigator'
import { baseName } from '../utils'

export const READY_STATUS = 'Ready'

type Notifier = {
  warn: (title: string, message: string) => void
  error: (title: string, message: string) => void
}

type Deps = {
  reader: DirectoryReader
  runner: CommandRunner
  confirmOverwrite: (name: string, target: string) => Promise<boolean>
  notify: Notifier
  showHidden?: boolean
  loadDrives?: () => Promise<Drive[]>
}

type Pane = {
  navigator: Navigator
  drive: Writable<Drive | null>
  selected: Writable<string | null>
}

const STATUS_TEXT: Record<TransferMode, { done: string; failed: string; title: string }> = {
  copy: { done: 'File copied', failed: 'File copy failed', title: 'Copy Error' },
  move: { done: 'File moved', failed: 'File move failed', title: 'Move Error' },
}

export const createTransferWorkspace = (deps: Deps) => {
  const createPane = (): Pane => ({
    navigator: createNavigator({ reader: deps.reader, showHidden: deps.showHidden }),
    drive: writable<Drive | null>(null),
    selected: writable<string | null>(null),
  })

  const panes: Record<PaneId, Pane> = {
    source: createPane(),
    destination: createPane(),
  }
  const drives = writable<Drive[]>([])
  const status = writable(READY_STATUS)

  const transfer = createTransfer({
    runner: deps.runner,
    reader: deps.reader,
    sourcePane: panes.source.navigator,
    destinationPane: panes.destination.navigator,
    confirmOverwrite: deps.confirmOverwrite,
  })

  const selectDrive = async (pane: PaneId, drive: Drive) => {
    const target = panes[pane]
    target.drive.set(drive)
    target.selected.set(null)
    await target.navigator.populateRoot(drive.path)
  }

  const open = async () => {
    let available: Drive[]
    try {
      available = await (deps.loadDrives ?? (() => listDrives(deps.reader)))()
    } catch (err) {
      console.error('Failed to list drives:', err)
      deps.notify.error('Error', getErrorMessage(err))
      return
    }
    drives.set(available)
    const first = available[0]
    if (!first) return
    if (get(panes.source.drive) === null) {
      await selectDrive('source', first)
    }
    if (get(panes.destination.drive) === null) {
      await selectDrive('destination', available[1] ?? first)
    }
  }

  const select = (pane: PaneId, path: string | null) => {
    panes[pane].selected.set(path)
  }

  const activate = async (pane: PaneId, row: Row) => {
    panes[pane].selected.set(null)
    await panes[pane].navigator.activate(row)
  }

  const reportFailure = (mode: TransferMode, error: NavigatorError) => {
    const text = STATUS_TEXT[mode]
    switch (error.code) {
      case 'NoSelection':
        deps.notify.warn('Selection Required', error.message)
        return
      case 'NoDestination':
        deps.notify.error('Error', error.message)
        return
      default:
        deps.notify.error(text.title, error.message)
        status.set(text.failed)
    }
  }

  const runSelected = async (mode: TransferMode): Promise<TransferResult> => {
    const source = get(panes.source.selected)
    if (!source) {
      const error = new NavigatorError('NoSelection', 'Please select a file to transfer')
      reportFailure(mode, error)
      return { status: 'failed', mode, error }
    }
    const destDir = get(panes.destination.navigator.current)
    if (!destDir) {
      const error = new NavigatorError('NoDestination', 'Please select a destination directory')
      reportFailure(mode, error)
      return { status: 'failed', mode, error }
    }

    const result = await transfer[mode](source, destDir)
    if (result.status === 'done') {
      status.set(`${STATUS_TEXT[mode].done}: ${baseName(source)}`)
      if (mode === 'move') {
        panes.source.selected.set(null)
      }
    } else if (result.status === 'failed') {
      reportFailure(mode, result.error)
    }
    return result
  }

  return {
    source: panes.source,
    destination: panes.destination,
    drives,
    status,
    open,
    selectDrive,
    select,
    activate,
    copySelected: () => runSelected('copy'),
    moveSelected: () => runSelected('move'),
  }
}

export type TransferWorkspace = ReturnType<typeof createTransferWorkspace>
