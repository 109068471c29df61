import { derived, get, writable } from 'svelte/store'
import { toListingError } from '@/shared/lib/error'
import type { Row } from '../model/types'
import { listDirectory, type DirectoryReader } from '../services/listing.service'
import { samePath } from '../utils'
import { entryRows, errorRow, parentRow } from './rows'

type NavigatorCallbacks = {
  onRowsChanged?: (rows: Row[]) => void
  onCurrentChange?: (path: string) => void
}

export type NavigatorDeps = {
  reader: DirectoryReader
  showHidden?: boolean
  callbacks?: NavigatorCallbacks
}

/**
 * State for one pane: the displayed directory, its back history and the
 * listing rows. Each pane constructs its own navigator; nothing is shared.
 */
export const createNavigator = ({ reader, showHidden: showHiddenInit = false, callbacks = {} }: NavigatorDeps) => {
  const current = writable<string | null>(null)
  const history = writable<string[]>([])
  const showHidden = writable(showHiddenInit)
  const rows = writable<Row[]>([])
  const error = writable('')
  const loading = writable(false)
  const populated = writable<Set<string>>(new Set())

  const root = derived(history, ($history) => $history[0] ?? null)
  const canGoBack = derived(history, ($history) => $history.length > 1)

  // Latest listing wins if an earlier one resolves late.
  let listToken = 0
  // Bumped by every navigation; a forward step still checking its target drops out if it changed.
  let navToken = 0

  const render = async (path: string) => {
    const token = ++listToken
    const lead = samePath(path, get(root)) ? [] : [parentRow(path)]
    loading.set(true)
    error.set('')
    try {
      const entries = await listDirectory(reader, path, { showHidden: get(showHidden) })
      if (token !== listToken) return
      const next = [...lead, ...entryRows(entries)]
      rows.set(next)
      populated.update((set) => new Set(set).add(path))
      callbacks.onRowsChanged?.(next)
    } catch (err) {
      if (token !== listToken) return
      const failure = toListingError(err, path)
      console.warn(`Listing ${path} failed:`, failure.message)
      error.set(failure.message)
      const next = [...lead, errorRow(failure)]
      rows.set(next)
      callbacks.onRowsChanged?.(next)
    } finally {
      if (token === listToken) {
        loading.set(false)
      }
    }
  }

  const setCurrent = (path: string) => {
    current.set(path)
    callbacks.onCurrentChange?.(path)
  }

  const populateRoot = async (path: string) => {
    navToken++
    history.set([path])
    populated.set(new Set())
    rows.set([])
    setCurrent(path)
    await render(path)
  }

  const navigateToDirectory = async (path: string) => {
    const token = ++navToken
    if (!(await reader.isDirectory(path))) return
    if (token !== navToken) return
    const list = get(history)
    if (list.length === 0) {
      await populateRoot(path)
      return
    }
    if (!samePath(list[list.length - 1] ?? null, path)) {
      history.set([...list, path])
    }
    setCurrent(path)
    await render(path)
  }

  const navigateBack = async () => {
    const list = get(history)
    if (list.length <= 1) return
    navToken++
    const next = list.slice(0, -1)
    const previous = next[next.length - 1]
    if (previous === undefined) return
    history.set(next)
    setCurrent(previous)
    await render(previous)
  }

  const refresh = async () => {
    const where = get(current)
    if (where === null) return
    await render(where)
  }

  const setShowHidden = async (value: boolean) => {
    if (get(showHidden) === value) return
    showHidden.set(value)
    await refresh()
  }

  const activate = async (row: Row) => {
    if (row.type === 'parent') {
      await navigateBack()
      return
    }
    if (row.type === 'entry' && row.entry.kind === 'dir') {
      await navigateToDirectory(row.entry.path)
    }
  }

  return {
    current,
    history,
    showHidden,
    rows,
    error,
    loading,
    populated,
    root,
    canGoBack,
    populateRoot,
    navigateToDirectory,
    navigateBack,
    refresh,
    setShowHidden,
    activate,
  }
}

export type Navigator = ReturnType<typeof createNavigator>
