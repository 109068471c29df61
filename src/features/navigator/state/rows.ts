import type { NavigatorError } from '@/shared/lib/error'
import type { DirectoryEntry, Row, RowStripe } from '../model/types'
import { dirName } from '../utils'

export const EMPTY_LABEL = '(Empty)'
export const ACCESS_DENIED_LABEL = 'Access Denied'

export const rowStripe = (index: number): RowStripe => (index % 2 === 0 ? 'even' : 'odd')

export const parentRow = (path: string): Row => ({ type: 'parent', label: '..', path: dirName(path) })

export const emptyRow = (): Row => ({ type: 'placeholder', kind: 'empty', label: EMPTY_LABEL, path: null })

export const errorRow = (error: NavigatorError): Row =>
  error.code === 'PermissionDenied'
    ? { type: 'placeholder', kind: 'access-denied', label: ACCESS_DENIED_LABEL, path: null }
    : { type: 'placeholder', kind: 'error', label: `Error: ${error.message}`, path: null }

export const entryRows = (entries: DirectoryEntry[]): Row[] =>
  entries.length === 0 ? [emptyRow()] : entries.map((entry, index): Row => ({ type: 'entry', entry, index }))

export const rowLabel = (row: Row) => (row.type === 'entry' ? row.entry.name : row.label)

export const rowPath = (row: Row): string | null => (row.type === 'entry' ? row.entry.path : row.path)
