import type { NavigatorError } from '@/shared/lib/error'

export type EntryKind = 'dir' | 'file'

export type DirectoryEntry = {
  name: string
  path: string
  kind: EntryKind
}

export type RawDirent = {
  name: string
  isDirectory: boolean
}

export type PlaceholderKind = 'empty' | 'access-denied' | 'error'

export type Row =
  | { type: 'entry'; entry: DirectoryEntry; index: number }
  | { type: 'parent'; label: '..'; path: string }
  | { type: 'placeholder'; kind: PlaceholderKind; label: string; path: null }

export type RowStripe = 'even' | 'odd'

export type PaneId = 'source' | 'destination'

export type Drive = {
  label: string
  path: string
}

export type TransferMode = 'copy' | 'move'

export type TransferResult =
  | { status: 'done'; mode: TransferMode; source: string; target: string }
  | { status: 'cancelled'; mode: TransferMode; source: string; target: string }
  | { status: 'failed'; mode: TransferMode; error: NavigatorError }
