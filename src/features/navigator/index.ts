export type {
  DirectoryEntry,
  Drive,
  EntryKind,
  PaneId,
  PlaceholderKind,
  RawDirent,
  Row,
  RowStripe,
  TransferMode,
  TransferResult,
} from './model/types'
export { createNavigator, type Navigator, type NavigatorDeps } from './state/createNavigator'
export { rowLabel, rowPath, rowStripe } from './state/rows'
export { createTransfer, type Transfer } from './file-ops/createTransfer'
export { createTransferWorkspace, READY_STATUS, type TransferWorkspace } from './workspace/createTransferWorkspace'
export { bootstrapWorkspace } from './workspace/bootstrap'
export { createNodeDirectoryReader, listDirectory, type DirectoryReader } from './services/listing.service'
export { listDrives } from './services/drives.service'
export { buildTransferCommand } from './services/transfer.service'
export { defaultSettings, loadSettings, type NavigatorSettings } from './services/settings.service'
