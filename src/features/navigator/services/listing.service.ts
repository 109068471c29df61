import { readdir, stat } from 'node:fs/promises'
import type { DirectoryEntry, RawDirent } from '../model/types'
import { isHiddenName, joinPath } from '../utils'

export interface DirectoryReader {
  readDir(path: string): Promise<RawDirent[]>
  isDirectory(path: string): Promise<boolean>
  exists(path: string): Promise<boolean>
}

const statOrNull = async (path: string) => {
  try {
    return await stat(path)
  } catch {
    return null
  }
}

export const createNodeDirectoryReader = (): DirectoryReader => ({
  async readDir(path) {
    const dirents = await readdir(path, { withFileTypes: true })
    const out: RawDirent[] = []
    for (const dirent of dirents) {
      let isDirectory = dirent.isDirectory()
      if (dirent.isSymbolicLink()) {
        const target = await statOrNull(joinPath(path, dirent.name))
        isDirectory = target?.isDirectory() ?? false
      }
      out.push({ name: dirent.name, isDirectory })
    }
    return out
  },
  async isDirectory(path) {
    const info = await statOrNull(path)
    return info?.isDirectory() ?? false
  },
  async exists(path) {
    return (await statOrNull(path)) !== null
  },
})

export const compareEntries = (a: DirectoryEntry, b: DirectoryEntry) => {
  if (a.kind !== b.kind) return a.kind === 'dir' ? -1 : 1
  const left = a.name.toLowerCase()
  const right = b.name.toLowerCase()
  if (left < right) return -1
  if (left > right) return 1
  return 0
}

export const listDirectory = async (
  reader: DirectoryReader,
  path: string,
  opts: { showHidden: boolean },
): Promise<DirectoryEntry[]> => {
  const raw = await reader.readDir(path)
  const entries: DirectoryEntry[] = []
  for (const item of raw) {
    if (!opts.showHidden && isHiddenName(item.name)) continue
    entries.push({
      name: item.name,
      path: joinPath(path, item.name),
      kind: item.isDirectory ? 'dir' : 'file',
    })
  }
  return entries.sort(compareEntries)
}
