import type { Drive } from '../model/types'
import type { DirectoryReader } from './listing.service'

const DRIVE_LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ'

export const listDrives = async (
  reader: Pick<DirectoryReader, 'exists'>,
  platform: NodeJS.Platform = process.platform,
): Promise<Drive[]> => {
  if (platform !== 'win32') {
    return [{ label: '/', path: '/' }]
  }
  const drives: Drive[] = []
  for (const letter of DRIVE_LETTERS) {
    const root = `${letter}:\\`
    try {
      if (await reader.exists(root)) {
        drives.push({ label: `${letter}:`, path: root })
      }
    } catch (err) {
      console.warn(`Skipping drive ${letter}:`, err)
    }
  }
  return drives
}
