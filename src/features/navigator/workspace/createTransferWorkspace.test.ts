import { get } from 'svelte/store'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { CommandOutput } from '@/shared/lib/shell'
import { createMemoryReader, dir } from '@/test/mocks/memoryReader'
import type { Drive, Row } from '../model/types'
import { buildTransferCommand } from '../services/transfer.service'
import { rowLabel } from '../state/rows'
import { createTransferWorkspace } from './createTransferWorkspace'

const labels = (rows: Row[]) => rows.map(rowLabel)

const DRIVES: Drive[] = [
  { label: 'A:', path: '/a' },
  { label: 'B:', path: '/b' },
]

const setup = (opts: { drives?: Drive[]; confirm?: boolean; onRun?: (command: string) => string } = {}) => {
  const reader = createMemoryReader({
    '/a': dir('notes.txt', 'Docs/'),
    '/a/Docs': dir('plan.md'),
    '/b': dir('notes.txt'),
  })
  const run = vi.fn(async (command: string): Promise<CommandOutput> => ({
    stdout: '',
    stderr: opts.onRun?.(command) ?? '',
    exitCode: 0,
  }))
  const notify = { warn: vi.fn(), error: vi.fn() }
  const confirmOverwrite = vi.fn(async () => opts.confirm ?? false)
  const workspace = createTransferWorkspace({
    reader,
    runner: { run },
    notify,
    confirmOverwrite,
    loadDrives: async () => opts.drives ?? DRIVES,
  })
  return { workspace, reader, run, notify, confirmOverwrite }
}

describe('createTransferWorkspace', () => {
  beforeEach(() => {
    vi.restoreAllMocks()
    vi.spyOn(console, 'error').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  it('roots the panes at the first two drives on open', async () => {
    const { workspace } = setup()

    await workspace.open()

    expect(get(workspace.drives)).toEqual(DRIVES)
    expect(get(workspace.source.navigator.current)).toBe('/a')
    expect(get(workspace.destination.navigator.current)).toBe('/b')
    expect(get(workspace.status)).toBe('Ready')
  })

  it('uses the only drive for both panes', async () => {
    const { workspace } = setup({ drives: [{ label: 'A:', path: '/a' }] })

    await workspace.open()

    expect(get(workspace.source.navigator.current)).toBe('/a')
    expect(get(workspace.destination.navigator.current)).toBe('/a')
  })

  it('keeps panes that already have a drive when reopened', async () => {
    const { workspace } = setup()
    await workspace.open()
    await workspace.source.navigator.navigateToDirectory('/a/Docs')

    await workspace.open()

    expect(get(workspace.source.navigator.history)).toEqual(['/a', '/a/Docs'])
  })

  it('warns when nothing is selected', async () => {
    const { workspace, run, notify } = setup()
    await workspace.open()

    const result = await workspace.copySelected()

    expect(result).toMatchObject({ status: 'failed', error: { code: 'NoSelection' } })
    expect(notify.warn).toHaveBeenCalledWith('Selection Required', 'Please select a file to transfer')
    expect(run).not.toHaveBeenCalled()
  })

  it('refuses to transfer before the destination pane has a directory', async () => {
    const { workspace, run, notify } = setup()
    workspace.select('source', '/a/notes.txt')

    const result = await workspace.moveSelected()

    expect(result).toMatchObject({ status: 'failed', error: { code: 'NoDestination' } })
    expect(notify.error).toHaveBeenCalledWith('Error', 'Please select a destination directory')
    expect(run).not.toHaveBeenCalled()
  })

  it('leaves both panes alone when an overwrite is declined', async () => {
    const { workspace, run, confirmOverwrite } = setup({ confirm: false })
    await workspace.open()
    const sourceRows = get(workspace.source.navigator.rows)
    const destinationRows = get(workspace.destination.navigator.rows)
    workspace.select('source', '/a/notes.txt')

    const result = await workspace.copySelected()

    expect(result.status).toBe('cancelled')
    expect(confirmOverwrite).toHaveBeenCalledWith('notes.txt', '/b/notes.txt')
    expect(run).not.toHaveBeenCalled()
    expect(get(workspace.source.navigator.rows)).toBe(sourceRows)
    expect(get(workspace.destination.navigator.rows)).toBe(destinationRows)
    expect(get(workspace.status)).toBe('Ready')
  })

  it('copies the selection and shows it in the destination pane', async () => {
    const { workspace, reader, run } = setup({
      onRun: () => {
        reader.tree['/b'] = dir('notes.txt', 'plan.md')
        return ''
      },
    })
    await workspace.open()
    const docs = get(workspace.source.navigator.rows)[0]
    if (!docs) throw new Error('expected the Docs row')
    await workspace.activate('source', docs)
    workspace.select('source', '/a/Docs/plan.md')

    const result = await workspace.copySelected()

    expect(result).toEqual({ status: 'done', mode: 'copy', source: '/a/Docs/plan.md', target: '/b/plan.md' })
    expect(run).toHaveBeenCalledWith(buildTransferCommand('copy', '/a/Docs/plan.md', '/b/plan.md'))
    expect(labels(get(workspace.destination.navigator.rows))).toEqual(['notes.txt', 'plan.md'])
    expect(get(workspace.status)).toBe('File copied: plan.md')
  })

  it('moves the selection and re-lists both panes', async () => {
    const { workspace, reader } = setup({
      confirm: true,
      onRun: () => {
        reader.tree['/a'] = dir('Docs/')
        return ''
      },
    })
    await workspace.open()
    workspace.select('source', '/a/notes.txt')

    const result = await workspace.moveSelected()

    expect(result.status).toBe('done')
    expect(labels(get(workspace.source.navigator.rows))).toEqual(['Docs'])
    expect(get(workspace.source.selected)).toBeNull()
    expect(get(workspace.status)).toBe('File moved: notes.txt')
  })

  it('reports a failed command and keeps the selection', async () => {
    const { workspace, notify } = setup({ onRun: () => 'The process cannot access the file.' })
    await workspace.open()
    workspace.select('source', '/a/Docs')

    const result = await workspace.copySelected()

    expect(result.status).toBe('failed')
    expect(notify.error).toHaveBeenCalledWith('Copy Error', 'The process cannot access the file.')
    expect(get(workspace.status)).toBe('File copy failed')
    expect(get(workspace.source.selected)).toBe('/a/Docs')
    expect(get(workspace.source.navigator.current)).toBe('/a')
    expect(get(workspace.destination.navigator.current)).toBe('/b')
  })

  it('clears the selection when the drive changes', async () => {
    const { workspace } = setup()
    await workspace.open()
    workspace.select('destination', '/b/notes.txt')

    await workspace.selectDrive('destination', { label: 'A:', path: '/a' })

    expect(get(workspace.destination.selected)).toBeNull()
    expect(get(workspace.destination.navigator.history)).toEqual(['/a'])
  })

  it('reports drive discovery failures', async () => {
    const notify = { warn: vi.fn(), error: vi.fn() }
    const workspace = createTransferWorkspace({
      reader: createMemoryReader({}),
      runner: { run: vi.fn() },
      notify,
      confirmOverwrite: vi.fn(async () => false),
      loadDrives: async () => {
        throw new Error('volume query failed')
      },
    })

    await workspace.open()

    expect(notify.error).toHaveBeenCalledWith('Error', 'volume query failed')
    expect(get(workspace.source.navigator.current)).toBeNull()
  })
})
