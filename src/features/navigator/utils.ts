export const normalizePath = (p: string) => {
  if (!p) return ''
  const withSlashes = p.replace(/\\/g, '/')
  const trimmed = withSlashes.replace(/\/+$/, '')
  if (trimmed === '') return withSlashes.startsWith('/') ? '/' : ''
  if (/^[A-Za-z]:$/.test(trimmed)) return `${trimmed}/`
  return trimmed
}

export const samePath = (a: string | null, b: string | null) => {
  if (a === null || b === null) return false
  return normalizePath(a) === normalizePath(b)
}

export const parentPath = (path: string) => {
  const normalized = normalizePath(path)
  if (!normalized || normalized === '/') return '/'
  const driveRoot = normalized.match(/^([A-Za-z]:)\/?$/)
  if (driveRoot) return `${driveRoot[1]}/`
  const drivePrefix = normalized.match(/^([A-Za-z]:)\//)
  const idx = normalized.lastIndexOf('/')
  if (idx <= 0) {
    return drivePrefix ? `${drivePrefix[1]}/` : '/'
  }
  if (drivePrefix && idx === (drivePrefix[1] ?? '').length) {
    return `${drivePrefix[1]}/`
  }
  return normalized.slice(0, idx)
}

const usesBackslashes = (path: string) => path.includes('\\') && !path.includes('/')

// parentPath in the separator style of `path`.
export const dirName = (path: string) => {
  const parent = parentPath(path)
  return usesBackslashes(path) ? parent.replace(/\//g, '\\') : parent
}

export const baseName = (path: string) => {
  const normalized = normalizePath(path)
  const idx = normalized.lastIndexOf('/')
  return idx >= 0 ? normalized.slice(idx + 1) : normalized
}

// Keeps the separator style of `dir` so Windows paths stay backslashed.
export const joinPath = (dir: string, name: string) => {
  const sep = usesBackslashes(dir) ? '\\' : '/'
  return `${dir.replace(/[\\/]+$/, '')}${sep}${name}`
}

export const isHiddenName = (name: string) => name.startsWith('.')
