export type NavigatorErrorCode =
  | 'PermissionDenied'
  | 'ListingFailed'
  | 'CommandFailed'
  | 'NoSelection'
  | 'NoDestination'

export class NavigatorError extends Error {
  readonly code: NavigatorErrorCode

  constructor(code: NavigatorErrorCode, message: string) {
    super(message)
    this.name = 'NavigatorError'
    this.code = code
  }
}

export type NormalizedError = Error & { code?: string }

const stringify = (value: unknown) => {
  if (typeof value === 'string') return value
  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    return String(value)
  }
}

// Rejections from fs and child_process are Errors with a string `code`; anything else is wrapped.
export const normalizeError = (value: unknown): NormalizedError => {
  if (value instanceof Error) return value
  const record = value !== null && typeof value === 'object' ? new Map(Object.entries(value)) : null
  const message = record?.get('message')
  const code = record?.get('code')
  const error: NormalizedError = new Error((typeof message === 'string' ? message : stringify(value)) || 'Unknown error')
  if (typeof code === 'string') error.code = code
  return error
}

export const getErrorMessage = (value: unknown) => normalizeError(value).message

export const getErrorCode = (value: unknown) => {
  const { code } = normalizeError(value)
  return typeof code === 'string' ? code : undefined
}

const PERMISSION_CODES = new Set(['EACCES', 'EPERM', 'PermissionDenied'])

export const isPermissionError = (value: unknown) => {
  const code = getErrorCode(value)
  return code !== undefined && PERMISSION_CODES.has(code)
}

// Classifies a raw listing failure into the navigator taxonomy.
export const toListingError = (value: unknown, path: string): NavigatorError => {
  if (value instanceof NavigatorError) return value
  if (isPermissionError(value)) {
    return new NavigatorError('PermissionDenied', `Access denied: ${path}`)
  }
  return new NavigatorError('ListingFailed', getErrorMessage(value))
}
