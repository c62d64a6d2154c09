export type DownloadErrorType =
  | 'UNRESOLVED_REFERENCE'
  | 'ENUMERATION_FAILURE'
  | 'MANIFEST_UNAVAILABLE'
  | 'MISSING_CONTENT_LENGTH'
  | 'STREAM_IO_FAILURE'
  | 'TAG_WRITE_FAILURE'
  | 'CHANNEL_CLOSED'
  | 'REQUEST_FAILED'

export class DownloadError extends Error {
  readonly type: DownloadErrorType

  constructor(type: DownloadErrorType, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'DownloadError'
    this.type = type
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

// A DownloadError of the same type passes through unchanged.
export function asDownloadError(type: DownloadErrorType, context: string, error: unknown): DownloadError {
  if (error instanceof DownloadError && error.type === type) {
    return error
  }
  return new DownloadError(type, `${context}: ${errorMessage(error)}`, { cause: error })
}
