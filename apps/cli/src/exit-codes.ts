import type { ErrorCode } from '@offline-kb/core'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

const EXIT_CODES: Record<ErrorCode, number> = {
  DB_ERROR: EXIT_FAILURE,
  IO_ERROR: EXIT_FAILURE,
  VALIDATION_ERROR: EXIT_USAGE,
  NOT_FOUND: 3,
  CONFLICT: 4,
  PERMISSION_DENIED: 5,
  AUTH_FAILED: 6,
  IMPORT_ERROR: 7,
}

export function exitCodeFor(code: ErrorCode): number {
  return EXIT_CODES[code]
}
