/**
 * Typed error class for knowledge base operations.
 */

import type { ZodError } from 'zod'

export type ErrorCode =
  | 'DB_ERROR'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'CONFLICT'
  | 'PERMISSION_DENIED'
  | 'AUTH_FAILED'
  | 'IMPORT_ERROR'
  | 'IO_ERROR'

export class KnowledgeBaseError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string) {
    super(message)
    this.name = 'KnowledgeBaseError'
    this.code = code
  }

  static notFound(entity: string, id: string | number): KnowledgeBaseError {
    return new KnowledgeBaseError('NOT_FOUND', `${entity} not found: ${id}`)
  }

  static validation(message: string): KnowledgeBaseError {
    return new KnowledgeBaseError('VALIDATION_ERROR', message)
  }

  static conflict(message: string): KnowledgeBaseError {
    return new KnowledgeBaseError('CONFLICT', message)
  }

  static permission(message: string): KnowledgeBaseError {
    return new KnowledgeBaseError('PERMISSION_DENIED', message)
  }

  static auth(message: string): KnowledgeBaseError {
    return new KnowledgeBaseError('AUTH_FAILED', message)
  }

  static importFailed(message: string): KnowledgeBaseError {
    return new KnowledgeBaseError('IMPORT_ERROR', message)
  }

  static db(message: string): KnowledgeBaseError {
    return new KnowledgeBaseError('DB_ERROR', message)
  }

  static io(message: string): KnowledgeBaseError {
    return new KnowledgeBaseError('IO_ERROR', message)
  }

  /** Flattens zod issues into `path: message` pairs. */
  static fromZod(error: ZodError, code: ErrorCode = 'VALIDATION_ERROR'): KnowledgeBaseError {
    const message = error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ')
    return new KnowledgeBaseError(code, message)
  }

  /** Wraps an unexpected exception thrown by the driver. */
  static fromUnknown(e: unknown): KnowledgeBaseError {
    if (e instanceof KnowledgeBaseError) return e
    return KnowledgeBaseError.db(e instanceof Error ? e.message : String(e))
  }
}
