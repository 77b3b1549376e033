/**
 * Common utilities: shared types, Result pattern, error handling.
 */

export { Ok, Err, unwrap, isOk, isErr } from './result.js'
export type { Result } from './result.js'

export { KnowledgeBaseError } from './errors.js'
export type { ErrorCode } from './errors.js'

export { IdSchema, TimestampSchema, TagSchema, TagsSchema, requiredText } from './schemas.js'
export { parseTags, serializeTags } from './tags.js'
