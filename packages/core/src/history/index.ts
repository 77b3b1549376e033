/**
 * Decision history: decision records, comments, keyword search.
 */

export { DecisionRecordRepository } from './repository.js'
export type { SearchOptions } from './repository.js'
export { CommentRepository } from './comment-repository.js'
export { matchFields } from './search.js'
export {
  CreateDecisionRecordInputSchema,
  DecisionRecordPatchSchema,
  DecisionRecordSchema,
  CreateCommentInputSchema,
  CommentSchema,
  RatingSchema,
  MIN_RATING,
  MAX_RATING,
  DECISION_FIELDS,
} from './schemas.js'
export type {
  DecisionRecord,
  DecisionRecordPatch,
  CreateDecisionRecordInput,
  DecisionRecordListItem,
  DecisionRecordDetail,
  DecisionSearchHit,
  DecisionField,
  Comment,
  CreateCommentInput,
  CommentSummary,
} from './schemas.js'
