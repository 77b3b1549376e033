/**
 * Zod schemas for decision records and their comments.
 */

import { z } from 'zod'
import { IdSchema, TimestampSchema, TagsSchema, requiredText } from '../common/index.js'

// --- Decision records ---

export const CreateDecisionRecordInputSchema = z.object({
  title: requiredText('Title'),
  background: z.string().default(''),
  steps: z.string().default(''),
  result: z.string().default(''),
  tags: TagsSchema.default([]),
})

export type CreateDecisionRecordInput = z.input<typeof CreateDecisionRecordInputSchema>

export const DecisionRecordPatchSchema = z
  .object({
    title: requiredText('Title').optional(),
    background: z.string().optional(),
    steps: z.string().optional(),
    result: z.string().optional(),
    tags: TagsSchema.optional(),
  })
  .strict()

export type DecisionRecordPatch = z.input<typeof DecisionRecordPatchSchema>

export const DecisionRecordSchema = z.object({
  id: IdSchema,
  title: z.string(),
  background: z.string(),
  steps: z.string(),
  result: z.string(),
  tags: z.array(z.string()),
  createdAt: TimestampSchema,
})

export type DecisionRecord = z.infer<typeof DecisionRecordSchema>

// --- Comments ---

export const MIN_RATING = 1
export const MAX_RATING = 5

export const RatingSchema = z
  .number()
  .int('Rating must be a whole number')
  .min(MIN_RATING, `Rating must be between ${MIN_RATING} and ${MAX_RATING}`)
  .max(MAX_RATING, `Rating must be between ${MIN_RATING} and ${MAX_RATING}`)

export const CreateCommentInputSchema = z.object({
  /** Any integer; an unknown id is reported as NOT_FOUND by the repository. */
  decisionRecordId: z.number().int(),
  author: z.string().trim().default(''),
  body: requiredText('Comment body'),
  rating: RatingSchema,
})

export type CreateCommentInput = z.input<typeof CreateCommentInputSchema>

export const CommentSchema = z.object({
  id: IdSchema,
  decisionRecordId: IdSchema,
  author: z.string(),
  body: z.string(),
  rating: RatingSchema,
  createdAt: TimestampSchema,
})

export type Comment = z.infer<typeof CommentSchema>

// --- Read models ---

export interface CommentSummary {
  count: number
  /** Null when the record has no comments. */
  averageRating: number | null
}

export interface DecisionRecordListItem extends DecisionRecord {
  comments: CommentSummary
}

export interface DecisionRecordDetail extends DecisionRecord {
  comments: Comment[]
}

export interface DecisionSearchHit {
  record: DecisionRecord
  /** Number of fields containing the keyword; tags count as one field. */
  score: number
  matchedFields: DecisionField[]
}

export const DECISION_FIELDS = ['title', 'background', 'steps', 'result', 'tags'] as const
export type DecisionField = (typeof DECISION_FIELDS)[number]
