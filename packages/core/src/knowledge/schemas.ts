/**
 * Zod schemas for knowledge entries.
 */

import { z } from 'zod'
import { IdSchema, TimestampSchema, TagsSchema, requiredText } from '../common/index.js'

export const CreateKnowledgeInputSchema = z.object({
  title: requiredText('Title'),
  question: requiredText('Question'),
  answer: z.string().default(''),
  tags: TagsSchema.default([]),
})

export type CreateKnowledgeInput = z.input<typeof CreateKnowledgeInputSchema>

export const KnowledgePatchSchema = z
  .object({
    title: requiredText('Title').optional(),
    question: requiredText('Question').optional(),
    answer: z.string().optional(),
    tags: TagsSchema.optional(),
  })
  .strict()

export type KnowledgePatch = z.input<typeof KnowledgePatchSchema>

export const KnowledgeEntrySchema = z.object({
  id: IdSchema,
  title: z.string(),
  question: z.string(),
  answer: z.string(),
  tags: z.array(z.string()),
  createdAt: TimestampSchema,
})

export type KnowledgeEntry = z.infer<typeof KnowledgeEntrySchema>
