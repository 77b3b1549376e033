/**
 * Interchange document for export/import.
 * Bump EXPORT_VERSION and add an upgrade step in import.ts when the shape changes.
 */

import { z } from 'zod'
import { TagsSchema, TimestampSchema, requiredText } from '../common/index.js'
import { isStoredPasswordHash } from '../accounts/password.js'
import { UsernameSchema } from '../accounts/schemas.js'
import { AdminActionSchema } from '../audit/schemas.js'
import { RatingSchema } from '../history/schemas.js'

export const EXPORT_FORMAT = 'offline-kb'
export const EXPORT_VERSION = 1

const ExportedKnowledgeSchema = z.object({
  id: z.number().int(),
  title: requiredText('Title'),
  question: requiredText('Question'),
  answer: z.string(),
  tags: TagsSchema,
  createdAt: TimestampSchema,
})

const ExportedCommentSchema = z.object({
  id: z.number().int(),
  author: z.string(),
  body: requiredText('Comment body'),
  rating: RatingSchema,
  createdAt: TimestampSchema,
})

const ExportedDecisionSchema = z.object({
  id: z.number().int(),
  title: requiredText('Title'),
  background: z.string(),
  steps: z.string(),
  result: z.string(),
  tags: TagsSchema,
  createdAt: TimestampSchema,
  comments: z.array(ExportedCommentSchema),
})

const ExportedUserSchema = z.object({
  username: UsernameSchema,
  /** Absent when the export excluded password hashes. */
  passwordHash: z.string().refine(isStoredPasswordHash, 'Unrecognised password hash format').optional(),
  isAdmin: z.boolean(),
  isActive: z.boolean(),
  createdAt: TimestampSchema,
})

const ExportedAdminEventSchema = z.object({
  actorUsername: z.string(),
  action: AdminActionSchema,
  targetUsername: z.string(),
  details: z.string().nullable(),
  createdAt: TimestampSchema,
})

export const ExportDocumentSchema = z.object({
  format: z.literal(EXPORT_FORMAT),
  version: z.literal(EXPORT_VERSION),
  exportedAt: TimestampSchema,
  knowledge: z.array(ExportedKnowledgeSchema),
  decisions: z.array(ExportedDecisionSchema),
  users: z.array(ExportedUserSchema),
  adminEvents: z.array(ExportedAdminEventSchema).default([]),
})

export type ExportDocument = z.infer<typeof ExportDocumentSchema>
export type ExportedUser = z.infer<typeof ExportedUserSchema>

export const ImportModeSchema = z.enum(['merge', 'replace'])
export type ImportMode = z.infer<typeof ImportModeSchema>

export interface ImportReport {
  mode: ImportMode
  knowledge: number
  decisions: number
  comments: number
  users: number
  /** Usernames already present in merge mode; the local account was kept. */
  skippedUsers: string[]
  /** Users imported inactive because the document carried no usable password hash. */
  usersNeedingReset: string[]
}
