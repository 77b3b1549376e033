/**
 * Zod schemas for the admin audit trail.
 */

import { z } from 'zod'
import { IdSchema, TimestampSchema } from '../common/index.js'

export const AdminActionSchema = z.enum([
  'create_admin',
  'promote',
  'demote',
  'activate',
  'deactivate',
  'reset_password',
])
export type AdminAction = z.infer<typeof AdminActionSchema>

export const AppendAdminEventInputSchema = z.object({
  actorUsername: z.string().min(1, 'Actor is required'),
  action: AdminActionSchema,
  targetUsername: z.string().min(1, 'Target is required'),
  details: z.string().nullable().default(null),
})

export type AppendAdminEventInput = z.input<typeof AppendAdminEventInputSchema>

export const AdminEventSchema = z.object({
  id: IdSchema,
  actorUsername: z.string(),
  action: AdminActionSchema,
  targetUsername: z.string(),
  details: z.string().nullable(),
  createdAt: TimestampSchema,
})

export type AdminEvent = z.infer<typeof AdminEventSchema>
