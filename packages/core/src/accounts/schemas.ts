/**
 * Zod schemas for local user accounts.
 */

import { z } from 'zod'
import { IdSchema, TimestampSchema } from '../common/index.js'

export const UsernameSchema = z
  .string()
  .trim()
  .min(1, 'Username is required')
  .max(64, 'Username must be at most 64 characters')

export const PasswordSchema = z.string().min(1, 'Password is required')

export const RegisterInputSchema = z.object({
  username: UsernameSchema,
  password: PasswordSchema,
  isAdmin: z.boolean().default(false),
  actor: z.string().optional(),
})

export type RegisterInput = z.input<typeof RegisterInputSchema>

export const UserSchema = z.object({
  id: IdSchema,
  username: z.string(),
  isAdmin: z.boolean(),
  isActive: z.boolean(),
  createdAt: TimestampSchema,
})

export type User = z.infer<typeof UserSchema>
