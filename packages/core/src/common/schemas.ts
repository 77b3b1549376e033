/**
 * Shared Zod schemas used across modules.
 */

import { z } from 'zod'

export const IdSchema = z.number().int().positive()

export const TimestampSchema = z.string().datetime()

export const TagSchema = z.string().trim().min(1, 'Tags cannot be empty')

/** Ordered tag set: trimmed, non-empty, first occurrence wins. */
export const TagsSchema = z.array(TagSchema).transform((tags) => [...new Set(tags)])

/** Text that must contain something other than whitespace. */
export function requiredText(field: string) {
  return z.string().refine((v) => v.trim().length > 0, `${field} is required`)
}
