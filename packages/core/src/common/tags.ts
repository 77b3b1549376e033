/**
 * Tags are persisted as a JSON array in a TEXT column.
 */

export function serializeTags(tags: readonly string[]): string {
  return JSON.stringify(tags)
}

export function parseTags(raw: string | null, context: string): string[] {
  if (!raw) return []
  try {
    const value: unknown = JSON.parse(raw)
    if (Array.isArray(value)) return value.map((v) => String(v))
  } catch {
    // fall through to the warning below
  }
  console.warn(`[tags] ${context}: unreadable tags column, treating as empty`)
  return []
}
