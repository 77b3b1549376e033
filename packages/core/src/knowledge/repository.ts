/**
 * Knowledge repository: question/answer entries with ordered tags.
 */

import type Database from 'better-sqlite3'
import { Ok, Err, KnowledgeBaseError, parseTags, serializeTags } from '../common/index.js'
import type { Result } from '../common/index.js'
import { CreateKnowledgeInputSchema, KnowledgePatchSchema } from './schemas.js'
import type { KnowledgeEntry, CreateKnowledgeInput, KnowledgePatch } from './schemas.js'

interface KnowledgeRow {
  id: number
  title: string
  question: string
  answer: string
  tags: string
  created_at: string
}

const KNOWLEDGE_COLUMNS = 'id, title, question, answer, tags, created_at'

function rowToEntry(row: KnowledgeRow): KnowledgeEntry {
  return {
    id: row.id,
    title: row.title,
    question: row.question,
    answer: row.answer,
    tags: parseTags(row.tags, `knowledge entry ${row.id}`),
    createdAt: row.created_at,
  }
}

export class KnowledgeRepository {
  constructor(private db: Database.Database) {}

  create(input: CreateKnowledgeInput): Result<KnowledgeEntry, KnowledgeBaseError> {
    const parsed = CreateKnowledgeInputSchema.safeParse(input)
    if (!parsed.success) {
      return Err(KnowledgeBaseError.fromZod(parsed.error))
    }

    const now = new Date().toISOString()

    try {
      const info = this.db
        .prepare('INSERT INTO knowledge_entries (title, question, answer, tags, created_at) VALUES (?, ?, ?, ?, ?)')
        .run(parsed.data.title, parsed.data.question, parsed.data.answer, serializeTags(parsed.data.tags), now)

      return Ok({
        id: Number(info.lastInsertRowid),
        title: parsed.data.title,
        question: parsed.data.question,
        answer: parsed.data.answer,
        tags: parsed.data.tags,
        createdAt: now,
      })
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }

  getById(id: number): Result<KnowledgeEntry, KnowledgeBaseError> {
    try {
      const row = this.db
        .prepare(`SELECT ${KNOWLEDGE_COLUMNS} FROM knowledge_entries WHERE id = ?`)
        .get(id) as KnowledgeRow | undefined

      if (!row) return Err(KnowledgeBaseError.notFound('Knowledge entry', id))
      return Ok(rowToEntry(row))
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }

  list(): Result<KnowledgeEntry[], KnowledgeBaseError> {
    try {
      const rows = this.db
        .prepare(`SELECT ${KNOWLEDGE_COLUMNS} FROM knowledge_entries ORDER BY created_at ASC, id ASC`)
        .all() as KnowledgeRow[]
      return Ok(rows.map(rowToEntry))
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }

  /**
   * Applies only the keys present in the patch. `tags` replaces the whole
   * list; an empty array clears it.
   */
  update(id: number, patch: KnowledgePatch): Result<KnowledgeEntry, KnowledgeBaseError> {
    const parsed = KnowledgePatchSchema.safeParse(patch)
    if (!parsed.success) {
      return Err(KnowledgeBaseError.fromZod(parsed.error))
    }

    const existing = this.getById(id)
    if (!existing.ok) return existing

    const updated: KnowledgeEntry = { ...existing.value }
    if (parsed.data.title !== undefined) updated.title = parsed.data.title
    if (parsed.data.question !== undefined) updated.question = parsed.data.question
    if (parsed.data.answer !== undefined) updated.answer = parsed.data.answer
    if (parsed.data.tags !== undefined) updated.tags = parsed.data.tags

    try {
      this.db
        .prepare('UPDATE knowledge_entries SET title = ?, question = ?, answer = ?, tags = ? WHERE id = ?')
        .run(updated.title, updated.question, updated.answer, serializeTags(updated.tags), id)

      return Ok(updated)
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }

  delete(id: number): Result<void, KnowledgeBaseError> {
    try {
      const info = this.db.prepare('DELETE FROM knowledge_entries WHERE id = ?').run(id)
      if (info.changes === 0) return Err(KnowledgeBaseError.notFound('Knowledge entry', id))
      return Ok(undefined)
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }
}
