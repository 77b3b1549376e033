/**
 * Answers a free-text question with the knowledge entries that share the
 * most tokens with it. Plain overlap count, no weighting or stemming.
 */

import { Ok } from '../common/index.js'
import type { Result, KnowledgeBaseError } from '../common/index.js'
import type { KnowledgeRepository } from './repository.js'
import type { KnowledgeEntry } from './schemas.js'
import { tokenize } from './tokenizer.js'

export const DEFAULT_ASK_LIMIT = 3

export interface KnowledgeMatch {
  entry: KnowledgeEntry
  score: number
  /** Shared tokens, in the order they appear in the question. */
  matchedTokens: string[]
}

export interface AskOptions {
  limit?: number
}

export function entryTokens(entry: KnowledgeEntry): Set<string> {
  return new Set(tokenize([entry.title, entry.question, ...entry.tags].join(' ')))
}

export class KnowledgeMatcher {
  constructor(private knowledge: KnowledgeRepository) {}

  ask(question: string, options: AskOptions = {}): Result<KnowledgeMatch[], KnowledgeBaseError> {
    const limit = options.limit ?? DEFAULT_ASK_LIMIT
    const queryTokens = tokenize(question)
    if (queryTokens.length === 0 || limit <= 0) return Ok([])

    const entries = this.knowledge.list()
    if (!entries.ok) return entries

    const matches: KnowledgeMatch[] = []
    for (const entry of entries.value) {
      const tokens = entryTokens(entry)
      const matchedTokens = queryTokens.filter((t) => tokens.has(t))
      if (matchedTokens.length > 0) {
        matches.push({ entry, score: matchedTokens.length, matchedTokens })
      }
    }

    matches.sort((a, b) => b.score - a.score || a.entry.id - b.entry.id)
    return Ok(matches.slice(0, limit))
  }
}
