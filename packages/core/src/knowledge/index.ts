/**
 * Knowledge: question/answer entries, keyword matching and blueprint import.
 */

export { KnowledgeRepository } from './repository.js'
export { KnowledgeMatcher, DEFAULT_ASK_LIMIT, entryTokens } from './matcher.js'
export type { KnowledgeMatch, AskOptions } from './matcher.js'
export { tokenize } from './tokenizer.js'
export {
  BLUEPRINT_TEMPLATE,
  BLUEPRINT_TYPE,
  BlueprintMetadataSchema,
  looksLikeBlueprint,
  parseBlueprint,
  importBlueprint,
} from './blueprint.js'
export type { BlueprintDocument, BlueprintEntry, BlueprintMetadata } from './blueprint.js'
export { CreateKnowledgeInputSchema, KnowledgePatchSchema, KnowledgeEntrySchema } from './schemas.js'
export type { KnowledgeEntry, CreateKnowledgeInput, KnowledgePatch } from './schemas.js'
