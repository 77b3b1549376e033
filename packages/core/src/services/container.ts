/**
 * Builds every service around one open connection. Construct once at
 * startup and pass the result to whatever front end drives it.
 */

import type Database from 'better-sqlite3'
import type { Result, KnowledgeBaseError } from '../common/index.js'
import { KnowledgeRepository } from '../knowledge/repository.js'
import { KnowledgeMatcher } from '../knowledge/matcher.js'
import { importBlueprint } from '../knowledge/blueprint.js'
import type { KnowledgeEntry } from '../knowledge/schemas.js'
import { DecisionRecordRepository } from '../history/repository.js'
import { CommentRepository } from '../history/comment-repository.js'
import { AccountService } from '../accounts/service.js'
import type { AccountServiceOptions } from '../accounts/service.js'
import { AdminEventRepository } from '../audit/repository.js'
import { buildSummary } from '../audit/summary.js'
import type { StoreSummary } from '../audit/summary.js'
import { exportData } from '../transfer/export.js'
import type { ExportOptions } from '../transfer/export.js'
import { importData } from '../transfer/import.js'
import type { ImportOptions } from '../transfer/import.js'
import type { ExportDocument, ImportReport } from '../transfer/schemas.js'

export type ServiceOptions = AccountServiceOptions

export interface Services {
  db: Database.Database
  knowledge: KnowledgeRepository
  matcher: KnowledgeMatcher
  decisions: DecisionRecordRepository
  comments: CommentRepository
  accounts: AccountService
  adminEvents: AdminEventRepository
  summary(): Result<StoreSummary, KnowledgeBaseError>
  exportData(options?: ExportOptions): Result<ExportDocument, KnowledgeBaseError>
  importData(document: unknown, options: ImportOptions): Result<ImportReport, KnowledgeBaseError>
  importBlueprint(text: string): Result<KnowledgeEntry[], KnowledgeBaseError>
}

export function createServices(db: Database.Database, options: ServiceOptions = {}): Services {
  const knowledge = new KnowledgeRepository(db)

  return {
    db,
    knowledge,
    matcher: new KnowledgeMatcher(knowledge),
    decisions: new DecisionRecordRepository(db),
    comments: new CommentRepository(db),
    accounts: new AccountService(db, options),
    adminEvents: new AdminEventRepository(db),
    summary: () => buildSummary(db),
    exportData: (exportOptions) => exportData(db, exportOptions),
    importData: (document, importOptions) => importData(db, document, importOptions),
    importBlueprint: (text) => importBlueprint(db, text),
  }
}
