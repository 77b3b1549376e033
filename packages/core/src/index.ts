/**
 * @offline-kb/core
 *
 * Framework-agnostic core library for the offline knowledge base.
 * Provides storage, knowledge entries and matching, decision history,
 * accounts, the admin audit trail, and export/import.
 */

export * from './common/index.js'
export * from './storage/index.js'
export * from './knowledge/index.js'
export * from './history/index.js'
export * from './accounts/index.js'
export * from './audit/index.js'
export * from './transfer/index.js'
export * from './services/index.js'
export * from './seed/index.js'
