/**
 * Transfer: JSON export and import of the whole store.
 */

export { exportData } from './export.js'
export type { ExportOptions } from './export.js'
export { importData, parseExportDocument } from './import.js'
export type { ImportOptions } from './import.js'
export {
  ExportDocumentSchema,
  ImportModeSchema,
  EXPORT_FORMAT,
  EXPORT_VERSION,
} from './schemas.js'
export type { ExportDocument, ExportedUser, ImportMode, ImportReport } from './schemas.js'
