import { DECISION_FIELDS } from './schemas.js'
import type { DecisionField, DecisionRecord } from './schemas.js'

/** Fields of `record` containing `needle`, which must already be lowercase. */
export function matchFields(record: DecisionRecord, needle: string): DecisionField[] {
  return DECISION_FIELDS.filter((field) => {
    if (field === 'tags') return record.tags.some((tag) => tag.toLowerCase().includes(needle))
    return record[field].toLowerCase().includes(needle)
  })
}
