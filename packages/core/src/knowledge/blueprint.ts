/**
 * Knowledge blueprints: one markdown document describing a process, with a
 * fenced JSON metadata block and a fixed set of `##` sections. Parsing turns
 * each recognised section into one knowledge entry, and each FAQ question
 * into its own entry.
 */

import type Database from 'better-sqlite3'
import { z } from 'zod'
import { Ok, Err, KnowledgeBaseError, unwrap } from '../common/index.js'
import type { Result } from '../common/index.js'
import { KnowledgeRepository } from './repository.js'
import type { KnowledgeEntry } from './schemas.js'

export const BLUEPRINT_TYPE = 'knowledge_blueprint'

export const BLUEPRINT_TEMPLATE = `# Process knowledge blueprint

\`\`\`json
{
  "type": "knowledge_blueprint",
  "process_name": "Example process",
  "version": "1.0",
  "owner": "Engineer name",
  "last_reviewed": "2024-01-01",
  "scope": "Where this process applies",
  "equipment": ["Main unit A", "Main unit B"],
  "tags": ["example", "process"],
  "summary": "One sentence on what the process does and produces."
}
\`\`\`

> Keep the JSON block above. The "type" field must stay as it is.

## Scenario
Where the process runs, its place on the line and how it relates to other steps.

## Steps
1. First step: the key action and what to watch for.
2. Second step: the measurement or inspection point.
3. Third step: the handover or expected output.

## Key parameters
| Parameter | Target | Range | Monitoring |
| --- | --- | --- | --- |
| Temperature | 85 C | 83-87 C | Inline controller |
| Pressure | 1.2 bar | 1.0-1.4 bar | Gauge reading |

## Decision points
- Add material when the temperature stays below 83 C for 3 minutes.

## Risk control
- Risk: agitator jams. Signal: current spike. Response: stop and clear by hand.

## FAQ
### Q: What to do about heavy foaming?
Symptom: even-sized bubbles across the surface.
Cause: the feed valve is not fully open and draws in air.
Action: reopen the feed valve and extend the vacuum time if needed.
Verification: bubble density below 2% on a sample.

## References
- Work instruction SOP-001.
`

const MetadataTextSchema = z.union([z.string(), z.number()]).transform((value) => String(value).trim())

/** Accepts a list or a comma separated string. */
const MetadataListSchema = z
  .union([z.array(z.union([z.string(), z.number()])), z.string()])
  .transform((value) =>
    (typeof value === 'string' ? value.split(',') : value.map(String))
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  )

export const BlueprintMetadataSchema = z
  .object({
    type: z.literal(BLUEPRINT_TYPE, {
      errorMap: () => ({ message: `Blueprint metadata type must be "${BLUEPRINT_TYPE}"` }),
    }),
    process_name: MetadataTextSchema.optional(),
    name: MetadataTextSchema.optional(),
    title: MetadataTextSchema.optional(),
    version: MetadataTextSchema.optional(),
    owner: MetadataTextSchema.optional(),
    last_reviewed: MetadataTextSchema.optional(),
    scope: MetadataTextSchema.optional(),
    summary: MetadataTextSchema.optional(),
    equipment: MetadataListSchema.optional(),
    tags: MetadataListSchema.optional(),
  })
  .passthrough()

export type BlueprintMetadata = z.infer<typeof BlueprintMetadataSchema>

export interface BlueprintEntry {
  title: string
  question: string
  answer: string
  tags: string[]
}

export interface BlueprintDocument {
  metadata: BlueprintMetadata
  processName: string
  /** Section bodies keyed by heading as written. */
  sections: Record<string, string>
  entries: BlueprintEntry[]
}

type SectionKey = 'overview' | 'scenario' | 'steps' | 'parameters' | 'decisions' | 'risks' | 'faq' | 'references'

// Lowercased heading → section. Chinese headings are accepted as written.
const SECTION_HEADINGS: Record<string, SectionKey> = {
  overview: 'overview',
  'process overview': 'overview',
  工艺概述: 'overview',
  scenario: 'scenario',
  background: 'scenario',
  场景描述: 'scenario',
  steps: 'steps',
  'operating steps': 'steps',
  procedure: 'steps',
  操作步骤: 'steps',
  parameters: 'parameters',
  'key parameters': 'parameters',
  关键参数: 'parameters',
  'decision points': 'decisions',
  决策要点: 'decisions',
  'risk control': 'risks',
  risks: 'risks',
  风险控制: 'risks',
  faq: 'faq',
  'common questions': 'faq',
  常见问题: 'faq',
  references: 'references',
  参考资料: 'references',
}

const FAQ_FIELDS = ['Symptom', 'Cause', 'Action', 'Verification', 'Note'] as const
type FaqField = (typeof FAQ_FIELDS)[number]

const FAQ_FIELD_NAMES: Record<string, FaqField> = {
  symptom: 'Symptom',
  cause: 'Cause',
  action: 'Action',
  verification: 'Verification',
  note: 'Note',
  现象: 'Symptom',
  原因: 'Cause',
  措施: 'Action',
  验证: 'Verification',
  备注: 'Note',
}

const METADATA_BLOCK_RE = /```json\s*(\{[\s\S]*?\})\s*```/
const SECTION_RE = /^##\s+(.+)$/gm
const FAQ_QUESTION_RE = /^###\s*Q[:：]\s*(.+)$/gm
const FAQ_FIELD_RE = /^([^:：]+?)\s*[:：]\s*(.*)$/
const LIST_ITEM_RE = /^(?:\d+[.)]|[-*])\s*(.+)$/
const BULLET_RE = /^[-*]\s*(.+)$/
const TABLE_SEPARATOR_RE = /^[-:\s]*$/

/** Cheap check before trying a full parse. */
export function looksLikeBlueprint(text: string): boolean {
  return text.includes(BLUEPRINT_TYPE) && text.includes('```json')
}

function parseMetadata(text: string): Result<BlueprintMetadata, KnowledgeBaseError> {
  const block = METADATA_BLOCK_RE.exec(text)
  if (!block?.[1]) {
    return Err(KnowledgeBaseError.importFailed('Blueprint has no ```json metadata block'))
  }

  let raw: unknown
  try {
    raw = JSON.parse(block[1])
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    return Err(KnowledgeBaseError.importFailed(`Blueprint metadata is not valid JSON: ${reason}`))
  }

  const parsed = BlueprintMetadataSchema.safeParse(raw)
  if (!parsed.success) return Err(KnowledgeBaseError.fromZod(parsed.error, 'IMPORT_ERROR'))
  return Ok(parsed.data)
}

/** Splits `text` at every match of `re`; each part runs to the next match. */
function splitAt(text: string, re: RegExp): Array<{ heading: string; body: string }> {
  const matches = [...text.matchAll(re)]
  return matches.map((match, index) => {
    const start = (match.index ?? 0) + match[0].length
    const next = matches[index + 1]
    const end = next?.index ?? text.length
    return { heading: (match[1] ?? '').trim(), body: text.slice(start, end).trim() }
  })
}

function nonEmptyLines(section: string): string[] {
  return section
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
}

function parseSteps(section: string): string[] {
  const steps: string[] = []
  for (const line of nonEmptyLines(section)) {
    const match = LIST_ITEM_RE.exec(line)
    if (match?.[1]) steps.push(match[1].trim())
  }
  return steps
}

function parseTable(section: string): string[][] {
  return nonEmptyLines(section)
    .filter((line) => line.startsWith('|'))
    .map((line) =>
      line
        .replace(/^\|+/, '')
        .replace(/\|+$/, '')
        .split('|')
        .map((cell) => cell.trim()),
    )
    .filter((cells) => !cells.every((cell) => TABLE_SEPARATOR_RE.test(cell)))
}

/** A table becomes one `header: cell | ...` line per row; otherwise bullets. */
function parameterLines(section: string): string[] {
  const [headers, ...rows] = parseTable(section)
  if (headers && rows.length > 0) {
    return rows
      .map((row) =>
        row
          .map((cell, index) => (cell ? `${headers[index] ?? `Column ${index + 1}`}: ${cell}` : ''))
          .filter((pair) => pair.length > 0)
          .join(' | '),
      )
      .filter((line) => line.length > 0)
  }

  const lines: string[] = []
  for (const line of nonEmptyLines(section)) {
    const match = BULLET_RE.exec(line)
    if (match?.[1]) lines.push(match[1].trim())
  }
  return lines
}

function bulletItems(section: string): string[] {
  return nonEmptyLines(section)
    .map((line) => line.replace(/^[-*]\s*/, ''))
    .filter((line) => line.length > 0)
}

function faqAnswer(block: string): string {
  const fields = new Map<FaqField, string>()
  let current: FaqField | undefined

  for (const line of nonEmptyLines(block)) {
    const match = FAQ_FIELD_RE.exec(line)
    const field = match?.[1] ? FAQ_FIELD_NAMES[match[1].trim().toLowerCase()] : undefined
    if (field) {
      current = field
      fields.set(field, (match?.[2] ?? '').trim())
    } else if (current) {
      fields.set(current, `${fields.get(current) ?? ''}\n${line}`)
    }
  }

  const parts = FAQ_FIELDS.flatMap((field) => {
    const value = fields.get(field)
    return value ? [`${field}: ${value}`] : []
  })
  return parts.length > 0 ? parts.join('\n') : block
}

function firstText(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.length > 0)
}

export function parseBlueprint(text: string): Result<BlueprintDocument, KnowledgeBaseError> {
  const normalized = text.replace(/\r\n?/g, '\n')
  const metadata = parseMetadata(normalized)
  if (!metadata.ok) return metadata
  const meta = metadata.value

  const sections: Record<string, string> = {}
  const byKey = new Map<SectionKey, string>()
  for (const { heading, body } of splitAt(normalized, SECTION_RE)) {
    sections[heading] = body
    const key = SECTION_HEADINGS[heading.toLowerCase()]
    if (key && !byKey.has(key)) byKey.set(key, body)
  }

  const processName = firstText(meta.process_name, meta.name, meta.title) ?? 'This process'
  const baseTags = [...(meta.tags ?? [])]
  if (!baseTags.includes('blueprint')) baseTags.push('blueprint')

  const entries: BlueprintEntry[] = []
  const add = (heading: string, question: string, answer: string, tag: string): void => {
    entries.push({ title: `${processName} - ${heading}`, question, answer, tags: [...baseTags, tag] })
  }

  const overview: string[] = []
  if (meta.summary) overview.push(meta.summary)
  if (meta.scope) overview.push(`Scope: ${meta.scope}`)
  const details = [
    meta.owner ? `Owner: ${meta.owner}` : '',
    meta.version ? `Version: ${meta.version}` : '',
    meta.last_reviewed ? `Last reviewed: ${meta.last_reviewed}` : '',
  ].filter((part) => part.length > 0)
  if (details.length > 0) overview.push(details.join('; '))
  if (meta.equipment && meta.equipment.length > 0) overview.push(`Equipment: ${meta.equipment.join(', ')}`)
  for (const key of ['overview', 'scenario'] as const) {
    const body = byKey.get(key)
    if (body) overview.push(body)
  }
  if (overview.length > 0) {
    add('Overview', `What is the background and scope of ${processName}?`, overview.join('\n\n'), 'overview')
  }

  const steps = parseSteps(byKey.get('steps') ?? '')
  if (steps.length > 0) {
    const answer = steps.map((step, index) => `${index + 1}. ${step}`).join('\n')
    add('Steps', `How is ${processName} carried out?`, answer, 'steps')
  }

  const parameters = parameterLines(byKey.get('parameters') ?? '')
  if (parameters.length > 0) {
    add('Key parameters', `Which parameters matter for ${processName}?`, parameters.join('\n'), 'parameters')
  }

  const decisions = bulletItems(byKey.get('decisions') ?? '')
  if (decisions.length > 0) {
    const answer = decisions.map((item) => `- ${item}`).join('\n')
    add('Decision points', `What are the control points of ${processName}?`, answer, 'decisions')
  }

  const risks = bulletItems(byKey.get('risks') ?? '')
  if (risks.length > 0) {
    const answer = risks.map((item) => `- ${item}`).join('\n')
    add('Risk control', `How are risks prevented and handled in ${processName}?`, answer, 'risks')
  }

  for (const { heading: question, body } of splitAt(byKey.get('faq') ?? '', FAQ_QUESTION_RE)) {
    if (question) add(`FAQ: ${question}`, question, faqAnswer(body), 'faq')
  }

  const references = bulletItems(byKey.get('references') ?? '')
  if (references.length > 0) {
    const answer = references.map((item) => `- ${item}`).join('\n')
    add('References', `Where can I read more about ${processName}?`, answer, 'references')
  }

  if (entries.length === 0) {
    return Err(KnowledgeBaseError.importFailed('Blueprint has no content to import'))
  }
  return Ok({ metadata: meta, processName, sections, entries })
}

/** Parses a blueprint and stores all of its entries, or none of them. */
export function importBlueprint(db: Database.Database, text: string): Result<KnowledgeEntry[], KnowledgeBaseError> {
  const document = parseBlueprint(text)
  if (!document.ok) return document

  const repository = new KnowledgeRepository(db)
  let created: KnowledgeEntry[]
  try {
    created = db.transaction(() => document.value.entries.map((entry) => unwrap(repository.create(entry))))()
  } catch (e) {
    return Err(KnowledgeBaseError.fromUnknown(e))
  }

  console.error(`[knowledge] imported blueprint "${document.value.processName}": ${created.length} entries`)
  return Ok(created)
}
