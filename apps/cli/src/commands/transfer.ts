import { readFile, writeFile } from 'node:fs/promises'
import { BLUEPRINT_TEMPLATE, Err, ImportModeSchema, KnowledgeBaseError, Ok } from '@offline-kb/core'
import type { Result } from '@offline-kb/core'
import { importReportLines, knowledgeLine } from '../format.js'
import { ACTOR_OPTIONS, done, flag, optionalActor, positional, stringOption } from './types.js'
import type { Command } from './types.js'

function message(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}

async function readText(file: string): Promise<Result<string, KnowledgeBaseError>> {
  try {
    return Ok(await readFile(file, 'utf8'))
  } catch (e) {
    return Err(KnowledgeBaseError.io(`Cannot read ${file}: ${message(e)}`))
  }
}

export const transferCommands: Command[] = [
  {
    name: 'export',
    usage: 'export <file> [--exclude-hashes]',
    summary: 'Write the whole store to a JSON file',
    options: { 'exclude-hashes': { type: 'boolean' } },
    async run(ctx) {
      const file = positional(ctx, 0, 'file')
      if (!file.ok) return file

      const document = ctx.services.exportData({ includePasswordHashes: !flag(ctx.values, 'exclude-hashes') })
      if (!document.ok) return document

      try {
        await writeFile(file.value, `${JSON.stringify(document.value, null, 2)}\n`, 'utf8')
      } catch (e) {
        return Err(KnowledgeBaseError.io(`Cannot write ${file.value}: ${message(e)}`))
      }

      const doc = document.value
      ctx.out(
        `Exported ${doc.knowledge.length} knowledge, ${doc.decisions.length} decisions, ` +
          `${doc.users.length} users to ${file.value}`,
      )
      return done()
    },
  },
  {
    name: 'import',
    usage: 'import <file> --mode <merge|replace> [--actor <admin> --actor-password <pw>]',
    summary: 'Load a JSON export, merging into or replacing the store (needs an admin actor once any user exists)',
    options: { mode: { type: 'string' }, ...ACTOR_OPTIONS },
    async run(ctx) {
      const file = positional(ctx, 0, 'file')
      if (!file.ok) return file
      const mode = ImportModeSchema.safeParse(stringOption(ctx.values, 'mode'))
      if (!mode.success) {
        return Err(KnowledgeBaseError.validation('--mode must be "merge" or "replace"'))
      }
      const actor = optionalActor(ctx)
      if (!actor.ok) return actor

      const text = await readText(file.value)
      if (!text.ok) return text

      let document: unknown
      try {
        document = JSON.parse(text.value)
      } catch (e) {
        return Err(KnowledgeBaseError.importFailed(`${file.value} is not valid JSON: ${message(e)}`))
      }

      const report = ctx.services.importData(document, {
        mode: mode.data,
        ...(actor.value !== undefined ? { actor: actor.value } : {}),
      })
      if (!report.ok) return report
      importReportLines(report.value).forEach((line) => ctx.out(line))
      return done()
    },
  },
  {
    name: 'import-blueprint',
    usage: 'import-blueprint <file>',
    summary: 'Turn a knowledge blueprint document into knowledge entries',
    async run(ctx) {
      const file = positional(ctx, 0, 'file')
      if (!file.ok) return file
      const text = await readText(file.value)
      if (!text.ok) return text

      const created = ctx.services.importBlueprint(text.value)
      if (!created.ok) return created
      ctx.out(`Imported ${created.value.length} knowledge entries from ${file.value}`)
      for (const entry of created.value) ctx.out(knowledgeLine(entry))
      return done()
    },
  },
  {
    name: 'blueprint-template',
    usage: 'blueprint-template',
    summary: 'Print an empty knowledge blueprint to fill in',
    run(ctx) {
      BLUEPRINT_TEMPLATE.trimEnd()
        .split('\n')
        .forEach((line) => ctx.out(line))
      return done()
    },
  },
]
