import { KnowledgeBaseError, Err } from '@offline-kb/core'
import type { KnowledgePatch } from '@offline-kb/core'
import { knowledgeDetail, knowledgeLine, matchLines } from '../format.js'
import { TAG_OPTION, done, flag, idArgument, integerOption, stringList, stringOption } from './types.js'
import type { Command, OptionSpec } from './types.js'

const FIELD_OPTIONS: OptionSpec = {
  title: { type: 'string' },
  question: { type: 'string' },
  answer: { type: 'string' },
  ...TAG_OPTION,
}

export const knowledgeCommands: Command[] = [
  {
    name: 'add-knowledge',
    usage: 'add-knowledge --title <t> --question <q> [--answer <a>] [--tag <tag>...]',
    summary: 'Add a knowledge entry',
    options: FIELD_OPTIONS,
    run(ctx) {
      const created = ctx.services.knowledge.create({
        title: stringOption(ctx.values, 'title') ?? '',
        question: stringOption(ctx.values, 'question') ?? '',
        answer: stringOption(ctx.values, 'answer') ?? '',
        tags: stringList(ctx.values, 'tag'),
      })
      if (!created.ok) return created
      ctx.out(`Created knowledge entry #${created.value.id}`)
      return done()
    },
  },
  {
    name: 'list-knowledge',
    usage: 'list-knowledge',
    summary: 'List knowledge entries, oldest first',
    run(ctx) {
      const entries = ctx.services.knowledge.list()
      if (!entries.ok) return entries
      if (entries.value.length === 0) ctx.out('No knowledge entries.')
      for (const entry of entries.value) ctx.out(knowledgeLine(entry))
      return done()
    },
  },
  {
    name: 'view-knowledge',
    usage: 'view-knowledge <id>',
    summary: 'Show one knowledge entry',
    run(ctx) {
      const id = idArgument(ctx)
      if (!id.ok) return id
      const entry = ctx.services.knowledge.getById(id.value)
      if (!entry.ok) return entry
      knowledgeDetail(entry.value).forEach((line) => ctx.out(line))
      return done()
    },
  },
  {
    name: 'update-knowledge',
    usage: 'update-knowledge <id> [--title <t>] [--question <q>] [--answer <a>] [--tag <tag>... | --clear-tags]',
    summary: 'Change fields of a knowledge entry',
    options: { ...FIELD_OPTIONS, 'clear-tags': { type: 'boolean' } },
    run(ctx) {
      const id = idArgument(ctx)
      if (!id.ok) return id

      const patch: KnowledgePatch = {}
      const title = stringOption(ctx.values, 'title')
      const question = stringOption(ctx.values, 'question')
      const answer = stringOption(ctx.values, 'answer')
      const tags = stringList(ctx.values, 'tag')
      if (title !== undefined) patch.title = title
      if (question !== undefined) patch.question = question
      if (answer !== undefined) patch.answer = answer
      if (flag(ctx.values, 'clear-tags')) {
        if (tags.length > 0) return Err(KnowledgeBaseError.validation('Use either --tag or --clear-tags'))
        patch.tags = []
      } else if (tags.length > 0) {
        patch.tags = tags
      }

      const updated = ctx.services.knowledge.update(id.value, patch)
      if (!updated.ok) return updated
      ctx.out(`Updated knowledge entry #${updated.value.id}`)
      return done()
    },
  },
  {
    name: 'delete-knowledge',
    usage: 'delete-knowledge <id>',
    summary: 'Delete a knowledge entry',
    run(ctx) {
      const id = idArgument(ctx)
      if (!id.ok) return id
      const deleted = ctx.services.knowledge.delete(id.value)
      if (!deleted.ok) return deleted
      ctx.out(`Deleted knowledge entry #${id.value}`)
      return done()
    },
  },
  {
    name: 'ask',
    usage: 'ask <question...> [--limit <n>]',
    summary: 'Find the knowledge entries that best match a question',
    options: { limit: { type: 'string' } },
    run(ctx) {
      const limit = integerOption(ctx.values, 'limit')
      if (!limit.ok) return limit
      const question = ctx.positionals.join(' ').trim()
      if (!question) return Err(KnowledgeBaseError.validation('Missing <question>'))

      const matches = ctx.services.matcher.ask(question, limit.value !== undefined ? { limit: limit.value } : {})
      if (!matches.ok) return matches
      if (matches.value.length === 0) ctx.out('No matching knowledge entries.')
      for (const match of matches.value) matchLines(match).forEach((line) => ctx.out(line))
      return done()
    },
  },
]
