import { KnowledgeBaseError, Err } from '@offline-kb/core'
import type { DecisionRecordPatch } from '@offline-kb/core'
import { decisionDetail, decisionLine, searchHitLine } from '../format.js'
import { TAG_OPTION, done, flag, idArgument, integerOption, stringList, stringOption } from './types.js'
import type { Command, OptionSpec } from './types.js'

const FIELD_OPTIONS: OptionSpec = {
  title: { type: 'string' },
  background: { type: 'string' },
  steps: { type: 'string' },
  result: { type: 'string' },
  ...TAG_OPTION,
}

export const historyCommands: Command[] = [
  {
    name: 'add-history',
    usage: 'add-history --title <t> [--background <b>] [--steps <s>] [--result <r>] [--tag <tag>...]',
    summary: 'Record a decision',
    options: FIELD_OPTIONS,
    run(ctx) {
      const created = ctx.services.decisions.create({
        title: stringOption(ctx.values, 'title') ?? '',
        background: stringOption(ctx.values, 'background') ?? '',
        steps: stringOption(ctx.values, 'steps') ?? '',
        result: stringOption(ctx.values, 'result') ?? '',
        tags: stringList(ctx.values, 'tag'),
      })
      if (!created.ok) return created
      ctx.out(`Created decision record #${created.value.id}`)
      return done()
    },
  },
  {
    name: 'list-history',
    usage: 'list-history',
    summary: 'List decision records with their comment counts',
    run(ctx) {
      const items = ctx.services.decisions.list()
      if (!items.ok) return items
      if (items.value.length === 0) ctx.out('No decision records.')
      for (const item of items.value) ctx.out(decisionLine(item))
      return done()
    },
  },
  {
    name: 'view-history',
    usage: 'view-history <id>',
    summary: 'Show a decision record and its comments',
    run(ctx) {
      const id = idArgument(ctx)
      if (!id.ok) return id
      const detail = ctx.services.decisions.getById(id.value)
      if (!detail.ok) return detail
      decisionDetail(detail.value).forEach((line) => ctx.out(line))
      return done()
    },
  },
  {
    name: 'update-history',
    usage: 'update-history <id> [--title <t>] [--background <b>] [--steps <s>] [--result <r>] [--tag <tag>... | --clear-tags]',
    summary: 'Change fields of a decision record',
    options: { ...FIELD_OPTIONS, 'clear-tags': { type: 'boolean' } },
    run(ctx) {
      const id = idArgument(ctx)
      if (!id.ok) return id

      const patch: DecisionRecordPatch = {}
      for (const field of ['title', 'background', 'steps', 'result'] as const) {
        const value = stringOption(ctx.values, field)
        if (value !== undefined) patch[field] = value
      }
      const tags = stringList(ctx.values, 'tag')
      if (flag(ctx.values, 'clear-tags')) {
        if (tags.length > 0) return Err(KnowledgeBaseError.validation('Use either --tag or --clear-tags'))
        patch.tags = []
      } else if (tags.length > 0) {
        patch.tags = tags
      }

      const updated = ctx.services.decisions.update(id.value, patch)
      if (!updated.ok) return updated
      ctx.out(`Updated decision record #${updated.value.id}`)
      return done()
    },
  },
  {
    name: 'delete-history',
    usage: 'delete-history <id>',
    summary: 'Delete a decision record and its comments',
    run(ctx) {
      const id = idArgument(ctx)
      if (!id.ok) return id
      const deleted = ctx.services.decisions.delete(id.value)
      if (!deleted.ok) return deleted
      ctx.out(`Deleted decision record #${id.value} and ${deleted.value.deletedComments} comments`)
      return done()
    },
  },
  {
    name: 'search-history',
    usage: 'search-history [keyword...] [--limit <n>]',
    summary: 'Search decision records by keyword',
    options: { limit: { type: 'string' } },
    run(ctx) {
      const limit = integerOption(ctx.values, 'limit')
      if (!limit.ok) return limit

      const hits = ctx.services.decisions.search(
        ctx.positionals.join(' '),
        limit.value !== undefined ? { limit: limit.value } : {},
      )
      if (!hits.ok) return hits
      if (hits.value.length === 0) ctx.out('No matching decision records.')
      for (const hit of hits.value) ctx.out(searchHitLine(hit))
      return done()
    },
  },
  {
    name: 'comment-history',
    usage: 'comment-history <id> --body <text> --rating <1-5> [--author <name>]',
    summary: 'Comment on a decision record',
    options: {
      body: { type: 'string' },
      rating: { type: 'string' },
      author: { type: 'string' },
    },
    run(ctx) {
      const id = idArgument(ctx)
      if (!id.ok) return id
      const rating = stringOption(ctx.values, 'rating')
      if (rating === undefined) return Err(KnowledgeBaseError.validation('Missing --rating'))

      const comment = ctx.services.comments.create({
        decisionRecordId: id.value,
        body: stringOption(ctx.values, 'body') ?? '',
        rating: Number(rating),
        author: stringOption(ctx.values, 'author') ?? '',
      })
      if (!comment.ok) return comment
      ctx.out(`Added comment #${comment.value.id} to decision record #${id.value}`)
      return done()
    },
  },
]
