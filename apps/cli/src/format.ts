/**
 * Plain-text renderings for terminal output. Each helper returns lines;
 * the caller decides where they go.
 */

import type {
  AdminEvent,
  DecisionRecordDetail,
  DecisionRecordListItem,
  DecisionSearchHit,
  ImportReport,
  KnowledgeEntry,
  KnowledgeMatch,
  StoreSummary,
  User,
} from '@offline-kb/core'

function tagsLine(tags: string[]): string {
  return tags.length > 0 ? tags.join(', ') : '-'
}

function indent(text: string): string[] {
  return text.split('\n').map((line) => `    ${line}`)
}

export function formatRating(average: number | null): string {
  return average === null ? '-' : average.toFixed(1)
}

export function knowledgeLine(entry: KnowledgeEntry): string {
  return `#${entry.id} ${entry.title}`
}

export function knowledgeDetail(entry: KnowledgeEntry): string[] {
  return [
    `#${entry.id} ${entry.title}`,
    `  question: ${entry.question}`,
    `  answer:   ${entry.answer || '-'}`,
    `  tags:     ${tagsLine(entry.tags)}`,
    `  created:  ${entry.createdAt}`,
  ]
}

export function matchLines(match: KnowledgeMatch): string[] {
  return [
    `#${match.entry.id} ${match.entry.title} (score ${match.score}: ${match.matchedTokens.join(', ')})`,
    ...indent(match.entry.answer || '-'),
  ]
}

export function decisionLine(item: DecisionRecordListItem): string {
  return `#${item.id} ${item.title} (${item.comments.count} comments, avg ${formatRating(item.comments.averageRating)})`
}

export function decisionDetail(detail: DecisionRecordDetail): string[] {
  const lines = [
    `#${detail.id} ${detail.title}`,
    `  tags:    ${tagsLine(detail.tags)}`,
    `  created: ${detail.createdAt}`,
    '  background:',
    ...indent(detail.background || '-'),
    '  steps:',
    ...indent(detail.steps || '-'),
    '  result:',
    ...indent(detail.result || '-'),
    `  comments (${detail.comments.length}):`,
  ]
  for (const comment of detail.comments) {
    lines.push(`    [${comment.rating}/5] ${comment.author || 'anonymous'}: ${comment.body}`)
  }
  return lines
}

export function searchHitLine(hit: DecisionSearchHit): string {
  const fields = hit.matchedFields.length > 0 ? `: ${hit.matchedFields.join(', ')}` : ''
  return `#${hit.record.id} ${hit.record.title} (score ${hit.score}${fields})`
}

export function userLine(user: User): string {
  return `${user.username} ${user.isAdmin ? 'admin' : 'member'} ${user.isActive ? 'active' : 'inactive'}`
}

export function eventLine(event: AdminEvent): string {
  return `${event.createdAt} ${event.actorUsername} ${event.action} ${event.targetUsername}`
}

export function summaryLines(summary: StoreSummary): string[] {
  return [
    `knowledge entries: ${summary.knowledgeEntries}`,
    `decision records:  ${summary.decisionRecords}`,
    `comments:          ${summary.comments}`,
    `users:             ${summary.users}`,
    `admins:            ${summary.admins}`,
    `active users:      ${summary.activeUsers}`,
  ]
}

export function importReportLines(report: ImportReport): string[] {
  const lines = [
    `Imported (${report.mode}): ${report.knowledge} knowledge, ${report.decisions} decisions, ` +
      `${report.comments} comments, ${report.users} users`,
  ]
  if (report.skippedUsers.length > 0) {
    lines.push(`Skipped existing users: ${report.skippedUsers.join(', ')}`)
  }
  if (report.usersNeedingReset.length > 0) {
    lines.push(`Need a password reset: ${report.usersNeedingReset.join(', ')}`)
  }
  return lines
}
