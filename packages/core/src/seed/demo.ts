/**
 * Demo content for a fresh store: a first administrator and a couple of
 * decision records with comments. Each part is skipped when its table
 * already has rows.
 */

import { Ok } from '../common/index.js'
import type { Result, KnowledgeBaseError } from '../common/index.js'
import type { Services } from '../services/container.js'
import type { CreateDecisionRecordInput } from '../history/schemas.js'

export interface SeedOptions {
  adminUsername: string
  adminPassword: string
}

export interface SeedReport {
  adminCreated: boolean
  decisionsCreated: number
  commentsCreated: number
}

interface DemoDecision {
  record: CreateDecisionRecordInput
  comment: { author: string; body: string; rating: number }
}

const DEMO_DECISIONS: DemoDecision[] = [
  {
    record: {
      title: 'Furnace shutdown on high oxygen reading',
      background:
        'During the night shift the tempering furnace oxygen probe read above 0.35% for five minutes and the interlock stopped the line.',
      steps:
        '1. Shift lead confirms the area is safe and logs the stop time.\n' +
        '2. Cross-check oxygen with the portable analyser.\n' +
        '3. Inspect the mixing valve and flow meter; switch to the backup gas supply if needed.',
      result: 'The mixing valve was sticking. Replaced it, resumed production, and added it to the inspection plan.',
      tags: ['heat-treatment', 'safety', 'shutdown'],
    },
    comment: { author: 'shift-lead', body: 'Following the procedure kept downtime under 40 minutes.', rating: 5 },
  },
  {
    record: {
      title: 'Spindle vibration above limit',
      background: 'Response when the spindle vibration sensor exceeds 3.0 mm/s RMS.',
      steps:
        '1. Reduce spindle speed by 10% and capture the waveform.\n' +
        '2. Stop and check tool clamping force; re-clamp or replace the tool.\n' +
        '3. If vibration persists, ask maintenance to check bearing lubrication.',
      result: 'Vibration returned to normal after a tool change; topped up spindle oil.',
      tags: ['cnc', 'maintenance', 'vibration'],
    },
    comment: { author: 'process-lead', body: 'Add collet cleaning to the weekly checklist.', rating: 4 },
  },
]

export function seedDemoData(services: Services, options: SeedOptions): Result<SeedReport, KnowledgeBaseError> {
  const report: SeedReport = { adminCreated: false, decisionsCreated: 0, commentsCreated: 0 }

  const users = services.accounts.list()
  if (!users.ok) return users
  if (users.value.length === 0) {
    const admin = services.accounts.register({
      username: options.adminUsername,
      password: options.adminPassword,
      isAdmin: true,
    })
    if (!admin.ok) return admin
    report.adminCreated = true
  }

  const records = services.decisions.listRecords()
  if (!records.ok) return records
  if (records.value.length === 0) {
    for (const demo of DEMO_DECISIONS) {
      const record = services.decisions.create(demo.record)
      if (!record.ok) return record
      report.decisionsCreated++

      const comment = services.comments.create({ decisionRecordId: record.value.id, ...demo.comment })
      if (!comment.ok) return comment
      report.commentsCreated++
    }
  }

  console.error(
    `[seed] admin created: ${report.adminCreated}, decisions: ${report.decisionsCreated}, comments: ${report.commentsCreated}`,
  )
  return Ok(report)
}
