/**
 * Audit: append-only admin events and store overview.
 */

export { AdminEventRepository } from './repository.js'
export type { ListAdminEventsOptions } from './repository.js'
export { buildSummary } from './summary.js'
export type { StoreSummary } from './summary.js'
export { AdminActionSchema, AdminEventSchema, AppendAdminEventInputSchema } from './schemas.js'
export type { AdminAction, AdminEvent, AppendAdminEventInput } from './schemas.js'
