/**
 * Account service: registration, authentication, and the admin-gated
 * transitions of a user between {active, inactive} × {admin, member}.
 *
 * Every privileged transition and its AdminEvent are written in one
 * transaction: both land or neither does.
 */

import type Database from 'better-sqlite3'
import { Ok, Err, KnowledgeBaseError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { AdminEventRepository } from '../audit/repository.js'
import type { AdminAction } from '../audit/schemas.js'
import { DEFAULT_HASH_ITERATIONS, hashPassword, verifyPassword } from './password.js'
import { UserRepository, rowToUser } from './repository.js'
import type { UserRow } from './repository.js'
import { PasswordSchema, RegisterInputSchema, UsernameSchema } from './schemas.js'
import type { RegisterInput, User } from './schemas.js'

export interface AccountServiceOptions {
  hashIterations?: number
}

type Transition = {
  action: Extract<AdminAction, 'promote' | 'demote' | 'activate' | 'deactivate'>
  /** Already in the target state. */
  isNoop(row: UserRow): boolean
  noopMessage: string
  /** Removes an active admin from the pool. */
  reducesAdmins(row: UserRow): boolean
  apply(users: UserRepository, username: string): void
}

const TRANSITIONS: Record<Transition['action'], Transition> = {
  promote: {
    action: 'promote',
    isNoop: (row) => row.is_admin === 1,
    noopMessage: 'is already an administrator',
    reducesAdmins: () => false,
    apply: (users, username) => users.setAdmin(username, true),
  },
  demote: {
    action: 'demote',
    isNoop: (row) => row.is_admin === 0,
    noopMessage: 'is not an administrator',
    reducesAdmins: (row) => row.is_active === 1,
    apply: (users, username) => users.setAdmin(username, false),
  },
  activate: {
    action: 'activate',
    isNoop: (row) => row.is_active === 1,
    noopMessage: 'is already active',
    reducesAdmins: () => false,
    apply: (users, username) => users.setActive(username, true),
  },
  deactivate: {
    action: 'deactivate',
    isNoop: (row) => row.is_active === 0,
    noopMessage: 'is already inactive',
    reducesAdmins: (row) => row.is_admin === 1,
    apply: (users, username) => users.setActive(username, false),
  },
}

/**
 * Looks up `actor` and throws PERMISSION_DENIED unless it is an active admin.
 * Meant to run inside the transaction of the operation it guards.
 */
export function requireActiveAdmin(users: UserRepository, actor: string | undefined): UserRow {
  const name = UsernameSchema.safeParse(actor ?? '')
  if (!name.success) {
    throw KnowledgeBaseError.permission('An administrator must perform this operation')
  }

  const row = users.findByUsername(name.data)
  if (!row || row.is_admin !== 1 || row.is_active !== 1) {
    throw KnowledgeBaseError.permission(`User ${name.data} is not an active administrator`)
  }
  return row
}

export class AccountService {
  private users: UserRepository
  private events: AdminEventRepository
  private hashIterations: number

  constructor(
    private db: Database.Database,
    options: AccountServiceOptions = {},
  ) {
    this.users = new UserRepository(db)
    this.events = new AdminEventRepository(db)
    this.hashIterations = options.hashIterations ?? DEFAULT_HASH_ITERATIONS
  }

  /**
   * Creates an account. Admin accounts need an active admin as `actor`,
   * except for the very first account of an empty store.
   */
  register(input: RegisterInput): Result<User, KnowledgeBaseError> {
    const parsed = RegisterInputSchema.safeParse(input)
    if (!parsed.success) {
      return Err(KnowledgeBaseError.fromZod(parsed.error))
    }
    const { username, password, isAdmin, actor } = parsed.data

    try {
      const user = this.db.transaction(() => {
        if (this.users.findByUsername(username)) {
          throw KnowledgeBaseError.conflict(`Username already taken: ${username}`)
        }

        let actorUsername = username
        if (isAdmin && this.users.count() > 0) {
          actorUsername = requireActiveAdmin(this.users, actor).username
        }

        const row = this.users.insert({
          username,
          passwordHash: hashPassword(password, this.hashIterations),
          isAdmin,
          isActive: true,
        })

        if (isAdmin) {
          this.events.append({ actorUsername, action: 'create_admin', targetUsername: username })
        }

        return rowToUser(row)
      })()

      return Ok(user)
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }

  authenticate(username: string, password: string): Result<User, KnowledgeBaseError> {
    try {
      const row = this.users.findByUsername(username.trim())
      if (!row || row.is_active !== 1 || !verifyPassword(password, row.password_hash)) {
        return Err(KnowledgeBaseError.auth('Invalid username or password'))
      }
      return Ok(rowToUser(row))
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }

  get(username: string): Result<User, KnowledgeBaseError> {
    try {
      const row = this.users.findByUsername(username.trim())
      if (!row) return Err(KnowledgeBaseError.notFound('User', username))
      return Ok(rowToUser(row))
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }

  list(): Result<User[], KnowledgeBaseError> {
    try {
      return Ok(this.users.list().map(rowToUser))
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }

  promote(username: string, actor: string): Result<User, KnowledgeBaseError> {
    return this.transition(TRANSITIONS.promote, username, actor)
  }

  demote(username: string, actor: string): Result<User, KnowledgeBaseError> {
    return this.transition(TRANSITIONS.demote, username, actor)
  }

  activate(username: string, actor: string): Result<User, KnowledgeBaseError> {
    return this.transition(TRANSITIONS.activate, username, actor)
  }

  deactivate(username: string, actor: string): Result<User, KnowledgeBaseError> {
    return this.transition(TRANSITIONS.deactivate, username, actor)
  }

  resetPassword(username: string, newPassword: string, actor: string): Result<User, KnowledgeBaseError> {
    const password = PasswordSchema.safeParse(newPassword)
    if (!password.success) {
      return Err(KnowledgeBaseError.fromZod(password.error))
    }

    try {
      const user = this.db.transaction(() => {
        const admin = requireActiveAdmin(this.users, actor)

        const target = this.requireUser(username)
        this.users.setPasswordHash(target.username, hashPassword(password.data, this.hashIterations))
        this.events.append({
          actorUsername: admin.username,
          action: 'reset_password',
          targetUsername: target.username,
        })
        return rowToUser(target)
      })()

      return Ok(user)
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }

  /** Self-service; not recorded in the admin trail. */
  changePassword(username: string, oldPassword: string, newPassword: string): Result<User, KnowledgeBaseError> {
    const password = PasswordSchema.safeParse(newPassword)
    if (!password.success) {
      return Err(KnowledgeBaseError.fromZod(password.error))
    }

    const authenticated = this.authenticate(username, oldPassword)
    if (!authenticated.ok) return authenticated

    try {
      this.users.setPasswordHash(authenticated.value.username, hashPassword(password.data, this.hashIterations))
      return Ok(authenticated.value)
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }

  private transition(transition: Transition, username: string, actor: string): Result<User, KnowledgeBaseError> {
    try {
      const user = this.db.transaction(() => {
        const admin = requireActiveAdmin(this.users, actor)

        const target = this.requireUser(username)
        if (transition.isNoop(target)) {
          throw KnowledgeBaseError.validation(`User ${target.username} ${transition.noopMessage}`)
        }
        if (transition.reducesAdmins(target) && this.users.countActiveAdmins() <= 1) {
          throw KnowledgeBaseError.conflict(`Cannot ${transition.action} the last active administrator`)
        }

        transition.apply(this.users, target.username)
        this.events.append({
          actorUsername: admin.username,
          action: transition.action,
          targetUsername: target.username,
        })

        const updated = this.users.findByUsername(target.username)
        if (!updated) throw KnowledgeBaseError.notFound('User', target.username)
        return rowToUser(updated)
      })()

      return Ok(user)
    } catch (e) {
      return Err(KnowledgeBaseError.fromUnknown(e))
    }
  }

  private requireUser(username: string): UserRow {
    const row = this.users.findByUsername(username.trim())
    if (!row) throw KnowledgeBaseError.notFound('User', username)
    return row
  }
}
