/**
 * User repository: raw row access for accounts. Rules live in AccountService.
 * Methods throw on driver errors so they compose inside a transaction.
 */

import type Database from 'better-sqlite3'
import type { User } from './schemas.js'

export interface UserRow {
  id: number
  username: string
  password_hash: string
  is_admin: number
  is_active: number
  created_at: string
}

export const USER_COLUMNS = 'id, username, password_hash, is_admin, is_active, created_at'

export function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    isAdmin: row.is_admin === 1,
    isActive: row.is_active === 1,
    createdAt: row.created_at,
  }
}

export interface InsertUserInput {
  username: string
  passwordHash: string
  isAdmin: boolean
  isActive: boolean
  createdAt?: string
}

export class UserRepository {
  constructor(private db: Database.Database) {}

  insert(input: InsertUserInput): UserRow {
    const createdAt = input.createdAt ?? new Date().toISOString()
    const info = this.db
      .prepare('INSERT INTO users (username, password_hash, is_admin, is_active, created_at) VALUES (?, ?, ?, ?, ?)')
      .run(input.username, input.passwordHash, input.isAdmin ? 1 : 0, input.isActive ? 1 : 0, createdAt)

    return {
      id: Number(info.lastInsertRowid),
      username: input.username,
      password_hash: input.passwordHash,
      is_admin: input.isAdmin ? 1 : 0,
      is_active: input.isActive ? 1 : 0,
      created_at: createdAt,
    }
  }

  findByUsername(username: string): UserRow | undefined {
    return this.db.prepare(`SELECT ${USER_COLUMNS} FROM users WHERE username = ?`).get(username) as
      | UserRow
      | undefined
  }

  list(): UserRow[] {
    return this.db.prepare(`SELECT ${USER_COLUMNS} FROM users ORDER BY created_at ASC, id ASC`).all() as UserRow[]
  }

  count(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS count FROM users').get() as { count: number }
    return row.count
  }

  countActiveAdmins(): number {
    const row = this.db
      .prepare('SELECT COUNT(*) AS count FROM users WHERE is_admin = 1 AND is_active = 1')
      .get() as { count: number }
    return row.count
  }

  setAdmin(username: string, isAdmin: boolean): void {
    this.db.prepare('UPDATE users SET is_admin = ? WHERE username = ?').run(isAdmin ? 1 : 0, username)
  }

  setActive(username: string, isActive: boolean): void {
    this.db.prepare('UPDATE users SET is_active = ? WHERE username = ?').run(isActive ? 1 : 0, username)
  }

  setPasswordHash(username: string, passwordHash: string): void {
    this.db.prepare('UPDATE users SET password_hash = ? WHERE username = ?').run(passwordHash, username)
  }
}
