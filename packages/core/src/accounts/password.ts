/**
 * Salted PBKDF2 password hashes.
 * Stored as `pbkdf2_sha256$<iterations>$<saltHex>$<hashHex>`.
 */

import { pbkdf2Sync, randomBytes, timingSafeEqual } from 'node:crypto'

export const DEFAULT_HASH_ITERATIONS = 120_000
/** Upper bound node:crypto accepts for PBKDF2. */
export const MAX_HASH_ITERATIONS = 2 ** 31 - 1

const SCHEME = 'pbkdf2_sha256'
const SALT_BYTES = 16
const KEY_BYTES = 32

/** Marks an account that cannot log in until an admin resets its password. */
export const UNUSABLE_PASSWORD_HASH = '!'

export function hashPassword(password: string, iterations = DEFAULT_HASH_ITERATIONS): string {
  const salt = randomBytes(SALT_BYTES)
  const key = pbkdf2Sync(password, salt, iterations, KEY_BYTES, 'sha256')
  return [SCHEME, String(iterations), salt.toString('hex'), key.toString('hex')].join('$')
}

interface ParsedHash {
  iterations: number
  salt: Buffer
  key: Buffer
}

const STORED_HASH_RE = /^pbkdf2_sha256\$(\d{1,10})\$((?:[0-9a-f]{2})+)\$((?:[0-9a-f]{2})+)$/

function parseStoredHash(stored: string): ParsedHash | undefined {
  const match = STORED_HASH_RE.exec(stored)
  if (!match) return undefined

  const iterations = Number(match[1])
  if (iterations < 1 || iterations > MAX_HASH_ITERATIONS) return undefined

  return {
    iterations,
    salt: Buffer.from(match[2] ?? '', 'hex'),
    key: Buffer.from(match[3] ?? '', 'hex'),
  }
}

/** True for a hash this module can verify, or the unusable marker. */
export function isStoredPasswordHash(stored: string): boolean {
  return stored === UNUSABLE_PASSWORD_HASH || parseStoredHash(stored) !== undefined
}

export function verifyPassword(password: string, stored: string): boolean {
  const parsed = parseStoredHash(stored)
  if (!parsed) return false

  const candidate = pbkdf2Sync(password, parsed.salt, parsed.iterations, parsed.key.length, 'sha256')
  return timingSafeEqual(candidate, parsed.key)
}
