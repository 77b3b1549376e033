/**
 * Accounts: local users, salted password hashes, admin-gated transitions.
 */

export { AccountService, requireActiveAdmin } from './service.js'
export type { AccountServiceOptions } from './service.js'
export { UserRepository, rowToUser, USER_COLUMNS } from './repository.js'
export type { UserRow, InsertUserInput } from './repository.js'
export {
  hashPassword,
  verifyPassword,
  isStoredPasswordHash,
  DEFAULT_HASH_ITERATIONS,
  MAX_HASH_ITERATIONS,
  UNUSABLE_PASSWORD_HASH,
} from './password.js'
export { UsernameSchema, PasswordSchema, RegisterInputSchema, UserSchema } from './schemas.js'
export type { RegisterInput, User } from './schemas.js'
