import { KnowledgeBaseError, Ok, Err } from '@offline-kb/core'
import type { Result } from '@offline-kb/core'
import { userLine } from '../format.js'
import { ACTOR_OPTIONS, authenticateActor, done, flag, optionalActor, positional, stringOption } from './types.js'
import type { Command, CommandContext, CommandResult } from './types.js'

type Transition = 'promote' | 'demote' | 'activate' | 'deactivate'

function transitionCommand(action: Transition, summary: string, pastTense: string): Command {
  return {
    name: `${action}-user`,
    usage: `${action}-user <username> --actor <admin> --actor-password <pw>`,
    summary,
    options: ACTOR_OPTIONS,
    run(ctx) {
      const username = positional(ctx, 0, 'username')
      if (!username.ok) return username
      const actor = authenticateActor(ctx)
      if (!actor.ok) return actor

      const result = ctx.services.accounts[action](username.value, actor.value)
      if (!result.ok) return result
      ctx.out(`${pastTense} ${result.value.username}`)
      return done()
    },
  }
}

function requiredOption(ctx: CommandContext, name: string): Result<string, KnowledgeBaseError> {
  const value = stringOption(ctx.values, name)
  if (value === undefined) return Err(KnowledgeBaseError.validation(`Missing --${name}`))
  return Ok(value)
}

function register(ctx: CommandContext): CommandResult {
  const username = positional(ctx, 0, 'username')
  if (!username.ok) return username
  const password = requiredOption(ctx, 'password')
  if (!password.ok) return password

  const actor = optionalActor(ctx)
  if (!actor.ok) return actor

  const user = ctx.services.accounts.register({
    username: username.value,
    password: password.value,
    isAdmin: flag(ctx.values, 'admin'),
    ...(actor.value !== undefined ? { actor: actor.value } : {}),
  })
  if (!user.ok) return user
  ctx.out(`Registered ${userLine(user.value)}`)
  return done()
}

export const accountCommands: Command[] = [
  {
    name: 'register-user',
    usage: 'register-user <username> --password <pw> [--admin] [--actor <admin> --actor-password <pw>]',
    summary: 'Create a local account (admins need an admin actor once any user exists)',
    options: { password: { type: 'string' }, admin: { type: 'boolean' }, ...ACTOR_OPTIONS },
    run: register,
  },
  {
    name: 'list-users',
    usage: 'list-users',
    summary: 'List accounts with role and status',
    run(ctx) {
      const users = ctx.services.accounts.list()
      if (!users.ok) return users
      if (users.value.length === 0) ctx.out('No users.')
      for (const user of users.value) ctx.out(userLine(user))
      return done()
    },
  },
  transitionCommand('promote', 'Grant administrator rights', 'Promoted'),
  transitionCommand('demote', 'Revoke administrator rights', 'Demoted'),
  transitionCommand('activate', 'Re-enable a deactivated account', 'Activated'),
  transitionCommand('deactivate', 'Disable an account', 'Deactivated'),
  {
    name: 'reset-password',
    usage: 'reset-password <username> --new-password <pw> --actor <admin> --actor-password <pw>',
    summary: "Set another user's password",
    options: { 'new-password': { type: 'string' }, ...ACTOR_OPTIONS },
    run(ctx) {
      const username = positional(ctx, 0, 'username')
      if (!username.ok) return username
      const password = requiredOption(ctx, 'new-password')
      if (!password.ok) return password
      const actor = authenticateActor(ctx)
      if (!actor.ok) return actor

      const user = ctx.services.accounts.resetPassword(username.value, password.value, actor.value)
      if (!user.ok) return user
      ctx.out(`Password reset for ${user.value.username}`)
      return done()
    },
  },
  {
    name: 'change-password',
    usage: 'change-password <username> --password <current> --new-password <pw>',
    summary: 'Change your own password',
    options: { password: { type: 'string' }, 'new-password': { type: 'string' } },
    run(ctx) {
      const username = positional(ctx, 0, 'username')
      if (!username.ok) return username
      const current = requiredOption(ctx, 'password')
      if (!current.ok) return current
      const next = requiredOption(ctx, 'new-password')
      if (!next.ok) return next

      const user = ctx.services.accounts.changePassword(username.value, current.value, next.value)
      if (!user.ok) return user
      ctx.out(`Password changed for ${user.value.username}`)
      return done()
    },
  },
]
