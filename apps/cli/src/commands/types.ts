import type { ParseArgsConfig } from 'node:util'
import { Ok, Err, KnowledgeBaseError } from '@offline-kb/core'
import type { Result, Services } from '@offline-kb/core'

export type OptionSpec = NonNullable<ParseArgsConfig['options']>
export type OptionValues = Record<string, string | boolean | Array<string | boolean> | undefined>

export type CommandResult = Result<void, KnowledgeBaseError>

export interface CommandContext {
  services: Services
  positionals: string[]
  values: OptionValues
  out: (line: string) => void
}

export interface Command {
  name: string
  usage: string
  summary: string
  options?: OptionSpec
  run(ctx: CommandContext): CommandResult | Promise<CommandResult>
}

export const ACTOR_OPTIONS: OptionSpec = {
  actor: { type: 'string' },
  'actor-password': { type: 'string' },
}

export const TAG_OPTION: OptionSpec = {
  tag: { type: 'string', multiple: true },
}

export function stringOption(values: OptionValues, name: string): string | undefined {
  const value = values[name]
  return typeof value === 'string' ? value : undefined
}

export function stringList(values: OptionValues, name: string): string[] {
  const value = values[name]
  if (typeof value === 'string') return [value]
  if (Array.isArray(value)) return value.filter((item): item is string => typeof item === 'string')
  return []
}

export function flag(values: OptionValues, name: string): boolean {
  return values[name] === true
}

export function positional(ctx: CommandContext, index: number, label: string): Result<string, KnowledgeBaseError> {
  const value = ctx.positionals[index]
  if (value === undefined || value.trim() === '') {
    return Err(KnowledgeBaseError.validation(`Missing <${label}>`))
  }
  return Ok(value)
}

export function parseId(raw: string): Result<number, KnowledgeBaseError> {
  const id = Number(raw)
  if (!/^-?\d+$/.test(raw.trim()) || !Number.isSafeInteger(id)) {
    return Err(KnowledgeBaseError.validation(`Not a valid id: ${raw}`))
  }
  return Ok(id)
}

export function idArgument(ctx: CommandContext): Result<number, KnowledgeBaseError> {
  const raw = positional(ctx, 0, 'id')
  if (!raw.ok) return raw
  return parseId(raw.value)
}

/** Reads an optional non-negative integer option. */
export function integerOption(values: OptionValues, name: string): Result<number | undefined, KnowledgeBaseError> {
  const raw = stringOption(values, name)
  if (raw === undefined) return Ok(undefined)
  const value = Number(raw)
  if (!Number.isInteger(value) || value < 0) {
    return Err(KnowledgeBaseError.validation(`--${name} must be a non-negative integer`))
  }
  return Ok(value)
}

/**
 * Checks --actor / --actor-password and returns the actor's username.
 * Whether the actor may perform the operation is left to the service.
 */
export function authenticateActor(ctx: CommandContext): Result<string, KnowledgeBaseError> {
  const actor = stringOption(ctx.values, 'actor')
  const password = stringOption(ctx.values, 'actor-password')
  if (actor === undefined || password === undefined) {
    return Err(KnowledgeBaseError.validation('This command needs --actor and --actor-password'))
  }

  const user = ctx.services.accounts.authenticate(actor, password)
  if (!user.ok) return user
  return Ok(user.value.username)
}

/** Like authenticateActor, but only when --actor was given. */
export function optionalActor(ctx: CommandContext): Result<string | undefined, KnowledgeBaseError> {
  if (stringOption(ctx.values, 'actor') === undefined) return Ok(undefined)
  return authenticateActor(ctx)
}

export function done(): CommandResult {
  return Ok(undefined)
}
