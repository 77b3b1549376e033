import { knowledgeCommands } from './knowledge.js'
import { historyCommands } from './history.js'
import { accountCommands } from './accounts.js'
import { adminCommands } from './admin.js'
import { transferCommands } from './transfer.js'
import type { Command } from './types.js'

export type { Command, CommandContext, CommandResult, OptionSpec, OptionValues } from './types.js'

export const COMMANDS: Command[] = [
  ...knowledgeCommands,
  ...historyCommands,
  ...accountCommands,
  ...adminCommands,
  ...transferCommands,
]

export function findCommand(name: string): Command | undefined {
  return COMMANDS.find((command) => command.name === name)
}
