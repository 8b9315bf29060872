import type { CliCommand } from '../registry'
import { convertCommand } from './convert'
import { mergeCommand } from './merge'
import { normalizeCommand } from './normalize'
import { sourcesCommand } from './sources'

export const builtinCommands: CliCommand[] = [mergeCommand, normalizeCommand, convertCommand, sourcesCommand]
