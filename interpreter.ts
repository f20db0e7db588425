import logger from './logger'
import { parse } from './parser'
import type { KeyValueStore } from './store'
import { tokenize } from './tokenizer'
import type { Command, CommandResult } from './types'

/**
 * Executes single command lines against a shared store.
 * Holds no per-connection state, so one instance serves every session.
 */
export default class CommandInterpreter {
  constructor(private readonly store: KeyValueStore) {}

  private executeCommand(command: Command): Promise<string> {
    switch (command.verb) {
      case 'SET':
        return this.store.set(command.key, command.value)
      case 'GET':
        return this.store.get(command.key)
      case 'REMOVE':
        return this.store.remove(command.key)
      case 'PRINT':
        return this.store.print()
    }
  }

  /**
   * Interpret one raw line and run it
   * @returns The reply for the peer; protocol errors come back with `ok: false`
   */
  async execute(line: string): Promise<CommandResult> {
    const parsed = parse(tokenize(line))
    if (!parsed.ok) {
      logger.debug(`[Interpreter] Rejected '${line.trim()}': ${parsed.error.trim()}`)
      return { ok: false, reply: parsed.error }
    }
    const reply = await this.executeCommand(parsed.value)
    return { ok: true, reply }
  }
}
