import type { Entry } from './types'

export class ReplyFormatter {
  static formatAdded(key: string, value: string): string {
    return `Added key '${key}' with value '${value}'\n`
  }

  static formatRemoved(key: string): string {
    return `Removed key '${key}'.\n`
  }

  // No trailing newline, matching a bare GET value
  static formatNotFound(key: string): string {
    return `Key '${key}' not found.`
  }

  static formatListing(entries: Entry[]): string {
    if (entries.length === 0) {
      return 'Store is empty.\n'
    }
    return entries
      .map(({ key, value }) => `[KEY]: ${key}\t[VALUE]: ${value}\n`)
      .join('')
  }

  static formatError(message: string): string {
    return `ERROR: ${message}\n`
  }

  static formatUnknownCommand(token: string): string {
    return this.formatError(`Unknown command '${token}'`)
  }
}
