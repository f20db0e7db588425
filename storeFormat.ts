import { FIELD_DELIMITER, LINE_TERMINATOR } from './constants'
import type { Entry } from './types'

/**
 * Serialize entries as `key<TAB>value` lines, one per entry.
 * Nothing is escaped, so a key holding a tab or newline will not read back intact.
 */
export function encodeEntries(entries: Iterable<Entry>): string {
  let output = ''
  for (const { key, value } of entries) {
    output += `${key}${FIELD_DELIMITER}${value}${LINE_TERMINATOR}`
  }
  return output
}

/**
 * Parse one stored line. The split happens on the first tab only, so any
 * further tabs stay in the value. Blank lines and lines without a tab
 * yield null.
 */
export function decodeLine(line: string): Entry | null {
  const trimmed = line.trim()
  if (!trimmed) {
    return null
  }
  const index = trimmed.indexOf(FIELD_DELIMITER)
  if (index === -1) {
    return null
  }
  return {
    key: trimmed.slice(0, index),
    value: trimmed.slice(index + FIELD_DELIMITER.length),
  }
}

export function decodeEntries(content: string): Entry[] {
  const entries: Entry[] = []
  for (const line of content.split(LINE_TERMINATOR)) {
    const entry = decodeLine(line)
    if (entry) {
      entries.push(entry)
    }
  }
  return entries
}
