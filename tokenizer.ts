const WHITESPACE = /\s+/

/**
 * Split a command line into whitespace-separated tokens.
 * Surrounding whitespace is ignored; an empty or blank line has no tokens.
 */
export function tokenize(input: string): string[] {
  const trimmed = input.trim()
  if (!trimmed) {
    return []
  }
  return trimmed.split(WHITESPACE)
}
