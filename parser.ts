import { ARITY, VERBS } from './constants'
import { ReplyFormatter } from './replyFormatter'
import type { Command, Result, Verb } from './types'

const isVerb = (name: string): name is Verb =>
  VERBS.some((verb) => verb === name)

const ARITY_ERRORS = {
  SET: 'SET command requires 2 arguments: key and value',
  GET: 'GET command requires 1 argument: key',
  REMOVE: 'REMOVE command requires 1 argument: key',
} as const

/**
 * Turn tokens into a command. Verbs match case-insensitively and arity is
 * checked here, so the error carries the reply text for the peer.
 */
export function parse(tokens: string[]): Result<Command, string> {
  const [name, ...args] = tokens
  if (name === undefined) {
    return { ok: false, error: ReplyFormatter.formatError('Empty command') }
  }

  const verb = name.toUpperCase()
  if (!isVerb(verb)) {
    return { ok: false, error: ReplyFormatter.formatUnknownCommand(name) }
  }

  switch (verb) {
    case 'SET': {
      const [key, value] = args
      if (tokens.length !== ARITY.SET || key === undefined || value === undefined) {
        return { ok: false, error: ReplyFormatter.formatError(ARITY_ERRORS.SET) }
      }
      return { ok: true, value: { verb, key, value } }
    }
    case 'GET':
    case 'REMOVE': {
      const [key] = args
      if (tokens.length !== ARITY[verb] || key === undefined) {
        return { ok: false, error: ReplyFormatter.formatError(ARITY_ERRORS[verb]) }
      }
      return { ok: true, value: { verb, key } }
    }
    case 'PRINT':
      // Extra tokens after PRINT are ignored
      return { ok: true, value: { verb } }
  }
}
