export const DEFAULTS = {
  HOST: '0.0.0.0',
  PORT: 3490,
  FILE_PATH: 'store.txt',
  BACKLOG: 10,
  MAX_READ_BYTES: 1024,
} as const

export const FIELD_DELIMITER = '\t'
export const LINE_TERMINATOR = '\n'

export const QUIT_COMMAND = 'quit'

export const VERBS = ['SET', 'GET', 'REMOVE', 'PRINT'] as const

// Token counts include the verb itself
export const ARITY = {
  SET: 3,
  GET: 2,
  REMOVE: 2,
} as const
