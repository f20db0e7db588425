export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export type Verb = 'SET' | 'GET' | 'REMOVE' | 'PRINT'

export type Command =
  | { verb: 'SET'; key: string; value: string }
  | { verb: 'GET'; key: string }
  | { verb: 'REMOVE'; key: string }
  | { verb: 'PRINT' }

// Both variants carry the text sent back to the peer; `ok` only tells
// protocol errors apart from served commands.
export type CommandResult = { ok: true; reply: string } | { ok: false; reply: string }

export type Entry = {
  key: string
  value: string
}

export type SessionState = 'AWAIT_LINE' | 'DISPATCH' | 'TERMINATED'

export type ServerOptions = {
  host: string
  port: number
  backlog: number
  maxReadBytes: number
}

export type StoreOptions = {
  filePath: string
}

export type Config = ServerOptions & StoreOptions
