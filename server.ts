import * as net from 'net'
import { DEFAULTS } from './constants'
import { ServerSetupError } from './errors'
import CommandInterpreter from './interpreter'
import logger from './logger'
import { Session } from './session'
import type { KeyValueStore } from './store'
import type { ServerOptions } from './types'

const describePeer = (connection: net.Socket) =>
  `${connection.remoteAddress ?? 'unknown'}:${connection.remotePort ?? '?'}`

export default class KeyValueServer {
  readonly options: ServerOptions
  readonly interpreter: CommandInterpreter
  server: net.Server
  private sessions = new Set<Session>()

  constructor(store: KeyValueStore, options: Partial<ServerOptions> = {}) {
    this.options = {
      host: options.host ?? DEFAULTS.HOST,
      port: options.port ?? DEFAULTS.PORT,
      backlog: options.backlog ?? DEFAULTS.BACKLOG,
      maxReadBytes: options.maxReadBytes ?? DEFAULTS.MAX_READ_BYTES,
    }
    this.interpreter = new CommandInterpreter(store)
    this.server = net.createServer((connection: net.Socket) => {
      this.accept(connection)
    })
  }

  get isRunning(): boolean {
    return this.server.listening
  }

  get activeSessions(): number {
    return this.sessions.size
  }

  /**
   * The bound address, once listening. Useful when started on port 0.
   */
  get address(): net.AddressInfo | null {
    const address = this.server.address()
    return address !== null && typeof address === 'object' ? address : null
  }

  // Runs a session per connection without waiting on it
  private accept(connection: net.Socket) {
    const session = new Session(connection, this.interpreter, {
      peer: describePeer(connection),
      maxReadBytes: this.options.maxReadBytes,
    })
    this.sessions.add(session)
    void session
      .run()
      .catch((error: unknown) => {
        logger.error(`Session ${session.peer} failed:`, error)
      })
      .finally(() => {
        this.sessions.delete(session)
      })
  }

  /**
   * Bind and start accepting connections
   * @throws {ServerSetupError} when the address cannot be bound
   */
  start(): Promise<net.AddressInfo> {
    const { host, port, backlog } = this.options
    return new Promise((resolve, reject) => {
      const onError = (error: Error) => {
        this.server.off('listening', onListening)
        logger.error(`Failed to setup server on ${host}:${port}:`, error)
        reject(new ServerSetupError(`Failed to setup server: ${error.message}`, error))
      }
      const onListening = () => {
        this.server.off('error', onError)
        this.server.on('error', (error) => {
          logger.error('Server error:', error)
        })
        const address = this.address
        if (address === null) {
          reject(new ServerSetupError('Server is listening without a TCP address'))
          return
        }
        logger.info(`Server listening on ${address.address}:${address.port}`)
        resolve(address)
      }
      this.server.once('error', onError)
      this.server.once('listening', onListening)
      try {
        this.server.listen({ host, port, backlog })
      } catch (error) {
        this.server.off('listening', onListening)
        this.server.off('error', onError)
        onError(error instanceof Error ? error : new Error(String(error)))
      }
    })
  }

  /**
   * Stop accepting connections and close the listening socket.
   * Sessions already running are left alone.
   */
  async stop(): Promise<void> {
    if (!this.server.listening) {
      return
    }
    // The close callback waits for every open connection to end, which
    // abandoned sessions may never do, so it is only used to report errors
    this.server.close((error) => {
      if (error) {
        logger.error('Error closing server:', error)
      }
    })
    logger.info('Server socket closed.')
  }
}
