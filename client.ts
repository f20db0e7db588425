import * as net from 'net'
import { QUIT_COMMAND } from './constants'
import logger from './logger'

type Waiter = (reply: string | null) => void

/**
 * Line client for the store. Replies are unframed, so each chunk the
 * socket delivers is taken as one reply.
 */
export class KeyValueClient {
  private socket: net.Socket | null = null
  private replies: string[] = []
  private waiters: Waiter[] = []
  private closed = false

  constructor(
    readonly host: string,
    readonly port: number,
  ) {}

  get isConnected(): boolean {
    return this.socket !== null && !this.closed
  }

  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host: this.host, port: this.port })
      const onConnectError = (error: Error) => {
        reject(error)
      }
      socket.once('error', onConnectError)
      socket.once('connect', () => {
        socket.off('error', onConnectError)
        socket.on('error', (error) => {
          logger.error('Connection error:', error)
        })
        logger.info(`Connected to server at ${this.host}:${this.port}`)
        resolve()
      })
      socket.on('data', (data: Buffer) => {
        this.push(data.toString('utf8'))
      })
      socket.on('close', () => {
        this.closed = true
        for (const waiter of this.waiters.splice(0)) {
          waiter(null)
        }
      })
      this.socket = socket
    })
  }

  private push(reply: string) {
    const waiter = this.waiters.shift()
    if (waiter) {
      waiter(reply)
    } else {
      this.replies.push(reply)
    }
  }

  send(line: string): Promise<void> {
    const socket = this.socket
    if (socket === null || this.closed) {
      return Promise.reject(new Error('Not connected'))
    }
    return new Promise((resolve, reject) => {
      socket.write(line, (error) => {
        if (error) {
          reject(error)
        } else {
          resolve()
        }
      })
    })
  }

  /**
   * Wait for the next reply
   * @returns null once the server has closed the connection
   */
  receive(): Promise<string | null> {
    const reply = this.replies.shift()
    if (reply !== undefined) {
      return Promise.resolve(reply)
    }
    if (this.closed) {
      return Promise.resolve(null)
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve)
    })
  }

  /**
   * Send a command and wait for its reply. `quit` gets no reply, so the
   * connection is closed instead.
   */
  async request(line: string): Promise<string | null> {
    await this.send(line)
    if (line.trim().toLowerCase() === QUIT_COMMAND) {
      this.close()
      return null
    }
    return this.receive()
  }

  close() {
    this.socket?.end()
  }
}
