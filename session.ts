import type { Duplex } from 'stream'
import { TextDecoder } from 'util'
import { DEFAULTS, QUIT_COMMAND } from './constants'
import type CommandInterpreter from './interpreter'
import logger from './logger'
import type { SessionState } from './types'

export type SessionOptions = {
  peer: string
  maxReadBytes: number
}

/**
 * Split a received chunk into reads of at most `size` bytes. A command
 * longer than one read is not reassembled: each piece is a message.
 */
export function splitReads(chunk: Buffer, size: number): Buffer[] {
  const reads: Buffer[] = []
  for (let offset = 0; offset < chunk.length; offset += size) {
    reads.push(chunk.subarray(offset, offset + size))
  }
  return reads
}

/**
 * Request/response loop for one connection.
 *
 * AWAIT_LINE -> DISPATCH -> AWAIT_LINE, until the peer closes, sends
 * `quit`, or an I/O error occurs; all three end in TERMINATED with the
 * socket closed exactly once. Errors never leave `run`.
 */
export class Session {
  state: SessionState = 'AWAIT_LINE'
  readonly peer: string
  private readonly maxReadBytes: number
  private readonly decoder = new TextDecoder('utf-8', { fatal: true })

  constructor(
    private readonly socket: Duplex,
    private readonly interpreter: CommandInterpreter,
    options: Partial<SessionOptions> = {},
  ) {
    this.peer = options.peer ?? 'unknown peer'
    this.maxReadBytes = options.maxReadBytes ?? DEFAULTS.MAX_READ_BYTES
    // Failures also surface through the read loop or a pending write
    this.socket.on('error', (error) => {
      logger.debug(`Socket error from ${this.peer}:`, error)
    })
  }

  async run(): Promise<void> {
    logger.info(`Connection from ${this.peer}`)
    try {
      await this.loop()
    } catch (error) {
      logger.error(`Error handling client ${this.peer}:`, error)
    } finally {
      this.terminate()
    }
  }

  private async loop(): Promise<void> {
    for await (const chunk of this.socket) {
      const data = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk))
      for (const read of splitReads(data, this.maxReadBytes)) {
        const message = this.decoder.decode(read).trim()
        logger.info(`Received from ${this.peer}: ${message}`)
        if (message.toLowerCase() === QUIT_COMMAND) {
          logger.info(`Client ${this.peer} requested to quit.`)
          return
        }
        await this.dispatch(message)
      }
    }
    logger.info(`Client ${this.peer} disconnected.`)
  }

  private async dispatch(message: string): Promise<void> {
    this.state = 'DISPATCH'
    const { reply } = await this.interpreter.execute(message)
    await this.write(reply)
    logger.info(`Response sent to ${this.peer}: ${reply.trim()}`)
    this.state = 'AWAIT_LINE'
  }

  private write(reply: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.write(reply, (error) => {
        if (error) {
          reject(error)
        } else {
          resolve()
        }
      })
    })
  }

  private terminate() {
    if (this.state === 'TERMINATED') {
      return
    }
    this.state = 'TERMINATED'
    if (!this.socket.destroyed) {
      this.socket.destroy()
    }
    logger.info(`Connection with ${this.peer} closed.`)
  }
}
