import { mkdtempSync, rmSync } from 'fs'
import os from 'os'
import { join } from 'path'
import { Duplex } from 'stream'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import CommandInterpreter from './interpreter'
import { Session, splitReads } from './session'
import { KeyValueStore } from './store'

type FakePeer = {
  stream: Duplex
  written: string[]
  send: (data: string | Buffer) => Promise<void>
}

// In-memory stand-in for a client socket: pushed data is what the peer
// sends, written chunks are the replies it receives
const createPeer = (failWrites = false): FakePeer => {
  const written: string[] = []
  const stream = new Duplex({
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      if (failWrites) {
        callback(new Error('connection reset'))
        return
      }
      written.push(chunk.toString())
      callback()
    },
  })
  const send = async (data: string | Buffer) => {
    const before = written.length
    stream.push(data)
    await vi.waitFor(() => {
      expect(written.length).toBeGreaterThan(before)
    })
  }
  return { stream, written, send }
}

describe('splitReads', () => {
  it('should return the chunk as is when within the limit', () => {
    expect(splitReads(Buffer.from('GET a'), 1024).map(String)).toEqual(['GET a'])
  })

  it('should cut a long chunk into bounded pieces', () => {
    expect(splitReads(Buffer.from('abcdefg'), 3).map(String)).toEqual(['abc', 'def', 'g'])
  })
})

describe('Session', () => {
  let tempDir: string
  let store: KeyValueStore
  let interpreter: CommandInterpreter

  beforeEach(async () => {
    tempDir = mkdtempSync(join(os.tmpdir(), 'tabkv-session-'))
    store = await KeyValueStore.open({ filePath: join(tempDir, 'store.txt') })
    interpreter = new CommandInterpreter(store)
  })

  afterEach(() => {
    vi.restoreAllMocks()
    rmSync(tempDir, { recursive: true, force: true })
  })

  it('should start waiting for a line', () => {
    const { stream } = createPeer()
    const session = new Session(stream, interpreter, { peer: 'test' })

    expect(session.state).toBe('AWAIT_LINE')
  })

  it('should answer each line in order and return to waiting', async () => {
    const { stream, written, send } = createPeer()
    const session = new Session(stream, interpreter, { peer: 'test' })
    const done = session.run()

    await send('SET a 1')
    await send('GET a')
    await send('FOO bar')

    expect(written).toEqual(["Added key 'a' with value '1'\n", '1', "ERROR: Unknown command 'FOO'\n"])
    expect(session.state).toBe('AWAIT_LINE')

    stream.push(null)
    await done
  })

  it('should end without a reply when the peer closes', async () => {
    const { stream, written } = createPeer()
    const session = new Session(stream, interpreter, { peer: 'test' })
    const done = session.run()

    stream.push(null)
    await done

    expect(written).toEqual([])
    expect(session.state).toBe('TERMINATED')
    expect(stream.destroyed).toBe(true)
  })

  it('should close on quit without replying or touching the store', async () => {
    const spy = vi.spyOn(interpreter, 'execute')
    const { stream, written } = createPeer()
    const session = new Session(stream, interpreter, { peer: 'test' })
    const done = session.run()

    stream.push('  QuIt \n')
    await done

    expect(written).toEqual([])
    expect(spy).not.toHaveBeenCalled()
    expect(session.state).toBe('TERMINATED')
    expect(stream.destroyed).toBe(true)
  })

  it('should treat a line that only contains quit as a token as a command', async () => {
    const { stream, written, send } = createPeer()
    const session = new Session(stream, interpreter, { peer: 'test' })
    const done = session.run()

    await send('quit now')

    expect(written).toEqual(["ERROR: Unknown command 'quit'\n"])
    stream.push(null)
    await done
  })

  it('should process an oversized read as separate messages', async () => {
    const { stream, written } = createPeer()
    const session = new Session(stream, interpreter, { peer: 'test', maxReadBytes: 8 })
    const done = session.run()

    // 'SET a 12' fills the first read; '34' arrives as a message of its own
    stream.push('SET a 1234')
    await vi.waitFor(() => {
      expect(written).toHaveLength(2)
    })

    expect(written).toEqual(["Added key 'a' with value '12'\n", "ERROR: Unknown command '34'\n"])
    await expect(store.get('a')).resolves.toBe('12')

    stream.push(null)
    await done
  })

  it('should terminate on bytes that are not valid UTF-8', async () => {
    const { stream, written } = createPeer()
    const session = new Session(stream, interpreter, { peer: 'test' })
    const done = session.run()

    stream.push(Buffer.from([0xff, 0xfe, 0xfd]))
    await done

    expect(written).toEqual([])
    expect(session.state).toBe('TERMINATED')
    expect(stream.destroyed).toBe(true)
  })

  it('should terminate when a reply cannot be written', async () => {
    const { stream } = createPeer(true)
    const session = new Session(stream, interpreter, { peer: 'test' })
    const done = session.run()

    stream.push('SET a 1')
    await done

    expect(session.state).toBe('TERMINATED')
    expect(stream.destroyed).toBe(true)
    // The mutation went through before the write failed
    await expect(store.get('a')).resolves.toBe('1')
  })

  it('should destroy the socket exactly once', async () => {
    const { stream } = createPeer()
    const destroySpy = vi.spyOn(stream, 'destroy')
    const session = new Session(stream, interpreter, { peer: 'test' })
    const done = session.run()

    stream.push(null)
    await done

    expect(destroySpy).toHaveBeenCalledTimes(1)
  })
})
