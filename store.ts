import { DEFAULTS } from './constants'
import { FileReader } from './fileReader'
import { Lock } from './lock'
import logger from './logger'
import { ReplyFormatter } from './replyFormatter'
import { decodeEntries, encodeEntries } from './storeFormat'
import type { Entry, StoreOptions } from './types'

/**
 * In-memory key-value mapping mirrored to a flat file.
 *
 * Every public operation runs inside one exclusive lock, persistence
 * included, so mutations are totally ordered across all connections and
 * nobody observes a half-applied change. Each mutation rewrites the whole
 * file before its confirmation is returned.
 */
export class KeyValueStore {
  private readonly entries = new Map<string, string>()
  private readonly lock = new Lock()
  private readonly file: FileReader

  constructor(options: Partial<StoreOptions> = {}) {
    this.file = new FileReader(options.filePath ?? DEFAULTS.FILE_PATH)
  }

  /**
   * Create a store and populate it from its file
   */
  static async open(options: Partial<StoreOptions> = {}): Promise<KeyValueStore> {
    const store = new KeyValueStore(options)
    await store.load()
    return store
  }

  get filePath(): string {
    return this.file.filePath
  }

  get size(): number {
    return this.entries.size
  }

  /**
   * Merge the file's entries into memory. A missing file is an empty store;
   * malformed lines are skipped. Read failures are logged and the store
   * keeps whatever it already holds.
   */
  async load(): Promise<void> {
    await this.lock.runExclusive(async () => {
      const result = await this.file.readText()
      if (!result.ok) {
        logger.error(`[Store] Error loading data from ${this.filePath}:`, result.error)
        return
      }
      if (result.value === null) {
        return
      }
      for (const { key, value } of decodeEntries(result.value)) {
        this.entries.set(key, value)
      }
      logger.info(`[Store] Loaded ${this.entries.size} entries from ${this.filePath}`)
    })
  }

  async set(key: string, value: string): Promise<string> {
    return this.lock.runExclusive(async () => {
      logger.debug(`Setting key '${key}' to value '${value}'`)
      this.entries.set(key, value)
      await this.save()
      return ReplyFormatter.formatAdded(key, value)
    })
  }

  async get(key: string): Promise<string> {
    return this.lock.runExclusive(() => {
      const value = this.entries.get(key)
      return value === undefined ? ReplyFormatter.formatNotFound(key) : value
    })
  }

  async remove(key: string): Promise<string> {
    return this.lock.runExclusive(async () => {
      if (!this.entries.delete(key)) {
        return ReplyFormatter.formatNotFound(key)
      }
      await this.save()
      return ReplyFormatter.formatRemoved(key)
    })
  }

  async print(): Promise<string> {
    return this.lock.runExclusive(() => ReplyFormatter.formatListing(this.snapshot()))
  }

  /**
   * Copy of every entry in insertion order
   */
  async list(): Promise<Entry[]> {
    return this.lock.runExclusive(() => this.snapshot())
  }

  private snapshot(): Entry[] {
    return Array.from(this.entries, ([key, value]) => ({ key, value }))
  }

  // Only called while a mutation holds the lock. A failed write is logged
  // and the mutation is still confirmed to the caller.
  private async save(): Promise<void> {
    const result = await this.file.writeText(encodeEntries(this.snapshot()))
    if (!result.ok) {
      logger.error(`[Store] Error saving data to ${this.filePath}:`, result.error)
    }
  }
}
