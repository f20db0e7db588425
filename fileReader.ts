import { readFile, writeFile } from 'fs/promises'
import type { Result } from './types'

const isMissingFile = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT'

const toError = (error: unknown) =>
  error instanceof Error ? error : new Error(String(error))

export class FileReader {
  constructor(readonly filePath: string) {}

  /**
   * Read the whole file as UTF-8 text
   * @returns null as the value when the file does not exist
   */
  async readText(): Promise<Result<string | null>> {
    try {
      return { ok: true, value: await readFile(this.filePath, 'utf8') }
    } catch (error) {
      if (isMissingFile(error)) {
        return { ok: true, value: null }
      }
      return { ok: false, error: toError(error) }
    }
  }

  // Truncates and rewrites; a crash mid-write can leave a partial file
  async writeText(content: string): Promise<Result<void>> {
    try {
      await writeFile(this.filePath, content, 'utf8')
      return { ok: true, value: undefined }
    } catch (error) {
      return { ok: false, error: toError(error) }
    }
  }
}
