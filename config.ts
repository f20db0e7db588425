import { DEFAULTS } from './constants'
import logger from './logger'
import type { Config } from './types'

export const defaultConfig = (): Config => ({
  host: DEFAULTS.HOST,
  port: DEFAULTS.PORT,
  filePath: DEFAULTS.FILE_PATH,
  backlog: DEFAULTS.BACKLOG,
  maxReadBytes: DEFAULTS.MAX_READ_BYTES,
})

/**
 * Collect `--name value` pairs. Anything not starting with `--` in a
 * name position is skipped along with the token after it.
 */
export function parseFlags(args: string[]): Map<string, string> {
  const flags = new Map<string, string>()
  for (let i = 0; i < args.length; i += 2) {
    const name = args[i]
    const value = args[i + 1]
    if (name?.startsWith('--') && value !== undefined) {
      flags.set(name.slice(2), value)
    }
  }
  return flags
}

const parseInteger = (
  flag: string,
  raw: string,
  fallback: number,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
) => {
  const value = Number(raw)
  if (!raw.trim() || !Number.isInteger(value) || value < min || value > max) {
    logger.error(`Ignoring --${flag} ${raw}: expected an integer from ${min} to ${max}`)
    return fallback
  }
  return value
}

export function loadConfig(args: string[] = process.argv.slice(2)): Config {
  const config = defaultConfig()
  const flags = parseFlags(args)

  const host = flags.get('host')
  if (host) {
    config.host = host
  }
  const port = flags.get('port')
  if (port !== undefined) {
    config.port = parseInteger('port', port, config.port, 0, 65535)
  }
  const file = flags.get('file')
  if (file) {
    config.filePath = file
  }
  const backlog = flags.get('backlog')
  if (backlog !== undefined) {
    config.backlog = parseInteger('backlog', backlog, config.backlog, 1)
  }
  return config
}
