type LogMethod = (...message: unknown[]) => void

type Logger = {
  info: LogMethod
  debug: LogMethod
  error: LogMethod
  setEnabled: (enabled: boolean) => void
  isEnabled: () => boolean
}

let enabled = true

const format = (message: unknown[]) =>
  message
    .map((part) => (part instanceof Error ? part.message : String(part)))
    .join(' ')

const logger: Logger = {
  info: (...message) => {
    if (enabled) {
      console.info(format(message))
    }
  },
  debug: (...message) => {
    if (enabled) {
      console.debug(`[DEBUG] ${format(message)}`)
    }
  },
  error: (...message) => {
    if (enabled) {
      console.error(`[ERROR] ${format(message)}`)
    }
  },
  setEnabled: (value) => {
    enabled = value
  },
  isEnabled: () => enabled,
}

export default logger
