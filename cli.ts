import { createInterface } from 'readline'
import { KeyValueClient } from './client'
import { loadConfig } from './config'
import { QUIT_COMMAND } from './constants'
import logger from './logger'

const { port } = loadConfig()
const host = 'localhost'

const client = new KeyValueClient(host, port)
const rl = createInterface({
  input: process.stdin,
  output: process.stdout,
  prompt: "Enter command (or 'quit' to exit): ",
})

rl.on('line', (line) => {
  client
    .request(line)
    .then((response) => {
      if (line.trim().toLowerCase() === QUIT_COMMAND) {
        console.log('Exiting client.')
        rl.close()
        return
      }
      if (response === null) {
        console.log('Server disconnected.')
        rl.close()
        return
      }
      console.log(`Response: ${response}`)
      rl.prompt()
    })
    .catch((error: unknown) => {
      logger.error('Error sending message:', error)
      rl.close()
    })
})

rl.on('close', () => {
  client.close()
  process.exit()
})

client
  .connect()
  .then(() => rl.prompt())
  .catch((error: unknown) => {
    logger.error('Failed to connect to server:', error)
    process.exitCode = 1
    rl.close()
  })
