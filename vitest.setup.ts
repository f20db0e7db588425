import logger from './logger'

logger.setEnabled(false)
