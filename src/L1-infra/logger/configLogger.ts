import logger, { setVerbose } from './logger.js'
import { envFlag } from '../config/environment.js'

export { sanitizeForLog, setVerbose } from './logger.js'

// Debug output before the CLI has parsed -v (config loading, .env discovery)
if (envFlag('AUGMENTS_DEBUG')) {
  setVerbose()
}

export default logger
