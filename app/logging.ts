// Log sink setup for command-line runs

import path from 'node:path'
import * as fs from 'fs'
import log from 'electron-log/node'

const LOG_FORMAT = '{y}-{m}-{d} {h}:{i}:{s} - {level} - {text}'

export interface LoggingOptions {
  logDir: string
  runStamp: string
  verbose?: boolean
}

/**
 * Route log output to the console and to logs/cleaning_pipeline_<stamp>.log
 */
export function configureLogging(options: LoggingOptions): string {
  fs.mkdirSync(options.logDir, { recursive: true })
  const logFile = path.resolve(options.logDir, `cleaning_pipeline_${options.runStamp}.log`)

  log.transports.file.resolvePathFn = () => logFile
  log.transports.file.format = LOG_FORMAT
  log.transports.file.level = options.verbose ? 'debug' : 'info'
  log.transports.console.format = LOG_FORMAT
  log.transports.console.level = options.verbose ? 'debug' : 'info'

  log.info(`Logging initialized: ${logFile}`)
  return logFile
}

/**
 * Keep stdout clean for machine-readable output
 */
export function consoleErrorsOnly(): void {
  log.transports.console.level = 'error'
  log.transports.file.level = false
}
