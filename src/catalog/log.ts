import Debug from 'debug'
import { format } from 'util'
import winston, { Logger as WinstonLogger } from 'winston'
import Transport from 'winston-transport'
export enum LogLevelEnum {
  debug = 'debug',
  verbose = 'verbose',
  info = 'info',
  warn = 'warn',
  error = 'error',
}
const debug = Debug('logger')

interface IlogRecord {
  level?: string
  label?: string
  prefix?: string
  timestamp?: string
  message?: unknown
}

export function isLogLevel(level: string): level is LogLevelEnum {
  return (Object.values(LogLevelEnum) as string[]).includes(level)
}

function isTestRun(): boolean {
  return process.env['VITEST_WORKER_ID'] !== undefined
}

function formatRecord(record: IlogRecord): string {
  const label = record.label ?? record.prefix ?? ''
  return `${record.level ?? ''}${label ? ' ' + label : ''}: ${String(record.message ?? '')}`
}

class DebugTransport extends Transport {
  constructor() {
    super()
  }
  // Winston transport contract: log(info, next)
  override log(info: IlogRecord, next?: () => void) {
    setImmediate(() => {
      debug(formatRecord(info))
      this.emit('logged', info)
    })
    if (next) next()
  }
}

/** Records go to debug() under the test runner and to stderr otherwise */
export function createTransport(testRun: boolean = isTestRun()): Transport {
  return testRun ? new DebugTransport() : new winston.transports.Console({ stderrLevels: Object.values(LogLevelEnum) })
}

/* Under the test runner records go to debug() (quiet unless DEBUG includes 'logger'),
 * otherwise to stderr so they never interleave with the menu on stdout.
 * Logger makes it easy to set a source file specific prefix.
 */
export class Logger {
  private static level: LogLevelEnum = LogLevelEnum.info
  private static loggers: Logger[] = []
  private logger: WinstonLogger

  constructor(private prefix: string) {
    const commonLabel = winston.format.label({ label: this.prefix })
    const logFormat = isTestRun()
      ? winston.format.combine(
          commonLabel,
          winston.format.printf((info) => formatRecord(info as IlogRecord))
        )
      : winston.format.combine(
          winston.format.timestamp(),
          commonLabel,
          winston.format.printf((info) => {
            const record = info as IlogRecord
            return `${record.timestamp ?? ''} ${formatRecord(record)}`
          })
        )
    this.logger = winston.createLogger({
      level: Logger.level,
      format: logFormat,
      transports: [createTransport()],
    })
    Logger.loggers.push(this)
  }

  static setLevel(level: LogLevelEnum): void {
    Logger.level = level
    Logger.loggers.forEach((l) => {
      l.logger.level = level
    })
  }

  static getLevel(): LogLevelEnum {
    return Logger.level
  }

  log(level: LogLevelEnum, message: unknown, ...args: unknown[]) {
    const msg = format(message, ...args)
    this.logger.log({ level: level, message: msg, prefix: this.prefix })
  }
}
