import { join } from 'path'
import { LogLevelEnum, isLogLevel } from '../catalog/index.js'

declare global {
  namespace NodeJS {
    interface ProcessEnv {
      LIBRARY_DATA_DIR?: string
      LIBRARY_FILE?: string
      LIBRARY_LOG_LEVEL?: string
    }
  }
}

export const DEFAULT_DATA_DIR = '.'
export const DEFAULT_FILE_NAME = 'library.yaml'

// Options as commander hands them over
export type IlibraryOptions = {
  data?: string
  file?: string
  logLevel?: string
}

export interface IlibraryConfig {
  dataDir: string
  fileName: string
  dataFile: string
  logLevel: LogLevelEnum
}

/**
 * Command line options win over environment variables, which win over defaults.
 */
export function resolveConfig(options: IlibraryOptions, env: NodeJS.ProcessEnv = process.env): IlibraryConfig {
  const dataDir = options.data || env.LIBRARY_DATA_DIR || DEFAULT_DATA_DIR
  const fileName = options.file || env.LIBRARY_FILE || DEFAULT_FILE_NAME
  const level = options.logLevel || env.LIBRARY_LOG_LEVEL || LogLevelEnum.info
  if (!isLogLevel(level)) {
    throw new Error(`Unknown log level "${level}", expected one of ${Object.values(LogLevelEnum).join(', ')}`)
  }
  return { dataDir, fileName, dataFile: join(dataDir, fileName), logLevel: level }
}
