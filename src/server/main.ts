#!/usr/bin/env node
import { LibraryCli } from './library.js'
import { LogLevelEnum, Logger, errorMessage } from '../catalog/index.js'

const log = new Logger('main')

process.on('unhandledRejection', (reason) => {
  log.log(LogLevelEnum.error, 'Unhandled Rejection, reason: ' + errorMessage(reason))
})

new LibraryCli()
  .run(process.argv)
  .then((code) => {
    process.exitCode = code
  })
  .catch((e: unknown) => {
    log.log(LogLevelEnum.error, errorMessage(e))
    process.exitCode = 2
  })
