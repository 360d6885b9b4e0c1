export * from './log.js'
export * from './errors.js'
export * from './catalog.js'
export * from './defaultcatalog.js'
export * from './catalogcodec.js'
