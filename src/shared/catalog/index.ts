export * from './types.js'
export * from './book.js'
