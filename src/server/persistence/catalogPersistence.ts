import * as fs from 'fs'
import * as path from 'path'
import Debug from 'debug'
import { CatalogErrorKind } from '../../shared/catalog/index.js'
import {
  Catalog,
  CatalogError,
  Logger,
  LogLevelEnum,
  defaultCatalog,
  errorMessage,
  parseCatalog,
  serializeCatalog,
} from '../../catalog/index.js'
import type { ISingletonPersistence } from './persistence.js'

const debug = Debug('catalogPersistence')
const log = new Logger('catalogPersistence')

export class CatalogPersistence implements ISingletonPersistence<Catalog> {
  constructor(private dataFile: string) {}

  /**
   * Loads the catalog. A missing or corrupted file is replaced by the default catalog,
   * an unreadable one is left alone and the default catalog is used for this run.
   */
  read(): Catalog {
    if (!fs.existsSync(this.dataFile)) {
      log.log(LogLevelEnum.info, 'No data file at ' + this.dataFile + ', creating the default catalog')
      return this.heal()
    }

    let src: string
    try {
      src = fs.readFileSync(this.dataFile, { encoding: 'utf8' })
    } catch (e: unknown) {
      const msg = errorMessage(e)
      log.log(LogLevelEnum.warn, `Could not read data file (${msg}). Using default catalog.`)
      return defaultCatalog()
    }

    const result = parseCatalog(src)
    if (!result.ok) {
      log.log(LogLevelEnum.warn, `Data file is corrupted (${result.reason}). Resetting to defaults.`)
      return this.heal()
    }
    if (result.migratedFrom !== undefined) {
      log.log(LogLevelEnum.info, 'Migrating data file from version ' + result.migratedFrom)
      this.writeOrWarn(result.catalog)
    }
    debug('read: ' + this.dataFile + ' books: ' + result.catalog.size)
    return result.catalog
  }

  write(catalog: Catalog): void {
    try {
      const dir = path.dirname(this.dataFile)
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true })
        debug('creating data path: ' + dir)
      }
      fs.writeFileSync(this.dataFile, serializeCatalog(catalog), { encoding: 'utf8' })
    } catch (e: unknown) {
      const msg = errorMessage(e)
      throw new CatalogError(CatalogErrorKind.IOError, this.dataFile, msg)
    }
    debug('write: ' + this.dataFile)
  }

  private heal(): Catalog {
    const catalog = defaultCatalog()
    this.writeOrWarn(catalog)
    return catalog
  }

  private writeOrWarn(catalog: Catalog): void {
    try {
      this.write(catalog)
    } catch (e: unknown) {
      const msg = errorMessage(e)
      log.log(LogLevelEnum.warn, 'Failed to write data file: ' + msg)
    }
  }
}
