import type { Ibook } from '../shared/catalog/index.js'
import type { Catalog } from '../catalog/index.js'
import type { ISingletonPersistence } from './persistence/persistence.js'

/**
 * Owns the catalog of one run and saves it after every successful change.
 * A failed save throws CatalogError(IOError); the change itself stays applied in memory.
 */
export class Lending {
  constructor(
    readonly catalog: Catalog,
    private persistence: ISingletonPersistence<Catalog>
  ) {}

  static load(persistence: ISingletonPersistence<Catalog>): Lending {
    return new Lending(persistence.read(), persistence)
  }

  borrow(title: string): Ibook {
    const book = this.catalog.borrow(title)
    this.persistence.write(this.catalog)
    return book
  }

  returnBook(title: string): Ibook {
    const book = this.catalog.returnBook(title)
    this.persistence.write(this.catalog)
    return book
  }
}
