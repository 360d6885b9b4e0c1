import { it, expect, describe } from 'vitest'
import { defaultCatalog, isCatalogError } from '../../src/catalog/index.js'
import { CatalogErrorKind } from '../../src/shared/catalog/index.js'
import { Lending } from '../../src/server/lending.js'
import { MemoryPersistence } from '../testhelper.js'

describe('Lending', () => {
  it('load: takes the catalog from the persistence', () => {
    const catalog = defaultCatalog()
    const lending = Lending.load(new MemoryPersistence(catalog))
    expect(lending.catalog).toBe(catalog)
  })

  it('saves after every successful borrow and return', () => {
    const persistence = new MemoryPersistence(defaultCatalog())
    const lending = Lending.load(persistence)
    lending.borrow('The Hobbit')
    expect(persistence.writes).toBe(1)
    expect(persistence.stored?.findByTitle('The Hobbit')?.borrowedCopies).toBe(1)
    lending.returnBook('The Hobbit')
    expect(persistence.writes).toBe(2)
    expect(persistence.stored?.equals(defaultCatalog())).toBe(true)
  })

  it('does not save when the operation fails', () => {
    const persistence = new MemoryPersistence(defaultCatalog())
    const lending = Lending.load(persistence)
    expect(() => lending.returnBook('The Hobbit')).toThrow('All copies are already in the library')
    expect(() => lending.borrow('Dune')).toThrow('Book not found')
    expect(persistence.writes).toBe(0)
  })

  it('surfaces a failed save as IOError and keeps the change in memory', () => {
    const persistence = new MemoryPersistence(defaultCatalog())
    persistence.failWith = 'disk full'
    const lending = Lending.load(persistence)
    let error: unknown
    try {
      lending.borrow('1984')
    } catch (e) {
      error = e
    }
    expect(isCatalogError(error, CatalogErrorKind.IOError)).toBe(true)
    expect(lending.catalog.findByTitle('1984')?.borrowedCopies).toBe(1)
  })
})
