import { it, expect, describe } from 'vitest'
import { parse } from 'yaml'
import { Catalog, type ParseResult, defaultCatalog, parseCatalog, serializeCatalog } from '../../src/catalog/index.js'

function reasonOf(result: ParseResult): string | undefined {
  return result.ok ? undefined : result.reason
}

function catalogYaml(books: string): string {
  return `version: "0.2"\nbooks:\n${books}`
}

describe('serializeCatalog', () => {
  it('writes a versioned YAML document with one entry per book', () => {
    const catalog = defaultCatalog()
    catalog.borrow('The Hobbit')
    const doc = parse(serializeCatalog(catalog))
    expect(doc.version).toBe('0.2')
    expect(doc.books).toHaveLength(5)
    expect(doc.books[4]).toEqual({
      id: 'B005',
      title: 'The Hobbit',
      author: 'J. R. R. Tolkien',
      total_copies: 2,
      borrowed_copies: 1,
    })
  })

  it('parseCatalog reads back what serializeCatalog wrote', () => {
    const catalog = new Catalog([
      { id: 'N1', title: '1984', author: 'George Orwell', totalCopies: 3, borrowedCopies: 2 },
      { id: 'N2', title: 'Colon: a "quoted" title', author: '', totalCopies: 1, borrowedCopies: 0 },
    ])
    const result = parseCatalog(serializeCatalog(catalog))
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.catalog.equals(catalog)).toBe(true)
      expect(result.migratedFrom).toBeUndefined()
    }
  })
})

describe('parseCatalog', () => {
  it('reads unquoted numeric titles as text', () => {
    const result = parseCatalog(
      catalogYaml('  - id: B001\n    title: 1984\n    author: George Orwell\n    total_copies: 3\n    borrowed_copies: 0\n')
    )
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.catalog.findByTitle('1984')?.totalCopies).toBe(3)
  })

  it('keeps numeric-looking ids and titles as written', () => {
    const result = parseCatalog(catalogYaml('  - id: 007\n    title: 0x1F\n    total_copies: 1\n    borrowed_copies: 0\n'))
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.catalog.books()).toEqual([{ id: '007', title: '0x1F', author: '', totalCopies: 1, borrowedCopies: 0 }])
      const reread = parseCatalog(serializeCatalog(result.catalog))
      expect(reread.ok && reread.catalog.equals(result.catalog)).toBe(true)
    }
  })

  it('migrates the unversioned JSON layout', () => {
    const legacy = JSON.stringify({
      books: [
        { id: 'B001', title: '1984', author: 'George Orwell', copies_total: 3, copies_available: 1 },
        { id: 'B002', title: 'Pride and Prejudice', author: 'Jane Austen', copies_total: 2, copies_available: 2 },
      ],
    })
    const result = parseCatalog(legacy)
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.migratedFrom).toBe('0.1')
      expect(result.catalog.books()).toEqual([
        { id: 'B001', title: '1984', author: 'George Orwell', totalCopies: 3, borrowedCopies: 2 },
        { id: 'B002', title: 'Pride and Prejudice', author: 'Jane Austen', totalCopies: 2, borrowedCopies: 0 },
      ])
    }
  })

  it('rejects legacy entries with more available than total copies', () => {
    const legacy = JSON.stringify({ books: [{ id: 'B001', title: '1984', author: 'x', copies_total: 3, copies_available: 4 }] })
    expect(reasonOf(parseCatalog(legacy))).toBe('books[0] has more available (4) than total copies (3)')
  })

  it('rejects malformed YAML', () => {
    expect(reasonOf(parseCatalog('books: [')) ?? '').toMatch(/^Malformed catalog file: /)
  })

  it('rejects a document that is not a mapping', () => {
    expect(reasonOf(parseCatalog('- a\n- b\n'))).toBe('Catalog file must contain a mapping')
  })

  it('rejects unknown versions', () => {
    expect(reasonOf(parseCatalog('version: "9.9"\nbooks: []\n'))).toBe('Unsupported catalog version 9.9')
  })

  it('rejects a missing or empty book list', () => {
    expect(reasonOf(parseCatalog('version: "0.2"\n'))).toBe('books must be a list')
    expect(reasonOf(parseCatalog('version: "0.2"\nbooks: []\n'))).toBe('Catalog must contain at least one book')
  })

  it('rejects more borrowed than total copies', () => {
    const src = catalogYaml('  - id: A\n    title: Alpha\n    author: Ann\n    total_copies: 1\n    borrowed_copies: 2\n')
    expect(reasonOf(parseCatalog(src))).toBe('books[0] has more borrowed (2) than total copies (1)')
  })

  it('rejects negative and fractional counts', () => {
    const negative = catalogYaml('  - id: A\n    title: Alpha\n    author: Ann\n    total_copies: 1\n    borrowed_copies: -1\n')
    expect(reasonOf(parseCatalog(negative))).toBe('books[0].borrowed_copies must be a non-negative integer')
    const fraction = catalogYaml('  - id: A\n    title: Alpha\n    author: Ann\n    total_copies: 1.5\n    borrowed_copies: 0\n')
    expect(reasonOf(parseCatalog(fraction))).toBe('books[0].total_copies must be a non-negative integer')
  })

  it('rejects entries without id or title', () => {
    const noTitle = catalogYaml('  - id: A\n    author: Ann\n    total_copies: 1\n    borrowed_copies: 0\n')
    expect(reasonOf(parseCatalog(noTitle))).toBe('books[0].title must be a string')
    const emptyId = catalogYaml('  - id: ""\n    title: Alpha\n    total_copies: 1\n    borrowed_copies: 0\n')
    expect(reasonOf(parseCatalog(emptyId))).toBe('books[0].id must not be empty')
    expect(reasonOf(parseCatalog(catalogYaml('  - just text\n')))).toBe('books[0] must be a mapping')
  })

  it('accepts a missing author', () => {
    const result = parseCatalog(catalogYaml('  - id: A\n    title: Alpha\n    total_copies: 1\n    borrowed_copies: 0\n'))
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.catalog.findByTitle('Alpha')?.author).toBe('')
  })

  it('rejects duplicate titles and ids', () => {
    const titles = catalogYaml(
      '  - id: A\n    title: Alpha\n    total_copies: 1\n    borrowed_copies: 0\n' +
        '  - id: B\n    title: Alpha\n    total_copies: 1\n    borrowed_copies: 0\n'
    )
    expect(reasonOf(parseCatalog(titles))).toBe('Duplicate title "Alpha"')
    const ids = catalogYaml(
      '  - id: A\n    title: Alpha\n    total_copies: 1\n    borrowed_copies: 0\n' +
        '  - id: A\n    title: Beta\n    total_copies: 1\n    borrowed_copies: 0\n'
    )
    expect(reasonOf(parseCatalog(ids))).toBe('Duplicate id "A"')
  })
})
