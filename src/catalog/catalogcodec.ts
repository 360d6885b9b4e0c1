import { type Document, isScalar, parseDocument, stringify } from 'yaml'
import Debug from 'debug'
import { CATALOG_VERSION, type Ibook, type IcatalogFile, isCountValid } from '../shared/catalog/index.js'
import { Catalog, checkBooks } from './catalog.js'
import { errorMessage } from './errors.js'

const debug = Debug('catalogcodec')
// The first data files were plain JSON with copies_total/copies_available and no version
const LEGACY_VERSION = '0.1'

export type ParseResult = { ok: true; catalog: Catalog; migratedFrom?: string } | { ok: false; reason: string }

type BookResult = Ibook | string

interface Isource {
  src: string
  doc: Document
}

type BookReader = (entry: unknown, idx: number, source: Isource) => BookResult

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

// YAML reads unquoted titles like 1984 or ids like 007 as numbers; keep the text as written
function writtenText(source: Isource, idx: number, key: string): string | undefined {
  const node = source.doc.getIn(['books', idx, key], true)
  if (!isScalar(node) || !node.range) return undefined
  return source.src.slice(node.range[0], node.range[1]).trim()
}

function readText(
  entry: Record<string, unknown>,
  key: string,
  idx: number,
  source: Isource,
  optional = false
): string | { error: string } {
  const value = entry[key]
  if (value === undefined && optional) return ''
  if (typeof value === 'string') return value
  if (typeof value === 'number') return writtenText(source, idx, key) ?? String(value)
  return { error: `books[${idx}].${key} must be a string` }
}

function readCount(entry: Record<string, unknown>, key: string, idx: number): number | { error: string } {
  const value = entry[key]
  if (isCountValid(value)) return value
  return { error: `books[${idx}].${key} must be a non-negative integer` }
}

function readIdentity(
  entry: Record<string, unknown>,
  idx: number,
  source: Isource
): Pick<Ibook, 'id' | 'title' | 'author'> | string {
  const id = readText(entry, 'id', idx, source)
  if (typeof id !== 'string') return id.error
  const title = readText(entry, 'title', idx, source)
  if (typeof title !== 'string') return title.error
  const author = readText(entry, 'author', idx, source, true)
  if (typeof author !== 'string') return author.error
  if (!id.length) return `books[${idx}].id must not be empty`
  if (!title.length) return `books[${idx}].title must not be empty`
  return { id, title, author }
}

function readBook(entry: unknown, idx: number, source: Isource): BookResult {
  if (!isRecord(entry)) return `books[${idx}] must be a mapping`
  const identity = readIdentity(entry, idx, source)
  if (typeof identity === 'string') return identity
  const total = readCount(entry, 'total_copies', idx)
  if (typeof total !== 'number') return total.error
  const borrowed = readCount(entry, 'borrowed_copies', idx)
  if (typeof borrowed !== 'number') return borrowed.error
  if (borrowed > total) return `books[${idx}] has more borrowed (${borrowed}) than total copies (${total})`
  return { ...identity, totalCopies: total, borrowedCopies: borrowed }
}

function readLegacyBook(entry: unknown, idx: number, source: Isource): BookResult {
  if (!isRecord(entry)) return `books[${idx}] must be a mapping`
  const identity = readIdentity(entry, idx, source)
  if (typeof identity === 'string') return identity
  const total = readCount(entry, 'copies_total', idx)
  if (typeof total !== 'number') return total.error
  const available = readCount(entry, 'copies_available', idx)
  if (typeof available !== 'number') return available.error
  if (available > total) return `books[${idx}] has more available (${available}) than total copies (${total})`
  return { ...identity, totalCopies: total, borrowedCopies: total - available }
}

/**
 * Parses the content of a catalog file.
 * Never throws: malformed YAML, a wrong layout or a broken invariant yield { ok: false }.
 * Unversioned (legacy JSON) content is migrated to the current layout.
 */
export function parseCatalog(src: string): ParseResult {
  const doc = parseDocument(src)
  if (doc.errors.length) return { ok: false, reason: 'Malformed catalog file: ' + doc.errors[0].message }
  let content: unknown
  try {
    content = doc.toJS()
  } catch (e: unknown) {
    const msg = errorMessage(e)
    return { ok: false, reason: 'Malformed catalog file: ' + msg }
  }
  if (!isRecord(content)) return { ok: false, reason: 'Catalog file must contain a mapping' }

  const version = content['version'] === undefined ? LEGACY_VERSION : String(content['version'])
  let reader: BookReader
  switch (version) {
    case LEGACY_VERSION:
      reader = readLegacyBook
      break
    case CATALOG_VERSION:
      reader = readBook
      break
    default:
      return { ok: false, reason: 'Unsupported catalog version ' + version }
  }

  const entries = content['books']
  if (!Array.isArray(entries)) return { ok: false, reason: 'books must be a list' }

  const source: Isource = { src, doc }
  const books: Ibook[] = []
  for (let idx = 0; idx < entries.length; idx++) {
    const result = reader(entries[idx], idx, source)
    if (typeof result === 'string') return { ok: false, reason: result }
    books.push(result)
  }
  const reason = checkBooks(books)
  if (reason !== undefined) return { ok: false, reason }

  debug('parseCatalog: version ' + version + ' books: ' + books.length)
  const catalog = new Catalog(books)
  return version === CATALOG_VERSION ? { ok: true, catalog } : { ok: true, catalog, migratedFrom: version }
}

export function serializeCatalog(catalog: Catalog): string {
  const file: IcatalogFile = {
    version: CATALOG_VERSION,
    books: catalog.books().map((book) => ({
      id: book.id,
      title: book.title,
      author: book.author,
      total_copies: book.totalCopies,
      borrowed_copies: book.borrowedCopies,
    })),
  }
  return stringify(file)
}
