import * as readline from 'readline'
import Debug from 'debug'
import { CatalogErrorKind, type Ibook } from '../shared/catalog/index.js'
import { Logger, LogLevelEnum, isCatalogError } from '../catalog/index.js'
import { availableTable, borrowedTable } from './catalogview.js'
import type { Lending } from './lending.js'

const debug = Debug('menu')
const log = new Logger('menu')

export interface ImenuIO {
  /** Resolves undefined once the input is exhausted */
  readLine(prompt: string): Promise<string | undefined>
  write(line: string): void
}

export interface IconsoleIO extends ImenuIO {
  close(): void
}

export function createConsoleIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): IconsoleIO {
  const rl = readline.createInterface({ input, terminal: false })
  const lines = rl[Symbol.asyncIterator]()
  return {
    async readLine(prompt: string): Promise<string | undefined> {
      output.write(prompt)
      const next = await lines.next()
      return next.done ? undefined : next.value
    },
    write(line: string): void {
      output.write(line + '\n')
    },
    close(): void {
      rl.close()
    },
  }
}

const menuText = `
Library Menu
1) View available books
2) View borrowed books
3) Borrow a book
4) Return a book
5) Exit`

interface Iselectable {
  id: string
  title: string
}

export class LibraryMenu {
  constructor(
    private lending: Lending,
    private io: ImenuIO
  ) {}

  async run(): Promise<void> {
    for (;;) {
      this.io.write(menuText)
      const choice = await this.readTrimmed('Choose an option: ')
      debug('choice: ' + choice)
      switch (choice) {
        case '1':
          this.viewAvailable()
          break
        case '2':
          this.viewBorrowed()
          break
        case '3':
          await this.borrowBook()
          break
        case '4':
          await this.returnBook()
          break
        case '5':
          this.io.write('Goodbye!')
          return
        case undefined:
          this.io.write('Input error. Exiting.')
          return
        default:
          this.io.write('Please choose a valid option (1-5).')
      }
      await this.io.readLine('\nPress Enter to continue...')
    }
  }

  viewAvailable(): void {
    this.io.write('\nAvailable books:')
    availableTable(this.lending.catalog.listAvailable()).forEach((line) => this.io.write(line))
  }

  viewBorrowed(): void {
    this.io.write('\nCurrently borrowed books:')
    borrowedTable(this.lending.catalog.listBorrowed()).forEach((line) => this.io.write(line))
  }

  async borrowBook(): Promise<void> {
    const available = this.lending.catalog.listAvailable()
    if (!available.length) {
      this.io.write('\nNo books are currently available to borrow.')
      return
    }
    this.io.write('\nSelect a book to borrow:')
    availableTable(available).forEach((line) => this.io.write(line))
    const title = await this.selectTitle(available)
    if (title !== undefined) this.mutate(title, (t) => this.lending.borrow(t), `You borrowed "${title}".`)
  }

  async returnBook(): Promise<void> {
    const borrowed = this.lending.catalog.listBorrowed()
    if (!borrowed.length) {
      this.io.write('\nYou have no borrowed books to return.')
      return
    }
    this.io.write('\nSelect a book to return:')
    borrowedTable(borrowed).forEach((line) => this.io.write(line))
    const title = await this.selectTitle(borrowed)
    if (title !== undefined) this.mutate(title, (t) => this.lending.returnBook(t), `Thank you for returning "${title}".`)
  }

  private async readTrimmed(prompt: string): Promise<string | undefined> {
    const line = await this.io.readLine(prompt)
    return line === undefined ? undefined : line.trim()
  }

  // Accepts a row number of the table shown before or a book id; empty input or q cancels
  private async selectTitle(choices: Iselectable[]): Promise<string | undefined> {
    const input = await this.readTrimmed('\nEnter # or ID (or press Enter to cancel): ')
    if (input === undefined || !input.length || input.toLowerCase() === 'q') return undefined

    if (/^\d+$/.test(input)) {
      const num = Number.parseInt(input, 10)
      if (num >= 1 && num <= choices.length) return choices[num - 1].title
      this.io.write('Invalid selection.')
      return undefined
    }

    const lowered = input.toLowerCase()
    const match = choices.find((c) => c.id.toLowerCase() === lowered)
    if (match) return match.title
    this.io.write('Book not found.')
    return undefined
  }

  private mutate(title: string, operation: (title: string) => Ibook, success: string): void {
    try {
      operation(title)
    } catch (e: unknown) {
      if (isCatalogError(e, CatalogErrorKind.IOError)) {
        log.log(LogLevelEnum.error, e.message)
        this.io.write('Warning: could not save data: ' + e.message)
      } else if (isCatalogError(e)) {
        this.io.write(e.message)
        return
      } else throw e
    }
    this.io.write(success)
  }
}
