import { Command, CommanderError } from 'commander'
import Debug from 'debug'
import { CatalogErrorKind, type Ibook, getAvailableCopies } from '../shared/catalog/index.js'
import { LogLevelEnum, Logger, errorMessage, isCatalogError } from '../catalog/index.js'
import { availableTable, borrowedTable } from './catalogview.js'
import { type IlibraryConfig, type IlibraryOptions, resolveConfig } from './config.js'
import { Lending } from './lending.js'
import { type IconsoleIO, LibraryMenu, createConsoleIO } from './menu.js'
import { CatalogPersistence } from './persistence/catalogPersistence.js'

const debug = Debug('library')
const log = new Logger('library')

export enum ExitCode {
  ok = 0,
  catalogError = 1,
  failure = 2,
}

/**
 * Command line entry: `library [menu]`, `library available`, `library borrowed`,
 * `library borrow <title>` and `library return <title>`.
 */
export class LibraryCli {
  private exitCode: ExitCode = ExitCode.ok

  constructor(private io: IconsoleIO = createConsoleIO()) {}

  async run(argv: string[]): Promise<ExitCode> {
    const cli = this.createCommand()
    try {
      await cli.parseAsync(argv)
    } catch (e: unknown) {
      if (e instanceof CommanderError) return e.exitCode === 0 ? ExitCode.ok : ExitCode.failure
      const msg = errorMessage(e)
      log.log(LogLevelEnum.error, msg)
      return ExitCode.failure
    } finally {
      this.io.close()
    }
    return this.exitCode
  }

  private createCommand(): Command {
    const cli = new Command()
    cli.name('library').description('Browse the catalog, borrow and return books')
    cli.option('-d, --data <data-dir>', 'set directory of the catalog file')
    cli.option('-f, --file <file-name>', 'set name of the catalog file')
    cli.option('-l, --log-level <level>', 'set log level (' + Object.values(LogLevelEnum).join(', ') + ')')
    // Subcommands inherit this; otherwise a mistyped command falls through to the menu
    cli.allowExcessArguments(false)
    cli.exitOverride()
    cli.configureOutput({
      writeOut: (str) => this.io.write(str.trimEnd()),
      writeErr: (str) => this.io.write(str.trimEnd()),
    })

    const load = (): Lending => {
      const config = this.configure(cli.opts<IlibraryOptions>())
      return Lending.load(new CatalogPersistence(config.dataFile))
    }

    cli
      .command('menu', { isDefault: true })
      .description('interactive menu (default)')
      .action(async () => {
        await new LibraryMenu(load(), this.io).run()
      })
    cli
      .command('available')
      .description('list books with copies on the shelf')
      .action(() => {
        availableTable(load().catalog.listAvailable()).forEach((line) => this.io.write(line))
      })
    cli
      .command('borrowed')
      .description('list borrowed books')
      .action(() => {
        borrowedTable(load().catalog.listBorrowed()).forEach((line) => this.io.write(line))
      })
    cli
      .command('borrow')
      .description('borrow one copy of a book')
      .argument('<title>', 'exact title of the book')
      .action((title: string) => {
        const lending = load()
        this.mutate(() => lending.borrow(title), `You borrowed "${title}".`)
      })
    cli
      .command('return')
      .description('return one copy of a book')
      .argument('<title>', 'exact title of the book')
      .action((title: string) => {
        const lending = load()
        this.mutate(() => lending.returnBook(title), `Thank you for returning "${title}".`)
      })
    return cli
  }

  private configure(options: IlibraryOptions): IlibraryConfig {
    const config = resolveConfig(options)
    Logger.setLevel(config.logLevel)
    debug('data file: ' + config.dataFile)
    return config
  }

  private mutate(operation: () => Ibook, success: string): void {
    try {
      const book = operation()
      this.io.write(success + ` Available copies: ${getAvailableCopies(book)}/${book.totalCopies}`)
    } catch (e: unknown) {
      if (!isCatalogError(e)) throw e
      log.log(LogLevelEnum.error, e.message)
      this.exitCode = e.kind === CatalogErrorKind.IOError ? ExitCode.failure : ExitCode.catalogError
    }
  }
}
