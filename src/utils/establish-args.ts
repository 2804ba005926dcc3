import minimist from 'minimist'
import { exit } from 'node:process'
import { readVersion } from './version.js'
import type { ConfigOverrides } from './config.js'

export const commands = ['interactive', 'list', 'delete', 'prune', 'test'] as const

export const defaultTestBranchCount = 5

const maxTestBranchCount = 100

export type CommandName = (typeof commands)[number]

export interface CliArgs {
    command: CommandName
    /** Positional branch names (delete) */
    branches: string[]
    force: boolean
    /** Act on remote branches */
    remote: boolean
    /** Act on local and remote branches */
    all: boolean
    yes: boolean
    /** Branches to create (test) */
    count: number
    /** Name prefix of created branches (test) */
    prefix: string
    quiet: boolean
    debug: boolean
    configPath: string | undefined
    /** Values that take precedence over the config file */
    overrides: ConfigOverrides
}

export const usage = `Usage: git-branch-sweep [command] [options]

Commands:
  interactive            Pick branches to delete from a list (default)
  list                   List branches with their status
  delete <branch...>     Delete the named branches
  prune                  Delete local branches whose upstream is gone
  test                   Create scratch branches to try the other commands on

Options:
  -f, --force            Delete branches that are not merged
  -r, --remote           Act on remote branches instead of local ones
  -a, --all              Act on local and remote branches
  -n, --dry-run          Run all checks but do not delete anything
  -y, --yes              Do not ask for confirmation (prune)
      --count <n>        Branches to create (test, default: 5)
      --prefix <text>    Name prefix of created branches (test, default: test)
      --remote-name <n>  Remote to use (default: origin)
      --protected <a,b>  Comma separated list of branches that are never deleted
      --timeout <ms>     Timeout for each git command
      --config <path>    Config file to read
      --quiet            Only print errors
      --debug            Print every git command
      --version          Print the version
  -h, --help             Show this help`

export class UsageError extends Error {
    constructor(message: string) {
        super(message)
        this.name = 'UsageError'
    }
}

const knownOptions = [
    '_',
    'force',
    'f',
    'remote',
    'r',
    'all',
    'a',
    'dry-run',
    'n',
    'yes',
    'y',
    'remote-name',
    'protected',
    'count',
    'prefix',
    'timeout',
    'config',
    'quiet',
    'debug',
    'version',
    'help',
    'h',
]

function isCommandName(value: string): value is CommandName {
    return commands.some((command) => command === value)
}

/**
 * Parses command-line arguments (without the node and script paths).
 * Throws UsageError for unknown options, commands or malformed values.
 */
export function parseArgs(args: string[]): CliArgs & { version: boolean; help: boolean } {
    const argv = minimist(args, {
        string: ['remote-name', 'protected', 'timeout', 'config', 'count', 'prefix'],
        boolean: ['force', 'remote', 'all', 'dry-run', 'yes', 'quiet', 'debug', 'version', 'help'],
        alias: { f: 'force', r: 'remote', a: 'all', n: 'dry-run', y: 'yes', h: 'help' },
    })

    const unknown = Object.keys(argv).filter((name) => !knownOptions.includes(name))
    if (unknown.length > 0) {
        throw new UsageError(`Unknown option: ${unknown.map((name) => (name.length === 1 ? `-${name}` : `--${name}`)).join(', ')}`)
    }

    const [first, ...rest] = argv._.map(String)
    let command: CommandName = 'interactive'
    let branches: string[] = []

    if (first !== undefined) {
        if (!isCommandName(first)) {
            throw new UsageError(`Unknown command: ${first}`)
        }

        command = first
        branches = rest
    }

    if (command !== 'delete' && branches.length > 0) {
        throw new UsageError(`The ${command} command takes no branch names`)
    }

    const overrides: ConfigOverrides = {}

    if (argv['remote-name']) {
        overrides.defaultRemote = String(argv['remote-name'])
    }

    if (argv.protected) {
        overrides.protectedBranches = String(argv.protected)
            .split(',')
            .map((branch) => branch.trim())
            .filter((branch) => branch !== '')
    }

    if (argv.timeout) {
        const timeoutMs = Number(argv.timeout)
        if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
            throw new UsageError(`--timeout must be a positive number of milliseconds, got "${argv.timeout}"`)
        }

        overrides.timeoutMs = timeoutMs
    }

    let count = defaultTestBranchCount
    if (argv.count) {
        count = Number(argv.count)
        if (!Number.isInteger(count) || count < 1 || count > maxTestBranchCount) {
            throw new UsageError(`--count must be a whole number from 1 to ${maxTestBranchCount}, got "${argv.count}"`)
        }
    }

    // A boolean flag can only switch dry-run on; the config file decides otherwise
    if (argv['dry-run']) {
        overrides.dryRun = true
    }

    return {
        command,
        branches,
        force: Boolean(argv.force),
        remote: Boolean(argv.remote),
        all: Boolean(argv.all),
        yes: Boolean(argv.yes),
        count,
        prefix: argv.prefix ? String(argv.prefix) : 'test',
        quiet: Boolean(argv.quiet),
        debug: Boolean(argv.debug),
        configPath: argv.config ? String(argv.config) : undefined,
        overrides,
        version: Boolean(argv.version),
        help: Boolean(argv.help),
    }
}

/**
 * Parses process.argv, handling --help, --version and usage errors the way a CLI should
 */
export function establishArgs(): CliArgs {
    let parsed: ReturnType<typeof parseArgs>

    try {
        parsed = parseArgs(process.argv.slice(2))
    } catch (err) {
        if (err instanceof UsageError) {
            console.error(err.message)
            console.info(usage)
            exit(1)
        }

        throw err
    }

    if (parsed.help) {
        console.info(usage)
        exit(0)
    }

    if (parsed.version) {
        console.log(readVersion())
        exit(0)
    }

    return parsed
}
