import { CommandError, describeError, isBranchError } from '../git/errors.js'
import { ConfigError } from '../utils/config.js'
import { UsageError } from '../utils/establish-args.js'
import type { Logger } from '../utils/logger.js'

/** Thrown by @inquirer/prompts when the user presses Ctrl+C at a prompt */
export function isExitPromptError(err: unknown): boolean {
    return err instanceof Error && err.name === 'ExitPromptError'
}

export function isNotARepository(err: unknown): boolean {
    return err instanceof CommandError && err.exitCode === 128 && /not a git repository/i.test(err.stderr)
}

/**
 * Prints an error that reached the top of a command and returns the exit code
 */
export function reportError(err: unknown, logger: Logger): number {
    if (isExitPromptError(err)) {
        console.info('\n👋 No branches were deleted.')
        return 0
    }

    if (isNotARepository(err)) {
        logger.error('Not a git repository')
        return 1
    }

    if (isBranchError(err) || err instanceof ConfigError || err instanceof UsageError) {
        logger.error(describeError(err))
        return 1
    }

    process.stderr.write(`${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`)
    return 1
}
