// Side effects
import './side-effects/handle-control-c.js'

// Program imports
import { establishArgs, type CommandName } from '../utils/establish-args.js'
import { createLogger } from '../utils/logger.js'
import { checkForGitRepo } from './check-for-git-repo.js'
import { createContext, type ProgramContext } from './context.js'
import { createTestBranches } from './create-test-branches.js'
import { deleteBranches } from './delete-branches.js'
import { interactive } from './interactive.js'
import { listBranches } from './list-branches.js'
import { pruneBranches } from './prune-branches.js'
import { reportError } from './report-error.js'

const handlers: Record<CommandName, (ctx: ProgramContext) => Promise<number>> = {
    interactive,
    list: listBranches,
    delete: deleteBranches,
    prune: pruneBranches,
    test: createTestBranches,
}

/**
 * Runs the command given on the command line and resolves with the exit code
 */
export default async function program(): Promise<number> {
    const args = establishArgs()
    let logger = createLogger({ quiet: args.quiet, debug: args.debug })

    try {
        const ctx = createContext(args)
        logger = ctx.logger

        await checkForGitRepo(ctx.runner)

        return await handlers[args.command](ctx)
    } catch (err: unknown) {
        return reportError(err, logger)
    }
}
