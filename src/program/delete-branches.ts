import type { ProgramContext } from './context.js'
import { executeDeletions } from './execute-deletions.js'
import type { QueuedBranch } from './store/BranchStore.js'

/**
 * The deletions requested on the command line; with --all the local deletions are queued ahead of the remote ones
 */
export function queueFromArgs(names: string[], { force, remote, all }: { force: boolean; remote: boolean; all: boolean }) {
    const local: Array<QueuedBranch> = all || !remote ? names.map((name) => ({ name, isRemote: false, force })) : []
    const remotes: Array<QueuedBranch> = all || remote ? names.map((name) => ({ name, isRemote: true, force })) : []

    return [...local, ...remotes]
}

export async function deleteBranches({ args, config, logger, store }: ProgramContext): Promise<number> {
    if (args.branches.length === 0) {
        logger.error('No branches specified')
        return 1
    }

    const queue = queueFromArgs(args.branches, args)

    // A single deletion reports its own typed error
    if (queue.length === 1) {
        const [branch] = queue
        const report = await store.deleteOne(branch)
        const target = branch.isRemote ? `${config.defaultRemote}/${branch.name}` : branch.name

        logger.success(report.dryRun ? `Would delete ${target}` : `Deleted ${target}`)
        return 0
    }

    return executeDeletions(store, queue)
}
