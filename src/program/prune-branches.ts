import { checkbox, confirm } from '@inquirer/prompts'
import { gray, yellow } from '../utils/colors.js'
import { plural } from '../utils/format.js'
import type { ProgramContext } from './context.js'
import { executeDeletions, executeDeletionsFailFast } from './execute-deletions.js'
import type { QueuedBranch } from './store/BranchStore.js'

/**
 * Deletes local branches whose upstream is gone. Merged ones are deleted with -d;
 * unmerged ones are only offered with --force.
 */
export async function pruneBranches({ args, logger, store }: ProgramContext): Promise<number> {
    await store.preprocess()

    const stale = store.staleBranches
    const candidates = stale.filter((b) => b.isMerged || args.force)
    const skipped = stale.length - candidates.length

    if (skipped > 0) {
        logger.warn(`${plural(skipped, 'stale branch', 'stale branches')} not merged; use --force to include them`)
    }

    if (candidates.length === 0) {
        logger.success('No stale branches to prune')
        return 0
    }

    const queue: Array<QueuedBranch> = candidates.map((b) => ({ name: b.name, isRemote: false, force: !b.isMerged }))

    if (args.yes) {
        // Unattended: stop at the first failure
        return executeDeletionsFailFast(store, queue)
    }

    const selected = await checkbox({
        message: 'Select stale branches to remove',
        pageSize: 40,
        choices: queue.map((branch) => ({
            value: branch,
            name: `${branch.name} ${branch.force ? yellow('[unmerged, force]') : gray('[merged]')}`,
            checked: !branch.force,
        })),
    })

    if (selected.length === 0) {
        console.info('👋 No branches selected')
        return 0
    }

    const confirmed = await confirm({
        message: `Are you sure you want to remove ${plural(selected.length, 'branch', 'branches')}?`,
        default: false,
    })

    if (!confirmed) {
        console.info('👋 No branches were removed.')
        return 0
    }

    return executeDeletions(store, selected)
}
