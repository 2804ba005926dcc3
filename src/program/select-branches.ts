import { checkbox, Separator } from '@inquirer/prompts'
import type { BranchRecord } from '../git/types.js'
import { gray, green, red, yellow } from '../utils/colors.js'
import type BranchStore from './store/BranchStore.js'
import { queueKey, type QueuedBranch } from './store/BranchStore.js'

/** Previous selection to restore when returning from the confirmation screen */
export type PreviousSelection = Array<QueuedBranch>

type Choice = { value: QueuedBranch; name: string; checked: boolean }

/**
 * Display the branch selection screen, grouped into safe, force and remote sections.
 * Resolves with undefined when there is nothing to choose from.
 * @param previousSelection - Optional previous selection to restore (e.g. when going back from confirmation)
 */
export async function selectBranches(
    store: BranchStore,
    { includeRemote, force }: { includeRemote: boolean; force: boolean },
    previousSelection?: PreviousSelection,
): Promise<Array<QueuedBranch> | undefined> {
    await store.getDeletableBranches()

    const remoteBranches = includeRemote ? store.remoteBranches : []
    const total = store.safeToDelete.length + store.requiresForce.length + remoteBranches.length

    if (total === 0) {
        console.info('✅ No deletable branches were found')
        if (!includeRemote && store.remoteBranches.length > 0) {
            console.info(gray('   (use --all to include remote branches)'))
        }
        return undefined
    }

    if (store.currentBranch) {
        console.info(`\nOn branch ${green(store.currentBranch.name)}`)
    }

    if (store.protectedBranches.length > 0) {
        const names = [...new Set(store.protectedBranches.map((b) => b.name))]
        console.info(`ℹ Protected, will not be deleted: ${gray(names.join(', '))}\n`)
    }

    const previous = previousSelection ? new Set(previousSelection.map(queueKey)) : undefined
    const choice = (branch: BranchRecord, forceDelete: boolean, preselected: boolean): Choice => {
        const queued = { name: branch.name, isRemote: branch.isRemote, force: forceDelete }

        return {
            value: queued,
            name: `${branch.isRemote ? `${store.config.defaultRemote}/` : ''}${branch.name} ${gray(`[${store.getReason(branch)}]`)}`,
            // Restore previous selection if available
            checked: previous ? previous.has(queueKey(queued)) : preselected,
        }
    }

    const choices: Array<Choice | Separator> = []

    // Group 1: Safe to delete
    if (store.safeToDelete.length > 0) {
        choices.push(new Separator(green('✔︎ Safe to delete')))
        choices.push(...store.safeToDelete.map((b) => choice(b, force, true)))
    }

    // Group 2: Requires force
    if (store.requiresForce.length > 0) {
        choices.push(new Separator(yellow('⚠︎ Requires force delete (cannot be undone)')))
        choices.push(...store.requiresForce.map((b) => choice(b, true, false)))
    }

    // Group 3: Remote
    if (remoteBranches.length > 0) {
        choices.push(new Separator(red(`☁︎ Delete from ${store.config.defaultRemote}`)))
        choices.push(...remoteBranches.map((b) => choice(b, force, false)))
    }

    return checkbox({
        message: 'Select branches to remove',
        pageSize: 40,
        choices,
    })
}
