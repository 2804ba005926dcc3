import { sortOutcomes } from '../git/batch.js'
import type { DeletionOutcome } from '../git/types.js'
import { green, red, yellow } from '../utils/colors.js'
import { plural } from '../utils/format.js'
import type BranchStore from './store/BranchStore.js'
import type { QueuedBranch } from './store/BranchStore.js'

function label(outcome: Pick<DeletionOutcome, 'name' | 'isRemote'>, remote: string): string {
    return outcome.isRemote ? `${remote}/${outcome.name}` : outcome.name
}

export interface SummaryOptions {
    remote: string
    dryRun: boolean
    /** Shown next to queued branches without an outcome */
    unfinishedNote?: string
}

/**
 * Lines describing a finished batch: totals, then one line per success, per failure
 * and per queued branch that has no outcome
 */
export function summarizeOutcomes(
    outcomes: Array<DeletionOutcome>,
    attempted: Array<Pick<QueuedBranch, 'name' | 'isRemote'>>,
    { remote, dryRun, unfinishedNote = 'not finished before the deadline' }: SummaryOptions,
): string[] {
    const sorted = sortOutcomes(outcomes)
    const succeeded = sorted.filter((o) => o.succeeded)
    const failed = sorted.flatMap((o) => (o.succeeded ? [] : [o]))
    const finished = new Set(outcomes.map((o) => `${o.isRemote}:${o.name}`))
    const unfinished = attempted.filter((b) => !finished.has(`${b.isRemote}:${b.name}`))
    const lines: string[] = []

    const done = dryRun ? 'Would delete' : 'Deleted'

    if (failed.length === 0 && unfinished.length === 0) {
        lines.push(green(`✅ ${done} ${plural(succeeded.length, 'branch', 'branches')}`))
    } else if (succeeded.length > 0) {
        lines.push(yellow(`⚠️ ${done} ${succeeded.length} of ${plural(attempted.length, 'branch', 'branches')}`))
    } else {
        lines.push(red(`❌ Failed to delete all ${plural(attempted.length, 'branch', 'branches')}`))
    }

    succeeded.forEach((o) => lines.push(`   ${green('✔')} ${label(o, remote)}`))

    failed.forEach((o) => {
        lines.push(`   ${red('✖')} ${label(o, remote)}`)
        o.errorDetail.split('\n').forEach((line) => lines.push(`     ${line}`))
    })

    unfinished.forEach((b) => lines.push(`   ${yellow('…')} ${label(b, remote)} ${yellow(`(${unfinishedNote})`)}`))

    return lines
}

function printSummary(
    store: BranchStore,
    queue: Array<QueuedBranch>,
    outcomes: Array<DeletionOutcome>,
    unfinishedNote?: string,
): number {
    console.log('') // Empty line
    summarizeOutcomes(outcomes, queue, {
        remote: store.config.defaultRemote,
        dryRun: store.config.dryRun,
        unfinishedNote,
    }).forEach((line) => console.info(line))

    const allSucceeded = outcomes.length === queue.length && outcomes.every((o) => o.succeeded)

    if (!allSucceeded) {
        console.log('')
        console.info("💡 Tip: unmerged branches need --force; remote deletions need push access")
    }

    return allSucceeded ? 0 : 1
}

/**
 * Runs the queued deletions, prints the per-branch breakdown and returns the exit code
 */
export async function executeDeletions(store: BranchStore, queue: Array<QueuedBranch>): Promise<number> {
    store.setQueuedForDeletion(queue)
    const outcomes = await store.deleteBranches()

    return printSummary(store, queue, outcomes)
}

/**
 * Like executeDeletions, but stops at the first failure; the breakdown still lists
 * what was deleted before the stop
 */
export async function executeDeletionsFailFast(store: BranchStore, queue: Array<QueuedBranch>): Promise<number> {
    store.setQueuedForDeletion(queue)
    const { outcomes, stoppedBy } = await store.deleteBranchesFailFast()

    return printSummary(store, queue, outcomes, stoppedBy === 'failure' ? 'not attempted after the failure' : undefined)
}
