import ora from 'ora'
import BranchDeleter from '../../git/BranchDeleter.js'
import BranchInventory from '../../git/BranchInventory.js'
import { runCollectAll, runFailFast } from '../../git/batch.js'
import { DeadlineExceededError, describeError } from '../../git/errors.js'
import type { BranchRecord, DeletionOutcome, DeletionReport, GitRunner } from '../../git/types.js'
import type { SweepConfig } from '../../utils/config.js'
import { plural } from '../../utils/format.js'
import { formatTimeAgo } from '../../utils/formatTimeAgo.js'
import { silentLogger, type Logger } from '../../utils/logger.js'

/** A branch the user picked, with how it should be deleted */
export interface QueuedBranch {
    name: string
    isRemote: boolean
    force: boolean
}

/** What a fail-fast run managed before it ended, and why it ended early if it did */
export interface FailFastResult {
    outcomes: Array<DeletionOutcome>
    stoppedBy: 'failure' | 'deadline' | undefined
}

export function queueKey(branch: Pick<QueuedBranch, 'name' | 'isRemote'>): string {
    return `${branch.isRemote ? 'remote' : 'local'}:${branch.name}`
}

export default class BranchStore {
    readonly config: SweepConfig
    readonly inventory: BranchInventory
    readonly deleter: BranchDeleter
    private readonly logger: Logger

    hasRunPreprocess: boolean = false

    /**
     * Last inventory snapshot
     */
    branches: Array<BranchRecord> = []

    /**
     * Current branch (cannot be deleted)
     */
    currentBranch: BranchRecord | undefined

    /**
     * Local branches merged into HEAD (pre-selected in UI)
     */
    safeToDelete: Array<BranchRecord> = []

    /**
     * Local branches with unmerged work; need force (NOT pre-selected in UI)
     */
    requiresForce: Array<BranchRecord> = []

    /**
     * Remote-tracking branches that may be deleted from the remote
     */
    remoteBranches: Array<BranchRecord> = []

    /**
     * Protected branches that will never be deleted (shown for information)
     */
    protectedBranches: Array<BranchRecord> = []

    queuedForDeletion: Array<QueuedBranch> = []
    outcomes: Array<DeletionOutcome> = []

    constructor(runner: GitRunner, config: SweepConfig, logger: Logger = silentLogger) {
        this.config = config
        this.logger = logger
        this.inventory = new BranchInventory(runner, {
            remote: config.defaultRemote,
            protectedBranches: config.protectedBranches,
            subjectWidth: config.subjectWidth,
            logger,
        })
        this.deleter = new BranchDeleter(runner, {
            remote: config.defaultRemote,
            protectedBranches: config.protectedBranches,
            dryRun: config.dryRun,
            remoteTimeoutMs: config.remoteTimeoutMs,
            logger,
        })
    }

    async preprocess(): Promise<void> {
        const spinner = ora('Loading branches...').start()

        try {
            this.branches = await this.inventory.listBranches()
            spinner.stop()
        } catch (err) {
            spinner.fail('Could not list branches')
            throw err
        }

        this.classifyBranches()
        this.hasRunPreprocess = true
    }

    classifyBranches(): void {
        const local = this.branches.filter((b) => !b.isRemote)
        const deletable = (b: BranchRecord) => !b.isCurrent && !b.isDefault

        this.currentBranch = local.find((b) => b.isCurrent)
        this.protectedBranches = this.branches.filter((b) => b.isDefault)

        // Group 1: safe to delete
        this.safeToDelete = local.filter((b) => deletable(b) && b.isMerged)

        // Group 2: requires force
        this.requiresForce = local.filter((b) => deletable(b) && !b.isMerged)

        // Group 3: remote branches
        this.remoteBranches = this.branches.filter((b) => b.isRemote && !b.isDefault)
    }

    /**
     * Local branches whose upstream is gone and that may be deleted
     */
    get staleBranches(): Array<BranchRecord> {
        return [...this.safeToDelete, ...this.requiresForce].filter((b) => b.isStale)
    }

    async getDeletableBranches(): Promise<Array<BranchRecord>> {
        if (!this.hasRunPreprocess) {
            await this.preprocess()
        }

        return [...this.safeToDelete, ...this.requiresForce, ...this.remoteBranches]
    }

    /**
     * Short reason shown next to a branch name, e.g. "merged, remote deleted; last commit 3d ago"
     */
    getReason(branch: BranchRecord): string {
        const parts: string[] = [branch.isMerged ? 'merged' : 'unmerged']

        if (branch.isStale) {
            parts.push('remote deleted')
        } else if (!branch.isRemote && branch.trackingBranch === '') {
            parts.push('local only')
        } else if (branch.isBehind) {
            parts.push('behind upstream')
        }

        const timeAgo = branch.lastCommitAt === undefined ? '' : `; last commit ${formatTimeAgo(branch.lastCommitAt)}`

        return `${parts.join(', ')}${timeAgo}`
    }

    setQueuedForDeletion(queue: Array<QueuedBranch>): void {
        this.queuedForDeletion = queue
    }

    deleteOne(branch: QueuedBranch): Promise<DeletionReport> {
        return this.deleter.deleteBranch(branch.name, { force: branch.force, remote: branch.isRemote })
    }

    /**
     * Deletes everything queued with a small worker pool; every branch gets an attempt
     */
    async deleteBranches(): Promise<Array<DeletionOutcome>> {
        const queue = this.queuedForDeletion

        if (queue.length === 0) {
            this.outcomes = []
            return this.outcomes
        }

        const verb = this.config.dryRun ? 'Checking' : 'Deleting'
        const spinner = ora(`${verb} branches (0/${queue.length})`).start()

        this.outcomes = await runCollectAll(queue, (branch) => this.deleteOne(branch), {
            deadlineMs: this.config.deadlineMs,
            concurrency: this.config.concurrency,
            onOutcome: (_outcome, done) => {
                spinner.text = `${verb} branches (${done}/${queue.length})`
            },
        })

        spinner.stop()
        this.logger.debug(`Finished ${this.outcomes.length} of ${queue.length} deletions`)

        return this.outcomes
    }

    /**
     * Deletes everything queued, stopping at the first failure or at the deadline.
     * Outcomes cover the deletions that finished before the stop; anything else in
     * the queue was not attempted, or was still running and is not reported.
     */
    async deleteBranchesFailFast(): Promise<FailFastResult> {
        const queue = this.queuedForDeletion
        const verb = this.config.dryRun ? 'Checking' : 'Deleting'
        const spinner = ora(`${verb} ${plural(queue.length, 'branch', 'branches')}`).start()
        const recorded: Array<DeletionOutcome> = []

        const deleteAndRecord = async (branch: QueuedBranch) => {
            try {
                await this.deleteOne(branch)
            } catch (err) {
                recorded.push({
                    name: branch.name,
                    isRemote: branch.isRemote,
                    succeeded: false,
                    errorDetail: describeError(err),
                })
                throw err
            }

            recorded.push({ name: branch.name, isRemote: branch.isRemote, succeeded: true })
        }

        try {
            await runFailFast(queue, deleteAndRecord, { deadlineMs: this.config.deadlineMs })
        } catch (err) {
            this.outcomes = recorded.slice()

            if (err instanceof DeadlineExceededError) {
                spinner.fail(`Stopped: deadline of ${err.deadlineMs}ms exceeded`)
                return { outcomes: this.outcomes, stoppedBy: 'deadline' }
            }

            spinner.fail('Stopped at the first failure')
            return { outcomes: this.outcomes, stoppedBy: 'failure' }
        }

        spinner.stop()
        this.outcomes = recorded.slice()
        this.logger.debug(`Finished ${this.outcomes.length} of ${queue.length} deletions`)

        return { outcomes: this.outcomes, stoppedBy: undefined }
    }
}
