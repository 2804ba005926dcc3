import { defaultProtectedBranches, defaultRemote } from '../program/constants.js'
import { truncate } from '../utils/format.js'
import { silentLogger, type Logger } from '../utils/logger.js'
import split from '../utils/split.js'
import { CommandError } from './errors.js'
import type { BranchRecord, GitRunner } from './types.js'
import { isProtectedBranch, isValidBranchName } from './validate.js'

/**
 * Separates the fields of one for-each-ref line. `^` is not allowed in ref names,
 * hashes, track status or dates, so only the subject (the last field) can contain it.
 */
export const FIELD_SEPARATOR = '^^'

const refFields = [
    '%(refname)',
    '%(objectname:short)',
    '%(upstream:short)',
    '%(upstream:track)',
    '%(HEAD)',
    '%(committerdate:unix)',
    '%(subject)',
]

export const refFormat = refFields.join(FIELD_SEPARATOR)

export interface ParsedRef {
    reference: string
    commitHash: string
    trackingBranch: string
    track: string
    isHead: boolean
    lastCommitAt: number | undefined
    message: string
}

export interface TrackingStatus {
    stale: boolean
    behind: boolean
}

/**
 * Parses one line produced with `refFormat`; undefined if the line is malformed
 */
export function parseRefLine(line: string): ParsedRef | undefined {
    const parts = line.split(FIELD_SEPARATOR)

    if (parts.length < refFields.length) {
        return undefined
    }

    const [reference, commitHash, trackingBranch, track, head, date, ...subject] = parts

    if (!reference.startsWith('refs/')) {
        return undefined
    }

    const timestamp = Number.parseInt(date, 10)

    return {
        reference,
        commitHash: commitHash.trim(),
        trackingBranch: trackingBranch.trim(),
        track: track.trim(),
        isHead: head.trim() === '*',
        lastCommitAt: Number.isNaN(timestamp) ? undefined : timestamp,
        message: subject.join(FIELD_SEPARATOR).trim(),
    }
}

/**
 * Reads `%(upstream:track)` output such as "[gone]" or "[ahead 1, behind 2]".
 * Returns undefined when the text is not recognised; callers decide the default.
 */
export function readTrackingStatus(track: string): TrackingStatus | undefined {
    if (track === '') {
        return { stale: false, behind: false }
    }

    if (track === '[gone]') {
        return { stale: true, behind: false }
    }

    const match = track.match(/^\[(?:ahead \d+)?(?:, )?(behind \d+)?\]$/)
    if (!match || track === '[]') {
        return undefined
    }

    return { stale: false, behind: match[1] !== undefined }
}

/**
 * True for the error git gives when HEAD points at a branch with no commits yet
 */
export function isUnbornHead(err: unknown): boolean {
    return (
        err instanceof CommandError &&
        /unknown revision|ambiguous argument 'HEAD'|Needed a single revision/.test(err.stderr)
    )
}

export interface HeadState {
    /** Checked out branch, or '' when HEAD is detached */
    branch: string
    /** The checked out branch has no commits yet (a new repository, or an orphan branch) */
    unborn: boolean
}

export async function readHead(runner: GitRunner): Promise<HeadState> {
    try {
        const out = await runner.run(['rev-parse', '--abbrev-ref', 'HEAD'])

        return { branch: out === 'HEAD' ? '' : out, unborn: false }
    } catch (err) {
        if (!isUnbornHead(err)) {
            throw err
        }

        return { branch: await runner.run(['symbolic-ref', '--short', 'HEAD']), unborn: true }
    }
}

export interface BranchInventoryOptions {
    remote?: string
    protectedBranches?: readonly string[]
    /** Cut commit subjects to this many characters; 0 keeps them whole */
    subjectWidth?: number
    logger?: Logger
}

export default class BranchInventory {
    readonly remote: string
    readonly protectedBranches: readonly string[]
    readonly subjectWidth: number
    private readonly runner: GitRunner
    private readonly logger: Logger

    constructor(runner: GitRunner, ops: BranchInventoryOptions = {}) {
        this.runner = runner
        this.remote = ops.remote ?? defaultRemote
        this.protectedBranches = ops.protectedBranches ?? defaultProtectedBranches
        this.subjectWidth = ops.subjectWidth ?? 0
        this.logger = ops.logger ?? silentLogger
    }

    /**
     * Builds a fresh snapshot of local and remote-tracking branches.
     * Merge status is measured against HEAD, i.e. the branch that is checked out right now.
     */
    async listBranches(): Promise<BranchRecord[]> {
        const head = await readHead(this.runner)
        const currentBranch = head.branch

        // Nothing is reachable from a HEAD without commits
        let mergedRefs = new Set<string>()
        if (head.unborn) {
            this.logger.debug(`Branch ${currentBranch} has no commits yet`)
        } else {
            mergedRefs = await this.lookupMergedRefs()
        }

        // Read-only queries, safe to run side by side
        const [localOut, remoteOut] = await Promise.all([
            this.runner.run(['for-each-ref', `--format=${refFormat}`, 'refs/heads']),
            this.runner.run(['for-each-ref', `--format=${refFormat}`, `refs/remotes/${this.remote}`]),
        ])

        const seen = new Set<string>()
        const branches: BranchRecord[] = []

        const collect = (out: string, isRemote: boolean) => {
            split(out).forEach((line) => {
                const record = this.toRecord(line, isRemote, currentBranch, mergedRefs)
                if (!record) {
                    return
                }

                const key = `${isRemote ? 'remote' : 'local'}:${record.name}`
                if (seen.has(key)) {
                    return
                }

                seen.add(key)
                branches.push(record)
            })
        }

        collect(localOut, false)
        collect(remoteOut, true)

        return branches
    }

    /**
     * Full ref paths of every local and remote-tracking branch reachable from HEAD
     */
    async lookupMergedRefs(): Promise<Set<string>> {
        const out = await this.runner.run(['branch', '--all', '--merged', 'HEAD', '--format=%(refname)'])

        return new Set(split(out))
    }

    private toRecord(
        line: string,
        isRemote: boolean,
        currentBranch: string,
        mergedRefs: Set<string>,
    ): BranchRecord | undefined {
        const ref = parseRefLine(line)
        if (!ref) {
            this.logger.debug(`Skipping unreadable ref line: ${line}`)
            return undefined
        }

        const prefix = isRemote ? `refs/remotes/${this.remote}/` : 'refs/heads/'
        if (!ref.reference.startsWith(prefix)) {
            return undefined
        }

        const name = ref.reference.slice(prefix.length)

        // Symbolic pointer such as refs/remotes/origin/HEAD
        if (name === 'HEAD') {
            return undefined
        }

        if (!isValidBranchName(name)) {
            this.logger.debug(`Skipping branch with unsupported name: ${name}`)
            return undefined
        }

        // Unknown tracking state counts as neither stale nor behind
        const tracking = isRemote ? undefined : readTrackingStatus(ref.track)

        return {
            name,
            commitHash: ref.commitHash,
            message: truncate(ref.message, this.subjectWidth),
            reference: ref.reference,
            remote: isRemote ? this.remote : '',
            isCurrent: !isRemote && ref.isHead && name === currentBranch,
            isRemote,
            isDefault: isProtectedBranch(name, this.protectedBranches),
            isMerged: mergedRefs.has(ref.reference),
            isStale: tracking?.stale ?? false,
            isBehind: tracking?.behind ?? false,
            trackingBranch: isRemote ? '' : ref.trackingBranch,
            lastCommitAt: ref.lastCommitAt,
        }
    }
}
