/**
 * One local or remote-tracking branch, as seen by a single inventory query
 */
export interface BranchRecord {
    /** Display name; the remote prefix is stripped for remote-tracking branches */
    readonly name: string
    readonly commitHash: string
    /** First line of the tip commit message */
    readonly message: string
    /** Full ref path, e.g. refs/heads/main or refs/remotes/origin/main */
    readonly reference: string
    /** Remote the ref belongs to; empty for local branches */
    readonly remote: string
    readonly isCurrent: boolean
    readonly isRemote: boolean
    /** Matches the protected branch list; never deletable */
    readonly isDefault: boolean
    /** Tip is reachable from HEAD */
    readonly isMerged: boolean
    /** Upstream was deleted ("gone") */
    readonly isStale: boolean
    readonly isBehind: boolean
    /** Upstream short name, or '' when the branch tracks nothing */
    readonly trackingBranch: string
    /** Committer date of the tip, seconds since epoch */
    readonly lastCommitAt: number | undefined
}

export type DeletionOutcome =
    | { readonly name: string; readonly isRemote: boolean; readonly succeeded: true }
    | { readonly name: string; readonly isRemote: boolean; readonly succeeded: false; readonly errorDetail: string }

export interface DeleteOptions {
    force: boolean
    remote: boolean
}

/**
 * What deleteBranch did, or would have done in dry-run mode
 */
export interface DeletionReport {
    name: string
    remote: boolean
    force: boolean
    dryRun: boolean
    /** git arguments of the mutating call */
    command: string[]
}

export interface RunOptions {
    /** Overrides the executor's default timeout for this call */
    timeoutMs?: number
    /** Mirror the child's stderr to ours while still capturing it */
    echoStderr?: boolean
}

/**
 * Anything that can run git and hand back its trimmed stdout.
 * GitExecutor is the real one; tests substitute a scripted fake.
 */
export interface GitRunner {
    run(args: string[], options?: RunOptions): Promise<string>
}
