import { defaultProtectedBranches, defaultRemote } from '../program/constants.js'
import { silentLogger, type Logger } from '../utils/logger.js'
import { readHead } from './BranchInventory.js'
import {
    AuthenticationFailedError,
    CommandError,
    CurrentBranchError,
    NotFoundError,
    ProtectedBranchError,
    UnmergedBranchError,
    type RemoteScheme,
} from './errors.js'
import type { DeleteOptions, DeletionReport, GitRunner } from './types.js'
import { isProtectedBranch, validateBranchName } from './validate.js'

const authenticationFailures = ['could not read Username', 'Authentication failed', 'Permission denied']

export const remediation: Record<RemoteScheme, string> = {
    https: 'For HTTPS remotes, store your credentials with a helper: git config --global credential.helper store',
    ssh: 'For SSH remotes, make sure your key is loaded (ssh-add -l) and registered with the git host',
    unknown:
        'For HTTPS remotes, configure a credential helper (git config --global credential.helper store); ' +
        'for SSH remotes, make sure your key is loaded in ssh-agent',
}

export function detectRemoteScheme(url: string): RemoteScheme {
    if (/^https?:\/\//i.test(url)) {
        return 'https'
    }

    if (/^ssh:\/\//i.test(url) || /^[^/@\s]+@[^:\s]+:/.test(url)) {
        return 'ssh'
    }

    return 'unknown'
}

export interface BranchDeleterOptions {
    remote?: string
    protectedBranches?: readonly string[]
    /** Run every check, skip the mutating git call */
    dryRun?: boolean
    /** Timeout for network calls (ls-remote, push); defaults to the runner's own */
    remoteTimeoutMs?: number
    logger?: Logger
}

/**
 * Deletes one branch at a time, re-checking its state with git right before acting
 */
export default class BranchDeleter {
    readonly remote: string
    readonly protectedBranches: readonly string[]
    readonly dryRun: boolean
    readonly remoteTimeoutMs: number | undefined
    private readonly runner: GitRunner
    private readonly logger: Logger

    constructor(runner: GitRunner, ops: BranchDeleterOptions = {}) {
        this.runner = runner
        this.remote = ops.remote ?? defaultRemote
        this.protectedBranches = ops.protectedBranches ?? defaultProtectedBranches
        this.dryRun = ops.dryRun ?? false
        this.remoteTimeoutMs = ops.remoteTimeoutMs
        this.logger = ops.logger ?? silentLogger
    }

    /**
     * Name check, protection check, existence check, then (local, unforced) merge check, then delete.
     * Protection is checked before git is ever called and `force` does not lift it.
     */
    async deleteBranch(name: string, { force, remote }: DeleteOptions): Promise<DeletionReport> {
        validateBranchName(name)

        if (isProtectedBranch(name, this.protectedBranches)) {
            throw new ProtectedBranchError(name)
        }

        if (remote) {
            if (!(await this.remoteBranchExists(name))) {
                throw new NotFoundError(name, this.remote)
            }
        } else {
            if (!(await this.localBranchExists(name))) {
                throw new NotFoundError(name)
            }

            const head = await readHead(this.runner)
            if (head.branch === name) {
                throw new CurrentBranchError(name)
            }

            // Nothing is merged into a HEAD without commits
            if (!force && (head.unborn || !(await this.isMerged(name)))) {
                throw new UnmergedBranchError(name)
            }
        }

        const command = remote ? ['push', this.remote, '--delete', name] : ['branch', force ? '-D' : '-d', name]
        const report: DeletionReport = { name, remote, force, dryRun: this.dryRun, command }

        if (this.dryRun) {
            this.logger.info(`Would run: git ${command.join(' ')}`)
            return report
        }

        if (remote) {
            await this.runRemote(name, command, { echoStderr: true })
        } else {
            await this.runLocalDeletion(name, command)
        }

        this.logger.debug(`Deleted ${remote ? `${this.remote}/` : ''}${name}`)
        return report
    }

    async localBranchExists(name: string): Promise<boolean> {
        try {
            await this.runner.run(['show-ref', '--verify', '--quiet', `refs/heads/${name}`])
            return true
        } catch (err) {
            // show-ref exits with 1 and prints nothing when the ref is missing
            if (err instanceof CommandError && err.exitCode === 1) {
                return false
            }

            throw err
        }
    }

    async remoteBranchExists(name: string): Promise<boolean> {
        const out = await this.runRemote(name, ['ls-remote', '--heads', this.remote, `refs/heads/${name}`])

        return out !== ''
    }

    /**
     * Whether the branch tip is reachable from HEAD
     */
    async isMerged(name: string): Promise<boolean> {
        const out = await this.runner.run(['branch', '--list', name, '--merged', 'HEAD', '--format=%(refname)'])

        return out.split('\n').some((line) => line.trim() === `refs/heads/${name}`)
    }

    private async runLocalDeletion(name: string, command: string[]): Promise<void> {
        try {
            await this.runner.run(command)
        } catch (err) {
            // The branch changed between our check and git's own
            if (err instanceof CommandError && err.stderr.includes('not fully merged')) {
                throw new UnmergedBranchError(name)
            }

            throw err
        }
    }

    /**
     * Runs a command that talks to the remote and turns credential failures into
     * AuthenticationFailedError. Other errors pass through untouched.
     */
    private async runRemote(name: string, command: string[], ops: { echoStderr?: boolean } = {}): Promise<string> {
        try {
            return await this.runner.run(command, { timeoutMs: this.remoteTimeoutMs, echoStderr: ops.echoStderr })
        } catch (err) {
            if (!(err instanceof CommandError)) {
                throw err
            }

            if (authenticationFailures.some((text) => err.stderr.includes(text))) {
                const scheme = await this.lookupRemoteScheme()
                throw new AuthenticationFailedError(name, this.remote, scheme, remediation[scheme])
            }

            if (err.stderr.includes('remote rejected')) {
                throw new CommandError(
                    {
                        command: err.command,
                        stderr: err.stderr,
                        exitCode: err.exitCode,
                        reason: `remote rejected deletion of branch '${name}'`,
                        hint: `Check that you have write access to "${this.remote}" and that the branch is not protected on the server`,
                    },
                    { cause: err },
                )
            }

            throw err
        }
    }

    private async lookupRemoteScheme(): Promise<RemoteScheme> {
        try {
            return detectRemoteScheme(await this.runner.run(['remote', 'get-url', this.remote]))
        } catch (err) {
            this.logger.debug(`Could not read the URL of remote "${this.remote}": ${String(err)}`)
            return 'unknown'
        }
    }
}
