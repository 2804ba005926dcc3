export type RemoteScheme = 'https' | 'ssh' | 'unknown'

export type BranchErrorKind =
    | 'InvalidName'
    | 'InvalidArgument'
    | 'ProtectedBranch'
    | 'NotFound'
    | 'CurrentBranch'
    | 'UnmergedBranch'
    | 'AuthenticationFailed'
    | 'CommandError'
    | 'Timeout'
    | 'DeadlineExceeded'

/**
 * Base class of every failure the branch core reports.
 * `kind` is the discriminant; switch on it instead of using `instanceof` chains.
 */
export abstract class GitBranchError extends Error {
    abstract readonly kind: BranchErrorKind
}

export class InvalidNameError extends GitBranchError {
    readonly kind = 'InvalidName'

    constructor(
        readonly branch: string,
        readonly reason: string,
    ) {
        super(`Invalid branch name "${branch}": ${reason}`)
        this.name = 'InvalidNameError'
    }
}

export class InvalidArgumentError extends GitBranchError {
    readonly kind = 'InvalidArgument'

    constructor(
        readonly argument: string,
        readonly reason: string,
    ) {
        super(`Refusing to pass argument "${argument}" to git: ${reason}`)
        this.name = 'InvalidArgumentError'
    }
}

export class ProtectedBranchError extends GitBranchError {
    readonly kind = 'ProtectedBranch'

    constructor(readonly branch: string) {
        super(`Cannot delete protected branch: ${branch}`)
        this.name = 'ProtectedBranchError'
    }
}

export class NotFoundError extends GitBranchError {
    readonly kind = 'NotFound'

    constructor(
        readonly branch: string,
        readonly remote: string = '',
    ) {
        super(remote ? `Branch not found on remote "${remote}": ${branch}` : `Branch not found: ${branch}`)
        this.name = 'NotFoundError'
    }
}

export class CurrentBranchError extends GitBranchError {
    readonly kind = 'CurrentBranch'

    constructor(readonly branch: string) {
        super(`Cannot delete the checked out branch: ${branch}`)
        this.name = 'CurrentBranchError'
    }
}

export class UnmergedBranchError extends GitBranchError {
    readonly kind = 'UnmergedBranch'

    constructor(readonly branch: string) {
        super(`Branch has unmerged changes: ${branch} (use --force to delete it anyway)`)
        this.name = 'UnmergedBranchError'
    }
}

export class AuthenticationFailedError extends GitBranchError {
    readonly kind = 'AuthenticationFailed'

    constructor(
        readonly branch: string,
        readonly remote: string,
        readonly scheme: RemoteScheme,
        readonly remediation: string,
    ) {
        super(`Authentication with remote "${remote}" failed while deleting ${branch}`)
        this.name = 'AuthenticationFailedError'
    }
}

export class CommandError extends GitBranchError {
    readonly kind = 'CommandError'
    readonly command: string
    readonly stderr: string
    readonly exitCode: number | null
    readonly hint: string

    constructor(
        ops: { command: string; stderr?: string; exitCode?: number | null; hint?: string; reason?: string },
        options?: { cause?: unknown },
    ) {
        const reason = ops.reason ?? (ops.stderr?.trim() || `exited with code ${ops.exitCode ?? 'unknown'}`)
        super(`git ${ops.command} failed: ${reason}`, options)
        this.name = 'CommandError'
        this.command = ops.command
        this.stderr = ops.stderr ?? ''
        this.exitCode = ops.exitCode ?? null
        this.hint = ops.hint ?? ''
    }
}

export class TimeoutError extends GitBranchError {
    readonly kind = 'Timeout'

    constructor(
        readonly command: string,
        readonly durationMs: number,
    ) {
        super(`git ${command} timed out after ${durationMs}ms`)
        this.name = 'TimeoutError'
    }
}

export class DeadlineExceededError extends GitBranchError {
    readonly kind = 'DeadlineExceeded'

    constructor(readonly deadlineMs: number) {
        super(`Batch did not finish within ${deadlineMs}ms`)
        this.name = 'DeadlineExceededError'
    }
}

export type BranchError =
    | InvalidNameError
    | InvalidArgumentError
    | ProtectedBranchError
    | NotFoundError
    | CurrentBranchError
    | UnmergedBranchError
    | AuthenticationFailedError
    | CommandError
    | TimeoutError
    | DeadlineExceededError

export function isBranchError(err: unknown): err is BranchError {
    return err instanceof GitBranchError
}

/**
 * Human readable message for any error thrown by the branch core.
 * Unknown errors fall back to their message.
 */
export function describeError(err: unknown): string {
    if (!isBranchError(err)) {
        return err instanceof Error ? err.message : String(err)
    }

    switch (err.kind) {
        case 'InvalidName':
        case 'InvalidArgument':
        case 'ProtectedBranch':
        case 'NotFound':
        case 'CurrentBranch':
        case 'UnmergedBranch':
        case 'Timeout':
        case 'DeadlineExceeded':
            return err.message
        case 'AuthenticationFailed':
            return `${err.message}\n${err.remediation}`
        case 'CommandError':
            return err.hint ? `${err.message}\n${err.hint}` : err.message
        default: {
            const unreachable: never = err
            return String(unreachable)
        }
    }
}
