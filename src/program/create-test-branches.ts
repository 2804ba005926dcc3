import { randomBytes } from 'node:crypto'
import { describeError, isBranchError } from '../git/errors.js'
import type { GitRunner } from '../git/types.js'
import { sanitizeBranchName, validateBranchName } from '../git/validate.js'
import { gray } from '../utils/colors.js'
import { plural } from '../utils/format.js'
import { silentLogger, type Logger } from '../utils/logger.js'
import type { ProgramContext } from './context.js'

/**
 * e.g. "test_3f9a01bc"
 */
export function scratchBranchName(prefix: string, suffix: string = randomBytes(4).toString('hex')): string {
    return sanitizeBranchName(`${prefix}_${suffix}`)
}

export interface ScratchBranchOptions {
    count: number
    prefix: string
    /** Also push every branch to `remote` */
    push: boolean
    remote: string
    remoteTimeoutMs?: number
    dryRun: boolean
    logger?: Logger
    nextName?: () => string
}

/**
 * Creates `count` branches at HEAD. A failed push leaves the local branch in place.
 * Resolves with the names created (or, in a dry run, the names that would be).
 */
export async function createScratchBranches(runner: GitRunner, ops: ScratchBranchOptions): Promise<string[]> {
    const logger = ops.logger ?? silentLogger
    const nextName = ops.nextName ?? (() => scratchBranchName(ops.prefix))
    const created: string[] = []

    for (let i = 0; i < ops.count; i++) {
        const name = nextName()
        validateBranchName(name)

        if (ops.dryRun) {
            logger.info(`Would create ${name}${ops.push ? ` and push it to ${ops.remote}` : ''}`)
            created.push(name)
            continue
        }

        await runner.run(['branch', name])
        created.push(name)

        if (!ops.push) {
            logger.info(`Created branch ${name}`)
            continue
        }

        try {
            await runner.run(['push', ops.remote, name], { timeoutMs: ops.remoteTimeoutMs, echoStderr: true })
            logger.info(`Created and pushed branch ${name}`)
        } catch (err) {
            if (!isBranchError(err)) {
                throw err
            }

            logger.warn(`Created ${name} but could not push it: ${describeError(err)}`)
        }
    }

    return created
}

export async function createTestBranches({ args, config, logger, runner }: ProgramContext): Promise<number> {
    const created = await createScratchBranches(runner, {
        count: args.count,
        prefix: args.prefix,
        push: args.remote || args.all,
        remote: config.defaultRemote,
        remoteTimeoutMs: config.remoteTimeoutMs,
        dryRun: config.dryRun,
        logger,
    })

    const total = plural(created.length, 'test branch', 'test branches')

    if (config.dryRun) {
        logger.success(`Would create ${total}`)
        return 0
    }

    logger.success(`Created ${total}`)
    logger.info(gray("Run 'git-branch-sweep --all' to clean them up"))

    return 0
}
