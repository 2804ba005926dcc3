import type { BranchRecord } from '../git/types.js'
import { blue, cyan, gray, green, red, yellow } from '../utils/colors.js'
import { shortHash } from '../utils/format.js'
import type { ProgramContext } from './context.js'

export function statusTags(branch: BranchRecord): string[] {
    const tags: string[] = []

    if (branch.isDefault) tags.push(yellow('protected'))
    if (branch.isRemote) tags.push(blue('remote'))
    if (branch.isStale) tags.push(red('stale'))
    if (branch.isBehind) tags.push(yellow('behind'))
    tags.push(branch.isMerged ? green('merged') : yellow('unmerged'))

    return tags
}

/**
 * One display line: marker, name, status tags, short hash and subject
 */
export function formatBranchLine(branch: BranchRecord, nameWidth: number): string {
    const marker = branch.isCurrent ? cyan('*') : ' '
    const name = (branch.isRemote ? `${branch.remote}/${branch.name}` : branch.name).padEnd(nameWidth)
    const hash = gray(shortHash(branch.commitHash))

    return `${marker} ${name}  ${hash} ${branch.message}  (${statusTags(branch).join(', ')})`.trimEnd()
}

export async function listBranches({ args, store, logger }: ProgramContext): Promise<number> {
    await store.preprocess()

    const branches = store.branches.filter((b) => args.all || (args.remote ? b.isRemote : !b.isRemote))

    if (branches.length === 0) {
        logger.info(args.all ? 'No branches found' : args.remote ? 'No remote branches found' : 'No local branches found')
        return 0
    }

    const nameWidth = Math.max(...branches.map((b) => (b.isRemote ? b.remote.length + 1 : 0) + b.name.length))

    logger.info(`Found ${branches.length} branch${branches.length === 1 ? '' : 'es'}:`)
    branches.forEach((branch) => console.info(formatBranchLine(branch, nameWidth)))

    return 0
}
