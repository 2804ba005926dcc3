import * as readline from 'node:readline'
import { dim, gray, green, red, yellow } from '../utils/colors.js'
import { plural } from '../utils/format.js'
import type { QueuedBranch } from './store/BranchStore.js'

/** Result of the confirmation prompt */
export type ConfirmResult = 'confirm' | 'cancel' | 'back'

/**
 * The git command each queued branch will run, as the user could type it
 */
export function commandFor(branch: QueuedBranch, remote: string): string {
    if (branch.isRemote) {
        return `git push ${remote} --delete ${branch.name}`
    }

    return `git branch ${branch.force ? '-D' : '-d'} ${branch.name}`
}

/**
 * Clear N lines from the terminal by moving cursor up and clearing each line.
 */
function clearLines(count: number): void {
    for (let i = 0; i < count; i++) {
        process.stdout.write('\x1b[1A\x1b[2K')
    }
}

/**
 * Confirm prompt that supports Escape to go back.
 * @param linesToClear - Number of lines to clear if user goes back
 */
async function confirmWithEscape(message: string, linesToClear: number): Promise<ConfirmResult> {
    const hint = gray('(y/N, Esc to go back)')
    process.stdout.write(`? ${message} ${hint} `)

    return new Promise((resolve) => {
        const rl = readline.createInterface({
            input: process.stdin,
            output: process.stdout,
            terminal: true,
            escapeCodeTimeout: 50, // Low timeout for fast Escape key response
        })

        if (process.stdin.isTTY) {
            process.stdin.setRawMode(true)
        }

        const finish = (result: ConfirmResult, clearOutput: boolean = false) => {
            process.stdin.removeListener('keypress', handler)
            if (process.stdin.isTTY) {
                process.stdin.setRawMode(false)
            }
            rl.close()

            if (clearOutput) {
                process.stdout.write('\x1b[2K\r')
                clearLines(linesToClear)
            } else {
                process.stdout.write('\n')
            }

            resolve(result)
        }

        const handler = (_str: string | undefined, key: readline.Key | undefined) => {
            if (!key) {
                return
            }

            if (key.name === 'escape') {
                finish('back', true)
            } else if (key.name === 'y') {
                finish('confirm')
            } else if (key.name === 'n' || key.name === 'return' || (key.name === 'c' && key.ctrl)) {
                finish('cancel')
            }
        }

        readline.emitKeypressEvents(process.stdin, rl)
        process.stdin.on('keypress', handler)
    })
}

/**
 * Display the commands that will run and ask for confirmation.
 * Returns 'confirm', 'cancel', or 'back' when the user presses Escape.
 */
export async function confirmDeletion(
    queue: Array<QueuedBranch>,
    { remote, dryRun }: { remote: string; dryRun: boolean },
): Promise<ConfirmResult> {
    if (queue.length === 0) {
        console.info('👋 No branches selected')
        return 'cancel'
    }

    const groups: Array<[title: string, branches: Array<QueuedBranch>]> = [
        [green('Safely delete'), queue.filter((b) => !b.isRemote && !b.force)],
        [red('Force delete'), queue.filter((b) => !b.isRemote && b.force)],
        [yellow(`Delete from ${remote}`), queue.filter((b) => b.isRemote)],
    ]

    // Count lines as we print them (for clearing on 'back')
    let lineCount = 0

    console.log(`\nThe following commands will ${dryRun ? 'be checked (dry run)' : 'be executed'}:\n`)
    lineCount += 3

    groups.forEach(([title, branches]) => {
        if (branches.length === 0) {
            return
        }

        console.log(`${title} ${plural(branches.length, 'branch', 'branches')}:`)
        branches.forEach((branch) => console.log(dim(`  ${commandFor(branch, remote)}`)))
        console.log('')
        lineCount += branches.length + 2
    })

    return confirmWithEscape(`Delete ${plural(queue.length, 'branch', 'branches')}?`, lineCount)
}
