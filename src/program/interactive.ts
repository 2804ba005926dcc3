import { confirmDeletion, type ConfirmResult } from './confirm-deletion.js'
import type { ProgramContext } from './context.js'
import { executeDeletions } from './execute-deletions.js'
import { selectBranches, type PreviousSelection } from './select-branches.js'

export async function interactive({ args, config, store }: ProgramContext): Promise<number> {
    let previousSelection: PreviousSelection | undefined
    let confirmResult: ConfirmResult
    let selection: PreviousSelection | undefined

    // Loop between selection and confirmation screens
    // until user confirms, cancels, or exits
    do {
        // Screen 1: Select branches (restore previous selection if going back)
        selection = await selectBranches(
            store,
            { includeRemote: args.all || args.remote, force: args.force },
            previousSelection,
        )

        if (!selection) {
            return 0
        }

        // Save current selection in case user goes back
        previousSelection = selection

        // Screen 2: Confirm with command preview
        confirmResult = await confirmDeletion(selection, { remote: config.defaultRemote, dryRun: config.dryRun })

        if (confirmResult === 'cancel') {
            console.info('👋 No branches were removed.')
            return 0
        }

        // If 'back', loop continues and shows selection screen again
    } while (confirmResult === 'back')

    // Screen 3: Execute and show results
    return executeDeletions(store, selection)
}
