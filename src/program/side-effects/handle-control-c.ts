import { isExitPromptError } from '../report-error.js'

// Prompts that reject outside of a command's promise chain still exit quietly
process.on('uncaughtException', (error) => {
    if (isExitPromptError(error)) {
        console.info('\n👋 No branches were deleted.')
        process.exit(0)
    }

    process.stderr.write(`${error.stack ?? error.message}\n`)
    process.exit(1)
})
