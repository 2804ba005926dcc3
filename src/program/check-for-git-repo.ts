import type { GitRunner } from '../git/types.js'

/**
 * Rejects with the git error when the working directory is not inside a repository
 */
export async function checkForGitRepo(runner: GitRunner): Promise<string> {
    return runner.run(['rev-parse', '--show-toplevel'])
}
