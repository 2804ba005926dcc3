/**
 * Split command output into lines and take out all the empty ones
 */
const split = (stdout: string): string[] => {
    return (
        (stdout || '')
            .split(/\r?\n/)
            .map((line) => line.trim())
            // remove empty
            .filter((line) => line !== '')
    )
}

export default split
