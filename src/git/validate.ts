import { InvalidArgumentError, InvalidNameError } from './errors.js'

export const MAX_BRANCH_NAME_LENGTH = 255

/**
 * Git subcommands this tool is allowed to run
 */
const allowedSubcommands = new Set([
    'branch',
    'for-each-ref',
    'rev-parse',
    'symbolic-ref',
    'show-ref',
    'ls-remote',
    'remote',
    'get-url',
    'push',
])

/**
 * Flags and fixed literals that may be passed verbatim
 */
const allowedFlags = new Set([
    // deletion
    '-d',
    '-D',
    '--delete',
    // listing
    '-r',
    '--remotes',
    '-a',
    '--all',
    '--merged',
    '--no-merged',
    '--list',
    '--heads',
    // inspection
    '--abbrev-ref',
    '--short',
    '--show-toplevel',
    '--verify',
    '--quiet',
    '-q',
    // literals
    'HEAD',
    'origin',
    'refs/heads',
    'refs/remotes',
])

// Checked in order; the first match is reported
const dangerousPatterns = [';', '&', '|', '`', '$', '(', ')', '<', '>', '\\', '\n', '\r', '\t', '../', '@{']

const controlCharacters = /[\x00-\x1f\x7f]/
const whitespace = /\s/
const allowedCharacters = /^[A-Za-z0-9_/-]+$/
const alphanumericEnds = /^[A-Za-z0-9](?:.*[A-Za-z0-9])?$/s

/**
 * Returns the reason `name` is not an acceptable branch name, or undefined if it is
 */
function findBranchNameProblem(name: string): string | undefined {
    if (name === '') {
        return 'cannot be empty'
    }

    if (name.length > MAX_BRANCH_NAME_LENGTH) {
        return `cannot be longer than ${MAX_BRANCH_NAME_LENGTH} characters`
    }

    if (name.startsWith('.')) {
        return "cannot start with '.'"
    }

    for (const suffix of ['/', '.lock', '.']) {
        if (name.endsWith(suffix)) {
            return `cannot end with '${suffix}'`
        }
    }

    for (const sequence of ['..', '//']) {
        if (name.includes(sequence)) {
            return `cannot contain '${sequence}'`
        }
    }

    const pattern = dangerousPatterns.find((p) => name.includes(p))
    if (pattern) {
        return `contains dangerous pattern: ${/[\n\r\t]/.test(pattern) ? JSON.stringify(pattern) : pattern}`
    }

    if (controlCharacters.test(name)) {
        return 'contains control characters'
    }

    if (whitespace.test(name)) {
        return 'contains whitespace'
    }

    if (!allowedCharacters.test(name)) {
        return "contains characters other than letters, digits, '-', '_' and '/'"
    }

    if (!alphanumericEnds.test(name)) {
        return 'must start and end with a letter or digit'
    }

    return undefined
}

/**
 * Throws InvalidNameError unless `name` is safe to hand to git as a branch name
 */
export function validateBranchName(name: string): void {
    const problem = findBranchNameProblem(name)

    if (problem !== undefined) {
        throw new InvalidNameError(name, problem)
    }
}

export function isValidBranchName(name: string): boolean {
    return findBranchNameProblem(name) === undefined
}

/**
 * Throws InvalidArgumentError unless `arg` is an allow-listed subcommand or flag,
 * a tool-generated ref path or format string, or a valid branch name
 */
export function validateCommandArgument(arg: string): void {
    if (allowedSubcommands.has(arg) || allowedFlags.has(arg)) {
        return
    }

    if (arg.startsWith('refs/') || arg.startsWith('--format=') || arg.startsWith('%(')) {
        return
    }

    const problem = findBranchNameProblem(arg)

    if (problem !== undefined) {
        throw new InvalidArgumentError(arg, problem)
    }
}

/**
 * Case-insensitive check against the protected branch list
 */
export function isProtectedBranch(name: string, protectedBranches: readonly string[]): boolean {
    const normalized = name.trim().toLowerCase()

    return protectedBranches.some((branch) => branch.trim().toLowerCase() === normalized)
}

// Stripped outright by sanitizeBranchName, before any other cleanup
const strippedPatterns = [
    ...dangerousPatterns,
    '~',
    '%',
    ':',
    '?',
    '*',
    '[',
    ']',
    '{',
    '}',
    "'",
    '"',
]

/**
 * Best-effort cleanup for generating names (e.g. scratch branches in tests).
 * Never use this in place of validateBranchName before deleting anything.
 * The result is either '' or a name that passes validateBranchName.
 */
export function sanitizeBranchName(name: string): string {
    let result = name

    for (const pattern of strippedPatterns) {
        result = result.split(pattern).join('')
    }

    result = result
        .replace(/[\x00-\x1f\x7f\s]/g, '')
        .replace(/\.lock(?=\/|$)/g, '')
        .replace(/[^A-Za-z0-9_/-]/g, '-')
        .replace(/\/{2,}/g, '/')
        .slice(0, MAX_BRANCH_NAME_LENGTH)

    return result.replace(/^[^A-Za-z0-9]+/, '').replace(/[^A-Za-z0-9]+$/, '')
}
