import { existsSync, readFileSync } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { z } from 'zod'
import { isValidBranchName } from '../git/validate.js'
import {
    defaultConcurrency,
    defaultDeadlineMs,
    defaultProtectedBranches,
    defaultRemote,
    defaultRemoteTimeoutMs,
    defaultSubjectWidth,
    defaultTimeoutMs,
} from '../program/constants.js'

export const configFileSchema = z
    .object({
        protectedBranches: z.array(z.string().trim().min(1, 'protected branch names cannot be empty')).optional(),
        defaultRemote: z
            .string()
            .refine(isValidBranchName, { message: 'remote name contains unsupported characters' })
            .optional(),
        dryRun: z.boolean().optional(),
        timeoutMs: z.number().int().positive().optional(),
        remoteTimeoutMs: z.number().int().positive().optional(),
        deadlineMs: z.number().int().positive().optional(),
        concurrency: z.number().int().min(1).max(32).optional(),
        subjectWidth: z.number().int().min(0).optional(),
    })
    .strict()

export type ConfigFile = z.infer<typeof configFileSchema>

/**
 * Settings every component receives through its constructor
 */
export interface SweepConfig {
    readonly protectedBranches: readonly string[]
    readonly defaultRemote: string
    readonly dryRun: boolean
    readonly timeoutMs: number
    /** ls-remote and push */
    readonly remoteTimeoutMs: number
    readonly deadlineMs: number
    readonly concurrency: number
    readonly subjectWidth: number
}

/** Command-line values that take precedence over the config file */
export type ConfigOverrides = { -readonly [K in keyof SweepConfig]?: SweepConfig[K] }

export const defaultConfig: SweepConfig = {
    protectedBranches: defaultProtectedBranches,
    defaultRemote,
    dryRun: false,
    timeoutMs: defaultTimeoutMs,
    remoteTimeoutMs: defaultRemoteTimeoutMs,
    deadlineMs: defaultDeadlineMs,
    concurrency: defaultConcurrency,
    subjectWidth: defaultSubjectWidth,
}

export class ConfigError extends Error {
    constructor(
        readonly file: string,
        message: string,
    ) {
        super(`Invalid config file ${file}: ${message}`)
        this.name = 'ConfigError'
    }
}

export function getDefaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
    const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config')

    return path.join(base, 'git-branch-sweep', 'config.json')
}

/**
 * Reads and validates the JSON config file. A missing file means "no overrides".
 */
export function loadConfigFile(file: string): ConfigFile {
    if (!existsSync(file)) {
        return {}
    }

    let raw: unknown
    try {
        raw = JSON.parse(readFileSync(file, 'utf-8'))
    } catch (err) {
        throw new ConfigError(file, err instanceof Error ? err.message : String(err))
    }

    const result = configFileSchema.safeParse(raw)
    if (!result.success) {
        const issue = result.error.issues[0]
        const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
        throw new ConfigError(file, `${where}${issue.message}`)
    }

    return result.data
}

/**
 * Layers file values and then command-line overrides on top of the defaults
 */
export function resolveConfig(file: ConfigFile, overrides: ConfigOverrides = {}): SweepConfig {
    return Object.freeze({
        protectedBranches: overrides.protectedBranches ?? file.protectedBranches ?? defaultConfig.protectedBranches,
        defaultRemote: overrides.defaultRemote ?? file.defaultRemote ?? defaultConfig.defaultRemote,
        dryRun: overrides.dryRun ?? file.dryRun ?? defaultConfig.dryRun,
        timeoutMs: overrides.timeoutMs ?? file.timeoutMs ?? defaultConfig.timeoutMs,
        remoteTimeoutMs: overrides.remoteTimeoutMs ?? file.remoteTimeoutMs ?? defaultConfig.remoteTimeoutMs,
        deadlineMs: overrides.deadlineMs ?? file.deadlineMs ?? defaultConfig.deadlineMs,
        concurrency: overrides.concurrency ?? file.concurrency ?? defaultConfig.concurrency,
        subjectWidth: overrides.subjectWidth ?? file.subjectWidth ?? defaultConfig.subjectWidth,
    })
}
