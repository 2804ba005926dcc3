import { spawn } from 'node:child_process'
import { defaultTimeoutMs } from '../program/constants.js'
import { silentLogger, type Logger } from '../utils/logger.js'
import { CommandError, TimeoutError } from './errors.js'
import type { GitRunner, RunOptions } from './types.js'
import { validateCommandArgument } from './validate.js'

/**
 * Inherited variables that survive into the git child process.
 * Locating executables, finding the home directory, and talking to SSH agents
 * or credential helpers; nothing else.
 */
const inheritedVariables = [
    'PATH',
    'Path',
    'PATHEXT',
    'SYSTEMROOT',
    'HOME',
    'USERPROFILE',
    'XDG_CONFIG_HOME',
    'SSH_AUTH_SOCK',
    'SSH_AGENT_PID',
    'SSH_ASKPASS',
    'GIT_ASKPASS',
    'GIT_SSH',
    'GIT_SSH_COMMAND',
    'DISPLAY',
    'TERM',
]

const fixedVariables = {
    LC_ALL: 'C',
    LANG: 'C',
    GIT_TERMINAL_PROMPT: '1',
}

// Tab, newline and carriage return are the only control characters git output may carry
const unexpectedControlCharacters = /[\x00-\x08\x0b\x0c\x0e-\x1f\x7f\x9b]/

export function buildGitEnvironment(source: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = {}

    for (const name of inheritedVariables) {
        const value = source[name]
        if (value !== undefined) {
            env[name] = value
        }
    }

    return { ...env, ...fixedVariables }
}

export interface GitExecutorOptions {
    binary?: string
    /** Trusted arguments placed before every command; not validated */
    globalArgs?: string[]
    cwd?: string
    timeoutMs?: number
    /** 'inherit' lets git prompt for credentials on our terminal */
    stdin?: 'inherit' | 'ignore'
    /** Environment to filter; defaults to process.env */
    env?: NodeJS.ProcessEnv
    logger?: Logger
}

export default class GitExecutor implements GitRunner {
    readonly binary: string
    readonly globalArgs: string[]
    readonly cwd: string | undefined
    readonly timeoutMs: number
    readonly stdin: 'inherit' | 'ignore'
    readonly env: NodeJS.ProcessEnv
    private readonly logger: Logger

    constructor(ops: GitExecutorOptions = {}) {
        this.binary = ops.binary ?? 'git'
        this.globalArgs = ops.globalArgs ?? ['-c', 'color.ui=never']
        this.cwd = ops.cwd
        this.timeoutMs = ops.timeoutMs ?? defaultTimeoutMs
        this.stdin = ops.stdin ?? 'inherit'
        this.env = buildGitEnvironment(ops.env ?? process.env)
        this.logger = ops.logger ?? silentLogger
    }

    /**
     * Runs git with the given arguments and resolves with its trimmed stdout
     */
    async run(args: string[], options: RunOptions = {}): Promise<string> {
        // Throws InvalidArgumentError before anything is spawned
        args.forEach(validateCommandArgument)

        const command = args.join(' ')
        const timeoutMs = options.timeoutMs ?? this.timeoutMs

        this.logger.debug(`git ${command}`)

        return new Promise((resolve, reject) => {
            let settled = false
            let stdout = ''
            let stderr = ''

            const child = spawn(this.binary, [...this.globalArgs, ...args], {
                cwd: this.cwd,
                env: this.env,
                stdio: [this.stdin, 'pipe', 'pipe'],
            })

            const settle = (finish: () => void) => {
                if (settled) {
                    return
                }

                settled = true
                clearTimeout(timer)
                finish()
            }

            const timer = setTimeout(() => {
                settle(() => {
                    child.kill('SIGTERM')
                    reject(new TimeoutError(command, timeoutMs))
                })
            }, timeoutMs)

            child.stdout?.setEncoding('utf8')
            child.stderr?.setEncoding('utf8')

            child.stdout?.on('data', (chunk: string) => {
                stdout += chunk
            })

            child.stderr?.on('data', (chunk: string) => {
                stderr += chunk
                if (options.echoStderr) {
                    process.stderr.write(chunk)
                }
            })

            child.on('error', (err) => {
                settle(() => reject(new CommandError({ command, stderr, reason: err.message }, { cause: err })))
            })

            child.on('close', (code, signal) => {
                settle(() => {
                    if (code !== 0) {
                        reject(
                            new CommandError({
                                command,
                                stderr,
                                exitCode: code,
                                reason: signal ? `terminated by ${signal}` : undefined,
                            }),
                        )
                        return
                    }

                    if (unexpectedControlCharacters.test(stdout)) {
                        reject(new CommandError({ command, stderr, exitCode: code, reason: 'output contains control characters' }))
                        return
                    }

                    resolve(stdout.trim())
                })
            })
        })
    }
}
