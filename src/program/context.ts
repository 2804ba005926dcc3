import GitExecutor from '../git/GitExecutor.js'
import type { GitRunner } from '../git/types.js'
import { getDefaultConfigPath, loadConfigFile, resolveConfig, type SweepConfig } from '../utils/config.js'
import type { CliArgs } from '../utils/establish-args.js'
import { createLogger, type Logger } from '../utils/logger.js'
import BranchStore from './store/BranchStore.js'

/**
 * Everything a command needs, built once from the command line
 */
export interface ProgramContext {
    args: CliArgs
    config: SweepConfig
    logger: Logger
    runner: GitRunner
    store: BranchStore
}

export function createContext(args: CliArgs): ProgramContext {
    const logger = createLogger({ quiet: args.quiet, debug: args.debug })
    const configPath = args.configPath ?? getDefaultConfigPath()
    const config = resolveConfig(loadConfigFile(configPath), args.overrides)

    logger.debug(`Using config ${configPath}`, config)

    const runner = new GitExecutor({ timeoutMs: config.timeoutMs, logger })

    return {
        args,
        config,
        logger,
        runner,
        store: new BranchStore(runner, config, logger),
    }
}
