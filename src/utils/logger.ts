import { gray, green, red, yellow } from './colors.js'

export interface LoggerOptions {
    /** Only errors are printed */
    quiet?: boolean
    debug?: boolean
}

export interface Logger {
    debug: (message: string, ...args: unknown[]) => void
    info: (message: string, ...args: unknown[]) => void
    success: (message: string, ...args: unknown[]) => void
    warn: (message: string, ...args: unknown[]) => void
    error: (message: string, ...args: unknown[]) => void
}

function formatMessage(message: string, args: unknown[]): string {
    const formattedArgs = args.map((arg) => (typeof arg === 'object' ? JSON.stringify(arg) : String(arg)))

    return formattedArgs.length > 0 ? `${message} ${formattedArgs.join(' ')}` : message
}

export function createLogger(options: LoggerOptions = {}): Logger {
    const quiet = options.quiet ?? false
    const debug = !quiet && (options.debug ?? false)

    return {
        debug: (message, ...args) => {
            if (debug) {
                console.error(gray(`[debug] ${formatMessage(message, args)}`))
            }
        },
        info: (message, ...args) => {
            if (!quiet) {
                console.info(formatMessage(message, args))
            }
        },
        success: (message, ...args) => {
            if (!quiet) {
                console.info(green(`✅ ${formatMessage(message, args)}`))
            }
        },
        warn: (message, ...args) => {
            if (!quiet) {
                console.warn(yellow(`⚠️ ${formatMessage(message, args)}`))
            }
        },
        error: (message, ...args) => {
            console.error(red(`❌ ${formatMessage(message, args)}`))
        },
    }
}

/**
 * Swallows everything; the default for library classes
 */
export const silentLogger: Logger = {
    debug: () => {},
    info: () => {},
    success: () => {},
    warn: () => {},
    error: () => {},
}
