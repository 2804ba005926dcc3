import { readFileSync } from 'node:fs'

/**
 * Version from package.json; src/utils and dist/utils both sit two levels below it
 */
export function readVersion(): string {
    try {
        const info: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'))
        if (typeof info === 'object' && info && 'version' in info && typeof info.version === 'string') {
            return info.version
        }
    } catch {
        // fall through to the placeholder
    }

    return '0.0.0'
}
