import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ConfigError, defaultConfig, getDefaultConfigPath, loadConfigFile, resolveConfig } from '../utils/config.js'

let dir: string

beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'branch-sweep-config-'))
})

afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
})

function writeConfig(content: string): string {
    const file = path.join(dir, 'config.json')
    writeFileSync(file, content)
    return file
}

describe('getDefaultConfigPath', () => {
    it('prefers XDG_CONFIG_HOME', () => {
        expect(getDefaultConfigPath({ XDG_CONFIG_HOME: '/tmp/xdg' })).toBe(path.join('/tmp/xdg', 'git-branch-sweep', 'config.json'))
    })

    it('falls back to ~/.config', () => {
        expect(getDefaultConfigPath({})).toBe(path.join(os.homedir(), '.config', 'git-branch-sweep', 'config.json'))
    })
})

describe('loadConfigFile', () => {
    it('treats a missing file as empty', () => {
        expect(loadConfigFile(path.join(dir, 'missing.json'))).toEqual({})
    })

    it('reads every supported field', () => {
        const file = writeConfig(
            JSON.stringify({
                protectedBranches: ['trunk', ' stable '],
                defaultRemote: 'upstream',
                dryRun: true,
                timeoutMs: 5000,
                remoteTimeoutMs: 90000,
                deadlineMs: 60000,
                concurrency: 8,
                subjectWidth: 0,
            }),
        )

        expect(loadConfigFile(file)).toEqual({
            protectedBranches: ['trunk', 'stable'],
            defaultRemote: 'upstream',
            dryRun: true,
            timeoutMs: 5000,
            remoteTimeoutMs: 90000,
            deadlineMs: 60000,
            concurrency: 8,
            subjectWidth: 0,
        })
    })

    it('names the offending field', () => {
        const file = writeConfig(JSON.stringify({ concurrency: 0 }))

        expect(() => loadConfigFile(file)).toThrow(ConfigError)
        expect(() => loadConfigFile(file)).toThrow(/^Invalid config file .*config\.json: concurrency: /)
    })

    it('rejects unknown fields', () => {
        const file = writeConfig(JSON.stringify({ remote: 'origin' }))

        expect(() => loadConfigFile(file)).toThrow(ConfigError)
    })

    it('rejects remote names git would not accept', () => {
        const file = writeConfig(JSON.stringify({ defaultRemote: 'origin; rm -rf /' }))

        expect(() => loadConfigFile(file)).toThrow('defaultRemote: remote name contains unsupported characters')
    })

    it('rejects malformed JSON', () => {
        const file = writeConfig('{ "dryRun": ')

        expect(() => loadConfigFile(file)).toThrow(ConfigError)
    })
})

describe('resolveConfig', () => {
    it('uses the defaults when nothing is set', () => {
        expect(resolveConfig({})).toEqual(defaultConfig)
    })

    it('layers the command line over the file', () => {
        const config = resolveConfig(
            { defaultRemote: 'upstream', timeoutMs: 5000, protectedBranches: ['trunk'] },
            { timeoutMs: 1000, dryRun: true },
        )

        expect(config.defaultRemote).toBe('upstream')
        expect(config.timeoutMs).toBe(1000)
        expect(config.dryRun).toBe(true)
        expect(config.protectedBranches).toEqual(['trunk'])
        expect(config.concurrency).toBe(defaultConfig.concurrency)
    })

    it('keeps a separate timeout for remote calls', () => {
        expect(resolveConfig({}).remoteTimeoutMs).toBe(60_000)
        expect(resolveConfig({ remoteTimeoutMs: 90_000 }, { timeoutMs: 1000 }).remoteTimeoutMs).toBe(90_000)
    })

    it('returns a frozen value', () => {
        expect(Object.isFrozen(resolveConfig({}))).toBe(true)
    })
})
