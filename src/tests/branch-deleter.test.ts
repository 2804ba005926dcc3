import { describe, expect, it, vi } from 'vitest'
import BranchDeleter, { detectRemoteScheme, remediation } from '../git/BranchDeleter.js'
import {
    AuthenticationFailedError,
    CommandError,
    CurrentBranchError,
    InvalidNameError,
    NotFoundError,
    ProtectedBranchError,
    UnmergedBranchError,
    describeError,
} from '../git/errors.js'
import type { Logger } from '../utils/logger.js'
import { FakeRunner, gitFailure } from './helpers/fake-runner.js'

const currentBranch = 'rev-parse --abbrev-ref HEAD'
const exists = (name: string) => `show-ref --verify --quiet refs/heads/${name}`
const merged = (name: string) => `branch --list ${name} --merged HEAD --format=%(refname)`
const lsRemote = (name: string) => `ls-remote --heads origin refs/heads/${name}`

/**
 * main (current, protected), feature/a (merged into main), feature/b (not merged)
 */
function repository(): FakeRunner {
    return new FakeRunner()
        .on(currentBranch, 'main')
        .on(exists('main'), '')
        .on(exists('feature/a'), '')
        .on(exists('feature/b'), '')
        .on(exists('gone'), gitFailure(exists('gone'), '', 1))
        .on(merged('feature/a'), 'refs/heads/feature/a')
        .on(merged('feature/b'), '')
        .on('branch -d feature/a', "Deleted branch feature/a (was abc1234).")
        .on('branch -D feature/b', "Deleted branch feature/b (was def5678).")
        .on(lsRemote('feature/a'), 'abc1234abc1234abc1234abc1234abc1234abcd\trefs/heads/feature/a')
        .on(lsRemote('gone'), '')
        .on('push origin --delete feature/a', '')
        .on('remote get-url origin', 'https://git.example.com/team/repo.git')
}

function recordingLogger(): Logger & { lines: string[] } {
    const lines: string[] = []
    const record = (message: string) => {
        lines.push(message)
    }

    return {
        lines,
        debug: () => {},
        info: record,
        success: record,
        warn: record,
        error: record,
    }
}

describe('BranchDeleter', () => {
    describe('local branches', () => {
        it('deletes a merged branch with -d', async () => {
            const runner = repository()
            const report = await new BranchDeleter(runner).deleteBranch('feature/a', { force: false, remote: false })

            expect(report).toEqual({
                name: 'feature/a',
                remote: false,
                force: false,
                dryRun: false,
                command: ['branch', '-d', 'feature/a'],
            })
            expect(runner.commands()).toEqual([
                exists('feature/a'),
                currentBranch,
                merged('feature/a'),
                'branch -d feature/a',
            ])
        })

        it('refuses an unmerged branch without force', async () => {
            const runner = repository()

            await expect(
                new BranchDeleter(runner).deleteBranch('feature/b', { force: false, remote: false }),
            ).rejects.toBeInstanceOf(UnmergedBranchError)
            expect(runner.ran('branch -d feature/b')).toBe(false)
        })

        it('deletes an unmerged branch with -D when forced, skipping the merge check', async () => {
            const runner = repository()
            const report = await new BranchDeleter(runner).deleteBranch('feature/b', { force: true, remote: false })

            expect(report.command).toEqual(['branch', '-D', 'feature/b'])
            expect(runner.ran(merged('feature/b'))).toBe(false)
        })

        it('refuses protected branches before running git, even when forced', async () => {
            const runner = repository()

            await expect(
                new BranchDeleter(runner).deleteBranch('main', { force: true, remote: false }),
            ).rejects.toThrow(new ProtectedBranchError('main'))
            await expect(
                new BranchDeleter(runner).deleteBranch('Master', { force: true, remote: true }),
            ).rejects.toBeInstanceOf(ProtectedBranchError)
            expect(runner.calls).toEqual([])
        })

        it('refuses invalid names before running git', async () => {
            const runner = repository()

            await expect(
                new BranchDeleter(runner).deleteBranch('x; rm -rf /', { force: true, remote: false }),
            ).rejects.toBeInstanceOf(InvalidNameError)
            expect(runner.calls).toEqual([])
        })

        it('reports a missing branch as NotFound on every attempt', async () => {
            const deleter = new BranchDeleter(repository())

            for (let attempt = 0; attempt < 3; attempt++) {
                await expect(deleter.deleteBranch('gone', { force: false, remote: false })).rejects.toThrow(
                    'Branch not found: gone',
                )
            }
        })

        it('refuses the checked out branch', async () => {
            const runner = repository().on(currentBranch, 'feature/a')

            await expect(
                new BranchDeleter(runner).deleteBranch('feature/a', { force: true, remote: false }),
            ).rejects.toBeInstanceOf(CurrentBranchError)
        })

        it('treats nothing as merged while on an orphan branch', async () => {
            const runner = repository()
                .on(currentBranch, gitFailure(currentBranch, "fatal: ambiguous argument 'HEAD': unknown revision", 128))
                .on('symbolic-ref --short HEAD', 'scratch')
            const deleter = new BranchDeleter(runner)

            await expect(deleter.deleteBranch('feature/a', { force: false, remote: false })).rejects.toBeInstanceOf(
                UnmergedBranchError,
            )
            expect(runner.ran(merged('feature/a'))).toBe(false)

            await expect(deleter.deleteBranch('feature/b', { force: true, remote: false })).resolves.toMatchObject({
                command: ['branch', '-D', 'feature/b'],
            })
        })

        it('turns a late "not fully merged" refusal into UnmergedBranch', async () => {
            const runner = repository().on(
                'branch -d feature/a',
                gitFailure('branch -d feature/a', "error: The branch 'feature/a' is not fully merged."),
            )

            await expect(
                new BranchDeleter(runner).deleteBranch('feature/a', { force: false, remote: false }),
            ).rejects.toBeInstanceOf(UnmergedBranchError)
        })

        it('passes other git failures through unchanged', async () => {
            const failure = gitFailure('show-ref --verify --quiet refs/heads/feature/a', 'fatal: not a git repository', 128)
            const runner = repository().on(exists('feature/a'), failure)

            await expect(
                new BranchDeleter(runner).deleteBranch('feature/a', { force: false, remote: false }),
            ).rejects.toBe(failure)
        })
    })

    describe('dry run', () => {
        it('runs every check but not the deletion', async () => {
            const runner = repository()
            const logger = recordingLogger()
            const report = await new BranchDeleter(runner, { dryRun: true, logger }).deleteBranch('feature/a', {
                force: false,
                remote: false,
            })

            expect(report.dryRun).toBe(true)
            expect(runner.commands()).toEqual([exists('feature/a'), currentBranch, merged('feature/a')])
            expect(logger.lines).toEqual(['Would run: git branch -d feature/a'])
        })

        it('still refuses unmerged branches', async () => {
            await expect(
                new BranchDeleter(repository(), { dryRun: true }).deleteBranch('feature/b', { force: false, remote: false }),
            ).rejects.toBeInstanceOf(UnmergedBranchError)
        })
    })

    describe('remote branches', () => {
        it('checks the remote and pushes the deletion with stderr mirrored', async () => {
            const runner = repository()
            const report = await new BranchDeleter(runner, { remoteTimeoutMs: 60_000 }).deleteBranch('feature/a', {
                force: false,
                remote: true,
            })

            expect(report.command).toEqual(['push', 'origin', '--delete', 'feature/a'])
            expect(runner.commands()).toEqual([lsRemote('feature/a'), 'push origin --delete feature/a'])
            expect(runner.calls[1].options).toEqual({ timeoutMs: 60_000, echoStderr: true })
        })

        it('reports a branch missing on the remote as NotFound', async () => {
            await expect(
                new BranchDeleter(repository()).deleteBranch('gone', { force: false, remote: true }),
            ).rejects.toThrow('Branch not found on remote "origin": gone')
        })

        it('uses the configured remote', async () => {
            const runner = new FakeRunner()
                .on('ls-remote --heads upstream refs/heads/topic', 'abc\trefs/heads/topic')
                .on('push upstream --delete topic', '')

            await new BranchDeleter(runner, { remote: 'upstream' }).deleteBranch('topic', { force: false, remote: true })

            expect(runner.ran('push upstream --delete topic')).toBe(true)
        })

        it('translates credential failures with advice for the remote scheme', async () => {
            const runner = repository().on(
                'push origin --delete feature/a',
                gitFailure('push origin --delete feature/a', "fatal: could not read Username for 'https://git.example.com'", 128),
            )
            const error = await new BranchDeleter(runner)
                .deleteBranch('feature/a', { force: false, remote: true })
                .catch((err: unknown) => err)

            expect(error).toBeInstanceOf(AuthenticationFailedError)
            if (error instanceof AuthenticationFailedError) {
                expect(error.scheme).toBe('https')
                expect(error.remediation).toBe(remediation.https)
                expect(describeError(error)).toBe(
                    `Authentication with remote "origin" failed while deleting feature/a\n${remediation.https}`,
                )
            }
        })

        it('translates credential failures of the existence check', async () => {
            const runner = repository()
                .on(lsRemote('feature/a'), gitFailure(lsRemote('feature/a'), 'git@git.example.com: Permission denied (publickey).', 128))
                .on('remote get-url origin', 'git@git.example.com:team/repo.git')
            const error = await new BranchDeleter(runner)
                .deleteBranch('feature/a', { force: false, remote: true })
                .catch((err: unknown) => err)

            expect(error).toBeInstanceOf(AuthenticationFailedError)
            if (error instanceof AuthenticationFailedError) {
                expect(error.scheme).toBe('ssh')
            }
            expect(runner.ran('push origin --delete feature/a')).toBe(false)
        })

        it('falls back to generic advice when the remote URL cannot be read', async () => {
            const runner = repository()
                .on(lsRemote('feature/a'), gitFailure(lsRemote('feature/a'), 'remote: Authentication failed', 128))
                .on('remote get-url origin', gitFailure('remote get-url origin', "error: No such remote 'origin'", 2))
            const error = await new BranchDeleter(runner)
                .deleteBranch('feature/a', { force: false, remote: true })
                .catch((err: unknown) => err)

            expect(error).toBeInstanceOf(AuthenticationFailedError)
            if (error instanceof AuthenticationFailedError) {
                expect(error.scheme).toBe('unknown')
                expect(error.remediation).toBe(remediation.unknown)
            }
        })

        it('adds a hint when the remote rejects the deletion', async () => {
            const runner = repository().on(
                'push origin --delete feature/a',
                gitFailure('push origin --delete feature/a', ' ! [remote rejected] feature/a (protected branch hook declined)'),
            )
            const error = await new BranchDeleter(runner)
                .deleteBranch('feature/a', { force: false, remote: true })
                .catch((err: unknown) => err)

            expect(error).toBeInstanceOf(CommandError)
            if (error instanceof CommandError) {
                expect(error.message).toBe("git push origin --delete feature/a failed: remote rejected deletion of branch 'feature/a'")
                expect(error.hint).toBe(
                    'Check that you have write access to "origin" and that the branch is not protected on the server',
                )
            }
        })

        it('does not translate failures of local deletions', async () => {
            const failure = gitFailure('branch -d feature/a', 'error: Permission denied')
            const runner = repository().on('branch -d feature/a', failure)

            await expect(
                new BranchDeleter(runner).deleteBranch('feature/a', { force: false, remote: false }),
            ).rejects.toBe(failure)
        })
    })
})

describe('detectRemoteScheme', () => {
    it.each([
        ['https://github.com/team/repo.git', 'https'],
        ['http://git.local/repo.git', 'https'],
        ['ssh://git@host:22/repo.git', 'ssh'],
        ['git@github.com:team/repo.git', 'ssh'],
        ['/srv/git/repo.git', 'unknown'],
        ['file:///srv/git/repo.git', 'unknown'],
    ])('%s is %s', (url, scheme) => {
        expect(detectRemoteScheme(url)).toBe(scheme)
    })
})

describe('a repository with merged and unmerged work', () => {
    it('deletes merged work, refuses unmerged work and never touches main', async () => {
        const deleter = new BranchDeleter(repository())
        const onDeleted = vi.fn()

        await deleter.deleteBranch('feature/a', { force: false, remote: false }).then(onDeleted)
        await expect(deleter.deleteBranch('feature/b', { force: false, remote: false })).rejects.toBeInstanceOf(
            UnmergedBranchError,
        )
        await expect(deleter.deleteBranch('main', { force: true, remote: false })).rejects.toBeInstanceOf(
            ProtectedBranchError,
        )
        expect(onDeleted).toHaveBeenCalledTimes(1)
    })

    it('reports NotFound for a missing branch', async () => {
        await expect(
            new BranchDeleter(repository()).deleteBranch('gone', { force: false, remote: false }),
        ).rejects.toBeInstanceOf(NotFoundError)
    })
})
