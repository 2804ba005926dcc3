import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { chunk, runCollectAll, runFailFast, sortOutcomes, type BatchItem } from '../git/batch.js'
import { DeadlineExceededError, UnmergedBranchError } from '../git/errors.js'

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))
const forever = () => new Promise<void>(() => {})

function branches(count: number, prefix = 'topic'): BatchItem[] {
    return Array.from({ length: count }, (_, i) => ({ name: `${prefix}-${i}`, isRemote: false }))
}

beforeEach(() => {
    vi.useFakeTimers()
})

afterEach(() => {
    vi.useRealTimers()
})

describe('chunk', () => {
    it('splits 25 items into chunks of 10, 10 and 5', () => {
        expect(chunk(branches(25), 10).map((group) => group.length)).toEqual([10, 10, 5])
    })

    it('keeps the item order', () => {
        expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]])
    })

    it('returns no chunks for no items', () => {
        expect(chunk([], 10)).toEqual([])
    })

    it('rejects sizes below one', () => {
        expect(() => chunk([1], 0)).toThrow(RangeError)
        expect(() => chunk([1], 1.5)).toThrow('Chunk size must be a positive integer, got 1.5')
    })
})

describe('runFailFast', () => {
    it('resolves once every item has run', async () => {
        const done: string[] = []
        const promise = runFailFast(
            branches(25),
            async (item) => {
                await wait(5)
                done.push(item.name)
            },
            { deadlineMs: 10_000 },
        )

        await vi.advanceTimersByTimeAsync(100)

        await expect(promise).resolves.toBeUndefined()
        expect(done).toHaveLength(25)
    })

    it('runs chunks side by side and items within a chunk one at a time', async () => {
        const started: string[] = []
        const promise = runFailFast(
            branches(25),
            async (item) => {
                started.push(item.name)
                await wait(10)
            },
            { deadlineMs: 10_000 },
        )

        // first item of each of the three chunks
        expect(started).toEqual(['topic-0', 'topic-10', 'topic-20'])

        await vi.advanceTimersByTimeAsync(10)
        expect(started).toEqual(['topic-0', 'topic-10', 'topic-20', 'topic-1', 'topic-11', 'topic-21'])

        await vi.advanceTimersByTimeAsync(100)
        await expect(promise).resolves.toBeUndefined()
    })

    it('returns the first error without waiting for chunks that never finish', async () => {
        const started: string[] = []
        const failure = new UnmergedBranchError('topic-12')
        const promise = runFailFast(
            branches(25),
            async (item) => {
                started.push(item.name)
                if (item.name === 'topic-12') {
                    await wait(10)
                    throw failure
                }
                if (item.name === 'topic-20') {
                    return forever()
                }
                await wait(10)
            },
            { deadlineMs: 10_000 },
        )
        const assertion = expect(promise).rejects.toBe(failure)

        await vi.advanceTimersByTimeAsync(30)
        await assertion

        await vi.advanceTimersByTimeAsync(500)
        expect(started).not.toContain('topic-13')
        expect(started).not.toContain('topic-21')
    })

    it('rejects with DeadlineExceeded and starts nothing after the deadline', async () => {
        const started: string[] = []
        const promise = runFailFast(
            branches(10),
            async (item) => {
                started.push(item.name)
                await wait(40)
            },
            { deadlineMs: 100 },
        )
        const assertion = expect(promise).rejects.toThrow(new DeadlineExceededError(100))

        await vi.advanceTimersByTimeAsync(100)
        await assertion

        await vi.advanceTimersByTimeAsync(500)
        expect(started).toEqual(['topic-0', 'topic-1', 'topic-2'])
    })

    it('rejects a bad chunk size', async () => {
        await expect(runFailFast(branches(2), forever, { deadlineMs: 100, chunkSize: 0 })).rejects.toBeInstanceOf(
            RangeError,
        )
    })

    it('resolves at once for no items', async () => {
        await expect(runFailFast([], forever, { deadlineMs: 100 })).resolves.toBeUndefined()
    })
})

describe('runCollectAll', () => {
    it('attempts every item and records failures', async () => {
        const items = [...branches(3), { name: 'bad-1', isRemote: false }, { name: 'bad-2', isRemote: true }]
        const promise = runCollectAll(
            items,
            async (item) => {
                await wait(10)
                if (item.name.startsWith('bad')) {
                    throw new UnmergedBranchError(item.name)
                }
            },
            { deadlineMs: 10_000 },
        )

        await vi.advanceTimersByTimeAsync(100)
        const outcomes = await promise

        expect(sortOutcomes(outcomes)).toEqual([
            {
                name: 'bad-1',
                isRemote: false,
                succeeded: false,
                errorDetail: 'Branch has unmerged changes: bad-1 (use --force to delete it anyway)',
            },
            { name: 'topic-0', isRemote: false, succeeded: true },
            { name: 'topic-1', isRemote: false, succeeded: true },
            { name: 'topic-2', isRemote: false, succeeded: true },
            {
                name: 'bad-2',
                isRemote: true,
                succeeded: false,
                errorDetail: 'Branch has unmerged changes: bad-2 (use --force to delete it anyway)',
            },
        ])
    })

    it('never runs more than the configured number of operations at once', async () => {
        let active = 0
        let peak = 0
        const promise = runCollectAll(
            branches(12),
            async () => {
                active++
                peak = Math.max(peak, active)
                await wait(10)
                active--
            },
            { deadlineMs: 10_000, concurrency: 4 },
        )

        await vi.advanceTimersByTimeAsync(100)

        await expect(promise).resolves.toHaveLength(12)
        expect(peak).toBe(4)
    })

    it('returns only what finished before the deadline', async () => {
        const started: string[] = []
        const promise = runCollectAll(
            branches(6),
            async (item) => {
                started.push(item.name)
                await wait(100)
            },
            { deadlineMs: 250, concurrency: 2 },
        )

        await vi.advanceTimersByTimeAsync(250)
        const outcomes = await promise

        expect(outcomes.map((o) => o.name)).toEqual(['topic-0', 'topic-1', 'topic-2', 'topic-3'])

        // late results are not added to the returned list
        await vi.advanceTimersByTimeAsync(500)
        expect(outcomes).toHaveLength(4)
        expect(started).toEqual(['topic-0', 'topic-1', 'topic-2', 'topic-3', 'topic-4', 'topic-5'])
    })

    it('reports progress as outcomes arrive', async () => {
        const progress: number[] = []
        const promise = runCollectAll(branches(3), () => wait(10), {
            deadlineMs: 1000,
            concurrency: 1,
            onOutcome: (_outcome, done) => progress.push(done),
        })

        await vi.advanceTimersByTimeAsync(100)
        await promise

        expect(progress).toEqual([1, 2, 3])
    })

    it('resolves with no outcomes for no items', async () => {
        await expect(runCollectAll([], forever, { deadlineMs: 100 })).resolves.toEqual([])
    })
})
