import { defaultChunkSize, defaultConcurrency } from '../program/constants.js'
import { DeadlineExceededError, describeError } from './errors.js'
import type { BranchRecord, DeletionOutcome } from './types.js'

export type BatchItem = Pick<BranchRecord, 'name' | 'isRemote'>

export type BranchOperation<T extends BatchItem> = (item: T) => Promise<unknown>

export interface FailFastOptions {
    /** Wall-clock budget for the whole batch, measured from the call */
    deadlineMs: number
    chunkSize?: number
}

export interface CollectAllOptions {
    deadlineMs: number
    concurrency?: number
    /** Called as each outcome is recorded, e.g. to move a progress spinner */
    onOutcome?: (outcome: DeletionOutcome, done: number) => void
}

/**
 * Splits `items` into consecutive groups of at most `size`
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
    if (!Number.isInteger(size) || size < 1) {
        throw new RangeError(`Chunk size must be a positive integer, got ${size}`)
    }

    const chunks: T[][] = []
    for (let i = 0; i < items.length; i += size) {
        chunks.push(items.slice(i, i + size))
    }

    return chunks
}

/**
 * Fail-fast mode. Chunks run concurrently, items within a chunk one after another.
 * Resolves once every chunk is done, rejects with the first error, or rejects with
 * DeadlineExceededError when the deadline passes. Nothing new starts after the call
 * has settled; operations still running at that point are left to finish unobserved.
 */
export function runFailFast<T extends BatchItem>(
    items: readonly T[],
    operation: BranchOperation<T>,
    { deadlineMs, chunkSize = defaultChunkSize }: FailFastOptions,
): Promise<void> {
    const deadlineAt = Date.now() + deadlineMs

    return new Promise<void>((resolve, reject) => {
        // A bad chunk size throws here and rejects the promise
        const chunks = chunk(items, chunkSize)
        let settled = false

        const settle = (finish: () => void) => {
            if (settled) {
                return
            }

            settled = true
            clearTimeout(timer)
            finish()
        }

        const timer = setTimeout(() => settle(() => reject(new DeadlineExceededError(deadlineMs))), deadlineMs)

        const runChunk = async (group: T[]) => {
            for (const item of group) {
                if (settled || Date.now() >= deadlineAt) {
                    return
                }

                await operation(item)
            }
        }

        Promise.all(chunks.map(runChunk)).then(
            () => settle(resolve),
            (err: unknown) => settle(() => reject(err)),
        )
    })
}

/**
 * Collect-all mode. A fixed pool of workers pulls from a shared queue so every item
 * gets an attempt. Outcomes arrive in completion order; items that did not finish
 * before the deadline have no outcome at all.
 */
export async function runCollectAll<T extends BatchItem>(
    items: readonly T[],
    operation: BranchOperation<T>,
    { deadlineMs, concurrency = defaultConcurrency, onOutcome }: CollectAllOptions,
): Promise<DeletionOutcome[]> {
    const outcomes: DeletionOutcome[] = []
    const deadlineAt = Date.now() + deadlineMs
    let next = 0
    let expired = false

    const record = (outcome: DeletionOutcome) => {
        if (expired) {
            return
        }

        outcomes.push(outcome)
        onOutcome?.(outcome, outcomes.length)
    }

    const worker = async () => {
        while (!expired && next < items.length && Date.now() < deadlineAt) {
            const item = items[next++]

            try {
                await operation(item)
                record({ name: item.name, isRemote: item.isRemote, succeeded: true })
            } catch (err) {
                record({ name: item.name, isRemote: item.isRemote, succeeded: false, errorDetail: describeError(err) })
            }
        }
    }

    let timer: NodeJS.Timeout | undefined
    const deadline = new Promise<void>((resolve) => {
        timer = setTimeout(resolve, deadlineMs)
    })

    const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, worker)

    await Promise.race([Promise.all(workers), deadline])
    expired = true
    clearTimeout(timer)

    return outcomes.slice()
}

/**
 * Stable display order: local before remote, then by name
 */
export function sortOutcomes(outcomes: readonly DeletionOutcome[]): DeletionOutcome[] {
    return [...outcomes].sort((a, b) => Number(a.isRemote) - Number(b.isRemote) || a.name.localeCompare(b.name))
}
