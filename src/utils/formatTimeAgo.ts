const units: Array<[suffix: string, seconds: number]> = [
    ['y', 365 * 24 * 60 * 60],
    ['mo', 30 * 24 * 60 * 60],
    ['w', 7 * 24 * 60 * 60],
    ['d', 24 * 60 * 60],
    ['h', 60 * 60],
    ['m', 60],
]

/**
 * Compact "time ago" text for a unix timestamp (seconds), e.g. "3d ago".
 * Months are 30 days and years 365; close enough for a hint next to a branch name.
 */
export function formatTimeAgo(timestamp: number, now: number = Date.now()): string {
    const elapsed = Math.floor(now / 1000) - timestamp

    for (const [suffix, seconds] of units) {
        if (elapsed >= seconds) {
            return `${Math.floor(elapsed / seconds)}${suffix} ago`
        }
    }

    return 'just now'
}
