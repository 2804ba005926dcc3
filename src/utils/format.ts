/**
 * Cuts `text` to `width` characters, ending with an ellipsis when shortened.
 * A width of 0 or less leaves the text alone.
 */
export function truncate(text: string, width: number): string {
    if (width <= 0 || text.length <= width) {
        return text
    }

    if (width === 1) {
        return '…'
    }

    return `${text.slice(0, width - 1).trimEnd()}…`
}

export function plural(count: number, singular: string, pluralForm: string = `${singular}s`): string {
    return `${count} ${count === 1 ? singular : pluralForm}`
}

export function shortHash(hash: string): string {
    return hash.length > 7 ? hash.slice(0, 7) : hash
}
