/**
 * Human-readable position of a chunk inside its document: `Page 3`,
 * `Paragraph 12`, or `Page N/A` when neither is known.
 */
export function describeLocation(source: { page?: number; paragraph?: number }): string {
    if (source.page !== undefined) {
        return `Page ${source.page}`;
    }
    if (source.paragraph !== undefined) {
        return `Paragraph ${source.paragraph}`;
    }
    return 'Page N/A';
}
