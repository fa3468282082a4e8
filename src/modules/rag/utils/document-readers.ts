import mammoth from 'mammoth';

/**
 * Text of every PDF page, in page order. Items flagged with `hasEOL` end a line.
 */
export async function readPdfPages(buffer: Buffer): Promise<string[]> {
    // Loaded on first use.
    const { getDocument } = await import('pdfjs-dist');
    const pdf = await getDocument({ data: new Uint8Array(buffer), isEvalSupported: false }).promise;

    try {
        const pages: string[] = [];
        for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
            const page = await pdf.getPage(pageNumber);
            const textContent = await page.getTextContent();

            let text = '';
            for (const item of textContent.items) {
                if ('str' in item) {
                    text += item.hasEOL ? `${item.str}\n` : item.str;
                }
            }
            pages.push(text);
        }
        return pages;
    } finally {
        await pdf.destroy();
    }
}

/**
 * Raw DOCX paragraphs, in document order. Empty paragraphs are kept so
 * numbering follows the document.
 */
export async function readDocxParagraphs(buffer: Buffer): Promise<string[]> {
    const result = await mammoth.extractRawText({ buffer });
    return result.value.split('\n\n');
}
