import { Injectable, Logger } from '@nestjs/common';
import * as path from 'path';
import { DocumentProcessingError } from '../../../common/errors/rag.errors';
import { describeError } from '../../../common/utils/error.util';
import { DocumentExtractor } from '../collaborators';
import { DocumentSource, ExtractedDocument, ExtractedSection } from '../types';
import { readDocxParagraphs, readPdfPages } from '../utils/document-readers';

export const SUPPORTED_EXTENSIONS = ['.txt', '.md', '.markdown', '.pdf', '.docx'] as const;

type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

const PAGE_BREAK = '\f';

/**
 * Collapse runs of horizontal whitespace and limit blank lines to one, so
 * paragraph breaks survive.
 */
export function normalizeWhitespace(text: string): string {
    return text
        .replace(/\r\n?/g, '\n')
        .replace(/[^\S\n]+/g, ' ')
        .replace(/ ?\n ?/g, '\n')
        .replace(/\n{3,}/g, '\n\n')
        .trim();
}

/**
 * Page-numbered extraction for PDF and plain text (form feeds separate
 * pages), paragraph-numbered extraction for DOCX. Blank sections are
 * dropped but keep their number slot.
 */
@Injectable()
export class TextExtractorService extends DocumentExtractor {
    private readonly logger = new Logger(TextExtractorService.name);

    async extract(source: DocumentSource): Promise<ExtractedDocument> {
        const extension = path.extname(source.fileName).toLowerCase();
        if (!isSupportedExtension(extension)) {
            throw new DocumentProcessingError(
                `Unsupported file type: ${extension || '(none)'}. Supported: ${SUPPORTED_EXTENSIONS.join(', ')}`,
            );
        }

        this.logger.log(`📄 Extracting text from ${source.fileName}`);

        const content = await this.extractSections(extension, source);
        const unit = extension === '.docx' ? 'paragraphs' : 'pages';
        this.logger.log(`✅ Extracted ${content.length} ${unit} from ${source.fileName}`);

        return {
            fileName: source.fileName,
            fileType: extension.slice(1),
            filePath: source.filePath,
            totalPages: content.length,
            content,
        };
    }

    private async extractSections(extension: SupportedExtension, source: DocumentSource): Promise<ExtractedSection[]> {
        switch (extension) {
            case '.pdf':
                return toSections(await this.read('PDF', source, readPdfPages), 'page');
            case '.docx':
                return toSections(await this.read('DOCX', source, readDocxParagraphs), 'paragraph');
            case '.txt':
            case '.md':
            case '.markdown':
                return toSections(decodeText(source.content).split(PAGE_BREAK), 'page');
        }
    }

    private async read(
        format: string,
        source: DocumentSource,
        reader: (buffer: Buffer) => Promise<string[]>,
    ): Promise<string[]> {
        try {
            return await reader(source.content);
        } catch (error) {
            throw new DocumentProcessingError(`Failed to read ${format} ${source.fileName}: ${describeError(error)}`, {
                cause: error,
            });
        }
    }
}

function toSections(rawSections: string[], numbering: 'page' | 'paragraph'): ExtractedSection[] {
    const sections: ExtractedSection[] = [];
    rawSections.forEach((raw, i) => {
        const text = normalizeWhitespace(raw);
        if (text) {
            sections.push({
                ...(numbering === 'page' ? { page: i + 1 } : { paragraph: i + 1 }),
                text,
                charCount: text.length,
                wordCount: text.split(/\s+/).length,
            });
        }
    });
    return sections;
}

function isSupportedExtension(extension: string): extension is SupportedExtension {
    return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}

/**
 * UTF-8 when the bytes are valid UTF-8, Latin-1 otherwise.
 */
function decodeText(buffer: Buffer): string {
    try {
        return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
    } catch {
        return buffer.toString('latin1');
    }
}
