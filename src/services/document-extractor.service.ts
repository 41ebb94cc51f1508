import { promises as fs } from 'fs';
import * as path from 'path';
import pdf from 'pdf-parse';
import type { TextBlock } from '../types/retrieval';

export interface ExtractedDocument {
    blocks: TextBlock[];
    pageCount: number;
}

export interface Extractor {
    readonly extensions: string[];
    extract(content: Buffer): Promise<ExtractedDocument>;
}

interface PdfTextItem {
    str: string;
    transform: number[];
}

// The part of pdf.js' page proxy that pdf-parse hands to `pagerender`
interface PdfPageProxy {
    pageIndex: number;
    getTextContent(params?: { normalizeWhitespace?: boolean; disableCombineTextItems?: boolean }): Promise<{ items: PdfTextItem[] }>;
}

const NUMBERED_HEADING = /^(\d+(?:\.\d+)*)\.?\s+\p{Lu}/u;
const MARKDOWN_HEADING = /^(#{1,6})\s+(.+?)\s*#*$/;
const MAX_HEADING_LENGTH = 120;

/**
 * Turn the lines of one page into heading and paragraph blocks. A blank
 * line or a heading closes the current paragraph.
 */
function linesToBlocks(
    lines: string[],
    page: number,
    headingOf: (line: string) => { level: number; text: string } | null
): TextBlock[] {
    const blocks: TextBlock[] = [];
    let paragraph: string[] = [];

    const flush = (): void => {
        const text = paragraph.join(' ').replace(/\s+/g, ' ').trim();
        if (text.length > 0) {
            blocks.push({ text, page });
        }
        paragraph = [];
    };

    for (const raw of lines) {
        const line = raw.trim();
        if (line.length === 0) {
            flush();
            continue;
        }
        const heading = headingOf(line);
        if (heading) {
            flush();
            blocks.push({ text: heading.text, page, headingLevel: heading.level });
            continue;
        }
        paragraph.push(line);
    }
    flush();

    return blocks;
}

function numberedHeading(line: string): { level: number; text: string } | null {
    if (line.length > MAX_HEADING_LENGTH) {
        return null;
    }
    const match = NUMBERED_HEADING.exec(line);
    return match ? { level: match[1].split('.').length, text: line } : null;
}

function markdownHeading(line: string): { level: number; text: string } | null {
    const match = MARKDOWN_HEADING.exec(line);
    return match ? { level: match[1].length, text: match[2] } : null;
}

/**
 * PDF extraction through pdf-parse, one page at a time so every block keeps
 * its page number. Numbered lines ("3.2 Start-up") are read as headings.
 */
export class PdfExtractor implements Extractor {
    readonly extensions = ['.pdf'];

    async extract(content: Buffer): Promise<ExtractedDocument> {
        const pages = new Map<number, string>();

        // pdf-parse awaits the render result; its typings only admit a string
        function renderPage(pageData: PdfPageProxy): string;
        function renderPage(pageData: PdfPageProxy): string | Promise<string> {
            return pageData
                .getTextContent({ normalizeWhitespace: true, disableCombineTextItems: false })
                .then(({ items }) => {
                    let text = '';
                    let lastY: number | undefined;
                    for (const item of items) {
                        const y = item.transform[5];
                        text += lastY === undefined || lastY === y ? item.str : `\n${item.str}`;
                        lastY = y;
                    }
                    pages.set(pageData.pageIndex + 1, text);
                    return text;
                });
        }

        const result = await pdf(content, { pagerender: renderPage });

        const blocks: TextBlock[] = [];
        for (let page = 1; page <= result.numpages; page++) {
            blocks.push(...linesToBlocks((pages.get(page) ?? '').split('\n'), page, numberedHeading));
        }

        return { blocks, pageCount: result.numpages };
    }
}

/**
 * Plain text and Markdown. Form feeds separate pages; `#` lines are headings.
 */
export class PlainTextExtractor implements Extractor {
    readonly extensions = ['.txt', '.md', '.markdown'];

    async extract(content: Buffer): Promise<ExtractedDocument> {
        const pages = content.toString('utf8').split('\f');

        const blocks = pages.flatMap((pageText, index) =>
            linesToBlocks(pageText.split(/\r?\n/), index + 1, markdownHeading)
        );

        return { blocks, pageCount: pages.length };
    }
}

export const DEFAULT_EXTRACTORS: Extractor[] = [new PdfExtractor(), new PlainTextExtractor()];

export function findExtractor(filePath: string, extractors: Extractor[] = DEFAULT_EXTRACTORS): Extractor | null {
    const extension = path.extname(filePath).toLowerCase();
    return extractors.find(extractor => extractor.extensions.includes(extension)) ?? null;
}

export async function readSource(filePath: string): Promise<Buffer> {
    return await fs.readFile(filePath);
}
