import { describe, it, expect, beforeEach, vi } from 'vitest';
import pdf from 'pdf-parse';
import {
    PdfExtractor,
    PlainTextExtractor,
    findExtractor
} from '../../../src/services/document-extractor.service';

vi.mock('pdf-parse', () => ({ default: vi.fn() }));

interface FakeItem {
    str: string;
    y: number;
}

function fakePage(pageIndex: number, items: FakeItem[]) {
    return {
        pageIndex,
        getTextContent: async () => ({
            items: items.map(item => ({ str: item.str, transform: [1, 0, 0, 1, 72, item.y] }))
        })
    };
}

describe('Document extractors', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    describe('PdfExtractor', () => {
        it('should keep page numbers and read numbered lines as headings', async () => {
            const pages = [
                fakePage(0, [
                    { str: '1 Scope', y: 700 },
                    { str: 'This procedure covers', y: 680 },
                    { str: ' startup.', y: 680 }
                ]),
                fakePage(1, [
                    { str: '3.2 Start-up sequence', y: 700 },
                    { str: 'Open valve V-1.', y: 680 },
                    { str: '10 bar maximum', y: 660 }
                ])
            ];
            vi.mocked(pdf).mockImplementation(async (_buffer, options) => {
                for (const page of pages) {
                    await options?.pagerender?.(page);
                }
                return { numpages: 2, numrender: 2, info: {}, metadata: null, version: 'v1.10.100', text: '' };
            });

            const extracted = await new PdfExtractor().extract(Buffer.from('%PDF-1.4'));

            expect(extracted).toEqual({
                pageCount: 2,
                blocks: [
                    { text: '1 Scope', page: 1, headingLevel: 1 },
                    { text: 'This procedure covers startup.', page: 1 },
                    { text: '3.2 Start-up sequence', page: 2, headingLevel: 2 },
                    { text: 'Open valve V-1. 10 bar maximum', page: 2 }
                ]
            });
        });
    });

    describe('PlainTextExtractor', () => {
        it('should split pages on form feeds and read markdown headings', async () => {
            const text = '# Startup\n\nCheck oil.\r\nCheck water.\n\n## Valves ##\nOpen V-1.\fPage two text.';

            const extracted = await new PlainTextExtractor().extract(Buffer.from(text));

            expect(extracted).toEqual({
                pageCount: 2,
                blocks: [
                    { text: 'Startup', page: 1, headingLevel: 1 },
                    { text: 'Check oil. Check water.', page: 1 },
                    { text: 'Valves', page: 1, headingLevel: 2 },
                    { text: 'Open V-1.', page: 1 },
                    { text: 'Page two text.', page: 2 }
                ]
            });
        });
    });

    it('should pick an extractor by extension, case-insensitively', () => {
        expect(findExtractor('/docs/Manual.PDF')).toBeInstanceOf(PdfExtractor);
        expect(findExtractor('notes.markdown')).toBeInstanceOf(PlainTextExtractor);
        expect(findExtractor('sheet.xlsx')).toBeNull();
    });
});
