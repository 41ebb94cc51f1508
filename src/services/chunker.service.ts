import type { ChunkDraft, TextBlock } from '../types/retrieval';

export interface Chunker {
    split(blocks: TextBlock[]): ChunkDraft[];
}

export interface ChunkerOptions {
    maxWords: number;
    overlapWords: number;
}

interface PagedWord {
    word: string;
    page: number;
}

/**
 * Word-window chunker that restarts at every heading, so a chunk never spans
 * two sections. Windows overlap by `overlapWords` inside a section.
 */
export class HeadingAwareChunker implements Chunker {
    constructor(private options: ChunkerOptions) {
        if (options.overlapWords >= options.maxWords) {
            throw new RangeError('overlapWords must be smaller than maxWords');
        }
    }

    split(blocks: TextBlock[]): ChunkDraft[] {
        const drafts: ChunkDraft[] = [];
        const headings: Array<{ level: number; text: string }> = [];
        let words: PagedWord[] = [];

        const sectionPath = (): string => headings.map(heading => heading.text).join(' > ');
        const flush = (): void => {
            drafts.push(...this.window(words, sectionPath()));
            words = [];
        };

        for (const block of blocks) {
            if (block.headingLevel !== undefined) {
                flush();
                while (headings.length > 0 && headings[headings.length - 1].level >= block.headingLevel) {
                    headings.pop();
                }
                headings.push({ level: block.headingLevel, text: block.text });
                continue;
            }

            for (const word of block.text.split(/\s+/)) {
                if (word.length > 0) {
                    words.push({ word, page: block.page });
                }
            }
        }
        flush();

        return drafts;
    }

    private window(words: PagedWord[], sectionPath: string): ChunkDraft[] {
        const drafts: ChunkDraft[] = [];
        const step = this.options.maxWords - this.options.overlapWords;

        for (let start = 0; start < words.length; start += step) {
            const slice = words.slice(start, start + this.options.maxWords);
            drafts.push({
                text: slice.map(entry => entry.word).join(' '),
                sectionPath,
                pageStart: Math.min(...slice.map(entry => entry.page)),
                pageEnd: Math.max(...slice.map(entry => entry.page))
            });
            if (start + this.options.maxWords >= words.length) {
                break;
            }
        }

        return drafts;
    }
}
