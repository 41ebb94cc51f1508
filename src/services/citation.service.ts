import { logger, ILogger } from '../config/logger';
import { IChunkStore, getChunkStoreService } from './chunk-store.service';
import type { Citation, ChunkContext } from '../types/retrieval';
import { NotFoundError } from '../types/errors';

function toCitation({ chunk, document }: ChunkContext): Citation {
    return {
        docId: document.docId,
        title: document.title,
        revLabel: document.revLabel,
        sectionPath: chunk.sectionPath,
        pages: [chunk.pageStart, chunk.pageEnd],
        chunkId: chunk.chunkId,
        sourcePathWithPageAnchor: `${document.sourcePath}#page=${chunk.pageStart}`
    };
}

/**
 * Citation Service
 *
 * Builds citations from the current chunk and document rows on every call.
 * Nothing is cached, so a metadata edit shows up in the next citation.
 */
export class CitationService {
    constructor(
        private chunkStore: IChunkStore,
        private logger: ILogger
    ) { }

    static create(): CitationService {
        return new CitationService(getChunkStoreService(), logger);
    }

    async build(chunkId: string): Promise<Citation> {
        const [context] = await this.chunkStore.getChunkContexts([chunkId]);
        if (!context) {
            throw new NotFoundError('chunk', chunkId);
        }
        return toCitation(context);
    }

    /**
     * Citations in the order of `chunkIds`. Any unknown chunk fails the batch.
     */
    async buildMany(chunkIds: string[]): Promise<Citation[]> {
        const contexts = await this.chunkStore.getChunkContexts(chunkIds);
        const byChunk = new Map(contexts.map(context => [context.chunk.chunkId, context]));

        const citations = chunkIds.map(chunkId => {
            const context = byChunk.get(chunkId);
            if (!context) {
                throw new NotFoundError('chunk', chunkId);
            }
            return toCitation(context);
        });

        this.logger.debug({ citationsCount: citations.length }, 'Citations built');
        return citations;
    }

    /**
     * "Title (Rev X), §section, p. a–b", the form handed to the answer model.
     */
    format(citation: Citation): string {
        const [start, end] = citation.pages;
        const pages = start === end ? `p. ${start}` : `p. ${start}–${end}`;
        const section = citation.sectionPath ? `, §${citation.sectionPath}` : '';
        return `${citation.title} (Rev ${citation.revLabel})${section}, ${pages}`;
    }
}

// Singleton instance
let citationService: CitationService | null = null;

export function getCitationService(): CitationService {
    if (!citationService) {
        citationService = CitationService.create();
    }
    return citationService;
}
