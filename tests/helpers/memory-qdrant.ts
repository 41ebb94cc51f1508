import type { IQdrantClient } from '../../src/services/vector-index.service';
import { dotProduct } from '../../src/utils/score.util';

type PointId = string | number;

interface StoredPoint {
    id: number;
    vector: number[];
    payload: Record<string, unknown>;
}

/**
 * In-process stand-in for the Qdrant REST client: one flat collection,
 * exhaustive inner-product search.
 */
export class MemoryQdrantClient implements IQdrantClient {
    points = new Map<number, StoredPoint>();
    collections = new Map<string, number>();
    failUpserts = false;
    failSearches = false;

    async getCollections(): Promise<{ collections: Array<{ name: string }> }> {
        return { collections: Array.from(this.collections.keys(), name => ({ name })) };
    }

    async getCollection(collectionName: string): Promise<{
        status: string;
        points_count?: number | null;
        config: { params: { vectors?: unknown } };
    }> {
        const size = this.collections.get(collectionName);
        if (size === undefined) {
            throw new Error(`Not found: Collection \`${collectionName}\` doesn't exist!`);
        }
        return { status: 'green', points_count: this.points.size, config: { params: { vectors: { size, distance: 'Dot' } } } };
    }

    async createCollection(collectionName: string, config: { vectors: { size: number; distance: 'Dot' } }): Promise<unknown> {
        this.collections.set(collectionName, config.vectors.size);
        return true;
    }

    async upsert(_collectionName: string, data: {
        wait: boolean;
        points: Array<{ id: number; vector: number[]; payload: Record<string, unknown> }>;
    }): Promise<unknown> {
        if (this.failUpserts) {
            throw new Error('Bad request: upsert rejected');
        }
        data.points.forEach(point => this.points.set(point.id, { ...point }));
        return { status: 'completed' };
    }

    async search(_collectionName: string, params: {
        vector: number[];
        limit: number;
        with_payload: boolean;
        with_vector: boolean;
    }): Promise<Array<{ id: PointId; score: number }>> {
        if (this.failSearches) {
            throw new Error('Bad request: search rejected');
        }
        return Array.from(this.points.values())
            .map(point => ({ id: point.id, score: dotProduct(point.vector, params.vector) }))
            .sort((a, b) => b.score - a.score || a.id - b.id)
            .slice(0, params.limit);
    }

    async delete(_collectionName: string, params: { wait: boolean; points: number[] }): Promise<unknown> {
        params.points.forEach(id => this.points.delete(id));
        return { status: 'completed' };
    }

    async scroll(_collectionName: string, params: {
        limit: number;
        offset?: PointId;
        with_payload: boolean;
        with_vector: boolean;
    }): Promise<{ points: Array<{ id: PointId }>; next_page_offset?: unknown }> {
        const ids = Array.from(this.points.keys()).sort((a, b) => a - b);
        const start = params.offset === undefined ? 0 : ids.indexOf(Number(params.offset));
        const page = ids.slice(start, start + params.limit);
        const next = ids[start + params.limit];
        return { points: page.map(id => ({ id })), next_page_offset: next ?? null };
    }
}
