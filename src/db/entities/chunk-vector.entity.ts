import { Column, Entity, PrimaryColumn, CreateDateColumn } from "typeorm";

/**
 * Chunk Vector Entity
 *
 * Embedding cache: one L2-normalised vector per (chunk_id, model), stored as
 * little-endian float32 bytes. Vectors from different models never share a
 * similarity search, so the model is part of the key.
 */
@Entity({ name: "chunk_vectors" })
export class ChunkVectorEntity {
    @PrimaryColumn({ type: "varchar", length: 80 })
    chunk_id: string;

    @PrimaryColumn({ type: "varchar", length: 100 })
    model: string;

    @Column({ type: "int" })
    dim: number;

    @Column({ type: "bytea" })
    vector: Buffer;

    @CreateDateColumn({ name: "created_at", type: "timestamptz" })
    created_at: Date;
}
