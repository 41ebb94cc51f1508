import { Column, Entity, PrimaryColumn, CreateDateColumn } from "typeorm";

/**
 * Vector Index Map Entity
 *
 * Bijection between the numeric point id in the vector index (faiss_id) and
 * the chunk it embeds. faiss_id comes from `vector_index_faiss_id_seq`.
 */
@Entity({ name: "vector_index_map" })
export class VectorIndexEntryEntity {
    @PrimaryColumn({ type: "bigint" })
    faiss_id: string; // pg returns bigint as string

    @Column({ type: "varchar", length: 80, unique: true })
    chunk_id: string;

    @Column({ type: "varchar", length: 100 })
    model: string;

    @CreateDateColumn({ name: "created_at", type: "timestamptz" })
    created_at: Date;
}
