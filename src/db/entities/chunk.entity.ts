import { Column, Entity, PrimaryColumn, CreateDateColumn, ManyToOne, JoinColumn, Index } from "typeorm";
import { DocumentEntity } from "./document.entity";

/**
 * Chunk Entity
 *
 * A contiguous, independently retrievable passage of a document. Immutable:
 * re-ingesting a changed document creates new chunks under a new doc_id.
 *
 * Full-text search runs against the generated `text_tsv` column created by
 * the migration (not mapped here, Postgres maintains it).
 */
@Entity({ name: "chunks" })
@Index("IDX_chunks_doc_ordinal", ["doc_id", "ordinal"], { unique: true })
export class ChunkEntity {
    @PrimaryColumn({ type: "varchar", length: 80 })
    chunk_id: string;

    @Column({ type: "varchar", length: 64 })
    doc_id: string;

    @ManyToOne(() => DocumentEntity, { onDelete: "RESTRICT" })
    @JoinColumn({ name: "doc_id" })
    document: DocumentEntity;

    @Column({ type: "int" })
    ordinal: number;

    @Column({ type: "varchar", length: 1000 })
    section_path: string;

    @Column({ type: "int" })
    page_start: number;

    @Column({ type: "int" })
    page_end: number;

    @Column({ type: "text" })
    text: string;

    @CreateDateColumn({ name: "created_at", type: "timestamptz" })
    created_at: Date;
}
