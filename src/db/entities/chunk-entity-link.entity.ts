import { Column, Entity, PrimaryColumn } from "typeorm";

/**
 * Mention of an entity inside a chunk (many-to-many).
 */
@Entity({ name: "chunk_entities" })
export class ChunkEntityLinkEntity {
    @PrimaryColumn({ type: "varchar", length: 80 })
    chunk_id: string;

    @PrimaryColumn({ type: "varchar", length: 100 })
    entity_id: string;

    @Column({ type: "int", nullable: true })
    span_start: number | null;

    @Column({ type: "int", nullable: true })
    span_end: number | null;

    @Column({ type: "real" })
    confidence: number;
}
