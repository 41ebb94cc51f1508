import { Column, Entity, PrimaryColumn, CreateDateColumn, Index } from "typeorm";

/**
 * Relation Entity
 *
 * Typed, directed link between two addressable objects, e.g. a chunk that
 * says "see also section 4.2" or a document superseding an earlier revision.
 * Relations without evidence are stored but never used to expand retrieval.
 */
@Entity({ name: "relations" })
@Index("IDX_relations_src", ["src_type", "src_id", "type"])
export class RelationEntity {
    @PrimaryColumn({ type: "varchar", length: 64 })
    relation_id: string;

    @Column({ type: "varchar", length: 40 })
    type: string;

    @Column({ type: "varchar", length: 20 })
    src_type: string;

    @Column({ type: "varchar", length: 100 })
    src_id: string;

    @Column({ type: "varchar", length: 20 })
    dst_type: string;

    @Column({ type: "varchar", length: 100 })
    dst_id: string;

    @Column({ type: "real" })
    confidence: number;

    @Column({ type: "jsonb", nullable: true })
    evidence: Record<string, unknown> | null;

    @CreateDateColumn({ name: "created_at", type: "timestamptz" })
    created_at: Date;
}
