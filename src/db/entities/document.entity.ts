import { Column, Entity, PrimaryColumn, CreateDateColumn, UpdateDateColumn, Index } from "typeorm";

/**
 * Document Entity
 *
 * One row per ingested document version. Rows are never deleted: a newer
 * version flips the previous one to `superseded` inside the same transaction
 * that inserts it, so each lineage has exactly one `active` row.
 *
 * Lineage:
 * - lineage_key groups versions of the same logical document
 *   (asset / equipment / normalised title family)
 * - supersedes points at the version this row replaced
 * - a partial unique index on (lineage_key) WHERE status = 'active'
 *   backs the one-active-per-lineage rule in the database itself
 */
@Entity({ name: "documents" })
@Index("IDX_documents_lineage_status", ["lineage_key", "status"])
export class DocumentEntity {
    @PrimaryColumn({ type: "varchar", length: 64 })
    doc_id: string;

    @Column({ type: "varchar", length: 500 })
    title: string;

    @Column({ type: "varchar", length: 1000 })
    source_path: string;

    @Column({ type: "varchar", length: 100 })
    bu: string;

    @Column({ type: "varchar", length: 100, nullable: true })
    asset_id: string | null;

    @Column({ type: "varchar", length: 100, nullable: true })
    equipment_id: string | null;

    @Column({ type: "varchar", length: 50 })
    rev_label: string;

    @Column({ type: "varchar", length: 20, default: "active" })
    status: string; // active | superseded

    @Column({ type: "timestamptz" })
    valid_from: Date;

    @Column({ type: "timestamptz", nullable: true })
    valid_to: Date | null;

    @Column({ type: "varchar", length: 64 })
    checksum: string; // SHA-256 of the source bytes

    @Column({ type: "varchar", length: 64, nullable: true })
    supersedes: string | null;

    @Column({ type: "varchar", length: 500 })
    lineage_key: string;

    @CreateDateColumn({ name: "created_at", type: "timestamptz" })
    created_at: Date;

    @UpdateDateColumn({ name: "updated_at", type: "timestamptz" })
    updated_at: Date;
}
