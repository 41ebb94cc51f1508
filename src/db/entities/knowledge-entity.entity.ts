import { Column, Entity, PrimaryColumn } from "typeorm";

@Entity({ name: "entities" })
export class KnowledgeEntityEntity {
    @PrimaryColumn({ type: "varchar", length: 100 })
    entity_id: string;

    @Column({ type: "varchar", length: 20 })
    kind: string; // asset | equipment | standard | term

    @Column({ type: "varchar", length: 300 })
    canonical_name: string;

    @Column({ type: "jsonb", default: () => "'[]'" })
    alt_labels: string[];
}
