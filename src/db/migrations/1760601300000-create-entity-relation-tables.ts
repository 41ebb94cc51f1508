import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateEntityRelationTables1760601300000 implements MigrationInterface {
    name = 'CreateEntityRelationTables1760601300000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "entities" ("entity_id" character varying(100) NOT NULL, "kind" character varying(20) NOT NULL, "canonical_name" character varying(300) NOT NULL, "alt_labels" jsonb NOT NULL DEFAULT '[]', CONSTRAINT "PK_entities" PRIMARY KEY ("entity_id"))`);
        await queryRunner.query(`CREATE TABLE "chunk_entities" ("chunk_id" character varying(80) NOT NULL, "entity_id" character varying(100) NOT NULL, "span_start" integer, "span_end" integer, "confidence" real NOT NULL, CONSTRAINT "PK_chunk_entities" PRIMARY KEY ("chunk_id", "entity_id"))`);
        await queryRunner.query(`CREATE INDEX "IDX_chunk_entities_entity" ON "chunk_entities" ("entity_id")`);
        await queryRunner.query(`ALTER TABLE "chunk_entities" ADD CONSTRAINT "FK_chunk_entities_chunk" FOREIGN KEY ("chunk_id") REFERENCES "chunks"("chunk_id") ON DELETE CASCADE ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "chunk_entities" ADD CONSTRAINT "FK_chunk_entities_entity" FOREIGN KEY ("entity_id") REFERENCES "entities"("entity_id") ON DELETE CASCADE ON UPDATE NO ACTION`);
        await queryRunner.query(`CREATE TABLE "relations" ("relation_id" character varying(64) NOT NULL, "type" character varying(40) NOT NULL, "src_type" character varying(20) NOT NULL, "src_id" character varying(100) NOT NULL, "dst_type" character varying(20) NOT NULL, "dst_id" character varying(100) NOT NULL, "confidence" real NOT NULL, "evidence" jsonb, "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_relations" PRIMARY KEY ("relation_id"), CONSTRAINT "CHK_relations_confidence" CHECK ("confidence" >= 0 AND "confidence" <= 1))`);
        await queryRunner.query(`CREATE INDEX "IDX_relations_src" ON "relations" ("src_type", "src_id", "type")`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP INDEX "IDX_relations_src"`);
        await queryRunner.query(`DROP TABLE "relations"`);
        await queryRunner.query(`ALTER TABLE "chunk_entities" DROP CONSTRAINT "FK_chunk_entities_entity"`);
        await queryRunner.query(`ALTER TABLE "chunk_entities" DROP CONSTRAINT "FK_chunk_entities_chunk"`);
        await queryRunner.query(`DROP INDEX "IDX_chunk_entities_entity"`);
        await queryRunner.query(`DROP TABLE "chunk_entities"`);
        await queryRunner.query(`DROP TABLE "entities"`);
    }

}
