import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateChunksTable1760601100000 implements MigrationInterface {
    name = 'CreateChunksTable1760601100000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "chunks" ("chunk_id" character varying(80) NOT NULL, "doc_id" character varying(64) NOT NULL, "ordinal" integer NOT NULL, "section_path" character varying(1000) NOT NULL, "page_start" integer NOT NULL, "page_end" integer NOT NULL, "text" text NOT NULL, "text_tsv" tsvector GENERATED ALWAYS AS (to_tsvector('english', "text")) STORED, "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_chunks_chunk_id" PRIMARY KEY ("chunk_id"), CONSTRAINT "CHK_chunks_pages" CHECK ("page_start" >= 1 AND "page_end" >= "page_start"))`);
        await queryRunner.query(`CREATE UNIQUE INDEX "IDX_chunks_doc_ordinal" ON "chunks" ("doc_id", "ordinal")`);
        await queryRunner.query(`CREATE INDEX "IDX_chunks_text_tsv" ON "chunks" USING GIN ("text_tsv")`);
        await queryRunner.query(`ALTER TABLE "chunks" ADD CONSTRAINT "FK_chunks_doc_id" FOREIGN KEY ("doc_id") REFERENCES "documents"("doc_id") ON DELETE RESTRICT ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "chunks" DROP CONSTRAINT "FK_chunks_doc_id"`);
        await queryRunner.query(`DROP INDEX "IDX_chunks_text_tsv"`);
        await queryRunner.query(`DROP INDEX "IDX_chunks_doc_ordinal"`);
        await queryRunner.query(`DROP TABLE "chunks"`);
    }

}
