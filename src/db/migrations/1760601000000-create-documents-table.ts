import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateDocumentsTable1760601000000 implements MigrationInterface {
    name = 'CreateDocumentsTable1760601000000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "documents" ("doc_id" character varying(64) NOT NULL, "title" character varying(500) NOT NULL, "source_path" character varying(1000) NOT NULL, "bu" character varying(100) NOT NULL, "asset_id" character varying(100), "equipment_id" character varying(100), "rev_label" character varying(50) NOT NULL, "status" character varying(20) NOT NULL DEFAULT 'active', "valid_from" TIMESTAMP WITH TIME ZONE NOT NULL, "valid_to" TIMESTAMP WITH TIME ZONE, "checksum" character varying(64) NOT NULL, "supersedes" character varying(64), "lineage_key" character varying(500) NOT NULL, "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_documents_doc_id" PRIMARY KEY ("doc_id"), CONSTRAINT "CHK_documents_status" CHECK ("status" IN ('active', 'superseded')))`);
        await queryRunner.query(`CREATE INDEX "IDX_documents_lineage_status" ON "documents" ("lineage_key", "status")`);
        await queryRunner.query(`CREATE UNIQUE INDEX "UQ_documents_active_lineage" ON "documents" ("lineage_key") WHERE "status" = 'active'`);
        await queryRunner.query(`ALTER TABLE "documents" ADD CONSTRAINT "FK_documents_supersedes" FOREIGN KEY ("supersedes") REFERENCES "documents"("doc_id") ON DELETE RESTRICT ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "documents" DROP CONSTRAINT "FK_documents_supersedes"`);
        await queryRunner.query(`DROP INDEX "UQ_documents_active_lineage"`);
        await queryRunner.query(`DROP INDEX "IDX_documents_lineage_status"`);
        await queryRunner.query(`DROP TABLE "documents"`);
    }

}
