import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateActiveDocumentsView1760601400000 implements MigrationInterface {
    name = 'CreateActiveDocumentsView1760601400000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE VIEW "active_documents" AS SELECT * FROM "documents" WHERE "status" = 'active'`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP VIEW "active_documents"`);
    }

}
