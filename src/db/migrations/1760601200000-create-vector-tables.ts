import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateVectorTables1760601200000 implements MigrationInterface {
    name = 'CreateVectorTables1760601200000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        // No FK to chunks: vectors are computed before the owning chunk rows commit
        await queryRunner.query(`CREATE TABLE "chunk_vectors" ("chunk_id" character varying(80) NOT NULL, "model" character varying(100) NOT NULL, "dim" integer NOT NULL, "vector" bytea NOT NULL, "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_chunk_vectors" PRIMARY KEY ("chunk_id", "model"), CONSTRAINT "CHK_chunk_vectors_bytes" CHECK (octet_length("vector") = "dim" * 4))`);
        await queryRunner.query(`CREATE SEQUENCE "vector_index_faiss_id_seq" AS bigint START WITH 1`);
        await queryRunner.query(`CREATE TABLE "vector_index_map" ("faiss_id" bigint NOT NULL, "chunk_id" character varying(80) NOT NULL, "model" character varying(100) NOT NULL, "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(), CONSTRAINT "PK_vector_index_map" PRIMARY KEY ("faiss_id"), CONSTRAINT "UQ_vector_index_map_chunk" UNIQUE ("chunk_id"))`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP TABLE "vector_index_map"`);
        await queryRunner.query(`DROP SEQUENCE "vector_index_faiss_id_seq"`);
        await queryRunner.query(`DROP TABLE "chunk_vectors"`);
    }

}
