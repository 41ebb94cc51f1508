import "reflect-metadata";
import { DataSource } from "typeorm";
import { getSettings } from "../config/settings";
import { DocumentEntity } from "./entities/document.entity";
import { ChunkEntity } from "./entities/chunk.entity";
import { ChunkVectorEntity } from "./entities/chunk-vector.entity";
import { VectorIndexEntryEntity } from "./entities/vector-index-entry.entity";
import { KnowledgeEntityEntity } from "./entities/knowledge-entity.entity";
import { ChunkEntityLinkEntity } from "./entities/chunk-entity-link.entity";
import { RelationEntity } from "./entities/relation.entity";

const settings = getSettings();

export const AppDataSource = new DataSource({
    type: "postgres",
    url: settings.databaseUrl,
    synchronize: false,
    migrationsRun: settings.runMigrations,
    logging: process.env.NODE_ENV === 'development',
    entities: [
        DocumentEntity,
        ChunkEntity,
        ChunkVectorEntity,
        VectorIndexEntryEntity,
        KnowledgeEntityEntity,
        ChunkEntityLinkEntity,
        RelationEntity
    ],
    migrations: [__dirname + '/migrations/*.{ts,js}'],
});
