import "reflect-metadata";
import express, { Request, Response } from "express";
import { AppDataSource } from "./db/data-source";
import { getSettings } from "./config/settings";
import { logger } from "./config/logger";
import { ingestRoutes } from "./routes/ingest";
import { documentRoutes } from "./routes/documents";
import { searchRoutes, askRoutes } from "./routes/search";
import { citationRoutes } from "./routes/citations";
import { consistencyRoutes } from "./routes/consistency";
import { entityRoutes, relationRoutes } from "./routes/relations";
import { getQueueConfig } from "./queue/queue-config";
import { ingestionProcessor } from "./workers/ingestion-worker";
import { getVectorIndexService } from "./services/vector-index.service";
import { getErrorMessage } from "./types/errors";

const settings = getSettings();
const app = express();

// Middleware
app.use(express.json({ limit: '1mb' }));
app.use(express.urlencoded({ extended: true }));

// Routes
app.use("/ingest", ingestRoutes);
app.use("/documents", documentRoutes);
app.use("/search", searchRoutes);
app.use("/ask", askRoutes);
app.use("/citations", citationRoutes);
app.use("/consistency", consistencyRoutes);
app.use("/entities", entityRoutes);
app.use("/relations", relationRoutes);

// Health check
app.get("/health", (req: Request, res: Response) => {
    res.json({
        status: "ok",
        database: AppDataSource.isInitialized ? "connected" : "disconnected",
        timestamp: new Date().toISOString()
    });
});

// Root route
app.get("/", (req: Request, res: Response) => {
    res.json({
        message: "Hybrid Retrieval Service",
        version: "1.0.0",
        description: "Versioned document store with fused keyword and vector retrieval and live citations",
        endpoints: {
            "Ingestion": {
                "POST /ingest/document": "Ingest one document (upload or server path)",
                "POST /ingest/directory": "Ingest every supported file in a directory",
                "POST /ingest/queue": "Queue a document for background ingestion"
            },
            "Documents": {
                "GET /documents/:id": "Document metadata",
                "GET /documents/:id/chunks": "Chunks of a document",
                "PATCH /documents/:id": "Edit title, revision label or source path",
                "POST /documents/:id/retire": "Retire a document and drop its vectors"
            },
            "Retrieval": {
                "POST /search": "Fused search over a structured query",
                "POST /ask": "Answer a question with citations",
                "GET /citations/:chunkId": "Citation for a chunk"
            },
            "Knowledge graph": {
                "POST /entities": "Register an entity and the chunks mentioning it",
                "POST /relations": "Record a relation followed by relation expansion"
            },
            "Maintenance": {
                "GET /consistency": "Cross-store consistency report",
                "POST /consistency/repair": "Repair detected inconsistencies"
            },
            "System": {
                "GET /health": "Health check",
                "GET /": "API information"
            }
        }
    });
});

// Initialize stores and start server
async function startServer(): Promise<void> {
    await AppDataSource.initialize();
    logger.info({ migrationsRun: settings.runMigrations }, "Database connection established");

    await getVectorIndexService().initialize();
    logger.info({ collection: settings.vectorCollection, dimension: settings.embeddingDim }, "Vector index initialized");

    getQueueConfig().startWorker(ingestionProcessor);
    logger.info({ concurrency: settings.ingestConcurrency }, "Ingestion worker started");

    const server = app.listen(settings.port, () => {
        logger.info({ port: settings.port }, `Server running at http://localhost:${settings.port}`);
    });

    const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
        logger.info({ signal }, "Shutting down");
        server.close();
        await getQueueConfig().close();
        await AppDataSource.destroy();
        process.exit(0);
    };

    for (const signal of ["SIGTERM", "SIGINT"] as const) {
        process.once(signal, () => {
            shutdown(signal).catch((error: unknown) => {
                logger.error({ error: getErrorMessage(error) }, "Shutdown failed");
                process.exit(1);
            });
        });
    }
}

startServer().catch((error: unknown) => {
    logger.error({ error: getErrorMessage(error) }, "Failed to start server");
    process.exit(1);
});
