import { Router, Request, Response } from "express";
import multer from "multer";
import path from "path";
import fs from "fs";
import { z } from "zod";
import { getSettings } from "../config/settings";
import { getIngestionService } from "../services/ingestion.service";
import { getQueueConfig } from "../queue/queue-config";
import { directoryMetadataSchema, ingestMetadataSchema } from "../types/schemas";
import { sendError } from "./error-response";

const router = Router();

// Create storage directory if it doesn't exist
const storageDir = getSettings().storageDir;
if (!fs.existsSync(storageDir)) {
    fs.mkdirSync(storageDir, { recursive: true });
}

const SUPPORTED_EXTENSIONS = ['.pdf', '.txt', '.md', '.markdown'];

// Configure multer for document uploads
const upload = multer({
    storage: multer.diskStorage({
        destination: (req, file, cb) => {
            cb(null, storageDir);
        },
        filename: (req, file, cb) => {
            const uniqueSuffix = Date.now() + '-' + Math.round(Math.random() * 1E9);
            cb(null, `document-${uniqueSuffix}${path.extname(file.originalname).toLowerCase()}`);
        }
    }),
    limits: {
        fileSize: 50 * 1024 * 1024, // 50MB limit
    },
    fileFilter: (req, file, cb) => {
        if (SUPPORTED_EXTENSIONS.includes(path.extname(file.originalname).toLowerCase())) {
            cb(null, true);
        } else {
            cb(new Error('Only PDF, text and Markdown files are allowed'));
        }
    }
});

const documentSchema = ingestMetadataSchema.extend({
    documentPath: z.string().min(1).optional()
});

const directorySchema = directoryMetadataSchema.extend({
    directoryPath: z.string().min(1, "Directory path is required")
});

const queueSchema = ingestMetadataSchema.extend({
    documentPath: z.string().min(1, "Document path is required")
});

/**
 * POST /ingest/document
 *
 * Ingest one document, either uploaded as multipart field `file` or read
 * from `documentPath` on the server. Re-ingesting identical content answers
 * with status "unchanged" and the existing document id.
 */
router.post('/document', upload.single('file'), async (req: Request, res: Response) => {
    try {
        const { documentPath, ...metadata } = documentSchema.parse(req.body);

        const filePath = req.file?.path ?? documentPath;
        if (!filePath) {
            res.status(400).json({
                error: 'Validation failed',
                code: 'VALIDATION_ERROR',
                message: 'Either a file upload or documentPath is required'
            });
            return;
        }

        const result = await getIngestionService().ingestFile(filePath, {
            ...metadata,
            sourcePath: metadata.sourcePath ?? req.file?.originalname ?? filePath
        });

        res.status(result.status === 'created' ? 201 : 200).json({ success: true, ...result });
    } catch (error: unknown) {
        sendError(res, error, 'Document ingestion failed');
    }
});

/**
 * POST /ingest/directory
 *
 * Ingest every supported file in a server-side directory.
 */
router.post('/directory', async (req: Request, res: Response) => {
    try {
        const { directoryPath, ...metadata } = directorySchema.parse(req.body);
        const result = await getIngestionService().ingestDirectory(directoryPath, metadata);

        res.json({ success: true, ...result });
    } catch (error: unknown) {
        sendError(res, error, 'Directory ingestion failed');
    }
});

/**
 * POST /ingest/queue
 *
 * Queue a server-side file for background ingestion.
 */
router.post('/queue', async (req: Request, res: Response) => {
    try {
        const { documentPath, ...metadata } = queueSchema.parse(req.body);
        const jobId = await getQueueConfig().enqueue({ filePath: documentPath, metadata });

        res.status(202).json({ success: true, jobId, status: 'queued' });
    } catch (error: unknown) {
        sendError(res, error, 'Failed to queue ingestion');
    }
});

export { router as ingestRoutes };
