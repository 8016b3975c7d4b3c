import express, { Express, NextFunction, Request, RequestHandler, Response } from 'express';
import multer, { FileFilterCallback } from 'multer';
import cors from 'cors';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { CorpusManager } from './services/CorpusManager';
import { DocumentSource, isPdfName, safeDocumentName } from './services/DocumentSource';
import { McpProtocolHandler } from './services/McpProtocolHandler';
import { QueryService } from './services/QueryService';
import { AppError, ValidationError, errorMessage } from './utils/errors';
import { createLogger } from './utils/logger';

const log = createLogger('Server');

const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

const queryBodySchema = z.object({
  query: z.unknown().optional(),
  question: z.unknown().optional(),
  max_chunks: z.unknown().optional()
});

export interface AppDependencies {
  corpus: CorpusManager;
  queryService: QueryService;
  mcpHandler: McpProtocolHandler;
  source: DocumentSource;
}

function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function parseQueryBody(body: unknown): { query: unknown; maxChunks: unknown } {
  const parsed = queryBodySchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return { query: parsed.data.query ?? parsed.data.question, maxChunks: parsed.data.max_chunks };
}

export function createApp({ corpus, queryService, mcpHandler, source }: AppDependencies): Express {
  const app = express();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: MAX_UPLOAD_BYTES
    },
    fileFilter: (_req: Request, file: Express.Multer.File, cb: FileFilterCallback) => {
      if (file.mimetype === 'application/pdf' || isPdfName(file.originalname)) {
        cb(null, true);
      } else {
        cb(new ValidationError('Invalid file type. Only PDF files are allowed.'));
      }
    }
  });

  app.use(cors());
  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = uuidv4();
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);
    log.debug(`${req.method} ${req.path} (${requestId})`);
    next();
  });

  // JSON-RPC parse errors are reported in the protocol, so the body is read as text
  app.post('/mcp', express.text({ type: () => true, limit: '1mb' }), asyncRoute(async (req, res) => {
    const body: unknown = req.body;
    const response = await mcpHandler.handleRawRequest(typeof body === 'string' ? body : '');
    if (response === null) {
      res.status(202).end();
      return;
    }
    res.json(response);
  }));

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  app.get('/api/status', (_req: Request, res: Response) => {
    res.json({ mode: corpus.mode, ...corpus.status() });
  });

  app.post('/api/search', asyncRoute(async (req, res) => {
    const { query, maxChunks } = parseQueryBody(req.body);
    res.json(await queryService.search(query, maxChunks));
  }));

  app.post('/api/answer', asyncRoute(async (req, res) => {
    const { query, maxChunks } = parseQueryBody(req.body);
    res.json(await queryService.answer(query, maxChunks));
  }));

  app.post('/api/reload', asyncRoute(async (_req, res) => {
    const generation = await corpus.reload();
    log.info(`Reload finished with generation ${generation.version}`);
    res.json(corpus.status());
  }));

  app.post('/api/documents', (req: Request, res: Response, next: NextFunction) => {
    upload.single('file')(req, res, (err: unknown) => {
      if (err) {
        res.status(400).json({
          error: 'Upload error',
          message: errorMessage(err)
        });
        return;
      }
      next();
    });
  }, asyncRoute(async (req, res) => {
    const file = req.file;
    if (!file) {
      log.warn('Upload request rejected: No file provided');
      res.status(400).json({
        error: 'No file uploaded',
        message: 'Please provide a PDF in the "file" field'
      });
      return;
    }

    let documentName: string;
    try {
      documentName = safeDocumentName(file.originalname.replace(/\s+/g, '_'));
    } catch (error) {
      throw new ValidationError(errorMessage(error));
    }

    await source.save(documentName, file.buffer);
    log.info(`Stored ${documentName} (${file.size} bytes), reloading corpus`);
    await corpus.reload();

    res.status(201).json({
      message: 'Document uploaded and indexed.',
      documentName,
      document: corpus.status().documents.find(doc => doc.documentName === documentName) ?? null
    });
  }));

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const requestId = typeof res.locals.requestId === 'string' ? res.locals.requestId : undefined;
    if (error instanceof AppError) {
      if (error.httpStatus >= 500) {
        log.error(`${error.code}: ${error.message} (${requestId})`);
      } else {
        log.warn(`${error.code}: ${error.message} (${requestId})`);
      }
      res.status(error.httpStatus).json({ error: error.code, message: error.message, retryable: error.retryable });
      return;
    }
    log.error(`Unhandled error (${requestId}): ${errorMessage(error)}`);
    res.status(500).json({ error: 'INTERNAL_ERROR', message: errorMessage(error), retryable: false });
  });

  return app;
}
