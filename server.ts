import dotenv from 'dotenv';
import { AppConfig, loadConfig } from './config';
import { createApp } from './app';
import { AnswerGenerator, GeminiAnswerGenerator } from './services/AnswerService';
import { ChunkingService } from './services/ChunkingService';
import { CorpusManager } from './services/CorpusManager';
import { DatabaseService, DocumentLedger, InMemoryDocumentLedger } from './services/DatabaseService';
import { DocumentProcessingWorker } from './services/DocumentProcessingWorker';
import { DocumentSource, LocalDirectorySource } from './services/DocumentSource';
import { EmbeddingProvider, GeminiEmbeddingService, LocalEmbeddingService } from './services/EmbeddingService';
import { GCStorageService } from './services/GCStorageService';
import { McpProtocolHandler } from './services/McpProtocolHandler';
import { PineconeService } from './services/PineconeService';
import { QueryService } from './services/QueryService';
import { TextCleaningService } from './services/TextCleaningService';
import { TextExtractionService } from './services/TextExtractionService';
import { InMemoryVectorStore, VectorStore } from './services/VectorStore';
import { ConfigurationError, errorMessage } from './utils/errors';
import { createLogger, setLogLevel } from './utils/logger';

dotenv.config();

const log = createLogger('Server');

function createSource(config: AppConfig): DocumentSource {
  const source = config.documentSource;
  if (source.kind === 'gcs') {
    return new GCStorageService({
      bucket: source.bucket,
      prefix: source.prefix,
      projectId: source.projectId,
      keyFilename: source.keyFilename
    });
  }
  return new LocalDirectorySource(source.directory);
}

function createLedger(config: AppConfig): DocumentLedger {
  return config.mongo ? new DatabaseService(config.mongo.uri, config.mongo.database) : new InMemoryDocumentLedger();
}

function createEmbeddings(config: AppConfig): EmbeddingProvider {
  const { embedding } = config;
  if (embedding.provider === 'gemini') {
    return new GeminiEmbeddingService(config.geminiApiKey, {
      model: embedding.model,
      dimension: embedding.dimension,
      maxConcurrent: embedding.maxConcurrent
    });
  }
  return new LocalEmbeddingService(embedding.dimension);
}

function createVectorStore(config: AppConfig): VectorStore {
  const storage = config.indexStorage;
  if (storage.kind === 'pinecone') {
    return new PineconeService(storage.apiKey, storage.indexName, config.embedding.dimension);
  }
  return new InMemoryVectorStore();
}

function createGenerator(config: AppConfig): AnswerGenerator | null {
  if (!config.generation) {
    log.warn('GEMINI_API_KEY is not set - answers will list source passages only');
    return null;
  }
  return new GeminiAnswerGenerator(config.generation.apiKey, {
    model: config.generation.model,
    temperature: config.generation.temperature
  });
}

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig(process.env);
  } catch (error) {
    log.error(errorMessage(error));
    process.exit(1);
  }
  setLogLevel(config.logLevel);

  const source = createSource(config);
  const ledger = createLedger(config);
  const chunker = new ChunkingService(config.chunking);
  const worker = new DocumentProcessingWorker(
    source,
    new TextExtractionService(),
    new TextCleaningService(),
    chunker,
    ledger
  );

  const corpus = new CorpusManager(
    {
      source,
      worker,
      chunker,
      embeddings: createEmbeddings(config),
      vectorStore: createVectorStore(config),
      ledger
    },
    {
      mode: config.ingestion.mode,
      concurrency: config.ingestion.concurrency,
      bm25: config.bm25,
      fusion: config.fusion,
      embeddingMaxFailureRatio: config.embedding.maxFailureRatio
    }
  );

  const queryService = new QueryService(corpus, createGenerator(config), config.query);
  const mcpHandler = new McpProtocolHandler(queryService);

  try {
    const names = await corpus.validateSource();
    log.info(`Found ${names.length} PDF file(s) in ${source.describe()}`);
  } catch (error) {
    log.error(errorMessage(error));
    process.exit(1);
  }

  await ledger.connect();

  if (config.ingestion.mode === 'eager') {
    log.info(`Indexing documents from ${source.describe()}...`);
    try {
      await corpus.initialize();
    } catch (error) {
      if (error instanceof ConfigurationError) {
        log.error(error.message);
        await ledger.disconnect();
        process.exit(1);
      }
      log.error(`Initial indexing failed, queries will report the index as unavailable: ${errorMessage(error)}`);
    }
  } else {
    log.info(`Lazy ingestion: documents from ${source.describe()} are indexed on the first query`);
  }

  const app = createApp({ corpus, queryService, mcpHandler, source });
  const server = app.listen(config.port, () => {
    log.info(`Server started on port ${config.port}`);
    log.info(`Health check available at http://localhost:${config.port}/health`);
    log.info(`MCP endpoint available at http://localhost:${config.port}/mcp`);
  });

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    server.close(() => {
      ledger
        .disconnect()
        .catch(error => log.error(`Ledger disconnect failed: ${errorMessage(error)}`))
        .finally(() => process.exit(0));
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch(error => {
  log.error(`Startup failed: ${errorMessage(error)}`);
  process.exit(1);
});
