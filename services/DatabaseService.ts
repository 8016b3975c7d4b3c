import { Collection, Db, MongoClient } from 'mongodb';
import { DocumentStatus } from '../types';
import { createLogger } from '../utils/logger';

const log = createLogger('DatabaseService');

export interface DocumentRecord {
  documentName: string;
  status: DocumentStatus;
  fileHash?: string;
  pageCount?: number;
  chunkCount?: number;
  generation?: number;
  reason?: string;
  indexedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Per-document ingestion history: which files were indexed into which
 * generation, and why others were skipped.
 */
export interface DocumentLedger {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  markProcessing(documentName: string, fileHash?: string): Promise<void>;
  markIndexed(documentName: string, details: { generation: number; chunkCount: number; pageCount: number; fileHash?: string }): Promise<void>;
  markSkipped(documentName: string, reason: string, fileHash?: string): Promise<void>;
  getDocument(documentName: string): Promise<DocumentRecord | null>;
}

export class DatabaseService implements DocumentLedger {
  private client: MongoClient | null = null;
  private db: Db | null = null;
  private documentsCollection: Collection<DocumentRecord> | null = null;
  private isConnected = false;

  constructor(private readonly uri: string, private readonly databaseName: string = 'pdf_search') {}

  async connect(): Promise<void> {
    if (this.isConnected && this.db) {
      return;
    }

    this.client = new MongoClient(this.uri);
    await this.client.connect();
    this.db = this.client.db(this.databaseName);
    this.documentsCollection = this.db.collection<DocumentRecord>('documents');
    await this.documentsCollection.createIndex({ documentName: 1 }, { unique: true });
    this.isConnected = true;
    log.info(`Connected to MongoDB database ${this.databaseName}`);
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
      this.db = null;
      this.documentsCollection = null;
      this.isConnected = false;
    }
  }

  private async collection(): Promise<Collection<DocumentRecord>> {
    if (!this.documentsCollection) {
      await this.connect();
    }
    if (!this.documentsCollection) {
      throw new Error('Database not connected');
    }
    return this.documentsCollection;
  }

  private async upsertDocument(documentName: string, fields: Partial<DocumentRecord>, clearReason: boolean = false): Promise<void> {
    const collection = await this.collection();
    const now = new Date();
    await collection.updateOne(
      { documentName },
      {
        $set: { ...fields, updatedAt: now },
        $setOnInsert: { createdAt: now },
        ...(clearReason ? { $unset: { reason: '' as const } } : {})
      },
      { upsert: true }
    );
  }

  async markProcessing(documentName: string, fileHash?: string): Promise<void> {
    await this.upsertDocument(documentName, { status: 'processing', ...(fileHash ? { fileHash } : {}) });
  }

  async markIndexed(
    documentName: string,
    details: { generation: number; chunkCount: number; pageCount: number; fileHash?: string }
  ): Promise<void> {
    await this.upsertDocument(
      documentName,
      {
        status: 'indexed',
        generation: details.generation,
        chunkCount: details.chunkCount,
        pageCount: details.pageCount,
        indexedAt: new Date(),
        ...(details.fileHash ? { fileHash: details.fileHash } : {})
      },
      true
    );
  }

  async markSkipped(documentName: string, reason: string, fileHash?: string): Promise<void> {
    await this.upsertDocument(documentName, { status: 'skipped', reason, ...(fileHash ? { fileHash } : {}) });
  }

  async getDocument(documentName: string): Promise<DocumentRecord | null> {
    const collection = await this.collection();
    return collection.findOne({ documentName }, { projection: { _id: 0 } });
  }
}

export class InMemoryDocumentLedger implements DocumentLedger {
  private records = new Map<string, DocumentRecord>();

  async connect(): Promise<void> {}

  async disconnect(): Promise<void> {}

  private update(documentName: string, fields: Partial<DocumentRecord>): void {
    const now = new Date();
    const existing = this.records.get(documentName);
    this.records.set(documentName, {
      status: 'pending',
      ...existing,
      ...fields,
      documentName,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now
    });
  }

  async markProcessing(documentName: string, fileHash?: string): Promise<void> {
    this.update(documentName, { status: 'processing', ...(fileHash ? { fileHash } : {}) });
  }

  async markIndexed(
    documentName: string,
    details: { generation: number; chunkCount: number; pageCount: number; fileHash?: string }
  ): Promise<void> {
    this.update(documentName, {
      status: 'indexed',
      generation: details.generation,
      chunkCount: details.chunkCount,
      pageCount: details.pageCount,
      indexedAt: new Date(),
      reason: undefined,
      ...(details.fileHash ? { fileHash: details.fileHash } : {})
    });
  }

  async markSkipped(documentName: string, reason: string, fileHash?: string): Promise<void> {
    this.update(documentName, { status: 'skipped', reason, ...(fileHash ? { fileHash } : {}) });
  }

  async getDocument(documentName: string): Promise<DocumentRecord | null> {
    const record = this.records.get(documentName);
    return record ? { ...record } : null;
  }
}
