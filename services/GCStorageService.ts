import { Bucket, Storage } from '@google-cloud/storage';
import { DocumentSource, isPdfName, safeDocumentName } from './DocumentSource';

export interface GcsSourceOptions {
  bucket: string;
  prefix?: string;
  projectId?: string;
  keyFilename?: string;
}

/**
 * Document source backed by a Cloud Storage bucket. Objects directly under
 * `prefix` whose names end in .pdf make up the corpus.
 */
export class GCStorageService implements DocumentSource {
  private storage: Storage;
  private bucket: Bucket;
  private prefix: string;

  constructor(options: GcsSourceOptions) {
    if (!options.bucket) {
      throw new Error('GCS_BUCKET environment variable is not set');
    }

    this.storage = options.keyFilename
      ? new Storage({ projectId: options.projectId, keyFilename: options.keyFilename })
      : new Storage({ projectId: options.projectId });
    this.bucket = this.storage.bucket(options.bucket);
    this.prefix = options.prefix ? options.prefix.replace(/\/?$/, '/') : '';
  }

  describe(): string {
    return `gs://${this.bucket.name}/${this.prefix}`;
  }

  async list(): Promise<string[]> {
    const [files] = await this.bucket.getFiles({ prefix: this.prefix });
    return files
      .map(file => file.name.slice(this.prefix.length))
      .filter(name => name !== '' && !name.includes('/') && isPdfName(name))
      .sort();
  }

  async read(name: string): Promise<Buffer> {
    const [contents] = await this.bucket.file(this.objectName(name)).download();
    return contents;
  }

  async save(name: string, buffer: Buffer): Promise<void> {
    await this.bucket.file(this.objectName(name)).save(buffer, {
      contentType: 'application/pdf',
      resumable: false
    });
  }

  private objectName(name: string): string {
    return `${this.prefix}${safeDocumentName(name)}`;
  }
}
