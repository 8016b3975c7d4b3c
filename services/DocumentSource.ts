import { promises as fs } from 'fs';
import * as path from 'path';

/**
 * Where the corpus lives. `list()` returns PDF names sorted so every build
 * sees documents in the same order.
 */
export interface DocumentSource {
  describe(): string;
  /** Throws when the source itself cannot be reached or read. */
  list(): Promise<string[]>;
  read(name: string): Promise<Buffer>;
  save(name: string, buffer: Buffer): Promise<void>;
}

export function isPdfName(name: string): boolean {
  return name.toLowerCase().endsWith('.pdf');
}

/**
 * Reduces an uploaded file name to a plain base name so it cannot escape
 * the source directory.
 */
export function safeDocumentName(originalName: string): string {
  const base = path.basename(originalName.replace(/\\/g, '/'));
  if (base === '' || base === '.' || base === '..' || !isPdfName(base)) {
    throw new Error(`Invalid document name: ${originalName}`);
  }
  return base;
}

export class LocalDirectorySource implements DocumentSource {
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  describe(): string {
    return `directory ${this.directory}`;
  }

  async list(): Promise<string[]> {
    const stats = await fs.stat(this.directory);
    if (!stats.isDirectory()) {
      throw new Error(`${this.directory} is not a directory`);
    }
    const entries = await fs.readdir(this.directory, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && isPdfName(entry.name))
      .map(entry => entry.name)
      .sort();
  }

  async read(name: string): Promise<Buffer> {
    return fs.readFile(path.join(this.directory, safeDocumentName(name)));
  }

  async save(name: string, buffer: Buffer): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
    await fs.writeFile(path.join(this.directory, safeDocumentName(name)), buffer);
  }
}
