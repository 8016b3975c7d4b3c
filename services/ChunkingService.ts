import { ChunkingOptions } from '../config';
import { Chunk, PageText } from '../types';

export interface PageWindow {
  start: number;
  end: number;
}

export const DEFAULT_CHUNKING: ChunkingOptions = { chunkSize: 800, chunkOverlap: 120 };

export function buildChunkId(documentName: string, pageNumber: number | null, index: number): string {
  return `${documentName}::p${pageNumber ?? 0}::chunk::${index}`;
}

export class ChunkingService {
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;

  constructor(options: ChunkingOptions = DEFAULT_CHUNKING) {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize < 1) {
      throw new Error(`chunkSize must be a positive integer, got ${options.chunkSize}`);
    }
    if (!Number.isInteger(options.chunkOverlap) || options.chunkOverlap < 0 || options.chunkOverlap >= options.chunkSize) {
      throw new Error(`chunkOverlap must be in [0, ${options.chunkSize}), got ${options.chunkOverlap}`);
    }
    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
  }

  /**
   * Window boundaries for one page of text. Each window is at most
   * `chunkSize` long and starts `chunkOverlap` characters before the previous
   * window ended (always moving forward).
   */
  splitWindows(text: string): PageWindow[] {
    const windows: PageWindow[] = [];
    if (text.trim().length === 0) {
      return windows;
    }

    const maxChars = this.chunkSize;
    let startIndex = 0;

    while (startIndex < text.length) {
      let endIndex = Math.min(startIndex + maxChars, text.length);

      if (endIndex < text.length) {
        endIndex = this.findBreak(text, startIndex, endIndex);
      }

      windows.push({ start: startIndex, end: endIndex });

      if (endIndex >= text.length) {
        break;
      }
      startIndex = Math.max(startIndex + 1, endIndex - this.chunkOverlap);
    }

    return windows;
  }

  /**
   * Prefers a paragraph break, then a sentence end, a line break, and a
   * space, as long as the cut keeps at least half a window.
   */
  private findBreak(text: string, startIndex: number, endIndex: number): number {
    const minEnd = startIndex + this.chunkSize * 0.5;
    const searchFrom = endIndex - 1;

    const paragraphBreak = text.lastIndexOf('\n\n', searchFrom - 1);
    if (paragraphBreak > minEnd && paragraphBreak + 2 <= endIndex) {
      return paragraphBreak + 2;
    }
    const sentenceBreak = text.lastIndexOf('. ', searchFrom - 1);
    if (sentenceBreak > minEnd && sentenceBreak + 2 <= endIndex) {
      return sentenceBreak + 2;
    }
    const lineBreak = text.lastIndexOf('\n', searchFrom);
    if (lineBreak > minEnd && lineBreak + 1 <= endIndex) {
      return lineBreak + 1;
    }
    const space = text.lastIndexOf(' ', searchFrom);
    if (space > minEnd && space + 1 <= endIndex) {
      return space + 1;
    }
    return endIndex;
  }

  /**
   * Chunks every page of one document, in page order. `ordinal` is left
   * relative to this document; the corpus renumbers it when publishing.
   */
  chunkPages(pages: PageText[], documentName: string, extraMetadata: Record<string, string | number> = {}): Chunk[] {
    const chunks: Chunk[] = [];
    let chunkIndex = 0;

    for (const page of pages) {
      for (const window of this.splitWindows(page.text)) {
        const text = page.text.slice(window.start, window.end);
        if (text.trim().length === 0) {
          continue;
        }

        chunks.push({
          id: buildChunkId(documentName, page.pageNumber, chunkIndex),
          documentName,
          pageNumber: page.pageNumber,
          text,
          ordinal: chunkIndex,
          charStart: window.start,
          charEnd: window.end,
          metadata: {
            ...extraMetadata,
            document_name: documentName,
            page_number: page.pageNumber,
            source: documentName,
            chunk_index: chunkIndex,
            char_start: window.start,
            char_end: window.end
          }
        });
        chunkIndex++;
      }
    }

    return chunks;
  }

  /**
   * Drops chunks whose whitespace-normalized, lower-cased text was already
   * seen earlier in the list. First occurrence wins.
   */
  deduplicateChunks(chunks: Chunk[]): Chunk[] {
    const seen = new Set<string>();
    const unique: Chunk[] = [];

    for (const chunk of chunks) {
      const normalized = chunk.text
        .toLowerCase()
        .replace(/\s+/g, ' ')
        .trim();

      if (seen.has(normalized)) {
        continue;
      }

      seen.add(normalized);
      unique.push(chunk);
    }

    return unique;
  }
}
