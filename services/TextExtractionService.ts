import type PdfParse from 'pdf-parse';
import { PageText } from '../types';
import { createLogger } from '../utils/logger';

const log = createLogger('TextExtractionService');

export interface ExtractionResult {
  pages: PageText[];
  pageCount: number;
  title?: string;
}

/**
 * Turns raw document bytes into page-tagged text. Implementations throw on
 * corrupt input; callers decide whether that skips the document.
 */
export interface DocumentParser {
  extractPages(buffer: Buffer, filename: string): Promise<ExtractionResult>;
}

type PdfParseFn = typeof PdfParse;
let pdfParse: PdfParseFn | null = null;

// pdf-parse's entry point runs a self-test when it is not required by a parent
// module, so it is loaded on first use rather than at import time.
async function getPdfParse(): Promise<PdfParseFn> {
  if (!pdfParse) {
    pdfParse = (await import('pdf-parse')).default;
  }
  return pdfParse;
}

/**
 * pdf-parse renders page i as "\n\n" + text(i), and its default renderer only
 * ever emits single newlines inside a page. Splitting on the separator
 * recovers the pages when the count matches; otherwise page numbers are
 * unknown and the whole text becomes one block.
 */
export function splitRenderedPages(renderedText: string, pageCount: number): PageText[] {
  const body = renderedText.startsWith('\n\n') ? renderedText.slice(2) : renderedText;
  const segments = body.split('\n\n');

  if (pageCount > 0 && segments.length === pageCount) {
    return segments
      .map((text, i) => ({ pageNumber: i + 1, text }))
      .filter(page => page.text.trim().length > 0);
  }

  if (body.trim().length === 0) {
    return [];
  }
  return [{ pageNumber: null, text: body }];
}

export class TextExtractionService implements DocumentParser {
  async extractPages(buffer: Buffer, filename: string): Promise<ExtractionResult> {
    if (!filename.toLowerCase().endsWith('.pdf')) {
      throw new Error(`Unsupported file type: ${filename}`);
    }

    try {
      const parse = await getPdfParse();
      const data = await parse(buffer);
      const pages = splitRenderedPages(data.text, data.numpages);

      if (pages.length === 1 && pages[0].pageNumber === null && data.numpages > 1) {
        log.warn(`Could not attribute text to pages for ${filename} (${data.numpages} pages)`);
      }

      const title = typeof data.info?.Title === 'string' && data.info.Title.trim() !== ''
        ? data.info.Title.trim()
        : undefined;

      return { pages, pageCount: data.numpages, title };
    } catch (error) {
      throw new Error(`Failed to extract text from PDF: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }
}
